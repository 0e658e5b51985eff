import pino from 'pino';

const serviceName = process.env.SERVICE_NAME || 'notification-hub-api';

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV !== 'development') {
    // stdout JSON
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export function createLogger(): pino.Logger {
  return pino({
    level: process.env.LOG_LEVEL || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: buildTransport(),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        service: serviceName,
      }),
    },
  });
}
