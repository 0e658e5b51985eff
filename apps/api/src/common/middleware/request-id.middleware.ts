import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingMessage, ServerResponse } from 'http';
import { randomUUID } from 'crypto';

declare module 'http' {
  interface IncomingMessage {
    requestId?: string;
  }
}

const MAX_REQUEST_ID_LENGTH = 128;

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  // NestJS middleware with Fastify receives raw Node.js objects
  use(req: IncomingMessage, res: ServerResponse, next: () => void) {
    const header = req.headers['x-request-id'];
    const incoming = Array.isArray(header) ? header[0] : header;
    const requestId =
      incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : randomUUID();

    req.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    next();
  }
}
