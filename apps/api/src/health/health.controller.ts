import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiServiceUnavailableResponse, ApiTags } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  HealthIndicatorFunction,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import { Public } from '../auth/decorators/public.decorator';
import { DatabaseHealthIndicator } from './indicators/database.indicator';
import { InstanceConfigHealthIndicator } from './indicators/instance-config.indicator';

export const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;

export interface LivenessResult {
  status: 'ok';
  uptimeSeconds: number;
  timestamp: string;
}

export type TimedHealthCheckResult = HealthCheckResult & { timestamp: string };

@ApiTags('Health')
@Public()
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly database: DatabaseHealthIndicator,
    private readonly instanceConfig: InstanceConfigHealthIndicator,
    private readonly memory: MemoryHealthIndicator,
  ) {}

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe; touches no dependency' })
  @ApiOkResponse({ description: 'Process is running' })
  liveness(): LivenessResult {
    return {
      status: 'ok',
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('ready')
  @HealthCheck()
  @ApiOperation({
    summary: 'Readiness probe',
    description: 'SQLite answers and the instance config that gates admin routes can be loaded.',
  })
  @ApiServiceUnavailableResponse({ description: 'Storage or instance config unavailable' })
  readiness(): Promise<TimedHealthCheckResult> {
    return this.run(this.readinessChecks());
  }

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Readiness checks plus heap usage' })
  @ApiServiceUnavailableResponse({ description: 'A check failed' })
  fullHealth(): Promise<TimedHealthCheckResult> {
    return this.run([
      ...this.readinessChecks(),
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
    ]);
  }

  private readinessChecks(): HealthIndicatorFunction[] {
    return [
      () => this.database.isHealthy('database'),
      () => this.instanceConfig.isHealthy('instance_config'),
    ];
  }

  private async run(checks: HealthIndicatorFunction[]): Promise<TimedHealthCheckResult> {
    const result = await this.health.check(checks);
    return { ...result, timestamp: new Date().toISOString() };
  }
}
