import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { DatabaseHealthIndicator } from './indicators/database.indicator';
import { InstanceConfigHealthIndicator } from './indicators/instance-config.indicator';

// DatabaseService and InstanceConfigService come from global modules
@Module({
  imports: [TerminusModule.forRoot({ errorLogStyle: 'pretty' })],
  controllers: [HealthController],
  providers: [DatabaseHealthIndicator, InstanceConfigHealthIndicator],
})
export class HealthModule {}
