import { Global, Module } from '@nestjs/common';
import { InstanceConfigController } from './instance-config.controller';
import { InstanceConfigService } from './instance-config.service';

/**
 * Global so the instance admin guard resolves in every feature module
 */
@Global()
@Module({
  controllers: [InstanceConfigController],
  providers: [InstanceConfigService],
  exports: [InstanceConfigService],
})
export class InstanceConfigModule {}
