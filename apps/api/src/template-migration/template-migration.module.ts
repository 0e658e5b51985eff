import { Module } from '@nestjs/common';
import { NotificationsModule } from '../notifications/notifications.module';
import { TemplateMigrationController } from './template-migration.controller';
import { TemplateMigrationService } from './template-migration.service';

@Module({
  imports: [NotificationsModule],
  controllers: [TemplateMigrationController],
  providers: [TemplateMigrationService],
  exports: [TemplateMigrationService],
})
export class TemplateMigrationModule {}
