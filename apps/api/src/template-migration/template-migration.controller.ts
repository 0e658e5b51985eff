import { Body, Controller, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { ApiExtraModels, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';

import { TemplateMigrationService } from './template-migration.service';
import { MigrationRequestDto } from './dto/migration-request.dto';
import {
  MigrationCommitResponseDto,
  MigrationDryRunResponseDto,
} from './dto/migration-response.dto';
import type { MigrationCommitResult, MigrationDryRunResult } from './migration-result';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { LoggerService } from '../common/logger/logger.service';

@ApiTags('Migrations')
@ApiExtraModels(MigrationDryRunResponseDto, MigrationCommitResponseDto)
@Controller('migrations')
export class TemplateMigrationController {
  constructor(
    private readonly templateMigrationService: TemplateMigrationService,
    private readonly logger: LoggerService,
  ) {}

  @Post('jinja-to-scriban')
  @HttpCode(HttpStatus.OK)
  @Auth({ requireAdmin: true })
  @ApiOperation({
    summary: 'Rewrite Jinja notification templates to Scriban (instance admin only)',
    description:
      'With dryRun the ids that would change are listed and nothing is written.',
  })
  @ApiResponse({ status: 200, description: 'Dry-run or commit result' })
  async migrateJinjaToScriban(
    @Body() dto: MigrationRequestDto,
    @CurrentUser('id') userId: string,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<MigrationDryRunResult | MigrationCommitResult> {
    // Stop starting new records once the client has gone away
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) {
        this.logger.warn('Client disconnected, cancelling template migration', { userId });
        controller.abort();
      }
    };
    reply.raw.once('close', onClose);
    this.logger.info('Template migration requested', { dryRun: dto.dryRun, userId });

    try {
      return dto.dryRun
        ? await this.templateMigrationService.dryRun(controller.signal)
        : await this.templateMigrationService.commit(userId, controller.signal);
    } finally {
      reply.raw.off('close', onClose);
    }
  }
}
