import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NotificationsRepository } from '../notifications/notifications.repository';
import type { NotificationConfig, NotificationRecord } from '../notifications/notifications.types';
import { AuditService } from '../audit/audit.service';
import { runWithConcurrency } from '../common/utils/concurrency.util';
import { adaptForScriban, isJinjaTemplate } from './jinja-template.adapter';
import {
  extractTemplateFields,
  MalformedConfigError,
  rebuildConfig,
  TemplateField,
} from './template-fields';
import {
  MigrationCommitResult,
  MigrationDryRunResult,
  MigrationOutcome,
  MigrationResultAggregator,
} from './migration-result';

export const MIGRATION_AUDIT_ACTION = 'notifications:migrate_templates';

export interface MigrationRunOptions {
  dryRun: boolean;
  actorUserId?: string | null;
  signal?: AbortSignal;
}

/**
 * Adapted values for every Jinja field of `config`; empty when nothing is
 * eligible.
 */
export function planTemplateMigration(config: NotificationConfig): TemplateField[] {
  return extractTemplateFields(config)
    .filter((field) => isJinjaTemplate(field.value))
    .map((field) => ({ locator: field.locator, value: adaptForScriban(field.value) }));
}

@Injectable()
export class TemplateMigrationService {
  private readonly logger = new Logger(TemplateMigrationService.name);

  constructor(
    private readonly notifications: NotificationsRepository,
    private readonly audit: AuditService,
    private readonly config: ConfigService,
  ) {}

  async dryRun(signal?: AbortSignal): Promise<MigrationDryRunResult> {
    const result = await this.migrate({ dryRun: true, signal });
    return result.toDryRunResult();
  }

  async commit(actorUserId: string | null, signal?: AbortSignal): Promise<MigrationCommitResult> {
    const result = await this.migrate({ dryRun: false, actorUserId, signal });
    return result.toCommitResult();
  }

  /**
   * One pass over every stored notification. Per-record failures end up in
   * the result; nothing past loading the record set throws.
   */
  async migrate(options: MigrationRunOptions): Promise<MigrationResultAggregator> {
    const { dryRun, signal } = options;
    const mode = dryRun ? 'dry-run' : 'commit';
    const aggregator = new MigrationResultAggregator();

    if (signal?.aborted) {
      this.logger.warn(`Template migration (${mode}) cancelled before start`);
      return aggregator;
    }

    const records = await this.notifications.listAll();
    const concurrency = this.config.get<number>('migration.concurrency', 4);

    this.logger.log(
      `Template migration (${mode}) started: ${records.length} notification(s), concurrency ${concurrency}`,
    );

    const settled = await runWithConcurrency(
      records,
      concurrency,
      async (record) => {
        aggregator.record(record.id, await this.migrateRecord(record, dryRun));
      },
      signal,
    );

    // Results come back in start order, which is record order
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') return;
      const id = records[index].id;
      this.logger.error(
        `Notification ${id}: migration task failed`,
        result.reason instanceof Error ? result.reason.stack : result.reason,
      );
      if (!aggregator.outcomeOf(id)) {
        aggregator.record(id, { status: 'failed', reason: 'unexpected_error' });
      }
    });

    const summary = aggregator.summary();
    if (aggregator.size < records.length) {
      this.logger.warn(
        `Template migration (${mode}) cancelled after ${aggregator.size} of ${records.length} notification(s)`,
      );
    }
    this.logger.log(
      `Template migration (${mode}) finished: ${JSON.stringify(summary)}`,
    );

    if (!dryRun && summary.updated + summary.failed > 0) {
      await this.recordAuditEvent(options.actorUserId ?? null, aggregator);
    }

    return aggregator;
  }

  private async migrateRecord(
    record: NotificationRecord,
    dryRun: boolean,
  ): Promise<MigrationOutcome> {
    let updates: TemplateField[];
    try {
      updates = planTemplateMigration(record.config);
    } catch (error) {
      this.logger.warn(
        `Notification ${record.id}: cannot enumerate template fields: ${describe(error)}`,
      );
      return dryRun
        ? { status: 'excluded', reason: 'malformed_config' }
        : { status: 'failed', reason: 'malformed_config' };
    }

    if (updates.length === 0) {
      return { status: 'unchanged' };
    }

    if (dryRun) {
      this.logger.debug(`Notification ${record.id}: ${updates.length} field(s) would be migrated`);
      return { status: 'would_update', fieldCount: updates.length };
    }

    let config: NotificationConfig;
    try {
      config = rebuildConfig(record.config, updates);
    } catch (error) {
      this.logger.warn(`Notification ${record.id}: cannot rebuild config: ${describe(error)}`);
      return { status: 'failed', reason: 'malformed_config' };
    }

    try {
      const result = await this.notifications.update({ ...record, config }, record.version);

      switch (result.status) {
        case 'updated':
          return { status: 'updated', fieldCount: updates.length };
        case 'version_conflict':
          this.logger.warn(
            `Notification ${record.id}: version changed from ${record.version} to ${result.currentVersion} during migration`,
          );
          return { status: 'failed', reason: 'version_conflict' };
        case 'not_found':
          this.logger.warn(`Notification ${record.id}: deleted during migration`);
          return { status: 'failed', reason: 'not_found' };
      }
    } catch (error) {
      this.logger.error(
        `Notification ${record.id}: failed to store migrated config`,
        error instanceof Error ? error.stack : error,
      );
      return { status: 'failed', reason: 'storage_error' };
    }
  }

  private async recordAuditEvent(
    actorUserId: string | null,
    aggregator: MigrationResultAggregator,
  ): Promise<void> {
    try {
      await this.audit.record({
        actorUserId,
        action: MIGRATION_AUDIT_ACTION,
        targetType: 'notification',
        meta: {
          summary: aggregator.summary(),
          updatedNotificationIds: aggregator.idsWith('updated'),
          failures: aggregator.failures(),
        },
      });
    } catch (error) {
      // The records are already written; the response must still report them.
      this.logger.error(
        'Failed to record template migration audit event',
        error instanceof Error ? error.stack : error,
      );
    }
  }
}

function describe(error: unknown): string {
  if (error instanceof MalformedConfigError) {
    return error.message;
  }
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
