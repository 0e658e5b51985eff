import { Injectable } from '@nestjs/common';
import { and, asc, eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { notifications, NotificationRow } from '../database/schema';
import type {
  NotificationConfig,
  NotificationRecord,
  NotificationUpdateResult,
} from './notifications.types';

export interface NewNotification {
  id: string;
  container: string;
  config: NotificationConfig;
}

/**
 * Storage access for notification records.
 *
 * Writes are compare-and-swap on `version`: an update only lands when the
 * stored version still equals the one the caller read.
 */
@Injectable()
export class NotificationsRepository {
  constructor(private readonly database: DatabaseService) {}

  async listAll(): Promise<NotificationRecord[]> {
    const rows = this.database.db
      .select()
      .from(notifications)
      .orderBy(asc(notifications.createdAt), asc(notifications.id))
      .all();

    return rows.map(toRecord);
  }

  async listByContainer(container: string): Promise<NotificationRecord[]> {
    const rows = this.database.db
      .select()
      .from(notifications)
      .where(eq(notifications.container, container))
      .orderBy(asc(notifications.createdAt), asc(notifications.id))
      .all();

    return rows.map(toRecord);
  }

  async getById(id: string): Promise<NotificationRecord | null> {
    const row = this.database.db
      .select()
      .from(notifications)
      .where(eq(notifications.id, id))
      .get();

    return row ? toRecord(row) : null;
  }

  async insert(data: NewNotification): Promise<NotificationRecord> {
    const now = new Date().toISOString();
    const row = this.database.db
      .insert(notifications)
      .values({
        id: data.id,
        container: data.container,
        config: data.config,
        version: 1,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();

    return toRecord(row);
  }

  /**
   * Replace the stored config of `record.id` if its version is still
   * `expectedVersion`. Bumps the version on success.
   */
  async update(
    record: NotificationRecord,
    expectedVersion: number,
  ): Promise<NotificationUpdateResult> {
    const row = this.database.db
      .update(notifications)
      .set({
        config: record.config,
        version: expectedVersion + 1,
        updatedAt: new Date().toISOString(),
      })
      .where(
        and(
          eq(notifications.id, record.id),
          eq(notifications.version, expectedVersion),
        ),
      )
      .returning()
      .get();

    if (row) {
      return { status: 'updated', record: toRecord(row) };
    }

    const current = await this.getById(record.id);
    if (!current) {
      return { status: 'not_found' };
    }

    return { status: 'version_conflict', currentVersion: current.version };
  }

  async deleteById(id: string): Promise<boolean> {
    const result = this.database.db
      .delete(notifications)
      .where(eq(notifications.id, id))
      .run();

    return result.changes > 0;
  }
}

function toRecord(row: NotificationRow): NotificationRecord {
  return {
    id: row.id,
    container: row.container,
    config: row.config,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}
