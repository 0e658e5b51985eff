import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { desc, eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { auditEvents, AuditEventRow } from '../database/schema';

export interface AuditEventInput {
  actorUserId: string | null;
  action: string;
  targetType: string;
  targetId?: string | null;
  meta?: Record<string, unknown>;
}

@Injectable()
export class AuditService {
  constructor(private readonly database: DatabaseService) {}

  async record(input: AuditEventInput): Promise<AuditEventRow> {
    return this.database.db
      .insert(auditEvents)
      .values({
        id: randomUUID(),
        actorUserId: input.actorUserId,
        action: input.action,
        targetType: input.targetType,
        targetId: input.targetId ?? null,
        meta: input.meta ?? {},
        createdAt: new Date().toISOString(),
      })
      .returning()
      .get();
  }

  /**
   * Most recent events for an action, newest first
   */
  async listByAction(action: string, limit = 50): Promise<AuditEventRow[]> {
    return this.database.db
      .select()
      .from(auditEvents)
      .where(eq(auditEvents.action, action))
      .orderBy(desc(auditEvents.createdAt))
      .limit(limit)
      .all();
  }
}
