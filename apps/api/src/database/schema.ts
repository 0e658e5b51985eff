/**
 * Drizzle schema for the SQLite store.
 *
 * JSON columns are stored as TEXT and typed through `$type`; the DDL that
 * creates these tables lives in ./migrations.ts.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { NotificationConfig } from '../notifications/notifications.types';

// =============================================================================
// notifications
// =============================================================================

export const notifications = sqliteTable('notifications', {
  id: text('id').primaryKey(),
  container: text('container').notNull(),
  config: text('config', { mode: 'json' }).$type<NotificationConfig>().notNull(),
  version: integer('version').notNull().default(1),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => ({
  containerIdx: index('idx_notifications_container').on(table.container),
}));

// =============================================================================
// instance_config
// =============================================================================

export const instanceConfig = sqliteTable('instance_config', {
  instanceName: text('instance_name').primaryKey(),
  admins: text('admins', { mode: 'json' }).$type<string[] | null>(),
  requireAdminPrivileges: integer('require_admin_privileges', { mode: 'boolean' }).notNull(),
  version: integer('version').notNull().default(1),
  updatedAt: text('updated_at').notNull(),
});

// =============================================================================
// audit_events
// =============================================================================

export const auditEvents = sqliteTable('audit_events', {
  id: text('id').primaryKey(),
  actorUserId: text('actor_user_id'),
  action: text('action').notNull(),
  targetType: text('target_type').notNull(),
  targetId: text('target_id'),
  meta: text('meta', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  createdAt: text('created_at').notNull(),
}, (table) => ({
  actionIdx: index('idx_audit_events_action').on(table.action),
}));

export type NotificationRow = typeof notifications.$inferSelect;
export type InstanceConfigRow = typeof instanceConfig.$inferSelect;
export type AuditEventRow = typeof auditEvents.$inferSelect;
