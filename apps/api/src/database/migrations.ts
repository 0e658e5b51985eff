/**
 * Ordered DDL migrations. Each entry runs once; applied ids are tracked in
 * the `schema_migrations` table.
 */
export interface SchemaMigration {
  id: string;
  sql: string;
}

export const SCHEMA_MIGRATIONS: readonly SchemaMigration[] = [
  {
    id: '001_notifications',
    sql: `
      CREATE TABLE IF NOT EXISTS notifications (
        id TEXT PRIMARY KEY,
        container TEXT NOT NULL,
        config TEXT NOT NULL,
        version INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_notifications_container ON notifications(container);
    `,
  },
  {
    id: '002_instance_config',
    sql: `
      CREATE TABLE IF NOT EXISTS instance_config (
        instance_name TEXT PRIMARY KEY,
        admins TEXT,
        require_admin_privileges INTEGER NOT NULL,
        version INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      );
    `,
  },
  {
    id: '003_audit_events',
    sql: `
      CREATE TABLE IF NOT EXISTS audit_events (
        id TEXT PRIMARY KEY,
        actor_user_id TEXT,
        action TEXT NOT NULL,
        target_type TEXT NOT NULL,
        target_id TEXT,
        meta TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_events_action ON audit_events(action);
    `,
  },
];
