import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { SCHEMA_MIGRATIONS } from './migrations';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly sqlite: Database.Database;
  readonly db: AppDatabase;

  constructor(config: ConfigService) {
    const path = config.get<string>('database.path', ':memory:');
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.sqlite = new Database(path);
    this.db = drizzle(this.sqlite, { schema });
  }

  onModuleInit() {
    if (this.sqlite.name !== ':memory:') {
      this.sqlite.pragma('journal_mode = WAL');
    }
    this.sqlite.pragma('foreign_keys = ON');

    const applied = this.applyMigrations();
    this.logger.log(`Database ready (${this.sqlite.name}), ${applied} migration(s) applied`);
  }

  onModuleDestroy() {
    if (this.sqlite.open) {
      this.sqlite.close();
      this.logger.log('Database closed');
    }
  }

  /**
   * Cheap round trip used by the readiness probe
   */
  ping(): void {
    this.sqlite.prepare('SELECT 1').get();
  }

  /**
   * Clean database for testing
   */
  cleanDatabase(): void {
    if (process.env.NODE_ENV !== 'test') {
      throw new Error('cleanDatabase only allowed in test environment');
    }

    this.sqlite.exec(`
      DELETE FROM notifications;
      DELETE FROM instance_config;
      DELETE FROM audit_events;
    `);
  }

  private applyMigrations(): number {
    this.sqlite.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL
      )
    `);

    const rows = this.sqlite
      .prepare<[], { id: string }>('SELECT id FROM schema_migrations')
      .all();
    const done = new Set(rows.map((row) => row.id));

    const record = this.sqlite.prepare<[string, string]>(
      'INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)',
    );

    let applied = 0;
    for (const migration of SCHEMA_MIGRATIONS) {
      if (done.has(migration.id)) continue;

      this.sqlite.transaction(() => {
        this.sqlite.exec(migration.sql);
        record.run(migration.id, new Date().toISOString());
      })();
      applied++;
    }

    return applied;
  }
}
