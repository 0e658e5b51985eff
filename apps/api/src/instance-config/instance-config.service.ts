import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { and, eq, sql } from 'drizzle-orm';

import { DatabaseService } from '../database/database.service';
import { instanceConfig, InstanceConfigRow } from '../database/schema';
import { AuditService } from '../audit/audit.service';
import { PatchInstanceConfigDto } from './dto/patch-instance-config.dto';
import {
  AdminCheckResult,
  INSTANCE_CONFIG_UPDATED_EVENT,
  InstanceConfig,
  InstanceConfigSaveOptions,
  InstanceConfigUpdatedEvent,
} from './instance-config.types';

interface CachedConfig {
  value: InstanceConfig;
  expiresAt: number;
}

/**
 * Singleton instance configuration, read through a short-lived cache.
 *
 * Concurrent misses share one storage read. A successful save replaces the
 * cached value.
 */
@Injectable()
export class InstanceConfigService {
  private readonly logger = new Logger(InstanceConfigService.name);
  private cached: CachedConfig | null = null;
  private inflight: Promise<InstanceConfig> | null = null;

  constructor(
    private readonly database: DatabaseService,
    private readonly config: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    private readonly auditService: AuditService,
  ) {}

  get instanceName(): string {
    return this.config.get<string>('instance.name', 'notification-hub');
  }

  async fetch(): Promise<InstanceConfig> {
    if (this.cached && this.cached.expiresAt > Date.now()) {
      return this.cached.value;
    }

    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /**
   * Drop the cached value so the next fetch reads storage
   */
  invalidate(): void {
    this.cached = null;
  }

  async save(
    config: InstanceConfig,
    options: InstanceConfigSaveOptions = {},
  ): Promise<InstanceConfig> {
    let saved: InstanceConfig;
    try {
      saved = this.write(config, options);
    } catch (error) {
      this.logger.error(
        `Failed to save instance config ${config.instanceName}`,
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }

    this.store(saved);
    this.eventEmitter.emit(
      INSTANCE_CONFIG_UPDATED_EVENT,
      new InstanceConfigUpdatedEvent(saved, options.actorUserId ?? null),
    );
    await this.auditService.record({
      actorUserId: options.actorUserId ?? null,
      action: 'instance_config:update',
      targetType: 'instance_config',
      targetId: saved.instanceName,
      meta: {
        admins: saved.admins,
        requireAdminPrivileges: saved.requireAdminPrivileges,
        version: saved.version,
      },
    });

    this.logger.log(`Instance config saved (version ${saved.version})`);
    return saved;
  }

  /**
   * Partial update. With `expectedVersion` the write is compare-and-swap.
   */
  async patch(
    dto: PatchInstanceConfigDto,
    actorUserId: string,
    expectedVersion?: number,
  ): Promise<InstanceConfig> {
    const current = await this.fetch();

    const next: InstanceConfig = {
      ...current,
      admins: dto.admins !== undefined ? dto.admins : current.admins,
      requireAdminPrivileges: dto.requireAdminPrivileges ?? current.requireAdminPrivileges,
      version: expectedVersion ?? current.version,
    };

    return this.save(next, {
      requireVersion: expectedVersion !== undefined,
      actorUserId,
    });
  }

  async checkAdmin(userId: string): Promise<AdminCheckResult> {
    const config = await this.fetch();

    if (!config.requireAdminPrivileges) {
      return { allowed: true };
    }

    if (config.admins === null) {
      return { allowed: false, reason: 'Instance administration is disabled' };
    }

    if (!config.admins.includes(userId)) {
      return { allowed: false, reason: 'Instance admin privileges required' };
    }

    return { allowed: true };
  }

  private async load(): Promise<InstanceConfig> {
    const value = toInstanceConfig(this.readOrCreate());
    this.store(value);
    return value;
  }

  private readOrCreate(): InstanceConfigRow {
    const existing = this.database.db
      .select()
      .from(instanceConfig)
      .where(eq(instanceConfig.instanceName, this.instanceName))
      .get();
    if (existing) {
      return existing;
    }

    const initialAdmins = this.config.get<string[]>('instance.initialAdmins', []);
    this.database.db
      .insert(instanceConfig)
      .values({
        instanceName: this.instanceName,
        admins: initialAdmins.length > 0 ? initialAdmins : null,
        requireAdminPrivileges: true,
        version: 1,
        updatedAt: new Date().toISOString(),
      })
      .onConflictDoNothing()
      .run();
    this.logger.warn(`Created default instance config for ${this.instanceName}`);

    return this.database.db
      .select()
      .from(instanceConfig)
      .where(eq(instanceConfig.instanceName, this.instanceName))
      .get() ?? failMissing(this.instanceName);
  }

  private write(config: InstanceConfig, options: InstanceConfigSaveOptions): InstanceConfig {
    const updatedAt = new Date().toISOString();
    const values = {
      admins: config.admins,
      requireAdminPrivileges: config.requireAdminPrivileges,
      updatedAt,
    };

    if (options.isNew) {
      const row = this.database.db
        .insert(instanceConfig)
        .values({ instanceName: config.instanceName, version: 1, ...values })
        .returning()
        .get();
      return toInstanceConfig(row);
    }

    if (options.requireVersion) {
      const row = this.database.db
        .update(instanceConfig)
        .set({ ...values, version: config.version + 1 })
        .where(
          and(
            eq(instanceConfig.instanceName, config.instanceName),
            eq(instanceConfig.version, config.version),
          ),
        )
        .returning()
        .get();
      if (!row) {
        throw new ConflictException(
          `Instance config version mismatch. Expected ${config.version}`,
        );
      }
      return toInstanceConfig(row);
    }

    const row = this.database.db
      .insert(instanceConfig)
      .values({ instanceName: config.instanceName, version: 1, ...values })
      .onConflictDoUpdate({
        target: instanceConfig.instanceName,
        set: { ...values, version: sql`${instanceConfig.version} + 1` },
      })
      .returning()
      .get();
    return toInstanceConfig(row);
  }

  private store(value: InstanceConfig): void {
    const ttlSeconds = this.config.get<number>('instance.cacheTtlSeconds', 60);
    this.cached = { value, expiresAt: Date.now() + ttlSeconds * 1000 };
  }
}

function toInstanceConfig(row: InstanceConfigRow): InstanceConfig {
  return {
    instanceName: row.instanceName,
    admins: row.admins ?? null,
    requireAdminPrivileges: row.requireAdminPrivileges,
    version: row.version,
    updatedAt: row.updatedAt,
  };
}

function failMissing(instanceName: string): never {
  throw new Error(`Instance config ${instanceName} could not be created`);
}
