import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';

import { NotificationsRepository } from './notifications.repository';
import {
  NOTIFICATION_CREATED_EVENT,
  NOTIFICATION_DELETED_EVENT,
  NotificationConfig,
  NotificationCreatedEvent,
  NotificationDeletedEvent,
  NotificationRecord,
} from './notifications.types';
import { CreateNotificationDto, NotificationConfigInput } from './dto/create-notification.dto';
import {
  NotificationResponse,
  REDACTED,
  RedactedNotificationConfig,
} from './dto/notification-response.dto';
import { AuditService } from '../audit/audit.service';
import { parseEncryptionKey, sealSecret } from '../common/utils/secret-data.util';

@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);
  private encryptionKey: Buffer | null = null;

  constructor(
    private readonly repository: NotificationsRepository,
    private readonly config: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Create a notification. With `replaceExisting` every notification of
   * the same container is removed first.
   */
  async create(dto: CreateNotificationDto, actorUserId: string): Promise<NotificationResponse> {
    if (dto.replaceExisting) {
      const existing = await this.repository.listByContainer(dto.container);
      for (const record of existing) {
        await this.remove(record, actorUserId);
      }
      if (existing.length > 0) {
        this.logger.log(
          `Replaced ${existing.length} notification(s) in container ${dto.container}`,
        );
      }
    }

    const record = await this.repository.insert({
      id: randomUUID(),
      container: dto.container,
      config: this.sealConfig(dto.config),
    });

    this.eventEmitter.emit(NOTIFICATION_CREATED_EVENT, new NotificationCreatedEvent(record));
    await this.auditService.record({
      actorUserId,
      action: 'notifications:create',
      targetType: 'notification',
      targetId: record.id,
      meta: { container: record.container, type: record.config.type },
    });

    this.logger.log(`Created ${record.config.type} notification ${record.id}`);
    return toResponse(record);
  }

  async list(container?: string): Promise<NotificationResponse[]> {
    const records = container
      ? await this.repository.listByContainer(container)
      : await this.repository.listAll();

    return records.map(toResponse);
  }

  async get(id: string): Promise<NotificationResponse> {
    const record = await this.repository.getById(id);
    if (!record) {
      throw new NotFoundException(`Notification ${id} not found`);
    }
    return toResponse(record);
  }

  async delete(id: string, actorUserId: string): Promise<void> {
    const record = await this.repository.getById(id);
    if (!record) {
      throw new NotFoundException(`Notification ${id} not found`);
    }
    await this.remove(record, actorUserId);
  }

  private async remove(record: NotificationRecord, actorUserId: string): Promise<void> {
    const deleted = await this.repository.deleteById(record.id);
    if (!deleted) {
      // Removed concurrently; nothing left to announce
      return;
    }

    this.eventEmitter.emit(
      NOTIFICATION_DELETED_EVENT,
      new NotificationDeletedEvent(record.id, record.container),
    );
    await this.auditService.record({
      actorUserId,
      action: 'notifications:delete',
      targetType: 'notification',
      targetId: record.id,
      meta: { container: record.container },
    });
  }

  private sealConfig(input: NotificationConfigInput): NotificationConfig {
    const key = this.getEncryptionKey();

    switch (input.type) {
      case 'ado':
        return { ...input, authToken: sealSecret(input.authToken, key) };
      case 'github_issues':
        return { ...input, auth: sealSecret(JSON.stringify(input.auth), key) };
      case 'teams':
        return { ...input, url: sealSecret(input.url, key) };
    }
  }

  private getEncryptionKey(): Buffer {
    if (!this.encryptionKey) {
      this.encryptionKey = parseEncryptionKey(this.config.get<string>('encryptionKey'));
    }
    return this.encryptionKey;
  }
}

export function redactConfig(config: NotificationConfig): RedactedNotificationConfig {
  switch (config.type) {
    case 'ado':
      return { ...config, authToken: REDACTED };
    case 'github_issues':
      return { ...config, auth: REDACTED };
    case 'teams':
      return { ...config, url: REDACTED };
  }
}

function toResponse(record: NotificationRecord): NotificationResponse {
  return { ...record, config: redactConfig(record.config) };
}
