import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const migrationDryRunResponseSchema = z.object({
  notificationIdsToUpdate: z.array(z.string()),
});

export class MigrationDryRunResponseDto extends createZodDto(
  migrationDryRunResponseSchema,
) {}

export const migrationCommitResponseSchema = z.object({
  updatedNotificationIds: z.array(z.string()),
  failedNotificationIds: z.array(z.string()),
});

export class MigrationCommitResponseDto extends createZodDto(
  migrationCommitResponseSchema,
) {}
