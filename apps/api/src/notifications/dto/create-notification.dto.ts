import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const CONTAINER_NAME_PATTERN = /^[a-z0-9](?:[a-z0-9-]{1,61})[a-z0-9]$/;

const stringMap = z.record(z.string(), z.string());

// Secrets arrive in plain text and are sealed before storage
const adoInputSchema = z.object({
  type: z.literal('ado'),
  baseUrl: z.string().url(),
  authToken: z.string().min(1),
  project: z.string(),
  workItemType: z.string(),
  uniqueFields: z.array(z.string()),
  comment: z.string().optional(),
  adoFields: stringMap,
  adoDuplicateFields: stringMap.optional(),
  onDuplicate: z.object({
    increment: z.array(z.string()),
    setState: stringMap,
    adoFields: stringMap,
    comment: z.string().optional(),
    regressionIgnoreStates: z.array(z.string()).optional(),
  }),
});

const githubIssuesInputSchema = z.object({
  type: z.literal('github_issues'),
  auth: z.object({
    user: z.string().min(1),
    personalAccessToken: z.string().min(1),
  }),
  organization: z.string(),
  repository: z.string(),
  title: z.string(),
  body: z.string(),
  uniqueSearch: z.object({
    fieldMatch: z.array(z.enum(['title', 'body'])),
    string: z.string(),
    author: z.string().optional(),
  }),
  assignees: z.array(z.string()),
  labels: z.array(z.string()),
  onDuplicate: z.object({
    comment: z.string().optional(),
    labels: z.array(z.string()),
    reopen: z.boolean(),
  }),
});

const teamsInputSchema = z.object({
  type: z.literal('teams'),
  url: z.string().url(),
});

export const notificationConfigInputSchema = z.discriminatedUnion('type', [
  adoInputSchema,
  githubIssuesInputSchema,
  teamsInputSchema,
]);

export type NotificationConfigInput = z.infer<typeof notificationConfigInputSchema>;

export const createNotificationSchema = z.object({
  container: z
    .string()
    .regex(CONTAINER_NAME_PATTERN, 'Container name must be 3-63 lowercase letters, digits or dashes'),
  replaceExisting: z.boolean().optional().default(false),
  config: notificationConfigInputSchema,
});

export class CreateNotificationDto extends createZodDto(createNotificationSchema) {}

export const listNotificationsQuerySchema = z.object({
  container: z.string().regex(CONTAINER_NAME_PATTERN).optional(),
});

export class ListNotificationsQueryDto extends createZodDto(listNotificationsQuerySchema) {}
