import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const patchInstanceConfigSchema = z
  .object({
    admins: z.array(z.string().min(1)).nullable().optional(),
    requireAdminPrivileges: z.boolean().optional(),
  })
  .strict();

export class PatchInstanceConfigDto extends createZodDto(patchInstanceConfigSchema) {}

export const instanceConfigResponseSchema = z.object({
  instanceName: z.string(),
  admins: z.array(z.string()).nullable(),
  requireAdminPrivileges: z.boolean(),
  version: z.number(),
  updatedAt: z.string(),
});

export class InstanceConfigResponseDto extends createZodDto(instanceConfigResponseSchema) {}
