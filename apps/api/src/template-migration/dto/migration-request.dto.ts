import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const migrationRequestSchema = z.object({
  dryRun: z.boolean().optional().default(false),
});

export class MigrationRequestDto extends createZodDto(migrationRequestSchema) {}
