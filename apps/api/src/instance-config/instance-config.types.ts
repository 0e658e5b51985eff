export interface InstanceConfig {
  instanceName: string;
  /** `null` disables instance administration entirely */
  admins: string[] | null;
  requireAdminPrivileges: boolean;
  version: number;
  updatedAt: string;
}

export interface InstanceConfigSaveOptions {
  isNew?: boolean;
  /** Only write when the stored version still equals `config.version` */
  requireVersion?: boolean;
  actorUserId?: string | null;
}

export type AdminCheckResult =
  | { allowed: true }
  | { allowed: false; reason: string };

export const INSTANCE_CONFIG_UPDATED_EVENT = 'instance_config.updated';

export class InstanceConfigUpdatedEvent {
  constructor(
    public readonly config: InstanceConfig,
    public readonly actorUserId: string | null,
  ) {}
}
