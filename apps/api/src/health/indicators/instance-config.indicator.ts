import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { InstanceConfigService } from '../../instance-config/instance-config.service';

export type AdminGateState = 'open' | 'enforced' | 'disabled';

/**
 * Up when the instance config loads. Reports how the admin gate is set.
 */
@Injectable()
export class InstanceConfigHealthIndicator extends HealthIndicator {
  constructor(private readonly instanceConfigService: InstanceConfigService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      const config = await this.instanceConfigService.fetch();
      return this.getStatus(key, true, {
        version: config.version,
        adminGate: adminGateState(config.requireAdminPrivileges, config.admins),
      });
    } catch (error) {
      throw new HealthCheckError(
        'Instance config unavailable',
        this.getStatus(key, false, {
          message: error instanceof Error ? error.message : 'Unknown error',
        }),
      );
    }
  }
}

function adminGateState(requireAdminPrivileges: boolean, admins: string[] | null): AdminGateState {
  if (!requireAdminPrivileges) return 'open';
  return admins === null ? 'disabled' : 'enforced';
}
