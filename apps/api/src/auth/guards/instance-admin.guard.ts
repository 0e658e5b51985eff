import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { REQUIRE_INSTANCE_ADMIN_KEY } from '../decorators/require-admin.decorator';
import { RequestUser } from '../interfaces/authenticated-user.interface';
import { InstanceConfigService } from '../../instance-config/instance-config.service';

interface RequestWithUser {
  user?: RequestUser;
}

/**
 * Checks the caller against the cached instance configuration:
 * `requireAdminPrivileges: false` lets everyone in, `admins: null` nobody,
 * otherwise the user id must be listed.
 */
@Injectable()
export class InstanceAdminGuard implements CanActivate {
  private readonly logger = new Logger(InstanceAdminGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly instanceConfigService: InstanceConfigService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const required = this.reflector.getAllAndOverride<boolean>(REQUIRE_INSTANCE_ADMIN_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!required) {
      return true;
    }

    const request = context.switchToHttp().getRequest<RequestWithUser>();
    const user = request.user;

    if (!user) {
      throw new UnauthorizedException('Authentication required');
    }

    const result = await this.instanceConfigService.checkAdmin(user.id);
    if (!result.allowed) {
      this.logger.warn(`Instance admin check failed for user ${user.id}: ${result.reason}`);
      throw new ForbiddenException(result.reason);
    }

    return true;
  }
}
