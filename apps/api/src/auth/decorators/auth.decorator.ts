import { applyDecorators, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiUnauthorizedResponse, ApiForbiddenResponse } from '@nestjs/swagger';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { InstanceAdminGuard } from '../guards/instance-admin.guard';
import { RequireInstanceAdmin } from './require-admin.decorator';

interface AuthOptions {
  requireAdmin?: boolean;
}

/**
 * Combined auth decorator that applies the JWT and instance admin guards
 *
 * @example
 * // Just authentication
 * @Auth()
 *
 * // Instance admins only
 * @Auth({ requireAdmin: true })
 */
export function Auth(options: AuthOptions = {}) {
  const decorators = [
    UseGuards(JwtAuthGuard, InstanceAdminGuard),
    ApiBearerAuth('JWT-auth'),
    ApiUnauthorizedResponse({ description: 'Unauthorized - Invalid or missing token' }),
  ];

  if (options.requireAdmin) {
    decorators.push(
      RequireInstanceAdmin(),
      ApiForbiddenResponse({ description: 'Forbidden - Instance admin required' }),
    );
  }

  return applyDecorators(...decorators);
}
