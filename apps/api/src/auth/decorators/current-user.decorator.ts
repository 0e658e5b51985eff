import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { RequestUser } from '../interfaces/authenticated-user.interface';

interface FastifyRequestWithUser {
  user?: RequestUser;
}

/**
 * Decorator to extract the current authenticated user from the request
 *
 * @example
 * ```typescript
 * @Post()
 * create(@CurrentUser('id') userId: string) {}
 * ```
 */
export const CurrentUser = createParamDecorator(
  (data: keyof RequestUser | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<FastifyRequestWithUser>();
    const user = request.user;

    return data ? user?.[data] : user;
  },
);
