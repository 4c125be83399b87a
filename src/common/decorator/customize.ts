import {
  createParamDecorator,
  ExecutionContext,
  SetMetadata,
} from '@nestjs/common';
import { MissingUserIdException } from '../errors/user-id.errors';
import type { UserScopedRequest } from '../interfaces/user-scoped-request.interface';

export const IS_PUBLIC_KEY = 'isPublic';
/**
 * Decorator to mark routes as public (no X-User-Id required)
 * Usage: @Public()
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);

/**
 * Owner identifier resolved by UserIdGuard
 *
 * Usage:
 * @Get(':id')
 * findOne(@CurrentUserId() userId: string, ...) {...}
 */
export const CurrentUserId = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<UserScopedRequest>();
    if (!request.userId) throw new MissingUserIdException();
    return request.userId;
  },
);
