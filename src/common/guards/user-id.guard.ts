import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { isUUID } from 'class-validator';
import { IS_PUBLIC_KEY } from '../decorator/customize';
import { USER_ID_HEADER } from '../constants/headers.constant';
import {
  InvalidUserIdException,
  MissingUserIdException,
} from '../errors/user-id.errors';
import type { UserScopedRequest } from '../interfaces/user-scoped-request.interface';

/**
 * Resolve the owner identifier from a raw X-User-Id header value.
 * Any well-formed UUID is trusted; it is lower-cased so one owner has one key.
 */
export const extractUserId = (
  header: string | string[] | undefined,
): string => {
  if (header === undefined || header === '') {
    throw new MissingUserIdException();
  }
  if (Array.isArray(header) || !isUUID(header)) {
    throw new InvalidUserIdException();
  }
  return header.toLowerCase();
};

/**
 * Global guard scoping every request to the caller in X-User-Id
 * Use @Public() decorator to bypass it
 */
@Injectable()
export class UserIdGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<UserScopedRequest>();
    request.userId = extractUserId(request.headers[USER_ID_HEADER]);
    return true;
  }
}
