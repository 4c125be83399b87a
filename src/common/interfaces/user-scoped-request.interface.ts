import type { Request } from 'express';

/** Express request after UserIdGuard has resolved the owner identifier */
export interface UserScopedRequest extends Request {
  userId?: string;
}
