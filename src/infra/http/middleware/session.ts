import type { Request } from 'express';
import type { User } from '../../../domain/auth/user.js';
import type { CurrentUserUseCase } from '../../../application/auth/currentUser.js';
import type { CookieManager } from '../cookieManager.js';
import { asyncHandler } from './asyncHandler.js';

export interface SessionRequest extends Request {
  user?: User;
}

/**
 * Attach the user behind the session cookie to `req.user`. Requests without
 * a valid session continue anonymously.
 */
export function sessionMiddleware(
  cookies: CookieManager,
  cookieName: string,
  currentUser: CurrentUserUseCase
) {
  return asyncHandler<SessionRequest>(async (req, _res, next) => {
    const user = await currentUser.execute(cookies.getCookie(req, cookieName));
    if (user) {
      req.user = user;
    }
    next();
  });
}
