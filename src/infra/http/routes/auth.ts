import { Router } from 'express';
import { z } from 'zod';
import type { User } from '../../../domain/auth/user.js';
import type { UserStore, UserValues } from '../../../domain/auth/userStore.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { CurrentUserUseCase } from '../../../application/auth/currentUser.js';
import type { SessionTokens } from '../../../application/auth/sessionTokens.js';
import { UnauthorizedError } from '../../../application/errors.js';
import type { CookieManager } from '../cookieManager.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sessionMiddleware, type SessionRequest } from '../middleware/session.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     User:
 *       type: object
 *       required: [id, row]
 *       properties:
 *         id: { oneOf: [{ type: string }, { type: integer }] }
 *         row: { type: object, additionalProperties: true }
 *
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string, minLength: 8 }
 *               values: { type: object, additionalProperties: true }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Check credentials and set the session cookie
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated; Set-Cookie carries the session
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Expire the session cookie
 *     responses:
 *       204:
 *         description: Cookie removed
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: User behind the session cookie
 *     security:
 *       - sessionCookie: []
 *     responses:
 *       200:
 *         description: Current user
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       401:
 *         description: No valid session
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const registerBodySchema = z.object({
  username: z.string().trim().min(1).max(255),
  password: z.string().min(8),
  values: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

const loginBodySchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export interface AuthRoutesOptions {
  userStore: UserStore;
  cookies: CookieManager;
  sessions: SessionTokens;
  cookieName: string;
  sessionTtlSeconds: number;
  /** Columns a client may fill in on registration. */
  writableColumns: readonly string[];
  loginRateLimit?: number;
}

function toResponse(user: User) {
  return { id: user.id, row: user.row };
}

export function createAuthRoutes(options: AuthRoutesOptions) {
  const router = Router();
  const { userStore, cookies, sessions, cookieName } = options;
  const registerUseCase = new RegisterUseCase(userStore);
  const loginUseCase = new LoginUseCase(userStore, sessions);
  const currentUser = new CurrentUserUseCase(userStore, sessions);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const values: UserValues = {};
      for (const column of options.writableColumns) {
        const value = body.values?.[column];
        if (value !== undefined) {
          values[column] = value;
        }
      }
      const user = await registerUseCase.execute({
        username: body.username,
        password: body.password,
        values,
      });
      res.status(201).json(toResponse(user));
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(options.loginRateLimit),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      cookies.setCookie(res, cookieName, result.token, options.sessionTtlSeconds);
      res.status(200).json(toResponse(result.user));
    })
  );

  router.post('/logout', (_req, res) => {
    cookies.deleteCookie(res, cookieName);
    res.status(204).end();
  });

  router.get(
    '/me',
    sessionMiddleware(cookies, cookieName, currentUser),
    (req: SessionRequest, res, next) => {
      if (!req.user) {
        next(new UnauthorizedError('Not logged in'));
        return;
      }
      res.status(200).json(toResponse(req.user));
    }
  );

  return router;
}
