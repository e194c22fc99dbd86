import express from 'express';
import type { UserStore } from '../../domain/auth/userStore.js';
import type { SessionTokens } from '../../application/auth/sessionTokens.js';
import type { Logger } from '../logger.js';
import type { CookieManager } from './cookieManager.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies {
  userStore: UserStore;
  cookies: CookieManager;
  sessions: SessionTokens;
  session: { cookieName: string; ttlSeconds: number };
  writableColumns: readonly string[];
  /** Backs GET /healthz when given. */
  healthCheck?: () => Promise<unknown>;
  loginRateLimit?: number;
  logger?: Logger;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const app = express();
  const logger = deps.logger ?? console;

  app.use(express.json());
  app.use(createApiRateLimiter());

  const { healthCheck } = deps;
  if (healthCheck) {
    app.get('/healthz', (_req, res) => {
      withTimeout(healthCheck(), 2000)
        .then(() => {
          res.status(200).json({ status: 'ok' });
        })
        .catch((error: unknown) => {
          logger.warn('Health check failed:', error);
          res.status(500).json({
            code: 'DB_UNAVAILABLE',
            message: 'Database unavailable',
          });
        });
    });
  }

  app.use(createSwaggerRoutes());

  app.use(
    '/api/auth',
    createAuthRoutes({
      userStore: deps.userStore,
      cookies: deps.cookies,
      sessions: deps.sessions,
      cookieName: deps.session.cookieName,
      sessionTtlSeconds: deps.session.ttlSeconds,
      writableColumns: deps.writableColumns,
      loginRateLimit: deps.loginRateLimit,
    })
  );

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
