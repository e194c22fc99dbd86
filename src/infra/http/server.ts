import { fileURLToPath } from 'url';
import { loadConfig, requireDatabaseUrl } from '../config.js';
import { createPool } from '../db/pool.js';
import { PgExecutor } from '../db/pgExecutor.js';
import { SqlUserStore } from '../db/sqlUserStore.js';
import { JwtSessionTokens } from '../../application/auth/sessionTokens.js';
import { Argon2Digest } from '../../domain/auth/digest.js';
import { CookieManager } from './cookieManager.js';
import { createApp } from './app.js';

export function startServer() {
  const config = loadConfig();
  const pool = createPool(requireDatabaseUrl(config));

  const userStore = new SqlUserStore(new PgExecutor(pool), {
    ...config.users,
    digest: new Argon2Digest(),
  });

  const app = createApp({
    userStore,
    cookies: new CookieManager(config.cookie),
    sessions: new JwtSessionTokens(config.session.secret, config.session.ttlSeconds),
    session: { cookieName: config.session.cookieName, ttlSeconds: config.session.ttlSeconds },
    writableColumns: config.users.extraColumns,
    healthCheck: () => pool.query('SELECT 1'),
  });

  return app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/healthz`);
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer();
}
