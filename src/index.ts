export { Argon2Digest, type Argon2DigestOptions, type Digest } from './domain/auth/digest.js';
export { InvalidArgumentError } from './domain/auth/errors.js';
export { createUser, toUserId, type User, type UserId, type UserRow } from './domain/auth/user.js';
export { SqlLiteral, sqlLiteral, type UserStore, type UserValues } from './domain/auth/userStore.js';
export {
  CookieManager,
  cookieConfigSchema,
  type CookieConfig,
  type CookieReader,
  type CookieWriter,
} from './infra/http/cookieManager.js';
export { SqlUserStore, userSchemaOptions, type SqlUserStoreOptions } from './infra/db/sqlUserStore.js';
export {
  isUniqueViolation,
  quoteIdentifier,
  type SqlExecutor,
} from './infra/db/sqlExecutor.js';
export { PgExecutor } from './infra/db/pgExecutor.js';
export { SqliteExecutor } from './infra/db/sqliteExecutor.js';
export { JwtSessionTokens, type SessionTokens } from './application/auth/sessionTokens.js';
export { ConflictError, UnauthorizedError } from './application/errors.js';
export { createApp, type AppDependencies } from './infra/http/app.js';
export type { Logger } from './infra/logger.js';
