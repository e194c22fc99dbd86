import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: optionalString,
  SESSION_SECRET: z.string().min(1, 'SESSION_SECRET environment variable is required'),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  SESSION_COOKIE_NAME: z.string().min(1).default('session'),
  COOKIE_PREFIX: z.string().default('web_authenticate_'),
  COOKIE_DOMAIN: optionalString,
  COOKIE_PATH: z.string().default('/'),
  COOKIE_SECURE: booleanFlag.default('false'),
  COOKIE_HTTP_ONLY: booleanFlag.default('true'),
  COOKIE_SAME_SITE: z.enum(['strict', 'lax', 'none']).default('lax'),
  USERS_TABLE: z.string().default('users'),
  USERS_ID_FIELD: z.string().default('id'),
  USERS_USERNAME_FIELD: z.string().default('username'),
  USERS_PASSWORD_FIELD: z.string().default('password'),
  USERS_EXTRA_COLUMNS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((column) => column.trim())
        .filter((column) => column.length > 0)
    ),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  session: {
    secret: string;
    ttlSeconds: number;
    cookieName: string;
  };
  cookie: {
    prefix: string;
    domain?: string;
    path: string;
    secure: boolean;
    httpOnly: boolean;
    sameSite: 'strict' | 'lax' | 'none';
  };
  users: {
    usersTable: string;
    idField: string;
    usernameField: string;
    passwordField: string;
    extraColumns: string[];
  };
}

/**
 * Read configuration from the environment. Loads `.env` first when reading
 * `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    session: {
      secret: parsed.SESSION_SECRET,
      ttlSeconds: parsed.SESSION_TTL_SECONDS,
      cookieName: parsed.SESSION_COOKIE_NAME,
    },
    cookie: {
      prefix: parsed.COOKIE_PREFIX,
      domain: parsed.COOKIE_DOMAIN,
      path: parsed.COOKIE_PATH,
      secure: parsed.COOKIE_SECURE,
      httpOnly: parsed.COOKIE_HTTP_ONLY,
      sameSite: parsed.COOKIE_SAME_SITE,
    },
    users: {
      usersTable: parsed.USERS_TABLE,
      idField: parsed.USERS_ID_FIELD,
      usernameField: parsed.USERS_USERNAME_FIELD,
      passwordField: parsed.USERS_PASSWORD_FIELD,
      extraColumns: parsed.USERS_EXTRA_COLUMNS,
    },
  };
}

export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  return config.databaseUrl;
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
