import type { User, UserId } from './user.js';

/**
 * SQL expression inserted as written instead of bound, e.g. `NOW()`.
 * Only for trusted, application-supplied text.
 */
export class SqlLiteral {
  constructor(readonly sql: string) {}
}

export function sqlLiteral(sql: string): SqlLiteral {
  return new SqlLiteral(sql);
}

/**
 * Values for additional columns when creating a user.
 */
export type UserValues = Record<string, string | number | boolean | Date | SqlLiteral | null>;

/**
 * Loads and persists users. Authentication failures and missing rows resolve
 * `null`; only storage failures reject.
 */
export interface UserStore {
  /**
   * Resolve the user whose username and password match. Unknown users and
   * wrong passwords both resolve `null`.
   */
  loadUser(username: string, password: string): Promise<User | null>;

  loadUserById(userId: UserId): Promise<User | null>;

  /**
   * Create a user with a hashed password and return it as stored.
   */
  storeUser(username: string, password: string, extraValues?: UserValues): Promise<User | null>;
}
