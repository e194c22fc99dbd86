export type UserId = string | number;

/**
 * Application columns selected alongside the id. Never holds the password.
 */
export type UserRow = Readonly<Record<string, unknown>>;

/**
 * Authenticated principal (value object).
 * Only a UserStore creates these.
 */
export interface User {
  readonly id: UserId;
  readonly row: UserRow;
}

export function createUser(id: UserId, row: Record<string, unknown>): User {
  return Object.freeze({ id, row: Object.freeze({ ...row }) });
}

/**
 * Narrow a raw column value to a usable id. SQLite drivers may hand back
 * bigint for INTEGER PRIMARY KEY columns.
 */
export function toUserId(value: unknown): UserId | null {
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  return null;
}
