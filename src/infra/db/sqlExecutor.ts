/**
 * Minimal database boundary used by the SQL user store. Every query resolves
 * to an array of records, never a bare scalar.
 */
export interface SqlExecutor {
  /** Bind placeholder for the 1-based parameter `index`. */
  placeholder(index: number): string;
  query(text: string, params: readonly unknown[]): Promise<Record<string, unknown>[]>;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * Double-quote an identifier (Postgres and SQLite both accept this form).
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return typeof error.code === 'string' && UNIQUE_VIOLATION_CODES.has(error.code);
}
