import type { Database } from 'better-sqlite3';
import type { SqlExecutor } from './sqlExecutor.js';

/**
 * better-sqlite3 is synchronous; results are wrapped in promises so callers
 * see the same contract as the Postgres executor.
 */
export class SqliteExecutor implements SqlExecutor {
  constructor(private readonly db: Database) {}

  placeholder(_index: number): string {
    return '?';
  }

  async query(text: string, params: readonly unknown[]): Promise<Record<string, unknown>[]> {
    const stmt = this.db.prepare<unknown[], Record<string, unknown>>(text);
    const bound = params.map(toSqliteValue);
    if (stmt.reader) {
      return stmt.all(...bound);
    }
    stmt.run(...bound);
    return [];
  }
}

function toSqliteValue(value: unknown): unknown {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}
