import type { Pool } from 'pg';
import type { SqlExecutor } from './sqlExecutor.js';

export class PgExecutor implements SqlExecutor {
  constructor(private readonly client: Pick<Pool, 'query'>) {}

  placeholder(index: number): string {
    return `$${index}`;
  }

  async query(text: string, params: readonly unknown[]): Promise<Record<string, unknown>[]> {
    const result = await this.client.query<Record<string, unknown>>(text, [...params]);
    return result.rows;
  }
}
