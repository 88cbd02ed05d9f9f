import pg from 'pg';
import type { QueryResultRow } from 'pg';

const { Pool } = pg;

export type Queryable = {
  query<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]>;
};

export function createDatabase(connectionString: string): Queryable & { close(): Promise<void> } {
  const pool = new Pool({ connectionString });

  return {
    async query<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
      const res = await pool.query<T>(sql, params);
      return res.rows;
    },
    async close() {
      await pool.end();
    },
  };
}
