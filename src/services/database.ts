import { Pool } from "pg";

export type SqlResult = {
  rows: unknown[];
  rowCount: number | null;
};

/** The slice of a pg pool the stores rely on. */
export type SqlClient = {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
};

export type DatabasePoolOptions = {
  connectionString: string;
  min: number;
  max: number;
  ssl: boolean;
};

export function createDatabasePool(options: DatabasePoolOptions): Pool {
  return new Pool({
    connectionString: options.connectionString,
    min: options.min,
    max: Math.max(options.max, options.min, 1),
    ssl: options.ssl ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000
  });
}

// pool.query checks a client out for a single statement and releases it afterwards
export function poolClient(pool: Pool): SqlClient {
  return {
    async query(text: string, values: unknown[] = []): Promise<SqlResult> {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    }
  };
}
