import { Pool, type QueryResultRow } from "pg";
import type { AppConfig } from "../config/env";
import { LogLevel, log } from "../utils/logger";

/**
 * Minimal query surface the repositories need. A pg Pool satisfies it, and tests
 * pass an in-process fake.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<{ rows: T[] }>;
}

export interface Database extends Queryable {
  shutdown(): Promise<void>;
}

/**
 * Opens a PostgreSQL connection pool for the configured database.
 * Leverages generic type parameters on `query` so the returned rows match the
 * expected row shape.
 * @param config The loaded application config; `databaseUrl` must be set
 * @returns A Database handle wrapping the pool
 */
export function createDatabase(
  config: Pick<AppConfig, "databaseUrl" | "databaseSsl">
): Database {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to open a database pool");
  }

  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined
  });

  pool.on("error", (err) => {
    log(LogLevel.ERROR, "Unexpected error on idle Postgres client", err);
  });

  return {
    async query<T extends QueryResultRow = QueryResultRow>(
      text: string,
      params: unknown[] = []
    ): Promise<{ rows: T[] }> {
      return pool.query<T>(text, params);
    },

    /**
     * Drains all active connections and prevents new ones from being established.
     * Should be called during shutdown so the process can exit.
     */
    async shutdown(): Promise<void> {
      await pool.end();
    }
  };
}
