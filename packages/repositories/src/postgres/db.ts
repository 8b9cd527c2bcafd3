import { drizzle } from 'drizzle-orm/postgres-js';
import type { SQL } from 'drizzle-orm';
import postgres from 'postgres';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: config.databaseUrl,
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });

  const db = drizzle(client);

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * Runs a statement and returns its rows
 */
export type QueryRunner = {
  run(query: SQL): Promise<Record<string, unknown>[]>;
};

export function createQueryRunner(db: Database): QueryRunner {
  return {
    async run(query: SQL) {
      const rows = await db.execute<Record<string, unknown>>(query);
      return Array.from(rows);
    },
  };
}
