import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";

export interface CreateDbOptions {
  /** Maximum pooled connections */
  max?: number;
}

export function createDb(databaseUrl: string, options: CreateDbOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 30,           // Close idle connections after 30 seconds
    connect_timeout: 10,        // Connection timeout in seconds
    max_lifetime: 60 * 30,      // Max connection lifetime (30 minutes)
  });
  const db = drizzle(sql, { schema });

  return {
    db,
    close: () => sql.end({ timeout: 5 }),
  };
}

export type Database = PostgresJsDatabase<typeof schema>;
