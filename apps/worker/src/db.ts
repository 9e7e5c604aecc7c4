import { createDb, type Database } from "@pacemail/db";
import { config } from "./config.js";

/**
 * Process-wide connection pool. postgres-js connects lazily, so importing
 * this module does not open a connection.
 */
const connection = createDb(config.DATABASE_URL, { max: config.DATABASE_POOL_MAX });

export const db: Database = connection.db;

export async function closeDb(): Promise<void> {
  await connection.close();
}
