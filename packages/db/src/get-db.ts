/**
 * packages/db - DB connection helper
 *
 * Builds the `Pool` and schema-bound drizzle instance in one place; callers
 * pass only the connection string.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = NodePgDatabase<typeof schema>;

export interface DbConnection {
  db: Db;
  /** Drain and close the pool */
  close: () => Promise<void>;
}

export function getDb(connectionString: string): DbConnection {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  const db = drizzle(pool, { schema });

  return { db, close: () => pool.end() };
}
