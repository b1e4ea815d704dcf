import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { env } from "../config/env.ts";
import * as schema from "./schema/index.ts";

/** Drizzle database handle over the SmartCrowd schema */
export type Database = NodePgDatabase<typeof schema>;

export interface DbHandle {
  db: Database;
  /** Drain the pool; call once when a job or CLI run finishes */
  close: () => Promise<void>;
}

/**
 * Create a pg Pool-backed Drizzle instance. The pool connects lazily, so
 * creating a handle never touches the network by itself.
 */
export function createDb(connectionString: string = env.DATABASE_URL): DbHandle {
  if (!connectionString) {
    throw new Error("DATABASE_URL is not configured");
  }
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return {
    db,
    close: () => pool.end(),
  };
}
