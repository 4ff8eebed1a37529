import pg from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
}

export function createDatabase(connectionString: string, max = 5): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString,
    max,
  });

  return { db: drizzle(pool, { schema }), pool };
}
