import pg from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../shared/schema.js";

export type PatrolDatabase = NodePgDatabase<typeof schema>;

export function createDatabase(connectionString: string): { pool: pg.Pool; db: PatrolDatabase } {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return { pool, db };
}
