import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import { env } from "../config/env.ts";
import * as schema from "./schema/index.ts";

const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
});

/** Drizzle ORM database instance over a node-postgres pool */
export const db = drizzle(pool, { schema });

/** Close the pool so one-shot scripts can exit */
export async function closeDb(): Promise<void> {
  await pool.end();
}
