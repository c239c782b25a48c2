import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../../shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export function createDbPool(connectionString: string): pg.Pool {
  return new pg.Pool({ connectionString });
}

export function createDb(pool: pg.Pool): Database {
  return drizzle(pool, { schema });
}

export async function pingDb(pool: pg.Pool): Promise<boolean> {
  try {
    const result = await pool.query("SELECT 1");
    return (result.rowCount ?? 0) > 0;
  } catch {
    return false;
  }
}
