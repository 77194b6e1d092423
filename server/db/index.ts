import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../../shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export function createDbPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

export function createDatabase(pool: Pool): Database {
  return drizzle(pool, { schema });
}

export async function pingDb(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query("SELECT 1");
    return (result.rowCount ?? 0) > 0;
  } catch {
    return false;
  }
}
