import { Pool, neonConfig } from "@neondatabase/serverless";
import { drizzle, type NeonDatabase } from "drizzle-orm/neon-serverless";
import ws from "ws";
import * as schema from "../shared/schema";
import { sql } from "drizzle-orm";
import { logger } from "./logger";

// Configure Neon to use WebSocket in Node
neonConfig.webSocketConstructor = ws;

export type Database = NeonDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString });
  const db = drizzle({ client: pool, schema });
  return { pool, db };
}

/**
 * Logs the connected database identity with the password redacted.
 * A failed probe is logged and does not stop startup.
 */
export async function probeDatabase(handle: DatabaseHandle, connectionString: string): Promise<boolean> {
  try {
    await handle.db.execute(sql`SELECT 1`);

    try {
      const url = new URL(connectionString);
      const dbName = url.pathname.replace(/^\//, '') || 'unknown';
      logger.info('[DB] Connected', { host: url.hostname || 'unknown', database: dbName, user: url.username });
    } catch (urlError) {
      logger.info('[DB] Connected (unable to parse DATABASE_URL for logging)');
    }
    return true;
  } catch (error) {
    logger.error('[DB] Connection probe failed', { error });
    return false;
  }
}

export async function closeDatabase(handle: DatabaseHandle): Promise<void> {
  await handle.pool.end();
}
