// ═════════════════════════════════════════════════════════════════════════════
// DATABASE — Database connection initialization and health checks
// ═════════════════════════════════════════════════════════════════════════════

import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { sql } from "drizzle-orm";
import { DB_CONFIG } from "./config";

/**
 * Initialize the database connection pool.
 * Handles SSL configuration for both local and Render environments.
 * The pool connects lazily, on the first query.
 */
const pool = new Pool({
  host:     DB_CONFIG.host,
  port:     DB_CONFIG.port,
  database: DB_CONFIG.database,
  user:     DB_CONFIG.user,
  password: DB_CONFIG.password,
  ...(DB_CONFIG.ssl ? { ssl: DB_CONFIG.ssl } : {}),
});

export const db = drizzle(pool);

/**
 * Checks connectivity with a trivial query.
 * Call this during application startup to ensure the database is reachable.
 */
export async function checkDB(): Promise<void> {
  try {
    await db.execute(sql`SELECT 1`);
    console.log("[startup] DB connected OK");
  } catch (err) {
    throw new Error(
      `[startup] Database is unreachable. ` +
      `Detail: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Executes an agent-supplied statement inside a READ ONLY transaction.
 */
export async function executeReadOnly(query: string): Promise<Record<string, unknown>[]> {
  return db.transaction(async (tx) => {
    await tx.execute(sql`SET TRANSACTION READ ONLY`);
    const result = await tx.execute(sql.raw(query));
    return result.rows;
  });
}

export async function closeDB(): Promise<void> {
  await pool.end();
}
