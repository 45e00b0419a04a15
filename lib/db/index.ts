import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as schemas from "@/db/schema";
import { getDatabaseUrl } from "@/config/scheduler";

export type Db = NodePgDatabase<typeof schemas>;

// Lazy initialization - no top-level env access
let pool: Pool | null = null;
let dbInstance: Db | null = null;

/**
 * Get database connection pool (lazy initialization)
 * Throws error if DATABASE_URL is not set
 */
function getPool(): Pool {
  if (pool) return pool;

  const databaseUrl = getDatabaseUrl();

  if (!databaseUrl) {
    console.error('DATABASE_URL is not set', {
      cwd: process.cwd(),
      nodeEnv: process.env.NODE_ENV,
    });
    throw new Error(
      "DATABASE_URL is not set. Unset stores fall back to files; the database store needs a connection string."
    );
  }

  pool = new Pool({
    connectionString: databaseUrl,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    max: 10,
  });

  pool.on("error", (err) => {
    console.error("Unexpected error on idle client", err);
    // Keep the process alive; the pool replaces broken clients.
  });

  return pool;
}

/**
 * Get Drizzle database instance (lazy initialization)
 * All database access must go through this function
 */
export function getDb(): Db {
  if (dbInstance) return dbInstance;

  dbInstance = drizzle(getPool(), {
    schema: schemas,
  });

  return dbInstance;
}
