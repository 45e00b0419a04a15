import { existsSync, readFileSync, readdirSync } from "fs";
import { resolve } from "path";
import { Pool, type PoolConfig } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";

const PLANNER_TABLES = ["plan_tasks", "plan_closed_slots", "plan_settings", "schedule_runs"];

function stripQuotes(value: string): string {
  if (
    (value.startsWith("\"") && value.endsWith("\"")) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

function loadDatabaseUrl(): string {
  let databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    const envPath = resolve(process.cwd(), ".env.local");
    if (existsSync(envPath)) {
      const match = readFileSync(envPath, "utf8").match(/^DATABASE_URL=(.+)$/m);
      if (match?.[1]) {
        databaseUrl = stripQuotes(match[1].trim());
        process.env.DATABASE_URL = databaseUrl;
      }
    }
  }

  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set in env or .env.local");
  }

  return databaseUrl;
}

/**
 * SSL follows the connection string's sslmode; no sslmode means no SSL.
 */
function resolveSsl(databaseUrl: string): PoolConfig["ssl"] | undefined {
  let sslMode: string | null = null;

  try {
    sslMode = new URL(databaseUrl).searchParams.get("sslmode");
  } catch (error) {
    console.warn("Could not parse DATABASE_URL; connecting without SSL", {
      message: error instanceof Error ? error.message : String(error),
    });
  }

  if (!sslMode || sslMode === "disable") {
    return undefined;
  }

  return { rejectUnauthorized: sslMode === "verify-full" };
}

function assertMigrationsFolder(migrationsFolder: string): void {
  if (!existsSync(migrationsFolder)) {
    throw new Error(`Migrations folder not found: ${migrationsFolder}. Run npm run db:generate first.`);
  }

  const hasSql = readdirSync(migrationsFolder).some((file) =>
    file.toLowerCase().endsWith(".sql")
  );

  if (!hasSql) {
    throw new Error(`No SQL migrations found in: ${migrationsFolder}`);
  }
}

async function reportTables(pool: Pool): Promise<void> {
  const result = await pool.query<{ tablename: string }>(
    `SELECT tablename FROM pg_tables WHERE schemaname = 'public' AND tablename = ANY($1)`,
    [PLANNER_TABLES]
  );
  const present = new Set(result.rows.map((row) => row.tablename));

  console.log("table\tpresent");
  for (const table of PLANNER_TABLES) {
    console.log(`${table}\t${present.has(table) ? "yes" : "no"}`);
  }
}

async function main(): Promise<void> {
  const databaseUrl = loadDatabaseUrl();
  const migrationsFolder = resolve(process.cwd(), "db", "migrations");
  const tablesOnly = process.argv.includes("--tables-only");

  if (!tablesOnly) {
    assertMigrationsFolder(migrationsFolder);
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: resolveSsl(databaseUrl),
    connectionTimeoutMillis: 10000,
    max: 2,
  });

  try {
    if (!tablesOnly) {
      await migrate(drizzle(pool), { migrationsFolder });
      console.info("Migrations applied", { migrationsFolder });
    }

    await reportTables(pool);
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error("Migration failed:", error);
  process.exitCode = 1;
});
