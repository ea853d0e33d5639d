import path from "node:path";
import { fileURLToPath } from "node:url";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import type pg from "pg";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// __dirname = <root>/dist/db  OR  <root>/src/db
// migrations = <root>/drizzle/migrations
export const DEFAULT_MIGRATIONS_FOLDER = path.resolve(__dirname, "../../drizzle/migrations");

/**
 * Apply all pending Drizzle migrations listed in the folder's meta/_journal.json.
 * Applied migrations are tracked by drizzle in drizzle.__drizzle_migrations.
 */
export async function runMigrations(pool: pg.Pool, migrationsFolder = DEFAULT_MIGRATIONS_FOLDER): Promise<void> {
  await migrate(drizzle(pool), { migrationsFolder });
}
