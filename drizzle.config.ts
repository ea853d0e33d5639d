/**
 * Drizzle-kit generates migrations from schema diffs. After changing src/db/schema/,
 * run `npm run db:generate` and review the generated SQL before committing.
 *
 * Every migration MUST be backward-compatible with the PREVIOUS release's code:
 * the refresh scheduler of the old release keeps running while the new one rolls out.
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: ["./src/db/schema/oauth-accounts.ts", "./src/db/schema/oauth-sessions.ts"],
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: { url: process.env.DATABASE_URL || "postgres://localhost:5432/relay" },
});
