import { parseEncryptionKey } from "./security/encryption.js";

/**
 * Startup environment variable validation.
 *
 * Throws on missing critical vars. Warns on missing recommended vars.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  if (!process.env.DATABASE_URL) {
    errors.push("DATABASE_URL is required but not set");
  }

  const encryptionKey = process.env.TOKEN_ENCRYPTION_KEY;
  if (!encryptionKey) {
    errors.push("TOKEN_ENCRYPTION_KEY is required but not set");
  } else {
    try {
      parseEncryptionKey(encryptionKey);
    } catch (err) {
      errors.push(`TOKEN_ENCRYPTION_KEY is invalid: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // --- Recommended (authorization URLs will be rejected upstream without these) ---

  const missingClients = ["CLAUDE_OAUTH_CLIENT_ID", "CODEX_OAUTH_CLIENT_ID"].filter((v) => !process.env[v]);
  if (missingClients.length > 0) {
    warnings.push(`Missing OAuth client ids: ${missingClients.join(", ")}. Authorization for these providers will fail.`);
  }

  if (!process.env.SENTRY_DSN) {
    warnings.push("SENTRY_DSN is not set. Scheduled refresh errors will only be logged.");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`[env] WARNING: ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
