import { bigint, boolean, index, integer, jsonb, pgTable, text } from "drizzle-orm/pg-core";

export const oauthAccounts = pgTable(
  "oauth_accounts",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    description: text("description").notNull().default(""),
    providerType: text("provider_type").notNull(),
    status: text("status").notNull().default("created"),
    healthScore: integer("health_score").notNull().default(100),
    encryptedAccessToken: text("encrypted_access_token").notNull(),
    encryptedRefreshToken: text("encrypted_refresh_token"),
    encryptedIdToken: text("encrypted_id_token"),
    tokenExpiresAt: bigint("token_expires_at", { mode: "number" }),
    organizations: jsonb("organizations").$type<string[]>().notNull().default([]),
    proxyUrl: text("proxy_url"),
    rpmLimit: integer("rpm_limit"),
    tpmLimit: integer("tpm_limit"),
    circuitIsBroken: boolean("circuit_is_broken").notNull().default(false),
    circuitBrokenAt: bigint("circuit_broken_at", { mode: "number" }),
    circuitIsHalfOpen: boolean("circuit_is_half_open").notNull().default(false),
    consecutiveFailures: integer("consecutive_failures").notNull().default(0),
    probeSuccessCount: integer("probe_success_count").notNull().default(0),
    backoffRetryAt: bigint("backoff_retry_at", { mode: "number" }),
    brokenEpisodes: integer("broken_episodes").notNull().default(0),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
    version: integer("version").notNull().default(0),
    lastRefreshAttemptAt: bigint("last_refresh_attempt_at", { mode: "number" }),
    lastRefreshedAt: bigint("last_refreshed_at", { mode: "number" }),
    lastValidatedAt: bigint("last_validated_at", { mode: "number" }),
    lastError: text("last_error"),
    lastErrorAt: bigint("last_error_at", { mode: "number" }),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => [
    index("idx_oauth_accounts_status_expiry").on(table.status, table.tokenExpiresAt),
    index("idx_oauth_accounts_provider").on(table.providerType),
    index("idx_oauth_accounts_backoff").on(table.circuitIsBroken, table.backoffRetryAt),
  ],
);
