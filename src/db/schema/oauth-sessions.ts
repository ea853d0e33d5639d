import { bigint, index, jsonb, pgTable, text } from "drizzle-orm/pg-core";

export const oauthSessions = pgTable(
  "oauth_sessions",
  {
    sessionId: text("session_id").primaryKey(),
    providerType: text("provider_type").notNull(),
    data: jsonb("data").notNull(),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    expiresAt: bigint("expires_at", { mode: "number" }).notNull(),
  },
  (table) => [index("idx_oauth_sessions_expires").on(table.expiresAt)],
);
