import { eq, lt } from "drizzle-orm";
import { logger } from "../config/logger.js";
import type { DrizzleDb } from "../db/index.js";
import { oauthSessions } from "../db/schema/index.js";
import { type ISessionStore, type OAuthSession, oauthSessionSchema } from "./session-store.js";

/**
 * Postgres-backed session store for deployments running several relay
 * processes. `take` is a single DELETE … RETURNING, atomic in the database.
 */
export class DrizzleSessionStore implements ISessionStore {
  constructor(
    private readonly db: DrizzleDb,
    private readonly now: () => number = Date.now,
  ) {}

  async set(key: string, session: OAuthSession, ttlMs: number): Promise<void> {
    const createdAt = this.now();
    const expiresAt = createdAt + ttlMs;
    await this.db
      .insert(oauthSessions)
      .values({ sessionId: key, providerType: session.providerType, data: session, createdAt, expiresAt })
      .onConflictDoUpdate({
        target: oauthSessions.sessionId,
        set: { providerType: session.providerType, data: session, createdAt, expiresAt },
      });
  }

  async get(key: string): Promise<OAuthSession | null> {
    const rows = await this.db.select().from(oauthSessions).where(eq(oauthSessions.sessionId, key));
    const row = rows[0];
    if (!row || row.expiresAt <= this.now()) return null;
    return this.toSession(key, row.data);
  }

  async delete(key: string): Promise<void> {
    await this.db.delete(oauthSessions).where(eq(oauthSessions.sessionId, key));
  }

  async take(key: string): Promise<OAuthSession | null> {
    const rows = await this.db
      .delete(oauthSessions)
      .where(eq(oauthSessions.sessionId, key))
      .returning({ data: oauthSessions.data, expiresAt: oauthSessions.expiresAt });
    const row = rows[0];
    if (!row || row.expiresAt <= this.now()) return null;
    return this.toSession(key, row.data);
  }

  async purgeExpired(): Promise<number> {
    const result = await this.db
      .delete(oauthSessions)
      .where(lt(oauthSessions.expiresAt, this.now()))
      .returning({ sessionId: oauthSessions.sessionId });
    return result.length;
  }

  private toSession(key: string, data: unknown): OAuthSession | null {
    const parsed = oauthSessionSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn("Discarding unreadable OAuth session row", { sessionId: key, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }
}
