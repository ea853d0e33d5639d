import { LRUCache } from "lru-cache";
import type { ISessionStore, OAuthSession } from "./session-store.js";

const DEFAULT_MAX_SESSIONS = 10_000;

/** In-process session store. Entries expire by TTL; oldest are evicted past `max`. */
export class LruSessionStore implements ISessionStore {
  private readonly cache: LRUCache<string, OAuthSession>;

  constructor(opts: { max?: number } = {}) {
    this.cache = new LRUCache<string, OAuthSession>({
      max: opts.max ?? DEFAULT_MAX_SESSIONS,
      ttlAutopurge: true,
    });
  }

  async set(key: string, session: OAuthSession, ttlMs: number): Promise<void> {
    this.cache.set(key, session, { ttl: ttlMs });
  }

  async get(key: string): Promise<OAuthSession | null> {
    return this.cache.get(key) ?? null;
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  /** Atomic here: get and delete run in the same synchronous turn. */
  async take(key: string): Promise<OAuthSession | null> {
    const session = this.cache.get(key);
    if (session === undefined) return null;
    this.cache.delete(key);
    return session;
  }

  get size(): number {
    return this.cache.size;
  }
}
