import { logger } from "../config/logger.js";
import { SessionExpired, SessionNotFound, SessionPersistError } from "./errors.js";
import { generatePkcePair, generateSessionId, generateStateNonce } from "./pkce.js";
import type { ProviderRegistry } from "./provider-registry.js";
import { parseProxyUrl } from "./proxy.js";
import type { ISessionStore, OAuthSession } from "./session-store.js";
import type { ProxyConfig } from "./types.js";

export interface BeginAuthorizationInput {
  providerType: string;
  proxy?: ProxyConfig | null;
  redirectUri?: string;
  scopes?: string[];
  metadata?: Record<string, unknown>;
}

export interface AuthorizationStart {
  authUrl: string;
  sessionId: string;
  state: string;
  expiresAt: number;
}

export interface OAuthSessionManagerDeps {
  registry: ProviderRegistry;
  sessions: ISessionStore;
  ttlMs: number;
  now?: () => number;
}

/** Creates and consumes single-use PKCE authorization sessions. */
export class OAuthSessionManager {
  private readonly registry: ProviderRegistry;
  private readonly sessions: ISessionStore;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(deps: OAuthSessionManagerDeps) {
    this.registry = deps.registry;
    this.sessions = deps.sessions;
    this.ttlMs = deps.ttlMs;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Generate a verifier/challenge pair and state nonce, persist the session,
   * then build the provider's authorization URL. No URL is returned unless the
   * session was stored.
   */
  async beginAuthorization(input: BeginAuthorizationInput): Promise<AuthorizationStart> {
    const provider = this.registry.get(input.providerType);
    const proxy = input.proxy ?? null;
    if (proxy) parseProxyUrl(proxy.url);

    const { codeVerifier, codeChallenge } = generatePkcePair();
    const state = generateStateNonce();
    const sessionId = generateSessionId();
    const redirectUri = input.redirectUri ?? provider.defaultRedirectUri;
    const scopes = input.scopes && input.scopes.length > 0 ? input.scopes : [...provider.defaultScopes];
    const createdAt = this.now();

    const session: OAuthSession = {
      sessionId,
      providerType: provider.providerType,
      codeVerifier,
      codeChallenge,
      state,
      proxy,
      redirectUri,
      scopes,
      metadata: input.metadata ?? {},
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    };

    try {
      await this.sessions.set(sessionId, session, this.ttlMs);
    } catch (err) {
      logger.error("Failed to persist OAuth session", {
        providerType: provider.providerType,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new SessionPersistError({ cause: err });
    }

    const authUrl = provider.buildAuthUrl({ codeChallenge, state, redirectUri, scopes });
    logger.info("OAuth authorization started", { providerType: provider.providerType, expiresAt: session.expiresAt });
    return { authUrl, sessionId, state, expiresAt: session.expiresAt };
  }

  /** Atomically remove and return a session. A second call for the same id fails. */
  async consumeSession(sessionId: string): Promise<OAuthSession> {
    const session = await this.sessions.take(sessionId);
    if (!session) throw new SessionNotFound(sessionId);
    if (this.now() >= session.expiresAt) throw new SessionExpired(sessionId, session.expiresAt);
    return session;
  }
}
