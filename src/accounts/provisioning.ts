import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import { parseAuthorizationCode } from "../oauth/code-parser.js";
import { IncompleteTokenResponse, OAuthHttpError, StateMismatch, TokenExchangeFailed } from "../oauth/errors.js";
import type { ProviderRegistry } from "../oauth/provider-registry.js";
import type { OAuthSessionManager } from "../oauth/session-manager.js";
import type { OAuthTokenSet } from "../oauth/types.js";
import type { TokenCipher } from "../security/encryption.js";
import type { IAccountRepository } from "./account-repository.js";
import type { HealthMonitor } from "./circuit-breaker.js";
import { type AccountStatus, CLOSED_CIRCUIT } from "./repository-types.js";

export interface CompleteAuthorizationInput {
  sessionId: string;
  /** Whatever the user pasted back: callback URL, `code#state` or the bare code. */
  rawCode: string;
  name: string;
  description?: string;
  rpmLimit?: number | null;
  tpmLimit?: number | null;
  metadata?: Record<string, unknown>;
}

export interface ProvisionedAccount {
  accountId: string;
  status: AccountStatus;
  tokenExpiresAt: number;
  healthScore: number;
}

export interface AccountProvisionerDeps {
  sessions: OAuthSessionManager;
  registry: ProviderRegistry;
  cipher: TokenCipher;
  accounts: IAccountRepository;
  health: HealthMonitor;
  now?: () => number;
}

function exchangeFailure(err: unknown): TokenExchangeFailed {
  if (err instanceof OAuthHttpError) {
    return new TokenExchangeFailed(err.status, err.oauthError ?? (err.body || err.message), { cause: err });
  }
  return new TokenExchangeFailed(null, err instanceof Error ? err.message : String(err), { cause: err });
}

function missingFields(tokens: OAuthTokenSet): string[] {
  const missing: string[] = [];
  if (!tokens.accessToken) missing.push("access_token");
  if (!tokens.refreshToken) missing.push("refresh_token");
  return missing;
}

/** Turns a completed OAuth callback into a stored, encrypted account. */
export class AccountProvisioner {
  private readonly deps: AccountProvisionerDeps;
  private readonly now: () => number;

  constructor(deps: AccountProvisionerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Consume the session, exchange the code once (codes are single-use, so
   * there is no retry), store the encrypted tokens and run one validation
   * pass. A failed validation only shows in the returned status and score.
   */
  async completeAuthorization(input: CompleteAuthorizationInput): Promise<ProvisionedAccount> {
    const { sessions, registry, cipher, accounts, health } = this.deps;

    const session = await sessions.consumeSession(input.sessionId);
    const { code, state } = parseAuthorizationCode(input.rawCode);
    if (state !== null && state !== session.state) throw new StateMismatch();

    const provider = registry.get(session.providerType);
    let tokens: OAuthTokenSet;
    try {
      tokens = await provider.exchangeCode(
        { code, codeVerifier: session.codeVerifier, redirectUri: session.redirectUri, state: session.state },
        { proxy: session.proxy },
      );
    } catch (err) {
      const failure = exchangeFailure(err);
      logger.warn("OAuth code exchange failed", {
        providerType: session.providerType,
        status: failure.status,
        error: failure.upstreamMessage,
      });
      throw failure;
    }

    const missing = missingFields(tokens);
    if (missing.length > 0 || !tokens.refreshToken) throw new IncompleteTokenResponse(missing);

    const tokenExpiresAt = this.now() + tokens.expiresInSeconds * 1000;
    const account = await accounts.create({
      name: input.name,
      description: input.description ?? "",
      providerType: session.providerType,
      status: "created",
      healthScore: 100,
      encryptedAccessToken: cipher.encrypt(tokens.accessToken),
      encryptedRefreshToken: cipher.encrypt(tokens.refreshToken),
      encryptedIdToken: tokens.idToken ? cipher.encrypt(tokens.idToken) : null,
      tokenExpiresAt,
      organizations: tokens.organizations,
      proxy: session.proxy,
      rateLimits: { rpm: input.rpmLimit ?? null, tpm: input.tpmLimit ?? null },
      circuit: { ...CLOSED_CIRCUIT },
      metadata: {
        ...session.metadata,
        ...input.metadata,
        ...(tokens.upstreamAccountId ? { upstreamAccountId: tokens.upstreamAccountId } : {}),
        scopes: tokens.scope,
      },
      lastRefreshAttemptAt: null,
      lastRefreshedAt: null,
      lastValidatedAt: null,
      lastError: null,
      lastErrorAt: null,
    });
    logger.info("OAuth account provisioned", { accountId: account.id, providerType: account.providerType });

    let { status, healthScore } = account;
    try {
      ({ status, healthScore } = await health.validateAccount(account.id));
    } catch (err) {
      logger.error("Post-provisioning validation failed", {
        accountId: account.id,
        error: err instanceof Error ? err.message : String(err),
      });
      captureError(err, { accountId: account.id, providerType: account.providerType, job: "provision" });
    }

    return { accountId: account.id, status, tokenExpiresAt, healthScore };
  }
}
