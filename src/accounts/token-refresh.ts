import type { RefreshConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { classifyRefreshFailure, OperationCancelled } from "../oauth/errors.js";
import type { ProviderRegistry } from "../oauth/provider-registry.js";
import { isOAuthProviderType, type OAuthProviderType, type OAuthTokenSet } from "../oauth/types.js";
import type { TokenCipher } from "../security/encryption.js";
import { DecryptionFailure } from "../security/errors.js";
import type { IAccountRepository } from "./account-repository.js";
import { mutateAccount } from "./account-mutation.js";
import type { HealthMonitor } from "./circuit-breaker.js";
import {
  AccountNotFound,
  ConcurrentUpdateError,
  ProviderNotRefreshable,
  RefreshTokenInvalid,
  RefreshTransientFailure,
} from "./errors.js";
import type { Account, AccountFilter } from "./repository-types.js";
import { withRetry } from "./retry.js";
import { runWithConcurrency } from "./worker-pool.js";

export interface TokenRefresherDeps {
  accounts: IAccountRepository;
  registry: ProviderRegistry;
  cipher: TokenCipher;
  health: HealthMonitor;
  policy: RefreshConfig;
  now?: () => number;
  /** Test hook for the retry backoff. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RefreshSummary {
  total: number;
  succeeded: number;
  failed: number;
}

export interface RefreshOptions {
  signal?: AbortSignal;
}

export interface RefreshExpiringOptions extends RefreshOptions {
  /** Defaults to every OAuth provider in the registry. */
  providerTypes?: OAuthProviderType[];
}

const LIST_PAGE_SIZE = 100;
const CLAIM_ATTEMPTS = 3;

/** One upstream refresh shared by every in-process caller for the account. */
interface SharedRefresh {
  promise: Promise<Account>;
  controller: AbortController;
  /** Joined callers with a signal that has not fired yet. */
  waiters: number;
  /** Set once a caller without a signal joins: the run can no longer be cancelled. */
  pinned: boolean;
}

type Claim = { claimed: true; account: Account } | { claimed: false; account: Account };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TokenRefresher {
  private readonly accounts: IAccountRepository;
  private readonly registry: ProviderRegistry;
  private readonly cipher: TokenCipher;
  private readonly health: HealthMonitor;
  private readonly policy: RefreshConfig;
  private readonly now: () => number;
  private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly inFlight = new Map<string, SharedRefresh>();

  constructor(deps: TokenRefresherDeps) {
    this.accounts = deps.accounts;
    this.registry = deps.registry;
    this.cipher = deps.cipher;
    this.health = deps.health;
    this.policy = deps.policy;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep;
  }

  /**
   * Refresh one account's tokens. Concurrent calls for the same account share
   * a single upstream exchange. Each caller's signal only cancels its own
   * wait; the shared exchange is aborted once every caller has given up.
   */
  refreshOne(accountId: string, opts: RefreshOptions = {}): Promise<Account> {
    const existing = this.inFlight.get(accountId);
    if (existing && !existing.controller.signal.aborted) return this.join(existing, opts.signal);

    const controller = new AbortController();
    const shared: SharedRefresh = {
      promise: this.doRefresh(accountId, controller.signal),
      controller,
      waiters: 0,
      pinned: false,
    };
    shared.promise = shared.promise.finally(() => {
      if (this.inFlight.get(accountId) === shared) this.inFlight.delete(accountId);
    });
    this.inFlight.set(accountId, shared);
    return this.join(shared, opts.signal);
  }

  private join(shared: SharedRefresh, signal?: AbortSignal): Promise<Account> {
    if (!signal) {
      shared.pinned = true;
      return shared.promise;
    }
    shared.waiters++;
    return new Promise<Account>((resolve, reject) => {
      const onAbort = () => {
        shared.waiters--;
        if (shared.waiters === 0 && !shared.pinned) shared.controller.abort(signal.reason);
        reject(new OperationCancelled({ cause: signal.reason }));
      };
      shared.promise.then(
        (account) => {
          signal.removeEventListener("abort", onAbort);
          resolve(account);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Refresh every Active or Created account with a closed circuit whose token
   * expires within `lookaheadMs`. Per-account failures are counted, never thrown.
   */
  async refreshExpiring(lookaheadMs: number, opts: RefreshExpiringOptions = {}): Promise<RefreshSummary> {
    const providerTypes = opts.providerTypes ?? this.registry.list().map((p) => p.providerType);
    if (providerTypes.length === 0) return { total: 0, succeeded: 0, failed: 0 };

    const ids = await this.collectIds({
      status: ["active", "created"],
      providerTypes,
      expiresBefore: this.now() + lookaheadMs,
      circuit: "closed",
    });
    return this.runBatch("refresh", ids, (id) => this.refreshOne(id, { signal: opts.signal }), opts.signal);
  }

  /** Give every HalfOpen account its trial: a refresh, or a validation where no refresh is possible. */
  async probeHalfOpen(opts: RefreshOptions = {}): Promise<RefreshSummary> {
    const candidates: Account[] = [];
    for (let page = 1; ; page++) {
      const { accounts } = await this.accounts.list({ circuit: "half-open", page, pageSize: LIST_PAGE_SIZE });
      candidates.push(...accounts.filter((a) => a.status !== "disabled"));
      if (accounts.length < LIST_PAGE_SIZE) break;
    }
    return this.runBatch(
      "probe",
      candidates.map((a) => a.id),
      async (id) => {
        const account = candidates.find((a) => a.id === id);
        if (account && this.isRefreshable(account)) return this.refreshOne(id, { signal: opts.signal });
        return this.health.validateAccount(id, { signal: opts.signal });
      },
      opts.signal,
    );
  }

  private isRefreshable(account: Account): boolean {
    return (
      isOAuthProviderType(account.providerType) &&
      this.registry.has(account.providerType) &&
      account.encryptedRefreshToken !== null
    );
  }

  private async collectIds(filter: AccountFilter): Promise<string[]> {
    const ids: string[] = [];
    for (let page = 1; ; page++) {
      const { accounts } = await this.accounts.list({ ...filter, page, pageSize: LIST_PAGE_SIZE });
      ids.push(...accounts.map((a) => a.id));
      if (accounts.length < LIST_PAGE_SIZE) break;
    }
    return ids;
  }

  private async runBatch(
    kind: string,
    ids: string[],
    fn: (id: string) => Promise<Account>,
    signal?: AbortSignal,
  ): Promise<RefreshSummary> {
    if (ids.length === 0) return { total: 0, succeeded: 0, failed: 0 };
    const started = this.now();
    const results = await runWithConcurrency(ids, this.policy.concurrency, fn, signal);

    let succeeded = 0;
    results.forEach((result, i) => {
      if (result.ok) {
        succeeded++;
        return;
      }
      logger.warn(`Account ${kind} failed`, { accountId: ids[i], error: errorMessage(result.error) });
    });
    const summary = { total: ids.length, succeeded, failed: ids.length - succeeded };
    logger.info(`Account ${kind} batch finished`, { ...summary, durationMs: this.now() - started });
    return summary;
  }

  private async doRefresh(accountId: string, signal: AbortSignal): Promise<Account> {
    const account = await this.accounts.get(accountId);
    if (!account) throw new AccountNotFound(accountId);

    const { providerType } = account;
    if (!isOAuthProviderType(providerType)) {
      throw new ProviderNotRefreshable(accountId, `${providerType} uses a static API key`);
    }
    const provider = this.registry.get(providerType);
    if (account.encryptedRefreshToken === null) {
      throw new ProviderNotRefreshable(accountId, "no refresh token stored");
    }

    const admission = await this.health.admit(accountId);
    try {
      const claim = await this.claim(admission.account, this.now());
      if (!claim.claimed) {
        logger.info("Account refresh already claimed by another worker", { accountId, providerType });
        return claim.account;
      }
      const claimed = claim.account;
      const encryptedRefreshToken = claimed.encryptedRefreshToken;
      if (encryptedRefreshToken === null) {
        throw new ProviderNotRefreshable(accountId, "no refresh token stored");
      }

      let refreshToken: string;
      try {
        refreshToken = this.cipher.decrypt(encryptedRefreshToken);
      } catch (err) {
        if (err instanceof DecryptionFailure) {
          const failedAt = this.now();
          await mutateAccount(this.accounts, accountId, (current) => ({
            ...current,
            lastError: err.message,
            lastErrorAt: failedAt,
          }));
          logger.error("Stored refresh token could not be decrypted", { accountId, code: err.code });
        }
        throw err;
      }

      const outcome = await withRetry(
        (attempt) => {
          logger.debug("Refreshing account token", { accountId, providerType, attempt });
          return provider.refreshToken(refreshToken, { proxy: claimed.proxy, signal });
        },
        this.policy,
        {
          signal,
          sleep: this.sleep,
          shouldRetry: (err) => classifyRefreshFailure(err) === "transient",
          onRetry: (err, attempt, delayMs) =>
            logger.warn("Token refresh attempt failed, retrying", {
              accountId,
              providerType,
              attempt,
              delayMs,
              error: errorMessage(err),
            }),
        },
      );

      if (!outcome.ok) {
        const { error } = outcome;
        const kind = classifyRefreshFailure(error);
        if (kind === "cancelled") {
          throw error instanceof OperationCancelled ? error : new OperationCancelled({ cause: error });
        }
        if (kind === "terminal") {
          const latest = await this.accounts.get(accountId);
          if (latest && latest.encryptedRefreshToken !== encryptedRefreshToken) {
            logger.info("Refresh token rotated by another worker, ignoring rejection", { accountId, providerType });
            return latest;
          }
          await this.health.reportFailure(accountId, true, errorMessage(error));
          throw new RefreshTokenInvalid(accountId, { cause: error });
        }
        await this.health.reportFailure(accountId, false, errorMessage(error));
        throw new RefreshTransientFailure(accountId, outcome.attempts, { cause: error });
      }

      await this.persistTokens(accountId, outcome.value);
      logger.info("Account token refreshed", { accountId, providerType, attempts: outcome.attempts });
      return await this.health.reportSuccess(accountId);
    } finally {
      admission.release();
    }
  }

  /**
   * Stamp `lastRefreshAttemptAt` with a single version-checked write, never a
   * re-applied one. When the write loses to another refresher's stamp or token
   * rotation, the claim fails and the caller must not contact upstream.
   */
  private async claim(account: Account, attemptAt: number): Promise<Claim> {
    let current = account;
    for (let attempt = 1; attempt <= CLAIM_ATTEMPTS; attempt++) {
      try {
        return { claimed: true, account: await this.accounts.update({ ...current, lastRefreshAttemptAt: attemptAt }) };
      } catch (err) {
        if (!(err instanceof ConcurrentUpdateError)) throw err;
        const fresh = await this.accounts.get(account.id);
        if (!fresh) throw new AccountNotFound(account.id);
        if (
          fresh.lastRefreshAttemptAt !== current.lastRefreshAttemptAt ||
          fresh.encryptedRefreshToken !== current.encryptedRefreshToken
        ) {
          return { claimed: false, account: fresh };
        }
        current = fresh;
      }
    }
    throw new ConcurrentUpdateError(account.id, current.version);
  }

  private async persistTokens(accountId: string, tokens: OAuthTokenSet): Promise<void> {
    const encryptedAccessToken = this.cipher.encrypt(tokens.accessToken);
    const encryptedRefreshToken = tokens.refreshToken ? this.cipher.encrypt(tokens.refreshToken) : null;
    const encryptedIdToken = tokens.idToken ? this.cipher.encrypt(tokens.idToken) : null;
    const refreshedAt = this.now();

    await mutateAccount(this.accounts, accountId, (current) => ({
      ...current,
      encryptedAccessToken,
      encryptedRefreshToken: encryptedRefreshToken ?? current.encryptedRefreshToken,
      encryptedIdToken: encryptedIdToken ?? current.encryptedIdToken,
      tokenExpiresAt: refreshedAt + tokens.expiresInSeconds * 1000,
      organizations: tokens.organizations.length > 0 ? tokens.organizations : current.organizations,
      lastRefreshedAt: refreshedAt,
      lastError: null,
      lastErrorAt: null,
    }));
  }
}
