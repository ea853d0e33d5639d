import type { HealthConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { type CircuitEvent, type CircuitEventSink, emitCircuitEvent } from "../observability/circuit-events.js";
import type { ProviderRegistry } from "../oauth/provider-registry.js";
import { isOAuthProviderType } from "../oauth/types.js";
import type { TokenCipher } from "../security/encryption.js";
import { DecryptionFailure } from "../security/errors.js";
import type { IAccountRepository } from "./account-repository.js";
import { mutateAccount } from "./account-mutation.js";
import { AccountDisabledError, AccountNotFound, CircuitOpenRejection } from "./errors.js";
import {
  applyFailure,
  applySuccess,
  isServeable,
  promoteIfDue,
  resetCircuit,
  type Transition,
} from "./health-state-machine.js";
import type { Account } from "./repository-types.js";

export interface HealthMonitorDeps {
  accounts: IAccountRepository;
  registry: ProviderRegistry;
  cipher: TokenCipher;
  policy: HealthConfig;
  events: CircuitEventSink;
  now?: () => number;
}

/** Permission to run one refresh or validation against an account. */
export interface Admission {
  account: Account;
  /** True when this attempt is the half-open trial probe. */
  probe: boolean;
  release(): void;
}

const PROMOTE_PAGE_SIZE = 100;

/**
 * Per-account health score and circuit breaker. Consumes validation and
 * refresh outcomes, persists transitions through a version-checked write and
 * emits circuit events once the write has landed.
 */
export class HealthMonitor {
  private readonly accounts: IAccountRepository;
  private readonly registry: ProviderRegistry;
  private readonly cipher: TokenCipher;
  private readonly policy: HealthConfig;
  private readonly events: CircuitEventSink;
  private readonly now: () => number;
  /** Accounts with a half-open probe in flight in this process. */
  private readonly probing = new Set<string>();

  constructor(deps: HealthMonitorDeps) {
    this.accounts = deps.accounts;
    this.registry = deps.registry;
    this.cipher = deps.cipher;
    this.policy = deps.policy;
    this.events = deps.events;
    this.now = deps.now ?? Date.now;
  }

  async reportSuccess(accountId: string): Promise<Account> {
    return this.transition(accountId, "success", (current, now) => applySuccess(current, this.policy, now));
  }

  async reportFailure(accountId: string, terminal: boolean, reason: string | null = null): Promise<Account> {
    const label = reason ?? (terminal ? "terminal failure" : "failure");
    return this.transition(accountId, label, (current, now) => {
      const t = applyFailure(current, terminal, reason, this.policy, now);
      return { ...t, account: { ...t.account, lastError: reason ?? t.account.lastError, lastErrorAt: now } };
    });
  }

  /**
   * Gate an attempt on the circuit. Closed accounts always pass; a Broken
   * account whose backoff has elapsed is promoted to HalfOpen and admits
   * exactly one probe at a time. Everything else throws CircuitOpenRejection.
   */
  async admit(accountId: string): Promise<Admission> {
    let account = await this.accounts.get(accountId);
    if (!account) throw new AccountNotFound(accountId);

    if (account.status === "disabled") throw new CircuitOpenRejection(accountId, "disabled");
    if (!account.circuit.isBroken) return { account, probe: false, release: () => undefined };

    if (!account.circuit.isHalfOpen) {
      const promoted = promoteIfDue(account, this.now());
      if (!promoted) {
        throw new CircuitOpenRejection(accountId, "broken", account.circuit.backoffRetryTime);
      }
      account = await mutateAccount(this.accounts, accountId, (current) => promoteIfDue(current, this.now()));
      if (account.status === "disabled") throw new CircuitOpenRejection(accountId, "disabled");
      if (!account.circuit.isBroken) return { account, probe: false, release: () => undefined };
      if (!account.circuit.isHalfOpen) {
        throw new CircuitOpenRejection(accountId, "broken", account.circuit.backoffRetryTime);
      }
      logger.info("Account circuit half-open", { accountId });
    }

    if (this.probing.has(accountId)) throw new CircuitOpenRejection(accountId, "probe-in-flight");
    this.probing.add(accountId);
    let released = false;
    return {
      account,
      probe: true,
      release: () => {
        if (released) return;
        released = true;
        this.probing.delete(accountId);
      },
    };
  }

  /**
   * Run the provider's advisory token check for an account and feed the
   * outcome into the circuit. Created accounts become Active on the first
   * passing check. Validation failures never mark the failure terminal.
   */
  async validateAccount(accountId: string, opts: { signal?: AbortSignal } = {}): Promise<Account> {
    const admission = await this.admit(accountId);
    try {
      const { account } = admission;
      if (!isOAuthProviderType(account.providerType)) {
        return this.reportSuccess(accountId);
      }
      const provider = this.registry.get(account.providerType);
      let accessToken: string;
      let idToken: string | null;
      try {
        accessToken = this.cipher.decrypt(account.encryptedAccessToken);
        idToken = account.encryptedIdToken ? this.cipher.decrypt(account.encryptedIdToken) : null;
      } catch (err) {
        if (err instanceof DecryptionFailure) {
          const failedAt = this.now();
          await mutateAccount(this.accounts, accountId, (current) => ({
            ...current,
            lastError: err.message,
            lastErrorAt: failedAt,
          }));
          logger.error("Stored access token could not be decrypted", { accountId, code: err.code });
        }
        throw err;
      }
      try {
        await provider.validateToken({ accessToken, idToken }, { proxy: account.proxy, signal: opts.signal });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.warn("Account validation failed", { accountId, providerType: account.providerType, reason });
        return this.reportFailure(accountId, false, reason);
      }
      const validatedAt = this.now();
      await mutateAccount(this.accounts, accountId, (current) => ({ ...current, lastValidatedAt: validatedAt }));
      return this.reportSuccess(accountId);
    } finally {
      admission.release();
    }
  }

  /** Move every Broken account whose backoff has elapsed to HalfOpen. */
  async promoteDueAccounts(): Promise<number> {
    const now = this.now();
    const ids: string[] = [];
    for (let page = 1; ; page++) {
      const { accounts } = await this.accounts.list({
        circuit: "broken",
        status: ["error"],
        backoffDueBy: now,
        page,
        pageSize: PROMOTE_PAGE_SIZE,
      });
      ids.push(...accounts.map((a) => a.id));
      if (accounts.length < PROMOTE_PAGE_SIZE) break;
    }

    let promoted = 0;
    for (const id of ids) {
      const account = await mutateAccount(this.accounts, id, (current) => promoteIfDue(current, now));
      if (account.circuit.isHalfOpen) {
        promoted++;
        logger.info("Account circuit half-open", { accountId: id });
      }
    }
    return promoted;
  }

  checkServeable(account: Account): boolean {
    return isServeable(account);
  }

  assertServeable(account: Account): void {
    if (isServeable(account)) return;
    if (account.status === "disabled") throw new CircuitOpenRejection(account.id, "disabled");
    throw new CircuitOpenRejection(account.id, "broken", account.circuit.backoffRetryTime);
  }

  /**
   * Administrative reset to Closed/Active. Disabled accounts need `force`.
   * The reset is recorded against `operatorId`.
   */
  async resetHealth(accountId: string, opts: { operatorId?: string; force?: boolean } = {}): Promise<Account> {
    const before: { score: number } = { score: 0 };
    const account = await mutateAccount(this.accounts, accountId, (current) => {
      if (current.status === "disabled" && !opts.force) {
        throw new AccountDisabledError(accountId, current.status);
      }
      before.score = current.healthScore;
      return resetCircuit(current);
    });
    this.probing.delete(accountId);
    const forced = opts.force === true;
    logger.info("Account health reset", { accountId, operatorId: opts.operatorId ?? null, forced });
    emitCircuitEvent(this.events, {
      type: "health_score_reset",
      accountId,
      name: account.name,
      operatorId: opts.operatorId ?? null,
      oldScore: before.score,
      forced,
      resetAt: this.now(),
    });
    return account;
  }

  private async transition(
    accountId: string,
    reason: string,
    step: (current: Account, now: number) => Transition,
  ): Promise<Account> {
    const outcome: { event: CircuitEvent | null; oldScore: number; at: number } = {
      event: null,
      oldScore: 0,
      at: 0,
    };
    const account = await mutateAccount(this.accounts, accountId, (current) => {
      const now = this.now();
      const t = step(current, now);
      outcome.event = t.event;
      outcome.oldScore = current.healthScore;
      outcome.at = now;
      return t.account;
    });
    if (account.healthScore !== outcome.oldScore) {
      emitCircuitEvent(this.events, {
        type: "health_score_changed",
        accountId,
        name: account.name,
        oldScore: outcome.oldScore,
        newScore: account.healthScore,
        reason,
        changedAt: outcome.at,
      });
    }
    if (outcome.event) emitCircuitEvent(this.events, outcome.event);
    return account;
  }
}
