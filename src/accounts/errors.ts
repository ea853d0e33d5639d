import type { AccountStatus } from "./repository-types.js";

export class AccountNotFound extends Error {
  readonly code = "ACCOUNT_NOT_FOUND";

  constructor(accountId: string) {
    super(`Account not found: ${accountId}`);
    this.name = "AccountNotFound";
  }
}

/** The stored version moved on between read and write. */
export class ConcurrentUpdateError extends Error {
  readonly code = "CONCURRENT_UPDATE";

  constructor(accountId: string, expectedVersion: number) {
    super(`Account ${accountId} was modified concurrently (expected version ${expectedVersion})`);
    this.name = "ConcurrentUpdateError";
  }
}

/** Upstream rejected the refresh token outright. Terminal: the circuit breaks. */
export class RefreshTokenInvalid extends Error {
  readonly code = "REFRESH_TOKEN_INVALID";
  readonly accountId: string;

  constructor(accountId: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Refresh token rejected for account ${accountId}${reason}`, options);
    this.name = "RefreshTokenInvalid";
    this.accountId = accountId;
  }
}

/** Every retry of a transient refresh failure was used up. */
export class RefreshTransientFailure extends Error {
  readonly code = "REFRESH_TRANSIENT_FAILURE";
  readonly accountId: string;
  readonly attempts: number;

  constructor(accountId: string, attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Refresh failed for account ${accountId} after ${attempts} attempts${reason}`, options);
    this.name = "RefreshTransientFailure";
    this.accountId = accountId;
    this.attempts = attempts;
  }
}

export type CircuitRejectionReason = "disabled" | "broken" | "probe-in-flight";

/** Operation attempted on a Broken or Disabled account outside its probe window. */
export class CircuitOpenRejection extends Error {
  readonly code = "CIRCUIT_OPEN";
  readonly accountId: string;
  readonly reason: CircuitRejectionReason;
  /** When a probe will next be allowed, for `broken`. */
  readonly retryAt: number | null;

  constructor(accountId: string, reason: CircuitRejectionReason, retryAt: number | null = null) {
    super(`Account ${accountId} is not available (${reason})`);
    this.name = "CircuitOpenRejection";
    this.accountId = accountId;
    this.reason = reason;
    this.retryAt = retryAt;
  }
}

/** API-key accounts and accounts without a stored refresh token. */
export class ProviderNotRefreshable extends Error {
  readonly code = "PROVIDER_NOT_REFRESHABLE";

  constructor(accountId: string, reason: string) {
    super(`Account ${accountId} cannot be refreshed: ${reason}`);
    this.name = "ProviderNotRefreshable";
  }
}

/** Disabled is terminal: no automatic transition leaves it. */
export class AccountDisabledError extends Error {
  readonly code = "ACCOUNT_DISABLED";

  constructor(accountId: string, status: AccountStatus) {
    super(`Account ${accountId} is ${status}; use a forced reset to re-enable it`);
    this.name = "AccountDisabledError";
  }
}
