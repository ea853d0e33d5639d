import type { ProviderType, ProxyConfig } from "../oauth/types.js";

export const accountStatuses = ["created", "active", "error", "disabled"] as const;
export type AccountStatus = (typeof accountStatuses)[number];

export function isAccountStatus(value: string): value is AccountStatus {
  return accountStatuses.some((s) => s === value);
}

/** Circuit breaker state embedded in every account. `isHalfOpen` implies `isBroken`. */
export interface CircuitState {
  isBroken: boolean;
  brokenAt: number | null;
  isHalfOpen: boolean;
  consecutiveFailures: number;
  probeSuccessCount: number;
  /** Epoch ms after which a Broken circuit may be probed. Only meaningful while broken. */
  backoffRetryTime: number | null;
  /** Broken episodes since the circuit last closed. */
  brokenEpisodes: number;
}

export const CLOSED_CIRCUIT: Readonly<CircuitState> = Object.freeze({
  isBroken: false,
  brokenAt: null,
  isHalfOpen: false,
  consecutiveFailures: 0,
  probeSuccessCount: 0,
  backoffRetryTime: null,
  brokenEpisodes: 0,
});

export type CircuitPhase = "closed" | "broken" | "half-open";

export function circuitPhase(circuit: CircuitState): CircuitPhase {
  if (!circuit.isBroken) return "closed";
  return circuit.isHalfOpen ? "half-open" : "broken";
}

/** Consumed by the router, carried here untouched. */
export interface RateLimits {
  rpm: number | null;
  tpm: number | null;
}

export type AccountMetadata = Record<string, unknown>;

/** A pooled upstream credential. All timestamps are epoch milliseconds. */
export interface Account {
  id: string;
  name: string;
  description: string;
  providerType: ProviderType;
  status: AccountStatus;
  /** 0–100. */
  healthScore: number;
  encryptedAccessToken: string;
  encryptedRefreshToken: string | null;
  encryptedIdToken: string | null;
  tokenExpiresAt: number | null;
  organizations: string[];
  proxy: ProxyConfig | null;
  rateLimits: RateLimits;
  circuit: CircuitState;
  metadata: AccountMetadata;
  /** Optimistic-concurrency token; bumped by every successful update. */
  version: number;
  lastRefreshAttemptAt: number | null;
  lastRefreshedAt: number | null;
  lastValidatedAt: number | null;
  lastError: string | null;
  lastErrorAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export type NewAccount = Omit<Account, "id" | "version" | "createdAt" | "updatedAt">;

export interface AccountFilter {
  status?: AccountStatus[];
  providerTypes?: ProviderType[];
  /** Only accounts with a known tokenExpiresAt strictly before this instant. */
  expiresBefore?: number;
  circuit?: CircuitPhase;
  /** Only broken circuits whose backoffRetryTime is at or before this instant. */
  backoffDueBy?: number;
  /** 1-based. */
  page?: number;
  pageSize?: number;
}

export interface AccountPage {
  accounts: Account[];
  total: number;
}

export const DEFAULT_PAGE_SIZE = 100;
