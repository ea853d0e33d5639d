import type { IAccountRepository } from "./accounts/account-repository.js";
import { HealthMonitor } from "./accounts/circuit-breaker.js";
import { AccountProvisioner } from "./accounts/provisioning.js";
import { RefreshScheduler } from "./accounts/refresh-scheduler.js";
import { TokenRefresher } from "./accounts/token-refresh.js";
import type { Config } from "./config/index.js";
import { type CircuitEventSink, LoggingCircuitEventSink } from "./observability/circuit-events.js";
import { type FetchFn, TokenEndpointClient } from "./oauth/http.js";
import { createDefaultRegistry, ProviderRegistry } from "./oauth/provider-registry.js";
import { ProxyDispatcherPool } from "./oauth/proxy.js";
import { OAuthSessionManager } from "./oauth/session-manager.js";
import type { ISessionStore } from "./oauth/session-store.js";
import type { ProviderCapability } from "./oauth/types.js";
import { TokenCipher } from "./security/encryption.js";

export interface CredentialLifecycleDeps {
  accounts: IAccountRepository;
  sessions: ISessionStore;
  events?: CircuitEventSink;
  /** Replaces the built-in providers. */
  providers?: ProviderCapability[];
  fetchFn?: FetchFn;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface CredentialLifecycle {
  cipher: TokenCipher;
  registry: ProviderRegistry;
  sessions: OAuthSessionManager;
  provisioner: AccountProvisioner;
  health: HealthMonitor;
  refresher: TokenRefresher;
  scheduler: RefreshScheduler;
  /** Stop the scheduler and release proxy connections. */
  close(): Promise<void>;
}

/** Wire every credential-lifecycle component from explicit collaborators. */
export function createCredentialLifecycle(config: Config, deps: CredentialLifecycleDeps): CredentialLifecycle {
  const cipher = TokenCipher.fromConfig(config.encryptionKey);
  const dispatchers = new ProxyDispatcherPool();
  const http = new TokenEndpointClient({
    timeoutMs: config.refresh.requestTimeoutMs,
    fetchFn: deps.fetchFn,
    dispatchers,
  });

  const registry = deps.providers
    ? deps.providers.reduce((r, p) => r.register(p), new ProviderRegistry())
    : createDefaultRegistry(config.providers, http);

  const health = new HealthMonitor({
    accounts: deps.accounts,
    registry,
    cipher,
    policy: config.health,
    events: deps.events ?? new LoggingCircuitEventSink(),
    now: deps.now,
  });
  const sessions = new OAuthSessionManager({
    registry,
    sessions: deps.sessions,
    ttlMs: config.sessionTtlMs,
    now: deps.now,
  });
  const provisioner = new AccountProvisioner({
    sessions,
    registry,
    cipher,
    accounts: deps.accounts,
    health,
    now: deps.now,
  });
  const refresher = new TokenRefresher({
    accounts: deps.accounts,
    registry,
    cipher,
    health,
    policy: config.refresh,
    now: deps.now,
    sleep: deps.sleep,
  });
  const scheduler = new RefreshScheduler(refresher, health, registry, config.refresh);

  return {
    cipher,
    registry,
    sessions,
    provisioner,
    health,
    refresher,
    scheduler,
    async close() {
      await scheduler.stop();
      await http.close();
    },
  };
}
