export type { IAccountRepository } from "./accounts/account-repository.js";
export { mutateAccount } from "./accounts/account-mutation.js";
export { type Admission, HealthMonitor, type HealthMonitorDeps } from "./accounts/circuit-breaker.js";
export * from "./accounts/errors.js";
export {
  applyFailure,
  applySuccess,
  backoffFor,
  isServeable,
  MAX_HEALTH_SCORE,
  promoteIfDue,
  resetCircuit,
  type Transition,
} from "./accounts/health-state-machine.js";
export {
  AccountProvisioner,
  type CompleteAuthorizationInput,
  type ProvisionedAccount,
} from "./accounts/provisioning.js";
export { type Cadence, type CycleResult, RefreshScheduler } from "./accounts/refresh-scheduler.js";
export * from "./accounts/repository-types.js";
export {
  type RefreshExpiringOptions,
  type RefreshOptions,
  type RefreshSummary,
  TokenRefresher,
} from "./accounts/token-refresh.js";
export { type Config, loadConfig } from "./config/index.js";
export { createDb, createPool, type DrizzleDb } from "./db/index.js";
export { runMigrations } from "./db/migrate.js";
export { DrizzleAccountRepository } from "./infrastructure/persistence/drizzle-account-repository.js";
export { InMemoryAccountRepository } from "./infrastructure/persistence/in-memory-account-repository.js";
export { type CredentialLifecycle, type CredentialLifecycleDeps, createCredentialLifecycle } from "./lifecycle.js";
export * from "./observability/index.js";
export { parseAuthorizationCode, type ParsedCode } from "./oauth/code-parser.js";
export { DrizzleSessionStore } from "./oauth/drizzle-session-store.js";
export * from "./oauth/errors.js";
export { type FetchFn, TokenEndpointClient } from "./oauth/http.js";
export { LruSessionStore } from "./oauth/lru-session-store.js";
export { computeCodeChallenge, generatePkcePair } from "./oauth/pkce.js";
export { createDefaultRegistry, ProviderRegistry } from "./oauth/provider-registry.js";
export { ClaudeProvider } from "./oauth/providers/claude.js";
export { CodexProvider } from "./oauth/providers/codex.js";
export { type AuthorizationStart, type BeginAuthorizationInput, OAuthSessionManager } from "./oauth/session-manager.js";
export type { ISessionStore, OAuthSession } from "./oauth/session-store.js";
export * from "./oauth/types.js";
export { generateEncryptionKey, parseEncryptionKey, TokenCipher } from "./security/encryption.js";
export * from "./security/errors.js";
