import { z } from "zod";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Parse a comma-separated list of millisecond delays.
 * Example: "1000,2000,4000"
 */
function parseDelayList(raw: string | undefined) {
  if (!raw) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((entry) => {
      const ms = Number.parseInt(entry, 10);
      if (Number.isNaN(ms)) {
        throw new Error(`Invalid REFRESH_BACKOFF_MS entry "${entry}": not a number`);
      }
      return ms;
    });
}

function parseScopes(raw: string | undefined) {
  if (!raw) return undefined;
  return raw.split(/[\s,]+/).filter(Boolean);
}

function providerClientSchema(defaults: {
  authorizeUrl: string;
  tokenUrl: string;
  redirectUri: string;
  scopes: string[];
}) {
  return z.object({
    clientId: z.string().default(""),
    authorizeUrl: z.string().url().default(defaults.authorizeUrl),
    tokenUrl: z.string().url().default(defaults.tokenUrl),
    redirectUri: z.string().url().default(defaults.redirectUri),
    scopes: z.array(z.string().min(1)).min(1).default(defaults.scopes),
  });
}

const claudeClientSchema = providerClientSchema({
  authorizeUrl: "https://claude.ai/oauth/authorize",
  tokenUrl: "https://console.anthropic.com/v1/oauth/token",
  redirectUri: "https://console.anthropic.com/oauth/code/callback",
  scopes: ["org:create_api_key", "user:profile", "user:inference"],
});

const codexClientSchema = providerClientSchema({
  authorizeUrl: "https://auth.openai.com/oauth/authorize",
  tokenUrl: "https://auth.openai.com/oauth/token",
  redirectUri: "http://localhost:1455/auth/callback",
  scopes: ["openid", "profile", "email", "offline_access"],
});

export type ProviderClientConfig = z.infer<typeof claudeClientSchema>;

export const refreshConfigSchema = z.object({
  /** Upstream attempts per refresh, first call included. */
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  /** Delay before each retry; the last entry repeats when attempts outnumber it. */
  backoffMs: z.array(z.coerce.number().int().min(0)).min(1).default([1000, 2000, 4000]),
  /** Per-call timeout for the token endpoint. */
  requestTimeoutMs: z.coerce.number().int().min(1).default(30_000),
  /** Upper bound on a whole batch run. */
  batchTimeoutMs: z.coerce.number().int().min(1).default(30 * MINUTE_MS),
  concurrency: z.coerce.number().int().min(1).max(50).default(5),
  shortIntervalMs: z.coerce.number().int().min(1).default(5 * MINUTE_MS),
  shortLookaheadMs: z.coerce.number().int().min(0).default(5 * MINUTE_MS),
  longIntervalMs: z.coerce.number().int().min(1).default(6 * HOUR_MS),
  longLookaheadMs: z.coerce.number().int().min(0).default(2 * HOUR_MS),
});

export type RefreshConfig = z.infer<typeof refreshConfigSchema>;

export const healthConfigSchema = z.object({
  failurePenalty: z.coerce.number().int().min(0).max(100).default(20),
  successRecovery: z.coerce.number().int().min(0).max(100).default(10),
  failureThreshold: z.coerce.number().int().min(1).default(3),
  probeSuccessThreshold: z.coerce.number().int().min(1).default(1),
  baseBackoffMs: z.coerce.number().int().min(0).default(5 * MINUTE_MS),
  maxBackoffMs: z.coerce.number().int().min(0).default(HOUR_MS),
  /** Broken episodes tolerated before an account is disabled for good. */
  maxBrokenEpisodes: z.coerce.number().int().min(1).default(5),
});

export type HealthConfig = z.infer<typeof healthConfigSchema>;

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  databaseUrl: z.string().default(""),

  /** 32-byte token encryption key, hex (64 chars) or base64. Empty = not configured. */
  encryptionKey: z.string().default(""),

  /** OAuth session lifetime in the ephemeral store. */
  sessionTtlMs: z.coerce.number().int().min(1).default(10 * MINUTE_MS),

  refresh: refreshConfigSchema.default({}),
  health: healthConfigSchema.default({}),

  providers: z
    .object({
      claude: claudeClientSchema.default({}),
      codex: codexClientSchema.default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

function providerFromEnv(env: NodeJS.ProcessEnv, prefix: string) {
  return {
    clientId: env[`${prefix}_OAUTH_CLIENT_ID`],
    authorizeUrl: env[`${prefix}_OAUTH_AUTHORIZE_URL`],
    tokenUrl: env[`${prefix}_OAUTH_TOKEN_URL`],
    redirectUri: env[`${prefix}_OAUTH_REDIRECT_URI`],
    scopes: parseScopes(env[`${prefix}_OAUTH_SCOPES`]),
  };
}

/** Parse configuration from an environment map. Exported so tests can build isolated configs. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL,
    encryptionKey: env.TOKEN_ENCRYPTION_KEY,
    sessionTtlMs: env.OAUTH_SESSION_TTL_MS,
    refresh: {
      maxAttempts: env.REFRESH_MAX_ATTEMPTS,
      backoffMs: parseDelayList(env.REFRESH_BACKOFF_MS),
      requestTimeoutMs: env.REFRESH_REQUEST_TIMEOUT_MS,
      batchTimeoutMs: env.REFRESH_BATCH_TIMEOUT_MS,
      concurrency: env.REFRESH_CONCURRENCY,
      shortIntervalMs: env.REFRESH_SHORT_INTERVAL_MS,
      shortLookaheadMs: env.REFRESH_SHORT_LOOKAHEAD_MS,
      longIntervalMs: env.REFRESH_LONG_INTERVAL_MS,
      longLookaheadMs: env.REFRESH_LONG_LOOKAHEAD_MS,
    },
    health: {
      failurePenalty: env.HEALTH_FAILURE_PENALTY,
      successRecovery: env.HEALTH_SUCCESS_RECOVERY,
      failureThreshold: env.HEALTH_FAILURE_THRESHOLD,
      probeSuccessThreshold: env.HEALTH_PROBE_SUCCESS_THRESHOLD,
      baseBackoffMs: env.HEALTH_BASE_BACKOFF_MS,
      maxBackoffMs: env.HEALTH_MAX_BACKOFF_MS,
      maxBrokenEpisodes: env.HEALTH_MAX_BROKEN_EPISODES,
    },
    providers: {
      claude: providerFromEnv(env, "CLAUDE"),
      codex: providerFromEnv(env, "CODEX"),
    },
  });
}

export const config = loadConfig(process.env);
