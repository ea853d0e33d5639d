import { randomBytes } from "node:crypto";
import { type HealthConfig, healthConfigSchema } from "../config/index.js";
import type { CircuitEvent, CircuitEventSink } from "../observability/circuit-events.js";
import type { ProviderCapability } from "../oauth/types.js";
import { TokenCipher } from "../security/encryption.js";

/** A provider capability whose calls all fail unless overridden. */
export function stubCapability(overrides: Partial<ProviderCapability> = {}): ProviderCapability {
  return {
    providerType: "codex-cli",
    shortLivedTokens: false,
    defaultRedirectUri: "http://localhost/cb",
    defaultScopes: ["openid"],
    buildAuthUrl: () => "http://localhost/auth",
    exchangeCode: async () => {
      throw new Error("not used");
    },
    refreshToken: async () => {
      throw new Error("not used");
    },
    validateToken: async () => undefined,
    ...overrides,
  };
}

export function testCipher(): TokenCipher {
  return new TokenCipher(randomBytes(32));
}

export function testHealthPolicy(overrides: Partial<HealthConfig> = {}): HealthConfig {
  return { ...healthConfigSchema.parse({}), ...overrides };
}

/**
 * Collects emitted circuit transitions in order in `events`. Health score
 * audit records go to `audit`.
 */
export class RecordingEventSink implements CircuitEventSink {
  readonly events: CircuitEvent[] = [];
  readonly audit: CircuitEvent[] = [];

  circuitBroken(event: Parameters<CircuitEventSink["circuitBroken"]>[0]): void {
    this.events.push({ type: "circuit_broken", ...event });
  }

  circuitRecovered(event: Parameters<CircuitEventSink["circuitRecovered"]>[0]): void {
    this.events.push({ type: "circuit_recovered", ...event });
  }

  circuitDisabled(event: Parameters<CircuitEventSink["circuitDisabled"]>[0]): void {
    this.events.push({ type: "circuit_disabled", ...event });
  }

  healthScoreChanged(event: Parameters<CircuitEventSink["healthScoreChanged"]>[0]): void {
    this.audit.push({ type: "health_score_changed", ...event });
  }

  healthScoreReset(event: Parameters<CircuitEventSink["healthScoreReset"]>[0]): void {
    this.audit.push({ type: "health_score_reset", ...event });
  }
}
