/**
 * Pure health-score and circuit transitions.
 *
 *   Closed ──(N consecutive failures | terminal failure)──▶ Broken
 *   Broken ──(now ≥ backoffRetryTime)──▶ HalfOpen
 *   HalfOpen ──(M probe successes)──▶ Closed
 *   HalfOpen ──(failure)──▶ Broken, longer backoff, episode + 1
 *   Broken ──(episodes > maxBrokenEpisodes)──▶ Disabled (terminal)
 *
 * Functions here never touch storage; HealthMonitor persists their output.
 */
import type { HealthConfig } from "../config/index.js";
import type { CircuitEvent } from "../observability/circuit-events.js";
import { type Account, CLOSED_CIRCUIT } from "./repository-types.js";

export const MAX_HEALTH_SCORE = 100;

export interface Transition {
  account: Account;
  event: CircuitEvent | null;
}

/** base · 2^(episode − 1), capped. */
export function backoffFor(episode: number, policy: HealthConfig): number {
  const scaled = policy.baseBackoffMs * 2 ** Math.max(0, episode - 1);
  return Math.min(scaled, policy.maxBackoffMs);
}

export function applySuccess(account: Account, policy: HealthConfig, now: number): Transition {
  const { circuit } = account;

  if (account.status === "disabled") return { account, event: null };

  if (!circuit.isBroken) {
    return {
      account: {
        ...account,
        status: "active",
        healthScore: Math.min(MAX_HEALTH_SCORE, account.healthScore + policy.successRecovery),
        circuit: { ...circuit, consecutiveFailures: 0 },
      },
      event: null,
    };
  }

  // A success seen while Broken but outside a probe does not close the circuit.
  if (!circuit.isHalfOpen) {
    return { account: { ...account, circuit: { ...circuit, consecutiveFailures: 0 } }, event: null };
  }

  const probeSuccessCount = circuit.probeSuccessCount + 1;
  if (probeSuccessCount < policy.probeSuccessThreshold) {
    return {
      account: { ...account, circuit: { ...circuit, consecutiveFailures: 0, probeSuccessCount } },
      event: null,
    };
  }

  const brokenAt = circuit.brokenAt ?? now;
  return {
    account: {
      ...account,
      status: "active",
      healthScore: MAX_HEALTH_SCORE,
      circuit: { ...CLOSED_CIRCUIT },
    },
    event: {
      type: "circuit_recovered",
      accountId: account.id,
      name: account.name,
      probeCount: probeSuccessCount,
      recoverDurationMs: now - brokenAt,
      recoveredAt: now,
    },
  };
}

export function applyFailure(
  account: Account,
  terminal: boolean,
  reason: string | null,
  policy: HealthConfig,
  now: number,
): Transition {
  const { circuit } = account;
  const healthScore = Math.max(0, account.healthScore - policy.failurePenalty);
  const consecutiveFailures = circuit.consecutiveFailures + 1;
  const base: Account = { ...account, healthScore, circuit: { ...circuit, consecutiveFailures } };

  if (account.status === "disabled") return { account: base, event: null };

  if (circuit.isHalfOpen) {
    const episode = circuit.brokenEpisodes + 1;
    if (episode > policy.maxBrokenEpisodes) {
      return {
        account: {
          ...base,
          status: "disabled",
          circuit: { ...base.circuit, isHalfOpen: false, probeSuccessCount: 0, brokenEpisodes: episode },
        },
        event: {
          type: "circuit_disabled",
          accountId: account.id,
          name: account.name,
          from: "broken",
          to: "disabled",
          episodes: episode,
          disabledAt: now,
        },
      };
    }
    return breakCircuit(base, episode, circuit.brokenAt ?? now, terminal, reason, policy, now);
  }

  if (circuit.isBroken) return { account: base, event: null };

  if (terminal || consecutiveFailures >= policy.failureThreshold) {
    return breakCircuit(base, 1, now, terminal, reason, policy, now);
  }
  return { account: base, event: null };
}

function breakCircuit(
  account: Account,
  episode: number,
  brokenAt: number,
  terminal: boolean,
  reason: string | null,
  policy: HealthConfig,
  now: number,
): Transition {
  const backoffRetryTime = now + backoffFor(episode, policy);
  return {
    account: {
      ...account,
      status: "error",
      circuit: {
        ...account.circuit,
        isBroken: true,
        brokenAt,
        isHalfOpen: false,
        probeSuccessCount: 0,
        backoffRetryTime,
        brokenEpisodes: episode,
      },
    },
    event: {
      type: "circuit_broken",
      accountId: account.id,
      name: account.name,
      healthScore: account.healthScore,
      brokenAt: now,
      episode,
      backoffRetryTime,
      terminal,
      reason,
    },
  };
}

/** Broken → HalfOpen once the backoff has elapsed; null when not due. */
export function promoteIfDue(account: Account, now: number): Account | null {
  const { circuit } = account;
  if (account.status === "disabled" || !circuit.isBroken || circuit.isHalfOpen) return null;
  if (circuit.backoffRetryTime !== null && now < circuit.backoffRetryTime) return null;
  return { ...account, circuit: { ...circuit, isHalfOpen: true, probeSuccessCount: 0 } };
}

/** Whether the router may send traffic to this account. */
export function isServeable(account: Account): boolean {
  return account.status === "active" && !account.circuit.isBroken;
}

/** Administrative reset to a closed, fully healthy circuit. */
export function resetCircuit(account: Account): Account {
  return {
    ...account,
    status: "active",
    healthScore: MAX_HEALTH_SCORE,
    circuit: { ...CLOSED_CIRCUIT },
    lastError: null,
    lastErrorAt: null,
  };
}
