import { logger } from "../config/logger.js";

export interface CircuitBrokenEvent {
  accountId: string;
  name: string;
  healthScore: number;
  brokenAt: number;
  /** 1 for a fresh break, higher after failed half-open probes. */
  episode: number;
  backoffRetryTime: number;
  terminal: boolean;
  reason: string | null;
}

export interface CircuitRecoveredEvent {
  accountId: string;
  name: string;
  probeCount: number;
  recoverDurationMs: number;
  recoveredAt: number;
}

export interface CircuitDisabledEvent {
  accountId: string;
  name: string;
  from: "broken";
  to: "disabled";
  episodes: number;
  disabledAt: number;
}

/** Audit record for every health score movement, including those below the break threshold. */
export interface HealthScoreChangedEvent {
  accountId: string;
  name: string;
  oldScore: number;
  newScore: number;
  reason: string;
  changedAt: number;
}

export interface HealthScoreResetEvent {
  accountId: string;
  name: string;
  /** Who asked for the reset; null for automation. */
  operatorId: string | null;
  oldScore: number;
  forced: boolean;
  resetAt: number;
}

export type CircuitEvent =
  | ({ type: "circuit_broken" } & CircuitBrokenEvent)
  | ({ type: "circuit_recovered" } & CircuitRecoveredEvent)
  | ({ type: "circuit_disabled" } & CircuitDisabledEvent)
  | ({ type: "health_score_changed" } & HealthScoreChangedEvent)
  | ({ type: "health_score_reset" } & HealthScoreResetEvent);

/** Outbound circuit transitions and health audit records, for alerting and dashboards. */
export interface CircuitEventSink {
  circuitBroken(event: CircuitBrokenEvent): void;
  circuitRecovered(event: CircuitRecoveredEvent): void;
  circuitDisabled(event: CircuitDisabledEvent): void;
  healthScoreChanged(event: HealthScoreChangedEvent): void;
  healthScoreReset(event: HealthScoreResetEvent): void;
}

export class LoggingCircuitEventSink implements CircuitEventSink {
  circuitBroken(event: CircuitBrokenEvent): void {
    logger.warn("Account circuit broken", event);
  }

  circuitRecovered(event: CircuitRecoveredEvent): void {
    logger.info("Account circuit recovered", event);
  }

  circuitDisabled(event: CircuitDisabledEvent): void {
    logger.error("Account disabled after repeated circuit breaks", event);
  }

  healthScoreChanged(event: HealthScoreChangedEvent): void {
    logger.debug("Account health score changed", event);
  }

  healthScoreReset(event: HealthScoreResetEvent): void {
    logger.info("Account health score reset", event);
  }
}

/** Deliver one event to a sink. A throwing sink is logged, never propagated. */
export function emitCircuitEvent(sink: CircuitEventSink, event: CircuitEvent): void {
  try {
    switch (event.type) {
      case "circuit_broken": {
        const { type: _type, ...payload } = event;
        sink.circuitBroken(payload);
        break;
      }
      case "circuit_recovered": {
        const { type: _type, ...payload } = event;
        sink.circuitRecovered(payload);
        break;
      }
      case "circuit_disabled": {
        const { type: _type, ...payload } = event;
        sink.circuitDisabled(payload);
        break;
      }
      case "health_score_changed": {
        const { type: _type, ...payload } = event;
        sink.healthScoreChanged(payload);
        break;
      }
      case "health_score_reset": {
        const { type: _type, ...payload } = event;
        sink.healthScoreReset(payload);
        break;
      }
    }
  } catch (err) {
    logger.error("Circuit event sink failed", {
      eventType: event.type,
      accountId: event.accountId,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
