/**
 * Observability: Sentry error tracking and circuit transition events.
 */

export type {
  CircuitBrokenEvent,
  CircuitDisabledEvent,
  CircuitEvent,
  CircuitEventSink,
  CircuitRecoveredEvent,
  HealthScoreChangedEvent,
  HealthScoreResetEvent,
} from "./circuit-events.js";
export { emitCircuitEvent, LoggingCircuitEventSink } from "./circuit-events.js";
export type { ErrorContext } from "./sentry.js";
export { captureError, captureMessage, initSentry } from "./sentry.js";
