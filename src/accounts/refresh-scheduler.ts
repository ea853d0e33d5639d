import type { RefreshConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import type { ProviderRegistry } from "../oauth/provider-registry.js";
import type { HealthMonitor } from "./circuit-breaker.js";
import type { RefreshSummary, TokenRefresher } from "./token-refresh.js";

export type Cadence = "short" | "long";

export interface CycleResult {
  cadence: Cadence;
  promoted: number;
  probes: RefreshSummary;
  refreshed: RefreshSummary;
}

const EMPTY_SUMMARY: RefreshSummary = { total: 0, succeeded: 0, failed: 0 };

/**
 * Two independent refresh cadences.
 *
 * Short: promote due circuits, probe half-open accounts, then refresh
 * short-lived-token providers expiring within the short lookahead.
 * Long: refresh the remaining providers within the long lookahead.
 *
 * A tick is skipped while the previous run of the same cadence is still in
 * flight. Each run is aborted once it exceeds the batch timeout.
 */
export class RefreshScheduler {
  private readonly timers = new Map<Cadence, ReturnType<typeof setInterval>>();
  private readonly running = new Map<Cadence, Promise<CycleResult | null>>();
  private readonly controllers = new Set<AbortController>();

  constructor(
    private readonly refresher: TokenRefresher,
    private readonly health: HealthMonitor,
    private readonly registry: ProviderRegistry,
    private readonly policy: RefreshConfig,
  ) {}

  start(): void {
    if (this.timers.size > 0) {
      logger.warn("Refresh scheduler already running");
      return;
    }
    logger.info("Starting refresh scheduler", {
      shortIntervalMs: this.policy.shortIntervalMs,
      longIntervalMs: this.policy.longIntervalMs,
      concurrency: this.policy.concurrency,
    });
    this.schedule("short", this.policy.shortIntervalMs);
    this.schedule("long", this.policy.longIntervalMs);
  }

  /** Clear both timers, abort in-flight runs and wait for them to settle. */
  async stop(): Promise<void> {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
    for (const controller of this.controllers) controller.abort(new Error("Refresh scheduler stopped"));
    await Promise.allSettled([...this.running.values()]);
    logger.info("Refresh scheduler stopped");
  }

  /** Resolves null when a short run is already in flight. */
  runShortCycle(): Promise<CycleResult | null> {
    return this.runExclusive("short", async (signal) => {
      const promoted = await this.health.promoteDueAccounts();
      const probes = await this.refresher.probeHalfOpen({ signal });
      const providerTypes = this.registry.typesByTokenLifetime(true);
      const refreshed =
        providerTypes.length > 0
          ? await this.refresher.refreshExpiring(this.policy.shortLookaheadMs, { providerTypes, signal })
          : EMPTY_SUMMARY;
      return { cadence: "short", promoted, probes, refreshed };
    });
  }

  /** Resolves null when a long run is already in flight. */
  runLongCycle(): Promise<CycleResult | null> {
    return this.runExclusive("long", async (signal) => {
      const providerTypes = this.registry.typesByTokenLifetime(false);
      const refreshed =
        providerTypes.length > 0
          ? await this.refresher.refreshExpiring(this.policy.longLookaheadMs, { providerTypes, signal })
          : EMPTY_SUMMARY;
      return { cadence: "long", promoted: 0, probes: EMPTY_SUMMARY, refreshed };
    });
  }

  private schedule(cadence: Cadence, intervalMs: number): void {
    const timer = setInterval(() => {
      void (cadence === "short" ? this.runShortCycle() : this.runLongCycle());
    }, intervalMs);
    timer.unref();
    this.timers.set(cadence, timer);
  }

  private runExclusive(
    cadence: Cadence,
    job: (signal: AbortSignal) => Promise<CycleResult>,
  ): Promise<CycleResult | null> {
    if (this.running.has(cadence)) {
      logger.warn("Refresh cycle still running, skipping tick", { cadence });
      return Promise.resolve(null);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      logger.error("Refresh cycle exceeded batch timeout, aborting", {
        cadence,
        batchTimeoutMs: this.policy.batchTimeoutMs,
      });
      controller.abort(new Error(`Refresh cycle timed out after ${this.policy.batchTimeoutMs}ms`));
    }, this.policy.batchTimeoutMs);
    timeout.unref();
    this.controllers.add(controller);

    const started = Date.now();
    const run = job(controller.signal)
      .then((result) => {
        logger.info("Refresh cycle finished", { ...result, durationMs: Date.now() - started });
        return result;
      })
      .catch((err: unknown) => {
        logger.error("Refresh cycle failed", { cadence, error: err instanceof Error ? err.message : String(err) });
        captureError(err, { job: `refresh-${cadence}` });
        return null;
      })
      .finally(() => {
        clearTimeout(timeout);
        this.controllers.delete(controller);
        this.running.delete(cadence);
      });
    this.running.set(cadence, run);
    return run;
  }
}
