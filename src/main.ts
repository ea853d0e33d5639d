import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb, createPool } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { DrizzleAccountRepository } from "./infrastructure/persistence/drizzle-account-repository.js";
import { createCredentialLifecycle } from "./lifecycle.js";
import { captureError, initSentry } from "./observability/sentry.js";
import { DrizzleSessionStore } from "./oauth/drizzle-session-store.js";
import { validateRequiredEnvVars } from "./validate-env.js";

export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    extra: { source: "unhandledRejection" },
  });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  captureError(err, { extra: { source: "uncaughtException", origin } });
  // Winston's Console transport is synchronous, so the entry is out before exit.
  process.exit(1);
};

async function main(): Promise<void> {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  validateRequiredEnvVars();
  initSentry(process.env.SENTRY_DSN, process.env.SENTRY_RELEASE);

  const pool = createPool(config.databaseUrl);
  await runMigrations(pool);
  logger.info("Database migrations applied");
  const db = createDb(pool);

  const sessions = new DrizzleSessionStore(db);
  const lifecycle = createCredentialLifecycle(config, {
    accounts: new DrizzleAccountRepository(db),
    sessions,
  });
  lifecycle.scheduler.start();

  const sessionSweep = setInterval(() => {
    sessions
      .purgeExpired()
      .then((purged) => {
        if (purged > 0) logger.debug("Purged expired OAuth sessions", { purged });
      })
      .catch((err: unknown) => captureError(err, { job: "session-sweep" }));
  }, config.sessionTtlMs);
  sessionSweep.unref();

  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    clearInterval(sessionSweep);
    await lifecycle.close();
    await pool.end();
    process.exit(0);
  };
  process.once("SIGTERM", (s) => void shutdown(s));
  process.once("SIGINT", (s) => void shutdown(s));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
