import * as Sentry from "@sentry/node";
import { config } from "../config/index.js";

let enabled = false;

/**
 * Initialize the Sentry SDK. Without a DSN Sentry stays disabled and every
 * capture call is a no-op.
 */
export function initSentry(dsn: string | undefined, release?: string): void {
  if (!dsn) {
    enabled = false;
    return;
  }

  Sentry.init({
    dsn,
    environment: config.nodeEnv,
    release,
    // Sample 100% of errors, 10% of transactions in production
    tracesSampleRate: config.nodeEnv === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Token endpoints never carry secrets in the query, but callback URLs do (code, state).
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && breadcrumb.data && typeof url === "string") {
        try {
          const parsed = new URL(url);
          parsed.search = "";
          breadcrumb.data.url = parsed.toString();
        } catch {
          return breadcrumb;
        }
      }
      return breadcrumb;
    },
  });
  enabled = true;
}

export interface ErrorContext {
  accountId?: string;
  providerType?: string;
  job?: string;
  extra?: Record<string, unknown>;
}

/** Capture an exception with credential-lifecycle tags. */
export function captureError(error: unknown, context?: ErrorContext): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.accountId && { accountId: context.accountId }),
      ...(context?.providerType && { providerType: context.providerType }),
      ...(context?.job && { job: context.job }),
    },
    extra: context?.extra,
  });
}

export function captureMessage(message: string, level: "info" | "warning" | "error" = "info"): void {
  if (!enabled) return;
  Sentry.captureMessage(message, level);
}
