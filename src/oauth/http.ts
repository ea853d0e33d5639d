import { type Dispatcher, fetch as undiciFetch, type RequestInit, type Response } from "undici";
import { MalformedTokenResponseError, OAuthHttpError, OperationCancelled, UpstreamUnavailableError } from "./errors.js";
import { ProxyDispatcherPool } from "./proxy.js";
import type { ProviderCallContext } from "./types.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface TokenRequest {
  url: string;
  /** `json` posts a JSON object, `form` posts application/x-www-form-urlencoded. */
  encoding: "json" | "form";
  body: Record<string, string>;
  headers?: Record<string, string>;
}

export interface TokenEndpointClientOptions {
  /** Per-call timeout; combined with the caller's signal. */
  timeoutMs: number;
  fetchFn?: FetchFn;
  dispatchers?: ProxyDispatcherPool;
}

function readOAuthError(body: string): string | null {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
      const { error } = parsed;
      if (typeof error === "string") return error;
      if (typeof error === "object" && error !== null && "type" in error && typeof error.type === "string") {
        return error.type;
      }
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * POST client for upstream OAuth token endpoints.
 *
 * Resolves with the parsed JSON body of a 2xx response. Throws
 * OAuthHttpError on non-2xx, MalformedTokenResponseError on an unparseable
 * 2xx body, OperationCancelled when the caller's signal fires and
 * UpstreamUnavailableError on network errors and timeouts.
 */
export class TokenEndpointClient {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly dispatchers: ProxyDispatcherPool;

  constructor(opts: TokenEndpointClientOptions) {
    this.fetchFn = opts.fetchFn ?? undiciFetch;
    this.timeoutMs = opts.timeoutMs;
    this.dispatchers = opts.dispatchers ?? new ProxyDispatcherPool();
  }

  async post(req: TokenRequest, ctx: ProviderCallContext): Promise<unknown> {
    if (ctx.signal?.aborted) throw new OperationCancelled({ cause: ctx.signal.reason });

    const dispatcher: Dispatcher | undefined = this.dispatchers.get(ctx.proxy);
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = ctx.signal ? AbortSignal.any([ctx.signal, timeout]) : timeout;

    const body = req.encoding === "json" ? JSON.stringify(req.body) : new URLSearchParams(req.body).toString();
    const contentType = req.encoding === "json" ? "application/json" : "application/x-www-form-urlencoded";

    let res: Response;
    let text: string;
    try {
      res = await this.fetchFn(req.url, {
        method: "POST",
        headers: { "Content-Type": contentType, Accept: "application/json", ...req.headers },
        body,
        signal,
        ...(dispatcher && { dispatcher }),
      });
      text = await res.text();
    } catch (err) {
      if (ctx.signal?.aborted) throw new OperationCancelled({ cause: err });
      if (timeout.aborted) {
        throw new UpstreamUnavailableError(`Token endpoint timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamUnavailableError(`Token endpoint request failed: ${message}`, { cause: err });
    }

    if (!res.ok) {
      throw new OAuthHttpError(res.status, text, readOAuthError(text));
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedTokenResponseError(`HTTP ${res.status} body is not JSON`);
    }
  }

  close(): Promise<void> {
    return this.dispatchers.close();
  }
}
