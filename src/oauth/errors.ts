/**
 * Authorization-flow and upstream errors.
 *
 * `restartAuthorization` tells a transport whether the caller has to begin a
 * new OAuth flow (true) or may retry the same call later (false).
 */

export abstract class AuthorizationError extends Error {
  abstract readonly code: string;
  abstract readonly restartAuthorization: boolean;
}

export class SessionNotFound extends AuthorizationError {
  readonly code = "SESSION_NOT_FOUND";
  readonly restartAuthorization = true;

  constructor(sessionId: string) {
    super(`OAuth session not found or already consumed: ${sessionId}`);
    this.name = "SessionNotFound";
  }
}

export class SessionExpired extends AuthorizationError {
  readonly code = "SESSION_EXPIRED";
  readonly restartAuthorization = true;

  constructor(sessionId: string, expiredAt: number) {
    super(`OAuth session ${sessionId} expired at ${new Date(expiredAt).toISOString()}`);
    this.name = "SessionExpired";
  }
}

export class SessionPersistError extends AuthorizationError {
  readonly code = "SESSION_PERSIST_FAILED";
  readonly restartAuthorization = false;

  constructor(options?: { cause?: unknown }) {
    super("Failed to persist OAuth session", options);
    this.name = "SessionPersistError";
  }
}

export class InvalidCode extends AuthorizationError {
  readonly code = "INVALID_CODE";
  readonly restartAuthorization = true;

  constructor(reason = "No authorization code could be extracted from the input") {
    super(reason);
    this.name = "InvalidCode";
  }
}

/** The state returned with the code does not match the session's nonce. */
export class StateMismatch extends AuthorizationError {
  readonly code = "STATE_MISMATCH";
  readonly restartAuthorization = true;

  constructor() {
    super("Returned OAuth state does not match the session");
    this.name = "StateMismatch";
  }
}

export class TokenExchangeFailed extends AuthorizationError {
  readonly code = "TOKEN_EXCHANGE_FAILED";
  readonly restartAuthorization = true;
  readonly status: number | null;
  readonly upstreamMessage: string;

  constructor(status: number | null, upstreamMessage: string, options?: { cause?: unknown }) {
    super(
      status === null
        ? `Token exchange failed: ${upstreamMessage}`
        : `Token exchange failed (HTTP ${status}): ${upstreamMessage}`,
      options,
    );
    this.name = "TokenExchangeFailed";
    this.status = status;
    this.upstreamMessage = upstreamMessage;
  }
}

export class IncompleteTokenResponse extends AuthorizationError {
  readonly code = "INCOMPLETE_TOKEN_RESPONSE";
  readonly restartAuthorization = true;

  constructor(missing: string[]) {
    super(`Token response is missing: ${missing.join(", ")}`);
    this.name = "IncompleteTokenResponse";
  }
}

export class UnsupportedProvider extends AuthorizationError {
  readonly code = "UNSUPPORTED_PROVIDER";
  readonly restartAuthorization = false;

  constructor(providerType: string) {
    super(`No OAuth capability registered for provider: ${providerType}`);
    this.name = "UnsupportedProvider";
  }
}

export class InvalidProxyError extends AuthorizationError {
  readonly code = "INVALID_PROXY";
  readonly restartAuthorization = false;

  constructor(reason: string) {
    super(`Invalid proxy configuration: ${reason}`);
    this.name = "InvalidProxyError";
  }
}

/** The caller's signal fired before the operation finished. Transient. */
export class OperationCancelled extends Error {
  readonly code = "OPERATION_CANCELLED";

  constructor(options?: { cause?: unknown }) {
    super("Operation cancelled", options);
    this.name = "OperationCancelled";
  }
}

/** Non-2xx response from an upstream token endpoint. */
export class OAuthHttpError extends Error {
  readonly code = "OAUTH_HTTP_ERROR";
  readonly status: number;
  readonly body: string;
  /** The JSON `error` field, e.g. `invalid_grant`, when the body carries one. */
  readonly oauthError: string | null;

  constructor(status: number, body: string, oauthError: string | null) {
    super(`OAuth error (HTTP ${status})${oauthError ? `: ${oauthError}` : ""}`);
    this.name = "OAuthHttpError";
    this.status = status;
    this.body = body;
    this.oauthError = oauthError;
  }
}

/** A 2xx token response that is not the JSON shape providers promise. */
export class MalformedTokenResponseError extends Error {
  readonly code = "MALFORMED_TOKEN_RESPONSE";

  constructor(reason: string) {
    super(`Malformed token response: ${reason}`);
    this.name = "MalformedTokenResponseError";
  }
}

/** Network failure or per-call timeout talking to the token endpoint. */
export class UpstreamUnavailableError extends Error {
  readonly code = "UPSTREAM_UNAVAILABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamUnavailableError";
  }
}

export type RefreshFailureKind = "terminal" | "transient" | "cancelled";

/**
 * Split upstream failures into terminal (the credential is bad, do not retry)
 * and transient (worth another attempt).
 */
export function classifyRefreshFailure(err: unknown): RefreshFailureKind {
  if (err instanceof OperationCancelled) return "cancelled";
  if (err instanceof MalformedTokenResponseError || err instanceof InvalidProxyError) return "terminal";
  if (err instanceof OAuthHttpError) {
    if (err.oauthError === "invalid_grant") return "terminal";
    if (err.status === 408 || err.status === 429 || err.status >= 500) return "transient";
    if (err.status >= 400) return "terminal";
    return "transient";
  }
  return "transient";
}
