import { describe, expect, it } from "vitest";
import {
  classifyRefreshFailure,
  InvalidProxyError,
  MalformedTokenResponseError,
  OAuthHttpError,
  OperationCancelled,
  SessionExpired,
  SessionPersistError,
  TokenExchangeFailed,
  UpstreamUnavailableError,
} from "./errors.js";

describe("classifyRefreshFailure", () => {
  it("treats invalid_grant as terminal regardless of status", () => {
    expect(classifyRefreshFailure(new OAuthHttpError(400, "{}", "invalid_grant"))).toBe("terminal");
    expect(classifyRefreshFailure(new OAuthHttpError(500, "{}", "invalid_grant"))).toBe("terminal");
  });

  it("treats other 4xx as terminal", () => {
    expect(classifyRefreshFailure(new OAuthHttpError(401, "", null))).toBe("terminal");
    expect(classifyRefreshFailure(new OAuthHttpError(403, "", "access_denied"))).toBe("terminal");
  });

  it("treats 408, 429 and 5xx as transient", () => {
    for (const status of [408, 429, 500, 502, 503]) {
      expect(classifyRefreshFailure(new OAuthHttpError(status, "", null))).toBe("transient");
    }
  });

  it("treats a malformed success body as terminal", () => {
    expect(classifyRefreshFailure(new MalformedTokenResponseError("not JSON"))).toBe("terminal");
  });

  it("treats an unusable proxy as terminal", () => {
    expect(classifyRefreshFailure(new InvalidProxyError("unsupported scheme ftp"))).toBe("terminal");
  });

  it("treats network failures and unknown errors as transient", () => {
    expect(classifyRefreshFailure(new UpstreamUnavailableError("ECONNRESET"))).toBe("transient");
    expect(classifyRefreshFailure(new Error("boom"))).toBe("transient");
  });

  it("reports cancellation separately", () => {
    expect(classifyRefreshFailure(new OperationCancelled())).toBe("cancelled");
  });
});

describe("authorization errors", () => {
  it("tell the caller whether to restart the flow", () => {
    expect(new SessionExpired("s1", 0).restartAuthorization).toBe(true);
    expect(new SessionPersistError().restartAuthorization).toBe(false);
  });

  it("TokenExchangeFailed carries the upstream status and message", () => {
    const err = new TokenExchangeFailed(400, "invalid_grant");
    expect(err.status).toBe(400);
    expect(err.upstreamMessage).toBe("invalid_grant");
    expect(err.message).toBe("Token exchange failed (HTTP 400): invalid_grant");
  });
});
