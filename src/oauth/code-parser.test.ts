import { describe, expect, it } from "vitest";
import { parseAuthorizationCode } from "./code-parser.js";
import { InvalidCode } from "./errors.js";

describe("parseAuthorizationCode", () => {
  it("reads code and state from a callback URL", () => {
    expect(parseAuthorizationCode("https://cb.example/x?code=ac_123&state=s1")).toEqual({
      code: "ac_123",
      state: "s1",
    });
  });

  it("decodes percent-encoded query values", () => {
    expect(parseAuthorizationCode("http://localhost:1455/auth/callback?state=a%2Bb&code=c%2F1")).toEqual({
      code: "c/1",
      state: "a+b",
    });
  });

  it("accepts a bare query string", () => {
    expect(parseAuthorizationCode("/callback?code=abc")).toEqual({ code: "abc", state: null });
  });

  it("rejects a URL without a code", () => {
    expect(() => parseAuthorizationCode("https://cb.example/x?error=access_denied")).toThrow(
      "Callback URL has no code parameter",
    );
  });

  it("splits the code#state form", () => {
    expect(parseAuthorizationCode("  abc123#state-9 ")).toEqual({ code: "abc123", state: "state-9" });
    expect(parseAuthorizationCode("abc123#")).toEqual({ code: "abc123", state: null });
  });

  it("takes a bare code as is", () => {
    expect(parseAuthorizationCode("ac_bare")).toEqual({ code: "ac_bare", state: null });
  });

  it("rejects empty and unusable input", () => {
    expect(() => parseAuthorizationCode("   ")).toThrow(InvalidCode);
    expect(() => parseAuthorizationCode("#state")).toThrow("Authorization code is empty");
    expect(() => parseAuthorizationCode("two words")).toThrow(InvalidCode);
  });
});
