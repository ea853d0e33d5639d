import { describe, expect, it } from "vitest";
import { checkIdToken, decodeIdToken, InvalidIdTokenError } from "./id-token.js";

function fakeJwt(claims: Record<string, unknown>): string {
  const enc = (o: unknown) => Buffer.from(JSON.stringify(o)).toString("base64url");
  return `${enc({ alg: "none" })}.${enc(claims)}.sig`;
}

const NOW = Date.parse("2026-03-01T00:00:00Z");
const expectations = { issuer: "https://auth.example.test/", audience: "test-client", now: NOW };

describe("decodeIdToken", () => {
  it("decodes the payload claims", () => {
    expect(decodeIdToken(fakeJwt({ sub: "u1", exp: 10 }))).toEqual({ sub: "u1", exp: 10 });
  });

  it("rejects a token without three parts", () => {
    expect(() => decodeIdToken("a.b")).toThrow("Invalid ID token: expected 3 parts, got 2");
  });

  it("rejects a payload that is not JSON", () => {
    expect(() => decodeIdToken("a.!!!.c")).toThrow(InvalidIdTokenError);
  });

  it("rejects claims with the wrong types", () => {
    expect(() => decodeIdToken(fakeJwt({ exp: "tomorrow" }))).toThrow("payload claims have the wrong types");
  });
});

describe("checkIdToken", () => {
  it("passes a well-formed unexpired token without warnings", () => {
    const token = fakeJwt({
      iss: "https://auth.example.test/",
      aud: ["test-client"],
      exp: NOW / 1000 + 3600,
    });
    expect(checkIdToken(token, expectations).warnings).toEqual([]);
  });

  it("throws on an expired token", () => {
    const token = fakeJwt({ exp: NOW / 1000 - 1 });
    expect(() => checkIdToken(token, expectations)).toThrow(InvalidIdTokenError);
  });

  it("reports issuer and audience mismatches as warnings", () => {
    const token = fakeJwt({ iss: "https://other.test/", aud: "someone-else", exp: NOW / 1000 + 60 });
    expect(checkIdToken(token, expectations).warnings).toEqual([
      "issuer https://other.test/ != https://auth.example.test/",
      "audience test-client not in [someone-else]",
    ]);
  });
});
