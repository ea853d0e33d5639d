import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { computeCodeChallenge, generatePkcePair, generateSessionId, generateStateNonce } from "./pkce.js";

function referenceChallenge(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

describe("pkce", () => {
  it("produces a 128-char lowercase hex verifier", () => {
    const { codeVerifier } = generatePkcePair();
    expect(codeVerifier).toMatch(/^[0-9a-f]{128}$/);
  });

  it("challenge is the unpadded base64url SHA-256 of the verifier", () => {
    for (let i = 0; i < 100; i++) {
      const { codeVerifier, codeChallenge } = generatePkcePair();
      expect(codeChallenge).toBe(referenceChallenge(codeVerifier));
      expect(codeChallenge).toHaveLength(43);
      expect(codeChallenge).not.toMatch(/[+/=]/);
    }
  });

  it("matches the RFC 7636 appendix B vector", () => {
    expect(computeCodeChallenge("dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk")).toBe(
      "E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM",
    );
  });

  it("10,000 generations produce no duplicate verifier or state", () => {
    const verifiers = new Set<string>();
    const states = new Set<string>();
    for (let i = 0; i < 10_000; i++) {
      verifiers.add(generatePkcePair().codeVerifier);
      states.add(generateStateNonce());
    }
    expect(verifiers.size).toBe(10_000);
    expect(states.size).toBe(10_000);
  });

  it("state nonce is 64 hex chars and session id is url-safe", () => {
    expect(generateStateNonce()).toMatch(/^[0-9a-f]{64}$/);
    expect(generateSessionId()).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });
});
