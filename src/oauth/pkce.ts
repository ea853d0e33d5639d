import { createHash, randomBytes } from "node:crypto";

/** 64 random bytes, hex: 128 chars, 512 bits. Providers here expect hex verifiers. */
const VERIFIER_BYTES = 64;
const STATE_BYTES = 32;
const SESSION_ID_BYTES = 32;

export interface PkcePair {
  codeVerifier: string;
  codeChallenge: string;
}

export function generateCodeVerifier(): string {
  return randomBytes(VERIFIER_BYTES).toString("hex");
}

/** S256 challenge: base64url without padding of SHA-256(verifier). */
export function computeCodeChallenge(codeVerifier: string): string {
  return createHash("sha256").update(codeVerifier).digest("base64url");
}

export function generatePkcePair(): PkcePair {
  const codeVerifier = generateCodeVerifier();
  return { codeVerifier, codeChallenge: computeCodeChallenge(codeVerifier) };
}

export function generateStateNonce(): string {
  return randomBytes(STATE_BYTES).toString("hex");
}

export function generateSessionId(): string {
  return randomBytes(SESSION_ID_BYTES).toString("base64url");
}
