import { z } from "zod";

export class InvalidIdTokenError extends Error {
  readonly code = "INVALID_ID_TOKEN";

  constructor(reason: string) {
    super(`Invalid ID token: ${reason}`);
    this.name = "InvalidIdTokenError";
  }
}

const standardClaimsSchema = z
  .object({
    sub: z.string().optional(),
    iss: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    exp: z.number().optional(),
    iat: z.number().optional(),
  })
  .passthrough();

export type IdTokenClaims = z.infer<typeof standardClaimsSchema>;

/** Decode the payload segment of a JWT. No signature verification. */
export function decodeIdToken(token: string): IdTokenClaims {
  const parts = token.split(".");
  if (parts.length !== 3) {
    throw new InvalidIdTokenError(`expected 3 parts, got ${parts.length}`);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(parts[1] ?? "", "base64url").toString("utf-8"));
  } catch {
    throw new InvalidIdTokenError("payload is not base64url JSON");
  }
  const parsed = standardClaimsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidIdTokenError("payload claims have the wrong types");
  }
  return parsed.data;
}

export interface IdTokenExpectations {
  issuer: string;
  audience: string;
  now: number;
}

/**
 * Advisory checks on an ID token fetched straight from the token endpoint.
 * Structure and expiry are enforced; issuer and audience mismatches are
 * returned as warnings since TLS to the endpoint is the trust anchor.
 */
export function checkIdToken(token: string, expected: IdTokenExpectations): { claims: IdTokenClaims; warnings: string[] } {
  const claims = decodeIdToken(token);
  if (claims.exp !== undefined && claims.exp * 1000 <= expected.now) {
    throw new InvalidIdTokenError(`expired at ${new Date(claims.exp * 1000).toISOString()}`);
  }

  const warnings: string[] = [];
  if (claims.iss !== expected.issuer) {
    warnings.push(`issuer ${claims.iss ?? "<missing>"} != ${expected.issuer}`);
  }
  const audiences = claims.aud === undefined ? [] : Array.isArray(claims.aud) ? claims.aud : [claims.aud];
  if (!audiences.includes(expected.audience)) {
    warnings.push(`audience ${expected.audience} not in [${audiences.join(", ")}]`);
  }
  return { claims, warnings };
}
