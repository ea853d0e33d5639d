import { z } from "zod";
import { oauthProviderTypes } from "./types.js";

export const oauthSessionSchema = z.object({
  sessionId: z.string().min(1),
  providerType: z.enum(oauthProviderTypes),
  codeVerifier: z.string().min(1),
  codeChallenge: z.string().min(1),
  state: z.string().min(1),
  proxy: z.object({ url: z.string() }).nullable(),
  redirectUri: z.string(),
  scopes: z.array(z.string()),
  metadata: z.record(z.unknown()),
  createdAt: z.number(),
  expiresAt: z.number(),
});

/** Single-use PKCE authorization session. */
export type OAuthSession = z.infer<typeof oauthSessionSchema>;

/**
 * Ephemeral session storage with per-entry TTL.
 *
 * `take` is an atomic get-and-delete: of two concurrent takes for the same
 * key at most one receives the session.
 */
export interface ISessionStore {
  set(key: string, session: OAuthSession, ttlMs: number): Promise<void>;
  get(key: string): Promise<OAuthSession | null>;
  delete(key: string): Promise<void>;
  take(key: string): Promise<OAuthSession | null>;
}
