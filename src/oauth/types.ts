import { z } from "zod";

/** OAuth providers with a PKCE authorization-code flow. */
export const oauthProviderTypes = ["claude-official", "codex-cli"] as const;
/** Static API-key providers: stored like accounts, never refreshed. */
export const apiKeyProviderTypes = ["claude-console", "openai-responses"] as const;

export const providerTypeSchema = z.enum([...oauthProviderTypes, ...apiKeyProviderTypes]);
export type ProviderType = z.infer<typeof providerTypeSchema>;
export type OAuthProviderType = (typeof oauthProviderTypes)[number];

export function isOAuthProviderType(type: string): type is OAuthProviderType {
  return oauthProviderTypes.some((t) => t === type);
}

/** Outbound proxy for upstream calls: `http(s)://`, `socks5://` or `socks5h://` URL. */
export interface ProxyConfig {
  url: string;
}

/** In-flight token material. Never persisted unencrypted. */
export interface OAuthTokenSet {
  accessToken: string;
  /** Null when the provider did not rotate the refresh token. */
  refreshToken: string | null;
  idToken: string | null;
  expiresInSeconds: number;
  scope: string[];
  organizations: string[];
  /** Provider-side account identifier, when the provider reveals one. */
  upstreamAccountId: string | null;
}

export interface ProviderCallContext {
  proxy: ProxyConfig | null;
  signal?: AbortSignal;
}

export interface AuthUrlParams {
  codeChallenge: string;
  state: string;
  redirectUri: string;
  scopes: string[];
}

export interface ExchangeCodeParams {
  code: string;
  codeVerifier: string;
  redirectUri: string;
  state: string;
}

export interface ValidateTokenInput {
  accessToken: string;
  idToken: string | null;
}

/**
 * One upstream identity provider. Adding a provider means writing one of
 * these and registering it; session, provisioning, refresh and health code
 * dispatch through the registry only.
 */
export interface ProviderCapability {
  readonly providerType: OAuthProviderType;
  /** Tokens live for minutes rather than hours: refreshed on the short cadence. */
  readonly shortLivedTokens: boolean;
  readonly defaultRedirectUri: string;
  readonly defaultScopes: readonly string[];

  buildAuthUrl(params: AuthUrlParams): string;
  exchangeCode(params: ExchangeCodeParams, ctx: ProviderCallContext): Promise<OAuthTokenSet>;
  refreshToken(refreshToken: string, ctx: ProviderCallContext): Promise<OAuthTokenSet>;
  /** Advisory structural checks. Resolves when the token looks usable, throws otherwise. */
  validateToken(input: ValidateTokenInput, ctx: ProviderCallContext): Promise<void>;
}
