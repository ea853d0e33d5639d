import { z } from "zod";
import type { ProviderClientConfig } from "../../config/index.js";
import type { TokenEndpointClient } from "../http.js";
import type {
  AuthUrlParams,
  ExchangeCodeParams,
  OAuthTokenSet,
  ProviderCallContext,
  ProviderCapability,
  ValidateTokenInput,
} from "../types.js";
import { InvalidAccessTokenError } from "./errors.js";
import { parseTokenResponse, requireRefreshedToken, splitScope, type TokenResponse } from "./token-response.js";

const USER_AGENT = "claude-cli/1.0.56 (external, cli)";

const claudeExtrasSchema = z
  .object({
    organization: z.object({ uuid: z.string().optional(), name: z.string().optional() }).passthrough().nullish(),
    account: z.object({ uuid: z.string().optional() }).passthrough().nullish(),
  })
  .passthrough();

function toTokenSet(res: TokenResponse, body: unknown): OAuthTokenSet {
  const extras = claudeExtrasSchema.safeParse(body);
  const org = extras.success ? extras.data.organization : null;
  const orgId = org?.uuid ?? org?.name;
  return {
    accessToken: res.access_token,
    refreshToken: res.refresh_token || null,
    idToken: null,
    expiresInSeconds: res.expires_in ?? 0,
    scope: splitScope(res.scope),
    organizations: orgId ? [orgId] : [],
    upstreamAccountId: (extras.success ? extras.data.account?.uuid : undefined) ?? null,
  };
}

/** Claude.ai subscription accounts (authorization code + PKCE, JSON token endpoint). */
export class ClaudeProvider implements ProviderCapability {
  readonly providerType = "claude-official";
  readonly shortLivedTokens = true;

  constructor(
    private readonly client: ProviderClientConfig,
    private readonly http: TokenEndpointClient,
  ) {}

  get defaultRedirectUri(): string {
    return this.client.redirectUri;
  }

  get defaultScopes(): readonly string[] {
    return this.client.scopes;
  }

  buildAuthUrl(params: AuthUrlParams): string {
    const url = new URL(this.client.authorizeUrl);
    // `code=true` makes the consent page display the code for manual copy.
    url.searchParams.set("code", "true");
    url.searchParams.set("client_id", this.client.clientId);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("redirect_uri", params.redirectUri);
    url.searchParams.set("scope", params.scopes.join(" "));
    url.searchParams.set("code_challenge", params.codeChallenge);
    url.searchParams.set("code_challenge_method", "S256");
    url.searchParams.set("state", params.state);
    return url.toString();
  }

  async exchangeCode(params: ExchangeCodeParams, ctx: ProviderCallContext): Promise<OAuthTokenSet> {
    const body = await this.http.post(
      {
        url: this.client.tokenUrl,
        encoding: "json",
        headers: { "User-Agent": USER_AGENT },
        body: {
          grant_type: "authorization_code",
          client_id: this.client.clientId,
          code: params.code,
          redirect_uri: params.redirectUri,
          code_verifier: params.codeVerifier,
          state: params.state,
        },
      },
      ctx,
    );
    return toTokenSet(parseTokenResponse(body), body);
  }

  async refreshToken(refreshToken: string, ctx: ProviderCallContext): Promise<OAuthTokenSet> {
    const body = await this.http.post(
      {
        url: this.client.tokenUrl,
        encoding: "json",
        headers: { "User-Agent": USER_AGENT },
        body: { grant_type: "refresh_token", refresh_token: refreshToken, client_id: this.client.clientId },
      },
      ctx,
    );
    const res = parseTokenResponse(body);
    requireRefreshedToken(res);
    return toTokenSet(res, body);
  }

  async validateToken(input: ValidateTokenInput): Promise<void> {
    if (!input.accessToken.trim()) throw new InvalidAccessTokenError("empty access token");
  }
}
