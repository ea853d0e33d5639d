import { z } from "zod";
import type { ProviderClientConfig } from "../../config/index.js";
import { logger } from "../../config/logger.js";
import type { TokenEndpointClient } from "../http.js";
import { checkIdToken, decodeIdToken } from "../id-token.js";
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

const AUTH_CLAIM = "https://api.openai.com/auth";

const authClaimSchema = z
  .object({
    chatgpt_account_id: z.string().optional(),
    organizations: z.array(z.object({ id: z.string() }).passthrough()).optional(),
  })
  .passthrough();

interface AccountClaims {
  upstreamAccountId: string | null;
  organizations: string[];
}

/** Pull the ChatGPT account id and organization ids out of an ID token, if any. */
export function readAccountClaims(idToken: string | null | undefined): AccountClaims {
  if (!idToken) return { upstreamAccountId: null, organizations: [] };
  let claims: Record<string, unknown>;
  try {
    claims = decodeIdToken(idToken);
  } catch (err) {
    logger.warn("Codex ID token could not be decoded; account claims skipped", {
      error: err instanceof Error ? err.message : String(err),
    });
    return { upstreamAccountId: null, organizations: [] };
  }
  const auth = authClaimSchema.safeParse(claims[AUTH_CLAIM]);
  if (!auth.success) return { upstreamAccountId: null, organizations: [] };
  return {
    upstreamAccountId: auth.data.chatgpt_account_id ?? null,
    organizations: (auth.data.organizations ?? []).map((o) => o.id),
  };
}

function toTokenSet(res: TokenResponse): OAuthTokenSet {
  const { upstreamAccountId, organizations } = readAccountClaims(res.id_token);
  return {
    accessToken: res.access_token,
    refreshToken: res.refresh_token || null,
    idToken: res.id_token || null,
    expiresInSeconds: res.expires_in ?? 0,
    scope: splitScope(res.scope),
    organizations,
    upstreamAccountId,
  };
}

/**
 * ChatGPT accounts via the Codex CLI OAuth client (form-encoded token
 * endpoint, ID token carrying account and organization claims).
 */
export class CodexProvider implements ProviderCapability {
  readonly providerType = "codex-cli";
  readonly shortLivedTokens = false;

  constructor(
    private readonly client: ProviderClientConfig,
    private readonly http: TokenEndpointClient,
    private readonly now: () => number = Date.now,
  ) {}

  get defaultRedirectUri(): string {
    return this.client.redirectUri;
  }

  get defaultScopes(): readonly string[] {
    return this.client.scopes;
  }

  /** Refresh requests must not ask for offline_access again. */
  get refreshScopes(): string[] {
    return this.client.scopes.filter((s) => s !== "offline_access");
  }

  get expectedIssuer(): string {
    return `${new URL(this.client.authorizeUrl).origin}/`;
  }

  buildAuthUrl(params: AuthUrlParams): string {
    const url = new URL(this.client.authorizeUrl);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", this.client.clientId);
    url.searchParams.set("redirect_uri", params.redirectUri);
    url.searchParams.set("scope", params.scopes.join(" "));
    url.searchParams.set("code_challenge", params.codeChallenge);
    url.searchParams.set("code_challenge_method", "S256");
    url.searchParams.set("state", params.state);
    url.searchParams.set("id_token_add_organizations", "true");
    url.searchParams.set("codex_cli_simplified_flow", "true");
    return url.toString();
  }

  async exchangeCode(params: ExchangeCodeParams, ctx: ProviderCallContext): Promise<OAuthTokenSet> {
    const body = await this.http.post(
      {
        url: this.client.tokenUrl,
        encoding: "form",
        body: {
          grant_type: "authorization_code",
          code: params.code,
          redirect_uri: params.redirectUri,
          client_id: this.client.clientId,
          code_verifier: params.codeVerifier,
        },
      },
      ctx,
    );
    return toTokenSet(parseTokenResponse(body));
  }

  async refreshToken(refreshToken: string, ctx: ProviderCallContext): Promise<OAuthTokenSet> {
    const body = await this.http.post(
      {
        url: this.client.tokenUrl,
        encoding: "form",
        body: {
          grant_type: "refresh_token",
          client_id: this.client.clientId,
          refresh_token: refreshToken,
          scope: this.refreshScopes.join(" "),
        },
      },
      ctx,
    );
    const res = parseTokenResponse(body);
    requireRefreshedToken(res);
    return toTokenSet(res);
  }

  async validateToken(input: ValidateTokenInput): Promise<void> {
    if (!input.accessToken.trim()) throw new InvalidAccessTokenError("empty access token");
    if (!input.idToken) return;

    const { warnings } = checkIdToken(input.idToken, {
      issuer: this.expectedIssuer,
      audience: this.client.clientId,
      now: this.now(),
    });
    for (const warning of warnings) {
      logger.warn("Codex ID token advisory check", { warning });
    }
  }
}
