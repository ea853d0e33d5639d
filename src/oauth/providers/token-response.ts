import { z } from "zod";
import { MalformedTokenResponseError } from "../errors.js";

export const tokenResponseSchema = z
  .object({
    access_token: z.string().default(""),
    refresh_token: z.string().nullish(),
    id_token: z.string().nullish(),
    expires_in: z.number().nullish(),
    scope: z.string().nullish(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/** Validate the common fields of a token endpoint response body. */
export function parseTokenResponse(body: unknown): TokenResponse {
  const parsed = tokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedTokenResponseError(
      issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "unexpected shape",
    );
  }
  return parsed.data;
}

export function splitScope(scope: string | null | undefined): string[] {
  return scope ? scope.split(" ").filter(Boolean) : [];
}

/** Refresh responses must carry an access token and a positive lifetime. */
export function requireRefreshedToken(res: TokenResponse): void {
  if (!res.access_token) throw new MalformedTokenResponseError("missing access_token");
  if (!res.expires_in || res.expires_in <= 0) throw new MalformedTokenResponseError("missing or non-positive expires_in");
}
