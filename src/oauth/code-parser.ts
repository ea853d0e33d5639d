import { InvalidCode } from "./errors.js";

export interface ParsedCode {
  code: string;
  /** State returned alongside the code, when the input carried one. */
  state: string | null;
}

function fromQuery(input: string): ParsedCode {
  const query = input.slice(input.indexOf("?") + 1).split("#")[0];
  const params = new URLSearchParams(query);
  const code = params.get("code")?.trim();
  if (!code) throw new InvalidCode("Callback URL has no code parameter");
  return { code, state: params.get("state")?.trim() || null };
}

/**
 * Pull the authorization code out of whatever the user pasted back: a
 * callback URL with a `code` query parameter, `code#state`, or the bare code.
 */
export function parseAuthorizationCode(raw: string): ParsedCode {
  const input = raw.trim();
  if (!input) throw new InvalidCode("Authorization code is empty");

  if (/^https?:\/\//i.test(input) || input.includes("?")) return fromQuery(input);

  const hash = input.indexOf("#");
  if (hash !== -1) {
    const code = input.slice(0, hash).trim();
    if (!code) throw new InvalidCode("Authorization code is empty");
    return { code, state: input.slice(hash + 1).trim() || null };
  }

  if (/\s/.test(input)) throw new InvalidCode("Authorization code must not contain whitespace");
  return { code: input, state: null };
}
