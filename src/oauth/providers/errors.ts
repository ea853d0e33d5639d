/** Advisory validation rejected a stored access token. */
export class InvalidAccessTokenError extends Error {
  readonly code = "INVALID_ACCESS_TOKEN";

  constructor(reason: string) {
    super(`Access token failed validation: ${reason}`);
    this.name = "InvalidAccessTokenError";
  }
}
