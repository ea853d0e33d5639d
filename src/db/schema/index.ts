export * from "./oauth-accounts.js";
export * from "./oauth-sessions.js";
