import { describe, expect, it, vi } from "vitest";
import { stubCapability } from "../test/providers.js";
import { InvalidProxyError, SessionExpired, SessionNotFound, SessionPersistError, UnsupportedProvider } from "./errors.js";
import { LruSessionStore } from "./lru-session-store.js";
import { computeCodeChallenge } from "./pkce.js";
import { ProviderRegistry } from "./provider-registry.js";
import { OAuthSessionManager } from "./session-manager.js";
import type { AuthUrlParams } from "./types.js";

const TTL = 10 * 60_000;

function setup(now = () => 1_000) {
  const buildAuthUrl = vi.fn((p: AuthUrlParams) => `https://auth.example/authorize?state=${p.state}`);
  const registry = new ProviderRegistry().register(
    stubCapability({
      buildAuthUrl,
      defaultRedirectUri: "http://localhost:1455/auth/callback",
      defaultScopes: ["openid", "offline_access"],
    }),
  );
  const sessions = new LruSessionStore();
  const manager = new OAuthSessionManager({ registry, sessions, ttlMs: TTL, now });
  return { manager, sessions, buildAuthUrl };
}

describe("OAuthSessionManager", () => {
  describe("beginAuthorization", () => {
    it("persists a PKCE session and returns the provider URL", async () => {
      const { manager, sessions, buildAuthUrl } = setup();

      const start = await manager.beginAuthorization({
        providerType: "codex-cli",
        proxy: { url: "socks5://127.0.0.1:1080" },
        metadata: { invitedBy: "ops" },
      });

      const session = await sessions.get(start.sessionId);
      expect(session).not.toBeNull();
      expect(session?.codeVerifier).toMatch(/^[0-9a-f]{128}$/);
      expect(session?.codeChallenge).toBe(computeCodeChallenge(session?.codeVerifier ?? ""));
      expect(session?.state).toBe(start.state);
      expect(session?.proxy).toEqual({ url: "socks5://127.0.0.1:1080" });
      expect(session?.metadata).toEqual({ invitedBy: "ops" });
      expect(session?.expiresAt).toBe(1_000 + TTL);
      expect(start.expiresAt).toBe(1_000 + TTL);
      expect(start.authUrl).toBe(`https://auth.example/authorize?state=${start.state}`);
      expect(buildAuthUrl).toHaveBeenCalledWith({
        codeChallenge: session?.codeChallenge,
        state: start.state,
        redirectUri: "http://localhost:1455/auth/callback",
        scopes: ["openid", "offline_access"],
      });
    });

    it("uses caller-supplied redirect URI and scopes", async () => {
      const { manager, sessions } = setup();
      const start = await manager.beginAuthorization({
        providerType: "codex-cli",
        redirectUri: "https://relay.example/cb",
        scopes: ["openid"],
      });
      const session = await sessions.get(start.sessionId);
      expect(session?.redirectUri).toBe("https://relay.example/cb");
      expect(session?.scopes).toEqual(["openid"]);
    });

    it("generates distinct sessions, verifiers and states", async () => {
      const { manager, sessions } = setup();
      const a = await manager.beginAuthorization({ providerType: "codex-cli" });
      const b = await manager.beginAuthorization({ providerType: "codex-cli" });
      expect(a.sessionId).not.toBe(b.sessionId);
      expect(a.state).not.toBe(b.state);
      expect((await sessions.get(a.sessionId))?.codeVerifier).not.toBe((await sessions.get(b.sessionId))?.codeVerifier);
    });

    it("returns no URL when the store write fails", async () => {
      const { manager, sessions, buildAuthUrl } = setup();
      vi.spyOn(sessions, "set").mockRejectedValue(new Error("store down"));

      await expect(manager.beginAuthorization({ providerType: "codex-cli" })).rejects.toBeInstanceOf(
        SessionPersistError,
      );
      expect(buildAuthUrl).not.toHaveBeenCalled();
    });

    it("rejects unknown providers and bad proxies before storing anything", async () => {
      const { manager, sessions } = setup();
      await expect(manager.beginAuthorization({ providerType: "claude-console" })).rejects.toBeInstanceOf(
        UnsupportedProvider,
      );
      await expect(
        manager.beginAuthorization({ providerType: "codex-cli", proxy: { url: "ftp://proxy:21" } }),
      ).rejects.toBeInstanceOf(InvalidProxyError);
      expect(sessions.size).toBe(0);
    });
  });

  describe("consumeSession", () => {
    it("hands a session out once", async () => {
      const { manager } = setup();
      const { sessionId } = await manager.beginAuthorization({ providerType: "codex-cli" });

      expect((await manager.consumeSession(sessionId)).sessionId).toBe(sessionId);
      await expect(manager.consumeSession(sessionId)).rejects.toBeInstanceOf(SessionNotFound);
    });

    it("treats a session past its expiry as expired even if the store still has it", async () => {
      let clock = 1_000;
      const { manager, sessions } = setup(() => clock);
      const { sessionId } = await manager.beginAuthorization({ providerType: "codex-cli" });
      clock += TTL;

      await expect(manager.consumeSession(sessionId)).rejects.toBeInstanceOf(SessionExpired);
      expect(await sessions.get(sessionId)).toBeNull();
    });
  });
});
