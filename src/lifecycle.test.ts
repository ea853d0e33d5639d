import { Response } from "undici";
import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config/index.js";
import { InMemoryAccountRepository } from "./infrastructure/persistence/in-memory-account-repository.js";
import { createCredentialLifecycle } from "./lifecycle.js";
import type { FetchFn } from "./oauth/http.js";
import { LruSessionStore } from "./oauth/lru-session-store.js";
import { makeNewAccount } from "./test/accounts.js";
import { RecordingEventSink } from "./test/providers.js";

const NOW = Date.parse("2026-03-01T00:00:00Z");
const config = loadConfig({
  TOKEN_ENCRYPTION_KEY: "00".repeat(32),
  CODEX_OAUTH_CLIENT_ID: "test-codex-client",
  CLAUDE_OAUTH_CLIENT_ID: "test-claude-client",
});

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function setup(fetchFn: FetchFn) {
  const accounts = new InMemoryAccountRepository(() => NOW);
  const events = new RecordingEventSink();
  const lifecycle = createCredentialLifecycle(config, {
    accounts,
    sessions: new LruSessionStore(),
    events,
    fetchFn,
    now: () => NOW,
    sleep: async () => undefined,
  });
  return { accounts, events, lifecycle };
}

describe("createCredentialLifecycle", () => {
  it("registers the built-in providers", () => {
    const { lifecycle } = setup(vi.fn<FetchFn>());
    expect(lifecycle.registry.list().map((p) => p.providerType)).toEqual(["claude-official", "codex-cli"]);
  });

  it("takes an authorization through a socks5 proxy to an active account", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => json({ access_token: "a", refresh_token: "r", expires_in: 3600 }));
    const { accounts, lifecycle } = setup(fetchFn);

    const start = await lifecycle.sessions.beginAuthorization({
      providerType: "codex-cli",
      proxy: { url: "socks5://127.0.0.1:1080" },
    });
    const authUrl = new URL(start.authUrl);
    expect(authUrl.origin).toBe("https://auth.openai.com");
    expect(authUrl.searchParams.get("state")).toBe(start.state);
    expect(authUrl.searchParams.get("client_id")).toBe("test-codex-client");

    const result = await lifecycle.provisioner.completeAuthorization({
      sessionId: start.sessionId,
      rawCode: `https://cb.example/x?code=ac_123&state=${start.state}`,
      name: "Team A",
    });

    expect(result).toMatchObject({ status: "active", tokenExpiresAt: NOW + 3_600_000, healthScore: 100 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://auth.openai.com/oauth/token");
    expect(fetchFn.mock.calls[0]?.[1].dispatcher).toBeDefined();

    const stored = await accounts.get(result.accountId);
    expect(stored?.proxy).toEqual({ url: "socks5://127.0.0.1:1080" });
    expect(stored && lifecycle.cipher.decrypt(stored.encryptedAccessToken)).toBe("a");
    await lifecycle.close();
  });

  it("summarises a batch refresh and stamps every attempt", async () => {
    const fetchFn = vi.fn<FetchFn>(async (_url, init) => {
      const form = new URLSearchParams(String(init.body));
      const refreshToken = form.get("refresh_token") ?? "";
      if (refreshToken.startsWith("bad-")) return json({ error: "invalid_grant" }, 400);
      return json({ access_token: `new-${refreshToken}`, expires_in: 864000 });
    });
    const { accounts, events, lifecycle } = setup(fetchFn);

    const ids: string[] = [];
    for (let i = 0; i < 10; i++) {
      const refreshToken = i % 3 === 1 ? `bad-${i}` : `good-${i}`;
      const account = await accounts.create(
        makeNewAccount({
          name: `acct-${i}`,
          encryptedAccessToken: lifecycle.cipher.encrypt("old"),
          encryptedRefreshToken: lifecycle.cipher.encrypt(refreshToken),
          tokenExpiresAt: NOW + 60 * 60_000,
        }),
      );
      ids.push(account.id);
    }

    const summary = await lifecycle.refresher.refreshExpiring(config.refresh.longLookaheadMs);

    expect(summary).toEqual({ total: 10, succeeded: 7, failed: 3 });
    expect(fetchFn).toHaveBeenCalledTimes(10);
    for (const id of ids) {
      expect((await accounts.get(id))?.lastRefreshAttemptAt).toBe(NOW);
    }
    const broken: string[] = [];
    for (const id of ids) {
      const account = await accounts.get(id);
      if (account?.circuit.isBroken) broken.push(account.name);
    }
    expect(broken.sort()).toEqual(["acct-1", "acct-4", "acct-7"]);
    expect(events.events.filter((e) => e.type === "circuit_broken")).toHaveLength(3);
    await lifecycle.close();
  });

  it("refuses to start without an encryption key", () => {
    expect(() =>
      createCredentialLifecycle(loadConfig({}), { accounts: new InMemoryAccountRepository(), sessions: new LruSessionStore() }),
    ).toThrow("TOKEN_ENCRYPTION_KEY is not configured");
  });
});
