import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeEach, describe, expect, it } from "vitest";
import type { IAccountRepository } from "../../accounts/account-repository.js";
import { AccountNotFound, ConcurrentUpdateError } from "../../accounts/errors.js";
import { makeNewAccount } from "../../test/accounts.js";
import { createTestDb } from "../../test/db.js";
import { DrizzleAccountRepository } from "./drizzle-account-repository.js";
import { InMemoryAccountRepository } from "./in-memory-account-repository.js";

const pools: PGlite[] = [];

describe("AccountRepository Contract", () => {
  runRepositoryContractTests("InMemoryAccountRepository", async () => new InMemoryAccountRepository());
  runRepositoryContractTests("DrizzleAccountRepository", async () => {
    const { db, pool } = await createTestDb();
    pools.push(pool);
    return new DrizzleAccountRepository(db);
  });

  afterAll(async () => {
    await Promise.all(pools.map((p) => p.close()));
  });
});

function runRepositoryContractTests(name: string, createRepo: () => Promise<IAccountRepository>) {
  describe(name, () => {
    let repo: IAccountRepository;

    beforeEach(async () => {
      repo = await createRepo();
    });

    describe("create / get", () => {
      it("assigns an id and version 0 and round-trips every field", async () => {
        const input = makeNewAccount({
          name: "Primary",
          providerType: "claude-official",
          status: "created",
          tokenExpiresAt: 1_700_000_000_000,
          organizations: ["org-1", "org-2"],
          proxy: { url: "socks5://h:1080" },
          rateLimits: { rpm: 50, tpm: 40_000 },
          metadata: { team: "blue", tier: 2 },
        });
        const created = await repo.create(input);

        expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(created.version).toBe(0);
        const fetched = await repo.get(created.id);
        expect(fetched).toEqual(created);
        expect(fetched?.organizations).toEqual(["org-1", "org-2"]);
        expect(fetched?.proxy).toEqual({ url: "socks5://h:1080" });
        expect(fetched?.rateLimits).toEqual({ rpm: 50, tpm: 40_000 });
        expect(fetched?.metadata).toEqual({ team: "blue", tier: 2 });
      });

      it("returns null for an unknown id", async () => {
        expect(await repo.get("00000000-0000-0000-0000-000000000000")).toBeNull();
      });
    });

    describe("update", () => {
      it("bumps the version on each write", async () => {
        const created = await repo.create(makeNewAccount());
        const first = await repo.update({ ...created, healthScore: 80 });
        const second = await repo.update({ ...first, healthScore: 60 });
        expect(first.version).toBe(1);
        expect(second.version).toBe(2);
        expect((await repo.get(created.id))?.healthScore).toBe(60);
      });

      it("rejects a stale version with ConcurrentUpdateError and keeps the first write", async () => {
        const created = await repo.create(makeNewAccount());
        await repo.update({ ...created, lastError: "first" });
        await expect(repo.update({ ...created, lastError: "second" })).rejects.toBeInstanceOf(ConcurrentUpdateError);
        expect((await repo.get(created.id))?.lastError).toBe("first");
      });

      it("throws AccountNotFound for a missing account", async () => {
        const created = await repo.create(makeNewAccount());
        await expect(repo.update({ ...created, id: "00000000-0000-0000-0000-000000000000" })).rejects.toBeInstanceOf(
          AccountNotFound,
        );
      });

      it("persists circuit state", async () => {
        const created = await repo.create(makeNewAccount());
        const circuit = {
          isBroken: true,
          brokenAt: 1_000,
          isHalfOpen: true,
          consecutiveFailures: 3,
          probeSuccessCount: 0,
          backoffRetryTime: 301_000,
          brokenEpisodes: 2,
        };
        await repo.update({ ...created, status: "error", circuit });
        expect((await repo.get(created.id))?.circuit).toEqual(circuit);
      });
    });

    describe("list", () => {
      it("filters by status, provider and expiry, soonest expiry first", async () => {
        const late = await repo.create(makeNewAccount({ name: "late", tokenExpiresAt: 5_000 }));
        const soon = await repo.create(makeNewAccount({ name: "soon", status: "created", tokenExpiresAt: 2_000 }));
        await repo.create(makeNewAccount({ name: "unknown-expiry", tokenExpiresAt: null }));
        await repo.create(makeNewAccount({ name: "disabled", status: "disabled", tokenExpiresAt: 1_000 }));
        await repo.create(makeNewAccount({ name: "too-late", tokenExpiresAt: 9_000 }));
        await repo.create(makeNewAccount({ name: "claude", providerType: "claude-official", tokenExpiresAt: 1_500 }));

        const page = await repo.list({
          status: ["active", "created"],
          providerTypes: ["codex-cli"],
          expiresBefore: 6_000,
        });
        expect(page.total).toBe(2);
        expect(page.accounts.map((a) => a.id)).toEqual([soon.id, late.id]);
      });

      it("pages through results and reports the full total", async () => {
        for (let i = 0; i < 5; i++) {
          await repo.create(makeNewAccount({ tokenExpiresAt: 1_000 + i }));
        }
        const first = await repo.list({ pageSize: 2, page: 1 });
        const third = await repo.list({ pageSize: 2, page: 3 });
        expect(first.total).toBe(5);
        expect(first.accounts.map((a) => a.tokenExpiresAt)).toEqual([1_000, 1_001]);
        expect(third.accounts.map((a) => a.tokenExpiresAt)).toEqual([1_004]);
      });

      it("selects broken circuits whose backoff is due", async () => {
        const closed = await repo.create(makeNewAccount());
        const due = await repo.create(makeNewAccount());
        const notDue = await repo.create(makeNewAccount());
        const halfOpen = await repo.create(makeNewAccount());
        const broken = (backoffRetryTime: number, isHalfOpen = false) => ({
          isBroken: true,
          brokenAt: 0,
          isHalfOpen,
          consecutiveFailures: 3,
          probeSuccessCount: 0,
          backoffRetryTime,
          brokenEpisodes: 1,
        });
        await repo.update({ ...due, status: "error", circuit: broken(100) });
        await repo.update({ ...notDue, status: "error", circuit: broken(900) });
        await repo.update({ ...halfOpen, status: "error", circuit: broken(50, true) });

        const dueIds = (await repo.list({ circuit: "broken", backoffDueBy: 500 })).accounts.map((a) => a.id);
        expect(dueIds).toEqual([due.id]);
        const halfOpenIds = (await repo.list({ circuit: "half-open" })).accounts.map((a) => a.id);
        expect(halfOpenIds).toEqual([halfOpen.id]);
        const closedIds = (await repo.list({ circuit: "closed" })).accounts.map((a) => a.id);
        expect(closedIds).toEqual([closed.id]);
      });

      it("returns nothing for an empty status list", async () => {
        await repo.create(makeNewAccount());
        expect(await repo.list({ status: [] })).toEqual({ accounts: [], total: 0 });
      });
    });
  });
}
