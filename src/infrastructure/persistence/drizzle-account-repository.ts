import { randomUUID } from "node:crypto";
import { and, asc, count, eq, inArray, isNotNull, lt, lte, type SQL } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { oauthAccounts } from "../../db/schema/index.js";
import { providerTypeSchema } from "../../oauth/types.js";
import type { IAccountRepository } from "../../accounts/account-repository.js";
import { AccountNotFound, ConcurrentUpdateError } from "../../accounts/errors.js";
import {
  type Account,
  type AccountFilter,
  type AccountPage,
  DEFAULT_PAGE_SIZE,
  isAccountStatus,
  type NewAccount,
} from "../../accounts/repository-types.js";

type AccountRow = typeof oauthAccounts.$inferSelect;
type AccountValues = Omit<typeof oauthAccounts.$inferInsert, "id" | "createdAt" | "version">;

function toValues(account: NewAccount): AccountValues {
  return {
    name: account.name,
    description: account.description,
    providerType: account.providerType,
    status: account.status,
    healthScore: account.healthScore,
    encryptedAccessToken: account.encryptedAccessToken,
    encryptedRefreshToken: account.encryptedRefreshToken,
    encryptedIdToken: account.encryptedIdToken,
    tokenExpiresAt: account.tokenExpiresAt,
    organizations: account.organizations,
    proxyUrl: account.proxy?.url ?? null,
    rpmLimit: account.rateLimits.rpm,
    tpmLimit: account.rateLimits.tpm,
    circuitIsBroken: account.circuit.isBroken,
    circuitBrokenAt: account.circuit.brokenAt,
    circuitIsHalfOpen: account.circuit.isHalfOpen,
    consecutiveFailures: account.circuit.consecutiveFailures,
    probeSuccessCount: account.circuit.probeSuccessCount,
    backoffRetryAt: account.circuit.backoffRetryTime,
    brokenEpisodes: account.circuit.brokenEpisodes,
    metadata: account.metadata,
    lastRefreshAttemptAt: account.lastRefreshAttemptAt,
    lastRefreshedAt: account.lastRefreshedAt,
    lastValidatedAt: account.lastValidatedAt,
    lastError: account.lastError,
    lastErrorAt: account.lastErrorAt,
    updatedAt: Date.now(),
  };
}

function toAccount(row: AccountRow): Account {
  if (!isAccountStatus(row.status)) {
    throw new Error(`Account ${row.id} has unknown status "${row.status}"`);
  }
  const providerType = providerTypeSchema.safeParse(row.providerType);
  if (!providerType.success) {
    throw new Error(`Account ${row.id} has unknown provider type "${row.providerType}"`);
  }
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    providerType: providerType.data,
    status: row.status,
    healthScore: row.healthScore,
    encryptedAccessToken: row.encryptedAccessToken,
    encryptedRefreshToken: row.encryptedRefreshToken,
    encryptedIdToken: row.encryptedIdToken,
    tokenExpiresAt: row.tokenExpiresAt,
    organizations: row.organizations,
    proxy: row.proxyUrl ? { url: row.proxyUrl } : null,
    rateLimits: { rpm: row.rpmLimit, tpm: row.tpmLimit },
    circuit: {
      isBroken: row.circuitIsBroken,
      brokenAt: row.circuitBrokenAt,
      isHalfOpen: row.circuitIsHalfOpen,
      consecutiveFailures: row.consecutiveFailures,
      probeSuccessCount: row.probeSuccessCount,
      backoffRetryTime: row.backoffRetryAt,
      brokenEpisodes: row.brokenEpisodes,
    },
    metadata: row.metadata,
    version: row.version,
    lastRefreshAttemptAt: row.lastRefreshAttemptAt,
    lastRefreshedAt: row.lastRefreshedAt,
    lastValidatedAt: row.lastValidatedAt,
    lastError: row.lastError,
    lastErrorAt: row.lastErrorAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleAccountRepository implements IAccountRepository {
  constructor(private readonly db: DrizzleDb) {}

  async get(id: string): Promise<Account | null> {
    const rows = await this.db.select().from(oauthAccounts).where(eq(oauthAccounts.id, id));
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async create(input: NewAccount): Promise<Account> {
    const values = toValues(input);
    const rows = await this.db
      .insert(oauthAccounts)
      .values({ ...values, id: randomUUID(), version: 0, createdAt: values.updatedAt })
      .returning();
    const row = rows[0];
    if (!row) throw new Error("Insert into oauth_accounts returned no row");
    return toAccount(row);
  }

  async update(account: Account): Promise<Account> {
    const rows = await this.db
      .update(oauthAccounts)
      .set({ ...toValues(account), version: account.version + 1 })
      .where(and(eq(oauthAccounts.id, account.id), eq(oauthAccounts.version, account.version)))
      .returning();
    const row = rows[0];
    if (row) return toAccount(row);

    const existing = await this.db
      .select({ id: oauthAccounts.id })
      .from(oauthAccounts)
      .where(eq(oauthAccounts.id, account.id));
    if (existing.length === 0) throw new AccountNotFound(account.id);
    throw new ConcurrentUpdateError(account.id, account.version);
  }

  async list(filter: AccountFilter): Promise<AccountPage> {
    if (filter.status?.length === 0 || filter.providerTypes?.length === 0) {
      return { accounts: [], total: 0 };
    }
    const where = and(...this.conditions(filter));
    const pageSize = filter.pageSize ?? DEFAULT_PAGE_SIZE;
    const page = Math.max(1, filter.page ?? 1);

    const [totals, rows] = await Promise.all([
      this.db.select({ total: count() }).from(oauthAccounts).where(where),
      this.db
        .select()
        .from(oauthAccounts)
        .where(where)
        .orderBy(asc(oauthAccounts.tokenExpiresAt), asc(oauthAccounts.id))
        .limit(pageSize)
        .offset((page - 1) * pageSize),
    ]);
    return { accounts: rows.map(toAccount), total: totals[0]?.total ?? 0 };
  }

  private conditions(filter: AccountFilter): SQL[] {
    const conds: SQL[] = [];
    if (filter.status) conds.push(inArray(oauthAccounts.status, filter.status));
    if (filter.providerTypes) conds.push(inArray(oauthAccounts.providerType, filter.providerTypes));
    if (filter.expiresBefore !== undefined) {
      conds.push(isNotNull(oauthAccounts.tokenExpiresAt), lt(oauthAccounts.tokenExpiresAt, filter.expiresBefore));
    }
    switch (filter.circuit) {
      case "closed":
        conds.push(eq(oauthAccounts.circuitIsBroken, false));
        break;
      case "broken":
        conds.push(eq(oauthAccounts.circuitIsBroken, true), eq(oauthAccounts.circuitIsHalfOpen, false));
        break;
      case "half-open":
        conds.push(eq(oauthAccounts.circuitIsHalfOpen, true));
        break;
    }
    if (filter.backoffDueBy !== undefined) {
      conds.push(eq(oauthAccounts.circuitIsBroken, true), lte(oauthAccounts.backoffRetryAt, filter.backoffDueBy));
    }
    return conds;
  }
}
