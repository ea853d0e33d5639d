import { randomUUID } from "node:crypto";
import type { IAccountRepository } from "../../accounts/account-repository.js";
import { AccountNotFound, ConcurrentUpdateError } from "../../accounts/errors.js";
import {
  type Account,
  type AccountFilter,
  type AccountPage,
  DEFAULT_PAGE_SIZE,
  type NewAccount,
} from "../../accounts/repository-types.js";

function clone(account: Account): Account {
  return structuredClone(account);
}

function matches(account: Account, filter: AccountFilter): boolean {
  if (filter.status && !filter.status.includes(account.status)) return false;
  if (filter.providerTypes && !filter.providerTypes.includes(account.providerType)) return false;
  if (filter.expiresBefore !== undefined) {
    if (account.tokenExpiresAt === null || account.tokenExpiresAt >= filter.expiresBefore) return false;
  }
  const { circuit } = account;
  if (filter.circuit === "closed" && circuit.isBroken) return false;
  if (filter.circuit === "broken" && (!circuit.isBroken || circuit.isHalfOpen)) return false;
  if (filter.circuit === "half-open" && !circuit.isHalfOpen) return false;
  if (filter.backoffDueBy !== undefined) {
    if (!circuit.isBroken || circuit.backoffRetryTime === null || circuit.backoffRetryTime > filter.backoffDueBy) {
      return false;
    }
  }
  return true;
}

function byExpiryThenId(a: Account, b: Account): number {
  const ea = a.tokenExpiresAt ?? Number.POSITIVE_INFINITY;
  const eb = b.tokenExpiresAt ?? Number.POSITIVE_INFINITY;
  if (ea !== eb) return ea < eb ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Same contract as DrizzleAccountRepository, including the version check. */
export class InMemoryAccountRepository implements IAccountRepository {
  private readonly accounts = new Map<string, Account>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(id: string): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? clone(account) : null;
  }

  async create(input: NewAccount): Promise<Account> {
    const now = this.now();
    const account: Account = { ...structuredClone(input), id: randomUUID(), version: 0, createdAt: now, updatedAt: now };
    this.accounts.set(account.id, account);
    return clone(account);
  }

  async update(account: Account): Promise<Account> {
    const stored = this.accounts.get(account.id);
    if (!stored) throw new AccountNotFound(account.id);
    if (stored.version !== account.version) throw new ConcurrentUpdateError(account.id, account.version);
    const next: Account = {
      ...clone(account),
      createdAt: stored.createdAt,
      version: stored.version + 1,
      updatedAt: this.now(),
    };
    this.accounts.set(account.id, next);
    return clone(next);
  }

  async list(filter: AccountFilter): Promise<AccountPage> {
    const all = [...this.accounts.values()].filter((a) => matches(a, filter)).sort(byExpiryThenId);
    const pageSize = filter.pageSize ?? DEFAULT_PAGE_SIZE;
    const page = Math.max(1, filter.page ?? 1);
    const start = (page - 1) * pageSize;
    return { accounts: all.slice(start, start + pageSize).map(clone), total: all.length };
  }
}
