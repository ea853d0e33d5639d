import type { Account, AccountFilter, AccountPage, NewAccount } from "./repository-types.js";

/**
 * Account persistence contract.
 *
 * `update` is a compare-and-swap on `account.version`: it throws
 * ConcurrentUpdateError when the stored version differs and AccountNotFound
 * when the row is gone. The returned account carries the bumped version.
 */
export interface IAccountRepository {
  get(id: string): Promise<Account | null>;
  create(input: NewAccount): Promise<Account>;
  update(account: Account): Promise<Account>;
  /** Ordered by tokenExpiresAt (soonest first, unknown last), then id. */
  list(filter: AccountFilter): Promise<AccountPage>;
}
