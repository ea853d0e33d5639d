import type { IAccountRepository } from "./account-repository.js";
import { AccountNotFound, ConcurrentUpdateError } from "./errors.js";
import type { Account } from "./repository-types.js";

const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Read-modify-write with optimistic concurrency. `apply` must be pure: it is
 * re-run against a fresh read whenever another writer wins the race.
 * Returning null from `apply` leaves the account untouched.
 */
export async function mutateAccount(
  repo: IAccountRepository,
  accountId: string,
  apply: (current: Account) => Account | null,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): Promise<Account> {
  let lastConflict: ConcurrentUpdateError | null = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const current = await repo.get(accountId);
    if (!current) throw new AccountNotFound(accountId);
    const next = apply(current);
    if (next === null) return current;
    try {
      return await repo.update(next);
    } catch (err) {
      if (!(err instanceof ConcurrentUpdateError)) throw err;
      lastConflict = err;
    }
  }
  throw lastConflict ?? new ConcurrentUpdateError(accountId, -1);
}
