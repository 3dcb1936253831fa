/**
 * @ft-ledger/ledger — Account registry.
 *
 * Registration is the presence of a balance record. Account IDs are hashed
 * into fixed 32-byte keys under the `"a"` prefix, so every record costs the
 * same number of storage bytes regardless of the ID's length.
 *
 * Rules:
 * - A new registration starts at balance 0
 * - Only zero-balance accounts may leave, unless forced
 * - A forced removal burns the remaining balance out of total supply
 */

import { createHash } from "node:crypto";
import type { AccountId } from "@ft-ledger/types";
import { isAccountId } from "@ft-ledger/types";
import type { EventEmitter } from "./events.js";
import type { RootStore } from "./state.js";
import type { MeteredStorage } from "./storage.js";
import { prefixedKey } from "./storage.js";
import { TokenError } from "./types.js";
import { decodeU128, encodeU128, formatU128 } from "./u128.js";

export const BALANCES_PREFIX = "a";

/** Longest valid account ID; used to measure the cost of one record. */
const LONGEST_ACCOUNT_ID = "a".repeat(64);

export function accountKey(accountId: AccountId): Uint8Array {
  return prefixedKey(BALANCES_PREFIX, createHash("sha256").update(accountId).digest());
}

/**
 * Throw INVALID_ACCOUNT_ID unless the value is a well-formed account ID.
 */
export function assertAccountId(value: unknown, field = "account_id"): AccountId {
  if (!isAccountId(value)) {
    throw new TokenError("INVALID_ACCOUNT_ID", `Invalid ${field}: "${String(value)}"`);
  }
  return value;
}

/**
 * Outcome of removing an account.
 */
export interface UnregisterResult {
  readonly accountId: AccountId;
  readonly burned: bigint;
}

export class AccountRegistry {
  constructor(
    private readonly _storage: MeteredStorage,
    private readonly _root: RootStore,
    private readonly _emitter: EventEmitter,
  ) {}

  // ─── Reads ───────────────────────────────────────────────────────────

  isRegistered(accountId: AccountId): boolean {
    return this._storage.has(accountKey(accountId));
  }

  /**
   * Balance of a registered account, undefined otherwise.
   */
  balanceOf(accountId: AccountId): bigint | undefined {
    const raw = this._storage.read(accountKey(accountId));
    return raw === undefined ? undefined : decodeU128(raw);
  }

  /**
   * Balance of an account that must be registered.
   */
  assertRegistered(accountId: AccountId): bigint {
    const balance = this.balanceOf(accountId);
    if (balance === undefined) {
      throw new TokenError(
        "ACCOUNT_NOT_REGISTERED",
        `The account ${accountId} is not registered`,
      );
    }
    return balance;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  setBalance(accountId: AccountId, balance: bigint): void {
    this.assertRegistered(accountId);
    this._storage.write(accountKey(accountId), encodeU128(balance));
  }

  /**
   * Create a zero-balance entry.
   * @returns false if the account was already registered (no state change)
   */
  register(accountId: AccountId): boolean {
    if (this.isRegistered(accountId)) return false;
    this._storage.write(accountKey(accountId), encodeU128(0n));
    return true;
  }

  /**
   * Remove an account. A non-zero balance requires `force` and is burned.
   */
  unregister(accountId: AccountId, force: boolean): UnregisterResult {
    const balance = this.assertRegistered(accountId);
    if (balance > 0n && !force) {
      throw new TokenError(
        "UNAUTHORIZED_UNREGISTER",
        "Can't unregister the account with the positive balance without force",
      );
    }

    this._storage.remove(accountKey(accountId));

    if (balance > 0n) {
      const { totalSupply } = this._root.load();
      this._root.setTotalSupply(totalSupply - balance);
      this._emitter.emit("ft_burn", {
        owner_id: accountId,
        amount: formatU128(balance),
      });
    }
    this._emitter.log(`Closed @${accountId} with ${formatU128(balance)}`);

    return { accountId, burned: balance };
  }

  // ─── Storage cost ────────────────────────────────────────────────────

  /**
   * Bytes one balance record occupies, measured by writing and removing a
   * placeholder record.
   */
  measureAccountStorageUsage(): bigint {
    const before = this._storage.usage;
    const key = accountKey(LONGEST_ACCOUNT_ID);
    this._storage.write(key, encodeU128(0n));
    const usage = this._storage.usage - before;
    this._storage.remove(key);
    return BigInt(usage);
  }
}
