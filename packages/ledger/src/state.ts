/**
 * @ft-ledger/ledger — Root contract state.
 *
 * Stored under `"STATE"` as `total_supply` (u128 LE) followed by
 * `account_storage_usage` (u64 LE). Its presence is what "initialized"
 * means; the value has a fixed width so rewriting it never changes the
 * byte count.
 */

import type { MeteredStorage } from "./storage.js";
import { utf8 } from "./storage.js";
import { TokenError } from "./types.js";
import { decodeU128, decodeU64, encodeU128, encodeU64 } from "./u128.js";

export const STATE_KEY = utf8("STATE");

export interface RootState {
  readonly totalSupply: bigint;
  /** Bytes one balance record costs */
  readonly accountStorageUsage: bigint;
}

export class RootStore {
  constructor(private readonly _storage: MeteredStorage) {}

  exists(): boolean {
    return this._storage.has(STATE_KEY);
  }

  /**
   * Read the root state. Throws NOT_INITIALIZED before `initialize`.
   */
  load(): RootState {
    const raw = this._storage.read(STATE_KEY);
    if (raw === undefined) {
      throw new TokenError("NOT_INITIALIZED", "The contract is not initialized");
    }
    return {
      totalSupply: decodeU128(raw.subarray(0, 16)),
      accountStorageUsage: decodeU64(raw.subarray(16, 24)),
    };
  }

  save(state: RootState): void {
    const value = new Uint8Array(24);
    value.set(encodeU128(state.totalSupply), 0);
    value.set(encodeU64(state.accountStorageUsage), 16);
    this._storage.write(STATE_KEY, value);
  }

  setTotalSupply(totalSupply: bigint): void {
    this.save({ ...this.load(), totalSupply });
  }
}
