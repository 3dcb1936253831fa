/**
 * Shared fixtures for contract tests.
 */

import type { CallEnv } from "../src/types.js";
import { FungibleTokenContract } from "../src/contract.js";

export const CONTRACT_ID = "token.test";
export const OWNER = "owner.test";
export const TOTAL_SUPPLY = "1000000000000000";

/** Small byte price so storage amounts stay readable. */
export const BYTE_COST = 10n;

/** One balance record: 1 + 32 + 16 + 40 bytes. */
export const ACCOUNT_BYTES = 89;
export const MIN_STORAGE = 890n;

let receipts = 0;

export function env(predecessorAccountId: string, attachedDeposit = 0n): CallEnv {
  receipts++;
  return {
    currentAccountId: CONTRACT_ID,
    predecessorAccountId,
    attachedDeposit,
    receiptId: `rcpt-${String(receipts)}`,
  };
}

/** A call made by the contract to itself (transfer resolution). */
export function selfEnv(): CallEnv {
  return env(CONTRACT_ID);
}

export function createContract(): FungibleTokenContract {
  const contract = new FungibleTokenContract({ storageByteCost: BYTE_COST });
  contract.initializeWithDefaultMetadata(env(OWNER), {
    ownerId: OWNER,
    totalSupply: TOTAL_SUPPLY,
    name: "Test Token",
    symbol: "TST",
    decimals: 18,
  });
  return contract;
}

export function register(contract: FungibleTokenContract, accountId: string): void {
  contract.storageDeposit(env(accountId, MIN_STORAGE), {});
}
