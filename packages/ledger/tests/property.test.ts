/**
 * Property-Based Tests for @ft-ledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence of
 * calls, with failed calls rolled back the way the host does it:
 *
 * 1. Sum of balances equals total supply (conservation)
 * 2. Total supply never grows after initialization
 * 3. Storage usage always equals the fixed records plus one record per account
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { FungibleTokenContract } from "../src/contract.js";
import { TokenError } from "../src/types.js";
import { ACCOUNT_BYTES, MIN_STORAGE, OWNER, createContract, env, selfEnv } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = [OWNER, "u1.test", "u2.test", "dex.test"] as const;

const arbAccount = fc.constantFrom(...ACCOUNTS);

/** Amounts around the interesting range: zero, small, and above any balance. */
const arbAmount = fc.oneof(
  fc.constant(0n),
  fc.bigInt({ min: 1n, max: 1_000n }),
  fc.bigInt({ min: 1n, max: 2_000_000_000_000_000n }),
);

type Op =
  | { readonly kind: "register"; readonly account: string; readonly deposit: bigint }
  | { readonly kind: "transfer"; readonly from: string; readonly to: string; readonly amount: bigint }
  | {
      readonly kind: "transferCall";
      readonly from: string;
      readonly to: string;
      readonly amount: bigint;
      readonly used: string;
      readonly spendFirst: bigint;
    }
  | { readonly kind: "unregister"; readonly account: string; readonly force: boolean };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constant("register" as const),
    account: arbAccount,
    deposit: fc.constantFrom(MIN_STORAGE - 1n, MIN_STORAGE, MIN_STORAGE + 5n),
  }),
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbAccount,
    to: arbAccount,
    amount: arbAmount,
  }),
  fc.record({
    kind: fc.constant("transferCall" as const),
    from: arbAccount,
    to: arbAccount,
    amount: arbAmount,
    used: fc.oneof(fc.bigInt({ min: 0n, max: 2_000n }).map(String), fc.constant("garbage")),
    spendFirst: fc.bigInt({ min: 0n, max: 500n }),
  }),
  fc.record({
    kind: fc.constant("unregister" as const),
    account: fc.constantFrom("u1.test", "u2.test", "dex.test"),
    force: fc.boolean(),
  }),
);

// =============================================================================
// Helpers
// =============================================================================

/** Run one call; on a TokenError restore the checkpoint like the host. */
function atomically(contract: FungibleTokenContract, call: () => unknown): boolean {
  const checkpoint = contract.checkpoint();
  try {
    call();
    return true;
  } catch (err) {
    if (!(err instanceof TokenError)) throw err;
    contract.restore(checkpoint);
    return false;
  }
}

function apply(contract: FungibleTokenContract, op: Op): void {
  switch (op.kind) {
    case "register":
      atomically(contract, () => contract.storageDeposit(env(op.account, op.deposit), {}));
      return;
    case "transfer":
      atomically(contract, () =>
        contract.ftTransfer(env(op.from, 1n), { receiverId: op.to, amount: op.amount.toString() }),
      );
      return;
    case "transferCall": {
      const call = env(op.from, 1n);
      const opened = atomically(contract, () =>
        contract.ftTransferCall(call, {
          receiverId: op.to,
          amount: op.amount.toString(),
          msg: "",
        }),
      );
      if (!opened) return;
      // The receiver may move tokens on before the resolution runs.
      atomically(contract, () =>
        contract.ftTransfer(env(op.to, 1n), {
          receiverId: OWNER,
          amount: op.spendFirst.toString(),
        }),
      );
      atomically(contract, () =>
        contract.ftResolveTransfer(selfEnv(), {
          transferId: call.receiptId,
          outcome: { status: "success", value: op.used },
        }),
      );
      return;
    }
    case "unregister":
      atomically(contract, () =>
        contract.storageUnregister(env(op.account, 1n), { force: op.force }),
      );
      return;
  }
}

function sumOfBalances(contract: FungibleTokenContract): bigint {
  return ACCOUNTS.reduce((sum, account) => sum + BigInt(contract.ftBalanceOf(account)), 0n);
}

// =============================================================================
// Properties
// =============================================================================

describe("property: conservation of supply", () => {
  it("sum of balances equals total supply after any call sequence", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 30 }), (ops) => {
        const contract = createContract();
        for (const op of ops) {
          apply(contract, op);
          expect(sumOfBalances(contract)).toBe(BigInt(contract.ftTotalSupply()));
        }
      }),
      { numRuns: 200 },
    );
  });

  it("total supply never grows", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 30 }), (ops) => {
        const contract = createContract();
        let previous = BigInt(contract.ftTotalSupply());
        for (const op of ops) {
          apply(contract, op);
          const current = BigInt(contract.ftTotalSupply());
          expect(current <= previous).toBe(true);
          previous = current;
        }
      }),
      { numRuns: 100 },
    );
  });
});

describe("property: storage tracks registrations", () => {
  it("each registered account adds exactly one record's bytes", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 30 }), (ops) => {
        const contract = createContract();
        // Owner is registered at initialization.
        const base = contract.storageUsage - ACCOUNT_BYTES;
        for (const op of ops) {
          apply(contract, op);
        }
        const registered = ACCOUNTS.filter((a) => contract.storageBalanceOf(a) !== null).length;
        expect(contract.storageUsage).toBe(base + registered * ACCOUNT_BYTES);
      }),
      { numRuns: 100 },
    );
  });
});
