/**
 * Tests for LocalHost: atomic calls, refunds, event persistence and the
 * transfer-call message queue.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { InMemoryEventStore, createTokenEventCatalog } from "@ft-ledger/event-store";
import type { AppendResult } from "@ft-ledger/event-store";
import type { DomainEvent } from "@ft-ledger/types";
import { LocalHost } from "../src/local-host.js";
import type { LocalHostOptions } from "../src/local-host.js";
import type { CallReceipt, TokenReceiver } from "../src/types.js";
import { HostError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const CONTRACT = "token.test";
const OWNER = "owner.test";
const NOW = "2025-01-01T00:00:00.000Z";

function createHost(options?: Partial<LocalHostOptions>): LocalHost {
  const host = new LocalHost({
    contractId: CONTRACT,
    storageByteCost: 10n,
    now: () => NOW,
    ...options,
  });
  host.call(
    "initialize_default",
    { predecessorAccountId: OWNER },
    { ownerId: OWNER, totalSupply: "1000", name: "Test Token", symbol: "TST" },
  );
  return host;
}

function register(host: LocalHost, accountId: string): void {
  const receipt = host.call(
    "storage_deposit",
    { predecessorAccountId: accountId, attachedDeposit: 890n },
    {},
  );
  expect(receipt.status).toBe("success");
}

function valueOf<T>(receipt: CallReceipt<T>): T {
  if (receipt.status === "failure") {
    throw new Error(`Call failed: ${receipt.error.message}`);
  }
  return receipt.value;
}

function eventTypes(host: LocalHost): string[] {
  return host.eventStore.read(CONTRACT).map((stored) => stored.event.type);
}

class FlakyStore extends InMemoryEventStore {
  failing = false;

  override append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    if (this.failing) throw new Error("store offline");
    return super.append(streamId, events);
  }
}

// =============================================================================
// Calls
// =============================================================================

describe("call", () => {
  it("initializes the contract and commits the mint event", () => {
    const host = new LocalHost({ contractId: CONTRACT, storageByteCost: 10n, now: () => NOW });

    const receipt = host.call(
      "initialize_default",
      { predecessorAccountId: OWNER, attachedDeposit: 5n },
      { ownerId: OWNER, totalSupply: "1000", name: "Test Token", symbol: "TST" },
    );

    expect(receipt).toEqual({
      status: "success",
      receiptId: "rcpt-1",
      method: "initialize_default",
      value: null,
      payouts: [{ receiverId: OWNER, amount: 5n, reason: "deposit_refund" }],
      logs: [
        'EVENT_JSON:{"standard":"nep141","version":"1.0.0","event":"ft_mint","data":[{"owner_id":"owner.test","amount":"1000","memo":"Initial tokens supply is minted"}]}',
      ],
      events: [
        {
          type: "ft_mint",
          metadata: {
            eventId: "rcpt-1:0",
            timestamp: NOW,
            actor: OWNER,
            correlationId: "rcpt-1",
            source: "ledger",
          },
          payload: { owner_id: OWNER, amount: "1000", memo: "Initial tokens supply is minted" },
        },
      ],
    });
    expect(host.eventStore.read(CONTRACT)).toHaveLength(1);
    expect(host.contract.ftBalanceOf(OWNER)).toBe("1000");
  });

  it("numbers receipts in call order", () => {
    const host = createHost();
    const receipt = host.call("storage_deposit", { predecessorAccountId: "u1.test", attachedDeposit: 890n }, {});
    expect(receipt.receiptId).toBe("rcpt-2");
  });

  it("turns a contract error into a failed receipt that refunds the deposit", () => {
    const host = createHost();

    const receipt = host.call(
      "ft_transfer",
      { predecessorAccountId: "bob.test", attachedDeposit: 1n },
      { receiverId: OWNER, amount: "1" },
    );

    expect(receipt.status).toBe("failure");
    if (receipt.status !== "failure") return;
    expect(receipt.error.code).toBe("ACCOUNT_NOT_REGISTERED");
    expect(receipt.error.message).toBe("The account bob.test is not registered");
    expect(receipt.payouts).toEqual([
      { receiverId: "bob.test", amount: 1n, reason: "deposit_refund" },
    ]);
    expect(host.creditedTo("bob.test")).toBe(1n);
    expect(host.eventStore.read(CONTRACT)).toHaveLength(1);
  });

  it("leaves storage untouched when a registration is underfunded", () => {
    const host = createHost();
    const usage = host.contract.storageUsage;

    const receipt = host.call(
      "storage_deposit",
      { predecessorAccountId: "u1.test", attachedDeposit: 889n },
      {},
    );

    expect(receipt.status).toBe("failure");
    if (receipt.status !== "failure") return;
    expect(receipt.error.code).toBe("INSUFFICIENT_DEPOSIT");
    expect(host.contract.storageUsage).toBe(usage);
    expect(host.contract.storageBalanceOf("u1.test")).toBeNull();
  });

  it("fails every mutation before initialization", () => {
    const host = new LocalHost({ contractId: CONTRACT, storageByteCost: 10n });

    const receipt = host.call(
      "storage_deposit",
      { predecessorAccountId: "u1.test", attachedDeposit: 890n },
      {},
    );

    expect(receipt.status).toBe("failure");
    if (receipt.status !== "failure") return;
    expect(receipt.error.code).toBe("NOT_INITIALIZED");
    expect(receipt.payouts).toEqual([
      { receiverId: "u1.test", amount: 890n, reason: "deposit_refund" },
    ]);
    expect(host.contract.isInitialized()).toBe(false);
  });

  it("restores the contract and rethrows when the event store fails", () => {
    const store = new FlakyStore({ catalog: createTokenEventCatalog() });
    const host = createHost({ eventStore: store });
    register(host, "u1.test");
    store.failing = true;

    expect(() =>
      host.call(
        "ft_transfer",
        { predecessorAccountId: OWNER, attachedDeposit: 1n },
        { receiverId: "u1.test", amount: "10" },
      ),
    ).toThrow("store offline");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("1000");
    expect(host.contract.ftBalanceOf("u1.test")).toBe("0");
  });

  it("rejects a negative deposit", () => {
    const host = createHost();
    expect(() =>
      host.call("storage_deposit", { predecessorAccountId: "u1.test", attachedDeposit: -1n }, {}),
    ).toThrow(HostError);
  });

  it("refunds a second registration in full", () => {
    const host = createHost();
    register(host, "u1.test");

    const receipt = host.call(
      "storage_deposit",
      { predecessorAccountId: "u1.test", attachedDeposit: 890n },
      {},
    );

    expect(receipt.status).toBe("success");
    if (receipt.status !== "success") return;
    expect(receipt.payouts).toEqual([
      { receiverId: "u1.test", amount: 890n, reason: "deposit_refund" },
    ]);
    expect(receipt.logs).toEqual(["The account is already registered, refunding the deposit"]);
    expect(receipt.events).toEqual([]);
  });

  it("pays released storage back on unregister", () => {
    const host = createHost();
    register(host, "u1.test");

    const receipt = host.call(
      "storage_unregister",
      { predecessorAccountId: "u1.test", attachedDeposit: 1n },
      {},
    );

    expect(valueOf(receipt)).toBe(true);
    expect(receipt.payouts).toEqual([
      { receiverId: "u1.test", amount: 1n, reason: "deposit_refund" },
      { receiverId: "u1.test", amount: 890n, reason: "storage_release" },
    ]);
    expect(host.creditedTo("u1.test")).toBe(891n);
  });

  it("refuses resolution calls from anyone but the contract", () => {
    const host = createHost();

    const receipt = host.call(
      "ft_resolve_transfer",
      { predecessorAccountId: OWNER },
      { transferId: "rcpt-1", outcome: { status: "success", value: "0" } },
    );

    expect(receipt.status).toBe("failure");
    if (receipt.status !== "failure") return;
    expect(receipt.error.message).toBe("Method ft_resolve_transfer is private");
  });
});

// =============================================================================
// Transfer-call
// =============================================================================

describe("ftTransferCall", () => {
  function setup(ftOnTransfer?: TokenReceiver["ftOnTransfer"]): LocalHost {
    const host = createHost();
    register(host, "dex.test");
    if (ftOnTransfer !== undefined) {
      host.registerReceiver("dex.test", { ftOnTransfer });
    }
    return host;
  }

  function sendToDex(host: LocalHost, amount = "100"): Promise<CallReceipt<string>> {
    return host.ftTransferCall(
      { predecessorAccountId: OWNER, attachedDeposit: 1n },
      { receiverId: "dex.test", amount, msg: "swap" },
    );
  }

  it("keeps the whole amount with the receiver when it uses everything", async () => {
    const host = setup(() => "100");

    expect(valueOf(await sendToDex(host))).toBe("100");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("900");
    expect(host.contract.ftBalanceOf("dex.test")).toBe("100");
    expect(eventTypes(host)).toEqual([
      "ft_mint",
      "storage_deposit",
      "ft_transfer",
      "ft_transfer_settled",
    ]);
  });

  it("restores the sender fully when the receiver uses nothing", async () => {
    const host = setup(() => "0");

    expect(valueOf(await sendToDex(host))).toBe("0");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("1000");
    expect(host.contract.ftBalanceOf("dex.test")).toBe("0");
    expect(host.contract.pendingTransfers()).toEqual([]);
  });

  it("refunds the unused part", async () => {
    const host = setup(() => "30");

    expect(valueOf(await sendToDex(host))).toBe("30");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("930");
    expect(host.contract.ftBalanceOf("dex.test")).toBe("70");
  });

  it("passes sender, amount and message to an async receiver", async () => {
    const seen: string[][] = [];
    const host = setup(async (senderId, amount, msg) => {
      seen.push([senderId, amount, msg]);
      return amount;
    });

    await sendToDex(host);

    expect(seen).toEqual([[OWNER, "100", "swap"]]);
  });

  it("treats a throwing receiver as a full reversal", async () => {
    const host = setup(() => {
      throw new Error("pool closed");
    });

    expect(valueOf(await sendToDex(host))).toBe("0");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("1000");
  });

  it("treats an account without a receiver as a full reversal", async () => {
    const host = setup();

    expect(valueOf(await sendToDex(host))).toBe("0");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("1000");
  });

  it("refunds only what the receiver still holds", async () => {
    const host = setup();
    host.registerReceiver("dex.test", {
      ftOnTransfer: () => {
        register(host, "u1.test");
        host.call(
          "ft_transfer",
          { predecessorAccountId: "dex.test", attachedDeposit: 1n },
          { receiverId: "u1.test", amount: "80" },
        );
        return "0";
      },
    });

    expect(valueOf(await sendToDex(host))).toBe("80");
    expect(host.contract.ftBalanceOf(OWNER)).toBe("920");
    expect(host.contract.ftBalanceOf("u1.test")).toBe("80");
    expect(host.contract.ftBalanceOf("dex.test")).toBe("0");
  });

  it("returns the Phase 1 failure without queueing anything", async () => {
    const host = setup();

    const receipt = await host.ftTransferCall(
      { predecessorAccountId: OWNER, attachedDeposit: 1n },
      { receiverId: "nobody.test", amount: "100", msg: "" },
    );

    expect(receipt.status).toBe("failure");
    if (receipt.status !== "failure") return;
    expect(receipt.error.code).toBe("ACCOUNT_NOT_REGISTERED");
    expect(host.queued).toBe(0);
  });
});

describe("drain", () => {
  it("burns the refund when the sender unregistered before resolution", async () => {
    const host = createHost();
    register(host, "dex.test");
    register(host, "u1.test");
    host.call(
      "ft_transfer",
      { predecessorAccountId: OWNER, attachedDeposit: 1n },
      { receiverId: "u1.test", amount: "100" },
    );
    host.registerReceiver("dex.test", { ftOnTransfer: () => "0" });

    const opened = host.call(
      "ft_transfer_call",
      { predecessorAccountId: "u1.test", attachedDeposit: 1n },
      { receiverId: "dex.test", amount: "100", msg: "" },
    );
    const transferId = valueOf(opened);
    expect(host.queued).toBe(1);

    expect(
      valueOf(
        host.call(
          "storage_unregister",
          { predecessorAccountId: "u1.test", attachedDeposit: 1n },
          { force: true },
        ),
      ),
    ).toBe(true);

    const resolved = await host.drain();

    expect(resolved).toHaveLength(1);
    expect(resolved[0]!.transferId).toBe(transferId);
    const receipt = resolved[0]!.receipt;
    expect(valueOf(receipt)).toBe("100");
    if (receipt.status !== "success") return;
    expect(receipt.logs[0]).toBe("Account @u1.test burned 100");
    expect(host.contract.ftTotalSupply()).toBe("900");
    expect(host.contract.ftBalanceOf("dex.test")).toBe("0");
    expect(host.queued).toBe(0);
  });

  it("delivers continuations oldest first", async () => {
    const host = createHost();
    register(host, "dex.test");
    const order: string[] = [];
    host.registerReceiver("dex.test", {
      ftOnTransfer: (_senderId, amount) => {
        order.push(amount);
        return amount;
      },
    });

    for (const amount of ["1", "2", "3"]) {
      host.call(
        "ft_transfer_call",
        { predecessorAccountId: OWNER, attachedDeposit: 1n },
        { receiverId: "dex.test", amount, msg: "" },
      );
    }
    await host.drain();

    expect(order).toEqual(["1", "2", "3"]);
    expect(host.contract.ftBalanceOf("dex.test")).toBe("6");
  });

  it("resolves forwarded transfers without holding on to their receipts", async () => {
    const host = createHost();
    register(host, "dex.test");
    register(host, "pool.test");
    const waitingDuringDelivery: number[] = [];
    host.registerReceiver("dex.test", {
      ftOnTransfer: (_senderId, amount) => {
        waitingDuringDelivery.push(host.awaiting);
        host.call(
          "ft_transfer_call",
          { predecessorAccountId: "dex.test", attachedDeposit: 1n },
          { receiverId: "pool.test", amount: "40", msg: "" },
        );
        return amount;
      },
    });
    host.registerReceiver("pool.test", { ftOnTransfer: (_senderId, amount) => amount });

    const receipt = await host.ftTransferCall(
      { predecessorAccountId: OWNER, attachedDeposit: 1n },
      { receiverId: "dex.test", amount: "100", msg: "" },
    );

    expect(valueOf(receipt)).toBe("100");
    expect(waitingDuringDelivery).toEqual([1]);
    expect(host.contract.ftBalanceOf(OWNER)).toBe("900");
    expect(host.contract.ftBalanceOf("dex.test")).toBe("60");
    expect(host.contract.ftBalanceOf("pool.test")).toBe("40");
    expect(host.queued).toBe(0);
    expect(host.awaiting).toBe(0);
  });

  it("keeps nothing for transfers drained without a waiting caller", async () => {
    const host = createHost();
    register(host, "dex.test");
    host.registerReceiver("dex.test", { ftOnTransfer: () => "0" });

    host.call(
      "ft_transfer_call",
      { predecessorAccountId: OWNER, attachedDeposit: 1n },
      { receiverId: "dex.test", amount: "5", msg: "" },
    );
    const resolved = await host.drain();

    expect(resolved).toHaveLength(1);
    expect(valueOf(resolved[0]!.receipt)).toBe("0");
    expect(host.awaiting).toBe(0);
  });

  it("refuses a second receiver for the same account", () => {
    const host = createHost();
    host.registerReceiver("dex.test", { ftOnTransfer: () => "0" });
    expect(() => host.registerReceiver("dex.test", { ftOnTransfer: () => "0" })).toThrow(
      "Account dex.test already has a receiver",
    );
  });
});

// =============================================================================
// Logging
// =============================================================================

describe("logger", () => {
  it("logs failures at warn with the error code", () => {
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
    const host = createHost({ logger });

    host.call(
      "ft_transfer",
      { predecessorAccountId: "bob.test", attachedDeposit: 1n },
      { receiverId: OWNER, amount: "1" },
    );

    const entries = lines.map((line) => JSON.parse(line) as Record<string, unknown>);
    expect(entries).toHaveLength(2);
    expect(entries[0]!["level"]).toBe(20);
    expect(entries[0]!["method"]).toBe("initialize_default");
    expect(entries[1]!["level"]).toBe(40);
    expect(entries[1]!["errorCode"]).toBe("ACCOUNT_NOT_REGISTERED");
    expect(entries[1]!["msg"]).toBe("The account bob.test is not registered");
  });
});
