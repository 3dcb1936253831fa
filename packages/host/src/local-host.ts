/**
 * LocalHost — In-process execution host for the token contract.
 *
 * Plays the part of the chain runtime:
 * - Assigns receipt IDs and builds the call environment
 * - Runs each mutating call atomically (checkpoint, then commit or restore)
 * - Pays back attached deposits and released storage
 * - Appends committed events to the event store
 * - Queues transfer-call continuations and drains them in FIFO order,
 *   invoking registered receivers and then the private resolution
 *
 * Failed calls never throw: a TokenError becomes a failed receipt. Any
 * other error is a bug; the call is still rolled back and the error
 * propagates.
 */

import type { Logger } from "pino";
import type { AccountId, DomainEvent, U128String } from "@ft-ledger/types";
import type { EventStore } from "@ft-ledger/event-store";
import { InMemoryEventStore, createTokenEventCatalog } from "@ft-ledger/event-store";
import type {
  CallEnv,
  CallOutcome,
  Payout,
  ReceiverOutcome,
  TransferCallPromise,
} from "@ft-ledger/ledger";
import { FungibleTokenContract, TokenError, toDomainEvents } from "@ft-ledger/ledger";
import type {
  CallLogEntry,
  CallReceipt,
  Caller,
  MethodArgs,
  MethodName,
  MethodResults,
  ResolvedTransfer,
  TokenReceiver,
} from "./types.js";
import { HostError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LocalHostOptions {
  /** Account the contract is deployed on; also the event stream ID */
  readonly contractId: AccountId;

  /** Price of one storage byte. Default: the contract's default */
  readonly storageByteCost?: bigint | undefined;

  /** Where committed events go. Default: an in-memory store with the token catalog */
  readonly eventStore?: EventStore | undefined;

  /** Clock for event timestamps. Default: wall clock */
  readonly now?: (() => string) | undefined;

  /** Call outcomes go here: successes at debug, failures at warn */
  readonly logger?: Logger | undefined;
}

type HandlerMap = {
  readonly [M in MethodName]: (env: CallEnv, args: MethodArgs[M]) => CallOutcome<MethodResults[M]>;
};

// =============================================================================
// Host
// =============================================================================

export class LocalHost {
  readonly contractId: AccountId;
  readonly contract: FungibleTokenContract;
  readonly eventStore: EventStore;

  private readonly _handlers: HandlerMap;
  private readonly _receivers = new Map<AccountId, TokenReceiver>();
  private readonly _queue: TransferCallPromise[] = [];
  /** Transfers an ftTransferCall is waiting on, and their receipts once resolved */
  private readonly _awaited = new Map<string, CallReceipt<U128String> | undefined>();
  private readonly _credited = new Map<AccountId, bigint>();
  private readonly _now: () => string;
  private readonly _logger: Logger | undefined;
  private _nextReceipt = 1;

  constructor(options: LocalHostOptions) {
    this.contractId = options.contractId;
    this.contract = new FungibleTokenContract({ storageByteCost: options.storageByteCost });
    this.eventStore =
      options.eventStore ?? new InMemoryEventStore({ catalog: createTokenEventCatalog() });
    this._now = options.now ?? (() => new Date().toISOString());
    this._logger = options.logger;

    const contract = this.contract;
    this._handlers = {
      initialize: (env, args) => contract.initialize(env, args),
      initialize_default: (env, args) => contract.initializeWithDefaultMetadata(env, args),
      ft_transfer: (env, args) => contract.ftTransfer(env, args),
      ft_transfer_call: (env, args) => contract.ftTransferCall(env, args),
      ft_resolve_transfer: (env, args) => contract.ftResolveTransfer(env, args),
      storage_deposit: (env, args) => contract.storageDeposit(env, args),
      storage_withdraw: (env, args) => contract.storageWithdraw(env, args),
      storage_unregister: (env, args) => contract.storageUnregister(env, args),
    };
  }

  // ─── Calls ─────────────────────────────────────────────────────────

  /**
   * Execute one mutating call atomically.
   *
   * @throws HostError on a negative deposit
   */
  call<M extends MethodName>(
    method: M,
    caller: Caller,
    args: MethodArgs[M],
  ): CallReceipt<MethodResults[M]> {
    const attachedDeposit = caller.attachedDeposit ?? 0n;
    if (attachedDeposit < 0n) {
      throw new HostError("INVALID_DEPOSIT", "Attached deposit cannot be negative");
    }

    const receiptId = `rcpt-${String(this._nextReceipt++)}`;
    const env: CallEnv = {
      currentAccountId: this.contractId,
      predecessorAccountId: caller.predecessorAccountId,
      attachedDeposit,
      receiptId,
    };

    const checkpoint = this.contract.checkpoint();
    let outcome: CallOutcome<MethodResults[M]>;
    let events: DomainEvent[];
    try {
      outcome = this._handlers[method](env, args);
      events = toDomainEvents(outcome.events, {
        receiptId,
        actor: caller.predecessorAccountId,
        timestamp: this._now(),
      });
      if (events.length > 0) {
        this.eventStore.append(this.contractId, events);
      }
    } catch (err) {
      this.contract.restore(checkpoint);
      if (!(err instanceof TokenError)) throw err;

      const payouts: Payout[] =
        attachedDeposit > 0n
          ? [{ receiverId: caller.predecessorAccountId, amount: attachedDeposit, reason: "deposit_refund" }]
          : [];
      this._credit(payouts);
      this._report(
        {
          receiptId,
          method,
          predecessorAccountId: caller.predecessorAccountId,
          status: "failure",
          errorCode: err.code,
          events: 0,
        },
        err.message,
      );
      return { status: "failure", receiptId, method, error: err, payouts };
    }

    this._credit(outcome.payouts);
    this._queue.push(...outcome.promises);
    this._report({
      receiptId,
      method,
      predecessorAccountId: caller.predecessorAccountId,
      status: "success",
      events: events.length,
    });

    return {
      status: "success",
      receiptId,
      method,
      value: outcome.value,
      payouts: outcome.payouts,
      logs: outcome.logs,
      events,
    };
  }

  // ─── Transfer-call ─────────────────────────────────────────────────

  /**
   * Register a contract account that implements `ft_on_transfer`.
   *
   * @throws HostError if the account already has a receiver
   */
  registerReceiver(accountId: AccountId, receiver: TokenReceiver): void {
    if (this._receivers.has(accountId)) {
      throw new HostError("RECEIVER_EXISTS", `Account ${accountId} already has a receiver`);
    }
    this._receivers.set(accountId, receiver);
  }

  /** Number of continuations waiting to be delivered. */
  get queued(): number {
    return this._queue.length;
  }

  /** Number of ftTransferCall invocations still waiting on their resolution. */
  get awaiting(): number {
    return this._awaited.size;
  }

  /**
   * Deliver every queued continuation, oldest first, and resolve each.
   * Continuations scheduled by receivers while draining are delivered in
   * the same pass.
   */
  async drain(): Promise<ResolvedTransfer[]> {
    const resolved: ResolvedTransfer[] = [];
    let next = this._queue.shift();
    while (next !== undefined) {
      const outcome = await this._deliver(next);
      const receipt = this.call(
        "ft_resolve_transfer",
        { predecessorAccountId: this.contractId },
        { transferId: next.transferId, outcome },
      );
      if (this._awaited.has(next.transferId)) {
        this._awaited.set(next.transferId, receipt);
      }
      resolved.push({ transferId: next.transferId, receiverId: next.receiverId, receipt });
      next = this._queue.shift();
    }
    return resolved;
  }

  /**
   * Both phases of a transfer-call. Resolves with the resolution receipt,
   * whose value is the amount the receiver kept, or with the Phase 1
   * failure.
   *
   * @throws HostError if the transfer was not resolved by the drain
   */
  async ftTransferCall(
    caller: Caller,
    args: MethodArgs["ft_transfer_call"],
  ): Promise<CallReceipt<U128String>> {
    const opened = this.call("ft_transfer_call", caller, args);
    if (opened.status === "failure") return opened;

    const transferId = opened.value;
    this._awaited.set(transferId, undefined);
    try {
      await this.drain();
      const receipt = this._awaited.get(transferId);
      if (receipt === undefined) {
        throw new HostError("UNRESOLVED_TRANSFER", `Transfer ${transferId} was not resolved`);
      }
      return receipt;
    } finally {
      this._awaited.delete(transferId);
    }
  }

  // ─── Native currency ───────────────────────────────────────────────

  /** Total native currency paid back to an account by committed or failed calls. */
  creditedTo(accountId: AccountId): bigint {
    return this._credited.get(accountId) ?? 0n;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async _deliver(promise: TransferCallPromise): Promise<ReceiverOutcome> {
    const receiver = this._receivers.get(promise.receiverId);
    if (receiver === undefined) {
      return {
        status: "failure",
        error: `Account ${promise.receiverId} does not implement ft_on_transfer`,
      };
    }
    try {
      const value = await receiver.ftOnTransfer(promise.senderId, promise.amount, promise.msg);
      return { status: "success", value };
    } catch (err) {
      return { status: "failure", error: err instanceof Error ? err.message : String(err) };
    }
  }

  private _report(entry: CallLogEntry, message?: string): void {
    if (this._logger === undefined) return;
    if (entry.status === "failure") {
      this._logger.warn(entry, message ?? "call failed");
    } else {
      this._logger.debug(entry, "call committed");
    }
  }

  private _credit(payouts: readonly Payout[]): void {
    for (const payout of payouts) {
      this._credited.set(payout.receiverId, this.creditedTo(payout.receiverId) + payout.amount);
    }
  }
}
