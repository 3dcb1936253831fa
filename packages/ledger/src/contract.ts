/**
 * @ft-ledger/ledger — Fungible token contract.
 *
 * The single contract class. It implements the three standard interfaces
 * (core, storage management, metadata) plus the private resolver, and
 * routes every mutating entry point through the Storage Accounting Guard.
 *
 * Views return plain values. Mutating entry points return a CallOutcome
 * (value, payouts, logs, events, scheduled promises) for the host to
 * commit; on a throw the host restores the checkpoint it took before the
 * call.
 */

import type {
  AccountId,
  StorageBalance,
  StorageBalanceBounds,
  TokenMetadata,
  U128String,
} from "@ft-ledger/types";
import { AccountRegistry, assertAccountId } from "./accounts.js";
import { EventEmitter } from "./events.js";
import { TokenLedger } from "./ledger.js";
import type { DefaultMetadataOptions } from "./metadata.js";
import { MetadataStore, defaultMetadata, validateMetadata } from "./metadata.js";
import type { PendingCheckpoint } from "./pending.js";
import { PendingBook } from "./pending.js";
import { RootStore } from "./state.js";
import type { StorageCheckpoint } from "./storage.js";
import { MeteredStorage } from "./storage.js";
import { assertOneUnit, withStorageAccounting } from "./storage-guard.js";
import type {
  CallEnv,
  CallOutcome,
  Payout,
  PendingTransfer,
  ReceiverOutcome,
  StorageWithdrawal,
  TransferCallPromise,
} from "./types.js";
import { TokenError } from "./types.js";
import { formatU128, parseU128 } from "./u128.js";

/** Price of one storage byte: 10^19 base units. */
export const DEFAULT_STORAGE_BYTE_COST = 10_000_000_000_000_000_000n;

export const INITIAL_MINT_MEMO = "Initial tokens supply is minted";

export const DEFAULT_TOKEN: DefaultMetadataOptions = {
  name: "Fungible Token",
  symbol: "FT",
  decimals: 18,
};

// ─── Entry point arguments ───────────────────────────────────────────────

export interface InitializeArgs {
  readonly ownerId: AccountId;
  readonly totalSupply: U128String;
  readonly metadata: unknown;
}

export interface InitializeDefaultArgs {
  readonly ownerId: AccountId;
  readonly totalSupply: U128String;
  readonly name?: string | undefined;
  readonly symbol?: string | undefined;
  readonly decimals?: number | undefined;
  readonly icon?: string | null | undefined;
}

export interface FtTransferArgs {
  readonly receiverId: AccountId;
  readonly amount: U128String;
  readonly memo?: string | undefined;
}

export interface FtTransferCallArgs extends FtTransferArgs {
  readonly msg: string;
}

export interface FtResolveTransferArgs {
  readonly transferId: string;
  readonly outcome: ReceiverOutcome;
}

export interface StorageDepositArgs {
  readonly accountId?: AccountId | undefined;
  /** Accepted for compatibility; excess above the minimum is always refunded. */
  readonly registrationOnly?: boolean | undefined;
}

export interface StorageWithdrawArgs {
  readonly amount?: U128String | undefined;
}

export interface StorageUnregisterArgs {
  readonly force?: boolean | undefined;
}

// ─── Standard interfaces ─────────────────────────────────────────────────

export interface FungibleTokenCore {
  ftTransfer(env: CallEnv, args: FtTransferArgs): CallOutcome<null>;
  /** Phase 1; the value is the transfer id the resolution will settle. */
  ftTransferCall(env: CallEnv, args: FtTransferCallArgs): CallOutcome<string>;
  ftTotalSupply(): U128String;
  ftBalanceOf(accountId: AccountId): U128String;
}

export interface FungibleTokenResolver {
  /** Phase 2; private to the contract itself. The value is the used amount. */
  ftResolveTransfer(env: CallEnv, args: FtResolveTransferArgs): CallOutcome<U128String>;
}

export interface StorageManagement {
  storageDeposit(env: CallEnv, args: StorageDepositArgs): CallOutcome<StorageBalance>;
  storageWithdraw(env: CallEnv, args: StorageWithdrawArgs): CallOutcome<StorageWithdrawal>;
  storageUnregister(env: CallEnv, args: StorageUnregisterArgs): CallOutcome<boolean>;
  storageBalanceBounds(): StorageBalanceBounds;
  storageBalanceOf(accountId: AccountId): StorageBalance | null;
}

export interface FungibleTokenMetadataProvider {
  ftMetadata(): TokenMetadata;
}

// ─── Contract ────────────────────────────────────────────────────────────

export interface FungibleTokenContractOptions {
  readonly storageByteCost?: bigint | undefined;
}

/**
 * Everything a failed call must be able to roll back.
 */
export interface ContractCheckpoint {
  readonly storage: StorageCheckpoint;
  readonly pending: PendingCheckpoint;
}

export class FungibleTokenContract
  implements
    FungibleTokenCore,
    FungibleTokenResolver,
    StorageManagement,
    FungibleTokenMetadataProvider
{
  readonly storageByteCost: bigint;

  private readonly _storage = new MeteredStorage();
  private readonly _emitter = new EventEmitter();
  private readonly _pending = new PendingBook();
  private readonly _root = new RootStore(this._storage);
  private readonly _metadata = new MetadataStore(this._storage);
  private readonly _accounts = new AccountRegistry(this._storage, this._root, this._emitter);
  private readonly _ledger = new TokenLedger(
    this._root,
    this._accounts,
    this._pending,
    this._emitter,
  );
  private _scheduled: TransferCallPromise[] = [];

  constructor(options?: FungibleTokenContractOptions) {
    this.storageByteCost = options?.storageByteCost ?? DEFAULT_STORAGE_BYTE_COST;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  isInitialized(): boolean {
    return this._root.exists();
  }

  /**
   * One-time constructor: store metadata, register the owner and mint the
   * whole supply to it. Exempt from storage accounting; the deployer pays.
   */
  initialize(env: CallEnv, args: InitializeArgs): CallOutcome<null> {
    this._begin();
    if (this._root.exists()) {
      throw new TokenError("ALREADY_INITIALIZED", "Already initialized");
    }
    const ownerId = assertAccountId(args.ownerId, "owner_id");
    const totalSupply = parseU128(args.totalSupply, "total_supply");
    const metadata = validateMetadata(args.metadata);

    this._metadata.write(metadata);
    const accountStorageUsage = this._accounts.measureAccountStorageUsage();
    this._root.save({ totalSupply: 0n, accountStorageUsage });
    this._accounts.register(ownerId);
    this._ledger.mint(ownerId, totalSupply, INITIAL_MINT_MEMO);

    const payouts: Payout[] = [];
    if (env.attachedDeposit > 0n) {
      payouts.push({
        receiverId: env.predecessorAccountId,
        amount: env.attachedDeposit,
        reason: "deposit_refund",
      });
    }
    return this._finish(null, payouts);
  }

  initializeWithDefaultMetadata(env: CallEnv, args: InitializeDefaultArgs): CallOutcome<null> {
    return this.initialize(env, {
      ownerId: args.ownerId,
      totalSupply: args.totalSupply,
      metadata: defaultMetadata({
        name: args.name ?? DEFAULT_TOKEN.name,
        symbol: args.symbol ?? DEFAULT_TOKEN.symbol,
        decimals: args.decimals ?? DEFAULT_TOKEN.decimals,
        icon: args.icon,
      }),
    });
  }

  checkpoint(): ContractCheckpoint {
    return { storage: this._storage.checkpoint(), pending: this._pending.checkpoint() };
  }

  restore(checkpoint: ContractCheckpoint): void {
    this._storage.restore(checkpoint.storage);
    this._pending.restore(checkpoint.pending);
    this._begin();
  }

  /** Bytes currently charged to the contract. */
  get storageUsage(): number {
    return this._storage.usage;
  }

  pendingTransfers(): readonly PendingTransfer[] {
    return this._pending.list();
  }

  // ─── Core ────────────────────────────────────────────────────────────

  ftTransfer(env: CallEnv, args: FtTransferArgs): CallOutcome<null> {
    return this._mutate(env, true, () => {
      const receiverId = assertAccountId(args.receiverId, "receiver_id");
      const amount = parseU128(args.amount);
      this._ledger.transfer(env.predecessorAccountId, receiverId, amount, args.memo);
      return null;
    });
  }

  ftTransferCall(env: CallEnv, args: FtTransferCallArgs): CallOutcome<string> {
    return this._mutate(env, true, () => {
      const receiverId = assertAccountId(args.receiverId, "receiver_id");
      const amount = parseU128(args.amount);
      const pending = this._ledger.openTransferCall(
        env.receiptId,
        env.predecessorAccountId,
        receiverId,
        amount,
        args.memo,
      );
      this._scheduled.push({
        transferId: pending.id,
        receiverId,
        senderId: pending.senderId,
        amount: formatU128(amount),
        msg: args.msg,
      });
      return pending.id;
    });
  }

  ftResolveTransfer(env: CallEnv, args: FtResolveTransferArgs): CallOutcome<U128String> {
    return this._mutate(env, false, () => {
      if (env.predecessorAccountId !== env.currentAccountId) {
        throw new TokenError("PRIVATE_METHOD", "Method ft_resolve_transfer is private");
      }
      const settlement = this._ledger.resolveTransferCall(args.transferId, args.outcome);
      return formatU128(settlement.used);
    });
  }

  ftTotalSupply(): U128String {
    return formatU128(this._ledger.totalSupply());
  }

  ftBalanceOf(accountId: AccountId): U128String {
    this._root.load();
    return formatU128(this._ledger.balanceOf(assertAccountId(accountId)));
  }

  // ─── Storage management ──────────────────────────────────────────────

  storageDeposit(env: CallEnv, args: StorageDepositArgs): CallOutcome<StorageBalance> {
    return this._mutate(env, false, () => {
      const accountId = assertAccountId(args.accountId ?? env.predecessorAccountId);
      const min = this._minStorageBalance();

      if (this._accounts.isRegistered(accountId)) {
        this._emitter.log("The account is already registered, refunding the deposit");
      } else {
        if (env.attachedDeposit < min) {
          throw new TokenError(
            "INSUFFICIENT_DEPOSIT",
            "The attached deposit is less than the minimum storage balance",
          );
        }
        this._accounts.register(accountId);
        this._emitter.emit("storage_deposit", {
          account_id: accountId,
          amount: formatU128(min),
        });
      }
      return { total: formatU128(min), available: "0" };
    });
  }

  storageWithdraw(env: CallEnv, args: StorageWithdrawArgs): CallOutcome<StorageWithdrawal> {
    return this._mutate(env, true, () => {
      const accountId = env.predecessorAccountId;
      this._accounts.assertRegistered(accountId);
      const amount = args.amount === undefined ? 0n : parseU128(args.amount);
      if (amount > 0n) {
        throw new TokenError(
          "BELOW_MINIMUM_STORAGE_BALANCE",
          "The amount is greater than the available storage balance",
        );
      }
      // Nothing is held above the minimum, so a successful withdrawal moves
      // nothing and emits no event.
      return {
        withdrawn: "0",
        total: formatU128(this._minStorageBalance()),
        available: "0",
      };
    });
  }

  storageUnregister(env: CallEnv, args: StorageUnregisterArgs): CallOutcome<boolean> {
    return this._mutate(env, true, () => {
      const accountId = env.predecessorAccountId;
      const force = args.force ?? false;
      if (!this._accounts.isRegistered(accountId)) {
        this._emitter.log(`The account ${accountId} is not registered`);
        return false;
      }
      const { burned } = this._accounts.unregister(accountId, force);
      this._emitter.emit("storage_unregister", {
        account_id: accountId,
        forced: force,
        burned: formatU128(burned),
      });
      return true;
    });
  }

  storageBalanceBounds(): StorageBalanceBounds {
    return { min: formatU128(this._minStorageBalance()), max: null };
  }

  storageBalanceOf(accountId: AccountId): StorageBalance | null {
    const min = this._minStorageBalance();
    if (!this._accounts.isRegistered(assertAccountId(accountId))) return null;
    return { total: formatU128(min), available: "0" };
  }

  // ─── Metadata ────────────────────────────────────────────────────────

  ftMetadata(): TokenMetadata {
    this._root.load();
    return this._metadata.read();
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _minStorageBalance(): bigint {
    return this._root.load().accountStorageUsage * this.storageByteCost;
  }

  private _begin(): void {
    this._emitter.reset();
    this._scheduled = [];
  }

  private _finish<T>(value: T, payouts: readonly Payout[]): CallOutcome<T> {
    const { events, logs } = this._emitter.take();
    const promises = this._scheduled;
    this._scheduled = [];
    return { value, payouts, logs, events, promises };
  }

  /**
   * Common path of every mutating entry point except `initialize`.
   */
  private _mutate<T>(env: CallEnv, requireOneUnit: boolean, op: () => T): CallOutcome<T> {
    this._begin();
    this._root.load();
    if (requireOneUnit) {
      assertOneUnit(env);
    }
    const { value, payouts } = withStorageAccounting(
      this._storage,
      this.storageByteCost,
      env,
      op,
    );
    return this._finish(value, payouts);
  }
}
