/**
 * TokenService — Composition root for the HTTP service.
 *
 * Owns the LocalHost (and through it the contract and the event store),
 * initializes the contract from configuration and exposes one method per
 * API operation. Route handlers delegate here; they never touch the host
 * or the contract directly.
 */

import type { Logger } from "pino";
import type {
  AccountId,
  StorageBalance,
  StorageBalanceBounds,
  TokenMetadata,
  U128String,
} from "@ft-ledger/types";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@ft-ledger/event-store";
import type { StorageWithdrawal } from "@ft-ledger/ledger";
import { LocalHost } from "@ft-ledger/host";
import type { CallReceipt, Caller, TokenReceiver } from "@ft-ledger/host";
import { EscrowReceiver } from "./escrow-receiver.js";
import type {
  FtTransferCallDto,
  FtTransferDto,
  StorageDepositDto,
  StorageUnregisterDto,
  StorageWithdrawDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface TokenServiceConfig {
  readonly contractId: AccountId;
  readonly ownerId: AccountId;
  readonly totalSupply: U128String;
  readonly token: {
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    readonly icon?: string | null | undefined;
  };
  readonly storageByteCost: bigint;

  /** Account that gets an EscrowReceiver registered at startup */
  readonly escrowId?: AccountId | undefined;

  readonly logger?: Logger | undefined;
  readonly now?: (() => string) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class TokenService {
  readonly host: LocalHost;

  /**
   * @throws TokenError if the configured supply, metadata or escrow account
   *   is invalid
   */
  constructor(config: TokenServiceConfig) {
    this.host = new LocalHost({
      contractId: config.contractId,
      storageByteCost: config.storageByteCost,
      logger: config.logger,
      now: config.now,
    });

    const receipt = this.host.call(
      "initialize_default",
      { predecessorAccountId: config.ownerId },
      {
        ownerId: config.ownerId,
        totalSupply: config.totalSupply,
        name: config.token.name,
        symbol: config.token.symbol,
        decimals: config.token.decimals,
        icon: config.token.icon,
      },
    );
    if (receipt.status === "failure") {
      throw receipt.error;
    }

    if (config.escrowId !== undefined) {
      this._installEscrow(config.escrowId, config.logger);
    }
  }

  get contractId(): AccountId {
    return this.host.contractId;
  }

  isReady(): boolean {
    return this.host.contract.isInitialized();
  }

  // ─── Views ─────────────────────────────────────────────────────────

  metadata(): TokenMetadata {
    return this.host.contract.ftMetadata();
  }

  totalSupply(): U128String {
    return this.host.contract.ftTotalSupply();
  }

  balanceOf(accountId: AccountId): U128String {
    return this.host.contract.ftBalanceOf(accountId);
  }

  storageBalanceBounds(): StorageBalanceBounds {
    return this.host.contract.storageBalanceBounds();
  }

  storageBalanceOf(accountId: AccountId): StorageBalance | null {
    return this.host.contract.storageBalanceOf(accountId);
  }

  // ─── Calls ─────────────────────────────────────────────────────────

  transfer(caller: Caller, dto: FtTransferDto): CallReceipt<null> {
    return this.host.call("ft_transfer", caller, dto);
  }

  /** Both phases; resolves once the receiver has answered. */
  transferCall(caller: Caller, dto: FtTransferCallDto): Promise<CallReceipt<U128String>> {
    return this.host.ftTransferCall(caller, dto);
  }

  storageDeposit(caller: Caller, dto: StorageDepositDto): CallReceipt<StorageBalance> {
    return this.host.call("storage_deposit", caller, dto);
  }

  storageWithdraw(caller: Caller, dto: StorageWithdrawDto): CallReceipt<StorageWithdrawal> {
    return this.host.call("storage_withdraw", caller, dto);
  }

  storageUnregister(caller: Caller, dto: StorageUnregisterDto): CallReceipt<boolean> {
    return this.host.call("storage_unregister", caller, dto);
  }

  /** Install an in-process contract that accepts transfer-calls. */
  registerReceiver(accountId: AccountId, receiver: TokenReceiver): void {
    this.host.registerReceiver(accountId, receiver);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.host.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.host.eventStore.read(streamId, options);
  }

  verifyEventStore(): EventStoreIntegrityResult {
    return this.host.eventStore.verifyIntegrity();
  }

  // ─── Internals ─────────────────────────────────────────────────────

  /** Register the escrow's storage, paying exactly the minimum, then its receiver. */
  private _installEscrow(escrowId: AccountId, logger: Logger | undefined): void {
    const registration = this.host.call(
      "storage_deposit",
      {
        predecessorAccountId: escrowId,
        attachedDeposit: BigInt(this.storageBalanceBounds().min),
      },
      {},
    );
    if (registration.status === "failure") {
      throw registration.error;
    }
    this.host.registerReceiver(escrowId, new EscrowReceiver(escrowId, logger));
  }
}
