/**
 * @ft-ledger/ledger — Fungible token contract with storage-rent admission control.
 *
 * A single-asset token ledger over metered key-value storage:
 * - Balances and total supply in exact u128 arithmetic
 * - Account registration against a storage deposit
 * - Every mutating call bracketed by storage accounting
 * - Two-phase transfer-call with refund on the receiver's outcome
 * - NEP-297 style event logs plus DomainEvents for the event store
 *
 * Design rules:
 * - All types are readonly
 * - All monetary arithmetic uses bigint (no floating point)
 * - Fail-closed: invalid input throws, the host rolls the call back
 *
 * @packageDocumentation
 */

// Contract
export {
  FungibleTokenContract,
  DEFAULT_STORAGE_BYTE_COST,
  DEFAULT_TOKEN,
  INITIAL_MINT_MEMO,
} from "./contract.js";
export type {
  FungibleTokenCore,
  FungibleTokenResolver,
  StorageManagement,
  FungibleTokenMetadataProvider,
  FungibleTokenContractOptions,
  ContractCheckpoint,
  InitializeArgs,
  InitializeDefaultArgs,
  FtTransferArgs,
  FtTransferCallArgs,
  FtResolveTransferArgs,
  StorageDepositArgs,
  StorageWithdrawArgs,
  StorageUnregisterArgs,
} from "./contract.js";

// Components
export { TokenLedger, usedAmount, REFUND_MEMO } from "./ledger.js";
export { AccountRegistry, accountKey, assertAccountId, BALANCES_PREFIX } from "./accounts.js";
export type { UnregisterResult } from "./accounts.js";
export {
  MetadataStore,
  defaultMetadata,
  validateMetadata,
  FT_METADATA_SPEC,
  METADATA_KEY,
} from "./metadata.js";
export type { DefaultMetadataOptions } from "./metadata.js";
export { withStorageAccounting, assertOneUnit } from "./storage-guard.js";
export type { GuardedResult } from "./storage-guard.js";
export { PendingBook } from "./pending.js";
export type { OpenTransfer, PendingCheckpoint } from "./pending.js";
export { RootStore, STATE_KEY } from "./state.js";
export type { RootState } from "./state.js";
export { MeteredStorage, RECORD_OVERHEAD_BYTES, prefixedKey, utf8 } from "./storage.js";
export type { StorageCheckpoint } from "./storage.js";

// Events
export {
  EventEmitter,
  formatEventLog,
  toDomainEvents,
  EVENT_LOG_PREFIX,
  EVENT_STANDARD_VERSION,
} from "./events.js";
export type { EventContext } from "./events.js";

// u128 arithmetic
export {
  U128_MAX,
  U64_MAX,
  parseU128,
  tryParseU128,
  formatU128,
  checkedAdd,
  checkedSub,
  minU128,
  encodeU128,
  decodeU128,
  encodeU64,
  decodeU64,
} from "./u128.js";

// Types
export type {
  CallEnv,
  CallOutcome,
  Payout,
  PayoutReason,
  TokenEventRecord,
  TransferState,
  PendingTransfer,
  ReceiverOutcome,
  TransferCallPromise,
  TransferSettlement,
  StorageWithdrawal,
  TokenErrorCode,
} from "./types.js";
export { TokenError } from "./types.js";
