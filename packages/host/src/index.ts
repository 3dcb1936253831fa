/**
 * @ft-ledger/host — In-process execution host for the token contract.
 *
 * Runs contract calls the way a chain runtime would: atomically, with
 * deposit refunds, event persistence and asynchronous transfer-call
 * continuations delivered to registered receivers.
 *
 * @packageDocumentation
 */

export { LocalHost } from "./local-host.js";
export type { LocalHostOptions } from "./local-host.js";

export type {
  MethodArgs,
  MethodResults,
  MethodName,
  Caller,
  CallReceipt,
  TokenReceiver,
  ResolvedTransfer,
  CallLogEntry,
  HostErrorCode,
} from "./types.js";
export { HostError } from "./types.js";
