/**
 * @ft-ledger/event-store — Token Domain Event Definitions.
 *
 * The catalog of every event the token ledger emits. Payload field names
 * follow the NEP-297 event log data of the fungible-token (nep141) and
 * storage-management (nep145) standards, so the same object is both the
 * stored payload and the `data` entry of the `EVENT_JSON:` log line.
 */

import { isAccountId, isU128String } from "@ft-ledger/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Types
// =============================================================================

export const TOKEN_EVENTS = {
  FT_MINT: "ft_mint",
  FT_TRANSFER: "ft_transfer",
  FT_BURN: "ft_burn",
  FT_TRANSFER_SETTLED: "ft_transfer_settled",
  STORAGE_DEPOSIT: "storage_deposit",
  STORAGE_WITHDRAW: "storage_withdraw",
  STORAGE_UNREGISTER: "storage_unregister",
} as const;

export type TokenEventType = (typeof TOKEN_EVENTS)[keyof typeof TOKEN_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export type FtMintPayload = {
  readonly owner_id: string;
  readonly amount: string;
  readonly memo?: string;
};

export type FtTransferPayload = {
  readonly old_owner_id: string;
  readonly new_owner_id: string;
  readonly amount: string;
  readonly memo?: string;
};

export type FtBurnPayload = {
  readonly owner_id: string;
  readonly amount: string;
  readonly memo?: string;
};

export type FtTransferSettledPayload = {
  readonly transfer_id: string;
  readonly sender_id: string;
  readonly receiver_id: string;
  readonly amount: string;
  readonly used: string;
  readonly refunded: string;
  readonly burned: string;
};

export type StorageDepositPayload = {
  readonly account_id: string;
  readonly amount: string;
};

export type StorageWithdrawPayload = {
  readonly account_id: string;
  readonly amount: string;
};

export type StorageUnregisterPayload = {
  readonly account_id: string;
  readonly forced: boolean;
  readonly burned: string;
};

export interface TokenEventPayloads {
  readonly ft_mint: FtMintPayload;
  readonly ft_transfer: FtTransferPayload;
  readonly ft_burn: FtBurnPayload;
  readonly ft_transfer_settled: FtTransferSettledPayload;
  readonly storage_deposit: StorageDepositPayload;
  readonly storage_withdraw: StorageWithdrawPayload;
  readonly storage_unregister: StorageUnregisterPayload;
}

// =============================================================================
// Validation helpers
// =============================================================================

function asRecord(payload: unknown): Record<string, unknown> | undefined {
  if (payload === null || typeof payload !== "object") return undefined;
  return payload as Record<string, unknown>;
}

function optionalMemo(p: Record<string, unknown>): boolean {
  return p.memo === undefined || typeof p.memo === "string";
}

function ownerAmount(payload: unknown): boolean {
  const p = asRecord(payload);
  return (
    p !== undefined &&
    isAccountId(p.owner_id) &&
    isU128String(p.amount) &&
    optionalMemo(p)
  );
}

function accountAmount(payload: unknown): boolean {
  const p = asRecord(payload);
  return p !== undefined && isAccountId(p.account_id) && isU128String(p.amount);
}

// =============================================================================
// Schemas
// =============================================================================

const SCHEMAS: readonly EventSchema[] = [
  {
    type: TOKEN_EVENTS.FT_MINT,
    standard: "nep141",
    version: "1.0.0",
    description: "New tokens were created and credited to an owner",
    source: "ledger",
    validate: ownerAmount,
  },
  {
    type: TOKEN_EVENTS.FT_TRANSFER,
    standard: "nep141",
    version: "1.0.0",
    description: "Tokens moved between two registered accounts",
    source: "ledger",
    validate: (payload) => {
      const p = asRecord(payload);
      return (
        p !== undefined &&
        isAccountId(p.old_owner_id) &&
        isAccountId(p.new_owner_id) &&
        isU128String(p.amount) &&
        optionalMemo(p)
      );
    },
  },
  {
    type: TOKEN_EVENTS.FT_BURN,
    standard: "nep141",
    version: "1.0.0",
    description: "Tokens were destroyed and total supply reduced",
    source: "ledger",
    validate: ownerAmount,
  },
  {
    type: TOKEN_EVENTS.FT_TRANSFER_SETTLED,
    standard: "nep141",
    version: "1.0.0",
    description: "A transfer-call was resolved with the receiver's outcome",
    source: "ledger",
    validate: (payload) => {
      const p = asRecord(payload);
      return (
        p !== undefined &&
        typeof p.transfer_id === "string" &&
        isAccountId(p.sender_id) &&
        isAccountId(p.receiver_id) &&
        isU128String(p.amount) &&
        isU128String(p.used) &&
        isU128String(p.refunded) &&
        isU128String(p.burned)
      );
    },
  },
  {
    type: TOKEN_EVENTS.STORAGE_DEPOSIT,
    standard: "nep145",
    version: "1.0.0",
    description: "An account was registered against a storage deposit",
    source: "storage",
    validate: accountAmount,
  },
  {
    type: TOKEN_EVENTS.STORAGE_WITHDRAW,
    standard: "nep145",
    version: "1.0.0",
    description: "Available storage deposit was withdrawn",
    source: "storage",
    validate: accountAmount,
  },
  {
    type: TOKEN_EVENTS.STORAGE_UNREGISTER,
    standard: "nep145",
    version: "1.0.0",
    description: "An account was removed and its storage deposit released",
    source: "registry",
    validate: (payload) => {
      const p = asRecord(payload);
      return (
        p !== undefined &&
        isAccountId(p.account_id) &&
        typeof p.forced === "boolean" &&
        isU128String(p.burned)
      );
    },
  },
];

/**
 * Create a catalog holding every token ledger event.
 */
export function createTokenEventCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
