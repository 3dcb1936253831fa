/**
 * @ft-ledger/ledger — Metadata Store.
 *
 * The token descriptor is written once at initialization under `"m"`
 * (RFC 8785 canonical JSON) and only read afterwards.
 */

import { canonicalize } from "json-canonicalize";
import type { TokenMetadata } from "@ft-ledger/types";
import { isTokenMetadata } from "@ft-ledger/types";
import type { MeteredStorage } from "./storage.js";
import { utf8 } from "./storage.js";
import { TokenError } from "./types.js";

export const FT_METADATA_SPEC = "ft-1.0.0";

export const METADATA_KEY = utf8("m");

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Options for the default metadata initializer.
 */
export interface DefaultMetadataOptions {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly icon?: string | null | undefined;
}

export function defaultMetadata(options: DefaultMetadataOptions): TokenMetadata {
  return {
    spec: FT_METADATA_SPEC,
    name: options.name,
    symbol: options.symbol,
    icon: options.icon ?? null,
    reference: null,
    referenceHash: null,
    decimals: options.decimals,
  };
}

/**
 * Validate a metadata record. Throws INVALID_METADATA on the first problem.
 */
export function validateMetadata(metadata: unknown): TokenMetadata {
  if (!isTokenMetadata(metadata)) {
    throw new TokenError(
      "INVALID_METADATA",
      "Metadata must have spec, name, symbol and an integer decimals in [0, 255]",
    );
  }
  if (metadata.spec !== FT_METADATA_SPEC) {
    throw new TokenError("INVALID_METADATA", `Unsupported metadata spec "${metadata.spec}"`);
  }
  if (metadata.name.length === 0 || metadata.symbol.length === 0) {
    throw new TokenError("INVALID_METADATA", "Name and symbol must be non-empty");
  }
  const icon = metadata.icon ?? null;
  const reference = metadata.reference ?? null;
  const referenceHash = metadata.referenceHash ?? null;
  if ((reference === null) !== (referenceHash === null)) {
    throw new TokenError(
      "INVALID_METADATA",
      "Reference and reference hash must be present together",
    );
  }
  if (referenceHash !== null) {
    if (!BASE64.test(referenceHash) || Buffer.from(referenceHash, "base64").length !== 32) {
      throw new TokenError("INVALID_METADATA", "Hash has to be 32 bytes");
    }
  }
  return {
    spec: metadata.spec,
    name: metadata.name,
    symbol: metadata.symbol,
    icon,
    reference,
    referenceHash,
    decimals: metadata.decimals,
  };
}

export class MetadataStore {
  constructor(private readonly _storage: MeteredStorage) {}

  write(metadata: TokenMetadata): void {
    this._storage.write(METADATA_KEY, utf8(canonicalize(metadata)));
  }

  /**
   * Return a copy of the stored metadata.
   */
  read(): TokenMetadata {
    const raw = this._storage.read(METADATA_KEY);
    if (raw === undefined) {
      throw new TokenError("NOT_INITIALIZED", "The contract is not initialized");
    }
    const parsed: unknown = JSON.parse(Buffer.from(raw).toString("utf8"));
    if (!isTokenMetadata(parsed)) {
      throw new TokenError("INVALID_METADATA", "Stored metadata is corrupt");
    }
    return parsed;
  }
}
