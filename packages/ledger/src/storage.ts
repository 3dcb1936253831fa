/**
 * @ft-ledger/ledger — Metered key-value storage.
 *
 * The contract's only state. Every record is charged
 * `len(key) + len(value) + RECORD_OVERHEAD_BYTES` bytes, and the running
 * total is what the Storage Accounting Guard measures around each call.
 *
 * Checkpoints are plain copies of the record map; the host takes one
 * before every call and restores it if the call fails.
 */

/** Per-record overhead charged on top of key and value bytes. */
export const RECORD_OVERHEAD_BYTES = 40;

const encoder = new TextEncoder();

/** UTF-8 bytes of a string key or prefix. */
export function utf8(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Concatenate a key prefix with a suffix. */
export function prefixedKey(prefix: string, suffix: Uint8Array): Uint8Array {
  const head = utf8(prefix);
  const key = new Uint8Array(head.length + suffix.length);
  key.set(head, 0);
  key.set(suffix, head.length);
  return key;
}

function recordBytes(key: Uint8Array, value: Uint8Array): number {
  return key.length + value.length + RECORD_OVERHEAD_BYTES;
}

interface StoredRecord {
  readonly key: Uint8Array;
  readonly value: Uint8Array;
}

/**
 * Opaque snapshot of the storage contents.
 */
export interface StorageCheckpoint {
  readonly records: ReadonlyMap<string, StoredRecord>;
  readonly usage: number;
}

export class MeteredStorage {
  private _records = new Map<string, StoredRecord>();
  private _usage = 0;

  private static _id(key: Uint8Array): string {
    return Buffer.from(key).toString("hex");
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  read(key: Uint8Array): Uint8Array | undefined {
    const record = this._records.get(MeteredStorage._id(key));
    return record === undefined ? undefined : record.value.slice();
  }

  has(key: Uint8Array): boolean {
    return this._records.has(MeteredStorage._id(key));
  }

  /** Bytes currently charged to the contract. */
  get usage(): number {
    return this._usage;
  }

  get recordCount(): number {
    return this._records.size;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Insert or overwrite a record.
   * @returns the previous value, if any
   */
  write(key: Uint8Array, value: Uint8Array): Uint8Array | undefined {
    const id = MeteredStorage._id(key);
    const previous = this._records.get(id);
    if (previous !== undefined) {
      this._usage -= recordBytes(previous.key, previous.value);
    }
    const record: StoredRecord = { key: key.slice(), value: value.slice() };
    this._records.set(id, record);
    this._usage += recordBytes(record.key, record.value);
    return previous?.value;
  }

  /**
   * Delete a record.
   * @returns the removed value, if the key existed
   */
  remove(key: Uint8Array): Uint8Array | undefined {
    const id = MeteredStorage._id(key);
    const previous = this._records.get(id);
    if (previous === undefined) return undefined;
    this._records.delete(id);
    this._usage -= recordBytes(previous.key, previous.value);
    return previous.value;
  }

  // ─── Checkpoints ─────────────────────────────────────────────────────

  checkpoint(): StorageCheckpoint {
    return { records: new Map(this._records), usage: this._usage };
  }

  restore(checkpoint: StorageCheckpoint): void {
    this._records = new Map(checkpoint.records);
    this._usage = checkpoint.usage;
  }
}
