/**
 * Record Store
 *
 * Content-addressed key/value storage for encoded records. Every request runs
 * inside transaction(): writes go to an overlay that is applied when the
 * callback returns and dropped when it throws, so a failed request leaves no
 * partial effect.
 */

import { governanceLogger as logger } from "@sealvote/shared";
import type { RecordCodec } from "../codec/records.js";

const storeLogger = logger.child({ component: "record-store" });

// ============================================
// STORE INTERFACE
// ============================================

export interface RecordStore {
  has(key: string): boolean;
  getBytes(key: string): Uint8Array | undefined;
  putBytes(key: string, bytes: Uint8Array): void;
  transaction<T>(fn: () => T): T;
}

/**
 * Decodes a record, or returns undefined when the key is empty.
 */
export function readRecord<T>(store: RecordStore, codec: RecordCodec<T>, key: string): T | undefined {
  const bytes = store.getBytes(key);
  return bytes === undefined ? undefined : codec.decode(bytes);
}

export function writeRecord<T>(store: RecordStore, codec: RecordCodec<T>, key: string, value: T): void {
  store.putBytes(key, codec.encode(value));
}

// ============================================
// MEMORY STORE
// ============================================

export class MemoryRecordStore implements RecordStore {
  private readonly records: Map<string, Uint8Array> = new Map();
  private overlay: Map<string, Uint8Array> | null = null;
  private committedTransactions = 0;
  private abortedTransactions = 0;

  has(key: string): boolean {
    return this.overlay?.has(key) === true || this.records.has(key);
  }

  getBytes(key: string): Uint8Array | undefined {
    const bytes = this.overlay?.get(key) ?? this.records.get(key);
    // Callers get a copy so that mutating it cannot bypass the overlay
    return bytes === undefined ? undefined : Uint8Array.from(bytes);
  }

  putBytes(key: string, bytes: Uint8Array): void {
    const copy = Uint8Array.from(bytes);
    if (this.overlay) {
      this.overlay.set(key, copy);
    } else {
      this.records.set(key, copy);
    }
  }

  /**
   * Runs fn atomically. A transaction opened inside another one joins it.
   */
  transaction<T>(fn: () => T): T {
    if (this.overlay) {
      return fn();
    }

    const overlay = new Map<string, Uint8Array>();
    this.overlay = overlay;
    try {
      const result = fn();
      for (const [key, bytes] of overlay) {
        this.records.set(key, bytes);
      }
      this.committedTransactions++;
      return result;
    } catch (error) {
      this.abortedTransactions++;
      storeLogger.debug({ discardedWrites: overlay.size }, "Transaction aborted");
      throw error;
    } finally {
      this.overlay = null;
    }
  }

  get size(): number {
    return this.records.size;
  }

  getStatistics(): { records: number; committed: number; aborted: number } {
    return {
      records: this.records.size,
      committed: this.committedTransactions,
      aborted: this.abortedTransactions,
    };
  }
}
