/**
 * Byte Store
 *
 * Contract between the engine and whatever holds the bytes being edited.
 * Stores are owned by the host; the engine keeps a reference and a
 * subscription to the change notifications.
 */

import { OutOfRangeError } from './errors.ts';

// ============================================
// Contract
// ============================================

export type ByteStoreEvent = 'changed' | 'lengthChanged';

export type ByteStoreListener = () => void;

export interface ByteStore {
  /** Number of bytes currently held */
  readonly length: number;

  /** Read one byte. Throws OutOfRangeError when offset is not in [0, length). */
  readByte(offset: number): number;
  /** Read up to `count` bytes; shorter when the range runs past the end. */
  readRange(offset: number, count: number): Uint8Array;

  /** Overwrite one byte. */
  writeByte(offset: number, value: number): void;
  /** Insert bytes before `offset`; `offset === length` appends. */
  insertBytes(offset: number, bytes: ArrayLike<number>): void;
  /** Remove `count` bytes starting at `offset`. */
  deleteBytes(offset: number, count: number): void;

  supportsWriteByte(): boolean;
  supportsInsertBytes(): boolean;
  supportsDeleteBytes(): boolean;

  /** Subscribe to a notification. Returns an unsubscribe function. */
  on(event: ByteStoreEvent, listener: ByteStoreListener): () => void;

  /**
   * Offsets the store remembers as changed, used to carry the dirty set
   * across a store swap. Optional.
   */
  readonly changedOffsets?: ReadonlySet<number>;
}

// ============================================
// Range Checks
// ============================================

/**
 * Throw unless `offset` is an integer in [0, limit).
 */
export function assertOffset(offset: number, limit: number, what = 'offset'): void {
  if (!Number.isInteger(offset) || offset < 0 || offset >= limit) {
    throw new OutOfRangeError(`${what} ${offset} is outside [0, ${limit})`);
  }
}

/**
 * Throw unless `offset` is an integer in [0, limit].
 */
export function assertInsertOffset(offset: number, limit: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > limit) {
    throw new OutOfRangeError(`insert offset ${offset} is outside [0, ${limit}]`);
  }
}

// ============================================
// Notifier
// ============================================

/**
 * Listener registry that delivers events after the triggering call returns.
 *
 * Events emitted while listeners are running are queued and delivered once
 * the current round finishes, so a listener that mutates the store never
 * sees a nested notification.
 */
export class StoreNotifier {
  private listeners: Map<ByteStoreEvent, Set<ByteStoreListener>> = new Map();
  private queue: ByteStoreEvent[] = [];
  private delivering = false;

  on(event: ByteStoreEvent, listener: ByteStoreListener): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(listener);

    return () => {
      this.listeners.get(event)?.delete(listener);
    };
  }

  emit(event: ByteStoreEvent): void {
    this.queue.push(event);
    if (this.delivering) return;

    this.delivering = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        for (const listener of [...(this.listeners.get(next) ?? [])]) {
          listener();
        }
        next = this.queue.shift();
      }
    } finally {
      this.delivering = false;
      this.queue = [];
    }
  }
}
