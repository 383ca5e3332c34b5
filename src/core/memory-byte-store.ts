/**
 * Memory Byte Store
 *
 * Growable in-memory byte store backed by a plain array.
 */

import {
  type ByteStore,
  type ByteStoreEvent,
  type ByteStoreListener,
  StoreNotifier,
  assertInsertOffset,
  assertOffset,
} from './byte-store.ts';
import { CapabilityDeniedError, OutOfRangeError } from './errors.ts';

export interface MemoryByteStoreOptions {
  supportsWrite?: boolean;
  supportsInsert?: boolean;
  supportsDelete?: boolean;
  /** Changed offsets carried over from a previous store */
  changedOffsets?: Iterable<number>;
}

export class MemoryByteStore implements ByteStore {
  private data: number[];
  private notifier = new StoreNotifier();
  private dirty = false;
  private readonly canWrite: boolean;
  private readonly canInsert: boolean;
  private readonly canDelete: boolean;

  readonly changedOffsets: Set<number>;

  constructor(bytes: ArrayLike<number> = [], options: MemoryByteStoreOptions = {}) {
    this.data = Array.from(bytes, (b) => b & 0xff);
    this.canWrite = options.supportsWrite ?? true;
    this.canInsert = options.supportsInsert ?? true;
    this.canDelete = options.supportsDelete ?? true;
    this.changedOffsets = new Set(options.changedOffsets ?? []);
  }

  get length(): number {
    return this.data.length;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reading
  // ─────────────────────────────────────────────────────────────────────────

  readByte(offset: number): number {
    assertOffset(offset, this.data.length);
    return this.data[offset] ?? 0;
  }

  readRange(offset: number, count: number): Uint8Array {
    if (count < 0) throw new OutOfRangeError(`count ${count} is negative`);
    if (offset >= this.data.length || count === 0) return new Uint8Array(0);
    assertOffset(offset, this.data.length);
    return Uint8Array.from(this.data.slice(offset, offset + count));
  }

  /**
   * Copy of the whole content.
   */
  bytes(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  writeByte(offset: number, value: number): void {
    if (!this.canWrite) throw new CapabilityDeniedError('write');
    assertOffset(offset, this.data.length);

    this.data[offset] = value & 0xff;
    this.dirty = true;
    this.notifier.emit('changed');
  }

  insertBytes(offset: number, bytes: ArrayLike<number>): void {
    if (!this.canInsert) throw new CapabilityDeniedError('insert');
    assertInsertOffset(offset, this.data.length);
    if (bytes.length === 0) return;

    const inserted = Array.from(bytes, (b) => b & 0xff);
    this.data = this.data.slice(0, offset).concat(inserted, this.data.slice(offset));
    this.dirty = true;
    this.notifier.emit('lengthChanged');
    this.notifier.emit('changed');
  }

  deleteBytes(offset: number, count: number): void {
    if (!this.canDelete) throw new CapabilityDeniedError('delete');
    if (count < 0) throw new OutOfRangeError(`count ${count} is negative`);
    assertOffset(offset, this.data.length);

    // Deleting past the end removes what is there
    const removed = Math.min(count, this.data.length - offset);
    if (removed === 0) return;

    this.data.splice(offset, removed);
    this.dirty = true;
    this.notifier.emit('lengthChanged');
    this.notifier.emit('changed');
  }

  supportsWriteByte(): boolean {
    return this.canWrite;
  }

  supportsInsertBytes(): boolean {
    return this.canInsert;
  }

  supportsDeleteBytes(): boolean {
    return this.canDelete;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Change State
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Whether the content changed since construction or the last applyChanges().
   */
  hasChanges(): boolean {
    return this.dirty;
  }

  /**
   * Mark the current content as the saved baseline.
   */
  applyChanges(): void {
    this.dirty = false;
  }

  on(event: ByteStoreEvent, listener: ByteStoreListener): () => void {
    return this.notifier.on(event, listener);
  }
}
