/**
 * MemoryByteStore Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { MemoryByteStore } from '../../../src/core/memory-byte-store.ts';
import { StoreNotifier, assertOffset, assertInsertOffset } from '../../../src/core/byte-store.ts';
import { CapabilityDeniedError, OutOfRangeError } from '../../../src/core/errors.ts';

describe('MemoryByteStore', () => {
  let store: MemoryByteStore;

  beforeEach(() => {
    store = new MemoryByteStore([0x10, 0x20, 0x30, 0x40]);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Reading
  // ─────────────────────────────────────────────────────────────────────────

  describe('reading', () => {
    test('length and readByte', () => {
      expect(store.length).toBe(4);
      expect(store.readByte(2)).toBe(0x30);
    });

    test('values are masked to a byte', () => {
      expect(new MemoryByteStore([0x1ff]).readByte(0)).toBe(0xff);
    });

    test('readByte out of range throws', () => {
      expect(() => store.readByte(4)).toThrow(OutOfRangeError);
      expect(() => store.readByte(-1)).toThrow(OutOfRangeError);
    });

    test('readRange is truncated at the end', () => {
      expect(Array.from(store.readRange(2, 10))).toEqual([0x30, 0x40]);
      expect(store.readRange(4, 2).length).toBe(0);
      expect(store.readRange(1, 0).length).toBe(0);
    });

    test('readRange rejects negative counts and offsets', () => {
      expect(() => store.readRange(0, -1)).toThrow(OutOfRangeError);
      expect(() => store.readRange(-1, 1)).toThrow(OutOfRangeError);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  describe('mutation', () => {
    test('writeByte replaces one byte', () => {
      store.writeByte(1, 0xab);
      expect(Array.from(store.bytes())).toEqual([0x10, 0xab, 0x30, 0x40]);
      expect(store.hasChanges()).toBe(true);
    });

    test('insertBytes inserts before the offset and appends at length', () => {
      store.insertBytes(1, [1, 2]);
      store.insertBytes(6, [9]);
      expect(Array.from(store.bytes())).toEqual([0x10, 1, 2, 0x20, 0x30, 0x40, 9]);
    });

    test('insertBytes past the end throws', () => {
      expect(() => store.insertBytes(5, [1])).toThrow(OutOfRangeError);
    });

    test('deleteBytes removes at most what is there', () => {
      store.deleteBytes(2, 10);
      expect(Array.from(store.bytes())).toEqual([0x10, 0x20]);
    });

    test('applyChanges clears the change flag', () => {
      store.writeByte(0, 0);
      store.applyChanges();
      expect(store.hasChanges()).toBe(false);
    });

    test('capabilities can be turned off', () => {
      const fixed = new MemoryByteStore([1, 2], { supportsInsert: false, supportsDelete: false });
      expect(fixed.supportsWriteByte()).toBe(true);
      expect(fixed.supportsInsertBytes()).toBe(false);
      expect(() => fixed.insertBytes(0, [1])).toThrow(CapabilityDeniedError);
      expect(() => fixed.deleteBytes(0, 1)).toThrow(CapabilityDeniedError);
    });

    test('read-only store denies writes', () => {
      const readOnly = new MemoryByteStore([1], { supportsWrite: false });
      try {
        readOnly.writeByte(0, 2);
      } catch (error) {
        expect(error).toBeInstanceOf(CapabilityDeniedError);
        if (error instanceof CapabilityDeniedError) expect(error.capability).toBe('write');
      }
      expect(readOnly.readByte(0)).toBe(1);
    });

    test('changedOffsets are seeded from options', () => {
      const seeded = new MemoryByteStore([1, 2, 3], { changedOffsets: [0, 2] });
      expect([...seeded.changedOffsets]).toEqual([0, 2]);
    });

    test('deleting then reinserting the same bytes restores the content', () => {
      const original = store.bytes();
      const removed = store.readRange(1, 2);
      store.deleteBytes(1, 2);
      store.insertBytes(1, removed);
      expect(store.bytes()).toEqual(original);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Notifications
  // ─────────────────────────────────────────────────────────────────────────

  describe('notifications', () => {
    test('writeByte emits changed only', () => {
      const events: string[] = [];
      store.on('changed', () => events.push('changed'));
      store.on('lengthChanged', () => events.push('lengthChanged'));
      store.writeByte(0, 1);
      expect(events).toEqual(['changed']);
    });

    test('insert and delete emit lengthChanged then changed', () => {
      const events: string[] = [];
      store.on('changed', () => events.push('changed'));
      store.on('lengthChanged', () => events.push('lengthChanged'));
      store.insertBytes(0, [1]);
      store.deleteBytes(0, 1);
      expect(events).toEqual(['lengthChanged', 'changed', 'lengthChanged', 'changed']);
    });

    test('empty inserts do not notify', () => {
      let count = 0;
      store.on('changed', () => count++);
      store.insertBytes(0, []);
      expect(count).toBe(0);
    });

    test('unsubscribe stops delivery', () => {
      let count = 0;
      const off = store.on('changed', () => count++);
      off();
      store.writeByte(0, 1);
      expect(count).toBe(0);
    });
  });
});

describe('StoreNotifier', () => {
  test('events raised by a listener are delivered after it returns', () => {
    const notifier = new StoreNotifier();
    const order: string[] = [];

    notifier.on('lengthChanged', () => {
      order.push('length:start');
      notifier.emit('changed');
      order.push('length:end');
    });
    notifier.on('changed', () => order.push('changed'));

    notifier.emit('lengthChanged');
    expect(order).toEqual(['length:start', 'length:end', 'changed']);
  });
});

describe('range checks', () => {
  test('assertOffset accepts [0, limit)', () => {
    expect(() => assertOffset(0, 1)).not.toThrow();
    expect(() => assertOffset(1, 1)).toThrow(OutOfRangeError);
    expect(() => assertOffset(0.5, 2)).toThrow(OutOfRangeError);
  });

  test('assertInsertOffset accepts [0, limit]', () => {
    expect(() => assertInsertOffset(1, 1)).not.toThrow();
    expect(() => assertInsertOffset(2, 1)).toThrow('insert offset 2 is outside [0, 1]');
  });
});
