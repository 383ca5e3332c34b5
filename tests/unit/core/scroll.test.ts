/**
 * ScrollController Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { ScrollController, NATIVE_SCROLL_MAX } from '../../../src/core/scroll.ts';

describe('ScrollController', () => {
  let lines: number[];
  let scroll: ScrollController;

  beforeEach(() => {
    lines = [];
    scroll = new ScrollController((line) => lines.push(line));
    scroll.setVisibleByteRange(16, 4);
    scroll.recomputeBounds(100);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Bounds
  // ─────────────────────────────────────────────────────────────────────────

  describe('bounds', () => {
    test('scrollMax counts the append position', () => {
      expect(scroll.scrollMax).toBe(3);
      expect(scroll.getState()).toEqual({ scrollPos: 0, scrollMax: 3, firstVisibleByte: 0, lastVisibleByte: 64 });
    });

    test('a store that fits has no scroll range', () => {
      scroll.recomputeBounds(40);
      expect(scroll.scrollMax).toBe(0);
    });

    test('an empty store has no visible bytes', () => {
      scroll.recomputeBounds(0);
      expect(scroll.scrollMax).toBe(0);
      expect(scroll.lastVisibleByte).toBe(-1);
    });

    test('shrinking clamps the position', () => {
      scroll.scrollToLine(3);
      scroll.recomputeBounds(70);
      expect(scroll.scrollMax).toBe(1);
      expect(scroll.scrollPos).toBe(1);
      expect(lines).toEqual([3, 1]);
    });

    test('changing the line width keeps the first byte in view', () => {
      scroll.scrollToLine(2);
      scroll.setVisibleByteRange(8, 4);
      expect(scroll.scrollPos).toBe(4);
      expect(scroll.firstVisibleByte).toBe(32);
    });

    test('reset returns to the top', () => {
      scroll.scrollToLine(2);
      scroll.reset();
      expect(scroll.scrollPos).toBe(0);
      expect(scroll.scrollMax).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Scrolling
  // ─────────────────────────────────────────────────────────────────────────

  describe('scrolling', () => {
    test('scrollToLine ignores out-of-range and unchanged lines', () => {
      expect(scroll.scrollToLine(4)).toBe(false);
      expect(scroll.scrollToLine(-1)).toBe(false);
      expect(scroll.scrollToLine(0)).toBe(false);
      expect(scroll.scrollToLine(2)).toBe(true);
      expect(lines).toEqual([2]);
    });

    test('scrollLines clamps to the range', () => {
      expect(scroll.scrollLines(10)).toBe(true);
      expect(scroll.scrollPos).toBe(3);
      expect(scroll.scrollLines(-10)).toBe(true);
      expect(scroll.scrollPos).toBe(0);
      expect(scroll.scrollLines(0)).toBe(false);
    });

    test('scrollPages moves by the visible line count', () => {
      scroll.setVisibleByteRange(16, 2);
      scroll.recomputeBounds(100);
      scroll.scrollPages(1);
      expect(scroll.scrollPos).toBe(2);
    });

    test('scrollByteIntoView scrolls down just enough', () => {
      expect(scroll.scrollByteIntoView(70)).toBe(true);
      expect(scroll.scrollPos).toBe(1);
    });

    test('scrollByteIntoView scrolls up to the byte line', () => {
      scroll.scrollToLine(3);
      expect(scroll.scrollByteIntoView(5)).toBe(true);
      expect(scroll.scrollPos).toBe(0);
    });

    test('visible bytes do not scroll', () => {
      expect(scroll.scrollByteIntoView(40)).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Native Range
  // ─────────────────────────────────────────────────────────────────────────

  describe('native range', () => {
    test('small ranges map one to one', () => {
      expect(scroll.nativeMax()).toBe(3);
      expect(scroll.toNative(2)).toBe(2);
      expect(scroll.fromNative(2)).toBe(2);
      expect(scroll.scrollThumb(3)).toBe(true);
      expect(scroll.scrollPos).toBe(3);
    });

    describe('proportional mode', () => {
      beforeEach(() => {
        // (2097183 + 1) / 16 - 4 = 131070 lines
        scroll.recomputeBounds(2097183);
      });

      test('native max is capped', () => {
        expect(scroll.scrollMax).toBe(131070);
        expect(scroll.nativeMax()).toBe(NATIVE_SCROLL_MAX);
      });

      test('toNative maps the ends of the range', () => {
        expect(scroll.toNative(0)).toBe(0);
        expect(scroll.toNative(131070)).toBe(NATIVE_SCROLL_MAX);
      });

      test('a thumb near the end snaps to the last line', () => {
        expect(scroll.scrollThumb(NATIVE_SCROLL_MAX - 10)).toBe(true);
        expect(scroll.scrollPos).toBe(131070);
      });

      test('a thumb at the start goes to the top', () => {
        scroll.scrollToLine(500);
        scroll.scrollThumb(0);
        expect(scroll.scrollPos).toBe(0);
      });
    });

    test('an exact native range snaps within nine units', () => {
      // (1048623 + 1) / 16 - 4 = 65535 lines
      scroll.recomputeBounds(1048623);
      expect(scroll.scrollMax).toBe(NATIVE_SCROLL_MAX);
      scroll.scrollThumb(NATIVE_SCROLL_MAX - 9);
      expect(scroll.scrollPos).toBe(NATIVE_SCROLL_MAX);
    });
  });
});
