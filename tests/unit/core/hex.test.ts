/**
 * Hex Text Tests
 */

import { describe, test, expect } from 'vitest';
import {
  isHexDigit,
  formatHexByte,
  bytesToHex,
  formatOffset,
  parseHexText,
  decodeHexText,
} from '../../../src/core/hex.ts';
import { MalformedPasteError, isByteGridError } from '../../../src/core/errors.ts';

describe('hex helpers', () => {
  describe('isHexDigit', () => {
    test('accepts digits in both cases', () => {
      expect(isHexDigit('0')).toBe(true);
      expect(isHexDigit('a')).toBe(true);
      expect(isHexDigit('F')).toBe(true);
    });

    test('rejects other characters and multi-char strings', () => {
      expect(isHexDigit('g')).toBe(false);
      expect(isHexDigit(' ')).toBe(false);
      expect(isHexDigit('ab')).toBe(false);
    });
  });

  describe('formatting', () => {
    test('formatHexByte pads and respects casing', () => {
      expect(formatHexByte(0x0a)).toBe('0A');
      expect(formatHexByte(0xbe, 'lower')).toBe('be');
      expect(formatHexByte(0)).toBe('00');
    });

    test('bytesToHex joins pairs without separators', () => {
      expect(bytesToHex([0xde, 0xad, 0x01])).toBe('DEAD01');
      expect(bytesToHex(new Uint8Array([0xff, 0x10]), 'lower')).toBe('ff10');
      expect(bytesToHex([])).toBe('');
    });

    test('formatOffset zero-pads to the digit count', () => {
      expect(formatOffset(0x1f0, 8)).toBe('000001F0');
      expect(formatOffset(0x1f0, 4, 'lower')).toBe('01f0');
    });

    test('formatOffset keeps the trailing digits of long offsets', () => {
      expect(formatOffset(0x12345, 4)).toBe('2345');
    });
  });

  describe('parsing', () => {
    test('strips spaces, hyphens and underscores', () => {
      expect(Array.from(parseHexText('01 02-03_ff') ?? [])).toEqual([1, 2, 3, 255]);
    });

    test('odd digit counts get a leading zero', () => {
      expect(Array.from(parseHexText('abc') ?? [])).toEqual([0x0a, 0xbc]);
    });

    test('empty text decodes to no bytes', () => {
      expect(parseHexText('')?.length).toBe(0);
    });

    test('returns null for non-hex pairs', () => {
      expect(parseHexText('zz')).toBeNull();
      expect(parseHexText('0x10')).toBeNull();
    });

    test('decodeHexText throws a malformed paste error', () => {
      expect(() => decodeHexText('hello')).toThrow(MalformedPasteError);
      try {
        decodeHexText('q1');
      } catch (error) {
        expect(isByteGridError(error, 'MALFORMED_PASTE')).toBe(true);
        expect(isByteGridError(error, 'OUT_OF_RANGE')).toBe(false);
      }
    });
  });
});
