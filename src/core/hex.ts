/**
 * Hex Text Helpers
 *
 * Formatting and parsing of hex-pair text used by rendering, copy and paste.
 */

import { MalformedPasteError } from './errors.ts';

export type HexCasing = 'upper' | 'lower';

/** Separators removed from hex text before decoding */
const HEX_SEPARATORS = /[ \-_]/g;

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;

/**
 * Check whether a single character is a hex digit.
 */
export function isHexDigit(char: string): boolean {
  return char.length === 1 && /[0-9a-fA-F]/.test(char);
}

/**
 * Format one byte as two hex digits.
 */
export function formatHexByte(value: number, casing: HexCasing = 'upper'): string {
  const hex = (value & 0xff).toString(16).padStart(2, '0');
  return casing === 'upper' ? hex.toUpperCase() : hex;
}

/**
 * Format bytes as hex pairs with no separator.
 */
export function bytesToHex(bytes: ArrayLike<number>, casing: HexCasing = 'upper'): string {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += formatHexByte(bytes[i] ?? 0, casing);
  }
  return result;
}

/**
 * Format an offset for the line gutter: zero-padded to `digits`,
 * keeping only the last `digits` characters when it is longer.
 */
export function formatOffset(offset: number, digits: number, casing: HexCasing = 'upper'): string {
  let text = offset.toString(16);
  if (casing === 'upper') text = text.toUpperCase();
  if (text.length > digits) return text.slice(text.length - digits);
  return text.padStart(digits, '0');
}

/**
 * Decode hex text into bytes.
 *
 * Spaces, hyphens and underscores are stripped, an odd digit count gets a
 * leading zero, and the rest is read two digits at a time. Returns null when
 * any pair is not hex.
 */
export function parseHexText(text: string): Uint8Array | null {
  let digits = text.replace(HEX_SEPARATORS, '');
  if (digits.length % 2 === 1) digits = '0' + digits;

  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const pair = digits.slice(i * 2, i * 2 + 2);
    if (!HEX_PAIR.test(pair)) return null;
    bytes[i] = parseInt(pair, 16);
  }
  return bytes;
}

/**
 * Decode hex text, throwing on malformed input.
 */
export function decodeHexText(text: string): Uint8Array {
  const bytes = parseHexText(text);
  if (!bytes) {
    throw new MalformedPasteError(`Not a hex string: "${text}"`);
  }
  return bytes;
}
