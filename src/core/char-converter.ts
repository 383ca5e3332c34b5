/**
 * Byte/Character Converters
 *
 * Translate between bytes and the characters shown in the character pane.
 * Every converter returns one display character per input byte so that the
 * character pane stays aligned with the hex pane; bytes that continue a
 * multi-byte character are shown as FILLER_CHAR.
 */

/** Shown for non-printable bytes and for the tail bytes of a multi-byte character */
export const FILLER_CHAR = '.';

export type ConverterEncoding = 'default' | 'latin1' | 'utf-8' | 'utf-16le' | 'utf-16be';

export interface ByteCharConverter {
  /** Human readable name, e.g. for an encoding picker */
  readonly name: string;
  /** Character to display for a single byte */
  toChar(value: number): string;
  /** Display string for a run of bytes, one character per byte */
  toDisplayString(bytes: ArrayLike<number>): string;
  /** Byte written when `char` is typed in the character pane */
  toByte(char: string): number;
  /** Encode text in this converter's encoding (used by text search) */
  encode(text: string): Uint8Array;
}

/**
 * Whether a code point renders as itself rather than the filler.
 */
export function isPrintable(codePoint: number): boolean {
  return codePoint > 0x1f && !(codePoint > 0x7e && codePoint < 0xa0);
}

function firstCodeUnit(char: string): number {
  return char.length > 0 ? char.charCodeAt(0) : 0;
}

// ============================================
// Single-byte converters
// ============================================

/**
 * Maps each byte to the character with the same code.
 */
export class DefaultByteCharConverter implements ByteCharConverter {
  readonly name: string = 'ANSI (Default)';

  toChar(value: number): string {
    return isPrintable(value) ? String.fromCharCode(value) : FILLER_CHAR;
  }

  toDisplayString(bytes: ArrayLike<number>): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
      result += this.toChar(bytes[i] ?? 0);
    }
    return result;
  }

  toByte(char: string): number {
    return firstCodeUnit(char) & 0xff;
  }

  encode(text: string): Uint8Array {
    const bytes = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
      bytes[i] = text.charCodeAt(i) & 0xff;
    }
    return bytes;
  }
}

/**
 * ISO-8859-1. Characters outside the code page are entered as '?'.
 */
export class Latin1ByteCharConverter extends DefaultByteCharConverter {
  override readonly name = 'Western European (ISO-8859-1)';

  override toByte(char: string): number {
    const code = firstCodeUnit(char);
    return code <= 0xff ? code : 0x3f;
  }

  override encode(text: string): Uint8Array {
    const bytes = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
      bytes[i] = this.toByte(text.charAt(i));
    }
    return bytes;
  }
}

// ============================================
// Multi-byte converters
// ============================================

/**
 * Length of the UTF-8 sequence introduced by `lead`, 0 if it cannot start one.
 */
function utf8SequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if ((lead & 0xe0) === 0xc0) return 2;
  if ((lead & 0xf0) === 0xe0) return 3;
  if ((lead & 0xf8) === 0xf0) return 4;
  return 0;
}

const UTF8_MIN_CODE_POINT = [0, 0, 0x80, 0x800, 0x10000];

export class Utf8ByteCharConverter implements ByteCharConverter {
  readonly name = 'Unicode (UTF-8)';
  private encoder = new TextEncoder();

  toChar(value: number): string {
    return value < 0x80 && isPrintable(value) ? String.fromCharCode(value) : FILLER_CHAR;
  }

  toDisplayString(bytes: ArrayLike<number>): string {
    let result = '';
    let i = 0;

    while (i < bytes.length) {
      const lead = bytes[i] ?? 0;
      const length = utf8SequenceLength(lead);
      const codePoint = length > 0 ? this.decodeAt(bytes, i, length) : null;

      if (codePoint === null) {
        result += FILLER_CHAR;
        i++;
        continue;
      }

      result += isPrintable(codePoint) ? String.fromCodePoint(codePoint) : FILLER_CHAR;
      result += FILLER_CHAR.repeat(length - 1);
      i += length;
    }

    return result;
  }

  toByte(char: string): number {
    return this.encoder.encode(char)[0] ?? 0;
  }

  encode(text: string): Uint8Array {
    return this.encoder.encode(text);
  }

  private decodeAt(bytes: ArrayLike<number>, start: number, length: number): number | null {
    if (start + length > bytes.length) return null;

    const lead = bytes[start] ?? 0;
    if (length === 1) return lead;

    let codePoint = lead & (0xff >> (length + 1));
    for (let k = 1; k < length; k++) {
      const next = bytes[start + k] ?? 0;
      if ((next & 0xc0) !== 0x80) return null;
      codePoint = (codePoint << 6) | (next & 0x3f);
    }

    const minimum = UTF8_MIN_CODE_POINT[length] ?? 0;
    if (codePoint < minimum || codePoint > 0x10ffff) return null;
    if (codePoint >= 0xd800 && codePoint <= 0xdfff) return null;
    return codePoint;
  }
}

export class Utf16ByteCharConverter implements ByteCharConverter {
  readonly name: string;
  private readonly littleEndian: boolean;

  constructor(littleEndian = true) {
    this.littleEndian = littleEndian;
    this.name = littleEndian ? 'Unicode (UTF-16LE)' : 'Unicode (UTF-16BE)';
  }

  /** A lone byte never forms a UTF-16 character */
  toChar(_value: number): string {
    return FILLER_CHAR;
  }

  toDisplayString(bytes: ArrayLike<number>): string {
    let result = '';
    let i = 0;

    while (i + 1 < bytes.length) {
      const unit = this.unitAt(bytes, i);

      if (unit >= 0xd800 && unit <= 0xdbff && i + 3 < bytes.length) {
        const low = this.unitAt(bytes, i + 2);
        if (low >= 0xdc00 && low <= 0xdfff) {
          const codePoint = 0x10000 + ((unit - 0xd800) << 10) + (low - 0xdc00);
          result += String.fromCodePoint(codePoint) + FILLER_CHAR.repeat(3);
          i += 4;
          continue;
        }
      }

      const isSurrogate = unit >= 0xd800 && unit <= 0xdfff;
      result += !isSurrogate && isPrintable(unit) ? String.fromCharCode(unit) : FILLER_CHAR;
      result += FILLER_CHAR;
      i += 2;
    }

    if (i < bytes.length) result += FILLER_CHAR;
    return result;
  }

  toByte(char: string): number {
    const unit = firstCodeUnit(char);
    return this.littleEndian ? unit & 0xff : (unit >> 8) & 0xff;
  }

  encode(text: string): Uint8Array {
    const bytes = new Uint8Array(text.length * 2);
    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);
      const low = unit & 0xff;
      const high = (unit >> 8) & 0xff;
      bytes[i * 2] = this.littleEndian ? low : high;
      bytes[i * 2 + 1] = this.littleEndian ? high : low;
    }
    return bytes;
  }

  private unitAt(bytes: ArrayLike<number>, index: number): number {
    const first = bytes[index] ?? 0;
    const second = bytes[index + 1] ?? 0;
    return this.littleEndian ? first | (second << 8) : (first << 8) | second;
  }
}

// ============================================
// Factory
// ============================================

/**
 * Create the converter for a configured encoding.
 */
export function createByteCharConverter(encoding: ConverterEncoding = 'default'): ByteCharConverter {
  switch (encoding) {
    case 'latin1':
      return new Latin1ByteCharConverter();
    case 'utf-8':
      return new Utf8ByteCharConverter();
    case 'utf-16le':
      return new Utf16ByteCharConverter(true);
    case 'utf-16be':
      return new Utf16ByteCharConverter(false);
    default:
      return new DefaultByteCharConverter();
  }
}
