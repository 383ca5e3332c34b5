/**
 * Clipboard
 *
 * Clipboard collaborator contract and the payload conversions used by
 * copy, cut and paste.
 */

import { parseHexText } from './hex.ts';

// ============================================
// Types
// ============================================

/**
 * Clipboard content. Raw bytes take precedence over text when both exist.
 */
export interface ClipboardData {
  text?: string;
  bytes?: Uint8Array;
}

export interface Clipboard {
  read(): ClipboardData | null;
  write(data: ClipboardData): void;
}

export type CopyContentType = 'char' | 'hex';

export interface CopyResult {
  /** Selected bytes */
  bytes: Uint8Array;
  /** Bytes decoded through the active converter */
  text: string;
  /** Hex pairs without separator, in the configured casing */
  hex: string;
  /** The representation written as clipboard text */
  contentType: CopyContentType;
}

export type PasteResult =
  | { ok: true; offset: number; length: number }
  | { ok: false; reason: 'denied' | 'empty' | 'malformed' };

// ============================================
// In-memory Clipboard
// ============================================

/**
 * Process-local clipboard for hosts without a system clipboard.
 */
export class MemoryClipboard implements Clipboard {
  private data: ClipboardData | null = null;

  read(): ClipboardData | null {
    if (!this.data) return null;
    return { ...this.data };
  }

  write(data: ClipboardData): void {
    this.data = { ...data };
  }

  clear(): void {
    this.data = null;
  }
}

// ============================================
// Conversions
// ============================================

/**
 * Encode text as 7-bit ASCII; other characters become '?'.
 */
export function encodeAscii(text: string): Uint8Array {
  const codePoints = Array.from(text, (char) => char.codePointAt(0) ?? 0x3f);
  return Uint8Array.from(codePoints, (code) => (code < 0x80 ? code : 0x3f));
}

export type PayloadResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; reason: 'empty' | 'malformed' };

/**
 * Bytes to insert for a clipboard payload. Text is read as hex pairs when
 * `asHex` is set, else as ASCII.
 */
export function payloadBytes(data: ClipboardData | null, asHex: boolean): PayloadResult {
  if (data?.bytes) return { ok: true, bytes: data.bytes };
  if (data?.text === undefined) return { ok: false, reason: 'empty' };
  if (!asHex) return { ok: true, bytes: encodeAscii(data.text) };

  const bytes = parseHexText(data.text);
  return bytes ? { ok: true, bytes } : { ok: false, reason: 'malformed' };
}
