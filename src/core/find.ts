/**
 * Find Engine
 *
 * Linear byte-pattern search over a byte store, forward or backward, with
 * cooperative cancellation. Case-insensitive text search compares each
 * byte against two pre-encoded buffers (lower and upper case).
 */

import { debugLog } from '../debug.ts';
import type { ByteStore } from './byte-store.ts';
import type { ByteCharConverter } from './char-converter.ts';
import { InvalidPatternError } from './errors.ts';
import type { Direction } from './types.ts';

// ============================================
// Types
// ============================================

/** No match between the start position and the end of the scan */
export const FIND_NOT_FOUND = -1;
/** The search was aborted before it finished */
export const FIND_ABORTED = -2;

export type FindPattern =
  | { kind: 'text'; matchCase: true; buffer: Uint8Array }
  | { kind: 'text'; matchCase: false; lower: Uint8Array; upper: Uint8Array }
  | { kind: 'hex'; bytes: Uint8Array };

export interface FindOptions {
  pattern: FindPattern;
  direction: Direction;
}

/** Default number of scanned positions between yields to the event loop */
export const DEFAULT_FIND_YIELD_INTERVAL = 1000;

// ============================================
// Pattern Helpers
// ============================================

/**
 * Build a text pattern using a converter's encoding.
 *
 * Case-insensitive search compares lower and upper case byte for byte, so
 * text whose case forms encode to different lengths (e.g. 'ß' and 'SS')
 * falls back to an exact-case pattern.
 */
export function buildTextPattern(text: string, matchCase: boolean, converter: ByteCharConverter): FindPattern {
  const exact: FindPattern = { kind: 'text', matchCase: true, buffer: converter.encode(text) };
  if (matchCase) return exact;

  const lower = converter.encode(text.toLowerCase());
  const upper = converter.encode(text.toUpperCase());
  if (lower.length !== upper.length) return exact;
  return { kind: 'text', matchCase: false, lower, upper };
}

/**
 * Resolve a pattern into its primary and optional secondary buffers.
 * Throws InvalidPatternError for empty or mismatched buffers.
 */
export function resolvePattern(pattern: FindPattern): { primary: Uint8Array; secondary: Uint8Array | null } {
  switch (pattern.kind) {
    case 'hex':
      if (pattern.bytes.length === 0) throw new InvalidPatternError('Hex pattern is empty');
      return { primary: pattern.bytes, secondary: null };
    case 'text':
      if (pattern.matchCase) {
        if (pattern.buffer.length === 0) throw new InvalidPatternError('Text pattern is empty');
        return { primary: pattern.buffer, secondary: null };
      }
      if (pattern.lower.length === 0 || pattern.upper.length === 0) {
        throw new InvalidPatternError('Text pattern is empty');
      }
      if (pattern.lower.length !== pattern.upper.length) {
        throw new InvalidPatternError('Lower and upper case buffers must have the same length');
      }
      return { primary: pattern.lower, secondary: pattern.upper };
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ============================================
// Find Engine
// ============================================

export class FindEngine {
  private abortRequested = false;
  private running = false;
  private findingPosition = -1;
  private readonly yieldInterval: number;

  constructor(yieldInterval: number = DEFAULT_FIND_YIELD_INTERVAL) {
    this.yieldInterval = Math.max(1, yieldInterval);
  }

  /** Whether a search is in progress */
  get isRunning(): boolean {
    return this.running;
  }

  /** Position the scan last rewound to */
  get currentPosition(): number {
    return this.findingPosition;
  }

  /**
   * Ask a running search to stop at its next check.
   */
  abort(): void {
    this.abortRequested = true;
  }

  /**
   * Search `store` starting after the current selection.
   *
   * The scan starts at `selectionStart` shifted by `selectionLength` in the
   * search direction, so repeating a search does not match the current
   * selection again. Resolves to the lowest offset of the match,
   * FIND_NOT_FOUND or FIND_ABORTED.
   */
  async find(
    store: ByteStore,
    selectionStart: number,
    selectionLength: number,
    options: FindOptions,
    signal?: AbortSignal
  ): Promise<number> {
    const { primary, secondary } = resolvePattern(options.pattern);
    const forward = options.direction === 'forward';
    const step = forward ? 1 : -1;
    const patternLength = primary.length;

    this.abortRequested = false;
    this.running = true;
    const isAborted = (): boolean => this.abortRequested || signal?.aborted === true;

    try {
      let match = 0;
      let start = selectionStart + selectionLength * step;
      // A backward scan from the append position starts at the last byte
      if (!forward) start = Math.min(start, store.length - 1);

      for (let pos = start; forward ? pos < store.length : pos >= 0; pos += step) {
        if (isAborted()) return this.aborted(pos);

        if (pos % this.yieldInterval === 0) {
          await yieldToEventLoop();
          if (isAborted()) return this.aborted(pos);
        }

        const value = store.readByte(pos);
        const index = forward ? match : patternLength - 1 - match;
        const isMatch = value === primary[index] || (secondary !== null && value === secondary[index]);

        if (!isMatch) {
          // Rewind to just past the first byte of the failed window
          pos -= match * step;
          match = 0;
          this.findingPosition = pos;
          continue;
        }

        match++;
        if (match === patternLength) {
          const found = pos - (forward ? patternLength - 1 : 0);
          debugLog(`[FindEngine] match at ${found}`);
          return found;
        }
      }

      return FIND_NOT_FOUND;
    } finally {
      this.running = false;
    }
  }

  private aborted(pos: number): number {
    debugLog(`[FindEngine] aborted at ${pos}`);
    this.findingPosition = pos;
    return FIND_ABORTED;
  }
}
