/**
 * Selection Model
 *
 * Cursor offset, nibble and selection length. The cursor offset is the
 * selection start; the selection covers [offset, offset + length).
 * The anchor is the fixed end used while a selection is being extended.
 */

import type { BytePosition, Nibble } from './types.ts';

export type SelectionEvent =
  | { type: 'selectionStartChanged'; offset: number }
  | { type: 'selectionLengthChanged'; length: number }
  | { type: 'currentLineChanged'; line: number }
  | { type: 'currentPositionInLineChanged'; column: number };

export interface SelectionSnapshot {
  offset: number;
  nibble: Nibble;
  length: number;
  anchor: number | null;
}

export class SelectionModel {
  private offset = 0;
  private nibbleIndex: Nibble = 0;
  private selectionLength = 0;
  private anchorOffset: number | null = null;
  private bytesPerLine = 1;
  private line = 1;
  private column = 1;
  private readonly emit: (event: SelectionEvent) => void;

  constructor(emit: (event: SelectionEvent) => void = () => {}) {
    this.emit = emit;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────────────

  get start(): number {
    return this.offset;
  }

  get nibble(): Nibble {
    return this.nibbleIndex;
  }

  get length(): number {
    return this.selectionLength;
  }

  /** One past the last selected byte */
  get end(): number {
    return this.offset + this.selectionLength;
  }

  get anchor(): number | null {
    return this.anchorOffset;
  }

  get hasSelection(): boolean {
    return this.selectionLength > 0;
  }

  /** The caret is shown only while nothing is selected */
  get caretVisible(): boolean {
    return this.selectionLength === 0;
  }

  /** 1-based line of the cursor */
  get currentLine(): number {
    return this.line;
  }

  /** 1-based column of the cursor within its line */
  get currentPositionInLine(): number {
    return this.column;
  }

  position(): BytePosition {
    return { offset: this.offset, nibble: this.nibbleIndex };
  }

  contains(offset: number): boolean {
    return this.selectionLength > 0 && offset >= this.offset && offset < this.end;
  }

  snapshot(): SelectionSnapshot {
    return {
      offset: this.offset,
      nibble: this.nibbleIndex,
      length: this.selectionLength,
      anchor: this.anchorOffset,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Move the cursor. The nibble is kept unless given.
   */
  setCursor(offset: number, nibble: Nibble = this.nibbleIndex): void {
    this.nibbleIndex = nibble;
    if (offset !== this.offset) {
      this.offset = offset;
      this.emit({ type: 'selectionStartChanged', offset });
    }
    this.refreshDerived();
  }

  setSelectionLength(length: number): void {
    if (length === this.selectionLength) return;
    this.selectionLength = length;
    this.emit({ type: 'selectionLengthChanged', length });
  }

  /**
   * Select [start, start + length) with the cursor at start.
   */
  select(start: number, length: number): void {
    this.setCursor(start, 0);
    this.setSelectionLength(length);
  }

  /**
   * Collapse the selection to the cursor and forget the anchor.
   */
  releaseSelection(): void {
    this.anchorOffset = null;
    this.setSelectionLength(0);
  }

  /**
   * Fix the anchor at the cursor when no extension is in progress.
   */
  captureAnchor(): number {
    if (this.anchorOffset === null || this.selectionLength === 0) {
      this.anchorOffset = this.offset;
    }
    return this.anchorOffset;
  }

  setAnchor(offset: number | null): void {
    this.anchorOffset = offset;
  }

  /**
   * Line width used for the line/column derivation.
   */
  setBytesPerLine(bytesPerLine: number): void {
    this.bytesPerLine = Math.max(1, bytesPerLine);
    this.refreshDerived();
  }

  reset(): void {
    this.anchorOffset = null;
    this.setCursor(0, 0);
    this.setSelectionLength(0);
  }

  restore(snapshot: SelectionSnapshot): void {
    this.setCursor(snapshot.offset, snapshot.nibble);
    this.setSelectionLength(snapshot.length);
    this.anchorOffset = snapshot.anchor;
  }

  private refreshDerived(): void {
    const line = Math.floor(this.offset / this.bytesPerLine) + 1;
    const column = this.offset - (line - 1) * this.bytesPerLine + 1;

    if (line !== this.line) {
      this.line = line;
      this.emit({ type: 'currentLineChanged', line });
    }
    if (column !== this.column) {
      this.column = column;
      this.emit({ type: 'currentPositionInLineChanged', column });
    }
  }
}
