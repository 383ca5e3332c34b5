/**
 * Screen Buffer
 *
 * Cell grid the elements render into. Every cell is one column wide.
 */

import { type Cell, type Rect, type Size, createEmptyCell } from '../types.ts';

export interface TextStyle {
  underline?: boolean;
}

// ============================================
// ScreenBuffer Class
// ============================================

export class ScreenBuffer {
  private readonly width: number;
  private readonly height: number;
  private readonly cells: Cell[][];

  constructor(size: Size) {
    this.width = size.width;
    this.height = size.height;
    this.cells = Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => createEmptyCell())
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cell Access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get a cell at position. Returns null if out of bounds.
   */
  get(x: number, y: number): Cell | null {
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Out of bounds writes are ignored.
   */
  set(x: number, y: number, cell: Cell): void {
    const row = this.cells[y];
    if (!row || x < 0 || x >= this.width) return;
    row[x] = { ...cell };
  }

  /**
   * Text of a row, one character per cell.
   */
  getLine(y: number): string {
    return (this.cells[y] ?? []).map((cell) => cell.char).join('');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Drawing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write a string starting at position, one cell per code point.
   * Returns the number of cells written.
   */
  writeString(x: number, y: number, text: string, fg: string, bg: string, style: TextStyle = {}): number {
    let written = 0;
    let px = x;

    for (const char of text) {
      if (px >= this.width) break;
      if (px >= 0 && y >= 0 && y < this.height) {
        this.set(px, y, { char, fg, bg, ...style });
        written++;
      }
      px++;
    }
    return written;
  }

  /**
   * Fill a rectangle with blank cells.
   */
  clearRect(rect: Rect, bg = 'default', fg = 'default'): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, createEmptyCell(bg, fg));
      }
    }
  }
}

// ============================================
// Factory Function
// ============================================

export function createScreenBuffer(size: Size): ScreenBuffer {
  return new ScreenBuffer(size);
}
