/**
 * Core Types
 *
 * Shared value types for the byte grid engine.
 */

// ============================================
// Coordinates
// ============================================

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Column and row relative to the first visible byte */
export interface GridPoint {
  column: number;
  row: number;
}

// ============================================
// Positions
// ============================================

/** Which hex digit of a byte is targeted: 0 = high, 1 = low */
export type Nibble = 0 | 1;

export interface BytePosition {
  offset: number;
  nibble: Nibble;
}

// ============================================
// Modes
// ============================================

/**
 * Active input mode. `empty` means no store is bound.
 */
export type InputMode = 'empty' | 'hex' | 'char';

/** Pane of the grid a position or caret belongs to */
export type GridPane = 'hex' | 'char';

export type Direction = 'forward' | 'backward';

export function emptyRect(): Rect {
  return { x: 0, y: 0, width: 0, height: 0 };
}

export function rectContains(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  );
}
