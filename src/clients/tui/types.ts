/**
 * TUI Core Types
 *
 * Cells and input events shared by the terminal client layer.
 */

import type { Rect } from '../../core/types.ts';

export type { Rect };

export interface Size {
  width: number;
  height: number;
}

// ============================================
// Rendering
// ============================================

export interface Cell {
  char: string;
  fg: string; // Foreground color (hex or name)
  bg: string; // Background color
  underline?: boolean;
}

/**
 * Blank cell in the given colors.
 */
export function createEmptyCell(bg = 'default', fg = 'default'): Cell {
  return { char: ' ', fg, bg };
}

// ============================================
// Input
// ============================================

export interface KeyEvent {
  key: string; // e.g., 'a', 'Enter', 'ArrowUp'
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}

export interface MouseEvent {
  type: 'press' | 'release' | 'drag' | 'scroll' | 'move';
  button: 'left' | 'middle' | 'right' | 'none';
  x: number;
  y: number;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  /** Scroll direction: 1 for down, -1 for up (only set for scroll events) */
  scrollDirection?: 1 | -1;
}

export function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}
