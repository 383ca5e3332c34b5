/**
 * Base Element
 *
 * What the terminal host needs from an element that owns a rectangle of
 * the screen: bounds, focus, status text, input routing and persisted state.
 */

import type { KeyEvent, MouseEvent, Rect } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';

// ============================================
// Element Context
// ============================================

/**
 * Pane colors for one focus state.
 */
export interface PaneColors {
  background: string;
  foreground: string;
  selectionBackground: string;
}

/**
 * Host services available to an element.
 */
export interface ElementContext {
  /** Schedule a re-render */
  markDirty: () => void;
  /** Ask the host to move focus to this element */
  requestFocus: () => void;
  /** Status bar text for this element */
  updateStatus: (status: string) => void;
  /** Theme color for a key, or the fallback when the theme has none */
  getThemeColor: (key: string, fallback: string) => string;
  getPaneColors: (focused: boolean) => PaneColors;
}

/**
 * Context with a dark palette and no-op host callbacks.
 */
export function createTestContext(overrides: Partial<ElementContext> = {}): ElementContext {
  return {
    markDirty: () => {},
    requestFocus: () => {},
    updateStatus: () => {},
    getThemeColor: (_key, fallback) => fallback,
    getPaneColors: () => ({
      background: '#1e1e1e',
      foreground: '#d4d4d4',
      selectionBackground: '#094771',
    }),
    ...overrides,
  };
}

// ============================================
// Base Element Class
// ============================================

export abstract class BaseElement {
  readonly id: string;

  protected ctx: ElementContext;
  protected bounds: Rect = { x: 0, y: 0, width: 0, height: 0 };
  protected focused = false;
  private status = '';

  constructor(id: string, ctx: ElementContext) {
    this.id = id;
    this.ctx = ctx;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Contract
  // ─────────────────────────────────────────────────────────────────────────

  /** Draw into the element's bounds */
  abstract render(buffer: ScreenBuffer): void;

  /** Returns false to let the host handle the key */
  abstract handleKey(event: KeyEvent): boolean;

  /** Mouse events arrive in screen coordinates */
  abstract handleMouse(event: MouseEvent): boolean;

  abstract getState(): unknown;
  abstract setState(state: unknown): void;

  // ─────────────────────────────────────────────────────────────────────────
  // Focus
  // ─────────────────────────────────────────────────────────────────────────

  onFocus(): void {
    this.focused = true;
    this.ctx.markDirty();
  }

  onBlur(): void {
    this.focused = false;
    this.ctx.markDirty();
  }

  isFocused(): boolean {
    return this.focused;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bounds & Status
  // ─────────────────────────────────────────────────────────────────────────

  setBounds(bounds: Rect): void {
    const { x, y, width, height } = this.bounds;
    if (x === bounds.x && y === bounds.y && width === bounds.width && height === bounds.height) return;

    this.bounds = { ...bounds };
    this.ctx.markDirty();
  }

  getStatus(): string {
    return this.status;
  }

  /**
   * Forwards to the host only when the text changes.
   */
  protected setStatus(status: string): void {
    if (this.status === status) return;
    this.status = status;
    this.ctx.updateStatus(status);
  }
}
