/**
 * Hex Editor Element
 *
 * Terminal element around the hex engine. Draws the offset gutter, the
 * column header, the hex and character panes and a scrollbar, and routes
 * key and mouse input to the engine.
 */

import { BaseElement, type ElementContext } from './base.ts';
import { type KeyEvent, type MouseEvent, type Rect, containsPoint } from '../types.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';
import { debugLog } from '../../../debug.ts';
import type { ByteStore } from '../../../core/byte-store.ts';
import { createByteCharConverter } from '../../../core/char-converter.ts';
import type { Clipboard } from '../../../core/clipboard.ts';
import { type ByteCellClass, type EngineViewState, HexEngine } from '../../../core/engine.ts';
import { formatHexByte } from '../../../core/hex.ts';
import {
  type HexEditorSettings,
  defaultSettings,
  editorOptionsFrom,
  geometryOptionsFrom,
} from '../../../config/settings.ts';
import type { Keymap } from '../../../input/keymap.ts';

// ============================================
// Types
// ============================================

export interface HexEditorStatus {
  line: number;
  column: number;
  insertActive: boolean;
  mode: 'empty' | 'hex' | 'char';
  selectionLength: number;
}

export interface HexEditorCallbacks {
  /** Called when the cursor, selection or insert mode changes */
  onStatusChange?: (status: HexEditorStatus) => void;
  /** Called when the bytes change through editing */
  onContentChange?: () => void;
  /** Called when focus changes */
  onFocusChange?: (focused: boolean) => void;
}

export interface HexEditorOptions {
  settings?: HexEditorSettings;
  clipboard?: Clipboard;
  keymap?: Keymap;
}

/**
 * State for session persistence.
 */
export type HexEditorState = EngineViewState;

interface CellColors {
  fg: string;
  bg: string;
}

// ============================================
// Hex Editor Element
// ============================================

export class HexEditor extends BaseElement {
  private engine: HexEngine;
  private settings: HexEditorSettings;
  private callbacks: HexEditorCallbacks;
  private subscriptions: Array<() => void> = [];
  private draggingThumb = false;

  constructor(id: string, ctx: ElementContext, options: HexEditorOptions = {}, callbacks: HexEditorCallbacks = {}) {
    super(id, ctx);
    this.settings = { ...(options.settings ?? defaultSettings) };
    this.callbacks = callbacks;

    this.engine = new HexEngine({
      options: editorOptionsFrom(this.settings),
      geometry: geometryOptionsFrom(this.settings),
      converter: createByteCharConverter(this.settings['hexEditor.encoding']),
      clipboard: options.clipboard,
      keymap: options.keymap,
      findYieldInterval: this.settings['hexEditor.findYieldInterval'],
      lineInfoOffset: this.settings['hexEditor.lineInfoOffset'],
    });

    this.subscribeToEngine();
    this.updateStatusText();
  }

  private subscribeToEngine(): void {
    const engine = this.engine;
    const refresh = (): void => this.ctx.markDirty();
    const statusChanged = (): void => {
      this.updateStatusText();
      this.ctx.markDirty();
    };

    this.subscriptions.push(
      engine.on('selectionStartChanged', statusChanged),
      engine.on('selectionLengthChanged', statusChanged),
      engine.on('insertActiveChanged', statusChanged),
      engine.on('modeChanged', statusChanged),
      engine.on('storeChanged', statusChanged),
      engine.on('scrollChanged', refresh),
      engine.on('lengthChanged', refresh),
      engine.on('contentChanged', () => {
        this.callbacks.onContentChange?.();
        this.ctx.markDirty();
      })
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Store & Settings
  // ─────────────────────────────────────────────────────────────────────────

  getEngine(): HexEngine {
    return this.engine;
  }

  /**
   * Bind the bytes to edit, or none.
   */
  setStore(store: ByteStore | null): void {
    this.engine.setStore(store);
    debugLog(`[HexEditor] ${this.id} bound store (length=${store?.length ?? 0})`);
  }

  getSettings(): HexEditorSettings {
    return { ...this.settings };
  }

  /**
   * Apply changed settings to the engine.
   */
  applySettings(settings: HexEditorSettings): void {
    const previous = this.settings;
    this.settings = { ...settings };

    this.engine.setOptions(editorOptionsFrom(settings));
    this.engine.setGeometryOptions(geometryOptionsFrom(settings));
    this.engine.setLineInfoOffset(settings['hexEditor.lineInfoOffset']);
    if (previous['hexEditor.encoding'] !== settings['hexEditor.encoding']) {
      this.engine.setConverter(createByteCharConverter(settings['hexEditor.encoding']));
    }
    this.ctx.markDirty();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  getEditorStatus(): HexEditorStatus {
    const engine = this.engine;
    return {
      line: engine.currentLine,
      column: engine.currentPositionInLine,
      insertActive: engine.insertActive,
      mode: engine.mode,
      selectionLength: engine.selectionLength,
    };
  }

  private updateStatusText(): void {
    const status = this.getEditorStatus();
    if (status.mode === 'empty') {
      this.setStatus('');
    } else {
      const selection = status.selectionLength > 0 ? ` (${status.selectionLength} selected)` : '';
      this.setStatus(`Ln ${status.line}, Col ${status.column}${selection}  ${status.insertActive ? 'INS' : 'OVR'}`);
    }
    this.callbacks.onStatusChange?.(status);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout
  // ─────────────────────────────────────────────────────────────────────────

  override setBounds(bounds: Rect): void {
    super.setBounds(bounds);
    this.engine.setBounds(this.bounds);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  render(buffer: ScreenBuffer): void {
    const { width, height } = this.bounds;
    if (width <= 0 || height <= 0) return;

    const colors = this.ctx.getPaneColors(this.focused);
    const bg = colors.background;
    const fg = colors.foreground;

    buffer.clearRect(this.bounds, bg, fg);

    if (this.engine.mode === 'empty') return;

    this.renderColumnHeader(buffer, bg);
    this.renderRows(buffer, fg, bg);
    this.renderCaret(buffer, bg);
    this.renderScrollbar(buffer);
  }

  private renderColumnHeader(buffer: ScreenBuffer, bg: string): void {
    const layout = this.engine.getLayout();
    if (layout.columnInfo.height <= 0) return;

    const headerFg = this.ctx.getThemeColor('hexEditor.columnInfoForeground', '#858585');
    const casing = this.engine.getOptions().hexCasing;

    for (let column = 0; column < layout.bytesPerLine; column++) {
      const point = this.engine.geometry.columnHeaderPointOf(column);
      buffer.writeString(point.x, point.y, formatHexByte(column, casing), headerFg, bg);
    }
  }

  private renderRows(buffer: ScreenBuffer, fg: string, bg: string): void {
    const engine = this.engine;
    const geometry = engine.geometry;
    const layout = engine.getLayout();
    const { first } = engine.visibleRange();
    const casing = engine.getOptions().hexCasing;

    // Rows up to and including the one holding the append position
    const rows = Math.min(layout.visibleLines, Math.floor((engine.length - first) / layout.bytesPerLine) + 1);
    if (layout.lineInfo.width > 0) {
      const gutterFg = this.ctx.getThemeColor('hexEditor.lineInfoForeground', '#858585');
      for (let row = 0; row < rows; row++) {
        buffer.writeString(layout.lineInfo.x, layout.lineInfo.y + row, engine.lineLabel(row), gutterFg, bg);
      }
    }

    const bytes = engine.visibleBytes();
    const chars = Array.from(engine.getConverter().toDisplayString(bytes));

    bytes.forEach((value, index) => {
      const offset = first + index;
      const grid = geometry.gridPointOf(index);

      const hexColors = this.colorsFor(engine.classify(offset, 'hex'), fg, bg);
      const hexPoint = geometry.hexPointOf(grid);
      buffer.writeString(hexPoint.x, hexPoint.y, formatHexByte(value, casing), hexColors.fg, hexColors.bg);

      if (layout.chars) {
        const charColors = this.colorsFor(engine.classify(offset, 'char'), fg, bg);
        const charPoint = geometry.charPointOf(grid);
        buffer.writeString(charPoint.x, charPoint.y, chars[index] ?? '.', charColors.fg, charColors.bg);
      }
    });
  }

  private colorsFor(cellClass: ByteCellClass, fg: string, bg: string): CellColors {
    switch (cellClass) {
      case 'selected':
        return {
          fg: this.ctx.getThemeColor('hexEditor.selectionForeground', fg),
          bg: this.ctx.getThemeColor(
            'hexEditor.selectionBackground',
            this.ctx.getPaneColors(this.focused).selectionBackground
          ),
        };
      case 'dirty':
        return { fg: this.ctx.getThemeColor('hexEditor.dirtyForeground', '#e2c08d'), bg };
      case 'committed':
        return { fg: this.ctx.getThemeColor('hexEditor.committedForeground', '#81b88b'), bg };
      case 'zero':
        return { fg: this.ctx.getThemeColor('hexEditor.zeroForeground', '#5a5a5a'), bg };
      case 'normal':
        return { fg, bg };
    }
  }

  private renderCaret(buffer: ScreenBuffer, bg: string): void {
    if (!this.focused) return;
    const caret = this.engine.caretRect();
    if (!caret) return;

    const cell = buffer.get(caret.x, caret.y);
    const caretBg = this.ctx.getThemeColor('hexEditor.caretBackground', '#aeafad');
    buffer.set(caret.x, caret.y, {
      char: cell?.char ?? ' ',
      fg: this.engine.insertActive ? caretBg : bg,
      bg: this.engine.insertActive ? bg : caretBg,
      underline: this.engine.insertActive,
    });
  }

  private renderScrollbar(buffer: ScreenBuffer): void {
    const scrollBar = this.engine.getLayout().scrollBar;
    if (!scrollBar || scrollBar.height <= 0) return;

    const { scrollPos, scrollMax } = this.engine.getScrollState();
    const trackBg = this.ctx.getThemeColor('scrollbar.shadow', '#1e1e1e');
    const thumbBg = this.ctx.getThemeColor('scrollbarSlider.background', '#5a5a5a');

    const height = scrollBar.height;
    const totalLines = scrollMax + this.engine.getLayout().visibleLines;
    const thumbHeight = totalLines > 0
      ? Math.max(1, Math.min(height, Math.floor((height * (totalLines - scrollMax)) / totalLines)))
      : height;
    const thumbStart = scrollMax > 0 ? Math.round(((height - thumbHeight) * scrollPos) / scrollMax) : 0;

    for (let row = 0; row < height; row++) {
      const isThumb = row >= thumbStart && row < thumbStart + thumbHeight;
      const color = isThumb ? thumbBg : trackBg;
      buffer.set(scrollBar.x, scrollBar.y + row, { char: isThumb ? '█' : '░', fg: color, bg: color });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input Handling
  // ─────────────────────────────────────────────────────────────────────────

  override handleKey(event: KeyEvent): boolean {
    const handled = this.engine.handleKey(event);
    if (handled) this.ctx.markDirty();
    return handled;
  }

  override handleMouse(event: MouseEvent): boolean {
    const inside = containsPoint(this.bounds, event.x, event.y);

    if (event.type === 'release') {
      const wasActive = this.draggingThumb || this.engine.isDragging;
      this.draggingThumb = false;
      this.engine.pointerUp();
      return wasActive;
    }

    if (event.type === 'drag') {
      if (this.draggingThumb) {
        this.scrollToThumbRow(event.y);
      } else if (this.engine.isDragging) {
        this.engine.pointerMove({ x: event.x, y: event.y });
      } else {
        return false;
      }
      this.ctx.markDirty();
      return true;
    }

    if (!inside) return false;

    if (event.type === 'scroll') {
      const lines = (event.scrollDirection ?? 1) * this.settings['hexEditor.mouseWheelScrollLines'];
      this.engine.scrollLines(lines);
      this.ctx.markDirty();
      return true;
    }

    if (event.type === 'press' && event.button === 'left') {
      this.ctx.requestFocus();
      const region = this.engine.pointerDown({ x: event.x, y: event.y }, event.shift);
      if (region === 'scrollBar') {
        this.draggingThumb = true;
        this.scrollToThumbRow(event.y);
      }
      this.ctx.markDirty();
      return true;
    }

    return false;
  }

  /**
   * Scroll so the thumb sits under a screen row.
   */
  private scrollToThumbRow(screenY: number): void {
    const scrollBar = this.engine.getLayout().scrollBar;
    if (!scrollBar) return;

    const span = Math.max(1, scrollBar.height - 1);
    const ratio = Math.min(1, Math.max(0, (screenY - scrollBar.y) / span));
    this.engine.scrollThumb(Math.round(ratio * this.engine.nativeScrollMax()));
  }

  override onFocus(): void {
    super.onFocus();
    this.callbacks.onFocusChange?.(true);
  }

  override onBlur(): void {
    super.onBlur();
    this.engine.pointerUp();
    this.draggingThumb = false;
    this.callbacks.onFocusChange?.(false);
  }

  /**
   * Detach from the engine. The element is not usable afterwards.
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    this.engine.dispose();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State Serialization
  // ─────────────────────────────────────────────────────────────────────────

  override getState(): HexEditorState {
    return this.engine.getViewState();
  }

  override setState(state: unknown): void {
    if (!state || typeof state !== 'object') return;

    const view: Partial<EngineViewState> = {};
    const mode: unknown = Reflect.get(state, 'mode');
    const offset: unknown = Reflect.get(state, 'offset');
    const nibble: unknown = Reflect.get(state, 'nibble');
    const selectionLength: unknown = Reflect.get(state, 'selectionLength');
    const scrollLine: unknown = Reflect.get(state, 'scrollLine');
    const insertActive: unknown = Reflect.get(state, 'insertActive');

    if (mode === 'hex' || mode === 'char') view.mode = mode;
    if (typeof offset === 'number') view.offset = offset;
    if (nibble === 0 || nibble === 1) view.nibble = nibble;
    if (typeof selectionLength === 'number') view.selectionLength = selectionLength;
    if (typeof scrollLine === 'number') view.scrollLine = scrollLine;
    if (typeof insertActive === 'boolean') view.insertActive = insertActive;

    this.engine.setViewState(view);
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a hex editor element.
 */
export function createHexEditor(
  id: string,
  ctx: ElementContext,
  options: HexEditorOptions = {},
  callbacks: HexEditorCallbacks = {}
): HexEditor {
  return new HexEditor(id, ctx, options, callbacks);
}
