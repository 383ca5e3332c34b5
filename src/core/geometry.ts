/**
 * Geometry Engine
 *
 * Converts between byte offsets, grid coordinates and positions on the
 * drawing surface. Units are whatever the host measures characters in:
 * pixels for a graphical host, cells (charWidth = charHeight = 1) for a
 * terminal.
 *
 * Hex pane layout: with a grouping of 1 every byte column is three
 * characters wide (two digits and a space). With larger groupings a byte
 * column is two characters wide and a one-character gap follows every
 * group.
 */

import { type BytePosition, type GridPane, type GridPoint, type Nibble, type Point, type Rect, emptyRect, rectContains } from './types.ts';

// ============================================
// Options
// ============================================

export type ByteGrouping = 1 | 2 | 4 | 8 | 16;

export interface GeometryOptions {
  charWidth: number;
  charHeight: number;
  /** Bytes per line when useFixedBytesPerLine is set */
  bytesPerLine: number;
  /** When false, bytes per line follow the available width */
  useFixedBytesPerLine: boolean;
  /** Bytes per visual group in the hex pane */
  groupSize: ByteGrouping;
  /** Show the character pane to the right of the hex pane */
  stringViewVisible: boolean;
  /** Show the offset gutter */
  lineInfoVisible: boolean;
  /** Hex digits in the offset gutter */
  lineInfoDigits: number;
  /** Show the column header row */
  columnInfoVisible: boolean;
  /** Width reserved for a vertical scrollbar, 0 for none */
  scrollBarWidth: number;
}

export const DEFAULT_GEOMETRY_OPTIONS: GeometryOptions = {
  charWidth: 1,
  charHeight: 1,
  bytesPerLine: 16,
  useFixedBytesPerLine: true,
  groupSize: 1,
  stringViewVisible: true,
  lineInfoVisible: true,
  lineInfoDigits: 8,
  columnInfoVisible: true,
  scrollBarWidth: 1,
};

export interface GridLayout {
  bounds: Rect;
  lineInfo: Rect;
  columnInfo: Rect;
  hex: Rect;
  chars: Rect | null;
  scrollBar: Rect | null;
  bytesPerLine: number;
  visibleLines: number;
  visibleBytes: number;
  /** Width needed to show every part of the layout */
  requiredWidth: number;
}

export type GridRegion = 'lineInfo' | 'columnInfo' | 'hex' | 'chars' | 'scrollBar';

// ============================================
// Geometry Engine
// ============================================

export class GeometryEngine {
  private options: GeometryOptions;
  private bounds: Rect = emptyRect();
  private layout: GridLayout;

  constructor(options: Partial<GeometryOptions> = {}) {
    this.options = { ...DEFAULT_GEOMETRY_OPTIONS, ...options };
    this.layout = this.computeLayout();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Configuration
  // ─────────────────────────────────────────────────────────────────────────

  getOptions(): GeometryOptions {
    return { ...this.options };
  }

  /**
   * Update options and recompute the layout.
   */
  setOptions(options: Partial<GeometryOptions>): GridLayout {
    this.options = { ...this.options, ...options };
    this.layout = this.computeLayout();
    return this.layout;
  }

  /**
   * Set the drawing area and recompute the layout.
   */
  setBounds(bounds: Rect): GridLayout {
    this.bounds = { ...bounds };
    this.layout = this.computeLayout();
    return this.layout;
  }

  getLayout(): GridLayout {
    return this.layout;
  }

  get bytesPerLine(): number {
    return this.layout.bytesPerLine;
  }

  get visibleLines(): number {
    return this.layout.visibleLines;
  }

  get visibleBytes(): number {
    return this.layout.visibleBytes;
  }

  get groupSize(): ByteGrouping {
    return this.options.groupSize;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout
  // ─────────────────────────────────────────────────────────────────────────

  private computeLayout(): GridLayout {
    const { charWidth: cw, charHeight: ch } = this.options;
    const bounds = this.bounds;
    let requiredWidth = 0;

    const content: Rect = { ...bounds };
    let scrollBar: Rect | null = null;
    if (this.options.scrollBarWidth > 0) {
      const width = this.options.scrollBarWidth;
      content.width = Math.max(0, content.width - width);
      scrollBar = { x: content.x + content.width, y: content.y, width, height: content.height };
      requiredWidth += width;
    }

    const lineInfo: Rect = {
      x: content.x,
      y: content.y,
      width: this.options.lineInfoVisible ? (this.options.lineInfoDigits + 1) * cw : 0,
      height: content.height,
    };
    requiredWidth += lineInfo.width;

    const columnInfo: Rect = {
      x: lineInfo.x + lineInfo.width,
      y: content.y,
      width: Math.max(0, content.width - lineInfo.width),
      height: this.options.columnInfoVisible ? ch : 0,
    };
    lineInfo.y += columnInfo.height;
    lineInfo.height = Math.max(0, lineInfo.height - columnInfo.height);

    const hex: Rect = {
      x: lineInfo.x + lineInfo.width,
      y: content.y + columnInfo.height,
      width: columnInfo.width,
      height: Math.max(0, content.height - columnInfo.height),
    };

    const bytesPerLine = this.options.useFixedBytesPerLine
      ? Math.max(1, Math.floor(this.options.bytesPerLine))
      : this.autoBytesPerLine(hex.width);

    hex.width = this.hexPaneWidth(bytesPerLine);
    requiredWidth += hex.width;

    let chars: Rect | null = null;
    if (this.options.stringViewVisible) {
      chars = { x: hex.x + hex.width, y: hex.y, width: bytesPerLine * cw, height: hex.height };
      requiredWidth += chars.width;
    }

    const visibleLines = ch > 0 ? Math.max(0, Math.floor(hex.height / ch)) : 0;

    return {
      bounds: { ...bounds },
      lineInfo,
      columnInfo,
      hex,
      chars,
      scrollBar,
      bytesPerLine,
      visibleLines,
      visibleBytes: bytesPerLine * visibleLines,
      requiredWidth,
    };
  }

  /**
   * Bytes per line that fit into `width` when not fixed.
   */
  private autoBytesPerLine(width: number): number {
    let columns = Math.floor(width / this.options.charWidth);
    if (this.options.stringViewVisible) {
      columns -= 2;
      return columns > 1 ? Math.max(1, Math.floor(columns / 4)) : 1;
    }
    return columns > 1 ? Math.max(1, Math.floor(columns / 3)) : 1;
  }

  /**
   * Characters occupied by the hex digits of one line.
   */
  hexTextWidth(bytesPerLine: number = this.layout.bytesPerLine): number {
    const g = this.options.groupSize;
    if (g === 1) return bytesPerLine * 3 - 1;
    return bytesPerLine * 2 + Math.floor((bytesPerLine - 1) / g);
  }

  /**
   * Hex pane width including the two-character margin before the char pane.
   */
  hexPaneWidth(bytesPerLine: number = this.layout.bytesPerLine): number {
    return (this.hexTextWidth(bytesPerLine) + 2) * this.options.charWidth;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Forward Mapping
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Grid coordinate of an offset relative to the first visible byte.
   */
  gridPointOf(relativeOffset: number): GridPoint {
    const bpl = this.layout.bytesPerLine;
    const row = Math.floor(relativeOffset / bpl);
    return { column: relativeOffset - row * bpl, row };
  }

  /**
   * Character index of a byte column inside the hex pane.
   */
  hexColumnChars(column: number): number {
    const g = this.options.groupSize;
    if (g === 1) return column * 3;
    return column * 2 + Math.floor(column / g);
  }

  /**
   * Origin of a byte cell in the hex pane.
   */
  hexPointOf(point: GridPoint): Point {
    const { hex } = this.layout;
    return {
      x: hex.x + this.hexColumnChars(point.column) * this.options.charWidth,
      y: hex.y + point.row * this.options.charHeight,
    };
  }

  /**
   * Origin of a byte cell in the character pane.
   */
  charPointOf(point: GridPoint): Point {
    const chars = this.layout.chars ?? { ...this.layout.hex, x: this.layout.hex.x + this.layout.hex.width };
    return {
      x: chars.x + point.column * this.options.charWidth,
      y: chars.y + point.row * this.options.charHeight,
    };
  }

  /**
   * Origin of a column label in the header row.
   */
  columnHeaderPointOf(column: number): Point {
    const { columnInfo, hex } = this.layout;
    return {
      x: hex.x + this.hexColumnChars(column) * this.options.charWidth,
      y: columnInfo.y,
    };
  }

  /**
   * Caret rectangle for a position relative to the first visible byte.
   * The caret is one unit wide while inserting and a character wide otherwise.
   */
  caretRect(relativeOffset: number, nibble: Nibble, pane: GridPane, insertActive: boolean): Rect {
    const grid = this.gridPointOf(relativeOffset);
    const origin = pane === 'hex' ? this.hexPointOf(grid) : this.charPointOf(grid);
    const x = pane === 'hex' ? origin.x + nibble * this.options.charWidth : origin.x;
    return {
      x,
      y: origin.y,
      width: insertActive ? 1 : this.options.charWidth,
      height: this.options.charHeight,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Inverse Mapping
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Byte position under a point in the hex pane.
   */
  hexPositionAt(point: Point, firstVisibleByte: number, length: number): BytePosition {
    const { hex, bytesPerLine } = this.layout;
    const ix = Math.floor((point.x - hex.x) / this.options.charWidth);
    const iy = Math.floor((point.y - hex.y) / this.options.charHeight);
    const g = this.options.groupSize;

    let column: number;
    let nibble: Nibble;

    if (ix < 0) {
      column = 0;
      nibble = 0;
    } else if (g === 1) {
      column = Math.floor(ix / 3);
      nibble = ix % 3 === 0 ? 0 : 1;
    } else {
      const groupSpan = g * 2 + 1;
      const group = Math.floor(ix / groupSpan);
      const within = ix - group * groupSpan;
      if (within >= g * 2) {
        // Inside the gap: the next group's first byte
        column = (group + 1) * g;
        nibble = 0;
      } else {
        column = group * g + Math.floor(within / 2);
        nibble = within % 2 === 0 ? 0 : 1;
      }
    }

    if (column > bytesPerLine - 1) {
      column = bytesPerLine - 1;
      nibble = 1;
    }

    return this.clampPosition(firstVisibleByte + iy * bytesPerLine + column, nibble, length);
  }

  /**
   * Byte position under a point in the character pane.
   */
  charPositionAt(point: Point, firstVisibleByte: number, length: number): BytePosition {
    const { bytesPerLine } = this.layout;
    const origin = this.charPointOf({ column: 0, row: 0 });
    const ix = Math.floor((point.x - origin.x) / this.options.charWidth);
    const iy = Math.floor((point.y - origin.y) / this.options.charHeight);
    const column = Math.min(bytesPerLine - 1, Math.max(0, ix));

    return this.clampPosition(firstVisibleByte + iy * bytesPerLine + column, 0, length);
  }

  private clampPosition(offset: number, nibble: Nibble, length: number): BytePosition {
    if (offset < 0) return { offset: 0, nibble: 0 };
    if (offset >= length) return { offset: length, nibble: 0 };
    return { offset, nibble };
  }

  /**
   * Region of the layout containing a point.
   */
  regionAt(point: Point): GridRegion | null {
    const layout = this.layout;
    if (layout.scrollBar && rectContains(layout.scrollBar, point)) return 'scrollBar';
    if (rectContains(layout.hex, point)) return 'hex';
    if (layout.chars && rectContains(layout.chars, point)) return 'chars';
    if (rectContains(layout.columnInfo, point)) return 'columnInfo';
    if (rectContains(layout.lineInfo, point)) return 'lineInfo';
    return null;
  }
}
