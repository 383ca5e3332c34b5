/**
 * Scroll Controller
 *
 * Vertical scroll state over the lines of a byte store. The scroll position
 * is a line index in [0, scrollMax]. Hosts whose scrollbar only takes a
 * bounded range use toNative/fromNative, which map proportionally once
 * scrollMax reaches NATIVE_SCROLL_MAX.
 */

/** Largest value a native scrollbar takes */
export const NATIVE_SCROLL_MAX = 65535;

/**
 * Native units from the end of the bar within which a thumb drag snaps to
 * the last line, compensating proportional rounding.
 */
export const THUMB_SNAP_TOLERANCE = {
  /** scrollMax > NATIVE_SCROLL_MAX */
  exceeding: 10,
  /** scrollMax === NATIVE_SCROLL_MAX */
  equal: 9,
} as const;

export interface ScrollState {
  scrollPos: number;
  scrollMax: number;
  firstVisibleByte: number;
  lastVisibleByte: number;
}

export class ScrollController {
  private pos = 0;
  private max = 0;
  private bytesPerLine = 1;
  private visibleLines = 0;
  private length = 0;
  private onScroll: ((line: number) => void) | null;

  constructor(onScroll?: (line: number) => void) {
    this.onScroll = onScroll ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────────────

  get scrollPos(): number {
    return this.pos;
  }

  get scrollMin(): number {
    return 0;
  }

  get scrollMax(): number {
    return this.max;
  }

  get firstVisibleByte(): number {
    return this.pos * this.bytesPerLine;
  }

  /**
   * Last byte of the visible window, -1 for an empty store.
   */
  get lastVisibleByte(): number {
    return Math.min(this.length - 1, this.firstVisibleByte + this.bytesPerLine * this.visibleLines);
  }

  getState(): ScrollState {
    return {
      scrollPos: this.pos,
      scrollMax: this.max,
      firstVisibleByte: this.firstVisibleByte,
      lastVisibleByte: this.lastVisibleByte,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bounds
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Set the visible window size in lines and bytes per line.
   */
  setVisibleByteRange(bytesPerLine: number, visibleLines: number): void {
    const first = this.firstVisibleByte;
    this.bytesPerLine = Math.max(1, bytesPerLine);
    this.visibleLines = Math.max(0, visibleLines);
    // Keep the same first byte in view when the line width changes
    this.applyBounds(this.length, Math.floor(first / this.bytesPerLine));
  }

  /**
   * Recompute scrollMax for a store length.
   * When the range shrinks while the view sits on the last line, the view
   * moves up a line so it stays inside the new range.
   */
  recomputeBounds(length: number): void {
    this.applyBounds(length, this.pos);
  }

  private applyBounds(length: number, requestedPos: number): void {
    this.length = Math.max(0, length);

    const max = this.length > 0
      ? Math.max(0, Math.ceil((this.length + 1) / this.bytesPerLine - this.visibleLines))
      : 0;

    let pos = requestedPos;
    if (max < this.max && pos === this.max) {
      pos = Math.max(0, pos - 1);
    }
    pos = Math.min(pos, max);

    this.max = max;
    this.setPos(pos);
  }

  /**
   * Reset to the top with an empty range.
   */
  reset(): void {
    this.length = 0;
    this.max = 0;
    this.setPos(0);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Scrolling
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Scroll so `line` is the first visible line. Out-of-range lines are ignored.
   */
  scrollToLine(line: number): boolean {
    if (line < 0 || line > this.max || line === this.pos) return false;
    this.setPos(line);
    return true;
  }

  /**
   * Scroll by a number of lines, clamped to the range.
   */
  scrollLines(delta: number): boolean {
    if (delta === 0) return false;
    const line = delta > 0
      ? Math.min(this.max, this.pos + delta)
      : Math.max(0, this.pos + delta);
    return this.scrollToLine(line);
  }

  scrollPages(delta: number): boolean {
    return this.scrollLines(delta * this.visibleLines);
  }

  /**
   * Scroll the minimum needed to make `offset` visible.
   */
  scrollByteIntoView(offset: number): boolean {
    if (offset < this.firstVisibleByte) {
      return this.scrollToLine(Math.floor(offset / this.bytesPerLine));
    }
    if (offset > this.lastVisibleByte) {
      const line = Math.floor(offset / this.bytesPerLine) - (this.visibleLines - 1);
      return this.scrollToLine(Math.min(this.max, Math.max(0, line)));
    }
    return false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Native Range
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Native scrollbar maximum.
   */
  nativeMax(): number {
    return Math.min(this.max, NATIVE_SCROLL_MAX);
  }

  /**
   * Native scrollbar value for a line.
   */
  toNative(line: number = this.pos): number {
    if (this.max < NATIVE_SCROLL_MAX) return line;
    const percent = (line / this.max) * 100;
    const value = Math.floor((NATIVE_SCROLL_MAX / 100) * percent);
    return Math.min(NATIVE_SCROLL_MAX, Math.max(0, value));
  }

  /**
   * Line for a native scrollbar value.
   */
  fromNative(value: number): number {
    if (this.max < NATIVE_SCROLL_MAX) return value;
    const percent = (value / NATIVE_SCROLL_MAX) * 100;
    return Math.floor((this.max / 100) * percent);
  }

  /**
   * Scroll to where a dragged thumb points. In proportional mode a value
   * within THUMB_SNAP_TOLERANCE of the end lands on the last line.
   */
  scrollThumb(value: number): boolean {
    let line = this.fromNative(value);

    if (this.max >= NATIVE_SCROLL_MAX) {
      const tolerance = this.max > NATIVE_SCROLL_MAX
        ? THUMB_SNAP_TOLERANCE.exceeding
        : THUMB_SNAP_TOLERANCE.equal;
      if (NATIVE_SCROLL_MAX - value <= tolerance) line = this.max;
    }

    return this.scrollToLine(Math.min(this.max, Math.max(0, line)));
  }

  private setPos(line: number): void {
    if (line === this.pos) return;
    this.pos = line;
    this.onScroll?.(line);
  }
}
