/**
 * Hex Engine
 *
 * Facade over the byte grid: binds a byte store, routes keys and pointer
 * input to the command handlers, runs searches and answers the rendering
 * queries a host needs (visible range, per-cell classification, caret).
 *
 * Every public call runs to completion before its notifications are
 * delivered. A listener that calls back into the engine queues its own
 * notifications behind the ones being delivered.
 */

import { debugLog } from '../debug.ts';
import { Keymap, type ParsedKey, keyEventToParsed } from '../input/keymap.ts';
import type { ByteStore } from './byte-store.ts';
import type { ByteCharConverter } from './char-converter.ts';
import type { ClipboardData, CopyResult, PasteResult } from './clipboard.ts';
import * as commands from './commands.ts';
import type { HexCommand } from './commands.ts';
import {
  type EditorOptions,
  type EditorState,
  type EditorStateInit,
  type EngineEvent,
  type EngineEventType,
  createEditorState,
  storeLength,
} from './editor-state.ts';
import { OutOfRangeError } from './errors.ts';
import { DEFAULT_FIND_YIELD_INTERVAL, FIND_NOT_FOUND, FindEngine, type FindOptions, resolvePattern } from './find.ts';
import type { GeometryEngine, GeometryOptions, GridLayout, GridRegion } from './geometry.ts';
import { formatOffset } from './hex.ts';
import type { ScrollState } from './scroll.ts';
import type { BytePosition, GridPane, InputMode, Nibble, Point, Rect } from './types.ts';

// ============================================
// Types
// ============================================

export interface HexEngineOptions extends EditorStateInit {
  keymap?: Keymap;
  /** Scanned positions between event-loop yields during find */
  findYieldInterval?: number;
  /** Added to offsets shown in the line gutter */
  lineInfoOffset?: number;
}

export type ByteCellClass = 'selected' | 'dirty' | 'committed' | 'zero' | 'normal';

export type EngineListener<K extends EngineEventType> = (event: Extract<EngineEvent, { type: K }>) => void;

/**
 * Persistable view position.
 */
export interface EngineViewState {
  mode: InputMode;
  offset: number;
  nibble: Nibble;
  selectionLength: number;
  scrollLine: number;
  insertActive: boolean;
}

interface PointerDrag {
  pane: GridPane;
  anchor: number;
}

// ============================================
// Hex Engine
// ============================================

export class HexEngine {
  private state: EditorState;
  private keymap: Keymap;
  private finder: FindEngine;
  private lineInfoOffset: number;

  private listeners: Map<EngineEventType, Set<(event: EngineEvent) => void>> = new Map();
  private pending: EngineEvent[] = [];
  private depth = 0;
  private delivering = false;

  private storeSubscriptions: Array<() => void> = [];
  private drag: PointerDrag | null = null;
  private lastFind: FindOptions | null = null;
  private requiredWidth: number;

  constructor(options: HexEngineOptions = {}) {
    this.state = createEditorState((event) => this.pending.push(event), options);
    this.keymap = options.keymap ?? new Keymap();
    this.finder = new FindEngine(options.findYieldInterval ?? DEFAULT_FIND_YIELD_INTERVAL);
    this.lineInfoOffset = options.lineInfoOffset ?? 0;
    this.requiredWidth = this.state.geometry.getLayout().requiredWidth;
    this.pending = [];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Subscribe to an engine event. Returns an unsubscribe function.
   */
  on<K extends EngineEventType>(type: K, listener: EngineListener<K>): () => void {
    const wrapped = (event: EngineEvent): void => {
      if (isEventOfType(event, type)) listener(event);
    };

    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(wrapped);

    return () => {
      this.listeners.get(type)?.delete(wrapped);
    };
  }

  /**
   * Run a mutation, then deliver the notifications it queued.
   */
  private run<T>(fn: () => T): T {
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
      if (this.depth === 0) this.deliver();
    }
  }

  private deliver(): void {
    if (this.delivering) return;
    this.delivering = true;
    try {
      let event = this.pending.shift();
      while (event !== undefined) {
        for (const listener of [...(this.listeners.get(event.type) ?? [])]) {
          listener(event);
        }
        event = this.pending.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Store
  // ─────────────────────────────────────────────────────────────────────────

  getStore(): ByteStore | null {
    return this.state.store;
  }

  /**
   * Bind a new store, or none. Cursor, selection and scroll start over;
   * the change sets follow the swap options.
   */
  setStore(store: ByteStore | null): void {
    this.run(() => {
      const { state } = this;
      const { changes, options } = state;

      for (const unsubscribe of this.storeSubscriptions) unsubscribe();
      this.storeSubscriptions = [];
      this.finder.abort();
      this.drag = null;

      if (options.autoCommitOnSwap) changes.commit();
      if (!options.retainDirtyOnSwap) changes.clearDirty();
      if (!options.retainCommittedOnSwap) changes.clearCommitted();
      if (options.retainDirtyOnSwap && store?.changedOffsets) {
        changes.replaceDirty(store.changedOffsets);
      }

      state.store = store;
      state.selection.reset();
      state.scroll.reset();

      if (store) {
        this.storeSubscriptions.push(
          store.on('lengthChanged', () => this.onStoreLengthChanged()),
          store.on('changed', () => this.run(() => state.emit({ type: 'contentChanged' })))
        );
        state.scroll.recomputeBounds(store.length);
      }

      const mode: InputMode = store ? 'hex' : 'empty';
      if (state.mode !== mode) {
        state.mode = mode;
        state.emit({ type: 'modeChanged', mode });
      }
      state.emit({ type: 'storeChanged', store });
      debugLog(`[HexEngine] store swapped (length=${storeLength(state)})`);
    });
  }

  private onStoreLengthChanged(): void {
    this.run(() => {
      const length = storeLength(this.state);
      this.state.scroll.recomputeBounds(length);
      this.state.emit({ type: 'lengthChanged', length });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Options
  // ─────────────────────────────────────────────────────────────────────────

  getOptions(): EditorOptions {
    return { ...this.state.options };
  }

  setOptions(options: Partial<EditorOptions>): void {
    this.state.options = { ...this.state.options, ...options };
  }

  getConverter(): ByteCharConverter {
    return this.state.converter;
  }

  setConverter(converter: ByteCharConverter): void {
    this.run(() => {
      this.state.converter = converter;
      this.state.emit({ type: 'contentChanged' });
    });
  }

  getKeymap(): Keymap {
    return this.keymap;
  }

  setLineInfoOffset(offset: number): void {
    this.lineInfoOffset = offset;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout
  // ─────────────────────────────────────────────────────────────────────────

  getLayout(): GridLayout {
    return this.state.geometry.getLayout();
  }

  /**
   * Geometry for hosts that draw the grid themselves.
   */
  get geometry(): GeometryEngine {
    return this.state.geometry;
  }

  getGeometryOptions(): GeometryOptions {
    return this.state.geometry.getOptions();
  }

  setBounds(bounds: Rect): GridLayout {
    return this.run(() => this.applyLayout(this.state.geometry.setBounds(bounds)));
  }

  setGeometryOptions(options: Partial<GeometryOptions>): GridLayout {
    return this.run(() => {
      const layout = this.applyLayout(this.state.geometry.setOptions(options));
      if (!layout.chars && this.state.mode === 'char') commands.switchMode(this.state, 'hex');
      return layout;
    });
  }

  private applyLayout(layout: GridLayout): GridLayout {
    const { state } = this;
    state.scroll.setVisibleByteRange(layout.bytesPerLine, layout.visibleLines);
    state.scroll.recomputeBounds(storeLength(state));
    state.selection.setBytesPerLine(layout.bytesPerLine);
    state.emit({ type: 'layoutChanged', layout });

    if (layout.requiredWidth !== this.requiredWidth) {
      this.requiredWidth = layout.requiredWidth;
      state.emit({ type: 'requiredWidthChanged', width: layout.requiredWidth });
    }
    return layout;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State Accessors
  // ─────────────────────────────────────────────────────────────────────────

  get mode(): InputMode {
    return this.state.mode;
  }

  get insertActive(): boolean {
    return this.state.insertActive;
  }

  get selectionStart(): number {
    return this.state.selection.start;
  }

  get selectionLength(): number {
    return this.state.selection.length;
  }

  get position(): BytePosition {
    return this.state.selection.position();
  }

  get currentLine(): number {
    return this.state.selection.currentLine;
  }

  get currentPositionInLine(): number {
    return this.state.selection.currentPositionInLine;
  }

  get length(): number {
    return storeLength(this.state);
  }

  getScrollState(): ScrollState {
    return this.state.scroll.getState();
  }

  setInsertActive(active: boolean): void {
    if (this.state.insertActive === active) return;
    this.run(() => commands.toggleInsert(this.state));
  }

  /**
   * Activate the hex or character pane.
   */
  setMode(mode: 'hex' | 'char'): void {
    if (this.state.mode === 'empty') return;
    if (mode === 'char' && !this.state.geometry.getLayout().chars) return;
    this.run(() => commands.switchMode(this.state, mode));
  }

  getViewState(): EngineViewState {
    const { selection, scroll, mode, insertActive } = this.state;
    return {
      mode,
      offset: selection.start,
      nibble: selection.nibble,
      selectionLength: selection.length,
      scrollLine: scroll.scrollPos,
      insertActive,
    };
  }

  /**
   * Restore a saved view position, clamped to the bound store.
   */
  setViewState(view: Partial<EngineViewState>): void {
    this.run(() => {
      const { state } = this;
      const length = storeLength(state);

      if (view.insertActive !== undefined && view.insertActive !== state.insertActive) {
        commands.toggleInsert(state);
      }
      if (state.mode === 'empty') return;
      if (view.mode === 'hex' || view.mode === 'char') commands.switchMode(state, view.mode);

      const offset = Math.min(length, Math.max(0, view.offset ?? state.selection.start));
      const selectionLength = Math.min(length - offset, Math.max(0, view.selectionLength ?? 0));
      state.selection.setCursor(offset, offset === length ? 0 : view.nibble ?? 0);
      state.selection.setSelectionLength(selectionLength);
      state.selection.setAnchor(null);

      if (view.scrollLine !== undefined) {
        state.scroll.scrollToLine(Math.min(state.scroll.scrollMax, Math.max(0, view.scrollLine)));
      }
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Handle a key press. Returns false when the key was not consumed.
   */
  handleKey(key: ParsedKey): boolean {
    if (this.state.mode === 'empty') return false;

    const command = this.keymap.getCommand(keyEventToParsed(key));
    if (command) return this.execute(command);

    if (key.key.length === 1 && !key.ctrl && !key.alt && !key.meta) {
      return this.typeChar(key.key);
    }
    return false;
  }

  execute(command: HexCommand): boolean {
    return this.run(() => commands.executeCommand(this.state, command));
  }

  /**
   * Feed a typed character to the active entry mode.
   */
  typeChar(char: string): boolean {
    return this.run(() => {
      if (this.state.mode === 'hex') return commands.enterHexDigit(this.state, char);
      if (this.state.mode === 'char') return commands.enterChar(this.state, char);
      return false;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Pointer
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Press at a point. Places the caret in the pane under the pointer, or
   * extends from the current anchor when `extend` is set.
   */
  pointerDown(point: Point, extend = false): GridRegion | null {
    const region = this.state.geometry.regionAt(point);
    if (this.state.mode === 'empty') return region;
    if (region !== 'hex' && region !== 'chars') return region;

    const pane: GridPane = region === 'hex' ? 'hex' : 'char';

    this.run(() => {
      const { state } = this;
      if (extend) {
        this.drag = { pane, anchor: state.selection.captureAnchor() };
        this.dragTo(point);
        return;
      }

      const position = this.positionAt(pane, point);
      commands.switchMode(state, pane);
      state.selection.setCursor(position.offset, pane === 'hex' ? position.nibble : 0);
      state.selection.releaseSelection();
      state.selection.setAnchor(position.offset);
      state.scroll.scrollByteIntoView(position.offset);
      this.drag = { pane, anchor: position.offset };
    });

    return region;
  }

  /**
   * Drag to a point while the pointer is pressed.
   */
  pointerMove(point: Point): void {
    if (!this.drag) return;
    this.run(() => this.dragTo(point));
  }

  pointerUp(): void {
    this.drag = null;
  }

  get isDragging(): boolean {
    return this.drag !== null;
  }

  private dragTo(point: Point): void {
    if (!this.drag) return;
    const { selection, scroll } = this.state;
    const { anchor } = this.drag;
    const target = this.positionAt(this.drag.pane, point).offset;

    selection.select(Math.min(anchor, target), Math.abs(target - anchor));
    selection.setAnchor(anchor);
    scroll.scrollByteIntoView(target);
  }

  private positionAt(pane: GridPane, point: Point): BytePosition {
    const { geometry, scroll } = this.state;
    const length = storeLength(this.state);
    return pane === 'hex'
      ? geometry.hexPositionAt(point, scroll.firstVisibleByte, length)
      : geometry.charPositionAt(point, scroll.firstVisibleByte, length);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Scrolling
  // ─────────────────────────────────────────────────────────────────────────

  scrollLines(delta: number): boolean {
    return this.run(() => this.state.scroll.scrollLines(delta));
  }

  scrollPages(delta: number): boolean {
    return this.run(() => this.state.scroll.scrollPages(delta));
  }

  scrollToLine(line: number): boolean {
    return this.run(() => this.state.scroll.scrollToLine(line));
  }

  scrollByteIntoView(offset: number): boolean {
    return this.run(() => this.state.scroll.scrollByteIntoView(offset));
  }

  /**
   * Scroll to a native scrollbar value.
   */
  scrollThumb(value: number): boolean {
    return this.run(() => this.state.scroll.scrollThumb(value));
  }

  nativeScrollValue(): number {
    return this.state.scroll.toNative();
  }

  nativeScrollMax(): number {
    return this.state.scroll.nativeMax();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Selection
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Select [start, start + length). Throws OutOfRangeError outside the data.
   */
  select(start: number, length: number): void {
    const storeSize = storeLength(this.state);
    if (!Number.isInteger(start) || !Number.isInteger(length) || start < 0 || length < 0 || start + length > storeSize) {
      throw new OutOfRangeError(`selection [${start}, ${start + length}) is outside [0, ${storeSize}]`);
    }

    this.run(() => {
      const { selection, scroll } = this.state;
      selection.select(start, length);
      selection.setAnchor(null);
      scroll.scrollByteIntoView(start);
    });
  }

  goTo(offset: number): void {
    this.select(offset, 0);
  }

  selectAll(): boolean {
    return this.run(() => commands.selectAll(this.state));
  }

  canSelectAll(): boolean {
    return this.state.store !== null;
  }

  releaseSelection(): void {
    this.run(() => this.state.selection.releaseSelection());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Clipboard
  // ─────────────────────────────────────────────────────────────────────────

  copy(asHex = false): CopyResult | null {
    return this.run(() => commands.copySelection(this.state, asHex ? 'hex' : 'char'));
  }

  cut(): CopyResult | null {
    return this.run(() => commands.cutSelection(this.state));
  }

  /**
   * Paste `data`, or the clipboard content when omitted.
   */
  paste(asHex = false, data?: ClipboardData | null): PasteResult {
    return this.run(() => commands.pastePayload(this.state, asHex, data));
  }

  canCopy(): boolean {
    return commands.canCopy(this.state);
  }

  canCut(): boolean {
    return commands.canCut(this.state);
  }

  canPaste(): boolean {
    return commands.canPaste(this.state);
  }

  canPasteHex(): boolean {
    return commands.canPasteHex(this.state);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Find
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Search from the current selection. A match becomes the selection.
   * Resolves to the match offset, FIND_NOT_FOUND or FIND_ABORTED.
   */
  async find(options: FindOptions, signal?: AbortSignal): Promise<number> {
    const patternLength = resolvePattern(options.pattern).primary.length;
    const { store, selection } = this.state;
    if (!store) return FIND_NOT_FOUND;

    this.lastFind = options;

    const result = await this.finder.find(store, selection.start, selection.length, options, signal);
    if (result < 0 || this.state.store !== store) return result;

    this.run(() => {
      const { selection: current, scroll } = this.state;
      current.select(result, patternLength);
      current.setAnchor(null);
      scroll.scrollByteIntoView(result + patternLength);
      scroll.scrollByteIntoView(result);
    });
    return result;
  }

  /**
   * Repeat the last search in the given direction.
   */
  findNext(direction?: FindOptions['direction']): Promise<number> {
    if (!this.lastFind) return Promise.resolve(FIND_NOT_FOUND);
    return this.find({ ...this.lastFind, direction: direction ?? this.lastFind.direction });
  }

  abortFind(): void {
    this.finder.abort();
  }

  get isFinding(): boolean {
    return this.finder.isRunning;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Change Tracking
  // ─────────────────────────────────────────────────────────────────────────

  commitChanges(): void {
    this.run(() => {
      this.state.changes.commit();
      this.state.emit({ type: 'contentChanged' });
    });
  }

  clearDirty(): void {
    this.run(() => {
      this.state.changes.clearDirty();
      this.state.emit({ type: 'contentChanged' });
    });
  }

  clearCommitted(): void {
    this.run(() => {
      this.state.changes.clearCommitted();
      this.state.emit({ type: 'contentChanged' });
    });
  }

  isDirty(offset: number): boolean {
    return this.state.changes.isDirty(offset);
  }

  isCommitted(offset: number): boolean {
    return this.state.changes.isCommitted(offset);
  }

  allChanged(): number[] {
    return this.state.changes.allChanged();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering Queries
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Offsets of the visible window as [first, end), clipped to the data.
   */
  visibleRange(): { first: number; end: number } {
    const { scroll, geometry } = this.state;
    const first = scroll.firstVisibleByte;
    return { first, end: Math.min(storeLength(this.state), first + geometry.visibleBytes) };
  }

  /**
   * Drawing class of a byte. Selection shows in the hex pane only while hex
   * entry is active; the character pane always shows it.
   */
  classify(offset: number, pane: GridPane = 'hex'): ByteCellClass {
    const { selection, changes, store, mode } = this.state;

    if (selection.contains(offset) && (pane === 'char' || mode === 'hex')) return 'selected';
    if (changes.isDirty(offset)) return 'dirty';
    if (changes.isCommitted(offset)) return 'committed';
    if (store && offset < store.length && store.readByte(offset) === 0) return 'zero';
    return 'normal';
  }

  /**
   * Caret rectangle, or null while a selection hides it or the cursor is
   * outside the window.
   */
  caretRect(): Rect | null {
    const { selection, scroll, geometry, mode, insertActive } = this.state;
    if (mode === 'empty' || !selection.caretVisible) return null;

    const relative = selection.start - scroll.firstVisibleByte;
    if (relative < 0 || relative >= geometry.visibleBytes) return null;

    return geometry.caretRect(relative, selection.nibble, mode === 'char' ? 'char' : 'hex', insertActive);
  }

  /**
   * Gutter label for a visible row.
   */
  lineLabel(row: number): string {
    const { scroll, geometry, options } = this.state;
    const offset = scroll.firstVisibleByte + row * geometry.bytesPerLine + this.lineInfoOffset;
    return formatOffset(offset, geometry.getOptions().lineInfoDigits, options.hexCasing);
  }

  /**
   * Bytes of the visible window.
   */
  visibleBytes(): Uint8Array {
    const { store } = this.state;
    const { first, end } = this.visibleRange();
    if (!store || end <= first) return new Uint8Array(0);
    return store.readRange(first, end - first);
  }

  dispose(): void {
    this.finder.abort();
    for (const unsubscribe of this.storeSubscriptions) unsubscribe();
    this.storeSubscriptions = [];
    this.listeners.clear();
    this.pending = [];
  }
}

function isEventOfType<K extends EngineEventType>(
  event: EngineEvent,
  type: K
): event is Extract<EngineEvent, { type: K }> {
  return event.type === type;
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a hex engine, optionally bound to a store.
 */
export function createHexEngine(store: ByteStore | null = null, options: HexEngineOptions = {}): HexEngine {
  const engine = new HexEngine(options);
  if (store) engine.setStore(store);
  return engine;
}
