/**
 * Commands
 *
 * One handler per editing command. Handlers switch on the active input mode
 * where hex and character entry differ; cursor reveal, selection release and
 * capability checks are shared helpers.
 *
 * Handlers return true when the input was consumed. Denied edits (read-only,
 * missing store capability, disabled feature) are consumed as no-ops.
 */

import { debugLog } from '../debug.ts';
import { payloadBytes, type CopyContentType, type CopyResult, type PasteResult, type ClipboardData } from './clipboard.ts';
import { type EditorState, storeLength } from './editor-state.ts';
import { bytesToHex, isHexDigit, parseHexText } from './hex.ts';
import type { Nibble } from './types.ts';

// ============================================
// Command IDs
// ============================================

export const HEX_COMMANDS = [
  'cursor.left',
  'cursor.right',
  'cursor.up',
  'cursor.down',
  'cursor.pageUp',
  'cursor.pageDown',
  'cursor.home',
  'cursor.end',
  'selection.extendLeft',
  'selection.extendRight',
  'selection.extendUp',
  'selection.extendDown',
  'selection.selectAll',
  'mode.nextPane',
  'mode.previousPane',
  'edit.backspace',
  'edit.delete',
  'edit.toggleInsert',
  'clipboard.copy',
  'clipboard.copyHex',
  'clipboard.cut',
  'clipboard.paste',
  'clipboard.pasteHex',
] as const;

export type HexCommand = (typeof HEX_COMMANDS)[number];

export function isHexCommand(value: string): value is HexCommand {
  return HEX_COMMANDS.some((command) => command === value);
}

// ============================================
// Shared Helpers
// ============================================

function revealCursor(state: EditorState): void {
  state.scroll.scrollByteIntoView(state.selection.start);
}

/**
 * Step the view one unit up when the cursor left the top of the window.
 */
function followUp(state: EditorState, offset: number, lines: number): void {
  if (offset < state.scroll.firstVisibleByte) state.scroll.scrollLines(-lines);
}

/**
 * Step the view one unit down when the cursor left the bottom of the window.
 */
function followDown(state: EditorState, offset: number, lines: number): void {
  if (offset > state.scroll.lastVisibleByte - 1) state.scroll.scrollLines(lines);
}

function canDelete(state: EditorState): boolean {
  const { store, options } = state;
  return store !== null && store.supportsDeleteBytes() && !options.readOnly && options.enableDelete;
}

/**
 * Move one byte left, collapsing to nibble 0.
 */
function stepLeftByte(state: EditorState): void {
  const pos = state.selection.start;
  if (pos === 0) return;
  state.selection.setCursor(pos - 1, 0);
  followUp(state, pos - 1, 1);
  revealCursor(state);
}

/**
 * Move one byte right, stopping at the append position.
 */
function stepRightByte(state: EditorState): void {
  const pos = state.selection.start;
  if (pos >= storeLength(state)) return;
  state.selection.setCursor(pos + 1, 0);
  followDown(state, pos + 1, 1);
  revealCursor(state);
}

/**
 * Move one nibble right, wrapping into the next byte after the low nibble.
 */
function stepRightNibble(state: EditorState): void {
  const { selection } = state;
  const length = storeLength(state);
  let pos = selection.start;
  let nibble: Nibble = selection.nibble;

  if (pos === length && nibble === 0) return;

  if (nibble > 0) {
    pos = Math.min(length, pos + 1);
    nibble = 0;
  } else {
    nibble = 1;
  }

  selection.setCursor(pos, nibble);
  followDown(state, pos, 1);
  revealCursor(state);
}

// ============================================
// Cursor Movement
// ============================================

export function moveLeft(state: EditorState): boolean {
  const { selection } = state;

  if (selection.hasSelection) {
    selection.setCursor(selection.start, 0);
  } else if (state.mode === 'hex') {
    const pos = selection.start;
    if (pos !== 0 || selection.nibble !== 0) {
      if (selection.nibble > 0) {
        selection.setCursor(pos, 0);
      } else {
        selection.setCursor(Math.max(0, pos - 1), 1);
      }
      followUp(state, selection.start, 1);
    }
  } else if (selection.start > 0) {
    selection.setCursor(selection.start - 1, 0);
    followUp(state, selection.start, 1);
  }

  revealCursor(state);
  selection.releaseSelection();
  return true;
}

export function moveRight(state: EditorState): boolean {
  const { selection } = state;

  if (selection.hasSelection) {
    selection.setCursor(selection.end, 0);
    revealCursor(state);
  } else if (state.mode === 'hex') {
    stepRightNibble(state);
  } else {
    stepRightByte(state);
  }

  selection.releaseSelection();
  return true;
}

export function moveUp(state: EditorState): boolean {
  const { selection, geometry } = state;
  const pos = selection.start;

  if (pos !== 0 || selection.nibble !== 0) {
    const target = pos - geometry.bytesPerLine;
    if (target >= 0) {
      selection.setCursor(target);
      followUp(state, target, 1);
    }
  }

  revealCursor(state);
  selection.releaseSelection();
  return true;
}

export function moveDown(state: EditorState): boolean {
  const { selection, geometry } = state;
  const length = storeLength(state);
  const pos = selection.start;

  if (pos !== length || selection.nibble !== 0) {
    const target = Math.min(length, pos + geometry.bytesPerLine);
    selection.setCursor(target, target === length ? 0 : selection.nibble);
    followDown(state, target, 1);
  }

  revealCursor(state);
  selection.releaseSelection();
  return true;
}

export function movePageUp(state: EditorState): boolean {
  const { selection, geometry } = state;
  const pos = selection.start;

  if (pos !== 0 || selection.nibble !== 0) {
    const target = Math.max(0, pos - geometry.visibleBytes);
    selection.setCursor(target);
    followUp(state, target, geometry.visibleLines);
  }

  revealCursor(state);
  selection.releaseSelection();
  return true;
}

export function movePageDown(state: EditorState): boolean {
  const { selection, geometry } = state;
  const length = storeLength(state);
  const pos = selection.start;

  if (pos !== length || selection.nibble !== 0) {
    const target = Math.min(length, pos + geometry.visibleBytes);
    selection.setCursor(target, target === length ? 0 : selection.nibble);
    followDown(state, target, geometry.visibleLines);
  }

  revealCursor(state);
  selection.releaseSelection();
  return true;
}

export function moveHome(state: EditorState): boolean {
  state.selection.setCursor(0, 0);
  revealCursor(state);
  state.selection.releaseSelection();
  return true;
}

export function moveEnd(state: EditorState): boolean {
  state.selection.setCursor(storeLength(state), 0);
  revealCursor(state);
  state.selection.releaseSelection();
  return true;
}

// ============================================
// Selection Extension
// ============================================

/**
 * Move the edge opposite the anchor by `delta` bytes. Moves past either end
 * of the data are ignored.
 */
export function extendSelection(state: EditorState, delta: number): boolean {
  const { selection } = state;
  const anchor = selection.captureAnchor();
  const edge = selection.start < anchor ? selection.start : selection.end;
  const target = edge + delta;

  if (target < 0 || target > storeLength(state)) return true;

  selection.select(Math.min(anchor, target), Math.abs(target - anchor));
  state.scroll.scrollByteIntoView(target);
  return true;
}

/**
 * Select every byte of the store.
 */
export function selectAll(state: EditorState): boolean {
  if (!state.store) return false;
  state.selection.select(0, state.store.length);
  state.selection.setAnchor(0);
  revealCursor(state);
  return true;
}

// ============================================
// Mode Switching
// ============================================

/**
 * Switch from the hex pane to the character pane. Returns false when there
 * is nothing to switch to, so the host can move focus on.
 */
export function nextPane(state: EditorState): boolean {
  if (state.mode !== 'hex' || !state.geometry.getOptions().stringViewVisible) return false;
  switchMode(state, 'char');
  return true;
}

export function previousPane(state: EditorState): boolean {
  if (state.mode !== 'char') return false;
  switchMode(state, 'hex');
  return true;
}

export function switchMode(state: EditorState, mode: 'hex' | 'char'): void {
  if (state.mode === mode) return;
  state.mode = mode;
  state.selection.setCursor(state.selection.start, 0);
  revealCursor(state);
  state.selection.releaseSelection();
  state.emit({ type: 'modeChanged', mode });
  debugLog(`[Commands] mode ${mode}`);
}

export function toggleInsert(state: EditorState): boolean {
  state.insertActive = !state.insertActive;
  state.emit({ type: 'insertActiveChanged', active: state.insertActive });
  return true;
}

// ============================================
// Deletion
// ============================================

export function backspace(state: EditorState): boolean {
  const { store, selection } = state;
  if (!store || !canDelete(state)) return true;

  const pos = selection.start;
  const selectionLength = selection.length;
  const startDelete = selection.nibble === 0 && selectionLength === 0 ? pos - 1 : pos;

  if (startDelete < 0 && selectionLength < 1) return true;

  store.deleteBytes(Math.max(0, startDelete), selectionLength > 0 ? selectionLength : 1);
  state.scroll.recomputeBounds(store.length);

  if (selectionLength === 0) {
    stepLeftByte(state);
  } else {
    selection.setCursor(pos, 0);
  }
  selection.releaseSelection();
  return true;
}

export function deleteForward(state: EditorState): boolean {
  const { store, selection } = state;
  if (!store || !canDelete(state)) return true;

  const pos = selection.start;
  if (pos >= store.length) return true;

  store.deleteBytes(pos, selection.length > 0 ? selection.length : 1);
  state.scroll.recomputeBounds(store.length);

  if (pos >= store.length) selection.setCursor(pos, 0);
  selection.releaseSelection();
  return true;
}

// ============================================
// Entry
// ============================================

/**
 * Decide whether typed input inserts, and delete a selection it replaces.
 * Returns null when the input is not handled, 'denied' when it is consumed
 * without effect.
 */
function prepareEntry(state: EditorState, insertWhenActive: boolean): { insert: boolean } | 'denied' | null {
  const { store, selection, options } = state;
  if (!store) return null;

  const length = store.length;
  const pos = selection.start;
  const canWrite = store.supportsWriteByte();
  const canInsert = store.supportsInsertBytes();

  if ((!canWrite && pos !== length) || (!canInsert && pos === length)) return null;
  if (options.readOnly) return 'denied';

  let insert = pos === length || (canInsert && state.insertActive && insertWhenActive);

  if (
    options.enableCut &&
    options.enableDelete &&
    options.enablePaste &&
    store.supportsDeleteBytes() &&
    canInsert &&
    selection.length > 0
  ) {
    store.deleteBytes(pos, selection.length);
    state.scroll.recomputeBounds(store.length);
    insert = true;
    selection.setCursor(pos, 0);
  }

  selection.releaseSelection();
  return { insert };
}

/**
 * Type a hex digit in hex mode.
 */
export function enterHexDigit(state: EditorState, digit: string): boolean {
  if (state.mode !== 'hex' || !isHexDigit(digit)) return false;

  const entry = prepareEntry(state, state.selection.nibble === 0);
  if (entry === null) return false;
  if (entry === 'denied') return true;

  const { store, selection } = state;
  if (!store) return false;

  const pos = selection.start;
  const value = parseInt(digit, 16);
  const current = entry.insert ? 0 : store.readByte(pos);
  const next = selection.nibble === 0
    ? (value << 4) | (current & 0x0f)
    : (current & 0xf0) | value;

  if (entry.insert) {
    store.insertBytes(pos, [next]);
  } else {
    store.writeByte(pos, next);
  }
  state.changes.markDirty(pos);

  stepRightNibble(state);
  return true;
}

/**
 * Type a character in character mode.
 */
export function enterChar(state: EditorState, char: string): boolean {
  if (state.mode !== 'char' || char.length === 0) return false;

  const entry = prepareEntry(state, true);
  if (entry === null) return false;
  if (entry === 'denied') return true;

  const { store, selection } = state;
  if (!store) return false;

  const pos = selection.start;
  const value = state.converter.toByte(char);

  if (entry.insert) {
    store.insertBytes(pos, [value]);
  } else {
    store.writeByte(pos, value);
  }
  state.changes.markDirty(pos);

  stepRightByte(state);
  return true;
}

// ============================================
// Clipboard
// ============================================

export function canCopy(state: EditorState): boolean {
  return state.store !== null && state.selection.length > 0;
}

export function canCut(state: EditorState): boolean {
  const { store, options } = state;
  return (
    store !== null &&
    !options.readOnly &&
    options.enableCut &&
    state.selection.length > 0 &&
    store.supportsDeleteBytes()
  );
}

export function canPaste(state: EditorState): boolean {
  const { store, options } = state;
  if (!store || options.readOnly || !options.enablePaste) return false;
  if (!store.supportsInsertBytes()) return false;
  if ((state.selection.length > 0 || options.enableOverwritePaste) && !store.supportsDeleteBytes()) return false;
  return state.clipboard.read() !== null;
}

export function canPasteHex(state: EditorState): boolean {
  if (!canPaste(state)) return false;
  const data = state.clipboard.read();
  if (data?.bytes) return true;
  return data?.text !== undefined && parseHexText(data.text) !== null;
}

/**
 * Copy the selection to the clipboard. Raw bytes are always included; the
 * text is either the decoded characters or hex pairs.
 */
export function copySelection(state: EditorState, contentType: CopyContentType): CopyResult | null {
  const { store, selection } = state;
  if (!store || !canCopy(state)) return null;

  const bytes = store.readRange(selection.start, selection.length);
  const result: CopyResult = {
    bytes,
    text: state.converter.toDisplayString(bytes),
    hex: bytesToHex(bytes, state.options.hexCasing),
    contentType,
  };

  state.clipboard.write({ text: contentType === 'hex' ? result.hex : result.text, bytes });
  state.emit({ type: 'copied', result });
  revealCursor(state);
  return result;
}

export function cutSelection(state: EditorState): CopyResult | null {
  const { store, selection } = state;
  if (!store || !canCut(state)) return null;

  const result = copySelection(state, state.options.copyContentType);
  if (!result) return null;

  const pos = selection.start;
  store.deleteBytes(pos, selection.length);
  state.scroll.recomputeBounds(store.length);
  selection.setCursor(pos, 0);
  revealCursor(state);
  selection.releaseSelection();
  return result;
}

/**
 * Insert a clipboard payload at the cursor, replacing the selection.
 * `data` defaults to the clipboard content.
 */
export function pastePayload(state: EditorState, asHex: boolean, data?: ClipboardData | null): PasteResult {
  const { store, selection, options } = state;
  if (!store || options.readOnly || !options.enablePaste || !store.supportsInsertBytes()) {
    return { ok: false, reason: 'denied' };
  }

  const payload = payloadBytes(data === undefined ? state.clipboard.read() : data, asHex);
  if (!payload.ok) {
    debugLog(`[Commands] paste rejected: ${payload.reason}`);
    return payload;
  }
  if (payload.bytes.length === 0) return { ok: false, reason: 'empty' };

  const replaceLength = options.enableOverwritePaste ? payload.bytes.length : selection.length;
  const pos = selection.start;
  const removable = Math.min(replaceLength, store.length - pos);

  if (removable > 0 && !store.supportsDeleteBytes()) return { ok: false, reason: 'denied' };
  if (removable > 0) store.deleteBytes(pos, removable);

  store.insertBytes(pos, payload.bytes);
  state.changes.markDirtyRange(pos, payload.bytes.length);
  state.scroll.recomputeBounds(store.length);

  selection.setCursor(pos + payload.bytes.length, 0);
  selection.releaseSelection();
  revealCursor(state);
  return { ok: true, offset: pos, length: payload.bytes.length };
}

// ============================================
// Dispatch
// ============================================

/**
 * Run a bound command. Returns false when the command does not apply, so
 * the host may handle the key itself.
 */
export function executeCommand(state: EditorState, command: HexCommand): boolean {
  if (state.mode === 'empty') return false;

  switch (command) {
    case 'cursor.left':
      return moveLeft(state);
    case 'cursor.right':
      return moveRight(state);
    case 'cursor.up':
      return moveUp(state);
    case 'cursor.down':
      return moveDown(state);
    case 'cursor.pageUp':
      return movePageUp(state);
    case 'cursor.pageDown':
      return movePageDown(state);
    case 'cursor.home':
      return moveHome(state);
    case 'cursor.end':
      return moveEnd(state);
    case 'selection.extendLeft':
      return extendSelection(state, -1);
    case 'selection.extendRight':
      return extendSelection(state, 1);
    case 'selection.extendUp':
      return extendSelection(state, -state.geometry.bytesPerLine);
    case 'selection.extendDown':
      return extendSelection(state, state.geometry.bytesPerLine);
    case 'selection.selectAll':
      return selectAll(state);
    case 'mode.nextPane':
      return nextPane(state);
    case 'mode.previousPane':
      return previousPane(state);
    case 'edit.backspace':
      return backspace(state);
    case 'edit.delete':
      return deleteForward(state);
    case 'edit.toggleInsert':
      return toggleInsert(state);
    case 'clipboard.copy':
      copySelection(state, state.options.copyContentType);
      return true;
    case 'clipboard.copyHex':
      copySelection(state, 'hex');
      return true;
    case 'clipboard.cut':
      cutSelection(state);
      return true;
    case 'clipboard.paste':
      pastePayload(state, false);
      return true;
    case 'clipboard.pasteHex':
      pastePayload(state, true);
      return true;
  }
}
