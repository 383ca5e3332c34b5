/**
 * Editor State
 *
 * The mutable state shared by the command handlers: the bound store, the
 * input mode and the component models. Handlers receive this record and
 * report notifications through `emit`; the engine queues them and delivers
 * them once the triggering call has finished.
 */

import type { ByteStore } from './byte-store.ts';
import { ChangeTracker } from './change-tracker.ts';
import type { ByteCharConverter } from './char-converter.ts';
import { DefaultByteCharConverter } from './char-converter.ts';
import type { Clipboard, CopyContentType, CopyResult } from './clipboard.ts';
import { MemoryClipboard } from './clipboard.ts';
import { GeometryEngine, type GeometryOptions, type GridLayout } from './geometry.ts';
import type { HexCasing } from './hex.ts';
import { ScrollController } from './scroll.ts';
import { SelectionModel, type SelectionEvent } from './selection.ts';
import type { InputMode } from './types.ts';

// ============================================
// Options
// ============================================

export interface EditorOptions {
  /** Reject every mutation coming from user input */
  readOnly: boolean;
  enableCut: boolean;
  enableDelete: boolean;
  enablePaste: boolean;
  /** Paste replaces as many bytes as it inserts */
  enableOverwritePaste: boolean;
  hexCasing: HexCasing;
  /** Representation written as clipboard text by the copy command */
  copyContentType: CopyContentType;
  /** Keep dirty offsets when a new store is bound */
  retainDirtyOnSwap: boolean;
  /** Keep committed offsets when a new store is bound */
  retainCommittedOnSwap: boolean;
  /** Commit dirty offsets before a new store is bound */
  autoCommitOnSwap: boolean;
}

export const DEFAULT_EDITOR_OPTIONS: EditorOptions = {
  readOnly: false,
  enableCut: true,
  enableDelete: true,
  enablePaste: true,
  enableOverwritePaste: false,
  hexCasing: 'upper',
  copyContentType: 'char',
  retainDirtyOnSwap: false,
  retainCommittedOnSwap: false,
  autoCommitOnSwap: false,
};

// ============================================
// Events
// ============================================

export type EngineEvent =
  | SelectionEvent
  | { type: 'insertActiveChanged'; active: boolean }
  | { type: 'modeChanged'; mode: InputMode }
  | { type: 'scrollChanged'; line: number }
  | { type: 'contentChanged' }
  | { type: 'lengthChanged'; length: number }
  | { type: 'storeChanged'; store: ByteStore | null }
  | { type: 'copied'; result: CopyResult }
  | { type: 'layoutChanged'; layout: GridLayout }
  | { type: 'requiredWidthChanged'; width: number };

export type EngineEventType = EngineEvent['type'];

// ============================================
// State
// ============================================

export interface EditorState {
  store: ByteStore | null;
  mode: InputMode;
  insertActive: boolean;
  options: EditorOptions;
  converter: ByteCharConverter;
  clipboard: Clipboard;
  selection: SelectionModel;
  scroll: ScrollController;
  geometry: GeometryEngine;
  changes: ChangeTracker;
  emit: (event: EngineEvent) => void;
}

export interface EditorStateInit {
  options?: Partial<EditorOptions>;
  geometry?: Partial<GeometryOptions>;
  converter?: ByteCharConverter;
  clipboard?: Clipboard;
}

/**
 * Build a state with no store bound.
 */
export function createEditorState(emit: (event: EngineEvent) => void, init: EditorStateInit = {}): EditorState {
  const geometry = new GeometryEngine(init.geometry);
  const selection = new SelectionModel(emit);
  const scroll = new ScrollController((line) => emit({ type: 'scrollChanged', line }));

  selection.setBytesPerLine(geometry.bytesPerLine);
  scroll.setVisibleByteRange(geometry.bytesPerLine, geometry.visibleLines);

  return {
    store: null,
    mode: 'empty',
    insertActive: false,
    options: { ...DEFAULT_EDITOR_OPTIONS, ...init.options },
    converter: init.converter ?? new DefaultByteCharConverter(),
    clipboard: init.clipboard ?? new MemoryClipboard(),
    selection,
    scroll,
    geometry,
    changes: new ChangeTracker(),
    emit,
  };
}

/**
 * Length of the bound store, 0 when none is bound.
 */
export function storeLength(state: EditorState): number {
  return state.store?.length ?? 0;
}
