/**
 * bytegrid
 *
 * Byte-grid hex editing engine with a terminal client element.
 */

// Engine
export { HexEngine, createHexEngine } from './core/engine.ts';
export type { HexEngineOptions, ByteCellClass, EngineListener, EngineViewState } from './core/engine.ts';
export { DEFAULT_EDITOR_OPTIONS } from './core/editor-state.ts';
export type { EditorOptions, EngineEvent, EngineEventType } from './core/editor-state.ts';
export { HEX_COMMANDS, isHexCommand } from './core/commands.ts';
export type { HexCommand } from './core/commands.ts';

// Byte stores
export { StoreNotifier, assertOffset, assertInsertOffset } from './core/byte-store.ts';
export type { ByteStore, ByteStoreEvent, ByteStoreListener } from './core/byte-store.ts';
export { MemoryByteStore } from './core/memory-byte-store.ts';
export type { MemoryByteStoreOptions } from './core/memory-byte-store.ts';

// Building blocks
export {
  FILLER_CHAR,
  isPrintable,
  DefaultByteCharConverter,
  Latin1ByteCharConverter,
  Utf8ByteCharConverter,
  Utf16ByteCharConverter,
  createByteCharConverter,
} from './core/char-converter.ts';
export type { ByteCharConverter, ConverterEncoding } from './core/char-converter.ts';
export { ChangeTracker } from './core/change-tracker.ts';
export { MemoryClipboard, encodeAscii } from './core/clipboard.ts';
export type { Clipboard, ClipboardData, CopyContentType, CopyResult, PasteResult } from './core/clipboard.ts';
export {
  FIND_NOT_FOUND,
  FIND_ABORTED,
  DEFAULT_FIND_YIELD_INTERVAL,
  FindEngine,
  buildTextPattern,
} from './core/find.ts';
export type { FindOptions, FindPattern } from './core/find.ts';
export { GeometryEngine, DEFAULT_GEOMETRY_OPTIONS } from './core/geometry.ts';
export type { ByteGrouping, GeometryOptions, GridLayout, GridRegion } from './core/geometry.ts';
export { ScrollController, NATIVE_SCROLL_MAX } from './core/scroll.ts';
export type { ScrollState } from './core/scroll.ts';
export { SelectionModel } from './core/selection.ts';
export type { SelectionEvent, SelectionSnapshot } from './core/selection.ts';
export { isHexDigit, formatHexByte, bytesToHex, formatOffset, parseHexText, decodeHexText } from './core/hex.ts';
export type { HexCasing } from './core/hex.ts';
export {
  ByteGridError,
  OutOfRangeError,
  CapabilityDeniedError,
  InvalidPatternError,
  MalformedPasteError,
  isByteGridError,
} from './core/errors.ts';
export type { ByteGridErrorCode } from './core/errors.ts';
export type { Point, Rect, GridPoint, Nibble, BytePosition, InputMode, GridPane, Direction } from './core/types.ts';

// Configuration and input
export { Settings, defaultSettings, parseSettings, editorOptionsFrom, geometryOptionsFrom } from './config/settings.ts';
export type { HexEditorSettings, SettingKey } from './config/settings.ts';
export { Keymap, DEFAULT_KEYBINDINGS, parseKeyBindings, keyEventToParsed } from './input/keymap.ts';
export type { KeyBinding, ParsedKey } from './input/keymap.ts';
export { debugLog, setDebugEnabled, setDebugLogPath, isDebugEnabled } from './debug.ts';

// Terminal client
export {
  HexEditor,
  createHexEditor,
  BaseElement,
  createTestContext,
} from './clients/tui/elements/index.ts';
export type {
  HexEditorCallbacks,
  HexEditorOptions,
  HexEditorState,
  HexEditorStatus,
  ElementContext,
  PaneColors,
} from './clients/tui/elements/index.ts';
export { ScreenBuffer, createScreenBuffer } from './clients/tui/rendering/buffer.ts';
export type { Cell, KeyEvent, MouseEvent, Size } from './clients/tui/types.ts';
export {
  HexConfigManager,
  createHexConfigManager,
  stripJsonComments,
  CONFIG_DIR_NAME,
} from './clients/tui/config/index.ts';
export type { ConfigPaths, HexConfigManagerOptions } from './clients/tui/config/index.ts';
