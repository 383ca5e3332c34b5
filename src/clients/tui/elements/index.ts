/**
 * TUI Elements
 *
 * Base class and the hex editor element.
 */

export {
  BaseElement,
  type ElementContext,
  type PaneColors,
  createTestContext,
} from './base.ts';

export {
  HexEditor,
  createHexEditor,
  type HexEditorCallbacks,
  type HexEditorOptions,
  type HexEditorState,
  type HexEditorStatus,
} from './hex-editor.ts';
