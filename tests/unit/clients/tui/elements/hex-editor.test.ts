/**
 * HexEditor Element Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { HexEditor, createHexEditor } from '../../../../../src/clients/tui/elements/hex-editor.ts';
import { createTestContext } from '../../../../../src/clients/tui/elements/base.ts';
import { createScreenBuffer } from '../../../../../src/clients/tui/rendering/buffer.ts';
import type { KeyEvent, MouseEvent } from '../../../../../src/clients/tui/types.ts';
import { MemoryByteStore } from '../../../../../src/core/memory-byte-store.ts';

// ============================================
// Helpers
// ============================================

const BOUNDS = { x: 0, y: 0, width: 80, height: 6 };

function key(name: string, mods: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return { key: name, ctrl: false, alt: false, shift: false, meta: false, ...mods };
}

function mouse(type: MouseEvent['type'], x: number, y: number, mods: Partial<MouseEvent> = {}): MouseEvent {
  return { type, button: 'left', x, y, ctrl: false, alt: false, shift: false, ...mods };
}

function sequential(length: number): MemoryByteStore {
  return new MemoryByteStore(Array.from({ length }, (_, i) => i));
}

// ============================================
// Tests
// ============================================

describe('HexEditor', () => {
  let statuses: string[];
  let focusRequests: number;
  let editor: HexEditor;

  beforeEach(() => {
    statuses = [];
    focusRequests = 0;
    const ctx = createTestContext({
      updateStatus: (status) => statuses.push(status),
      requestFocus: () => focusRequests++,
    });
    editor = createHexEditor('hex-1', ctx);
    editor.setBounds(BOUNDS);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  describe('status', () => {
    test('is empty without a store', () => {
      expect(editor.getStatus()).toBe('');
      expect(editor.getEditorStatus().mode).toBe('empty');
    });

    test('reports line, column and entry mode', () => {
      editor.setStore(sequential(200));
      expect(statuses).toEqual(['Ln 1, Col 1  OVR']);

      editor.getEngine().select(16, 4);
      expect(editor.getStatus()).toBe('Ln 2, Col 1 (4 selected)  OVR');
    });

    test('insert key toggles the entry mode', () => {
      editor.setStore(sequential(8));
      expect(editor.handleKey(key('Insert'))).toBe(true);
      expect(editor.getStatus()).toBe('Ln 1, Col 1  INS');
      expect(editor.getEditorStatus().insertActive).toBe(true);
    });

    test('onStatusChange receives the structured status', () => {
      const seen: number[] = [];
      const withCallbacks = new HexEditor('hex-2', createTestContext(), {}, {
        onStatusChange: (status) => seen.push(status.column),
      });
      withCallbacks.setBounds(BOUNDS);
      withCallbacks.setStore(sequential(8));
      withCallbacks.getEngine().goTo(3);
      expect(seen.at(-1)).toBe(4);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  describe('render', () => {
    test('clears its bounds when there is no store', () => {
      const buffer = createScreenBuffer({ width: 80, height: 6 });
      editor.render(buffer);
      expect(buffer.getLine(1)).toBe(' '.repeat(80));
    });

    test('draws the header, gutter, hex and character panes', () => {
      editor.setStore(new MemoryByteStore([0x00, 0x41, 0x42]));
      const buffer = createScreenBuffer({ width: 80, height: 6 });
      editor.render(buffer);

      expect(buffer.getLine(0).slice(9, 56)).toBe('00 01 02 03 04 05 06 07 08 09 0A 0B 0C 0D 0E 0F');
      expect(buffer.getLine(1).slice(0, 17)).toBe('00000000 00 41 42');
      expect(buffer.getLine(1).slice(58, 61)).toBe('.AB');
      expect(buffer.getLine(2).slice(0, 8)).toBe('        ');
    });

    test('colors zero bytes and selections', () => {
      editor.setStore(new MemoryByteStore([0x00, 0x41, 0x42]));
      editor.getEngine().select(1, 1);
      const buffer = createScreenBuffer({ width: 80, height: 6 });
      editor.render(buffer);

      expect(buffer.get(9, 1)).toEqual({ char: '0', fg: '#5a5a5a', bg: '#1e1e1e' });
      expect(buffer.get(12, 1)?.bg).toBe('#094771');
      expect(buffer.get(15, 1)).toEqual({ char: '4', fg: '#d4d4d4', bg: '#1e1e1e' });
    });

    test('draws the caret only while focused', () => {
      editor.setStore(new MemoryByteStore([0x00, 0x41, 0x42]));
      editor.getEngine().goTo(1);
      const buffer = createScreenBuffer({ width: 80, height: 6 });

      editor.render(buffer);
      expect(buffer.get(12, 1)?.bg).toBe('#1e1e1e');

      editor.onFocus();
      expect(editor.isFocused()).toBe(true);
      editor.render(buffer);
      expect(buffer.get(12, 1)).toEqual({ char: '4', fg: '#1e1e1e', bg: '#aeafad', underline: false });
    });

    test('scrollbar thumb follows the scroll position', () => {
      editor.setStore(sequential(200));
      const buffer = createScreenBuffer({ width: 80, height: 6 });
      editor.render(buffer);
      expect([0, 1, 2, 3, 4, 5].map((row) => buffer.get(79, row)?.char).join('')).toBe('██░░░░');

      editor.handleMouse(mouse('scroll', 10, 2, { button: 'none', scrollDirection: 1 }));
      editor.render(buffer);
      expect([0, 1, 2, 3, 4, 5].map((row) => buffer.get(79, row)?.char).join('')).toBe('░░██░░');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  describe('input', () => {
    test('hex digits overwrite the byte under the cursor', () => {
      const store = new MemoryByteStore([0x00, 0x11]);
      let contentChanges = 0;
      const withCallbacks = createHexEditor('hex-3', createTestContext(), {}, {
        onContentChange: () => contentChanges++,
      });
      withCallbacks.setBounds(BOUNDS);
      withCallbacks.setStore(store);

      expect(withCallbacks.handleKey(key('a'))).toBe(true);
      expect(withCallbacks.handleKey(key('b'))).toBe(true);
      expect(store.readByte(0)).toBe(0xab);
      expect(withCallbacks.getStatus()).toBe('Ln 1, Col 2  OVR');
      expect(contentChanges).toBeGreaterThan(0);
    });

    test('keys are ignored without a store', () => {
      expect(editor.handleKey(key('ArrowRight'))).toBe(false);
    });

    test('wheel scrolls by the configured line count', () => {
      editor.setStore(sequential(200));
      expect(editor.handleMouse(mouse('scroll', 10, 2, { button: 'none', scrollDirection: 1 }))).toBe(true);
      expect(editor.getEngine().getScrollState().scrollPos).toBe(3);
    });

    test('events outside the bounds are not handled', () => {
      editor.setStore(sequential(200));
      expect(editor.handleMouse(mouse('press', 10, 9))).toBe(false);
    });

    test('clicking the hex pane places the caret and requests focus', () => {
      editor.setStore(sequential(200));
      expect(editor.handleMouse(mouse('press', 12, 1))).toBe(true);
      expect(focusRequests).toBe(1);
      expect(editor.getEngine().position).toEqual({ offset: 1, nibble: 0 });
      expect(editor.handleMouse(mouse('release', 12, 1))).toBe(true);
      expect(editor.getEngine().isDragging).toBe(false);
    });

    test('dragging the scrollbar thumb scrolls', () => {
      editor.setStore(sequential(200));
      editor.handleMouse(mouse('press', 79, 5));
      expect(editor.getEngine().getScrollState().scrollPos).toBe(8);

      editor.handleMouse(mouse('drag', 79, 0));
      expect(editor.getEngine().getScrollState().scrollPos).toBe(0);
      expect(editor.handleMouse(mouse('release', 79, 0))).toBe(true);
      expect(editor.handleMouse(mouse('drag', 79, 3))).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Settings & State
  // ─────────────────────────────────────────────────────────────────────────

  describe('settings and state', () => {
    test('applySettings changes the hex casing of the header', () => {
      editor.setStore(sequential(4));
      editor.applySettings({ ...editor.getSettings(), 'hexEditor.hexCasing': 'lower' });
      const buffer = createScreenBuffer({ width: 80, height: 6 });
      editor.render(buffer);
      expect(buffer.getLine(0).slice(39, 41)).toBe('0a');
    });

    test('setState restores the view and ignores malformed fields', () => {
      editor.setStore(sequential(200));
      editor.setState({ mode: 'char', offset: 20, selectionLength: 4, nibble: 5 });

      const state = editor.getState();
      expect(state.mode).toBe('char');
      expect(state.offset).toBe(20);
      expect(state.selectionLength).toBe(4);
      expect(state.nibble).toBe(0);
    });

    test('blur ends a pointer drag', () => {
      editor.setStore(sequential(200));
      editor.onFocus();
      editor.handleMouse(mouse('press', 12, 1));
      editor.onBlur();
      expect(editor.isFocused()).toBe(false);
      expect(editor.getEngine().isDragging).toBe(false);
      expect(editor.handleMouse(mouse('drag', 21, 1))).toBe(false);
    });

    test('dispose detaches the status from the engine', () => {
      editor.setStore(sequential(200));
      editor.dispose();
      editor.getEngine().goTo(3);
      expect(editor.getStatus()).toBe('Ln 1, Col 1  OVR');
    });

    test('setState ignores non-objects', () => {
      editor.setStore(sequential(200));
      editor.setState('nope');
      expect(editor.getState().offset).toBe(0);
    });
  });
});
