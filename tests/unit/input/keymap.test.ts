/**
 * Keymap Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
  DEFAULT_KEYBINDINGS,
  Keymap,
  keyEventToParsed,
  parseKeyBindings,
  type ParsedKey,
} from '../../../src/input/keymap.ts';

function parsed(key: string, mods: Partial<Omit<ParsedKey, 'key'>> = {}): ParsedKey {
  return { key, ctrl: false, alt: false, shift: false, meta: false, ...mods };
}

describe('Keymap', () => {
  let keymap: Keymap;

  beforeEach(() => {
    keymap = new Keymap();
  });

  test('default bindings resolve to commands', () => {
    expect(keymap.getCommand(parsed('left'))).toBe('cursor.left');
    expect(keymap.getCommand(parsed('left', { shift: true }))).toBe('selection.extendLeft');
    expect(keymap.getCommand(parsed('v', { ctrl: true, shift: true }))).toBe('clipboard.pasteHex');
    expect(keymap.getCommand(parsed('q'))).toBeNull();
  });

  test('every default binding is loaded', () => {
    expect(keymap.getAllBindings()).toHaveLength(DEFAULT_KEYBINDINGS.length);
  });

  test('normalizeKey orders modifiers', () => {
    expect(keymap.normalizeKey('Shift+Ctrl+V')).toBe('ctrl+shift+v');
    expect(keymap.normalizeKey('command+option+x')).toBe('alt+cmd+x');
  });

  test('addBinding replaces the key of the same command', () => {
    keymap.addBinding({ key: 'ctrl+b', command: 'cursor.left' });
    expect(keymap.getCommand(parsed('b', { ctrl: true }))).toBe('cursor.left');
    expect(keymap.getCommand(parsed('left'))).toBeNull();
    expect(keymap.getBindingForCommand('cursor.left')).toEqual({ key: 'ctrl+b', command: 'cursor.left' });
  });

  test('removeBinding', () => {
    keymap.removeBinding('Tab');
    expect(keymap.getCommand(parsed('tab'))).toBeNull();
  });

  test('formatForDisplay uses symbols', () => {
    expect(keymap.formatForDisplay('ctrl+shift+c')).toBe('⌃⇧C');
    expect(keymap.formatForDisplay('pagedown')).toBe('PgDn');
  });
});

describe('keyEventToParsed', () => {
  test('maps terminal key names', () => {
    expect(keyEventToParsed(parsed('ArrowUp', { shift: true }))).toEqual(parsed('up', { shift: true }));
    expect(keyEventToParsed(parsed('PageDown')).key).toBe('pagedown');
  });

  test('lower-cases plain keys', () => {
    expect(keyEventToParsed(parsed('A')).key).toBe('a');
  });
});

describe('parseKeyBindings', () => {
  test('keeps valid entries and drops the rest', () => {
    const raw = [
      { key: 'ctrl+g', command: 'cursor.home' },
      { key: 'ctrl+h', command: 'editor.unknown' },
      { command: 'cursor.end' },
      'ctrl+j',
    ];
    expect(parseKeyBindings(raw)).toEqual([{ key: 'ctrl+g', command: 'cursor.home' }]);
  });

  test('non-arrays give no bindings', () => {
    expect(parseKeyBindings({ key: 'a' })).toEqual([]);
    expect(parseKeyBindings(null)).toEqual([]);
  });
});
