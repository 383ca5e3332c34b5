/**
 * Keymap System
 *
 * Maps key combinations to hex editor commands. Binding strings are
 * normalised to `ctrl+alt+shift+cmd+key` order with lower-case key names.
 */

import { debugLog } from '../debug.ts';
import { type HexCommand, isHexCommand } from '../core/commands.ts';

export interface KeyBinding {
  key: string;           // e.g., "shift+left", "ctrl+shift+v"
  command: HexCommand;
}

export interface ParsedKey {
  ctrl: boolean;
  shift: boolean;
  alt: boolean;
  meta: boolean;  // Cmd on macOS
  key: string;    // Base key
}

export const DEFAULT_KEYBINDINGS: KeyBinding[] = [
  // Cursor
  { key: 'left', command: 'cursor.left' },
  { key: 'right', command: 'cursor.right' },
  { key: 'up', command: 'cursor.up' },
  { key: 'down', command: 'cursor.down' },
  { key: 'pageup', command: 'cursor.pageUp' },
  { key: 'pagedown', command: 'cursor.pageDown' },
  { key: 'home', command: 'cursor.home' },
  { key: 'end', command: 'cursor.end' },

  // Selection
  { key: 'shift+left', command: 'selection.extendLeft' },
  { key: 'shift+right', command: 'selection.extendRight' },
  { key: 'shift+up', command: 'selection.extendUp' },
  { key: 'shift+down', command: 'selection.extendDown' },
  { key: 'ctrl+a', command: 'selection.selectAll' },

  // Panes
  { key: 'tab', command: 'mode.nextPane' },
  { key: 'shift+tab', command: 'mode.previousPane' },

  // Editing
  { key: 'backspace', command: 'edit.backspace' },
  { key: 'delete', command: 'edit.delete' },
  { key: 'insert', command: 'edit.toggleInsert' },

  // Clipboard
  { key: 'ctrl+c', command: 'clipboard.copy' },
  { key: 'ctrl+shift+c', command: 'clipboard.copyHex' },
  { key: 'ctrl+x', command: 'clipboard.cut' },
  { key: 'ctrl+v', command: 'clipboard.paste' },
  { key: 'ctrl+shift+v', command: 'clipboard.pasteHex' },
];

/**
 * Terminal key names and their keymap spelling.
 */
const SPECIAL_KEYS: Record<string, string> = {
  ArrowUp: 'up',
  ArrowDown: 'down',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  PageUp: 'pageup',
  PageDown: 'pagedown',
  Home: 'home',
  End: 'end',
  Insert: 'insert',
  Delete: 'delete',
  Backspace: 'backspace',
  Tab: 'tab',
  Enter: 'enter',
  Escape: 'escape',
};

/**
 * Convert a terminal key event into a ParsedKey.
 */
export function keyEventToParsed(event: ParsedKey): ParsedKey {
  const key = SPECIAL_KEYS[event.key] ?? event.key.toLowerCase();
  return { ctrl: event.ctrl, shift: event.shift, alt: event.alt, meta: event.meta, key };
}

/**
 * Validate bindings read from a user file. Entries with a missing key or an
 * unknown command are dropped.
 */
export function parseKeyBindings(raw: unknown): KeyBinding[] {
  if (!Array.isArray(raw)) return [];

  const bindings: KeyBinding[] = [];
  for (const entry of raw) {
    if (typeof entry !== 'object' || entry === null) continue;
    const key: unknown = Reflect.get(entry, 'key');
    const command: unknown = Reflect.get(entry, 'command');
    if (typeof key !== 'string' || typeof command !== 'string' || !isHexCommand(command)) {
      debugLog(`[Keymap] Ignoring binding ${JSON.stringify(entry)}`);
      continue;
    }
    bindings.push({ key, command });
  }
  return bindings;
}

export class Keymap {
  private bindings: Map<string, KeyBinding> = new Map();

  constructor(bindings: KeyBinding[] = DEFAULT_KEYBINDINGS) {
    this.loadBindings(bindings);
  }

  /**
   * Load keybindings from config
   */
  loadBindings(bindings: KeyBinding[]): void {
    for (const binding of bindings) {
      this.addBinding(binding);
    }
  }

  /**
   * Add a single binding. A binding for the same command replaces the old key.
   */
  addBinding(binding: KeyBinding): void {
    for (const [key, existing] of this.bindings) {
      if (existing.command === binding.command) this.bindings.delete(key);
    }
    const normalized = this.normalizeKey(binding.key);
    this.bindings.set(normalized, { key: normalized, command: binding.command });
  }

  /**
   * Remove a binding
   */
  removeBinding(key: string): void {
    this.bindings.delete(this.normalizeKey(key));
  }

  /**
   * Get command for a key event
   */
  getCommand(key: ParsedKey): HexCommand | null {
    return this.bindings.get(this.keyToString(key))?.command ?? null;
  }

  getAllBindings(): KeyBinding[] {
    return Array.from(this.bindings.values());
  }

  /**
   * Get binding for command
   */
  getBindingForCommand(command: HexCommand): KeyBinding | undefined {
    for (const binding of this.bindings.values()) {
      if (binding.command === command) {
        return binding;
      }
    }
    return undefined;
  }

  /**
   * Convert ParsedKey to string representation
   */
  keyToString(key: ParsedKey): string {
    const parts: string[] = [];

    if (key.ctrl) parts.push('ctrl');
    if (key.alt) parts.push('alt');
    if (key.shift) parts.push('shift');
    if (key.meta) parts.push('cmd');
    parts.push(key.key.toLowerCase());

    return parts.join('+');
  }

  /**
   * Normalize a key string (e.g., "Shift+Ctrl+V" -> "ctrl+shift+v")
   */
  normalizeKey(key: string): string {
    const parts = key.toLowerCase().split('+').map((part) => part.trim());
    const parsed: ParsedKey = { ctrl: false, shift: false, alt: false, meta: false, key: '' };

    for (const part of parts) {
      switch (part) {
        case 'ctrl':
        case 'control':
          parsed.ctrl = true;
          break;
        case 'alt':
        case 'option':
          parsed.alt = true;
          break;
        case 'shift':
          parsed.shift = true;
          break;
        case 'cmd':
        case 'command':
        case 'meta':
          parsed.meta = true;
          break;
        default:
          parsed.key = part;
      }
    }

    return this.keyToString(parsed);
  }

  /**
   * Format key binding for display
   */
  formatForDisplay(key: string): string {
    return this.normalizeKey(key)
      .split('+')
      .map(part => {
        switch (part) {
          case 'cmd': return '⌘';
          case 'ctrl': return '⌃';
          case 'alt': return '⌥';
          case 'shift': return '⇧';
          case 'backspace': return '⌫';
          case 'delete': return '⌦';
          case 'tab': return '⇥';
          case 'up': return '↑';
          case 'down': return '↓';
          case 'left': return '←';
          case 'right': return '→';
          case 'pageup': return 'PgUp';
          case 'pagedown': return 'PgDn';
          case 'insert': return 'Ins';
          default: return part.toUpperCase();
        }
      })
      .join('');
  }
}
