/**
 * Settings Manager
 *
 * Typed hex editor settings with defaults and per-key change listeners.
 * Values coming from user files are validated key by key.
 */

import type { ConverterEncoding } from '../core/char-converter.ts';
import type { CopyContentType } from '../core/clipboard.ts';
import type { EditorOptions } from '../core/editor-state.ts';
import type { ByteGrouping, GeometryOptions } from '../core/geometry.ts';
import type { HexCasing } from '../core/hex.ts';

export interface HexEditorSettings {
  'hexEditor.bytesPerLine': number;
  'hexEditor.useFixedBytesPerLine': boolean;
  'hexEditor.byteGrouping': ByteGrouping;
  'hexEditor.hexCasing': HexCasing;
  'hexEditor.stringViewVisible': boolean;
  'hexEditor.lineInfoVisible': boolean;
  'hexEditor.lineInfoDigits': number;
  'hexEditor.lineInfoOffset': number;
  'hexEditor.columnInfoVisible': boolean;
  'hexEditor.vScrollBarVisible': boolean;
  'hexEditor.readOnly': boolean;
  'hexEditor.enableCut': boolean;
  'hexEditor.enableDelete': boolean;
  'hexEditor.enablePaste': boolean;
  'hexEditor.enableOverwritePaste': boolean;
  'hexEditor.copyContentType': CopyContentType;
  'hexEditor.retainDirtyOnSwap': boolean;
  'hexEditor.retainCommittedOnSwap': boolean;
  'hexEditor.autoCommitOnSwap': boolean;
  'hexEditor.encoding': ConverterEncoding;
  'hexEditor.mouseWheelScrollLines': number;
  'hexEditor.findYieldInterval': number;
}

export type SettingKey = keyof HexEditorSettings;

export const defaultSettings: HexEditorSettings = {
  'hexEditor.bytesPerLine': 16,
  'hexEditor.useFixedBytesPerLine': true,
  'hexEditor.byteGrouping': 1,
  'hexEditor.hexCasing': 'upper',
  'hexEditor.stringViewVisible': true,
  'hexEditor.lineInfoVisible': true,
  'hexEditor.lineInfoDigits': 8,
  'hexEditor.lineInfoOffset': 0,
  'hexEditor.columnInfoVisible': true,
  'hexEditor.vScrollBarVisible': true,
  'hexEditor.readOnly': false,
  'hexEditor.enableCut': true,
  'hexEditor.enableDelete': true,
  'hexEditor.enablePaste': true,
  'hexEditor.enableOverwritePaste': false,
  'hexEditor.copyContentType': 'char',
  'hexEditor.retainDirtyOnSwap': false,
  'hexEditor.retainCommittedOnSwap': false,
  'hexEditor.autoCommitOnSwap': false,
  'hexEditor.encoding': 'default',
  'hexEditor.mouseWheelScrollLines': 3,
  'hexEditor.findYieldInterval': 1000,
};

// ============================================
// Validation
// ============================================

type Validator<T> = (value: unknown) => value is T;

const isBoolean: Validator<boolean> = (value): value is boolean => typeof value === 'boolean';

function integerAtLeast(min: number): Validator<number> {
  return (value): value is number => typeof value === 'number' && Number.isInteger(value) && value >= min;
}

function oneOf<T extends string | number>(...allowed: readonly T[]): Validator<T> {
  return (value): value is T => allowed.some((candidate) => candidate === value);
}

const SETTING_VALIDATORS: { [K in SettingKey]: Validator<HexEditorSettings[K]> } = {
  'hexEditor.bytesPerLine': integerAtLeast(1),
  'hexEditor.useFixedBytesPerLine': isBoolean,
  'hexEditor.byteGrouping': oneOf<ByteGrouping>(1, 2, 4, 8, 16),
  'hexEditor.hexCasing': oneOf<HexCasing>('upper', 'lower'),
  'hexEditor.stringViewVisible': isBoolean,
  'hexEditor.lineInfoVisible': isBoolean,
  'hexEditor.lineInfoDigits': integerAtLeast(1),
  'hexEditor.lineInfoOffset': integerAtLeast(0),
  'hexEditor.columnInfoVisible': isBoolean,
  'hexEditor.vScrollBarVisible': isBoolean,
  'hexEditor.readOnly': isBoolean,
  'hexEditor.enableCut': isBoolean,
  'hexEditor.enableDelete': isBoolean,
  'hexEditor.enablePaste': isBoolean,
  'hexEditor.enableOverwritePaste': isBoolean,
  'hexEditor.copyContentType': oneOf<CopyContentType>('char', 'hex'),
  'hexEditor.retainDirtyOnSwap': isBoolean,
  'hexEditor.retainCommittedOnSwap': isBoolean,
  'hexEditor.autoCommitOnSwap': isBoolean,
  'hexEditor.encoding': oneOf<ConverterEncoding>('default', 'latin1', 'utf-8', 'utf-16le', 'utf-16be'),
  'hexEditor.mouseWheelScrollLines': integerAtLeast(1),
  'hexEditor.findYieldInterval': integerAtLeast(1),
};

export const SETTING_KEYS: readonly SettingKey[] = Object.keys(defaultSettings).filter(isSettingKey);

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_VALIDATORS, key);
}

export function isValidSetting<K extends SettingKey>(key: K, value: unknown): value is HexEditorSettings[K] {
  const validate: Validator<HexEditorSettings[K]> = SETTING_VALIDATORS[key];
  return validate(value);
}

function copySetting<K extends SettingKey>(
  target: Partial<HexEditorSettings>,
  key: K,
  value: unknown
): boolean {
  if (!isValidSetting(key, value)) return false;
  target[key] = value;
  return true;
}

/**
 * Pick the known, well-typed settings out of a parsed settings object.
 * `onRejected` receives every key that was dropped.
 */
export function parseSettings(
  raw: unknown,
  onRejected?: (key: string, value: unknown) => void
): Partial<HexEditorSettings> {
  const result: Partial<HexEditorSettings> = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return result;

  for (const [key, value] of Object.entries(raw)) {
    if (!isSettingKey(key) || !copySetting(result, key, value)) {
      onRejected?.(key, value);
    }
  }
  return result;
}

// ============================================
// Engine Mapping
// ============================================

/**
 * Editing options for the engine.
 */
export function editorOptionsFrom(settings: HexEditorSettings): EditorOptions {
  return {
    readOnly: settings['hexEditor.readOnly'],
    enableCut: settings['hexEditor.enableCut'],
    enableDelete: settings['hexEditor.enableDelete'],
    enablePaste: settings['hexEditor.enablePaste'],
    enableOverwritePaste: settings['hexEditor.enableOverwritePaste'],
    hexCasing: settings['hexEditor.hexCasing'],
    copyContentType: settings['hexEditor.copyContentType'],
    retainDirtyOnSwap: settings['hexEditor.retainDirtyOnSwap'],
    retainCommittedOnSwap: settings['hexEditor.retainCommittedOnSwap'],
    autoCommitOnSwap: settings['hexEditor.autoCommitOnSwap'],
  };
}

/**
 * Layout options for the engine, in terminal cells.
 */
export function geometryOptionsFrom(settings: HexEditorSettings): Partial<GeometryOptions> {
  return {
    bytesPerLine: settings['hexEditor.bytesPerLine'],
    useFixedBytesPerLine: settings['hexEditor.useFixedBytesPerLine'],
    groupSize: settings['hexEditor.byteGrouping'],
    stringViewVisible: settings['hexEditor.stringViewVisible'],
    lineInfoVisible: settings['hexEditor.lineInfoVisible'],
    lineInfoDigits: settings['hexEditor.lineInfoDigits'],
    columnInfoVisible: settings['hexEditor.columnInfoVisible'],
    scrollBarWidth: settings['hexEditor.vScrollBarVisible'] ? 1 : 0,
  };
}

// ============================================
// Settings
// ============================================

export class Settings {
  private settings: HexEditorSettings;
  private listeners: Map<SettingKey, Set<(value: unknown) => void>> = new Map();

  constructor(initial: Partial<HexEditorSettings> = {}) {
    this.settings = { ...defaultSettings, ...initial };
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): HexEditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: HexEditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key, value);
    }
  }

  /**
   * Get all settings
   */
  getAll(): HexEditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings
   */
  update(partial: Partial<HexEditorSettings>): void {
    for (const key of SETTING_KEYS) {
      this.setFrom(partial, key);
    }
  }

  private setFrom<K extends SettingKey>(partial: Partial<HexEditorSettings>, key: K): void {
    const value = partial[key];
    if (value !== undefined) this.set(key, value);
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.update(defaultSettings);
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(
    key: K,
    callback: (value: HexEditorSettings[K]) => void
  ): () => void {
    const listener = (value: unknown): void => {
      if (isValidSetting(key, value)) callback(value);
    };

    let keyListeners = this.listeners.get(key);
    if (!keyListeners) {
      keyListeners = new Set();
      this.listeners.set(key, keyListeners);
    }
    keyListeners.add(listener);

    return () => {
      this.listeners.get(key)?.delete(listener);
    };
  }

  private notifyListeners(key: SettingKey, value: unknown): void {
    const keyListeners = this.listeners.get(key);
    if (keyListeners) {
      for (const listener of [...keyListeners]) {
        listener(value);
      }
    }
  }
}

export const settings = new Settings();

export default settings;
