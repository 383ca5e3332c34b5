/**
 * Settings Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
  Settings,
  SETTING_KEYS,
  defaultSettings,
  editorOptionsFrom,
  geometryOptionsFrom,
  isValidSetting,
  parseSettings,
} from '../../../src/config/settings.ts';

describe('Settings', () => {
  let settings: Settings;

  beforeEach(() => {
    settings = new Settings();
  });

  test('starts from the defaults', () => {
    expect(settings.get('hexEditor.bytesPerLine')).toBe(16);
    expect(settings.getAll()).toEqual(defaultSettings);
  });

  test('initial values override defaults', () => {
    const custom = new Settings({ 'hexEditor.readOnly': true });
    expect(custom.get('hexEditor.readOnly')).toBe(true);
  });

  test('set notifies listeners of changed values only', () => {
    const values: number[] = [];
    settings.onChange('hexEditor.bytesPerLine', (value) => values.push(value));
    settings.set('hexEditor.bytesPerLine', 8);
    settings.set('hexEditor.bytesPerLine', 8);
    expect(values).toEqual([8]);
  });

  test('unsubscribe stops notifications', () => {
    let calls = 0;
    const off = settings.onChange('hexEditor.readOnly', () => calls++);
    off();
    settings.set('hexEditor.readOnly', true);
    expect(calls).toBe(0);
  });

  test('update and reset', () => {
    settings.update({ 'hexEditor.hexCasing': 'lower', 'hexEditor.byteGrouping': 4 });
    expect(settings.get('hexEditor.hexCasing')).toBe('lower');
    expect(settings.get('hexEditor.byteGrouping')).toBe(4);
    settings.reset();
    expect(settings.get('hexEditor.hexCasing')).toBe('upper');
  });
});

describe('validation', () => {
  test('every default is valid', () => {
    for (const key of SETTING_KEYS) {
      expect(isValidSetting(key, defaultSettings[key])).toBe(true);
    }
  });

  test('parseSettings keeps well-typed known keys', () => {
    const rejected: string[] = [];
    const result = parseSettings(
      {
        'hexEditor.bytesPerLine': 8,
        'hexEditor.byteGrouping': 3,
        'hexEditor.encoding': 'utf-8',
        'hexEditor.readOnly': 'yes',
        'editor.fontSize': 12,
      },
      (key) => rejected.push(key)
    );
    expect(result).toEqual({ 'hexEditor.bytesPerLine': 8, 'hexEditor.encoding': 'utf-8' });
    expect(rejected).toEqual(['hexEditor.byteGrouping', 'hexEditor.readOnly', 'editor.fontSize']);
  });

  test('parseSettings ignores non-objects', () => {
    expect(parseSettings([1, 2])).toEqual({});
    expect(parseSettings(null)).toEqual({});
  });

  test('integers must be whole and in range', () => {
    expect(isValidSetting('hexEditor.bytesPerLine', 0)).toBe(false);
    expect(isValidSetting('hexEditor.bytesPerLine', 2.5)).toBe(false);
    expect(isValidSetting('hexEditor.lineInfoOffset', 0)).toBe(true);
  });
});

describe('engine mapping', () => {
  test('editorOptionsFrom copies the editing switches', () => {
    const options = editorOptionsFrom({ ...defaultSettings, 'hexEditor.readOnly': true, 'hexEditor.copyContentType': 'hex' });
    expect(options.readOnly).toBe(true);
    expect(options.copyContentType).toBe('hex');
    expect(options.enableCut).toBe(true);
  });

  test('geometryOptionsFrom maps the scrollbar to a width', () => {
    expect(geometryOptionsFrom(defaultSettings).scrollBarWidth).toBe(1);
    const hidden = geometryOptionsFrom({ ...defaultSettings, 'hexEditor.vScrollBarVisible': false, 'hexEditor.byteGrouping': 8 });
    expect(hidden.scrollBarWidth).toBe(0);
    expect(hidden.groupSize).toBe(8);
  });
});
