/**
 * HexConfigManager Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  HexConfigManager,
  createHexConfigManager,
  stripJsonComments,
} from '../../../../../src/clients/tui/config/config-manager.ts';
import { DEFAULT_KEYBINDINGS } from '../../../../../src/input/keymap.ts';

describe('HexConfigManager', () => {
  let root: string;
  let home: string;
  let workspace: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bytegrid-config-'));
    home = join(root, 'home');
    workspace = join(root, 'project');
    await mkdir(join(home, '.bytegrid'), { recursive: true });
    await mkdir(workspace, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function manager(withWorkspace = false): HexConfigManager {
    return createHexConfigManager({ homeDir: home, workingDirectory: withWorkspace ? workspace : undefined });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  describe('loading', () => {
    test('creates commented default files', async () => {
      const config = manager();
      await config.load();

      const content = await readFile(config.getPaths().userSettings, 'utf8');
      expect(content.startsWith('// Hex editor settings - edit this file to customize the editor\n')).toBe(true);
      expect(config.get('hexEditor.bytesPerLine')).toBe(16);
      expect(config.getKeybindings()).toHaveLength(DEFAULT_KEYBINDINGS.length);
    });

    test('user settings override defaults and workspace overrides user', async () => {
      await writeFile(
        join(home, '.bytegrid', 'settings.jsonc'),
        '// user settings\n{\n  "hexEditor.bytesPerLine": 8,\n  /* keep it safe */\n  "hexEditor.readOnly": true\n}\n'
      );
      await mkdir(join(workspace, '.bytegrid'));
      await writeFile(join(workspace, '.bytegrid', 'settings.jsonc'), '{ "hexEditor.bytesPerLine": 32 }');

      const config = manager(true);
      await config.load();
      expect(config.get('hexEditor.bytesPerLine')).toBe(32);
      expect(config.get('hexEditor.readOnly')).toBe(true);
      expect(config.get('hexEditor.hexCasing')).toBe('upper');
    });

    test('invalid values fall back to the defaults', async () => {
      await writeFile(join(home, '.bytegrid', 'settings.jsonc'), '{ "hexEditor.bytesPerLine": "wide" }');
      const config = manager();
      await config.load();
      expect(config.get('hexEditor.bytesPerLine')).toBe(16);
    });

    test('malformed files are ignored', async () => {
      await writeFile(join(home, '.bytegrid', 'settings.jsonc'), '{ "hexEditor.bytesPerLine": ');
      const config = manager();
      await config.load();
      expect(config.getAllSettings()['hexEditor.bytesPerLine']).toBe(16);
    });

    test('user keybindings replace the default key of their command', async () => {
      await writeFile(
        join(home, '.bytegrid', 'keybindings.jsonc'),
        '[{ "key": "ctrl+b", "command": "cursor.left" }, { "key": "ctrl+q", "command": "app.quit" }]'
      );
      const config = manager();
      await config.load();

      expect(config.getKeybindingForCommand('cursor.left')).toEqual({ key: 'ctrl+b', command: 'cursor.left' });
      expect(config.getKeybindings()).toHaveLength(DEFAULT_KEYBINDINGS.length);

      const keymap = config.createKeymap();
      expect(keymap.getCommand({ key: 'b', ctrl: true, alt: false, shift: false, meta: false })).toBe('cursor.left');
    });

    test('reload picks up edits and notifies listeners', async () => {
      const config = manager();
      await config.load();
      const values: number[] = [];
      config.onChange('hexEditor.mouseWheelScrollLines', (value) => values.push(value));

      await writeFile(config.getPaths().userSettings, '{ "hexEditor.mouseWheelScrollLines": 5 }');
      await config.reload();
      expect(values).toEqual([5]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Saving
  // ─────────────────────────────────────────────────────────────────────────

  describe('saving', () => {
    test('saveSettings writes the values that differ from the defaults', async () => {
      const config = manager();
      await config.load();
      config.set('hexEditor.bytesPerLine', 8);
      await config.saveSettings();

      const saved: unknown = JSON.parse(await readFile(config.getPaths().userSettings, 'utf8'));
      expect(saved).toEqual({ 'hexEditor.bytesPerLine': 8 });
    });

    test('saveWorkspaceSettings creates the workspace directory', async () => {
      const config = manager(true);
      await config.saveWorkspaceSettings({ 'hexEditor.readOnly': true });

      const saved: unknown = JSON.parse(await readFile(join(workspace, '.bytegrid', 'settings.jsonc'), 'utf8'));
      expect(saved).toEqual({ 'hexEditor.readOnly': true });
    });

    test('saveWorkspaceSettings without a workspace does nothing', async () => {
      const config = manager();
      await config.saveWorkspaceSettings({ 'hexEditor.readOnly': true });
      expect(config.getPaths().workspaceSettings).toBeNull();
    });
  });
});

describe('stripJsonComments', () => {
  test('removes line and block comments', () => {
    expect(stripJsonComments('// head\n{ /* a */ "x": 1 }')).toBe('\n{  "x": 1 }');
  });

  test('keeps slashes inside values', () => {
    expect(stripJsonComments('{ "url": "http://localhost" }')).toBe('{ "url": "http://localhost" }');
  });
});
