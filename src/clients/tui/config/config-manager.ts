/**
 * Hex Config Manager
 *
 * Loads hex editor settings and keybindings for the terminal client.
 * User config lives in ~/.bytegrid/, workspace overrides in <project>/.bytegrid/.
 * Both files are JSONC: line and block comments are stripped before parsing.
 */

import { access, mkdir, readFile, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { debugLog } from '../../../debug.ts';
import {
  type HexEditorSettings,
  type SettingKey,
  Settings,
  defaultSettings,
  parseSettings,
} from '../../../config/settings.ts';
import { DEFAULT_KEYBINDINGS, type KeyBinding, Keymap, parseKeyBindings } from '../../../input/keymap.ts';
import type { HexCommand } from '../../../core/commands.ts';

export const CONFIG_DIR_NAME = '.bytegrid';

// ============================================
// Types
// ============================================

/**
 * Config paths for different locations.
 */
export interface ConfigPaths {
  /** User config directory (~/.bytegrid/) */
  userDir: string;
  /** User settings file (~/.bytegrid/settings.jsonc) */
  userSettings: string;
  /** User keybindings file (~/.bytegrid/keybindings.jsonc) */
  userKeybindings: string;
  /** Workspace config directory, created on demand */
  workspaceDir: string | null;
  workspaceSettings: string | null;
}

export interface HexConfigManagerOptions {
  /** Project directory whose .bytegrid/settings.jsonc overrides user settings */
  workingDirectory?: string;
  /** Defaults to the OS home directory */
  homeDir?: string;
}

// ============================================
// JSONC
// ============================================

/**
 * Strip comments from JSONC text.
 */
export function stripJsonComments(content: string): string {
  return content
    .replace(/\/\*[\s\S]*?\*\//g, '') // Multi-line comments
    .replace(/^\s*\/\/.*$/gm, ''); // Whole-line comments
}

// ============================================
// Config Manager
// ============================================

export class HexConfigManager {
  private readonly settings = new Settings();
  private keybindings: KeyBinding[] = [...DEFAULT_KEYBINDINGS];
  private readonly paths: ConfigPaths;
  private loaded = false;

  constructor(options: HexConfigManagerOptions = {}) {
    const userDir = join(options.homeDir ?? homedir(), CONFIG_DIR_NAME);
    const workspaceDir = options.workingDirectory ? join(options.workingDirectory, CONFIG_DIR_NAME) : null;

    this.paths = {
      userDir,
      userSettings: join(userDir, 'settings.jsonc'),
      userKeybindings: join(userDir, 'keybindings.jsonc'),
      workspaceDir,
      workspaceSettings: workspaceDir ? join(workspaceDir, 'settings.jsonc') : null,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load all configuration. Subsequent calls are no-ops until reload().
   */
  async load(): Promise<void> {
    if (this.loaded) return;

    await this.ensureConfigDirs();
    await this.loadSettings();
    await this.loadKeybindings();

    this.loaded = true;
    debugLog('[HexConfigManager] Configuration loaded');
  }

  /**
   * Re-read every file.
   */
  async reload(): Promise<void> {
    this.loaded = false;
    await this.load();
  }

  /**
   * Ensure the user config directory and default files exist.
   * Workspace config is only created when explicitly saving.
   */
  private async ensureConfigDirs(): Promise<void> {
    try {
      await mkdir(this.paths.userDir, { recursive: true });
      await this.ensureDefaultFile(
        this.paths.userSettings,
        defaultSettings,
        'Hex editor settings - edit this file to customize the editor'
      );
      await this.ensureDefaultFile(
        this.paths.userKeybindings,
        DEFAULT_KEYBINDINGS,
        'Hex editor keybindings - edit this file to customize your shortcuts'
      );
    } catch (error) {
      debugLog(`[HexConfigManager] Error creating config dirs: ${error}`);
    }
  }

  private async ensureDefaultFile(path: string, defaults: unknown, comment: string): Promise<void> {
    if (await fileExists(path)) return;

    const header = `// ${comment}\n// Generated on ${new Date().toISOString()}\n`;
    await writeFile(path, header + JSON.stringify(defaults, null, 2), 'utf8');
    debugLog(`[HexConfigManager] Created default config: ${path}`);
  }

  private async loadSettings(): Promise<void> {
    const merged: Partial<HexEditorSettings> = {};

    const userSettings = parseSettings(await this.loadJsonFile(this.paths.userSettings), this.rejected('user'));
    debugLog(`[HexConfigManager] Loaded ${Object.keys(userSettings).length} user settings from ${this.paths.userSettings}`);
    Object.assign(merged, userSettings);

    if (this.paths.workspaceSettings) {
      const raw = await this.loadJsonFile(this.paths.workspaceSettings);
      if (raw !== null) {
        const workspaceSettings = parseSettings(raw, this.rejected('workspace'));
        debugLog(`[HexConfigManager] Loaded ${Object.keys(workspaceSettings).length} workspace settings from ${this.paths.workspaceSettings}`);
        Object.assign(merged, workspaceSettings);
      }
    }

    this.settings.update({ ...defaultSettings, ...merged });
  }

  private rejected(source: string): (key: string, value: unknown) => void {
    return (key, value) => {
      debugLog(`[HexConfigManager] Ignoring ${source} setting ${key} = ${JSON.stringify(value)}`);
    };
  }

  private async loadKeybindings(): Promise<void> {
    const userKeybindings = parseKeyBindings(await this.loadJsonFile(this.paths.userKeybindings));

    // User bindings override defaults for the same command
    const commandMap = new Map<HexCommand, KeyBinding>();
    for (const binding of DEFAULT_KEYBINDINGS) {
      commandMap.set(binding.command, binding);
    }
    for (const binding of userKeybindings) {
      commandMap.set(binding.command, binding);
    }

    this.keybindings = Array.from(commandMap.values());
    debugLog(`[HexConfigManager] ${userKeybindings.length} user keybindings applied`);
  }

  /**
   * Read and parse a JSONC file. Missing or malformed files yield null.
   */
  private async loadJsonFile(path: string): Promise<unknown> {
    if (!(await fileExists(path))) {
      debugLog(`[HexConfigManager] File does not exist: ${path}`);
      return null;
    }

    try {
      const content = await readFile(path, 'utf8');
      const parsed: unknown = JSON.parse(stripJsonComments(content));
      debugLog(`[HexConfigManager] Successfully parsed ${path}`);
      return parsed;
    } catch (error) {
      debugLog(`[HexConfigManager] Error loading ${path}: ${error}`);
      return null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Settings Access
  // ─────────────────────────────────────────────────────────────────────────

  get<K extends SettingKey>(key: K): HexEditorSettings[K] {
    return this.settings.get(key);
  }

  set<K extends SettingKey>(key: K, value: HexEditorSettings[K]): void {
    this.settings.set(key, value);
  }

  getAllSettings(): HexEditorSettings {
    return this.settings.getAll();
  }

  /**
   * The live settings object, shared with editors created from this manager.
   */
  getSettings(): Settings {
    return this.settings;
  }

  onChange<K extends SettingKey>(key: K, callback: (value: HexEditorSettings[K]) => void): () => void {
    return this.settings.onChange(key, callback);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Keybindings Access
  // ─────────────────────────────────────────────────────────────────────────

  getKeybindings(): KeyBinding[] {
    return [...this.keybindings];
  }

  getKeybindingForCommand(command: HexCommand): KeyBinding | undefined {
    return this.keybindings.find((b) => b.command === command);
  }

  /**
   * Build a keymap from the loaded bindings.
   */
  createKeymap(): Keymap {
    return new Keymap(this.keybindings);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Saving
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write the settings that differ from the defaults to the user file.
   */
  async saveSettings(): Promise<void> {
    const current = this.settings.getAll();
    const changed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(current)) {
      if (Reflect.get(defaultSettings, key) !== value) changed[key] = value;
    }

    await mkdir(this.paths.userDir, { recursive: true });
    await writeFile(this.paths.userSettings, JSON.stringify(changed, null, 2), 'utf8');
    debugLog('[HexConfigManager] Settings saved');
  }

  async saveKeybindings(): Promise<void> {
    await mkdir(this.paths.userDir, { recursive: true });
    await writeFile(this.paths.userKeybindings, JSON.stringify(this.keybindings, null, 2), 'utf8');
    debugLog('[HexConfigManager] Keybindings saved');
  }

  /**
   * Save workspace settings, creating the workspace config directory if needed.
   */
  async saveWorkspaceSettings(settings: Partial<HexEditorSettings>): Promise<void> {
    if (!this.paths.workspaceDir || !this.paths.workspaceSettings) {
      debugLog('[HexConfigManager] No workspace directory configured');
      return;
    }

    await mkdir(this.paths.workspaceDir, { recursive: true });
    await writeFile(this.paths.workspaceSettings, JSON.stringify(settings, null, 2), 'utf8');
    debugLog('[HexConfigManager] Workspace settings saved');
  }

  getPaths(): ConfigPaths {
    return { ...this.paths };
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a new config manager.
 */
export function createHexConfigManager(options?: HexConfigManagerOptions): HexConfigManager {
  return new HexConfigManager(options);
}
