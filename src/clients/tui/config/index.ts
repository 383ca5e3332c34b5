/**
 * TUI Configuration
 *
 * Settings and keybinding files for the terminal client.
 */

export {
  HexConfigManager,
  createHexConfigManager,
  stripJsonComments,
  CONFIG_DIR_NAME,
  type ConfigPaths,
  type HexConfigManagerOptions,
} from './config-manager.ts';
