/**
 * Debug Logging
 *
 * Opt-in file logger shared by every module. Messages are appended to
 * debug.log in the working directory when debugging is enabled.
 */

import { appendFileSync, writeFileSync } from 'fs';

let debugEnabled = false;
let debugLogPath = './debug.log';
let writeFailed = false;

/**
 * Enable or disable debug logging.
 */
export function setDebugEnabled(enabled: boolean, options: { truncate?: boolean } = {}): void {
  debugEnabled = enabled;
  writeFailed = false;

  if (enabled && options.truncate) {
    try {
      writeFileSync(debugLogPath, '');
    } catch {
      writeFailed = true;
    }
  }
}

/**
 * Check whether debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Redirect the log to another file.
 */
export function setDebugLogPath(path: string): void {
  debugLogPath = path;
  writeFailed = false;
}

/**
 * Append a message to the debug log.
 * Callers prefix messages with a bracketed component tag, e.g. `[HexEngine] ...`.
 */
export function debugLog(msg: string): void {
  if (!debugEnabled || writeFailed) return;

  const message = `[${new Date().toISOString()}] ${msg}\n`;
  try {
    appendFileSync(debugLogPath, message);
  } catch {
    // Stop retrying once the log file is unwritable
    writeFailed = true;
  }
}
