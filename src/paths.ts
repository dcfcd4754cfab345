/**
 * XDG Base Directory compliant paths for convoy.
 *
 * - Config: ~/.config/convoy/ (or $XDG_CONFIG_HOME/convoy/)
 *   User-specific configuration files
 *
 * - Data: ~/.local/share/convoy/ (or $XDG_DATA_HOME/convoy/)
 *   Session files and the session index
 *
 * - State: ~/.local/state/convoy/ (or $XDG_STATE_HOME/convoy/)
 *   Logs
 *
 * - Project: .convoy/
 *   Project-specific files in the current working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'convoy';

/**
 * Get the configuration directory path.
 * Uses $XDG_CONFIG_HOME if set, otherwise defaults to ~/.config/convoy/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

/**
 * Get the data directory path.
 * Uses $XDG_DATA_HOME if set, otherwise defaults to ~/.local/share/convoy/
 */
export function getDataDir(): string {
  const xdg = process.env.XDG_DATA_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'share', APP_DIR);
}

/**
 * Get the state directory path.
 * Uses $XDG_STATE_HOME if set, otherwise defaults to ~/.local/state/convoy/
 */
export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

/**
 * Get the project-specific directory path.
 * This is always .convoy/ within the specified working directory.
 *
 * @param cwd - The working directory (defaults to process.cwd())
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, '.convoy');
}

// ============================================================================
// Specific file paths
// ============================================================================

/**
 * Get the path to the main configuration file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Get the default sessions directory.
 */
export function getSessionsDir(): string {
  return join(getDataDir(), 'sessions');
}

/**
 * Get the default log file path.
 */
export function getLogPath(): string {
  return join(getStateDir(), 'convoy.log');
}
