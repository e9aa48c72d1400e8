import { homedir } from 'node:os';
import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';

/**
 * Get the config directory (for registry.json and credentials.json)
 * Uses RULEBOOK_CONFIG_DIR if set, otherwise XDG_CONFIG_HOME/rulebook, otherwise ~/.config/rulebook
 */
export function getConfigDir(): string {
  if (process.env.RULEBOOK_CONFIG_DIR) {
    return process.env.RULEBOOK_CONFIG_DIR;
  }

  const xdgConfig = process.env.XDG_CONFIG_HOME;
  return xdgConfig ? join(xdgConfig, 'rulebook') : join(homedir(), '.config', 'rulebook');
}

/**
 * Get the directory new clones default into
 * Uses RULEBOOK_DATA_DIR if set, otherwise XDG_DATA_HOME/rulebook, otherwise ~/.local/share/rulebook
 */
export function getDefaultStorageDir(): string {
  if (process.env.RULEBOOK_DATA_DIR) {
    return process.env.RULEBOOK_DATA_DIR;
  }

  const xdgData = process.env.XDG_DATA_HOME;
  return xdgData ? join(xdgData, 'rulebook') : join(homedir(), '.local', 'share', 'rulebook');
}

/**
 * Get the path to registry.json
 */
export function getRegistryPath(): string {
  return join(getConfigDir(), 'registry.json');
}

/**
 * Get the path to credentials.json (mode 0600)
 */
export function getCredentialsPath(): string {
  return join(getConfigDir(), 'credentials.json');
}

/**
 * Get the log file named by RULEBOOK_LOG_FILE, if any
 */
export function getLogFilePath(): string | undefined {
  const path = process.env.RULEBOOK_LOG_FILE;
  return path && path.length > 0 ? path : undefined;
}

/**
 * Ensure the config directory exists
 */
export async function ensureConfigDir(): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
}

/**
 * Ensure the default clone directory exists
 */
export async function ensureStorageDir(): Promise<void> {
  await mkdir(getDefaultStorageDir(), { recursive: true });
}

export const DEFAULTS = {
  remoteName: 'origin',
  maxNameLength: 100,
  tokenValidationTimeoutMs: 10_000,
};
