/**
 * Config path resolution utility
 * Priority:
 * 1) --config <path> (passed as argument)
 * 2) SCHEDEX_CONFIG environment variable
 * 3) OS standard config location
 */

import { homedir, platform } from 'os';
import { join } from 'path';

export function getDefaultConfigDir(): string {
  const home = homedir();
  const os = platform();

  switch (os) {
    case 'win32':
      // Windows: %APPDATA%\schedex
      return join(process.env.APPDATA || join(home, 'AppData', 'Roaming'), 'schedex');
    case 'darwin':
      // macOS: ~/Library/Application Support/schedex
      return join(home, 'Library', 'Application Support', 'schedex');
    default:
      // Linux and others: ~/.config/schedex
      return join(process.env.XDG_CONFIG_HOME || join(home, '.config'), 'schedex');
  }
}

export function getDefaultConfigPath(): string {
  return join(getDefaultConfigDir(), 'config.json');
}

export interface ConfigPathOptions {
  configPath?: string; // --config argument
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }

  const envPath = process.env.SCHEDEX_CONFIG;
  if (envPath) {
    return envPath;
  }

  return getDefaultConfigPath();
}
