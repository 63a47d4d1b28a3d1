/**
 * Config manager - handles reading, writing, and validating config
 */

import { dirname } from 'path';
import { DEFAULT_CONFIG, type Config } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { isRegularFile, readOptionalTextFile, writeTextFileAtomic } from '../utils/fs.js';
import { parseConfig, validateConfig, type ValidationResult } from './schema.js';

function cloneDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG, output: { ...DEFAULT_CONFIG.output } };
}

export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;

  constructor(configPath?: string) {
    this.configPath = resolveConfigPath({ configPath });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return dirname(this.configPath);
  }

  async exists(): Promise<boolean> {
    return isRegularFile(this.configPath);
  }

  async load(): Promise<Config> {
    if (this.config) {
      return this.config;
    }

    const content = await readOptionalTextFile(this.configPath);
    if (content === null) {
      throw new Error(`Config file not found: ${this.configPath}`);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new Error(`Invalid config: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    this.config = config;
    return config;
  }

  /**
   * Load the config, or the defaults when no config file exists yet.
   * An existing but invalid file still throws.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return cloneDefaultConfig();
    }
    return this.load();
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new Error(`Invalid config: ${result.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    await writeTextFileAtomic(this.configPath, JSON.stringify(config, null, 2) + '\n');
    this.config = config;
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save(cloneDefaultConfig());
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readOptionalTextFile(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }
}
