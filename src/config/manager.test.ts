/**
 * Tests for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { ConfigManager } from './manager.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'schedex-test-'));
    configPath = join(tempDir, 'config.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should report the config directory', () => {
    expect(new ConfigManager(configPath).getConfigDir()).toBe(tempDir);
  });

  it('should fall back to defaults when no file exists', async () => {
    const manager = new ConfigManager(configPath);
    expect(await manager.exists()).toBe(false);
    expect(await manager.loadOrDefault()).toEqual(DEFAULT_CONFIG);
    await expect(manager.load()).rejects.toThrow(`Config file not found: ${configPath}`);
  });

  it('should write the default config on init', async () => {
    const manager = new ConfigManager(configPath);
    expect(await manager.init()).toEqual({ created: true, path: configPath });
    expect(JSON.parse(await readFile(configPath, 'utf-8'))).toEqual(DEFAULT_CONFIG);
  });

  it('should not overwrite an existing config without force', async () => {
    await writeFile(configPath, JSON.stringify({ version: 1, default_template: 'expo' }));
    const manager = new ConfigManager(configPath);

    expect(await manager.init()).toEqual({ created: false, path: configPath });
    expect((await manager.load()).default_template).toBe('expo');

    expect(await new ConfigManager(configPath).init(true)).toEqual({ created: true, path: configPath });
    expect((await new ConfigManager(configPath).load()).default_template).toBe('generic');
  });

  it('should throw on an invalid file', async () => {
    await writeFile(configPath, JSON.stringify({ version: 3, default_template: 'generic' }));
    await expect(new ConfigManager(configPath).loadOrDefault()).rejects.toThrow(
      'Invalid config: version: version must be 1'
    );
  });

  it('should refuse to save an invalid config', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.save({ ...DEFAULT_CONFIG, default_template: '' })).rejects.toThrow(
      'Invalid config: default_template: default_template must be a non-empty string'
    );
  });

  it('should validate the file on disk', async () => {
    const manager = new ConfigManager(configPath);
    expect(await manager.validate()).toEqual({
      valid: false,
      errors: [{ path: '', message: 'Config file not found' }],
    });

    await writeFile(configPath, JSON.stringify({ version: 1, default_template: 'generic', output: { format: 'xml' } }));
    expect(await manager.validate()).toEqual({
      valid: false,
      errors: [{ path: 'output.format', message: 'format must be one of: csv, jsonl' }],
    });
  });
});
