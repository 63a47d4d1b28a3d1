/**
 * Tests for TemplatesStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir, readFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { TemplatesStore, parseTemplateYaml } from './store.js';
import { TemplateError } from '../errors.js';

const EXPO_YAML = `version: 1
description: Trade expo
fallback_date: Expo Day
break_keywords: [lunch]
`;

describe('parseTemplateYaml', () => {
  it('should parse and digest valid YAML', () => {
    const result = parseTemplateYaml('expo', EXPO_YAML, 'user');
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.template.name).toBe('expo');
    expect(result.template.description).toBe('Trade expo');
    expect(result.template.source).toBe('user');
    expect(result.template.content_yaml).toBe(EXPO_YAML);
    expect(result.template.digest_sha256).toMatch(/^[0-9a-f]{64}$/);
    expect(result.template.definition.fallback_date).toBe('Expo Day');
  });

  it('should report YAML syntax errors', () => {
    const result = parseTemplateYaml('bad', 'version: [1', 'user');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toMatch(/^Invalid YAML: /);
  });

  it('should report validation errors', () => {
    expect(parseTemplateYaml('bad', 'version: 2\n', 'user')).toEqual({
      success: false,
      error: 'Invalid template: Invalid version: expected 1, got 2',
    });
  });
});

describe('TemplatesStore', () => {
  let configDir: string;
  let store: TemplatesStore;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), 'schedex-test-'));
    store = new TemplatesStore(configDir);
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  it('should list built-in templates when no user templates exist', async () => {
    const templates = await store.listTemplates();
    expect(templates.map(t => [t.name, t.source])).toEqual([
      ['generic', 'builtin'],
      ['two-day-conference', 'builtin'],
    ]);
  });

  it('should add, list, get and remove a user template', async () => {
    const added = await store.addTemplate('expo', EXPO_YAML);
    expect(added.success).toBe(true);

    const onDisk = await readFile(join(configDir, 'templates', 'expo.yaml'), 'utf-8');
    expect(onDisk).toBe(EXPO_YAML);

    const names = (await store.listTemplates()).map(t => t.name);
    expect(names).toEqual(['generic', 'two-day-conference', 'expo']);

    const template = await store.getTemplate('expo');
    expect(template?.source).toBe('user');

    expect(await store.removeTemplate('expo')).toEqual({ success: true });
    expect(await store.getTemplate('expo')).toBeNull();
  });

  it('should refuse to overwrite without force', async () => {
    await store.addTemplate('expo', EXPO_YAML);
    expect(await store.addTemplate('expo', EXPO_YAML)).toEqual({
      success: false,
      error: "Template 'expo' already exists",
    });

    const replaced = await store.addTemplate('expo', 'version: 1\nfallback_date: Hall Day\n', { force: true });
    expect(replaced.success).toBe(true);
    expect((await store.getTemplate('expo'))?.definition.fallback_date).toBe('Hall Day');
  });

  it('should protect built-in names', async () => {
    expect(await store.addTemplate('generic', EXPO_YAML)).toEqual({
      success: false,
      error: "'generic' is a built-in template",
    });
    expect(await store.removeTemplate('generic')).toEqual({
      success: false,
      error: "'generic' is a built-in template and cannot be removed",
    });
  });

  it('should reject invalid names and content without writing', async () => {
    expect(await store.addTemplate('Expo', EXPO_YAML)).toEqual({
      success: false,
      error: 'Invalid template name: must match [a-z0-9_-]+',
    });
    const invalid = await store.addTemplate('expo', 'version: 3\n');
    expect(invalid.success).toBe(false);
    expect(await store.getTemplate('expo')).toBeNull();
  });

  it('should report removing a missing template', async () => {
    expect(await store.removeTemplate('nope')).toEqual({
      success: false,
      error: "Template 'nope' not found",
    });
  });

  it('should throw TemplateError for a broken user file', async () => {
    await mkdir(join(configDir, 'templates'), { recursive: true });
    await writeFile(join(configDir, 'templates', 'broken.yaml'), 'version: 9\n');

    await expect(store.getTemplate('broken')).rejects.toBeInstanceOf(TemplateError);
  });

  it('should resolve rules with a fallback override', async () => {
    await store.addTemplate('expo', EXPO_YAML);

    expect((await store.resolveRules('expo')).fallbackDate).toBe('Expo Day');
    expect((await store.resolveRules('expo', { fallbackDate: 'Day 0' })).fallbackDate).toBe('Day 0');
    await expect(store.resolveRules('missing')).rejects.toThrow('Template not found: missing');
  });
});
