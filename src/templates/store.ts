/**
 * Templates store - built-in templates plus user templates kept as
 * <configDir>/templates/<name>.yaml
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { TemplateError } from '../errors.js';
import type { ParseRules } from '../parser/rules.js';
import { readOptionalTextFile, writeTextFileAtomic } from '../utils/fs.js';
import { BUILTIN_TEMPLATES } from './builtin.js';
import { compileTemplate, type CompileOptions } from './compile.js';
import { calculateTemplateDigest } from './digest.js';
import type { Template, TemplateDefinition } from './schema.js';
import { isValidTemplateName, validateTemplateDefinition } from './schema.js';

export type TemplateParseResult =
  | { success: true; template: Template }
  | { success: false; error: string };

/**
 * Parse and validate template YAML
 */
export function parseTemplateYaml(
  name: string,
  yamlContent: string,
  source: Template['source']
): TemplateParseResult {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlContent);
  } catch (err) {
    return { success: false, error: `Invalid YAML: ${err instanceof Error ? err.message : String(err)}` };
  }

  const validation = validateTemplateDefinition(parsed);
  if (!validation.valid) {
    return { success: false, error: `Invalid template: ${validation.errors.join('; ')}` };
  }

  const definition = parsed as TemplateDefinition;
  return {
    success: true,
    template: {
      name,
      description: definition.description ?? null,
      source,
      content_yaml: yamlContent,
      digest_sha256: calculateTemplateDigest(definition),
      definition,
    },
  };
}

function builtinTemplates(): Template[] {
  const templates: Template[] = [];
  for (const builtin of BUILTIN_TEMPLATES) {
    const result = parseTemplateYaml(builtin.name, builtin.yaml, 'builtin');
    if (!result.success) {
      throw new TemplateError(`Built-in template '${builtin.name}' is invalid: ${result.error}`);
    }
    templates.push(result.template);
  }
  return templates;
}

export class TemplatesStore {
  private templatesDir: string;

  constructor(configDir: string) {
    this.templatesDir = join(configDir, 'templates');
  }

  getTemplatesDir(): string {
    return this.templatesDir;
  }

  private templatePath(name: string): string {
    return join(this.templatesDir, `${name}.yaml`);
  }

  private isBuiltin(name: string): boolean {
    return BUILTIN_TEMPLATES.some(t => t.name === name);
  }

  /**
   * List built-in templates followed by user templates (sorted by name)
   */
  async listTemplates(): Promise<Template[]> {
    const templates = builtinTemplates();

    let entries: string[];
    try {
      entries = await fs.readdir(this.templatesDir);
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return templates;
      }
      throw error;
    }

    const names = entries
      .filter(entry => entry.endsWith('.yaml'))
      .map(entry => entry.slice(0, -'.yaml'.length))
      .filter(name => isValidTemplateName(name) && !this.isBuiltin(name))
      .sort();

    for (const name of names) {
      const template = await this.getTemplate(name);
      if (template) templates.push(template);
    }
    return templates;
  }

  /**
   * Get template by name. Throws TemplateError when a user template
   * exists but does not validate.
   */
  async getTemplate(name: string): Promise<Template | null> {
    if (this.isBuiltin(name)) {
      return builtinTemplates().find(t => t.name === name) ?? null;
    }
    if (!isValidTemplateName(name)) {
      return null;
    }

    const content = await readOptionalTextFile(this.templatePath(name));
    if (content === null) {
      return null;
    }

    const result = parseTemplateYaml(name, content, 'user');
    if (!result.success) {
      throw new TemplateError(`Template '${name}': ${result.error}`);
    }
    return result.template;
  }

  /**
   * Add a user template from YAML content
   */
  async addTemplate(
    name: string,
    yamlContent: string,
    options: { force?: boolean } = {}
  ): Promise<TemplateParseResult> {
    if (!isValidTemplateName(name)) {
      return { success: false, error: 'Invalid template name: must match [a-z0-9_-]+' };
    }
    if (this.isBuiltin(name)) {
      return { success: false, error: `'${name}' is a built-in template` };
    }

    const existing = await readOptionalTextFile(this.templatePath(name));
    if (existing !== null && !options.force) {
      return { success: false, error: `Template '${name}' already exists` };
    }

    const result = parseTemplateYaml(name, yamlContent, 'user');
    if (!result.success) {
      return result;
    }

    await writeTextFileAtomic(this.templatePath(name), yamlContent);
    return result;
  }

  /**
   * Delete a user template
   */
  async removeTemplate(name: string): Promise<{ success: boolean; error?: string }> {
    if (this.isBuiltin(name)) {
      return { success: false, error: `'${name}' is a built-in template and cannot be removed` };
    }
    if (!isValidTemplateName(name)) {
      return { success: false, error: `Template '${name}' not found` };
    }

    try {
      await fs.unlink(this.templatePath(name));
      return { success: true };
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { success: false, error: `Template '${name}' not found` };
      }
      throw error;
    }
  }

  /**
   * Load a template and compile it to parser rules
   */
  async resolveRules(name: string, options: CompileOptions = {}): Promise<ParseRules> {
    const template = await this.getTemplate(name);
    if (!template) {
      throw new TemplateError(`Template not found: ${name}`);
    }
    return compileTemplate(template.definition, options);
  }
}
