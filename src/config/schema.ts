/**
 * Config schema validation
 */

import { OUTPUT_FORMATS, type Config } from '../types/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function validateOutput(value: unknown, path: string): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    errors.push({ path, message: 'output must be an object' });
    return errors;
  }

  const out = value as Record<string, unknown>;

  if (out.format !== undefined && !OUTPUT_FORMATS.some(format => format === out.format)) {
    errors.push({ path: `${path}.format`, message: `format must be one of: ${OUTPUT_FORMATS.join(', ')}` });
  }

  if (out.dump_text !== undefined && typeof out.dump_text !== 'boolean') {
    errors.push({ path: `${path}.dump_text`, message: 'dump_text must be a boolean' });
  }

  return errors;
}

export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!config || typeof config !== 'object') {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const cfg = config as Record<string, unknown>;

  if (cfg.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  if (typeof cfg.default_template !== 'string' || !cfg.default_template.trim()) {
    errors.push({ path: 'default_template', message: 'default_template must be a non-empty string' });
  } else if (!/^[a-z0-9_-]+$/.test(cfg.default_template)) {
    errors.push({ path: 'default_template', message: 'default_template must match [a-z0-9_-]+' });
  }

  if (cfg.fallback_date !== undefined && (typeof cfg.fallback_date !== 'string' || !cfg.fallback_date.trim())) {
    errors.push({ path: 'fallback_date', message: 'fallback_date must be a non-empty string' });
  }

  if (cfg.output !== undefined) {
    errors.push(...validateOutput(cfg.output, 'output'));
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  const result = validateConfig(parsed);
  if (!result.valid) {
    return { config: null, errors: result.errors };
  }

  return { config: parsed as Config, errors: [] };
}
