/**
 * Document template schema
 *
 * A template is the rule set for one family of schedule documents:
 * which lines are date headers, how headers map to display labels,
 * which titles count as breaks, and the field length caps.
 */

/**
 * Header → label table entry. `match` is a phrase compared as whole
 * words against the header (case-insensitive, ordinals dropped).
 */
export interface DateLabelEntry {
  match: string;
  label: string;
}

export interface TemplateTitleOptions {
  /** A body line with fewer words than this can serve as the title */
  max_words?: number;
  /** Length of the body prefix used as a last-resort title */
  truncate_at?: number;
}

export interface TemplateLimits {
  title?: number;
  speaker?: number;
  location?: number;
  raw_text?: number;
}

/**
 * Template definition as parsed from YAML
 */
export interface TemplateDefinition {
  /** Schema version (must be 1) */
  version: 1;
  name?: string;
  description?: string;
  /** Date label for events with no preceding header */
  fallback_date?: string;
  /** Header regex sources (case-insensitive); defaults apply when omitted */
  date_headers?: string[];
  date_labels?: DateLabelEntry[];
  break_keywords?: string[];
  /** Regex sources for lines to drop (page markers, running headers) */
  skip_patterns?: string[];
  /** Keywords that open the schedule section; lines before are ignored */
  section_start?: string[];
  title?: TemplateTitleOptions;
  limits?: TemplateLimits;
}

/**
 * A template with its origin
 */
export interface Template {
  name: string;
  description: string | null;
  source: 'builtin' | 'user';
  content_yaml: string;
  digest_sha256: string;
  definition: TemplateDefinition;
}

/**
 * Validate template name format
 */
export function isValidTemplateName(name: string): boolean {
  return /^[a-z0-9_-]+$/.test(name);
}

function checkStringList(value: unknown, field: string, errors: string[]): void {
  if (value === undefined) return;
  if (!Array.isArray(value)) {
    errors.push(`${field} must be an array`);
    return;
  }
  value.forEach((item, i) => {
    if (typeof item !== 'string' || !item.trim()) {
      errors.push(`${field}[${i}]: must be a non-empty string`);
    }
  });
}

function checkPatterns(value: unknown, field: string, errors: string[]): void {
  if (!Array.isArray(value)) return;
  value.forEach((item, i) => {
    if (typeof item !== 'string') return;
    try {
      new RegExp(item, 'i');
    } catch (e) {
      errors.push(`${field}[${i}]: invalid pattern (${e instanceof Error ? e.message : 'syntax error'})`);
    }
  });
}

function checkPositiveInts(value: unknown, field: string, keys: readonly string[], errors: string[]): void {
  if (value === undefined) return;
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    errors.push(`${field} must be an object`);
    return;
  }
  const record = value as Record<string, unknown>;
  for (const key of keys) {
    const v = record[key];
    if (v === undefined) continue;
    if (typeof v !== 'number' || !Number.isInteger(v) || v < 1) {
      errors.push(`${field}.${key} must be a positive integer`);
    }
  }
}

/**
 * Validate template definition
 */
export function validateTemplateDefinition(def: unknown): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!def || typeof def !== 'object' || Array.isArray(def)) {
    return { valid: false, errors: ['Template must be an object'] };
  }

  const tpl = def as Record<string, unknown>;

  if (tpl.version !== 1) {
    errors.push(`Invalid version: expected 1, got ${String(tpl.version)}`);
  }

  if (tpl.name !== undefined && (typeof tpl.name !== 'string' || !isValidTemplateName(tpl.name))) {
    errors.push('name must match [a-z0-9_-]+');
  }

  if (tpl.description !== undefined && typeof tpl.description !== 'string') {
    errors.push('description must be a string');
  }

  if (tpl.fallback_date !== undefined && (typeof tpl.fallback_date !== 'string' || !tpl.fallback_date.trim())) {
    errors.push('fallback_date must be a non-empty string');
  }

  checkStringList(tpl.date_headers, 'date_headers', errors);
  checkPatterns(tpl.date_headers, 'date_headers', errors);
  checkStringList(tpl.skip_patterns, 'skip_patterns', errors);
  checkPatterns(tpl.skip_patterns, 'skip_patterns', errors);
  checkStringList(tpl.break_keywords, 'break_keywords', errors);
  checkStringList(tpl.section_start, 'section_start', errors);

  if (tpl.date_labels !== undefined) {
    if (!Array.isArray(tpl.date_labels)) {
      errors.push('date_labels must be an array');
    } else {
      tpl.date_labels.forEach((entry: unknown, i: number) => {
        if (!entry || typeof entry !== 'object') {
          errors.push(`date_labels[${i}]: must be an object`);
          return;
        }
        const e = entry as Record<string, unknown>;
        if (typeof e.match !== 'string' || !e.match.trim()) {
          errors.push(`date_labels[${i}].match must be a non-empty string`);
        }
        if (typeof e.label !== 'string' || !e.label.trim()) {
          errors.push(`date_labels[${i}].label must be a non-empty string`);
        }
      });
    }
  }

  checkPositiveInts(tpl.title, 'title', ['max_words', 'truncate_at'], errors);
  checkPositiveInts(tpl.limits, 'limits', ['title', 'speaker', 'location', 'raw_text'], errors);

  return { valid: errors.length === 0, errors };
}
