/**
 * Template digest calculation
 * Stable hash of the rule content, used to tell template revisions apart
 */

import { createHash } from 'crypto';
import type { TemplateDefinition } from './schema.js';

/**
 * Canonical JSON of the fields that affect parsing.
 * Name and description are excluded; keys are emitted in a fixed order.
 */
export function normalizeTemplateForDigest(def: TemplateDefinition): string {
  const normalized = {
    version: def.version,
    fallback_date: def.fallback_date ?? null,
    date_headers: def.date_headers ?? null,
    date_labels: def.date_labels?.map(e => ({ match: e.match, label: e.label })) ?? null,
    break_keywords: def.break_keywords ?? null,
    skip_patterns: def.skip_patterns ?? null,
    section_start: def.section_start ?? null,
    title: def.title
      ? { max_words: def.title.max_words ?? null, truncate_at: def.title.truncate_at ?? null }
      : null,
    limits: def.limits
      ? {
          title: def.limits.title ?? null,
          speaker: def.limits.speaker ?? null,
          location: def.limits.location ?? null,
          raw_text: def.limits.raw_text ?? null,
        }
      : null,
  };

  return JSON.stringify(normalized);
}

/**
 * Calculate SHA-256 digest of normalized template content
 * Returns full 64-char hex string
 */
export function calculateTemplateDigest(def: TemplateDefinition): string {
  return createHash('sha256').update(normalizeTemplateForDigest(def)).digest('hex');
}
