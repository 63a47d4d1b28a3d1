/**
 * Turn a template definition into parser rules
 */

import {
  compilePatterns,
  defaultRules,
  keywordPattern,
  phrasePattern,
  type ParseRules,
} from '../parser/rules.js';
import type { TemplateDefinition } from './schema.js';

export interface CompileOptions {
  /** Overrides the template's fallback_date */
  fallbackDate?: string;
}

export function compileTemplate(def: TemplateDefinition, options: CompileOptions = {}): ParseRules {
  const base = defaultRules();
  const fallback = options.fallbackDate?.trim() || def.fallback_date?.trim();

  return {
    fallbackDate: fallback || base.fallbackDate,
    dateHeaders: def.date_headers ? compilePatterns(def.date_headers) : base.dateHeaders,
    dateLabels: (def.date_labels ?? []).map(entry => ({
      pattern: phrasePattern(entry.match),
      label: entry.label.trim(),
    })),
    breakKeywords: def.break_keywords ? keywordPattern(def.break_keywords) : base.breakKeywords,
    skipPatterns: def.skip_patterns ? compilePatterns(def.skip_patterns) : base.skipPatterns,
    sectionStart: (def.section_start ?? []).map(k => k.trim().toLowerCase()).filter(k => k.length > 0),
    titleMaxWords: def.title?.max_words ?? base.titleMaxWords,
    titleTruncateAt: def.title?.truncate_at ?? base.titleTruncateAt,
    limits: {
      title: def.limits?.title ?? base.limits.title,
      speaker: def.limits?.speaker ?? base.limits.speaker,
      location: def.limits?.location ?? base.limits.location,
      rawText: def.limits?.raw_text ?? base.limits.rawText,
    },
  };
}
