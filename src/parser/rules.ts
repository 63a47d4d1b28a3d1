/**
 * Compiled rule set for one document template
 *
 * Templates (YAML) describe rules as strings; compileTemplate() turns them
 * into this shape. The parser only ever sees ParseRules.
 */

import { SENTINEL } from '../types/events.js';

export interface FieldLimits {
  title: number;
  speaker: number;
  location: number;
  rawText: number;
}

export interface DateLabelRule {
  pattern: RegExp;
  label: string;
}

export interface ParseRules {
  /** Label for events that precede (or lack) any date header */
  fallbackDate: string;
  dateHeaders: RegExp[];
  /** Ordered header → canonical label table; first hit wins */
  dateLabels: DateLabelRule[];
  /** Title words that mark a break/meal slot; null disables annotation */
  breakKeywords: RegExp | null;
  skipPatterns: RegExp[];
  /** Lower-cased keywords opening the schedule section; empty = whole document */
  sectionStart: string[];
  titleMaxWords: number;
  titleTruncateAt: number;
  limits: FieldLimits;
}

const MONTH =
  '(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';

/**
 * Header patterns used when a template declares none
 */
export const DEFAULT_DATE_HEADER_PATTERNS: readonly string[] = [
  // May 10 (Day 1)
  String.raw`\b${MONTH}\.?\s+\d{1,2}\s*\(\s*Day\s+\d{1,2}\s*\)`,
  // DAY 2
  String.raw`\bDAY\s+\d{1,2}\b`,
  // May 10th, 2025
  String.raw`\b${MONTH}\.?\s+\d{1,2}(?:st|nd|rd|th)?\s*,\s*\d{4}\b`,
];

export const DEFAULT_BREAK_KEYWORDS: readonly string[] = [
  'break',
  'lunch',
  'dinner',
  'tea',
  'coffee',
  'registration',
];

/** Page separators inserted when per-page OCR output is concatenated */
export const DEFAULT_SKIP_PATTERNS: readonly string[] = [
  String.raw`^-+\s*Page\s+\d+\s*-+$`,
];

export const DEFAULT_LIMITS: FieldLimits = {
  title: 200,
  speaker: 100,
  location: 100,
  rawText: 500,
};

export const DEFAULT_TITLE_MAX_WORDS = 10;
export const DEFAULT_TITLE_TRUNCATE_AT = 50;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a phrase to a case-insensitive whole-word matcher.
 * Internal whitespace matches any whitespace run.
 */
export function phrasePattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
}

export function keywordPattern(keywords: readonly string[]): RegExp | null {
  const words = keywords.map(k => k.trim()).filter(k => k.length > 0);
  if (words.length === 0) return null;
  return new RegExp(`\\b(?:${words.map(escapeRegExp).join('|')})\\b`, 'i');
}

export function compilePatterns(sources: readonly string[]): RegExp[] {
  return sources.map(source => new RegExp(source, 'i'));
}

/**
 * Rules with every default applied
 */
export function defaultRules(overrides: Partial<ParseRules> = {}): ParseRules {
  return {
    fallbackDate: SENTINEL,
    dateHeaders: compilePatterns(DEFAULT_DATE_HEADER_PATTERNS),
    dateLabels: [],
    breakKeywords: keywordPattern(DEFAULT_BREAK_KEYWORDS),
    skipPatterns: compilePatterns(DEFAULT_SKIP_PATTERNS),
    sectionStart: [],
    titleMaxWords: DEFAULT_TITLE_MAX_WORDS,
    titleTruncateAt: DEFAULT_TITLE_TRUNCATE_AT,
    limits: { ...DEFAULT_LIMITS },
    ...overrides,
  };
}
