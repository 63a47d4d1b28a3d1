/**
 * Field extraction: session title, speaker, location
 *
 * Each field has an ordered rule table. The first rule that yields a value
 * wins; inside a rule, the first body line that matches wins. Location is a
 * single rule whose forms compete per line, so body order decides it.
 * Nothing here throws: an unmatched field resolves to the sentinel.
 */

import { SENTINEL } from '../types/events.js';
import type { ParseRules } from './rules.js';

export interface FieldRule {
  name: string;
  extract(lines: readonly string[]): string | null;
}

export interface FieldMatch {
  value: string;
  rule: string;
}

export interface ExtractedFields {
  session_name: string;
  speaker: string;
  location: string;
}

const ELLIPSIS = '...';
const EDGE_PUNCTUATION = /^[\s\-.,:;!?]+|[\s\-.,:;!?]+$/g;

/**
 * First line in body order where `pattern` matches, mapped through `pick`.
 * An empty pick counts as no match.
 */
function firstLineMatch(
  lines: readonly string[],
  pattern: RegExp,
  pick: (match: RegExpExecArray) => string | undefined
): string | null {
  for (const line of lines) {
    const match = pattern.exec(line);
    if (!match) continue;
    const value = pick(match)?.trim();
    if (value) return value;
  }
  return null;
}

// Session 3: Opening Plenary / SESSION B - Panel / Session 12 Keynote
const SESSION_LABEL =
  /\b(?:Session|SESSION|session)\s+(?:[A-Z]{1,2}\d{0,2}|\d{1,3}[A-Z]?)(?:\s*[:-]\s*|\s+)(\S.*)$/;

// Dr. Jane Smith / Prof John A. Doe / Professor Ada Lovelace
const HONORIFIC_NAME =
  /\b(?:Dr|Prof|Professor)\.?\s+[A-Z][a-z]+(?:\s+[A-Z]\.?(?![A-Za-z]))?(?:\s+[A-Z][a-z]+)*/;

const SPEAKER_LEAD_IN = /\b(?:presented by|speaker\s*:|by\s*:)\s*(.*)$/i;

interface LocationForm {
  pattern: RegExp;
  pick: (match: RegExpExecArray) => string | undefined;
}

// Venue: Hall 2 / At: Atrium, then Room 204 (keyword kept), then at the Ballroom
const LOCATION_FORMS: readonly LocationForm[] = [
  { pattern: /\b(?:venue|location|room|hall|at)\s*:\s*([^,]+)/i, pick: m => m[1] },
  { pattern: /\b(?:room|hall)\s+[^,]+/i, pick: m => m[0] },
  { pattern: /\b(?:venue|location|at)\s+([^,]+)/i, pick: m => m[1] },
];

/**
 * Leftmost location form on the line; on a tie the earlier form wins
 */
function lineLocation(line: string): string | null {
  let best: { index: number; value: string } | null = null;
  for (const form of LOCATION_FORMS) {
    const match = form.pattern.exec(line);
    if (!match) continue;
    const value = form.pick(match)?.trim();
    if (value && (!best || match.index < best.index)) {
      best = { index: match.index, value };
    }
  }
  return best?.value ?? null;
}

/**
 * Title rules depend on template limits, so the table is built per rule set
 */
export function titleRules(rules: ParseRules): FieldRule[] {
  return [
    {
      name: 'session-label',
      extract: lines => firstLineMatch(lines, SESSION_LABEL, m => m[1]),
    },
    {
      name: 'short-line',
      extract: lines => {
        const line = lines.find(l => l.trim().split(/\s+/).length < rules.titleMaxWords);
        return line?.trim() || null;
      },
    },
    {
      name: 'body-prefix',
      extract: lines => {
        const text = lines.join(' ').trim();
        if (!text) return null;
        if (text.length <= rules.titleTruncateAt) return text;
        return text.slice(0, rules.titleTruncateAt).trimEnd() + ELLIPSIS;
      },
    },
  ];
}

export const SPEAKER_RULES: readonly FieldRule[] = [
  {
    name: 'honorific',
    extract: lines => firstLineMatch(lines, HONORIFIC_NAME, m => m[0]),
  },
  {
    name: 'lead-in',
    extract: lines => firstLineMatch(lines, SPEAKER_LEAD_IN, m => m[1]),
  },
];

export const LOCATION_RULES: readonly FieldRule[] = [
  {
    name: 'location',
    extract: lines => {
      for (const line of lines) {
        const value = lineLocation(line);
        if (value) return value;
      }
      return null;
    },
  },
];

/**
 * Evaluate a rule table in priority order
 */
export function applyRules(table: readonly FieldRule[], lines: readonly string[]): FieldMatch | null {
  for (const rule of table) {
    const value = rule.extract(lines);
    if (value) {
      return { value, rule: rule.name };
    }
  }
  return null;
}

/**
 * Strip edge punctuation and dashes, then cap the length.
 * A trailing truncation marker survives and counts toward the cap.
 */
export function cleanField(value: string, maxLength: number): string {
  const truncated = value.endsWith(ELLIPSIS);
  const body = truncated ? value.slice(0, -ELLIPSIS.length) : value;
  const room = truncated ? Math.max(0, maxLength - ELLIPSIS.length) : maxLength;
  const cleaned = body
    .replace(EDGE_PUNCTUATION, '')
    .slice(0, room)
    .replace(EDGE_PUNCTUATION, '');

  if (!cleaned) return '';
  return truncated ? cleaned + ELLIPSIS : cleaned;
}

/**
 * Append the time range to break/meal titles so repeated
 * "Lunch" or "Coffee Break" rows stay distinguishable
 */
export function annotateBreak(title: string, time: string, rules: ParseRules): string {
  if (title === SENTINEL || !rules.breakKeywords) return title;
  return rules.breakKeywords.test(title) ? `${title} (${time})` : title;
}

export function extractFields(
  body: readonly string[],
  time: string,
  rules: ParseRules
): ExtractedFields {
  const resolve = (table: readonly FieldRule[], maxLength: number): string => {
    const match = applyRules(table, body);
    if (!match) return SENTINEL;
    return cleanField(match.value, maxLength) || SENTINEL;
  };

  const title = resolve(titleRules(rules), rules.limits.title);

  return {
    session_name: annotateBreak(title, time, rules),
    speaker: resolve(SPEAKER_RULES, rules.limits.speaker),
    location: resolve(LOCATION_RULES, rules.limits.location),
  };
}
