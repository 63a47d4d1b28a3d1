/**
 * Date header detection and canonical labels
 */

import type { DaySection, NormalizedLine } from '../types/events.js';
import type { ParseRules } from './rules.js';

export interface DateHeaderMatch {
  /** Header text as matched */
  header: string;
  /** Canonical label after the label table */
  label: string;
  /** Offset of the header within the line */
  index: number;
  /** Offset just past the header */
  end: number;
}

/**
 * Key used against the label table: lower-case, single spaces,
 * ordinal suffixes dropped ("May 10th" → "may 10").
 */
export function headerKey(header: string): string {
  return header
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/(\d)(?:st|nd|rd|th)\b/g, '$1')
    .trim();
}

/**
 * Map a matched header to its display label. Headers the table does not
 * know keep their literal text.
 */
export function canonicalDateLabel(header: string, rules: ParseRules): string {
  const key = headerKey(header);
  for (const entry of rules.dateLabels) {
    if (entry.pattern.test(key)) {
      return entry.label;
    }
  }
  return header.trim();
}

/**
 * Find a date header in a line. Patterns are tried in template order.
 */
export function matchDateHeader(line: string, rules: ParseRules): DateHeaderMatch | null {
  for (const pattern of rules.dateHeaders) {
    const match = pattern.exec(line);
    if (!match || match[0].trim().length === 0) continue;

    const header = match[0].trim();
    return {
      header,
      label: canonicalDateLabel(header, rules),
      index: match.index,
      end: match.index + match[0].length,
    };
  }
  return null;
}

/**
 * Split a document into the spans each date header governs
 */
export function segmentDays(lines: Iterable<NormalizedLine>, rules: ParseRules): DaySection[] {
  const sections: DaySection[] = [];
  let lastLine = 0;

  for (const line of lines) {
    lastLine = line.lineNumber;
    const match = matchDateHeader(line.text, rules);
    if (!match) continue;

    const previous = sections[sections.length - 1];
    if (previous) {
      previous.endLine = line.lineNumber;
    }
    sections.push({
      label: match.label,
      header: match.header,
      startLine: line.lineNumber,
      endLine: line.lineNumber + 1,
    });
  }

  const last = sections[sections.length - 1];
  if (last) {
    last.endLine = lastLine + 1;
  }
  return sections;
}
