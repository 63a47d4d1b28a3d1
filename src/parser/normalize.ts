/**
 * Text normalization
 *
 * Turns a raw OCR/text-layer buffer into clean, non-empty lines.
 */

import type { NormalizedLine } from '../types/events.js';

// en dash, em dash, figure dash, horizontal bar, minus sign
const DASH_VARIANTS = /[\u2012\u2013\u2014\u2015\u2212]/g;
const DISALLOWED = /[^\p{L}\p{N}\s\-.,:;!?()&]/gu;

/**
 * Clean a single line. Returns '' when nothing survives.
 */
export function cleanLine(line: string): string {
  return line
    .replace(DASH_VARIANTS, '-')
    .replace(DISALLOWED, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lazily yield cleaned lines. Each iteration restarts from the top of the
 * buffer, so the result can be consumed more than once.
 */
export function normalizeLines(text: string): Iterable<NormalizedLine> {
  return {
    *[Symbol.iterator]() {
      let start = 0;
      let lineNumber = 0;
      while (start <= text.length) {
        let end = text.indexOf('\n', start);
        if (end === -1) end = text.length;
        lineNumber += 1;

        const cleaned = cleanLine(text.slice(start, end));
        if (cleaned.length > 0) {
          yield { text: cleaned, lineNumber };
        }
        start = end + 1;
      }
    },
  };
}

/**
 * Cleaned buffer, one line per surviving input line
 */
export function normalizeText(text: string): string {
  return Array.from(normalizeLines(text), line => line.text).join('\n');
}
