/**
 * Schedule parser entry point
 *
 * Pure and synchronous: text in, ordered events out.
 */

import type { ExtractionResult, NormalizedLine } from '../types/events.js';
import { createScanner, finish, step } from './assembler.js';
import { segmentDays } from './dates.js';
import { normalizeLines } from './normalize.js';
import { defaultRules, type ParseRules } from './rules.js';

/**
 * Apply skip patterns and the optional schedule-section gate
 */
export function selectScheduleLines(
  lines: Iterable<NormalizedLine>,
  rules: ParseRules
): { lines: NormalizedLine[]; total: number; skipped: number } {
  const selected: NormalizedLine[] = [];
  let total = 0;
  let inSection = rules.sectionStart.length === 0;

  for (const line of lines) {
    total += 1;
    if (rules.skipPatterns.some(p => p.test(line.text))) continue;

    if (!inSection) {
      const lower = line.text.toLowerCase();
      inSection = rules.sectionStart.some(keyword => lower.includes(keyword));
      if (!inSection) continue;
    }
    selected.push(line);
  }

  return { lines: selected, total, skipped: total - selected.length };
}

export function parseSchedule(text: string, rules: ParseRules = defaultRules()): ExtractionResult {
  const normalized = normalizeLines(text);
  const { lines, total, skipped } = selectScheduleLines(normalized, rules);

  let scanner = createScanner();
  for (const line of lines) {
    scanner = step(scanner, line, rules);
  }
  const events = finish(scanner, rules);

  return {
    events,
    days: segmentDays(lines, rules),
    empty: events.length === 0,
    stats: {
      lines: total,
      skippedLines: skipped,
      dateHeaders: scanner.dateHeaders,
      timeSlots: scanner.timeSlots,
    },
    normalizedText: Array.from(normalized, line => line.text).join('\n'),
  };
}

export { normalizeLines, normalizeText, cleanLine } from './normalize.js';
export { matchDateHeader, canonicalDateLabel, segmentDays, headerKey } from './dates.js';
export { matchTimeSlot, isTimeSlotLine, splitTimeSlots } from './times.js';
export type { ClockTime, Meridiem, TimeSlotMatch } from './times.js';
export {
  extractFields,
  applyRules,
  cleanField,
  annotateBreak,
  titleRules,
  SPEAKER_RULES,
  LOCATION_RULES,
} from './fields.js';
export type { FieldRule, FieldMatch, ExtractedFields } from './fields.js';
export { createScanner, step, finish, finalizeEvent } from './assembler.js';
export type { Scanner, ScanState, OpenEvent } from './assembler.js';
export * from './rules.js';
