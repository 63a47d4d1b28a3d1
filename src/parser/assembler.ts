/**
 * Event assembler
 *
 * Two-state machine over normalized lines:
 *
 *   SCANNING + date header  → SCANNING  (update current date)
 *   SCANNING + time slot    → IN_EVENT  (open event)
 *   IN_EVENT + time slot    → IN_EVENT  (finalize, open next)
 *   IN_EVENT + date header  → SCANNING  (finalize, update current date)
 *   IN_EVENT + other line   → IN_EVENT  (append to body)
 *   any      + end of input → finalize open event
 *
 * The scanner record is created per document and passed explicitly;
 * nothing is shared between documents.
 */

import type { NormalizedLine, ScheduleEvent } from '../types/events.js';
import { matchDateHeader } from './dates.js';
import { extractFields } from './fields.js';
import type { ParseRules } from './rules.js';
import { matchTimeSlot, type TimeSlotMatch } from './times.js';

export type ScanState = 'SCANNING' | 'IN_EVENT';

export interface OpenEvent {
  date: string;
  time: string;
  lineNumber: number;
  body: string[];
}

export interface Scanner {
  state: ScanState;
  /** Label of the last date header, null until one is seen */
  currentDate: string | null;
  openEvent: OpenEvent | null;
  events: ScheduleEvent[];
  dateHeaders: number;
  timeSlots: number;
}

export function createScanner(): Scanner {
  return {
    state: 'SCANNING',
    currentDate: null,
    openEvent: null,
    events: [],
    dateHeaders: 0,
    timeSlots: 0,
  };
}

/**
 * Run field extraction over an accumulated event
 */
export function finalizeEvent(open: OpenEvent, rules: ParseRules): ScheduleEvent {
  const fields = extractFields(open.body, open.time, rules);
  return Object.freeze({
    date: open.date,
    time: open.time,
    ...fields,
    raw_text: open.body.join(' ').slice(0, rules.limits.rawText),
    source_line: open.lineNumber,
  });
}

function closeOpenEvent(scanner: Scanner, rules: ParseRules): void {
  if (scanner.openEvent) {
    scanner.events.push(finalizeEvent(scanner.openEvent, rules));
    scanner.openEvent = null;
  }
  scanner.state = 'SCANNING';
}

function openEvent(scanner: Scanner, slot: TimeSlotMatch, lineNumber: number, rules: ParseRules): void {
  closeOpenEvent(scanner, rules);
  scanner.openEvent = {
    date: scanner.currentDate ?? rules.fallbackDate,
    time: slot.time,
    lineNumber,
    body: slot.remainder ? [slot.remainder] : [],
  };
  scanner.timeSlots += 1;
  scanner.state = 'IN_EVENT';
}

/**
 * Feed one line. A line carrying a date header is handled as a header
 * first; a time range elsewhere on that line then opens an event.
 */
export function step(scanner: Scanner, line: NormalizedLine, rules: ParseRules): Scanner {
  const header = matchDateHeader(line.text, rules);
  if (header) {
    closeOpenEvent(scanner, rules);
    scanner.currentDate = header.label;
    scanner.dateHeaders += 1;

    const rest = `${line.text.slice(0, header.index)} ${line.text.slice(header.end)}`.trim();
    const slot = rest ? matchTimeSlot(rest) : null;
    if (slot) {
      openEvent(scanner, slot, line.lineNumber, rules);
    }
    return scanner;
  }

  const slot = matchTimeSlot(line.text);
  if (slot) {
    openEvent(scanner, slot, line.lineNumber, rules);
    return scanner;
  }

  if (scanner.state === 'IN_EVENT' && scanner.openEvent) {
    scanner.openEvent.body.push(line.text);
  }
  return scanner;
}

/**
 * End of input: finalize whatever is still open
 */
export function finish(scanner: Scanner, rules: ParseRules): ScheduleEvent[] {
  closeOpenEvent(scanner, rules);
  return scanner.events;
}
