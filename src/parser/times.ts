/**
 * Time-range tokens: "8:00 am - 9:00 am", "10:30 - 11:15 a.m.", ...
 */

import type { NormalizedLine, TimeSlot } from '../types/events.js';

export type Meridiem = 'am' | 'pm';

export interface ClockTime {
  hour: number;
  minute: number;
  meridiem?: Meridiem;
}

export interface TimeSlotMatch {
  /** Verbatim range as it appears in the line */
  time: string;
  startTime: ClockTime;
  endTime: ClockTime;
  index: number;
  endIndex: number;
  /** Line text outside the token, separators trimmed */
  remainder: string;
}

const MERIDIEM = String.raw`(?:[ap]\.m\.|[ap]m(?![a-z]))`;

const TIME_RANGE = new RegExp(
  String.raw`(?<!\d)(\d{1,2}):(\d{2})(?:\s*(${MERIDIEM}))?\s*-\s*(\d{1,2}):(\d{2})(?:\s*(${MERIDIEM}))?(?!\d)`,
  'gi'
);

function toMeridiem(raw: string | undefined): Meridiem | undefined {
  if (!raw) return undefined;
  return raw.toLowerCase().startsWith('p') ? 'pm' : 'am';
}

/**
 * Build a clock time, or null when hour/minute fall outside 1-12 / 00-59
 */
function toClockTime(hourRaw: string, minuteRaw: string, meridiemRaw?: string): ClockTime | null {
  const hour = Number(hourRaw);
  const minute = Number(minuteRaw);
  if (!Number.isInteger(hour) || hour < 1 || hour > 12) return null;
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) return null;

  const meridiem = toMeridiem(meridiemRaw);
  return meridiem ? { hour, minute, meridiem } : { hour, minute };
}

function trimSeparators(text: string): string {
  return text.replace(/^[\s\-:;,|]+|[\s\-:;,|]+$/g, '');
}

/**
 * Find the first valid time range in a line. Candidates that fail
 * validation are skipped and read as ordinary text.
 */
export function matchTimeSlot(line: string): TimeSlotMatch | null {
  for (const match of line.matchAll(TIME_RANGE)) {
    const startTime = toClockTime(match[1], match[2], match[3]);
    const endTime = toClockTime(match[4], match[5], match[6]);
    if (!startTime || !endTime) continue;

    const index = match.index ?? 0;
    const endOffset = index + match[0].length;
    const remainder = [line.slice(0, index), line.slice(endOffset)]
      .map(trimSeparators)
      .filter(part => part.length > 0)
      .join(' ');

    return {
      time: match[0].trim(),
      startTime,
      endTime,
      index,
      endIndex: endOffset,
      remainder,
    };
  }
  return null;
}

export function isTimeSlotLine(line: string): boolean {
  return matchTimeSlot(line) !== null;
}

/**
 * Group lines into time slots in document order. Lines before the first
 * slot belong to no slot and are dropped.
 */
export function splitTimeSlots(lines: Iterable<NormalizedLine>): TimeSlot[] {
  const slots: TimeSlot[] = [];
  let open: TimeSlot | null = null;

  for (const line of lines) {
    const match = matchTimeSlot(line.text);
    if (match) {
      open = {
        time: match.time,
        lineNumber: line.lineNumber,
        body: match.remainder ? [match.remainder] : [],
      };
      slots.push(open);
      continue;
    }
    open?.body.push(line.text);
  }

  return slots;
}
