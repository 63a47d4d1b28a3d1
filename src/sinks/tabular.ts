/**
 * Tabular sinks - CSV and JSONL serialization of schedule events
 */

import { EVENT_COLUMNS, type ScheduleEvent } from '../types/events.js';
import type { OutputFormat } from '../types/config.js';
import { writeTextFileAtomic } from '../utils/fs.js';

/**
 * Quote a CSV field when it contains a comma, quote, CR or LF.
 * Embedded quotes are doubled.
 */
export function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function getCsvHeader(): string {
  return EVENT_COLUMNS.join(',');
}

export function eventToCsvRow(event: ScheduleEvent): string {
  return EVENT_COLUMNS.map(column => csvField(event[column])).join(',');
}

/**
 * Header row plus one row per event; a header-only table for no events
 */
export function toCsv(events: readonly ScheduleEvent[]): string {
  return [getCsvHeader(), ...events.map(eventToCsvRow)].join('\n') + '\n';
}

/**
 * The tabular columns only, in column order
 */
export function toRecord(event: ScheduleEvent): Record<string, string> {
  const record: Record<string, string> = {};
  for (const column of EVENT_COLUMNS) {
    record[column] = event[column];
  }
  return record;
}

export function toJsonl(events: readonly ScheduleEvent[]): string {
  return events.map(event => JSON.stringify(toRecord(event)) + '\n').join('');
}

export function serializeEvents(events: readonly ScheduleEvent[], format: OutputFormat): string {
  return format === 'jsonl' ? toJsonl(events) : toCsv(events);
}

export async function writeEvents(
  filePath: string,
  events: readonly ScheduleEvent[],
  format: OutputFormat
): Promise<void> {
  await writeTextFileAtomic(filePath, serializeEvents(events, format));
}

/**
 * Persist the normalized buffer for diagnosing extraction misses
 */
export async function writeNormalizedText(filePath: string, text: string): Promise<void> {
  await writeTextFileAtomic(filePath, text.length > 0 ? text + '\n' : '');
}
