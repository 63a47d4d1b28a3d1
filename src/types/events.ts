/**
 * Schedule event types
 */

/** Placeholder for a field no rule could fill */
export const SENTINEL = 'N/A';

/**
 * Columns written by tabular sinks, in order
 */
export const EVENT_COLUMNS = [
  'date',
  'time',
  'session_name',
  'speaker',
  'location',
  'raw_text',
] as const;

export type EventColumn = typeof EVENT_COLUMNS[number];

/**
 * One cleaned input line
 */
export interface NormalizedLine {
  text: string;
  /** 1-based line number in the raw buffer */
  lineNumber: number;
}

/**
 * Span of lines governed by one date header
 */
export interface DaySection {
  /** Canonical date label */
  label: string;
  /** Header text as matched */
  header: string;
  /** Line number of the header */
  startLine: number;
  /** Line number of the next header, or one past the last line (exclusive) */
  endLine: number;
}

/**
 * A recognized time range and the body lines that follow it
 */
export interface TimeSlot {
  /** Verbatim matched range, e.g. "8:00 am - 9:00 am" */
  time: string;
  lineNumber: number;
  body: string[];
}

/**
 * Finalized schedule entry
 */
export interface ScheduleEvent {
  date: string;
  time: string;
  session_name: string;
  speaker: string;
  location: string;
  raw_text: string;
  /** Line number of the opening time slot (not a tabular column) */
  source_line: number;
}

export interface ExtractionStats {
  /** Lines after normalization */
  lines: number;
  /** Lines dropped by skip patterns or before the schedule section */
  skippedLines: number;
  dateHeaders: number;
  timeSlots: number;
}

/**
 * Result of one parse over a document
 */
export interface ExtractionResult {
  events: ScheduleEvent[];
  days: DaySection[];
  /** True when no event was recognized */
  empty: boolean;
  stats: ExtractionStats;
  /** Cleaned buffer, kept for diagnosing misses */
  normalizedText: string;
}
