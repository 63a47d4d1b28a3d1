/**
 * Tests for extract command helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createExtractCommand,
  createTextSource,
  EVENT_TABLE_COLUMNS,
  eventTableRow,
  resolveExtractSettings,
} from './extract.js';
import { outputTable } from '../utils/output.js';
import { FileTextSource, PagedTextSource, StreamTextSource } from '../sources/index.js';
import { DEFAULT_CONFIG, type Config, type ScheduleEvent } from '../types/index.js';

describe('resolveExtractSettings', () => {
  it('should take defaults from the config', () => {
    expect(resolveExtractSettings(DEFAULT_CONFIG, {})).toEqual({
      template: 'generic',
      format: 'csv',
      fallbackDate: undefined,
      outputPath: undefined,
      dumpTextPath: undefined,
    });
  });

  it('should let options override the config', () => {
    const config: Config = { version: 1, default_template: 'generic', fallback_date: 'TBD', output: { format: 'jsonl' } };
    expect(resolveExtractSettings(config, {
      template: 'two-day-conference',
      format: 'csv',
      fallbackDate: 'Day 0',
      output: 'events.csv',
    })).toEqual({
      template: 'two-day-conference',
      format: 'csv',
      fallbackDate: 'Day 0',
      outputPath: 'events.csv',
      dumpTextPath: undefined,
    });
  });

  it('should derive the dump path when the config asks for one', () => {
    const config: Config = { ...DEFAULT_CONFIG, output: { format: 'csv', dump_text: true } };
    expect(resolveExtractSettings(config, { output: 'out/events.csv' }).dumpTextPath).toBe('out/events.csv.txt');
    expect(resolveExtractSettings(config, {}).dumpTextPath).toBeUndefined();
    expect(resolveExtractSettings(config, { output: 'e.csv', dumpText: 'norm.txt' }).dumpTextPath).toBe('norm.txt');
  });

  it('should reject unknown formats', () => {
    expect(() => resolveExtractSettings(DEFAULT_CONFIG, { format: 'xlsx' })).toThrow(
      "Unknown format 'xlsx' (expected: csv, jsonl)"
    );
  });
});

describe('createTextSource', () => {
  it('should read stdin for a dash', () => {
    expect(createTextSource(['-'])).toBeInstanceOf(StreamTextSource);
  });

  it('should read a single file', () => {
    const source = createTextSource(['agenda.txt']);
    expect(source).toBeInstanceOf(FileTextSource);
    expect(source.describe()).toBe('agenda.txt');
  });

  it('should treat several files as pages', () => {
    const source = createTextSource(['p1.txt', 'p2.txt']);
    expect(source).toBeInstanceOf(PagedTextSource);
    expect(source.describe()).toBe('p1.txt + p2.txt');
  });
});

describe('event table', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should cut long session names to the column width', () => {
    const event: ScheduleEvent = {
      date: 'DAY 1',
      time: '9:00 - 10:00',
      session_name: 'A'.repeat(60),
      speaker: 'Dr. Jane Smith',
      location: 'Hall 2',
      raw_text: 'A'.repeat(60),
      source_line: 2,
    };
    expect(eventTableRow(event)).toEqual(['DAY 1', '9:00 - 10:00', 'A'.repeat(60), 'Dr. Jane Smith', 'Hall 2']);

    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    outputTable(EVENT_TABLE_COLUMNS, [eventTableRow(event)]);
    expect(log.mock.calls[2][0]).toBe(
      ['DAY 1', '9:00 - 10:00', 'A'.repeat(47) + '…', 'Dr. Jane Smith', 'Hall 2  '].join('  ')
    );
  });
});

describe('createExtractCommand', () => {
  it('should declare the extract options', () => {
    const cmd = createExtractCommand(() => '/tmp/config.json');
    expect(cmd.name()).toBe('extract');
    expect(cmd.options.map(o => o.long)).toEqual([
      '--output',
      '--format',
      '--template',
      '--fallback-date',
      '--dump-text',
      '--allow-empty',
    ]);
  });
});
