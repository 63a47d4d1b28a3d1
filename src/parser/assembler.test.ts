/**
 * Tests for the event assembler state machine
 */

import { describe, it, expect } from 'vitest';
import { createScanner, finalizeEvent, finish, step } from './assembler.js';
import { defaultRules } from './rules.js';
import type { NormalizedLine } from '../types/events.js';

function feed(lines: NormalizedLine[], rules = defaultRules()) {
  let scanner = createScanner();
  for (const line of lines) {
    scanner = step(scanner, line, rules);
  }
  return scanner;
}

describe('createScanner', () => {
  it('should start scanning with no date', () => {
    expect(createScanner()).toEqual({
      state: 'SCANNING',
      currentDate: null,
      openEvent: null,
      events: [],
      dateHeaders: 0,
      timeSlots: 0,
    });
  });
});

describe('step', () => {
  it('should ignore lines before the first time slot', () => {
    const scanner = feed([
      { text: 'Conference Program', lineNumber: 1 },
      { text: 'Welcome to the event', lineNumber: 2 },
    ]);
    expect(scanner.state).toBe('SCANNING');
    expect(scanner.openEvent).toBeNull();
    expect(scanner.events).toEqual([]);
  });

  it('should open an event on a time slot and collect body lines', () => {
    const scanner = feed([
      { text: 'DAY 1', lineNumber: 1 },
      { text: '9:00 - 10:00', lineNumber: 2 },
      { text: 'Keynote', lineNumber: 3 },
    ]);
    expect(scanner.state).toBe('IN_EVENT');
    expect(scanner.openEvent).toEqual({
      date: 'DAY 1',
      time: '9:00 - 10:00',
      lineNumber: 2,
      body: ['Keynote'],
    });
  });

  it('should close the open event on a date header', () => {
    const scanner = feed([
      { text: '9:00 - 10:00', lineNumber: 1 },
      { text: 'Body', lineNumber: 2 },
      { text: 'DAY 2', lineNumber: 3 },
      { text: 'Stray line', lineNumber: 4 },
    ]);
    expect(scanner.state).toBe('SCANNING');
    expect(scanner.currentDate).toBe('DAY 2');
    expect(scanner.events).toHaveLength(1);
    expect(scanner.events[0].raw_text).toBe('Body');
  });

  it('should open an event from a time slot on the header line', () => {
    const scanner = feed([{ text: 'DAY 2 9:00 - 10:00 Keynote', lineNumber: 7 }]);
    expect(scanner.dateHeaders).toBe(1);
    expect(scanner.timeSlots).toBe(1);
    expect(scanner.openEvent).toEqual({
      date: 'DAY 2',
      time: '9:00 - 10:00',
      lineNumber: 7,
      body: ['Keynote'],
    });
  });

  it('should use the fallback date before any header', () => {
    const scanner = feed([{ text: '9:00 - 10:00 Opening', lineNumber: 1 }], defaultRules({ fallbackDate: 'TBD' }));
    expect(scanner.openEvent?.date).toBe('TBD');
  });
});

describe('finish', () => {
  it('should emit the trailing open event', () => {
    const rules = defaultRules();
    const scanner = feed([
      { text: '9:00 - 10:00', lineNumber: 1 },
      { text: 'Talk A', lineNumber: 2 },
      { text: '10:00 - 11:00', lineNumber: 3 },
      { text: 'Talk B', lineNumber: 4 },
    ], rules);

    const events = finish(scanner, rules);
    expect(events.map(e => e.session_name)).toEqual(['Talk A', 'Talk B']);
    expect(events.map(e => e.source_line)).toEqual([1, 3]);
    expect(scanner.openEvent).toBeNull();
  });
});

describe('finalizeEvent', () => {
  it('should cap raw text and freeze the event', () => {
    const rules = defaultRules({ limits: { title: 200, speaker: 100, location: 100, rawText: 10 } });
    const event = finalizeEvent(
      { date: 'DAY 1', time: '9:00 - 10:00', lineNumber: 4, body: ['abcdefgh', 'ijkl'] },
      rules
    );
    expect(event.raw_text).toBe('abcdefgh i');
    expect(event.source_line).toBe(4);
    expect(Object.isFrozen(event)).toBe(true);
  });
});
