/**
 * Tests for the structured logger
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger, silentLogger } from './logger.js';

describe('createLogger', () => {
  it('should write one JSON line per entry', () => {
    const output = vi.fn();
    const logger = createLogger(output, 'debug');

    logger.info({ event: 'extract.done', source: 'agenda.txt', events: 3 });

    expect(output).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(output.mock.calls[0][0]);
    expect(entry).toMatchObject({ level: 'info', event: 'extract.done', source: 'agenda.txt', events: 3 });
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
  });

  it('should drop entries below the minimum level', () => {
    const output = vi.fn();
    const logger = createLogger(output, 'warn');

    logger.debug({ event: 'extract.start' });
    logger.info({ event: 'extract.done' });
    logger.warn({ event: 'extract.empty' });
    logger.error({ event: 'extract.failed' });

    expect(output.mock.calls.map(call => JSON.parse(call[0]).level)).toEqual(['warn', 'error']);
  });

  it('should default to warn', () => {
    const output = vi.fn();
    createLogger(output).info({ event: 'extract.done' });
    expect(output).not.toHaveBeenCalled();
  });
});

describe('silentLogger', () => {
  it('should write nothing', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    silentLogger.error({ event: 'extract.failed' });
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
