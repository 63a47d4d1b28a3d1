/**
 * Tests for text sources
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { Readable } from 'stream';
import {
  FileTextSource,
  PagedTextSource,
  StreamTextSource,
  StringTextSource,
  joinPages,
} from './text-source.js';
import { SourceUnavailableError } from '../errors.js';

describe('joinPages', () => {
  it('should prefix pages with markers in page order', () => {
    expect(joinPages(['first\n', '  second'])).toBe('--- Page 1 ---\nfirst\n\n--- Page 2 ---\nsecond');
  });

  it('should join without markers when disabled', () => {
    expect(joinPages(['a', 'b'], { marker: false })).toBe('a\n\nb');
  });
});

describe('FileTextSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'schedex-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a UTF-8 file', async () => {
    const path = join(dir, 'agenda.txt');
    await writeFile(path, 'DAY 1\n9:00 - 10:00 Café', 'utf-8');

    const source = new FileTextSource(path);
    expect(source.describe()).toBe(path);
    expect(await source.read()).toBe('DAY 1\n9:00 - 10:00 Café');
  });

  it('should raise SourceUnavailableError for a missing file', async () => {
    const path = join(dir, 'missing.txt');
    const read = new FileTextSource(path).read();

    await expect(read).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(new FileTextSource(path).read()).rejects.toThrow(`Source unavailable: ${path} (file not found)`);
  });

  it('should raise SourceUnavailableError for a directory', async () => {
    await expect(new FileTextSource(dir).read()).rejects.toThrow(`Source unavailable: ${dir} (is a directory)`);
  });
});

describe('StreamTextSource', () => {
  it('should read the whole stream', async () => {
    const source = new StreamTextSource(Readable.from(['DAY 1\n', Buffer.from('9:00 - 10:00')]), 'pipe');
    expect(source.describe()).toBe('pipe');
    expect(await source.read()).toBe('DAY 1\n9:00 - 10:00');
  });

  it('should wrap stream errors', async () => {
    const failing = new Readable({
      read() {
        this.destroy(new Error('broken pipe'));
      },
    });
    await expect(new StreamTextSource(failing).read()).rejects.toThrow('Source unavailable: stdin (broken pipe)');
  });
});

describe('PagedTextSource', () => {
  it('should join pages in order', async () => {
    const source = new PagedTextSource([
      new StringTextSource('page one', 'p1'),
      new StringTextSource('page two', 'p2'),
    ]);
    expect(source.describe()).toBe('p1 + p2');
    expect(await source.read()).toBe('--- Page 1 ---\npage one\n\n--- Page 2 ---\npage two');
  });
});
