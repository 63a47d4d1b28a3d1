/**
 * Text sources - where the schedule text comes from
 *
 * PDF text-layer extraction and OCR run outside this package; their output
 * reaches the parser through one of these sources as a single buffer.
 */

import { SourceUnavailableError } from '../errors.js';
import { describeReadError, readTextFile } from '../utils/fs.js';

export interface TextSource {
  /** Human-readable origin, used in logs and errors */
  describe(): string;
  read(): Promise<string>;
}

export interface JoinPagesOptions {
  /** Prefix each page with "--- Page n ---" (default: true) */
  marker?: boolean;
}

/**
 * Concatenate per-page text in page order
 */
export function joinPages(pages: readonly string[], options: JoinPagesOptions = {}): string {
  const marker = options.marker ?? true;
  return pages
    .map((page, i) => (marker ? `--- Page ${i + 1} ---\n${page.trim()}` : page.trim()))
    .join('\n\n');
}

/**
 * UTF-8 text file (text-layer dump or OCR output)
 */
export class FileTextSource implements TextSource {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<string> {
    try {
      return await readTextFile(this.filePath);
    } catch (error) {
      throw new SourceUnavailableError(this.filePath, describeReadError(error));
    }
  }
}

/**
 * Everything written to a readable stream (stdin by default)
 */
export class StreamTextSource implements TextSource {
  private stream: NodeJS.ReadableStream;
  private label: string;

  constructor(stream: NodeJS.ReadableStream = process.stdin, label = 'stdin') {
    this.stream = stream;
    this.label = label;
  }

  describe(): string {
    return this.label;
  }

  async read(): Promise<string> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of this.stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
      }
    } catch (error) {
      throw new SourceUnavailableError(this.label, error instanceof Error ? error.message : String(error));
    }
    return Buffer.concat(chunks).toString('utf-8');
  }
}

/**
 * Text already in memory
 */
export class StringTextSource implements TextSource {
  private text: string;
  private label: string;

  constructor(text: string, label = 'memory') {
    this.text = text;
    this.label = label;
  }

  describe(): string {
    return this.label;
  }

  async read(): Promise<string> {
    return this.text;
  }
}

/**
 * One source per page. Pages are read concurrently and joined in page order.
 */
export class PagedTextSource implements TextSource {
  private pages: TextSource[];
  private options: JoinPagesOptions;

  constructor(pages: TextSource[], options: JoinPagesOptions = {}) {
    this.pages = pages;
    this.options = options;
  }

  describe(): string {
    return this.pages.map(p => p.describe()).join(' + ');
  }

  async read(): Promise<string> {
    const texts = await Promise.all(this.pages.map(page => page.read()));
    return joinPages(texts, this.options);
  }
}
