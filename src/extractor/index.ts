/**
 * Extractor - orchestrates one extraction run
 * Reads a text source, parses the schedule, writes the export and the
 * optional normalized-text dump, and logs each stage.
 */

import { parseSchedule } from '../parser/index.js';
import type { ParseRules } from '../parser/rules.js';
import { writeEvents, writeNormalizedText } from '../sinks/tabular.js';
import type { TextSource } from '../sources/text-source.js';
import type { OutputFormat } from '../types/config.js';
import type { ExtractionResult } from '../types/events.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ExtractOptions {
  rules: ParseRules;
  /** Template name, for logs */
  template?: string;
  templateDigest?: string;
  /** Export path; nothing is written when omitted */
  outputPath?: string;
  format?: OutputFormat;
  /** Where to write the normalized buffer */
  dumpTextPath?: string;
}

export interface ExtractRunResult {
  source: string;
  result: ExtractionResult;
  outputPath?: string;
  dumpTextPath?: string;
  durationMs: number;
}

export class Extractor {
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Run one extraction. A SourceUnavailableError from the source is
   * rethrown before anything is written.
   */
  async run(source: TextSource, options: ExtractOptions): Promise<ExtractRunResult> {
    const startedAt = Date.now();
    const format = options.format ?? 'csv';
    const sourceName = source.describe();

    this.logger.debug({
      event: 'extract.start',
      source: sourceName,
      template: options.template,
      template_digest: options.templateDigest,
    });

    let text: string;
    try {
      text = await source.read();
    } catch (error) {
      this.logger.error({
        event: 'extract.failed',
        source: sourceName,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const result = parseSchedule(text, options.rules);

    if (options.dumpTextPath) {
      await writeNormalizedText(options.dumpTextPath, result.normalizedText);
    }
    if (options.outputPath) {
      await writeEvents(options.outputPath, result.events, format);
    }

    const durationMs = Date.now() - startedAt;
    const stats = {
      source: sourceName,
      template: options.template,
      lines: result.stats.lines,
      skipped_lines: result.stats.skippedLines,
      date_headers: result.stats.dateHeaders,
      time_slots: result.stats.timeSlots,
      events: result.events.length,
      duration_ms: durationMs,
    };

    if (result.empty) {
      this.logger.warn({ event: 'extract.empty', ...stats });
    } else {
      this.logger.info({
        event: 'extract.done',
        ...stats,
        output: options.outputPath,
        format: options.outputPath ? format : undefined,
      });
    }

    return {
      source: sourceName,
      result,
      outputPath: options.outputPath,
      dumpTextPath: options.dumpTextPath,
      durationMs,
    };
  }
}
