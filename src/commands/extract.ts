/**
 * Extract command - text in, schedule table out
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { SourceUnavailableError, TemplateError } from '../errors.js';
import { Extractor } from '../extractor/index.js';
import {
  FileTextSource,
  PagedTextSource,
  StreamTextSource,
  type TextSource,
} from '../sources/index.js';
import { compileTemplate, TemplatesStore } from '../templates/index.js';
import { toRecord } from '../sinks/index.js';
import { OUTPUT_FORMATS, type Config, type OutputFormat, type ScheduleEvent } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { getOutputOptions, output, outputError, outputTable, type TableColumn } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';

/** Exit code for a run that recognized no events */
export const EXIT_EMPTY = 2;

export interface ExtractCommandOptions {
  output?: string;
  format?: string;
  template?: string;
  fallbackDate?: string;
  dumpText?: string;
  allowEmpty?: boolean;
}

export interface ExtractSettings {
  template: string;
  format: OutputFormat;
  fallbackDate?: string;
  outputPath?: string;
  dumpTextPath?: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(f => f === value);
}

/**
 * Merge command-line options over the config file
 */
export function resolveExtractSettings(config: Config, options: ExtractCommandOptions): ExtractSettings {
  const format = options.format ?? config.output?.format ?? 'csv';
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown format '${format}' (expected: ${OUTPUT_FORMATS.join(', ')})`);
  }

  let dumpTextPath = options.dumpText;
  if (!dumpTextPath && config.output?.dump_text && options.output) {
    dumpTextPath = `${options.output}.txt`;
  }

  return {
    template: options.template ?? config.default_template,
    format,
    fallbackDate: options.fallbackDate ?? config.fallback_date,
    outputPath: options.output,
    dumpTextPath,
  };
}

/**
 * One input is read as is ("-" for stdin); several are pages in order
 */
export function createTextSource(inputs: string[]): TextSource {
  if (inputs.length === 1) {
    const input = inputs[0];
    return input === '-' ? new StreamTextSource() : new FileTextSource(input);
  }
  return new PagedTextSource(inputs.map(input => new FileTextSource(input)));
}

export const EVENT_TABLE_COLUMNS: readonly TableColumn[] = [
  { header: 'Date', maxWidth: 24 },
  { header: 'Time' },
  { header: 'Session', maxWidth: 48 },
  { header: 'Speaker', maxWidth: 28 },
  { header: 'Location', maxWidth: 24 },
];

export function eventTableRow(event: ScheduleEvent): string[] {
  return [event.date, event.time, event.session_name, event.speaker, event.location];
}

export function createExtractCommand(getConfigPath: () => string): Command {
  return new Command('extract')
    .description('Extract schedule events from text (use - for stdin; several files are read as pages)')
    .argument('<inputs...>', 'Text file(s) produced by text-layer extraction or OCR')
    .option('-o, --output <file>', 'Write events to file instead of printing a table')
    .option('--format <format>', `Export format: ${OUTPUT_FORMATS.join(', ')}`)
    .option('-t, --template <name>', 'Document template (see: schedex templates ls)')
    .option('--fallback-date <label>', 'Date label for events without a date header')
    .option('--dump-text <file>', 'Write the normalized text for diagnosing misses')
    .option('--allow-empty', 'Exit 0 even when no events are extracted')
    .action(async (inputs: string[], options: ExtractCommandOptions) => {
      const opts = getOutputOptions();

      try {
        const manager = new ConfigManager(getConfigPath());
        const config = await manager.loadOrDefault();
        const settings = resolveExtractSettings(config, options);

        const templates = new TemplatesStore(manager.getConfigDir());
        const template = await templates.getTemplate(settings.template);
        if (!template) {
          outputError(`Template not found: ${settings.template}`);
          process.exit(1);
        }

        const rules = compileTemplate(template.definition, { fallbackDate: settings.fallbackDate });
        const extractor = new Extractor(createLogger(console.error, opts.verbose ? 'debug' : 'warn'));
        const source = createTextSource(inputs);

        const run = await withSpinner(
          `Extracting schedule from ${source.describe()}...`,
          () =>
            extractor.run(source, {
              rules,
              template: template.name,
              templateDigest: template.digest_sha256,
              outputPath: settings.outputPath,
              format: settings.format,
              dumpTextPath: settings.dumpTextPath,
            }),
          { done: ({ result }) => `Parsed ${result.stats.lines} lines, ${result.stats.timeSlots} time slots` }
        );
        const { result } = run;

        if (settings.outputPath) {
          output(
            {
              success: true,
              source: run.source,
              template: template.name,
              output: settings.outputPath,
              format: settings.format,
              event_count: result.events.length,
              empty: result.empty,
              dump_text: settings.dumpTextPath,
            },
            `${result.empty ? '✗ No events extracted' : `✓ Extracted ${result.events.length} events`}\n` +
            `  Source: ${run.source}\n` +
            `  Template: ${template.name}\n` +
            `  Output: ${settings.outputPath} (${settings.format})` +
            (settings.dumpTextPath ? `\n  Normalized text: ${settings.dumpTextPath}` : '')
          );
        } else if (opts.json) {
          output({
            source: run.source,
            template: template.name,
            empty: result.empty,
            stats: result.stats,
            events: result.events.map(toRecord),
          });
        } else if (!result.empty) {
          outputTable(EVENT_TABLE_COLUMNS, result.events.map(eventTableRow));
          console.log(`\n${result.events.length} events (${result.stats.dateHeaders} date headers)`);
        } else {
          console.log(`No events extracted from ${run.source}.`);
        }

        if (result.empty && !options.allowEmpty) {
          if (!opts.json) {
            console.error('Hint: re-run with --dump-text <file> to inspect the normalized text.');
          }
          process.exit(EXIT_EMPTY);
        }
      } catch (error) {
        if (error instanceof SourceUnavailableError || error instanceof TemplateError) {
          outputError(error.message, error);
        } else {
          outputError('Extraction failed', error);
        }
        process.exit(1);
      }
    });
}
