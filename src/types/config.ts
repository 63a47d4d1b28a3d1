/**
 * Configuration types for schedex
 */

export type OutputFormat = 'csv' | 'jsonl';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'jsonl'];

export interface OutputConfig {
  /** Export format when -o is given (default: csv) */
  format?: OutputFormat;
  /** Also write the normalized text next to the export as <output>.txt */
  dump_text?: boolean;
}

export interface Config {
  version: 1;
  /** Template used when extract is run without --template */
  default_template: string;
  /** Overrides the template's fallback date label */
  fallback_date?: string;
  output?: OutputConfig;
}

export const DEFAULT_CONFIG: Config = {
  version: 1,
  default_template: 'generic',
  output: {
    format: 'csv',
    dump_text: false,
  },
};
