#!/usr/bin/env node
/**
 * schedex CLI
 * Turns schedule text (agenda pages from text-layer extraction or OCR)
 * into one row per session.
 *
 * Command structure (git-style flat):
 *   schedex extract     # Text → CSV / JSONL / table
 *   schedex templates   # Document template management
 *   schedex config      # Configuration
 *
 * Shortcuts:
 *   x = extract
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import {
  createConfigCommand,
  createExtractCommand,
  createTemplatesCommand,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function getConfigPath(): string {
  return resolveConfigPath({ configPath: globalConfigPath });
}

const HELP_HEADER = `
schedex - schedule text extractor
One row per session: date, time, session name, speaker, location, raw text.

Commands:
  extract, x    Extract events from text files or stdin
  templates     List, show, add and remove document templates
  config        Configuration management

Examples:
  schedex extract agenda.txt                        # Print a table
  schedex extract agenda.txt -o events.csv          # Write CSV
  pdftotext agenda.pdf - | schedex extract - --format jsonl -o events.jsonl
  schedex extract p1.txt p2.txt -t two-day-conference -o events.csv
  schedex extract scan.txt --dump-text scan.norm.txt --allow-empty
`;

program
  .name('schedex')
  .description('Extract structured event rows from schedule text')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output (debug logs on stderr)')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; json?: boolean; verbose?: boolean }>();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
  });

const extractCmd = createExtractCommand(getConfigPath);
program.addCommand(extractCmd);

// Alias: x = extract
const xCmd = createExtractCommand(getConfigPath);
xCmd.name('x').description('Alias for extract');
program.addCommand(xCmd);

program.addCommand(createTemplatesCommand(getConfigPath));
program.addCommand(createConfigCommand(getConfigPath));

// Parse and run
await program.parseAsync();
