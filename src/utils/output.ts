/**
 * CLI output: human-readable text, or JSON under --json
 *
 * Results go to stdout, errors to stderr. In JSON mode every call prints
 * exactly one JSON document.
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

/**
 * Report a failure. `error` may be anything a catch clause hands over;
 * named error classes (SourceUnavailableError, TemplateError) show up as
 * `kind` in JSON mode.
 */
export function outputError(message: string, error?: unknown): void {
  const cause = error instanceof Error ? error : undefined;

  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      kind: cause && cause.name !== 'Error' ? cause.name : undefined,
      details: cause ? cause.message : error === undefined ? undefined : String(error),
    }));
    return;
  }

  console.error(`Error: ${message}`);
  if (cause?.stack && globalOptions.verbose) {
    console.error(cause.stack);
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    console.log(JSON.stringify({ success: true, message, data }));
  } else {
    console.log(`✓ ${message}`);
  }
}

/**
 * Cut a cell to `max` characters for terminal tables
 */
export function truncateCell(value: string, max: number): string {
  if (value.length <= max) return value;
  return max <= 1 ? value.slice(0, max) : value.slice(0, max - 1) + '…';
}

export interface TableColumn {
  header: string;
  /** Longer cells are cut with an ellipsis; JSON output keeps them whole */
  maxWidth?: number;
}

export function outputTable(columns: ReadonlyArray<string | TableColumn>, rows: string[][]): void {
  const cols = columns.map(c => (typeof c === 'string' ? { header: c } : c));

  if (globalOptions.json) {
    const objects = rows.map(row => Object.fromEntries(cols.map((c, i) => [c.header, row[i] ?? ''])));
    console.log(JSON.stringify(objects, null, 2));
    return;
  }

  const cells = rows.map(row =>
    cols.map((c, i) => {
      const value = row[i] ?? '';
      return c.maxWidth === undefined ? value : truncateCell(value, c.maxWidth);
    })
  );
  const widths = cols.map((c, i) => Math.max(c.header.length, ...cells.map(r => r[i].length)));

  const headerLine = cols.map((c, i) => c.header.padEnd(widths[i])).join('  ');
  console.log(headerLine);
  console.log('-'.repeat(headerLine.length));
  for (const row of cells) {
    console.log(row.map((cell, i) => cell.padEnd(widths[i])).join('  '));
  }
}
