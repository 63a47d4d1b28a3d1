/**
 * Structured JSON-line logger
 *
 * Log format:
 * { timestamp, level, event, source, template, ... }
 *
 * Lines go to stderr by default so stdout stays clean for tables and --json output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  source?: string;
  template?: string;
  template_digest?: string;
  output?: string;
  format?: string;
  lines?: number;
  skipped_lines?: number;
  date_headers?: number;
  time_slots?: number;
  events?: number;
  duration_ms?: number;
  error?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  info(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  warn(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  error(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a structured JSON logger
 * @param output Write function (default: console.error)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = console.error,
  minLevel: LogLevel = 'warn'
): Logger {
  const log = (level: LogLevel, entry: Omit<LogEntry, 'timestamp' | 'level'>) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;

    const fullEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    };

    output(JSON.stringify(fullEntry));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger(() => {}, 'error');
