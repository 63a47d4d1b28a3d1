/**
 * Error types surfaced to callers
 *
 * Per-line failures (a malformed time token, an ambiguous field) never
 * become errors; they degrade to plain text or the sentinel value.
 */

export class SourceUnavailableError extends Error {
  readonly source: string;

  constructor(source: string, reason?: string) {
    super(`Source unavailable: ${source}${reason ? ` (${reason})` : ''}`);
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}
