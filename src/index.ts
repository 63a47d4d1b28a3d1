/**
 * schedex - schedule text extractor
 * Programmatic API exports
 */

// Types
export type { OutputFormat, OutputConfig, Config } from './types/config.js';
export { DEFAULT_CONFIG, OUTPUT_FORMATS } from './types/config.js';
export type {
  EventColumn,
  NormalizedLine,
  DaySection,
  TimeSlot,
  ScheduleEvent,
  ExtractionStats,
  ExtractionResult,
} from './types/events.js';
export { SENTINEL, EVENT_COLUMNS } from './types/events.js';

// Errors
export { SourceUnavailableError, TemplateError } from './errors.js';

// Parser
export {
  parseSchedule,
  selectScheduleLines,
  normalizeLines,
  normalizeText,
  cleanLine,
  segmentDays,
  matchDateHeader,
  canonicalDateLabel,
  matchTimeSlot,
  splitTimeSlots,
  extractFields,
  createScanner,
  step,
  finish,
  defaultRules,
} from './parser/index.js';
export type { ParseRules, FieldLimits, DateLabelRule, TimeSlotMatch, Scanner as EventScanner } from './parser/index.js';

// Templates
export {
  TemplatesStore,
  parseTemplateYaml,
  compileTemplate,
  validateTemplateDefinition,
  calculateTemplateDigest,
  BUILTIN_TEMPLATES,
  DEFAULT_TEMPLATE_NAME,
} from './templates/index.js';
export type { Template, TemplateDefinition, DateLabelEntry } from './templates/index.js';

// Sources and sinks
export { FileTextSource, StreamTextSource, StringTextSource, PagedTextSource, joinPages } from './sources/index.js';
export type { TextSource } from './sources/index.js';
export { toCsv, toJsonl, serializeEvents, writeEvents, writeNormalizedText } from './sinks/index.js';

// Extractor
export { Extractor } from './extractor/index.js';
export type { ExtractOptions, ExtractRunResult } from './extractor/index.js';

// Config
export { ConfigManager, parseConfig, validateConfig } from './config/index.js';

// Utils
export { resolveConfigPath, getDefaultConfigDir, getDefaultConfigPath } from './utils/config-path.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel, LogEntry } from './utils/logger.js';
