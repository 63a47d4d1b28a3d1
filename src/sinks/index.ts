export {
  csvField,
  getCsvHeader,
  eventToCsvRow,
  toCsv,
  toJsonl,
  toRecord,
  serializeEvents,
  writeEvents,
  writeNormalizedText,
} from './tabular.js';
