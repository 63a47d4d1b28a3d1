export {
  FileTextSource,
  StreamTextSource,
  StringTextSource,
  PagedTextSource,
  joinPages,
} from './text-source.js';
export type { TextSource, JoinPagesOptions } from './text-source.js';
