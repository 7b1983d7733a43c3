export { FileSink, renderPageMarkdown } from './file-sink.js';
export type { Sink, StoredPage, PageDocument, FileSinkOptions } from './file-sink.js';
export {
  COMBINED_FILE_NAME,
  writeCombinedFile,
  renderCombined,
  sortParentsFirst,
  buildHeaderLabel,
} from './single-file.js';
export type { CombinablePage } from './single-file.js';
export {
  urlToPath,
  sanitizeFilename,
  addFrontMatter,
  pagePath,
  markdownFilePath,
  jsonFilePath,
} from './utils.js';
export type { OutputStructure } from './utils.js';
