// Document handle
export {
  StatementDocument,
  openDocument,
  withDocument,
  loadPdfSource,
} from './document.js';

export type { PdfSource, PdfPageSource, DocumentLoader } from './document.js';

// Text extraction
export { extractText, tryExtractText, selectPages } from './text-extractor.js';

export type { ExtractTextOptions, TextExtractionResult } from './text-extractor.js';

// Layout-aware line building
export { buildLinesFromItems, groupRows, toTextItems } from './layout.js';

export type { TextItem, TextRow } from './layout.js';
