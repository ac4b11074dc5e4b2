// src/pdf/index.ts
// Public entrypoints for PDF text extraction.

export type {
  PdfBBox,
  PdfDocLike,
  PdfExtractOptions,
  PdfLine,
  PdfPageLike,
  PdfPageLines,
  PdfTextContentLike,
  PdfTextItem,
} from './types';

export { DEFAULT_MAX_PAGES, extractPdfPages, loadPdfDocument } from './extract';
export { buildLines, linesToRawLines } from './lines';
export { extractDocumentLines, extractPdfLines } from './pipeline';
