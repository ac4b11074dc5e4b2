// src/pdf/types.ts
// PDF extraction data model. Geometry is only used to rebuild lines and the
// blank-line signal; nothing downstream of RawLine sees coordinates.

export type PdfBBox = {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
};

export type PdfTextItem = {
  pageIndex: number;
  str: string;
  // PDF coordinates (origin bottom-left, from PDF.js transform)
  x: number;
  y: number;
  x2: number;
  y2: number;
  fontSize: number;
  rotationRad: number;
  // Normalized [0..1] coordinates, origin top-left
  x0n: number;
  x1n: number;
  y0n: number;
  y1n: number;
};

// ---- Minimal PDF.js-like surface types
// Small enough that tests can hand in fakes instead of a parsed PDF.

export type PdfTextContentLike = {
  items?: unknown;
};

export type PdfPageLike = {
  getViewport: (opts: { scale: number }) => { width: number; height: number };
  getTextContent: () => Promise<PdfTextContentLike>;
};

export type PdfDocLike = {
  numPages: number;
  getPage: (pageNum: number) => Promise<PdfPageLike>;
  destroy?: () => Promise<void>;
};

export type PdfLine = {
  pageIndex: number;
  items: PdfTextItem[];
  text: string;
  bbox: PdfBBox;
  // normalized, origin top-left
  x0n: number;
  x1n: number;
  y0n: number;
  y1n: number;
  yMid: number;
  fontSize: number;
  rotatedFraction: number;
};

export type PdfPageLines = {
  pageIndex: number;
  bodyFontSize: number;
  lines: PdfLine[];
};

export type PdfExtractOptions = {
  /** Pages beyond this are ignored. Default 200. */
  maxPages?: number;
};
