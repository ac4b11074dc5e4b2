// src/pdf/extract.ts
// PDF.js extraction + deterministic conversion into geometric text items.

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { clamp01, isRecord, percentile, stableSortBy } from './utils';
import type { PdfDocLike, PdfExtractOptions, PdfPageLike, PdfTextContentLike, PdfTextItem } from './types';

export const DEFAULT_MAX_PAGES = 200;

export type PdfPageRaw = {
  pageIndex: number;
  width: number;
  height: number;
  bodyFontSize: number;
  items: PdfTextItem[];
};

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function parseTransform(t: unknown): [number, number, number, number, number, number] {
  const tr: unknown[] = Array.isArray(t) ? t : [];
  return [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];
}

function parsePageTextItems(pageIndex: number, page: PdfPageLike, content: PdfTextContentLike): PdfPageRaw {
  const rawItems: unknown[] = Array.isArray(content.items) ? content.items : [];

  const viewport = page.getViewport({ scale: 1 });
  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;

  const parsed: PdfTextItem[] = [];
  const fontSizes: number[] = [];

  for (const raw of rawItems) {
    // Marked-content entries carry no `str`.
    if (!isRecord(raw) || typeof raw.str !== 'string') continue;
    const s = raw.str;
    if (!s.trim()) continue;

    const [a, b, c, d, x, y] = parseTransform(raw.transform);
    const rotationRad = Math.atan2(b, a);

    // Approx font size (purely geometric).
    const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d), Math.abs(d), 0);
    if (Number.isFinite(fontSize) && fontSize > 0) fontSizes.push(fontSize);

    const x2 = x + asNum(raw.width, 0);
    const y2 = y + asNum(raw.height, 0);

    // Normalized to top-left origin; PDF origin is bottom-left, so invert y.
    parsed.push({
      pageIndex,
      str: s,
      x,
      y,
      x2,
      y2,
      fontSize,
      rotationRad,
      x0n: clamp01(x / pageW),
      x1n: clamp01(x2 / pageW),
      y0n: clamp01(1 - (y2 / pageH)),
      y1n: clamp01(1 - (y / pageH)),
    });
  }

  const sortedFonts = fontSizes.sort((m, n) => m - n);
  const bodyFontSize = percentile(sortedFonts, 0.5);

  return {
    pageIndex,
    width: pageW,
    height: pageH,
    bodyFontSize,
    items: stableSortBy(parsed, (p) => (p.y0n * 10_000) + p.x0n),
  };
}

export async function loadPdfDocument(data: Uint8Array): Promise<PdfDocLike> {
  // PDF.js takes ownership of (and may detach) the buffer it is given.
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    disableFontFace: true,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });
  return await loadingTask.promise;
}

export async function extractPdfPages(pdf: PdfDocLike, opts?: PdfExtractOptions): Promise<PdfPageRaw[]> {
  const maxPages = opts?.maxPages ?? DEFAULT_MAX_PAGES;
  const totalPages = Math.min(asNum(pdf.numPages, 0), maxPages);
  if (!totalPages) return [];

  const out: PdfPageRaw[] = [];
  for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
    try {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();
      out.push(parsePageTextItems(pageNum - 1, page, content));
    } catch (err) {
      console.error('[paper-sections][pdf] failed to extract page', { pageNum, err });
      // Preserve page indexing: emit empty page.
      out.push({ pageIndex: pageNum - 1, width: 1, height: 1, bodyFontSize: 0, items: [] });
    }
  }
  return out;
}

// ---- Line-building parameter estimates (structural-only, deterministic)

export function estimateSpaceThresholdPx(bodyFontSize: number): number {
  // Insert a space between adjacent text items when their x-gap exceeds this.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 2.5;
  return Math.min(10, Math.max(1.5, bodyFontSize * 0.33));
}

export function estimateLineYToleranceNorm(bodyFontSize: number, pageHeightPx: number): number {
  // Items whose y-mids fall within this tolerance share a line.
  const h = (pageHeightPx > 0 && Number.isFinite(pageHeightPx)) ? pageHeightPx : 1000;
  const tolPx = (bodyFontSize > 0 && Number.isFinite(bodyFontSize))
    ? Math.min(12, Math.max(2.0, bodyFontSize * 0.45))
    : 3.5;
  return Math.min(0.02, Math.max(0.001, tolPx / h));
}
