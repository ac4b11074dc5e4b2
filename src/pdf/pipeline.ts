// src/pdf/pipeline.ts
// Entry-point: PDF bytes -> RawLine records for the segmentation engine.

import type { RawLine } from '../sections/types';
import { extractPdfPages, loadPdfDocument } from './extract';
import { buildLines, linesToRawLines } from './lines';
import type { PdfDocLike, PdfExtractOptions, PdfPageLines } from './types';

// 10°: beyond this a line is a margin stamp or watermark, not body text.
const MAX_ROTATION_ABS_RAD = Math.PI / 18;

export async function extractPdfLines(data: Uint8Array, opts?: PdfExtractOptions): Promise<RawLine[]> {
  const pdf = await loadPdfDocument(data);
  try {
    return await extractDocumentLines(pdf, opts);
  } finally {
    await pdf.destroy?.();
  }
}

export async function extractDocumentLines(pdf: PdfDocLike, opts?: PdfExtractOptions): Promise<RawLine[]> {
  const rawPages = await extractPdfPages(pdf, opts);
  const pages: PdfPageLines[] = [];
  let rotated = 0;

  for (const p of rawPages) {
    const lines = buildLines(p.pageIndex, p.items, {
      pageHeightPx: p.height,
      bodyFontSize: p.bodyFontSize,
      maxRotationAbsRad: MAX_ROTATION_ABS_RAD,
    });
    const upright = lines.filter((l) => l.rotatedFraction <= 0.5);
    rotated += lines.length - upright.length;
    pages.push({ pageIndex: p.pageIndex, bodyFontSize: p.bodyFontSize, lines: upright });
  }

  if (rotated) console.debug('[paper-sections][pdf] dropped rotated lines', { count: rotated });
  return linesToRawLines(pages);
}
