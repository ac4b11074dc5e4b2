// src/pdf/lines.ts
// Convert raw text items into ordered lines, then into RawLine records with
// blank records where the layout shows a paragraph or heading break.

import type { RawLine } from '../sections/types';
import type { PdfLine, PdfPageLines, PdfTextItem } from './types';
import { bboxUnion, median, stableSortBy } from './utils';
import { estimateLineYToleranceNorm, estimateSpaceThresholdPx } from './extract';

type LineBuilderOpts = {
  pageHeightPx: number;
  bodyFontSize: number;
  // Items rotated beyond this count towards a line's rotatedFraction.
  maxRotationAbsRad: number;
};

// A vertical gap this many times the page's median line gap opens a new paragraph.
const PARAGRAPH_GAP_RATIO = 1.5;
// Font size ratio between neighbouring lines that marks a heading boundary.
const FONT_JUMP_RATIO = 1.12;

function mkBBoxFromItem(it: PdfTextItem) {
  return { x0: it.x0n, y0: it.y0n, x1: it.x1n, y1: it.y1n };
}

function mergeLineText(itemsSortedX: PdfTextItem[], spacePx: number): string {
  let out = '';
  let prevX2 = Number.NEGATIVE_INFINITY;

  for (const it of itemsSortedX) {
    const s = it.str.replace(/\s+/g, ' ').trim();
    if (!s) continue;

    const gapPx = it.x - prevX2;
    const needSpace = out.length > 0 && Number.isFinite(prevX2) && gapPx > spacePx;
    if (needSpace) out += ' ';
    out += s;
    prevX2 = Math.max(prevX2, it.x2);
  }
  return out.trim();
}

export function buildLines(pageIndex: number, items: PdfTextItem[], opts: LineBuilderOpts): PdfLine[] {
  if (!items.length) return [];

  const yTol = estimateLineYToleranceNorm(opts.bodyFontSize, opts.pageHeightPx);
  const spacePx = estimateSpaceThresholdPx(opts.bodyFontSize);

  // Sort by top edge, then x.
  const sorted = stableSortBy(items, (it) => (it.y0n * 10_000) + it.x0n);

  type LineAcc = {
    items: PdfTextItem[];
    yMid: number;
    fontSizes: number[];
  };

  const lines: LineAcc[] = [];

  for (const it of sorted) {
    const yMid = (it.y0n + it.y1n) / 2;

    // Deterministic placement: first matching line by insertion order.
    const ln = lines.find((l) => Math.abs(l.yMid - yMid) <= yTol);
    if (ln) {
      ln.items.push(it);
      ln.fontSizes.push(it.fontSize);
      ln.yMid = (ln.yMid + yMid) / 2;
    } else {
      lines.push({ items: [it], yMid, fontSizes: [it.fontSize] });
    }
  }

  const out: PdfLine[] = [];
  for (const ln of lines) {
    const itemsX = stableSortBy(ln.items, (it) => it.x0n);
    const text = mergeLineText(itemsX, spacePx);
    if (!text) continue;

    let bb = mkBBoxFromItem(itemsX[0]);
    for (let i = 1; i < itemsX.length; i++) bb = bboxUnion(bb, mkBBoxFromItem(itemsX[i]));

    const fonts = ln.fontSizes.filter((n) => Number.isFinite(n) && n > 0).sort((a, b) => a - b);
    const rotatedCount = itemsX.filter((it) => Math.abs(it.rotationRad) > opts.maxRotationAbsRad).length;

    out.push({
      pageIndex,
      items: itemsX,
      text,
      bbox: bb,
      x0n: bb.x0,
      x1n: bb.x1,
      y0n: bb.y0,
      y1n: bb.y1,
      yMid: ln.yMid,
      fontSize: fonts.length ? median(fonts) : 0,
      rotatedFraction: rotatedCount / itemsX.length,
    });
  }

  // Order lines top-to-bottom.
  return out.sort((a, b) => a.yMid - b.yMid || a.x0n - b.x0n);
}

function medianLineGap(lines: PdfLine[]): number {
  const gaps: number[] = [];
  for (let i = 1; i < lines.length; i++) {
    const gap = lines[i].y0n - lines[i - 1].y1n;
    if (gap > 0) gaps.push(gap);
  }
  if (!gaps.length) return 0.02;
  gaps.sort((a, b) => a - b);
  return Math.max(0.005, median(gaps));
}

function isFontJump(a: number, b: number): boolean {
  if (!(a > 0) || !(b > 0)) return false;
  return Math.max(a, b) / Math.min(a, b) >= FONT_JUMP_RATIO;
}

export function linesToRawLines(pages: PdfPageLines[]): RawLine[] {
  const out: RawLine[] = [];
  for (const p of pages) {
    const gapLimit = medianLineGap(p.lines) * PARAGRAPH_GAP_RATIO;
    p.lines.forEach((line, i) => {
      if (i > 0) {
        const prev = p.lines[i - 1];
        if (line.y0n - prev.y1n > gapLimit || isFontJump(prev.fontSize, line.fontSize)) {
          out.push({ text: '', pageIndex: p.pageIndex });
        }
      }
      out.push({ text: line.text, pageIndex: p.pageIndex });
    });
  }
  return out;
}
