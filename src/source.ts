// src/source.ts
// Input documents -> RawLine records. PDFs go through pdfjs-dist, anything else is read as text.

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { extractPdfLines } from './pdf';
import type { PdfExtractOptions } from './pdf';
import type { RawLine } from './sections/types';

// Form feeds separate pages, the way pdftotext writes them.
export function textToRawLines(text: string): RawLine[] {
  const out: RawLine[] = [];
  text.split('\f').forEach((page, pageIndex) => {
    for (const line of page.split(/\r?\n/)) out.push({ text: line, pageIndex });
  });
  return out;
}

export function isPdfPath(path: string): boolean {
  return extname(path).toLowerCase() === '.pdf';
}

export async function readDocumentLines(path: string, opts?: PdfExtractOptions): Promise<RawLine[]> {
  if (isPdfPath(path)) {
    const data = await readFile(path);
    return await extractPdfLines(new Uint8Array(data), opts);
  }
  return textToRawLines(await readFile(path, 'utf8'));
}
