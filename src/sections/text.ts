// src/sections/text.ts
// Small, deterministic text helpers shared by the segmentation stages.

import type { Line } from './types';

export function countWords(text: string): number {
  const t = text.trim();
  if (!t) return 0;
  return t.split(/\s+/).length;
}

export type LetterCase = 'upper' | 'title' | 'sentence' | 'lower' | 'none';

// Words shorter than four letters ("and", "of", "for") are ignored for title case.
export function letterCase(text: string): LetterCase {
  const letters = text.replace(/[^\p{L}]+/gu, '');
  if (!letters) return 'none';
  if (letters.length >= 2 && letters === letters.toUpperCase() && letters !== letters.toLowerCase()) return 'upper';

  const first = letters.charAt(0);
  if (first === first.toLowerCase()) return 'lower';

  const words = text.split(/\s+/).map((w) => w.replace(/^[^\p{L}]+/u, '')).filter((w) => w.length >= 4);
  const titled = words.every((w) => {
    const c = w.charAt(0);
    return c !== c.toLowerCase();
  });
  return titled ? 'title' : 'sentence';
}

export function isAllCaps(text: string): boolean {
  return letterCase(text) === 'upper';
}

// Paragraph breaks survive as blank lines.
export function joinLines(lines: readonly Line[]): string {
  let out = '';
  lines.forEach((line, i) => {
    if (i > 0) out += line.blankBefore ? '\n\n' : '\n';
    out += line.text;
  });
  return out;
}
