import { readFileSync } from 'node:fs';

import type { RawLine } from '../src/sections/types';
import { textToRawLines } from '../src/source';

// Single-page records; '' is a blank line.
export function rawLines(...texts: string[]): RawLine[] {
  return texts.map((text) => ({ text, pageIndex: 0 }));
}

export function fixturePath(name: string): URL {
  return new URL(`./fixtures/${name}`, import.meta.url);
}

export function loadFixtureLines(name: string): RawLine[] {
  return textToRawLines(readFileSync(fixturePath(name), 'utf8'));
}

export function words(n: number, stem = 'word'): string {
  return Array.from({ length: n }, (_, i) => `${stem}${i + 1}`).join(' ');
}
