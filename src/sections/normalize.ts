// src/sections/normalize.ts
// Line Normalizer: raw extraction records -> cleaned Line sequence.
//
// Only whitespace and page-number artifacts are removed; every other line passes
// through (dehyphenated lines are joined, never dropped).

import type { Line, RawLine } from './types';

type Entry = {
  text: string;
  pageIndex: number;
  blankBefore: boolean;
};

const PAGE_NUMBER_PATTERNS: RegExp[] = [
  /^\d{1,4}$/,
  /^page\s+\d{1,4}$/i,
  /^[-–]\s*\d{1,4}\s*[-–]$/,
];

function cleanText(raw: string): string {
  return String(raw ?? '').replace(/\s+/g, ' ').trim();
}

function isPageNumberText(text: string): boolean {
  return PAGE_NUMBER_PATTERNS.some((re) => re.test(text));
}

// Isolated = blank line, page boundary or document edge on both sides.
function isIsolated(raw: RawLine[], cleaned: string[], i: number): boolean {
  const prevOk = i === 0 || !cleaned[i - 1] || raw[i - 1].pageIndex !== raw[i].pageIndex;
  const nextOk = i === raw.length - 1 || !cleaned[i + 1] || raw[i + 1].pageIndex !== raw[i].pageIndex;
  return prevOk && nextOk;
}

function startsLowercase(text: string): boolean {
  const ch = text.charAt(0);
  return /\p{L}/u.test(ch) && ch === ch.toLowerCase() && ch !== ch.toUpperCase();
}

function dehyphenate(entries: Entry[]): Entry[] {
  const out: Entry[] = [];
  for (const e of entries) {
    const prev = out[out.length - 1];
    const joinable = prev
      && /\p{L}-$/u.test(prev.text)
      && startsLowercase(e.text)
      && (!e.blankBefore || e.pageIndex !== prev.pageIndex);
    if (prev && joinable) {
      prev.text = prev.text.slice(0, -1) + e.text;
      continue;
    }
    out.push({ ...e });
  }
  return out;
}

export function normalizeLines(raw: readonly RawLine[]): Line[] {
  const records = raw.slice();
  const cleaned = records.map((r) => cleanText(r.text));

  const entries: Entry[] = [];
  let pendingBlank = false;
  for (let i = 0; i < records.length; i++) {
    const text = cleaned[i];
    if (!text) {
      pendingBlank = true;
      continue;
    }
    if (isPageNumberText(text) && isIsolated(records, cleaned, i)) {
      pendingBlank = true;
      continue;
    }
    entries.push({ text, pageIndex: records[i].pageIndex, blankBefore: pendingBlank });
    pendingBlank = false;
  }

  return dehyphenate(entries).map((e) => Object.freeze({ ...e }));
}
