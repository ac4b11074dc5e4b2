// src/sections/detect.ts
// Heading Candidate Detector: flags lines that plausibly are a canonical section heading.

import { matchAlias } from './aliases';
import type { SegmenterConfig } from './config';
import { letterCase } from './text';
import type { Candidate, Line } from './types';

const MATCH_WEIGHT = 0.6;
const FORMAT_WEIGHT = 0.4;

// Formatting strength: ALL CAPS > Title Case > Sentence case > lowercase.
export function scoreHeadingFormat(text: string): number {
  switch (letterCase(text)) {
    case 'upper':
      return 1;
    case 'title':
      return 0.8;
    case 'sentence':
      return 0.5;
    default:
      return 0;
  }
}

function startsBlock(lines: readonly Line[], i: number): boolean {
  if (i === 0) return true;
  const line = lines[i];
  return line.blankBefore || lines[i - 1].pageIndex !== line.pageIndex;
}

export function detectHeadingCandidates(lines: readonly Line[], config: SegmenterConfig): Candidate[] {
  const out: Candidate[] = [];

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i].text;
    if (text.length > config.maxHeadingLength) continue;
    if (!startsBlock(lines, i)) continue;
    if (/[.,;]$/.test(text)) continue;

    const match = matchAlias(text, config.aliases);
    if (!match) continue;

    const exactness = match.exact ? 1 : 0.5;
    const confidence = MATCH_WEIGHT * exactness + FORMAT_WEIGHT * scoreHeadingFormat(text);
    if (confidence < config.minConfidence) continue;

    out.push({
      lineIndex: i,
      canonicalName: match.canonicalName,
      confidence: Math.round(confidence * 1000) / 1000,
      matchedAlias: match.alias,
      exact: match.exact,
    });
  }

  return out;
}
