// src/sections/resolve.ts
// Boundary Resolver: ordered candidates -> name-unique, contiguous section spans.
//
// Selection is a stateless score-and-max-by over each name's candidates:
// - a candidate owns the words between it and the next candidate of any name
// - candidates owning fewer than `minContentGapWords` are rejected (TOC runs, stacked false headings)
// - per name, the candidate owning the most content wins; ties go to the later occurrence

import type { SegmenterConfig } from './config';
import { countWords, joinLines } from './text';
import type { Candidate, CanonicalSectionName, Line, SectionSpan, SegmentationDiagnostic } from './types';

type ScoredCandidate = {
  candidate: Candidate;
  contentWords: number;
};

export type ResolvedSpans = {
  spans: SectionSpan[];
  diagnostics: SegmentationDiagnostic[];
};

function wordsBetween(lines: readonly Line[], start: number, end: number): number {
  let n = 0;
  for (let i = start; i < end; i++) n += countWords(lines[i].text);
  return n;
}

function pickBest(group: ScoredCandidate[]): ScoredCandidate {
  return group.reduce((best, s) => {
    if (s.contentWords > best.contentWords) return s;
    if (s.contentWords === best.contentWords && s.candidate.lineIndex > best.candidate.lineIndex) return s;
    return best;
  });
}

function ambiguity(name: CanonicalSectionName, group: ScoredCandidate[], chosen: ScoredCandidate): SegmentationDiagnostic {
  const candidateLines = group.map((s) => s.candidate.lineIndex);
  const tie = group.some((s) => s !== chosen && s.contentWords === chosen.contentWords);
  return {
    code: 'AMBIGUOUS_HEADING',
    name,
    chosenLine: chosen.candidate.lineIndex,
    candidateLines,
    tie,
    message: `${group.length} "${name}" headings at lines ${candidateLines.join(', ')}; kept line ${chosen.candidate.lineIndex}${tie ? ' (tie, later occurrence)' : ''}`,
  };
}

export function resolveSectionSpans(
  candidates: readonly Candidate[],
  lines: readonly Line[],
  config: SegmenterConfig
): ResolvedSpans {
  const ordered = candidates
    .filter((c) => c.lineIndex >= 0 && c.lineIndex < lines.length)
    .slice()
    .sort((a, b) => a.lineIndex - b.lineIndex);

  const scored: ScoredCandidate[] = ordered.map((candidate, k) => {
    const next = k + 1 < ordered.length ? ordered[k + 1].lineIndex : lines.length;
    return { candidate, contentWords: wordsBetween(lines, candidate.lineIndex + 1, next) };
  });

  const groups = new Map<CanonicalSectionName, ScoredCandidate[]>();
  for (const s of scored) {
    if (s.contentWords < config.minContentGapWords) continue;
    const group = groups.get(s.candidate.canonicalName) ?? [];
    group.push(s);
    groups.set(s.candidate.canonicalName, group);
  }

  const diagnostics: SegmentationDiagnostic[] = [];
  const survivors: Candidate[] = [];
  for (const [name, group] of groups) {
    const chosen = pickBest(group);
    survivors.push(chosen.candidate);
    if (group.length > 1) diagnostics.push(ambiguity(name, group, chosen));
  }
  survivors.sort((a, b) => a.lineIndex - b.lineIndex);

  const spans: SectionSpan[] = [];
  const headingLines: number[] = [];
  // Start line inherited from an empty (false-positive) heading just before.
  let carriedStart: number | null = null;

  for (let k = 0; k < survivors.length; k++) {
    const c = survivors[k];
    const endLine = k + 1 < survivors.length ? survivors[k + 1].lineIndex : lines.length;
    const text = joinLines(lines.slice(c.lineIndex + 1, endLine));
    const startLine: number = carriedStart ?? c.lineIndex;
    if (!text.trim()) {
      carriedStart = startLine;
      continue;
    }
    carriedStart = null;
    spans.push({ name: c.canonicalName, startLine, endLine, text });
    headingLines.push(c.lineIndex);
  }

  // Trailing empty heading(s): the last real span runs to the end of the document.
  const last = spans[spans.length - 1];
  if (carriedStart !== null && last) {
    const heading = headingLines[headingLines.length - 1];
    spans[spans.length - 1] = {
      ...last,
      endLine: lines.length,
      text: joinLines(lines.slice(heading + 1, lines.length)),
    };
  }

  return { spans, diagnostics };
}
