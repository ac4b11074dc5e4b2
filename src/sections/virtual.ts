// src/sections/virtual.ts
// Virtual Section Extractor: sections that never carry a heading.
//
// - title: longest clean run of lines above the first heading candidate
// - contribution: cue-phrase sentences from the abstract/introduction
//
// Both are total over any non-empty line sequence.

import type { SegmenterConfig } from './config';
import { SegmentationError } from './errors';
import { splitSentences } from './sentences';
import { isAllCaps, joinLines } from './text';
import type { Candidate, Line, LineRange, SectionSpan, VirtualSection } from './types';

// Short, all-caps lines recurring verbatim on several pages (journal name, running title).
export function detectRunningHeaders(lines: readonly Line[], config: SegmenterConfig): Set<string> {
  const pagesByText = new Map<string, Set<number>>();
  for (const l of lines) {
    if (l.text.length > config.runningHeaderMaxLength) continue;
    if (!isAllCaps(l.text)) continue;
    const pages = pagesByText.get(l.text) ?? new Set<number>();
    pages.add(l.pageIndex);
    pagesByText.set(l.text, pages);
  }

  const out = new Set<string>();
  for (const [text, pages] of pagesByText) {
    if (pages.size >= config.runningHeaderMinPages) out.add(text);
  }
  return out;
}

const compiledPatterns = new WeakMap<readonly string[], RegExp[]>();

function metadataRegexes(config: SegmenterConfig): RegExp[] {
  const cached = compiledPatterns.get(config.metadataPatterns);
  if (cached) return cached;
  const compiled = config.metadataPatterns.map((src) => new RegExp(src, 'iu'));
  compiledPatterns.set(config.metadataPatterns, compiled);
  return compiled;
}

const AUTHOR_LIST_MAX_LENGTH = 160;
const FOOTNOTE_MARKS = '\\d*†‡§¶,';
const NAME_WORD_RE = new RegExp(`^\\p{Lu}[\\p{L}'’.-]*[${FOOTNOTE_MARKS}]*$`, 'u');
const MARKER_ONLY_RE = new RegExp(`^[${FOOTNOTE_MARKS}]+$`, 'u');
const INITIAL_RE = /^\p{Lu}\.$/u;
const MARKER_RE = /[\d†‡§¶*]/u;

// Lowercased words that put a short capitalized line in a title rather than a byline.
const TITLE_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'of', 'for', 'in', 'on', 'at', 'to', 'into', 'with',
  'without', 'from', 'by', 'via', 'as', 'over', 'under', 'towards', 'toward', 'beyond', 'using',
]);

// "Neural Networks and Deep Learning": joined by "and"/"&" only, no comma, marker or initial.
function isPlainConjunction(text: string): boolean {
  if (text.includes(',') || MARKER_RE.test(text)) return false;
  return !text.split(/\s+/).some((w) => INITIAL_RE.test(w));
}

// A lone "Jane Doe" directly under a title line.
function isSingleAuthorLine(text: string): boolean {
  const words = text.trim().split(/\s+/).filter((w) => !MARKER_ONLY_RE.test(w));
  if (words.length < 2 || words.length > 3) return false;
  return words.every((w) => NAME_WORD_RE.test(w) && !TITLE_WORDS.has(w.toLowerCase()));
}

function isAuthorList(text: string, firstLine: boolean): boolean {
  const t = text.trim();
  if (!t || t.length > AUTHOR_LIST_MAX_LENGTH || t.endsWith('.')) return false;

  const parts = t
    .split(/\s*,\s*|\s+and\s+|\s*&\s*/u)
    .map((p) => p.trim())
    .filter(Boolean);
  if (parts.length < 2) return false;
  if (firstLine && isPlainConjunction(t)) return false;

  let multiWord = 0;
  for (const part of parts) {
    const words = part.split(/\s+/).filter((w) => !MARKER_ONLY_RE.test(w));
    if (words.length < 1 || words.length > 4) return false;
    if (!words.every((w) => NAME_WORD_RE.test(w))) return false;
    if (words.length >= 2) multiWord++;
  }
  // "Vision, Language and Action" is a title, "J. Doe, A. Roe" is not.
  return multiWord * 2 >= parts.length;
}

export type AuthorLineContext = {
  /** The line opens the document, where a title is more likely than a byline. */
  firstLine?: boolean;
};

export function isAuthorMetadataLine(text: string, config: SegmenterConfig, context: AuthorLineContext = {}): boolean {
  if (text.includes('@')) return true;
  if (metadataRegexes(config).some((re) => re.test(text))) return true;
  return isAuthorList(text, context.firstLine ?? false);
}

function runText(lines: readonly Line[], range: LineRange): string {
  return lines
    .slice(range.startLine, range.endLine)
    .map((l) => l.text)
    .join(' ');
}

export function extractTitle(
  lines: readonly Line[],
  spans: readonly SectionSpan[],
  config: SegmenterConfig,
  candidates: readonly Candidate[] = []
): VirtualSection {
  if (!lines.length) throw new SegmentationError('EMPTY_INPUT', 'Cannot extract a title from an empty document');

  const firstLine: VirtualSection = {
    name: 'title',
    text: lines[0].text,
    span: { startLine: 0, endLine: 1 },
    lowConfidence: false,
  };
  if (!spans.length) return firstLine;

  // Rejected candidates (a losing duplicate, a TOC entry) still end the title region.
  const headingLines = new Set([...candidates.map((c) => c.lineIndex), ...spans.map((s) => s.startLine)]);
  const end = Math.min(...headingLines);
  const running = detectRunningHeaders(lines, config);
  const isMetadata = (i: number) => isAuthorMetadataLine(lines[i].text, config, { firstLine: i === 0 });

  const runs: LineRange[] = [];
  let current: LineRange | null = null;
  let fallback: number | null = null;
  for (let i = 0; i < end; i++) {
    const line = lines[i];
    if (isMetadata(i)) {
      current = null;
      continue;
    }
    if (fallback === null) fallback = i;
    if (running.has(line.text)) {
      current = null;
      continue;
    }
    if (current && !line.blankBefore) {
      if (isSingleAuthorLine(line.text)) {
        current = null;
        continue;
      }
      current.endLine = i + 1;
    } else {
      current = { startLine: i, endLine: i + 1 };
      runs.push(current);
    }
  }

  // Longest by line count; reduce keeps the earliest on ties.
  const best = runs.reduce<LineRange | null>((acc, r) => {
    if (!acc) return r;
    return r.endLine - r.startLine > acc.endLine - acc.startLine ? r : acc;
  }, null);

  if (best) {
    return { name: 'title', text: runText(lines, best), span: { ...best }, lowConfidence: false };
  }
  if (fallback !== null) {
    return {
      name: 'title',
      text: lines[fallback].text,
      span: { startLine: fallback, endLine: fallback + 1 },
      lowConfidence: false,
    };
  }

  // Nothing precedes the first heading: first body line, flagged.
  const body = lines.findIndex((l, i) => !headingLines.has(i) && !running.has(l.text) && !isMetadata(i));
  const at = body >= 0 ? body : 0;
  return {
    name: 'title',
    text: lines[at].text,
    span: { startLine: at, endLine: at + 1 },
    lowConfidence: true,
  };
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function cueMatchers(phrases: readonly string[]): RegExp[] {
  return phrases
    .map((p) => p.trim().replace(/\s+/g, ' '))
    .filter(Boolean)
    .map((p) => new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(p).replace(/ /g, '\\s+')}(?![\\p{L}\\p{N}])`, 'iu'));
}

function contributionScope(lines: readonly Line[], spans: readonly SectionSpan[], config: SegmenterConfig): string[] {
  const scoped = spans.filter((s) => s.name === 'abstract' || s.name === 'introduction');
  if (scoped.length) return scoped.map((s) => s.text);
  const n = Math.max(1, Math.ceil(lines.length * config.contributionScopeFraction));
  return [joinLines(lines.slice(0, n))];
}

// Absent (null) when no heading was resolved, or nothing matched and there is no abstract.
export function extractContribution(
  lines: readonly Line[],
  spans: readonly SectionSpan[],
  config: SegmenterConfig
): VirtualSection | null {
  if (!spans.length) return null;

  const matchers = cueMatchers(config.cuePhrases);
  const sentences = contributionScope(lines, spans, config).flatMap(splitSentences);

  const seen = new Set<string>();
  const kept: string[] = [];
  for (const s of sentences) {
    if (seen.has(s)) continue;
    if (!matchers.some((re) => re.test(s))) continue;
    seen.add(s);
    kept.push(s);
  }

  if (kept.length) {
    return { name: 'contribution', text: kept.join(config.contributionSeparator), span: null, lowConfidence: false };
  }

  const abstract = spans.find((s) => s.name === 'abstract');
  if (!abstract) return null;
  const lead = splitSentences(abstract.text).slice(0, 2);
  if (!lead.length) return null;
  return { name: 'contribution', text: lead.join(config.contributionSeparator), span: null, lowConfidence: true };
}
