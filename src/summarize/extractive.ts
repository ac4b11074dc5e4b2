// src/summarize/extractive.ts
// Local extractive summarizer: word-frequency sentence scoring, no model download.
//
// Text is cut into sentence-aligned chunks (at most maxChunkLength chars each);
// every chunk is summarized on its own and the chunk summaries are joined with a space.

import { readFileSync } from 'node:fs';

import { splitSentences } from '../sections/sentences';

export type SummaryLengthBounds = {
  /** Words the summary should reach when the text allows it. */
  minLength: number;
  /** Words the summary never exceeds (per chunk). */
  maxLength: number;
};

export interface Summarizer {
  summarize(text: string, bounds: SummaryLengthBounds): Promise<string>;
}

export type SummarizationErrorCode = 'EMPTY_INPUT' | 'INVALID_LENGTH';

export class SummarizationError extends Error {
  readonly code: SummarizationErrorCode;

  constructor(code: SummarizationErrorCode, message: string) {
    super(message);
    this.name = 'SummarizationError';
    this.code = code;
  }
}

export type ExtractiveSummarizerOptions = {
  maxChunkLength?: number;
  stopwords?: ReadonlySet<string>;
};

const DEFAULT_MAX_CHUNK_LENGTH = 1024;

let defaultStopwords: ReadonlySet<string> | null = null;

export function loadDefaultStopwords(): ReadonlySet<string> {
  if (defaultStopwords) return defaultStopwords;
  const parsed: unknown = JSON.parse(readFileSync(new URL('./stopwords.json', import.meta.url), 'utf8'));
  const words = Array.isArray(parsed) ? parsed.filter((w): w is string => typeof w === 'string') : [];
  defaultStopwords = new Set(words.map((w) => w.toLowerCase()));
  return defaultStopwords;
}

const WORD_RE = /\p{L}[\p{L}\p{N}'’-]*/gu;

function words(text: string): string[] {
  return text.toLowerCase().match(WORD_RE) ?? [];
}

function wordCount(text: string): number {
  const t = text.trim();
  return t ? t.split(/\s+/).length : 0;
}

// Sentences are never split across chunks; an overlong sentence is a chunk of its own.
export function chunkSentences(sentences: readonly string[], maxChunkLength: number): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [];
  let length = 0;
  for (const s of sentences) {
    const added = current.length ? s.length + 1 : s.length;
    if (current.length && length + added > maxChunkLength) {
      chunks.push(current);
      current = [];
      length = 0;
    }
    length += current.length ? s.length + 1 : s.length;
    current.push(s);
  }
  if (current.length) chunks.push(current);
  return chunks;
}

function truncateWords(text: string, max: number): string {
  return text.trim().split(/\s+/).slice(0, max).join(' ');
}

export class ExtractiveSummarizer implements Summarizer {
  private readonly maxChunkLength: number;
  private readonly stopwords: ReadonlySet<string>;

  constructor(opts: ExtractiveSummarizerOptions = {}) {
    this.maxChunkLength = opts.maxChunkLength ?? DEFAULT_MAX_CHUNK_LENGTH;
    this.stopwords = opts.stopwords ?? loadDefaultStopwords();
  }

  async summarize(text: string, bounds: SummaryLengthBounds): Promise<string> {
    const { minLength, maxLength } = bounds;
    if (!Number.isInteger(minLength) || !Number.isInteger(maxLength) || minLength < 1 || minLength > maxLength) {
      throw new SummarizationError('INVALID_LENGTH', `Invalid summary bounds: min ${minLength}, max ${maxLength}`);
    }
    const sentences = splitSentences(text);
    if (!sentences.length) throw new SummarizationError('EMPTY_INPUT', 'Nothing to summarize');

    return chunkSentences(sentences, this.maxChunkLength)
      .map((chunk) => this.summarizeChunk(chunk, bounds))
      .join(' ');
  }

  /** Relative frequency (0..1] of every content word in the chunk. */
  private frequencies(sentences: readonly string[]): Map<string, number> {
    const freq = new Map<string, number>();
    for (const s of sentences) {
      for (const w of words(s)) {
        if (this.stopwords.has(w)) continue;
        freq.set(w, (freq.get(w) ?? 0) + 1);
      }
    }
    const top = Math.max(0, ...freq.values());
    if (top > 0) {
      for (const [w, n] of freq) freq.set(w, n / top);
    }
    return freq;
  }

  private summarizeChunk(sentences: readonly string[], bounds: SummaryLengthBounds): string {
    const freq = this.frequencies(sentences);
    const scored = sentences.map((text, index) => {
      const content = words(text).filter((w) => !this.stopwords.has(w));
      const total = content.reduce((acc, w) => acc + (freq.get(w) ?? 0), 0);
      return { index, text, words: wordCount(text), score: content.length ? total / content.length : 0 };
    });

    const ranked = scored.slice().sort((a, b) => (b.score - a.score) || (a.index - b.index));
    const picked: typeof scored = [];
    let total = 0;
    for (const s of ranked) {
      if (total >= bounds.minLength) break;
      if (total + s.words > bounds.maxLength) continue;
      picked.push(s);
      total += s.words;
    }

    if (!picked.length) return truncateWords(ranked[0].text, bounds.maxLength);
    return picked
      .sort((a, b) => a.index - b.index)
      .map((s) => s.text)
      .join(' ');
  }
}
