import { describe, expect, it } from 'vitest';

import { DEFAULT_SEGMENTER_CONFIG } from '../src/sections/config';
import { normalizeLines } from '../src/sections/normalize';
import type { Candidate, Line, SectionSpan } from '../src/sections/types';
import {
  detectRunningHeaders,
  extractContribution,
  extractTitle,
  isAuthorMetadataLine,
} from '../src/sections/virtual';
import { rawLines } from './helpers';

const config = DEFAULT_SEGMENTER_CONFIG;

function line(text: string, pageIndex = 0, blankBefore = false): Line {
  return { text, pageIndex, blankBefore };
}

function span(name: SectionSpan['name'], startLine: number, endLine: number, text: string): SectionSpan {
  return { name, startLine, endLine, text };
}

function candidate(name: Candidate['canonicalName'], lineIndex: number): Candidate {
  return { lineIndex, canonicalName: name, confidence: 0.92, matchedAlias: name, exact: true };
}

describe('detectRunningHeaders', () => {
  it('finds short all-caps lines repeated on several pages', () => {
    const lines = [
      line('JOURNAL OF TESTS', 0),
      line('Body a', 0),
      line('JOURNAL OF TESTS', 1),
      line('INTRODUCTION', 1),
    ];
    expect(detectRunningHeaders(lines, config)).toEqual(new Set(['JOURNAL OF TESTS']));
  });

  it('needs the configured number of distinct pages', () => {
    const lines = [line('JOURNAL OF TESTS', 0), line('JOURNAL OF TESTS', 1)];
    expect(detectRunningHeaders(lines, { ...config, runningHeaderMinPages: 3 }).size).toBe(0);
  });
});

describe('isAuthorMetadataLine', () => {
  it('flags e-mail, affiliation and preprint lines', () => {
    expect(isAuthorMetadataLine('jane@example.com', config)).toBe(true);
    expect(isAuthorMetadataLine('Department of Computer Science, Test University', config)).toBe(true);
    expect(isAuthorMetadataLine('arXiv:2401.00001v1 [cs.CL] 1 Jan 2024', config)).toBe(true);
  });

  it('flags author lists', () => {
    expect(isAuthorMetadataLine('Jane Doe, John Smith', config)).toBe(true);
    expect(isAuthorMetadataLine('J. Doe and A. B. Roe', config)).toBe(true);
    expect(isAuthorMetadataLine('Jane Doe1, John Smith2*', config)).toBe(true);
  });

  it('leaves titles and sentences alone', () => {
    expect(isAuthorMetadataLine('Deep Learning for X', config)).toBe(false);
    expect(isAuthorMetadataLine('Vision, Language and Action', config)).toBe(false);
    expect(isAuthorMetadataLine('We thank Jane Doe, John Smith.', config)).toBe(false);
  });

  it('reads an "and" title on the first line as a title', () => {
    expect(isAuthorMetadataLine('Neural Networks and Deep Learning', config, { firstLine: true })).toBe(false);
    expect(isAuthorMetadataLine('Neural Networks and Deep Learning', config)).toBe(true);
    expect(isAuthorMetadataLine('J. Doe and A. Roe', config, { firstLine: true })).toBe(true);
  });
});

describe('extractTitle', () => {
  it('skips author and e-mail lines above the first heading', () => {
    const lines = normalizeLines(rawLines(
      'Deep Learning for X',
      'Jane Doe, John Smith',
      'jane@example.com',
      '',
      'Abstract',
      'This abstract has enough words to count as content here.',
    ));
    const spans = [span('abstract', 3, 5, lines[4].text)];

    expect(extractTitle(lines, spans, config)).toEqual({
      name: 'title',
      text: 'Deep Learning for X',
      span: { startLine: 0, endLine: 1 },
      lowConfidence: false,
    });
  });

  it('joins a multi-line title and skips running headers', () => {
    const lines = [
      line('JOURNAL OF TESTS', 0),
      line('Segmenting Papers', 0),
      line('Into Sections', 0),
      line('Jane Doe, John Smith', 0, true),
      line('Abstract', 0, true),
      line('Body', 0),
      line('JOURNAL OF TESTS', 1),
    ];
    const title = extractTitle(lines, [span('abstract', 4, 7, 'Body\nJOURNAL OF TESTS')], config);
    expect(title.text).toBe('Segmenting Papers Into Sections');
    expect(title.span).toEqual({ startLine: 1, endLine: 3 });
  });

  it('prefers the earliest of equally long runs', () => {
    const lines = [line('First Run Line'), line('Second Line', 0, true), line('Abstract', 0, true), line('Body')];
    expect(extractTitle(lines, [span('abstract', 2, 4, 'Body')], config).text).toBe('First Run Line');
  });

  it('keeps a title with "and" and drops a lone author name under it', () => {
    const lines = normalizeLines(rawLines(
      'Neural Networks and Deep Learning',
      'Jane Doe',
      '',
      'Abstract',
      'This abstract has enough words to count as content here.',
    ));
    const spans = [span('abstract', 2, 4, lines[3].text)];

    expect(extractTitle(lines, spans, config)).toEqual({
      name: 'title',
      text: 'Neural Networks and Deep Learning',
      span: { startLine: 0, endLine: 1 },
      lowConfidence: false,
    });
  });

  it('ends the title region at the first candidate, resolved or not', () => {
    const lines = [
      line('Paper Title'),
      line('Abstract', 0, true),
      line('Too short.'),
      line('Introduction', 0, true),
      line('Enough words follow this heading to count as content.'),
    ];
    const spans = [span('introduction', 3, 5, lines[4].text)];
    const candidates = [candidate('abstract', 1), candidate('introduction', 3)];

    expect(extractTitle(lines, spans, config, candidates).text).toBe('Paper Title');
  });

  it('flags the first body line when a heading opens the document', () => {
    const lines = [
      line('Abstract'),
      line('Body text of the abstract'),
      line('Introduction', 0, true),
      line('More body'),
    ];
    const spans = [span('abstract', 0, 2, lines[1].text), span('introduction', 2, 4, lines[3].text)];

    expect(extractTitle(lines, spans, config, [candidate('abstract', 0), candidate('introduction', 2)])).toEqual({
      name: 'title',
      text: 'Body text of the abstract',
      span: { startLine: 1, endLine: 2 },
      lowConfidence: true,
    });
  });

  it('uses the first line when no heading was resolved', () => {
    const lines = [line('Just some notes'), line('without structure.')];
    expect(extractTitle(lines, [], config).text).toBe('Just some notes');
  });

  it('falls back to the first non-metadata line', () => {
    const lines = [
      line('jane@example.com', 0),
      line('RUNNING TITLE', 0),
      line('Abstract', 0, true),
      line('Body', 0),
      line('RUNNING TITLE', 1),
    ];
    expect(extractTitle(lines, [span('abstract', 2, 5, 'Body\nRUNNING TITLE')], config).text).toBe('RUNNING TITLE');
  });
});

describe('extractContribution', () => {
  const lines = [line('Paper'), line('Abstract', 0, true), line('Body')];

  it('keeps only cue-phrase sentences', () => {
    const abstract = 'Sequence models are widely used. In this work, we propose a novel method for Y. Experiments confirm the gains.';
    expect(extractContribution(lines, [span('abstract', 1, 3, abstract)], config)).toEqual({
      name: 'contribution',
      text: 'In this work, we propose a novel method for Y.',
      span: null,
      lowConfidence: false,
    });
  });

  it('scans abstract and introduction, dropping repeats', () => {
    const spans = [
      span('abstract', 1, 2, 'We propose a parser. It is fast.'),
      span('introduction', 2, 3, 'We propose a parser. Our contributions are listed below.'),
    ];
    const result = extractContribution(lines, spans, { ...config, contributionSeparator: ' | ' });
    expect(result?.text).toBe('We propose a parser. | Our contributions are listed below.');
  });

  it('falls back to the first two abstract sentences with low confidence', () => {
    const abstract = 'The first sentence. The second sentence. The third sentence.';
    const result = extractContribution(lines, [span('abstract', 1, 3, abstract)], config);
    expect(result).toEqual({
      name: 'contribution',
      text: 'The first sentence. The second sentence.',
      span: null,
      lowConfidence: true,
    });
  });

  it('is absent without cues and without an abstract', () => {
    expect(extractContribution(lines, [span('introduction', 1, 3, 'Nothing to see here.')], config)).toBeNull();
  });

  it('is absent when no heading was resolved', () => {
    expect(extractContribution([line('We propose a thing.')], [], config)).toBeNull();
  });

  it('scans the leading share of the document without abstract or introduction', () => {
    const doc = [
      line('Tools matter.'),
      line('We introduce a tool for parsing.'),
      line('References', 0, true),
      line('Ref one.'),
      line('In this paper we cite things.'),
    ];
    const result = extractContribution(doc, [span('references', 2, 5, 'Ref one.\nIn this paper we cite things.')], config);
    expect(result?.text).toBe('We introduce a tool for parsing.');
  });
});
