import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  DEFAULT_SEGMENTER_CONFIG,
  SegmentationError,
  resolveSectionRequest,
  segmentDocument,
  segmentDocuments,
} from '../src/sections';
import { loadFixtureLines, rawLines, words } from './helpers';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('segmentDocument', () => {
  const paper = loadFixtureLines('sample-paper.txt');

  it('labels every section of a complete paper', () => {
    const result = segmentDocument(paper);

    expect([...result.sections.keys()]).toEqual([
      'title',
      'abstract',
      'introduction',
      'method',
      'results',
      'conclusion',
      'contribution',
      'literature_review',
      'references',
    ]);
    expect(result.spans.map((s) => [s.name, s.startLine, s.endLine])).toEqual([
      ['abstract', 6, 8],
      ['introduction', 8, 11],
      ['literature_review', 11, 13],
      ['method', 13, 15],
      ['results', 15, 17],
      ['conclusion', 17, 19],
      ['references', 19, 22],
    ]);
    expect(result.sections.get('title')?.text).toBe('Segmenting Research Papers Without Layout Information');
    expect(result.sections.get('contribution')?.text).toBe(
      'In this work, we propose a heuristic segmenter that recovers canonical sections.'
    );
    expect(result.sections.get('method')?.text).toBe(
      'Each line is normalized, then compared against a table of heading aliases. Candidates are scored by exactness and letter case, and duplicates are resolved by the amount of content that follows them.'
    );
  });

  it('produces ordered, non-overlapping spans', () => {
    const { spans, lines } = segmentDocument(paper);
    for (let i = 0; i < spans.length; i++) {
      expect(spans[i].startLine).toBeLessThan(spans[i].endLine);
      const next = spans[i + 1];
      expect(spans[i].endLine).toBe(next ? next.startLine : lines.length);
    }
    const title = segmentDocument(paper).sections.get('title')?.span;
    expect(title?.endLine).toBeLessThanOrEqual(spans[0].startLine);
  });

  it('is idempotent', () => {
    const first = JSON.stringify([...segmentDocument(paper).sections]);
    const second = JSON.stringify([...segmentDocument(paper).sections]);
    expect(second).toBe(first);
  });

  it('falls back to title and summary when there are no headings', () => {
    const result = segmentDocument(rawLines('Just some notes', 'without any structure at all.'));

    expect([...result.sections.keys()]).toEqual(['title']);
    expect(result.sections.get('title')?.text).toBe('Just some notes');
    expect(resolveSectionRequest(result, ['summary'])).toEqual([
      { key: 'summary', status: 'found', text: 'Just some notes\nwithout any structure at all.', entry: null },
    ]);
    expect(resolveSectionRequest(result, ['abstract', 'contribution'])).toEqual([
      { key: 'abstract', status: 'SECTION_NOT_FOUND' },
      { key: 'contribution', status: 'SECTION_NOT_FOUND' },
    ]);
  });

  it('throws EMPTY_INPUT when nothing survives normalization', () => {
    expect(() => segmentDocument([])).toThrow(SegmentationError);
    try {
      segmentDocument(rawLines('', '   ', '12'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SegmentationError);
      expect(err).toMatchObject({ code: 'EMPTY_INPUT' });
    }
  });

  it('passes diagnostics to the configured handler', () => {
    const onDiagnostic = vi.fn();
    const ten = words(10);
    const result = segmentDocument(rawLines('Paper', '', 'Results', ten, '', 'Results', ten), DEFAULT_SEGMENTER_CONFIG, {
      onDiagnostic,
    });

    expect(onDiagnostic).toHaveBeenCalledTimes(1);
    expect(onDiagnostic).toHaveBeenCalledWith(result.diagnostics[0]);
    expect(result.diagnostics[0].tie).toBe(true);
  });

  it('logs diagnostics at debug level by default', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const ten = words(10);
    segmentDocument(rawLines('Paper', '', 'Results', ten, '', 'Results', ten));

    expect(debug).toHaveBeenCalledWith(
      '[paper-sections][resolver] 2 "results" headings at lines 1, 3; kept line 3 (tie, later occurrence)',
      { code: 'AMBIGUOUS_HEADING', name: 'results' }
    );
  });

  it('segments with an alternate alias table', () => {
    const config = {
      ...DEFAULT_SEGMENTER_CONFIG,
      aliases: [
        { canonicalName: 'abstract' as const, patterns: ['zusammenfassung'] },
        { canonicalName: 'introduction' as const, patterns: ['einleitung'] },
        { canonicalName: 'references' as const, patterns: ['literatur'] },
      ],
    };
    const result = segmentDocument(rawLines(
      'Ein Titel',
      '',
      'Zusammenfassung',
      words(10),
      '',
      '1 Einleitung',
      words(10),
      '',
      'Literatur',
      words(10),
    ), config);

    expect([...result.sections.keys()]).toEqual(['title', 'abstract', 'introduction', 'contribution', 'references']);
    expect(result.sections.get('contribution')?.lowConfidence).toBe(true);
  });
});

describe('segmentDocument titles and duplicate headings', () => {
  it('keeps a real abstract when a later section is called Summary', () => {
    const result = segmentDocument(rawLines(
      'A Paper',
      '',
      'Abstract',
      words(20, 'abs'),
      '',
      'Introduction',
      words(30, 'intro'),
      '',
      'Summary',
      words(60, 'sum'),
      '',
      'References',
      '[1] Some reference entry with a handful of words.',
    ));

    expect([...result.sections.keys()]).toEqual(['title', 'abstract', 'introduction', 'contribution', 'references']);
    expect(result.sections.get('title')?.text).toBe('A Paper');
    expect(result.sections.get('abstract')?.text).toBe(words(20, 'abs'));
    expect(result.sections.get('introduction')?.span).toEqual({ startLine: 3, endLine: 7 });
  });

  it('does not take an unresolved heading and its body as the title', () => {
    const result = segmentDocument(rawLines('Paper Title', '', 'Abstract', 'Too short.', '', 'Introduction', words(20)));

    expect(result.spans.map((s) => s.name)).toEqual(['introduction']);
    expect(result.sections.get('title')?.text).toBe('Paper Title');
  });

  it('keeps a title containing "and" on a single-author paper', () => {
    const result = segmentDocument(rawLines('Neural Networks and Deep Learning', 'Jane Doe', '', 'Abstract', words(11)));
    expect(result.sections.get('title')?.text).toBe('Neural Networks and Deep Learning');
  });

  it('flags the title when the document opens with a heading', () => {
    const result = segmentDocument(rawLines('Abstract', words(10), '', 'Introduction', words(10)));
    expect(result.sections.get('title')).toMatchObject({ text: words(10), lowConfidence: true });
  });
});

describe('segmentDocuments', () => {
  it('segments each document independently', () => {
    const results = segmentDocuments([rawLines('First notes'), rawLines('Second notes')]);
    expect(results.map((r) => r.sections.get('title')?.text)).toEqual(['First notes', 'Second notes']);
  });
});
