import { describe, expect, it } from 'vitest';

import { buildSectionMap, expandRequestKeys, isRequestKey, resolveSectionRequest } from '../src/sections/section-map';
import { segmentDocument } from '../src/sections/pipeline';
import type { SectionSpan, VirtualSection } from '../src/sections/types';
import { rawLines } from './helpers';

const spans: SectionSpan[] = [
  { name: 'results', startLine: 6, endLine: 9, text: 'Results text' },
  { name: 'abstract', startLine: 1, endLine: 6, text: 'Abstract text' },
];

const virtuals: VirtualSection[] = [
  { name: 'contribution', text: 'We propose things.', span: null, lowConfidence: false },
  { name: 'title', text: 'A Title', span: { startLine: 0, endLine: 1 }, lowConfidence: false },
];

describe('buildSectionMap', () => {
  it('orders entries canonically regardless of input order', () => {
    const map = buildSectionMap(spans, virtuals);
    expect([...map.keys()]).toEqual(['title', 'abstract', 'results', 'contribution']);
    expect(map.get('abstract')).toEqual({
      name: 'abstract',
      text: 'Abstract text',
      origin: 'heading',
      span: { startLine: 1, endLine: 6 },
      lowConfidence: false,
    });
    expect(map.get('contribution')?.origin).toBe('virtual');
    expect(map.get('contribution')?.span).toBeNull();
  });

  it('freezes entries', () => {
    const map = buildSectionMap(spans, virtuals);
    expect(Object.isFrozen(map.get('title'))).toBe(true);
  });
});

describe('expandRequestKeys', () => {
  it('expands "all" to the names present and removes duplicates', () => {
    const map = buildSectionMap(spans, virtuals);
    expect(expandRequestKeys(['results', 'all', 'summary', 'abstract'], map)).toEqual([
      'results',
      'title',
      'abstract',
      'contribution',
      'summary',
    ]);
  });
});

describe('isRequestKey', () => {
  it('accepts canonical names, summary and all', () => {
    expect(['title', 'literature_review', 'summary', 'all'].every(isRequestKey)).toBe(true);
    expect(isRequestKey('acknowledgements')).toBe(false);
  });
});

describe('resolveSectionRequest', () => {
  const result = segmentDocument(rawLines(
    'A Small Paper',
    '',
    'Abstract',
    'This abstract has enough words to count as real content.',
    '',
    'References',
    '[1] Some reference entry with a handful of words.',
  ));

  it('returns found entries, the whole-document summary and not-found markers', () => {
    const [abstract, summary, method] = resolveSectionRequest(result, ['abstract', 'summary', 'method']);

    expect(abstract).toEqual({
      key: 'abstract',
      status: 'found',
      text: 'This abstract has enough words to count as real content.',
      entry: result.sections.get('abstract'),
    });
    expect(summary).toEqual({ key: 'summary', status: 'found', text: result.documentText, entry: null });
    expect(method).toEqual({ key: 'method', status: 'SECTION_NOT_FOUND' });
  });

  it('expands "all" to exactly the present names', () => {
    expect(resolveSectionRequest(result, ['all']).map((r) => r.key)).toEqual(['title', 'abstract', 'contribution', 'references']);
  });
});
