// src/sections/section-map.ts
// Section Map Builder plus the request layer ("all" / "summary" expansion).

import { CANONICAL_SECTION_ORDER, isCanonicalSectionName } from './aliases';
import { SECTION_NOT_FOUND } from './errors';
import { joinLines } from './text';
import type {
  CanonicalSectionName,
  Line,
  RequestKey,
  SectionMap,
  SectionMapEntry,
  SectionRequestResult,
  SectionSpan,
  SegmentationResult,
  VirtualSection,
} from './types';

export function documentText(lines: readonly Line[]): string {
  return joinLines(lines);
}

// Insertion order is the canonical report order, never detection order.
export function buildSectionMap(spans: readonly SectionSpan[], virtuals: readonly VirtualSection[]): SectionMap {
  const byName = new Map<CanonicalSectionName, SectionMapEntry>();

  for (const s of spans) {
    const entry: SectionMapEntry = {
      name: s.name,
      text: s.text,
      origin: 'heading',
      span: Object.freeze({ startLine: s.startLine, endLine: s.endLine }),
      lowConfidence: false,
    };
    byName.set(s.name, Object.freeze(entry));
  }
  for (const v of virtuals) {
    if (byName.has(v.name)) continue;
    const entry: SectionMapEntry = {
      name: v.name,
      text: v.text,
      origin: 'virtual',
      span: v.span ? Object.freeze({ ...v.span }) : null,
      lowConfidence: v.lowConfidence,
    };
    byName.set(v.name, Object.freeze(entry));
  }

  const out = new Map<CanonicalSectionName, SectionMapEntry>();
  for (const name of CANONICAL_SECTION_ORDER) {
    const entry = byName.get(name);
    if (entry) out.set(name, entry);
  }
  return out;
}

export type ExpandedKey = CanonicalSectionName | 'summary';

export function isRequestKey(value: string): value is RequestKey {
  return value === 'summary' || value === 'all' || isCanonicalSectionName(value);
}

// "all" becomes every name present, in canonical order. First occurrence wins.
export function expandRequestKeys(keys: readonly RequestKey[], map: SectionMap): ExpandedKey[] {
  const out: ExpandedKey[] = [];
  const push = (k: ExpandedKey) => {
    if (!out.includes(k)) out.push(k);
  };
  for (const key of keys) {
    if (key === 'all') {
      for (const name of map.keys()) push(name);
    } else {
      push(key);
    }
  }
  return out;
}

export function resolveSectionRequest(result: SegmentationResult, keys: readonly RequestKey[]): SectionRequestResult[] {
  return expandRequestKeys(keys, result.sections).map((key): SectionRequestResult => {
    if (key === 'summary') return { key, status: 'found', text: result.documentText, entry: null };
    const entry = result.sections.get(key);
    if (!entry) return { key, status: SECTION_NOT_FOUND };
    return { key, status: 'found', text: entry.text, entry };
  });
}
