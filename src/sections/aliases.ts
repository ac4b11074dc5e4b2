// src/sections/aliases.ts
// Static heading alias table, keyed by canonical section name.
// Patterns are lowercase and enumerator-free; matching strips numbering first.

import type { CanonicalSectionName, HeadingAlias } from './types';

export const CANONICAL_SECTION_ORDER: readonly CanonicalSectionName[] = Object.freeze([
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

function alias(canonicalName: CanonicalSectionName, patterns: string[]): HeadingAlias {
  return Object.freeze({ canonicalName, patterns: Object.freeze(patterns) });
}

// title and contribution are virtual: they never come from a heading.
export const HEADING_ALIASES: readonly HeadingAlias[] = Object.freeze([
  alias('title', []),
  alias('abstract', ['abstract']),
  alias('introduction', ['introduction', 'intro']),
  alias('method', [
    'method',
    'methods',
    'methodology',
    'materials and methods',
    'approach',
    'proposed approach',
    'proposed method',
  ]),
  alias('results', [
    'results',
    'result',
    'experiments',
    'experimental results',
    'evaluation',
    'results and discussion',
    'findings',
  ]),
  alias('conclusion', [
    'conclusion',
    'conclusions',
    'discussion',
    'concluding remarks',
    'discussion and conclusion',
    'summary and conclusions',
  ]),
  alias('contribution', []),
  alias('literature_review', [
    'related work',
    'related works',
    'literature review',
    'prior work',
    'previous work',
    'related literature',
    'background and related work',
  ]),
  alias('references', ['references', 'reference', 'bibliography', 'works cited', 'literature cited']),
]);

export function isCanonicalSectionName(value: string): value is CanonicalSectionName {
  return CANONICAL_SECTION_ORDER.some((name) => name === value);
}

// "1.", "1.2", "IV.", "II " (digits/roman up to XXIX + punctuation or whitespace), "A." (letter + punctuation).
// Acronyms made of numeral letters ("CV", "DL", "MLP") are not numerals.
const ROMAN = '(?=[IVX])X{0,2}(?:IX|IV|V?I{0,3})';
const ENUMERATOR_RE = new RegExp(`^(?:(?:\\d+(?:\\.\\d+)*|${ROMAN})(?:[.):]\\s*|\\s+)|[A-Z][.)]\\s+)`);

export function stripEnumerator(text: string): string {
  return text.trim().replace(ENUMERATOR_RE, '').trim();
}

export function headingKey(text: string): string {
  return stripEnumerator(text)
    .replace(/[\s:–—-]+$/u, '')
    .replace(/\s+/g, ' ')
    .toLowerCase();
}

export type AliasMatch = {
  canonicalName: CanonicalSectionName;
  alias: string;
  exact: boolean;
};

// Exact match beats prefix match; among equals the longest alias wins.
// A prefix match needs a non-letter right after the alias ("Results of X", not "Resultsx").
export function matchAlias(text: string, aliases: readonly HeadingAlias[]): AliasMatch | null {
  const key = headingKey(text);
  if (!key) return null;

  let best: AliasMatch | null = null;
  for (const entry of aliases) {
    for (const raw of entry.patterns) {
      const pattern = raw.trim().toLowerCase();
      if (!pattern) continue;

      let exact: boolean;
      if (key === pattern) exact = true;
      else if (key.startsWith(pattern) && !/\p{L}/u.test(key.charAt(pattern.length))) exact = false;
      else continue;

      const better = !best
        || (exact && !best.exact)
        || (exact === best.exact && pattern.length > best.alias.length);
      if (better) best = { canonicalName: entry.canonicalName, alias: pattern, exact };
    }
  }
  return best;
}
