// src/sections/config.ts
// Immutable configuration passed explicitly into every segmentation stage.

import { HEADING_ALIASES } from './aliases';
import type { HeadingAlias } from './types';

export type SegmenterConfig = {
  readonly aliases: readonly HeadingAlias[];
  /** Longest line (chars) still considered a heading. */
  readonly maxHeadingLength: number;
  /** Candidates scoring below this are discarded by the detector. */
  readonly minConfidence: number;
  /** A heading needs at least this many words before the next candidate. */
  readonly minContentGapWords: number;
  readonly runningHeaderMaxLength: number;
  readonly runningHeaderMinPages: number;
  /** Share of the document scanned for contribution cues when no abstract/introduction exists. */
  readonly contributionScopeFraction: number;
  readonly contributionSeparator: string;
  readonly cuePhrases: readonly string[];
  /** Regex sources (case-insensitive) marking author/affiliation metadata lines. */
  readonly metadataPatterns: readonly string[];
};

export const DEFAULT_CUE_PHRASES: readonly string[] = Object.freeze([
  'we propose',
  'we present',
  'we introduce',
  'we develop',
  'this paper presents',
  'this paper proposes',
  'this paper introduces',
  'this work presents',
  'in this paper',
  'in this work',
  'our contribution',
  'our contributions',
  'our main contribution',
  'the main contribution',
]);

export const DEFAULT_METADATA_PATTERNS: readonly string[] = Object.freeze([
  '\\buniversit',
  '\\binstitute\\b',
  '\\bdepartment\\b',
  '\\blaborator(?:y|ies)\\b',
  '\\bschool of\\b',
  '\\bcollege\\b',
  '\\barxiv\\b',
  '\\bdoi\\b',
  '©|\\bcopyright\\b',
  '\\bpreprint\\b',
  '\\bcorresponding author\\b',
]);

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = Object.freeze({
  aliases: HEADING_ALIASES,
  maxHeadingLength: 60,
  minConfidence: 0.5,
  minContentGapWords: 8,
  runningHeaderMaxLength: 80,
  runningHeaderMinPages: 2,
  contributionScopeFraction: 0.4,
  contributionSeparator: ' ',
  cuePhrases: DEFAULT_CUE_PHRASES,
  metadataPatterns: DEFAULT_METADATA_PATTERNS,
});
