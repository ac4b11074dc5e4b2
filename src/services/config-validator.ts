/**
 * ConfigValidator - Builds a SegmenterConfig from untrusted input
 *
 * Same contract as validateSettings: never throws, falls back per field,
 * clamps numbers. Alias overrides replace the patterns of the named canonical
 * sections only; every other section keeps the default table.
 */

import { CANONICAL_SECTION_ORDER } from '../sections/aliases';
import { DEFAULT_SEGMENTER_CONFIG, type SegmenterConfig } from '../sections/config';
import type { HeadingAlias } from '../sections/types';
import {
  isPlainObject,
  validateInteger,
  validateNumber,
  validateString,
  validateStringList,
} from './settings-validator';

const LIMITS = {
  maxHeadingLength: { min: 10, max: 200 },
  minContentGapWords: { min: 0, max: 1000 },
  minConfidence: { min: 0, max: 1 },
  runningHeaderMaxLength: { min: 10, max: 200 },
  runningHeaderMinPages: { min: 2, max: 50 },
  contributionScopeFraction: { min: 0.05, max: 1 },
} as const;

// title and contribution are inferred, never matched against a heading.
const VIRTUAL_SECTIONS = new Set(['title', 'contribution']);

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'iu');
    return true;
  } catch {
    return false;
  }
}

function validateAliases(value: unknown, defaults: readonly HeadingAlias[]): readonly HeadingAlias[] {
  if (!isPlainObject(value)) return defaults;

  return Object.freeze(
    CANONICAL_SECTION_ORDER.map((name): HeadingAlias => {
      const current = defaults.find((a) => a.canonicalName === name);
      const fallback = current ? current.patterns : [];
      const override = VIRTUAL_SECTIONS.has(name) ? undefined : value[name];
      const patterns = override === undefined
        ? [...fallback]
        : validateStringList(override, fallback).map((p) => p.toLowerCase());
      return Object.freeze({ canonicalName: name, patterns: Object.freeze(patterns) });
    })
  );
}

/**
 * Validates segmenter options from a config file
 *
 * @param partial - The "segmenter" object of a config file
 * @returns A frozen config, DEFAULT_SEGMENTER_CONFIG for anything unusable
 */
export function validateSegmenterConfig(partial: unknown): SegmenterConfig {
  if (!isPlainObject(partial)) return DEFAULT_SEGMENTER_CONFIG;
  const d = DEFAULT_SEGMENTER_CONFIG;

  return Object.freeze({
    aliases: validateAliases(partial.aliases, d.aliases),
    maxHeadingLength: validateInteger(
      partial.maxHeadingLength,
      d.maxHeadingLength,
      LIMITS.maxHeadingLength.min,
      LIMITS.maxHeadingLength.max
    ),
    minConfidence: validateNumber(
      partial.minConfidence,
      d.minConfidence,
      LIMITS.minConfidence.min,
      LIMITS.minConfidence.max
    ),
    minContentGapWords: validateInteger(
      partial.minContentGapWords,
      d.minContentGapWords,
      LIMITS.minContentGapWords.min,
      LIMITS.minContentGapWords.max
    ),
    runningHeaderMaxLength: validateInteger(
      partial.runningHeaderMaxLength,
      d.runningHeaderMaxLength,
      LIMITS.runningHeaderMaxLength.min,
      LIMITS.runningHeaderMaxLength.max
    ),
    runningHeaderMinPages: validateInteger(
      partial.runningHeaderMinPages,
      d.runningHeaderMinPages,
      LIMITS.runningHeaderMinPages.min,
      LIMITS.runningHeaderMinPages.max
    ),
    contributionScopeFraction: validateNumber(
      partial.contributionScopeFraction,
      d.contributionScopeFraction,
      LIMITS.contributionScopeFraction.min,
      LIMITS.contributionScopeFraction.max
    ),
    contributionSeparator: validateString(partial.contributionSeparator, d.contributionSeparator),
    cuePhrases: Object.freeze(validateStringList(partial.cuePhrases, d.cuePhrases)),
    metadataPatterns: Object.freeze(validateStringList(partial.metadataPatterns, d.metadataPatterns).filter(isValidPattern)),
  });
}
