/**
 * SettingsValidator - Validates and sanitizes report settings
 *
 * PURPOSE
 * ───────
 * Ensures settings read from a JSON config file or assembled from CLI flags are
 * valid and within acceptable ranges. Unknown keys are ignored, wrong types fall
 * back to the default for that field, out-of-range numbers are clamped.
 *
 * USAGE
 * ─────
 * ```typescript
 * const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
 * const settings = validateSettings(raw);
 * ```
 */

import { isCanonicalSectionName } from '../sections/aliases';
import type { CanonicalSectionName } from '../sections/types';
import { DEFAULT_SETTINGS, type MissingSectionPolicy, type ReportSettings } from '../types';

/**
 * Validation limits for numeric settings
 */
const LIMITS = {
  minLength: { min: 1, max: 1000 },
  maxLength: { min: 1, max: 2000 },
  maxChunkLength: { min: 100, max: 100_000 },
} as const;

const MISSING_SECTION_POLICIES: readonly MissingSectionPolicy[] = ['omit', 'flag'];

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Clamps a number between min and max values
 */
function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Validates a number and clamps it to the specified range
 */
export function validateNumber(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return defaultValue;
  }
  return clamp(value, min, max);
}

/**
 * Validates a whole number; fractions are rounded before clamping
 */
export function validateInteger(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return defaultValue;
  }
  return clamp(Math.round(value), min, max);
}

/**
 * Validates a boolean value
 */
export function validateBoolean(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === 'boolean') return value;
  return defaultValue;
}

/**
 * Validates a string value
 */
export function validateString(value: unknown, defaultValue: string): string {
  if (typeof value === 'string') return value;
  return defaultValue;
}

/**
 * Validates a list of strings; non-string entries and blanks are dropped
 */
export function validateStringList(value: unknown, defaultValue: readonly string[]): string[] {
  if (!Array.isArray(value)) return [...defaultValue];
  const out: string[] = [];
  for (const v of value) {
    if (typeof v === 'string' && v.trim()) out.push(v.trim());
  }
  return out;
}

function validateMissingPolicy(value: unknown, defaultValue: MissingSectionPolicy): MissingSectionPolicy {
  return MISSING_SECTION_POLICIES.find((p) => p === value) ?? defaultValue;
}

function validateSectionList(value: unknown, defaultValue: readonly CanonicalSectionName[]): CanonicalSectionName[] {
  if (!Array.isArray(value)) return [...defaultValue];
  const out: CanonicalSectionName[] = [];
  for (const v of value) {
    if (typeof v === 'string' && isCanonicalSectionName(v) && !out.includes(v)) out.push(v);
  }
  return out;
}

/**
 * Validates and sanitizes report settings
 *
 * @param partial - Settings object from a config file, possibly incomplete or malformed
 * @returns Fully valid ReportSettings with defaults applied
 */
export function validateSettings(partial: unknown): ReportSettings {
  if (!isPlainObject(partial)) {
    return { ...DEFAULT_SETTINGS, verbatimSections: [...DEFAULT_SETTINGS.verbatimSections] };
  }

  const maxLength = validateInteger(
    partial.maxLength,
    DEFAULT_SETTINGS.maxLength,
    LIMITS.maxLength.min,
    LIMITS.maxLength.max
  );

  return {
    // A lower bound above the upper one is pulled down to it.
    minLength: Math.min(
      validateInteger(partial.minLength, DEFAULT_SETTINGS.minLength, LIMITS.minLength.min, LIMITS.minLength.max),
      maxLength
    ),
    maxLength,
    maxChunkLength: validateInteger(
      partial.maxChunkLength,
      DEFAULT_SETTINGS.maxChunkLength,
      LIMITS.maxChunkLength.min,
      LIMITS.maxChunkLength.max
    ),
    missingSections: validateMissingPolicy(partial.missingSections, DEFAULT_SETTINGS.missingSections),
    includeLowConfidence: validateBoolean(partial.includeLowConfidence, DEFAULT_SETTINGS.includeLowConfidence),
    verbatimSections: validateSectionList(partial.verbatimSections, DEFAULT_SETTINGS.verbatimSections),
  };
}
