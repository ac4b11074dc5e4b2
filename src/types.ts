import type { CanonicalSectionName } from './sections/types';

/** What the report does with a requested section the paper does not have. */
export type MissingSectionPolicy = 'omit' | 'flag';

export interface ReportSettings {
  /** Lower summary bound, in words */
  minLength: number;
  /** Upper summary bound, in words */
  maxLength: number;
  /** Longest chunk (characters) handed to the summarizer at once */
  maxChunkLength: number;
  missingSections: MissingSectionPolicy;
  // Low-confidence contribution = first abstract sentences, no cue phrase matched.
  includeLowConfidence: boolean;
  /** Sections copied as extracted instead of summarized */
  verbatimSections: CanonicalSectionName[];
}

export const DEFAULT_SETTINGS: ReportSettings = {
  minLength: 40,
  maxLength: 150,
  maxChunkLength: 1024,
  missingSections: 'omit',
  includeLowConfidence: true,
  verbatimSections: ['title', 'abstract', 'contribution', 'references'],
};

export interface ReportSection {
  /** Request key the block answers (canonical name or 'summary') */
  key: CanonicalSectionName | 'summary';
  /** Rendered heading label, e.g. "Literature review" */
  label: string;
  /** Markdown body; null when the section was not found and is flagged */
  body: string | null;
  /** Body was produced by the summarizer rather than copied */
  summarized: boolean;
  lowConfidence: boolean;
}
