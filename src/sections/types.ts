// src/sections/types.ts
// Data model for the section segmentation engine.
// Everything here is created fresh per document and never mutated after the
// stage that produces it.

export type CanonicalSectionName =
  | 'title'
  | 'abstract'
  | 'introduction'
  | 'method'
  | 'results'
  | 'conclusion'
  | 'contribution'
  | 'literature_review'
  | 'references';

// Request keys are resolved at the request layer, never stored in a SectionMap.
export type RequestKey = CanonicalSectionName | 'summary' | 'all';

// One record from the extraction collaborator. Empty text is a blank line.
export type RawLine = {
  text: string;
  pageIndex: number;
};

export type Line = {
  readonly text: string;
  readonly pageIndex: number;
  // Preceded by one or more blank lines (or a dropped page-number artifact).
  readonly blankBefore: boolean;
};

export type HeadingAlias = {
  readonly canonicalName: CanonicalSectionName;
  // Lowercase, enumerator-free heading variants.
  readonly patterns: readonly string[];
};

export type Candidate = {
  lineIndex: number;
  canonicalName: CanonicalSectionName;
  confidence: number; // 0..1
  matchedAlias: string;
  exact: boolean;
};

export type LineRange = {
  startLine: number;
  endLine: number; // exclusive
};

export type SectionSpan = LineRange & {
  name: CanonicalSectionName;
  // Lines after the heading line up to endLine.
  text: string;
};

export type VirtualSection = {
  name: 'title' | 'contribution';
  text: string;
  // Title run range; null when assembled from scattered sentences.
  span: LineRange | null;
  lowConfidence: boolean;
};

export type SectionMapEntry = {
  readonly name: CanonicalSectionName;
  readonly text: string;
  readonly origin: 'heading' | 'virtual';
  readonly span: LineRange | null;
  readonly lowConfidence: boolean;
};

export type SectionMap = ReadonlyMap<CanonicalSectionName, SectionMapEntry>;

export type SegmentationDiagnostic = {
  code: 'AMBIGUOUS_HEADING';
  name: CanonicalSectionName;
  chosenLine: number;
  candidateLines: number[];
  // True when equal content forced the later-occurrence tie-break.
  tie: boolean;
  message: string;
};

export type SegmentationResult = {
  lines: readonly Line[];
  candidates: readonly Candidate[];
  spans: readonly SectionSpan[];
  sections: SectionMap;
  documentText: string;
  diagnostics: readonly SegmentationDiagnostic[];
};

export type SectionRequestResult =
  | { key: CanonicalSectionName; status: 'found'; text: string; entry: SectionMapEntry }
  | { key: 'summary'; status: 'found'; text: string; entry: null }
  | { key: CanonicalSectionName; status: 'SECTION_NOT_FOUND' };
