// src/sections/index.ts
// Public surface of the section segmentation engine.

export * from './types';
export { SegmentationError, isSegmentationError, SECTION_NOT_FOUND } from './errors';
export type { SegmentationErrorCode } from './errors';
export { CANONICAL_SECTION_ORDER, HEADING_ALIASES, isCanonicalSectionName, matchAlias, stripEnumerator } from './aliases';
export type { AliasMatch } from './aliases';
export { DEFAULT_SEGMENTER_CONFIG, DEFAULT_CUE_PHRASES, DEFAULT_METADATA_PATTERNS } from './config';
export type { SegmenterConfig } from './config';
export { normalizeLines } from './normalize';
export { detectHeadingCandidates, scoreHeadingFormat } from './detect';
export { resolveSectionSpans } from './resolve';
export type { ResolvedSpans } from './resolve';
export { detectRunningHeaders, extractContribution, extractTitle, isAuthorMetadataLine } from './virtual';
export type { AuthorLineContext } from './virtual';
export { buildSectionMap, documentText, expandRequestKeys, isRequestKey, resolveSectionRequest } from './section-map';
export type { ExpandedKey } from './section-map';
export { splitSentences } from './sentences';
export { segmentDocument, segmentDocuments } from './pipeline';
export type { SegmentOptions } from './pipeline';
