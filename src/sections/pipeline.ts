// src/sections/pipeline.ts
// Entry-point: raw line records -> SegmentationResult.
// Normalizer -> Detector -> Resolver -> Virtual Extractor -> Map Builder, synchronous and pure.

import { DEFAULT_SEGMENTER_CONFIG, type SegmenterConfig } from './config';
import { detectHeadingCandidates } from './detect';
import { SegmentationError } from './errors';
import { normalizeLines } from './normalize';
import { resolveSectionSpans } from './resolve';
import { buildSectionMap, documentText } from './section-map';
import type { RawLine, SegmentationDiagnostic, SegmentationResult, VirtualSection } from './types';
import { extractContribution, extractTitle } from './virtual';

export type SegmentOptions = {
  /** Receives every resolver diagnostic. Defaults to a tagged console.debug. */
  onDiagnostic?: (diagnostic: SegmentationDiagnostic) => void;
};

function logDiagnostic(d: SegmentationDiagnostic): void {
  console.debug('[paper-sections][resolver] ' + d.message, { code: d.code, name: d.name });
}

export function segmentDocument(
  raw: readonly RawLine[],
  config: SegmenterConfig = DEFAULT_SEGMENTER_CONFIG,
  options: SegmentOptions = {}
): SegmentationResult {
  const lines = normalizeLines(raw);
  if (!lines.length) {
    throw new SegmentationError('EMPTY_INPUT', `No text left after normalizing ${raw.length} line record(s)`);
  }

  const candidates = detectHeadingCandidates(lines, config);
  const { spans, diagnostics } = resolveSectionSpans(candidates, lines, config);
  const report = options.onDiagnostic ?? logDiagnostic;
  for (const d of diagnostics) report(d);

  const virtuals: VirtualSection[] = [extractTitle(lines, spans, config, candidates)];
  const contribution = extractContribution(lines, spans, config);
  if (contribution) virtuals.push(contribution);

  return {
    lines,
    candidates,
    spans,
    sections: buildSectionMap(spans, virtuals),
    documentText: documentText(lines),
    diagnostics,
  };
}

// Documents share nothing; each run is independent.
export function segmentDocuments(
  docs: readonly (readonly RawLine[])[],
  config: SegmenterConfig = DEFAULT_SEGMENTER_CONFIG,
  options: SegmentOptions = {}
): SegmentationResult[] {
  return docs.map((raw) => segmentDocument(raw, config, options));
}
