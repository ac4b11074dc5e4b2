// src/report/compose.ts
// Turns a segmentation result plus requested keys into report blocks.
// Verbatim sections are copied, everything else goes through the summarizer.

import { SECTION_NOT_FOUND } from '../sections/errors';
import { resolveSectionRequest } from '../sections/section-map';
import type { RequestKey, SegmentationResult } from '../sections/types';
import type { Summarizer } from '../summarize/extractive';
import type { ReportSection, ReportSettings } from '../types';

export function sectionLabel(key: string): string {
  const words = key.replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}

// Summarizer failures propagate unchanged.
export async function composeReport(
  result: SegmentationResult,
  keys: readonly RequestKey[],
  summarizer: Summarizer,
  settings: ReportSettings
): Promise<ReportSection[]> {
  const bounds = { minLength: settings.minLength, maxLength: settings.maxLength };
  const out: ReportSection[] = [];

  for (const r of resolveSectionRequest(result, keys)) {
    const label = sectionLabel(r.key);

    if (r.status === SECTION_NOT_FOUND) {
      console.warn('[paper-sections][report] section not found', { key: r.key, policy: settings.missingSections });
      if (settings.missingSections === 'flag') {
        out.push({ key: r.key, label, body: null, summarized: false, lowConfidence: false });
      }
      continue;
    }

    if (r.entry === null) {
      const body = await summarizer.summarize(r.text, bounds);
      out.push({ key: r.key, label, body, summarized: true, lowConfidence: false });
      continue;
    }

    const { lowConfidence } = r.entry;
    if (lowConfidence && !settings.includeLowConfidence) {
      console.warn('[paper-sections][report] skipping low-confidence section', { key: r.key });
      continue;
    }

    const verbatim = settings.verbatimSections.includes(r.key);
    const body = verbatim ? r.text : await summarizer.summarize(r.text, bounds);
    out.push({ key: r.key, label, body, summarized: !verbatim, lowConfidence });
  }

  return out;
}
