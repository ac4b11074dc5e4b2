// src/report/markdown.ts
// Markdown rendering of composed report blocks.

import type { ReportSection } from '../types';

export const UNKNOWN_TITLE = 'Unknown Paper';
export const NOT_FOUND_NOTE = '_Section not found._';
export const LOW_CONFIDENCE_NOTE = '_Low confidence: no contribution statement found, showing the opening of the abstract._';
export const LOW_CONFIDENCE_TITLE_NOTE = '_Low confidence: no text above the first heading, showing the first body line._';
export const REPORT_FOOTER = '---\n*Report generated by paper-sections.*\n';

function renderBody(section: ReportSection): string {
  if (section.body === null) return NOT_FOUND_NOTE;
  if (section.lowConfidence) {
    const note = section.key === 'title' ? LOW_CONFIDENCE_TITLE_NOTE : LOW_CONFIDENCE_NOTE;
    return `${note}\n\n${section.body}`;
  }
  return section.body;
}

export function renderMarkdownReport(title: string | null | undefined, sections: readonly ReportSection[]): string {
  const heading = (title ?? '').replace(/\s+/g, ' ').trim() || UNKNOWN_TITLE;
  let out = `# Analysis of ${heading}\n\n`;
  for (const s of sections) {
    out += `## ${s.label}\n${renderBody(s)}\n\n`;
  }
  return out + REPORT_FOOTER;
}
