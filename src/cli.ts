// src/cli.ts
// Command-line front end: read a paper, segment it, write a Markdown report.

import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';

import { composeReport } from './report/compose';
import { renderMarkdownReport } from './report/markdown';
import { DEFAULT_SEGMENTER_CONFIG, type SegmenterConfig } from './sections/config';
import { isSegmentationError } from './sections/errors';
import { segmentDocument } from './sections/pipeline';
import { isRequestKey } from './sections/section-map';
import type { RequestKey, SegmentationDiagnostic } from './sections/types';
import { validateSegmenterConfig } from './services/config-validator';
import { isPlainObject, validateSettings } from './services/settings-validator';
import { readDocumentLines } from './source';
import { ExtractiveSummarizer, SummarizationError, type Summarizer } from './summarize/extractive';
import type { ReportSettings } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: paper-sections --input <paper.pdf|paper.txt> --output <report.md> --section <key> [--section <key> ...]

Options:
  -i, --input <file>       PDF or plain-text paper (form feeds separate pages)
  -o, --output <file>      Markdown report to write
  -s, --section <key>      title, abstract, introduction, method, results, conclusion,
                           contribution, literature_review, references, summary or all
      --max-length <n>     upper summary bound in words (default 150)
      --min-length <n>     lower summary bound in words (default 40)
  -c, --config <file>      JSON file with "report" and "segmenter" settings
      --missing <policy>   omit | flag sections the paper does not have (default omit)
  -v, --verbose            print resolver diagnostics
  -q, --quiet              no progress output
  -h, --help               show this help`;

export type CliDeps = {
  /** Replaces the local extractive summarizer. */
  summarizer?: Summarizer;
};

type CliOptions = {
  input: string;
  output: string;
  sections: RequestKey[];
  configPath?: string;
  overrides: Record<string, unknown>;
  verbose: boolean;
  quiet: boolean;
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseLength(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  return Number(value);
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        section: { type: 'string', short: 's', multiple: true },
        'max-length': { type: 'string' },
        'min-length': { type: 'string' },
        config: { type: 'string', short: 'c' },
        missing: { type: 'string' },
        verbose: { type: 'boolean', short: 'v' },
        quiet: { type: 'boolean', short: 'q' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseCliOptions(argv: readonly string[]): CliOptions | null {
  const v = parseFlags(argv);
  if (v.help) return null;
  if (!v.input) throw new UsageError('--input is required');
  if (!v.output) throw new UsageError('--output is required');

  const sections: RequestKey[] = [];
  for (const key of v.section ?? []) {
    if (!isRequestKey(key)) throw new UsageError(`Unknown section "${key}"`);
    sections.push(key);
  }
  if (!sections.length) throw new UsageError('At least one --section is required');

  const overrides: Record<string, unknown> = {};
  const maxLength = parseLength('--max-length', v['max-length']);
  const minLength = parseLength('--min-length', v['min-length']);
  if (maxLength !== undefined) overrides.maxLength = maxLength;
  if (minLength !== undefined) overrides.minLength = minLength;
  if (v.missing !== undefined) {
    if (v.missing !== 'omit' && v.missing !== 'flag') throw new UsageError(`--missing expects omit or flag, got "${v.missing}"`);
    overrides.missingSections = v.missing;
  }

  return {
    input: v.input,
    output: v.output,
    sections,
    configPath: v.config,
    overrides,
    verbose: v.verbose ?? false,
    quiet: v.quiet ?? false,
  };
}

type LoadedConfig = {
  settings: ReportSettings;
  segmenter: SegmenterConfig;
};

async function loadConfig(path: string | undefined, overrides: Record<string, unknown>): Promise<LoadedConfig> {
  if (!path) {
    return { settings: validateSettings(overrides), segmenter: DEFAULT_SEGMENTER_CONFIG };
  }
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  const file = isPlainObject(raw) ? raw : {};
  const report = isPlainObject(file.report) ? file.report : {};
  return {
    // Flags win over the file.
    settings: validateSettings({ ...report, ...overrides }),
    segmenter: validateSegmenterConfig(file.segmenter),
  };
}

function describeError(err: unknown): { message: string; code?: string } {
  if (isSegmentationError(err) || err instanceof SummarizationError) return { message: err.message, code: err.code };
  if (err instanceof Error) return { message: err.message };
  return { message: String(err) };
}

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let opts: CliOptions | null;
  try {
    opts = parseCliOptions(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`[paper-sections][cli] ${err.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  if (!opts) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const { quiet, verbose } = opts;
  const progress = (message: string) => {
    if (!quiet) console.log(`[paper-sections][cli] ${message}`);
  };
  const onDiagnostic = (d: SegmentationDiagnostic) => {
    if (verbose) console.debug(`[paper-sections][resolver] ${d.message}`);
  };

  try {
    const { settings, segmenter } = await loadConfig(opts.configPath, opts.overrides);

    progress(`Processing ${opts.input}...`);
    const raw = await readDocumentLines(opts.input);
    const result = segmentDocument(raw, segmenter, { onDiagnostic });
    progress(`Found sections: ${[...result.sections.keys()].join(', ') || '(none)'}`);

    const summarizer = deps.summarizer ?? new ExtractiveSummarizer({ maxChunkLength: settings.maxChunkLength });
    progress(`Generating report for sections: ${opts.sections.join(', ')}`);
    const blocks = await composeReport(result, opts.sections, summarizer, settings);
    // A low-confidence title is body text; the heading falls back to "Unknown Paper".
    const title = result.sections.get('title');
    const markdown = renderMarkdownReport(title && !title.lowConfidence ? title.text : null, blocks);

    await writeFile(opts.output, markdown, 'utf8');
    progress(`Saved report to ${opts.output}`);
    return EXIT_OK;
  } catch (err) {
    const { message, code } = describeError(err);
    if (code) console.error(`[paper-sections][cli] ${message}`, { code });
    else console.error(`[paper-sections][cli] ${message}`);
    return EXIT_FAILURE;
  }
}
