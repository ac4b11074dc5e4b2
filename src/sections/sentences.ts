// src/sections/sentences.ts
// Sentence splitting for cue-phrase scanning and extractive summaries.

// Lowercased tokens that end with a period but do not end a sentence.
const ABBREVIATIONS = new Set([
  'e.g',
  'i.e',
  'al',
  'etc',
  'vs',
  'cf',
  'fig',
  'figs',
  'eq',
  'eqs',
  'sec',
  'ref',
  'refs',
  'no',
  'dr',
  'prof',
  'approx',
  'resp',
]);

function stripLeading(word: string): string {
  return word.replace(/^[^\p{L}]+/u, '');
}

function endsWithAbbreviation(before: string): boolean {
  const tokens = before.trim().split(/\s+/);
  const token = stripLeading(tokens[tokens.length - 1] ?? '');
  if (!token) return false;
  // Single capital is an initial ("J. Smith", "John F. Kennedy") unless it follows
  // a lowercase word ("a method for Y.").
  if (/^\p{Lu}$/u.test(token)) {
    const prev = tokens.length > 1 ? stripLeading(tokens[tokens.length - 2]) : '';
    return !prev || /^\p{Lu}/u.test(prev);
  }
  return ABBREVIATIONS.has(token.toLowerCase());
}

export function splitSentences(text: string): string[] {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (!flat) return [];

  const out: string[] = [];
  const re = /[.!?]+["'”’)\]]*(?=\s|$)/gu;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(flat)) !== null) {
    const end = m.index + m[0].length;
    const rest = flat.slice(end).trimStart();
    if (rest && /^\p{Ll}/u.test(rest)) continue;
    if (m[0].startsWith('.') && endsWithAbbreviation(flat.slice(start, m.index))) continue;

    const sentence = flat.slice(start, end).trim();
    if (sentence) out.push(sentence);
    start = end;
  }

  const tail = flat.slice(start).trim();
  if (tail) out.push(tail);
  return out;
}
