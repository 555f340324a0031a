import type { FillerCounts } from './scoring.types';

const FILLER_PATTERNS: ReadonlyArray<readonly [label: string, pattern: RegExp]> = [
  ['um', /\bum+\b/g],
  ['uh', /\buh+\b/g],
  ['erm', /\berm+\b/g],
  ['like', /\blike\b/g],
  ['you know', /\byou know\b/g],
  ['i mean', /\bi mean\b/g],
  ['basically', /\bbasically\b/g],
  ['actually', /\bactually\b/g],
  ['literally', /\bliterally\b/g],
  ['so', /\bso+\b(?=\s+(?:yeah|like|um|uh))/g],
  ['kind of', /\bkind of\b/g],
  ['sort of', /\bsort of\b/g],
];

/** Counts filler words in a transcript. Labels with no matches are omitted. */
export const detectFillers = (transcript: string): FillerCounts => {
  const text = transcript.toLowerCase();
  const counts: FillerCounts = {};
  for (const [label, pattern] of FILLER_PATTERNS) {
    const matches = text.match(pattern);
    if (matches?.length) {
      counts[label] = matches.length;
    }
  }
  return counts;
};
