import type { WordFrequencyTable } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

// Any run of characters that is neither a letter nor a digit separates words.
const WORD_BOUNDARY = /[^\p{L}\p{N}]+/u;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(WORD_BOUNDARY)
    .filter((token) => token.length > 0);
}

/**
 * Count words across all titles combined and keep those seen at least
 * `minCount` times.
 */
export function analyze(
  titles: readonly string[],
  minCount: number = LIMITS.MIN_WORD_COUNT,
): WordFrequencyTable {
  if (!Number.isInteger(minCount) || minCount < 1) {
    throw new RangeError(`minCount must be a positive integer, got ${String(minCount)}`);
  }

  const counts = new Map<string, number>();
  for (const title of titles) {
    for (const token of tokenize(title)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  return Object.fromEntries(
    [...counts].filter(([, count]) => count >= minCount),
  );
}

/** Table entries for display: highest count first, ties alphabetical. */
export function repeatedWords(table: WordFrequencyTable): [string, number][] {
  return Object.entries(table).sort(
    ([wordA, countA], [wordB, countB]) => countB - countA || (wordA < wordB ? -1 : wordA > wordB ? 1 : 0),
  );
}
