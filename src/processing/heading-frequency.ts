/**
 * Heading frequency across a corpus
 */

import { DEFAULT_TOP_HEADINGS } from '../lib/constants.js';
import { ValidationError } from '../lib/errors.js';
import { getHeadings } from './text.js';

export interface HeadingFrequency {
  heading: string;
  count: number;
  /** Share of the total count of the returned rows */
  proportion: number;
}

/**
 * Count level-2 headings over many article texts
 *
 * @returns `[heading, count]` pairs in order of first appearance
 */
export function countHeadings(texts: Iterable<string>): [string, number][] {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const heading of getHeadings(text)) {
      counts.set(heading, (counts.get(heading) ?? 0) + 1);
    }
  }
  return [...counts.entries()];
}

/**
 * The `n` most frequent headings, most frequent first
 *
 * Ties keep their input order.
 */
export function topHeadings(
  pairs: readonly (readonly [string, number])[],
  n: number = DEFAULT_TOP_HEADINGS
): HeadingFrequency[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(`n must be a non-negative integer, got ${n}`);
  }

  const top = [...pairs].sort((a, b) => b[1] - a[1]).slice(0, n);
  const total = top.reduce((sum, [, count]) => sum + count, 0);

  return top.map(([heading, count]) => ({
    heading,
    count,
    proportion: total > 0 ? count / total : 0,
  }));
}
