/**
 * Tests for heading frequency
 */

import { describe, it, expect } from 'vitest';
import { countHeadings, topHeadings } from '../../src/processing/heading-frequency.js';
import { ValidationError } from '../../src/lib/errors.js';

const TEXTS = [
  'One.\n\n== History ==\na\n\n== See also ==\nb\n',
  'Two.\n\n== History ==\nc\n\n== References ==\nd\n',
  'Three.\n\n== References ==\ne\n\n== History ==\nf\n',
];

describe('countHeadings', () => {
  it('should count headings in order of first appearance', () => {
    expect(countHeadings(TEXTS)).toEqual([
      ['History', 3],
      ['See also', 1],
      ['References', 2],
    ]);
  });

  it('should return nothing for texts without headings', () => {
    expect(countHeadings(['Plain.', ''])).toEqual([]);
  });
});

describe('topHeadings', () => {
  it('should keep the most frequent headings with their share', () => {
    expect(topHeadings(countHeadings(TEXTS), 2)).toEqual([
      { heading: 'History', count: 3, proportion: 0.6 },
      { heading: 'References', count: 2, proportion: 0.4 },
    ]);
  });

  it('should keep input order for ties', () => {
    expect(topHeadings([['Plot', 1], ['Cast', 1]]).map((row) => row.heading)).toEqual(['Plot', 'Cast']);
  });

  it('should return every heading when n exceeds their number', () => {
    expect(topHeadings(countHeadings(TEXTS), 25)).toHaveLength(3);
  });

  it('should return nothing for n = 0', () => {
    expect(topHeadings(countHeadings(TEXTS), 0)).toEqual([]);
  });

  it('should reject a negative or fractional n', () => {
    expect(() => topHeadings([], -1)).toThrow(ValidationError);
    expect(() => topHeadings([], 1.5)).toThrow('n must be a non-negative integer, got 1.5');
  });
});
