/**
 * Tests for article section handling
 */

import { describe, it, expect } from 'vitest';
import {
  LEAD_HEADING,
  cutArticlesAtHeadings,
  cutAtHeadings,
  getHeadings,
  joinSections,
  splitText,
} from '../../src/processing/text.js';

const ARTICLE = [
  'Intro text.',
  '',
  '== History ==',
  'Old times.',
  '',
  '=== Early ===',
  'Very old.',
  '',
  '== See also ==',
  'More.',
  '',
].join('\n');

describe('getHeadings', () => {
  it('should list level-2 headings in order', () => {
    expect(getHeadings(ARTICLE)).toEqual(['History', 'See also']);
  });

  it('should return nothing for text without headings', () => {
    expect(getHeadings('Just a lead.')).toEqual([]);
  });

  it('should tolerate missing or extra spaces around the name', () => {
    expect(getHeadings('Lead\n==Tight==\nx\n==  Loose  ==\ny')).toEqual(['Tight', 'Loose']);
  });
});

describe('splitText', () => {
  it('should split into a lead and one section per level-2 heading', () => {
    expect(splitText(ARTICLE)).toEqual([
      { heading: LEAD_HEADING, text: 'Intro text.\n' },
      { heading: 'History', text: 'Old times.\n\n=== Early ===\nVery old.\n' },
      { heading: 'See also', text: 'More.\n' },
    ]);
  });

  it('should keep an empty lead', () => {
    expect(splitText('\n== Plot ==\nThings happen.')).toEqual([
      { heading: 'Lead', text: '' },
      { heading: 'Plot', text: 'Things happen.' },
    ]);
  });

  it('should return only the lead when there are no headings', () => {
    expect(splitText('Short article.')).toEqual([{ heading: 'Lead', text: 'Short article.' }]);
  });
});

describe('joinSections', () => {
  it('should rebuild the text that was split', () => {
    expect(joinSections(splitText(ARTICLE))).toBe(ARTICLE);
  });

  it('should introduce every non-lead section with a heading line', () => {
    const text = joinSections([
      { heading: 'Lead', text: 'Intro.' },
      { heading: 'Career', text: 'Work.' },
    ]);

    expect(text).toBe('Intro.\n== Career ==\nWork.');
  });

  it('should keep a heading line for a first section that is not the lead', () => {
    expect(joinSections([{ heading: 'Career', text: 'Work.' }])).toBe('\n== Career ==\nWork.');
  });
});

describe('cutAtHeadings', () => {
  it('should drop everything from a heading onward', () => {
    expect(cutAtHeadings(ARTICLE, ['See also'])).toBe('Intro text.\n\n== History ==\nOld times.\n\n=== Early ===\nVery old.\n');
  });

  it('should apply every cut', () => {
    expect(cutAtHeadings(ARTICLE, ['See also', 'History'])).toBe('Intro text.\n');
  });

  it('should ignore headings that do not occur', () => {
    expect(cutAtHeadings(ARTICLE, ['References'])).toBe(ARTICLE);
  });

  it('should not cut at a level-3 heading', () => {
    expect(cutAtHeadings(ARTICLE, ['Early'])).toBe(ARTICLE);
  });

  it('should match heading names literally', () => {
    const text = 'Intro.\n\n== C++ ==\nCode.\n\n== Cxx ==\nOther.\n';

    expect(cutAtHeadings(text, ['C++'])).toBe('Intro.\n');
    expect(cutAtHeadings(text, ['C.x'])).toBe(text);
  });
});

describe('cutArticlesAtHeadings', () => {
  it('should cut every article', () => {
    const texts = ['A.\n\n== Notes ==\nx\n', 'B.\n\n== Plot ==\ny\n'];

    expect(cutArticlesAtHeadings(texts, ['Notes'])).toEqual(['A.\n', 'B.\n\n== Plot ==\ny\n']);
  });
});
