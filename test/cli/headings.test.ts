/**
 * Tests for the headings CLI command
 */

import { describe, it, expect } from 'vitest';
import { headingsCommand, renderHeadingFrequency } from '../../src/cli/headings.js';
import { stripAnsi } from '../../src/cli/utils.js';

describe('Headings Command', () => {
  it('should show 25 headings by default', () => {
    const option = headingsCommand.options.find((o) => o.long === '--top');
    expect(option?.defaultValue).toBe('25');
  });

  it('should render counts and percentages', () => {
    const output = renderHeadingFrequency([
      { heading: 'History', count: 3, proportion: 0.6 },
      { heading: 'References', count: 2, proportion: 0.4 },
    ]);

    expect(
      stripAnsi(output)
        .split('\n')
        .map((line) => line.trimEnd())
    ).toEqual([
      '    Heading     Count  Proportion',
      '    ──────────  ─────  ──────────',
      '    History     3      60.0%',
      '    References  2      40.0%',
    ]);
  });
});
