/**
 * Tests for the category CLI command
 */

import { describe, it, expect } from 'vitest';
import { categoryCommand, renderMatrixSummary, renderMembers, summarizeMatrix } from '../../src/cli/category.js';
import { stripAnsi } from '../../src/cli/utils.js';
import { buildMatrix } from '../../src/processing/matrix.js';

const matrix = buildMatrix({ Physics: ['Mechanics', 'Optics'], Mechanics: [] });

describe('Category Command', () => {
  describe('command definition', () => {
    it('should have correct name', () => {
      expect(categoryCommand.name()).toBe('category');
    });

    it('should have subcats and depth options', () => {
      expect(categoryCommand.options.find((o) => o.short === '-s')?.long).toBe('--subcats');
      expect(categoryCommand.options.find((o) => o.short === '-d')?.long).toBe('--depth');
    });
  });

  describe('renderMembers', () => {
    it('should report an empty category', () => {
      expect(stripAnsi(renderMembers('Physics', []))).toBe('\n  No members found in Physics.\n');
    });

    it('should count and list members', () => {
      const output = stripAnsi(renderMembers('Physics', [{ pageId: 22939, ns: 0, title: 'Physics' }])).split('\n');

      expect(output[1]).toBe('  Physics: 1 members');
      expect(output[5]?.trimEnd()).toBe('    Physics  22939    0');
    });
  });

  describe('summarizeMatrix', () => {
    it('should report shape and row sizes', () => {
      expect(summarizeMatrix(matrix)).toEqual({
        rows: 2,
        columns: 2,
        cells: 2,
        categories: [
          { category: 'Physics', members: 2 },
          { category: 'Mechanics', members: 0 },
        ],
      });
    });

    it('should render the summary line', () => {
      const lines = stripAnsi(renderMatrixSummary(matrix)).split('\n');

      expect(lines[1]).toBe('  Matrix: 2 categories x 2 members, 2 links');
    });
  });
});
