/**
 * Tests for labeled sparse binary matrices
 */

import { describe, it, expect } from 'vitest';
import { SparseBinaryMatrix, buildMatrix, columnIndex, compareLabels } from '../../src/processing/matrix.js';
import { ValidationError } from '../../src/lib/errors.js';

describe('SparseBinaryMatrix', () => {
  const matrix = new SparseBinaryMatrix(4, [[3, 1, 1], [], [0, 3]]);

  it('should report its shape and stored cells', () => {
    expect(matrix.shape).toEqual([3, 4]);
    expect(matrix.nnz).toBe(4);
  });

  it('should keep row indices sorted and unique', () => {
    expect(Array.from(matrix.rowIndices(0))).toEqual([1, 3]);
    expect(Array.from(matrix.rowIndices(1))).toEqual([]);
  });

  it('should read single cells', () => {
    expect(matrix.get(0, 1)).toBe(1);
    expect(matrix.get(0, 0)).toBe(0);
    expect(matrix.get(2, 3)).toBe(1);
  });

  it('should sum columns over all or selected rows', () => {
    expect(matrix.columnSums()).toEqual([1, 1, 0, 2]);
    expect(matrix.columnSums([2])).toEqual([1, 0, 0, 1]);
  });

  it('should produce a dense copy', () => {
    expect(matrix.toDense()).toEqual([
      [0, 1, 0, 1],
      [0, 0, 0, 0],
      [1, 0, 0, 1],
    ]);
  });

  it('should reject out-of-range indices', () => {
    expect(() => new SparseBinaryMatrix(2, [[2]])).toThrow(ValidationError);
    expect(() => matrix.rowIndices(3)).toThrow('Row 3 out of range for 3 rows');
  });
});

describe('buildMatrix', () => {
  it('should label rows in input order and columns sorted', () => {
    const result = buildMatrix(
      new Map([
        ['Seed', ['Zebra', 'Apple', 'Zebra']],
        ['Other', ['Apple']],
      ])
    );

    expect(result.rowLabels).toEqual(['Seed', 'Other']);
    expect(result.colLabels).toEqual(['Apple', 'Zebra']);
    expect(result.matrix.toDense()).toEqual([
      [1, 1],
      [1, 0],
    ]);
  });

  it('should count each stored cell once', () => {
    const result = buildMatrix({ A: ['X', 'Y'], B: ['X'] });

    expect(result.matrix.shape).toEqual([2, 2]);
    expect(result.matrix.nnz).toBe(3);
    expect(result.matrix.get(0, columnIndex(result, 'X'))).toBe(1);
    expect(result.matrix.get(1, columnIndex(result, 'Y'))).toBe(0);
  });

  it('should accept a plain object', () => {
    const result = buildMatrix({ Physics: ['Optics'], Optics: [] });

    expect(result.rowLabels).toEqual(['Physics', 'Optics']);
    expect(result.colLabels).toEqual(['Optics']);
    expect(result.matrix.toDense()).toEqual([[1], [0]]);
  });

  it('should build an empty matrix from no relations', () => {
    const result = buildMatrix(new Map());

    expect(result.matrix.shape).toEqual([0, 0]);
    expect(result.colLabels).toEqual([]);
  });
});

describe('compareLabels', () => {
  it('should order by code unit regardless of locale', () => {
    expect(['b', 'B', 'a', 'Á'].sort(compareLabels)).toEqual(['B', 'a', 'b', 'Á']);
  });
});

describe('columnIndex', () => {
  it('should find a column label or return -1', () => {
    const result = buildMatrix({ Seed: ['Alpha', 'Beta'] });

    expect(columnIndex(result, 'Beta')).toBe(1);
    expect(columnIndex(result, 'Gamma')).toBe(-1);
  });
});
