/**
 * Labeled sparse binary matrices
 *
 * Relations such as category → members or page → linked pages become a
 * binary matrix in compressed sparse row (CSR) form: row `i` holds the sorted
 * column indices of its targets in `indices[indptr[i]..indptr[i + 1])`.
 */

import { ValidationError } from '../lib/errors.js';

/** Row label → target labels */
export type Relations = ReadonlyMap<string, readonly string[]> | Readonly<Record<string, readonly string[]>>;

/**
 * Binary matrix in CSR form
 */
export class SparseBinaryMatrix {
  readonly rows: number;
  readonly cols: number;
  private readonly indptr: Int32Array;
  private readonly indices: Int32Array;

  /**
   * @param rowIndices - Column indices per row; each list is sorted and deduplicated here
   */
  constructor(cols: number, rowIndices: readonly (readonly number[])[]) {
    this.rows = rowIndices.length;
    this.cols = cols;

    const normalized = rowIndices.map((indices) => {
      for (const index of indices) {
        if (!Number.isInteger(index) || index < 0 || index >= cols) {
          throw new ValidationError(`Column index ${index} out of range for ${cols} columns`);
        }
      }
      return [...new Set(indices)].sort((a, b) => a - b);
    });

    this.indptr = new Int32Array(this.rows + 1);
    const nnz = normalized.reduce((sum, indices) => sum + indices.length, 0);
    this.indices = new Int32Array(nnz);

    let offset = 0;
    normalized.forEach((indices, row) => {
      this.indices.set(indices, offset);
      offset += indices.length;
      this.indptr[row + 1] = offset;
    });
  }

  get shape(): [number, number] {
    return [this.rows, this.cols];
  }

  /** Number of stored (non-zero) cells */
  get nnz(): number {
    return this.indices.length;
  }

  /**
   * Column indices of the non-zero cells of a row, ascending
   */
  rowIndices(row: number): Int32Array {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new ValidationError(`Row ${row} out of range for ${this.rows} rows`);
    }
    return this.indices.subarray(this.indptr[row], this.indptr[row + 1]);
  }

  /**
   * Cell value, 1 or 0
   */
  get(row: number, col: number): 0 | 1 {
    return this.rowIndices(row).includes(col) ? 1 : 0;
  }

  /**
   * Non-zero count per column
   */
  columnSums(rows?: Iterable<number>): number[] {
    const sums = new Array<number>(this.cols).fill(0);
    const selected = rows ?? Array.from({ length: this.rows }, (_, i) => i);
    for (const row of selected) {
      for (const col of this.rowIndices(row)) {
        sums[col] = (sums[col] ?? 0) + 1;
      }
    }
    return sums;
  }

  /**
   * Dense copy, for small matrices and debugging
   */
  toDense(): number[][] {
    return Array.from({ length: this.rows }, (_, row) => {
      const dense = new Array<number>(this.cols).fill(0);
      for (const col of this.rowIndices(row)) {
        dense[col] = 1;
      }
      return dense;
    });
  }
}

/** Matrix with labeled rows and columns */
export interface LabeledSparseMatrix {
  matrix: SparseBinaryMatrix;
  /** Row labels in input order */
  rowLabels: string[];
  /** Sorted, deduplicated union of all targets */
  colLabels: string[];
}

/** Category → member matrix */
export type CategoryMatrix = LabeledSparseMatrix;

/** Source page → target page matrix */
export type LinkMatrix = LabeledSparseMatrix;

function isRelationMap(relations: Relations): relations is ReadonlyMap<string, readonly string[]> {
  return relations instanceof Map;
}

function relationEntries(relations: Relations): [string, readonly string[]][] {
  return isRelationMap(relations) ? [...relations.entries()] : Object.entries(relations);
}

/**
 * Build a labeled binary matrix from row → targets relations
 *
 * Repeated targets within a row count once. Row labels need not appear
 * among the columns.
 */
export function buildMatrix(relations: Relations): LabeledSparseMatrix {
  const entries = relationEntries(relations);
  const rowLabels = entries.map(([label]) => label);

  const targets = new Set<string>();
  for (const [, rowTargets] of entries) {
    for (const target of rowTargets) {
      targets.add(target);
    }
  }
  const colLabels = [...targets].sort(compareLabels);
  const colIndex = new Map(colLabels.map((label, i) => [label, i] as const));

  const rows = entries.map(([, rowTargets]) =>
    rowTargets.flatMap((target) => {
      const index = colIndex.get(target);
      return index === undefined ? [] : [index];
    })
  );

  return {
    matrix: new SparseBinaryMatrix(colLabels.length, rows),
    rowLabels,
    colLabels,
  };
}

/**
 * Code-unit order, independent of locale
 */
export function compareLabels(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Index of a column label, -1 when absent
 */
export function columnIndex(matrix: LabeledSparseMatrix, label: string): number {
  return matrix.colLabels.indexOf(label);
}
