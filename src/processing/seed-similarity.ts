/**
 * Seed-page similarity
 *
 * Scores every source page of a link matrix by the cosine similarity of its
 * weighted link profile to a target vector built from how strongly each
 * linked page is cited by the seed pages.
 */

import { createLogger } from '../lib/logger.js';
import type { LinkMatrix } from './matrix.js';

const getLog = () => createLogger('processing:seed-similarity');

/** In-degree per target label */
export type InDegrees = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

/** Result of a seed similarity computation */
export interface SeedSimilarityResult {
  /** Cosine similarity per row label, 0 where undefined */
  scores: Map<string, number>;
  /** inSeeds / inAll over retained columns */
  pageWeight: Float64Array;
  /** Target vector over retained columns (equal to pageWeight) */
  targetVec: Float64Array;
  /** Columns dropped for zero total in-degree */
  columnsRemoved: number;
  /** Columns that took part in the computation */
  columnsUsed: number;
}

function isDegreeMap(degrees: InDegrees): degrees is ReadonlyMap<string, number> {
  return degrees instanceof Map;
}

/** Own, finite count for `label`; anything else counts as 0 */
function degreeOf(degrees: InDegrees, label: string): number {
  let value: unknown;
  if (isDegreeMap(degrees)) {
    value = degrees.get(label);
  } else if (Object.hasOwn(degrees, label)) {
    value = degrees[label];
  }
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function norm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    const v = vector[i] ?? 0;
    sum += v * v;
  }
  return Math.sqrt(sum);
}

/**
 * Compute seed similarity scores for every row of a link matrix
 *
 * Columns whose total in-degree is zero carry no signal and are dropped.
 * A zero target vector, or a row with no weighted overlap, scores 0.
 */
export function computeSeedSimilarity(
  linkMatrix: LinkMatrix,
  inDegreeAll: InDegrees,
  inDegreeFromSeeds: InDegrees
): SeedSimilarityResult {
  const { matrix, rowLabels, colLabels } = linkMatrix;

  // Retained column index → position in the weight vectors
  const position = new Int32Array(colLabels.length).fill(-1);
  const weights: number[] = [];
  colLabels.forEach((label, col) => {
    const inAll = degreeOf(inDegreeAll, label);
    if (inAll === 0) {
      return;
    }
    position[col] = weights.length;
    weights.push(degreeOf(inDegreeFromSeeds, label) / inAll);
  });

  const columnsUsed = weights.length;
  const columnsRemoved = colLabels.length - columnsUsed;
  if (columnsRemoved > 0) {
    getLog().info('Removing pages with zero in-degree', { removed: columnsRemoved });
  }

  const pageWeight = Float64Array.from(weights);
  const targetVec = Float64Array.from(weights);
  const scores = new Map<string, number>();

  const targetNorm = norm(targetVec);
  if (targetNorm === 0) {
    for (const label of rowLabels) {
      scores.set(label, 0);
    }
    return { scores, pageWeight, targetVec, columnsRemoved, columnsUsed };
  }

  rowLabels.forEach((label, row) => {
    // Binary row scaled by pageWeight: the weighted value at column j is pageWeight[j]
    let dot = 0;
    let rowSquares = 0;
    for (const col of matrix.rowIndices(row)) {
      const at = position[col] ?? -1;
      if (at < 0) {
        continue;
      }
      const weighted = pageWeight[at] ?? 0;
      dot += weighted * (targetVec[at] ?? 0);
      rowSquares += weighted * weighted;
    }
    const similarity = dot / (Math.sqrt(rowSquares) * targetNorm);
    scores.set(label, Number.isFinite(similarity) ? similarity : 0);
  });

  return { scores, pageWeight, targetVec, columnsRemoved, columnsUsed };
}

/** In-degree maps derived from a link matrix */
export interface InDegreeCounts {
  /** Links to each column from any row */
  all: Map<string, number>;
  /** Links to each column from seed rows */
  fromSeeds: Map<string, number>;
}

/**
 * Count in-degrees of every column, overall and from the seed rows
 *
 * Seeds that are not rows of the matrix are ignored.
 */
export function computeInDegrees(linkMatrix: LinkMatrix, seeds: Iterable<string>): InDegreeCounts {
  const rowIndex = new Map(linkMatrix.rowLabels.map((label, i) => [label, i] as const));
  const seedRows = new Set<number>();
  for (const seed of seeds) {
    const row = rowIndex.get(seed);
    if (row !== undefined) {
      seedRows.add(row);
    }
  }

  const allSums = linkMatrix.matrix.columnSums();
  const seedSums = linkMatrix.matrix.columnSums(seedRows);

  const all = new Map<string, number>();
  const fromSeeds = new Map<string, number>();
  linkMatrix.colLabels.forEach((label, col) => {
    all.set(label, allSums[col] ?? 0);
    fromSeeds.set(label, seedSums[col] ?? 0);
  });
  return { all, fromSeeds };
}
