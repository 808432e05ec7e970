/**
 * Category membership matrix
 *
 * Expands seed categories breadth first: level 1 fetches the seeds, and each
 * further level fetches every member not yet expanded. Rows and columns are
 * labeled without the `Category:` prefix.
 */

import { createLogger } from '../lib/logger.js';
import { DEPTH_WARNING_THRESHOLD } from '../lib/constants.js';
import { ValidationError } from '../lib/errors.js';
import { fetchBatch } from '../client/batch.js';
import { buildMatrix, compareLabels, type CategoryMatrix } from '../processing/matrix.js';
import { cmtypeForNamespace, getCategoryMembers, stripCategoryPrefix } from './category.js';
import { resolveContext } from './context.js';
import { Namespace, type BatchApiOptions } from './types.js';

const getLog = () => createLogger('api:category-matrix');

export interface CategoryMatrixOptions extends BatchApiOptions {
  /** Levels of subcategories to expand (default: 1) */
  depth?: number;
  /** Namespace of the members (default: category) */
  namespace?: number;
}

/**
 * @throws {ValidationError} For a depth below 1, an unsupported namespace, or depth above 1 outside the category namespace
 */
export function validateMatrixOptions(depth: number, namespace: number): void {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new ValidationError(`depth must be a positive integer, got ${depth}`);
  }
  cmtypeForNamespace(namespace);
  if (depth > 1 && namespace !== Namespace.CATEGORY) {
    throw new ValidationError(`depth > 1 only applies to namespace ${Namespace.CATEGORY} (category)`);
  }
}

/**
 * Build a category → member matrix
 */
export async function getCategoryMembersMatrix(
  categories: readonly string[],
  options: CategoryMatrixOptions = {}
): Promise<CategoryMatrix> {
  const depth = options.depth ?? 1;
  const namespace = options.namespace ?? Namespace.CATEGORY;
  validateMatrixOptions(depth, namespace);

  const log = getLog();
  if (depth > DEPTH_WARNING_THRESHOLD) {
    log.warn('Deep category expansion may return too many results to be useful', { depth });
  }

  const context = resolveContext(options);
  const members = new Map<string, string[]>();

  const expand = async (names: readonly string[], level: number): Promise<void> => {
    log.info('Retrieving category members', { depth: level, categories: names.length, lang: context.lang });
    const { results } = await fetchBatch(
      names,
      async (name) => {
        const fetched = await getCategoryMembers(name, { ...context, namespace });
        return [name, fetched.map((member) => stripCategoryPrefix(member.title))] as const;
      },
      { maxConcurrency: options.maxConcurrency, onProgress: options.onProgress, logger: log }
    );

    // Results arrive in completion order; rows follow request order
    const byName = new Map(results);
    for (const name of names) {
      const row = stripCategoryPrefix(name);
      if (!members.has(row)) {
        members.set(row, byName.get(name) ?? []);
      }
    }
  };

  await expand(categories, 1);

  for (let level = 2; level <= depth; level++) {
    const discovered = new Set<string>();
    for (const rowMembers of members.values()) {
      for (const member of rowMembers) {
        if (!members.has(member)) {
          discovered.add(member);
        }
      }
    }
    if (discovered.size === 0) {
      break;
    }
    await expand([...discovered].sort(compareLabels), level);
  }

  log.debug('Constructing category member matrix', { rows: members.size });
  return buildMatrix(members);
}
