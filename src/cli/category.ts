/**
 * Category Command
 *
 * List the members of a category, or expand categories into a membership
 * matrix with --depth.
 */

import { Command } from 'commander';
import { Namespace, type CategoryMember } from '../api/types.js';
import type { CategoryMatrix } from '../processing/matrix.js';
import { color, formatNumber, formatTable, parsePositiveInt } from './utils.js';
import { clientFromOptions, printJson, progressReporter, runAction, withClientOptions, type GlobalOptions } from './shared.js';

/** Category command options */
interface CategoryOptions extends GlobalOptions {
  subcats: boolean;
  depth?: string;
}

export function renderMembers(category: string, members: readonly CategoryMember[]): string {
  if (members.length === 0) {
    return color.yellow(`\n  No members found in ${category}.\n`);
  }
  const rows = members.map((member) => ({
    Title: member.title,
    'Page ID': String(member.pageId),
    NS: String(member.ns),
  }));
  return `\n  ${color.bold(category)}: ${formatNumber(members.length)} members\n\n${formatTable(rows, ['Title', 'Page ID', 'NS'])}\n`;
}

/**
 * Summary of a membership matrix: shape and member count per category
 */
export function summarizeMatrix(result: CategoryMatrix): {
  rows: number;
  columns: number;
  cells: number;
  categories: { category: string; members: number }[];
} {
  return {
    rows: result.matrix.rows,
    columns: result.matrix.cols,
    cells: result.matrix.nnz,
    categories: result.rowLabels.map((category, row) => ({
      category,
      members: result.matrix.rowIndices(row).length,
    })),
  };
}

export function renderMatrixSummary(result: CategoryMatrix): string {
  const summary = summarizeMatrix(result);
  const rows = summary.categories.map(({ category, members }) => ({
    Category: category,
    Members: formatNumber(members),
  }));
  return [
    '',
    `  Matrix: ${formatNumber(summary.rows)} categories x ${formatNumber(summary.columns)} members, ${formatNumber(summary.cells)} links`,
    '',
    formatTable(rows, ['Category', 'Members']),
    '',
  ].join('\n');
}

export const categoryCommand = withClientOptions(
  new Command('category')
    .description('List category members, or build a membership matrix with --depth')
    .argument('<names...>', 'Category names, with or without the Category: prefix')
    .option('-s, --subcats', 'List subcategories instead of pages', false)
    .option('-d, --depth <levels>', 'Expand subcategories this many levels into a matrix')
).action(async (names: string[], options: CategoryOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const namespace = options.subcats ? Namespace.CATEGORY : Namespace.MAIN;

    if (options.depth !== undefined) {
      const depth = parsePositiveInt(options.depth, '--depth');
      const progress = progressReporter(!options.json && (process.stderr.isTTY ?? false));
      const result = await client.getCategoryMembersMatrix(names, {
        depth,
        namespace,
        onProgress: progress.onProgress,
      });
      progress.finish();

      if (options.json) {
        printJson(summarizeMatrix(result));
      } else {
        console.log(renderMatrixSummary(result));
      }
      return;
    }

    for (const name of names) {
      const members = await client.getCategoryMembers(name, { namespace });
      if (options.json) {
        printJson({ category: name, members });
      } else {
        console.log(renderMembers(name, members));
      }
    }
  })
);
