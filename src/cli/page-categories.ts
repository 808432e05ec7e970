/**
 * Page Categories Command
 */

import { Command } from 'commander';
import { color } from './utils.js';
import { clientFromOptions, printJson, runAction, withClientOptions, type GlobalOptions } from './shared.js';

interface PageCategoriesOptions extends GlobalOptions {
  hidden: boolean;
}

export const pageCategoriesCommand = withClientOptions(
  new Command('page-categories')
    .description('List the categories a page belongs to')
    .argument('<page>', 'Page title')
    .option('--hidden', 'Include hidden maintenance categories', false)
).action(async (page: string, options: PageCategoriesOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const categories = await client.getPageCategories(page, { hidden: options.hidden });

    if (options.json) {
      printJson({ page, categories });
      return;
    }
    if (categories.length === 0) {
      console.log(color.yellow(`\n  ${page} has no categories.\n`));
      return;
    }
    console.log(`\n  ${color.bold(page)}\n`);
    for (const category of categories) {
      console.log(`    ${category}`);
    }
    console.log('');
  })
);
