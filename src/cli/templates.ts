/**
 * Templates Command
 */

import { Command } from 'commander';
import { color } from './utils.js';
import { clientFromOptions, printJson, runAction, withClientOptions, type GlobalOptions } from './shared.js';

export const templatesCommand = withClientOptions(
  new Command('templates')
    .description('List the templates transcluded on a page')
    .argument('<page>', 'Page title')
).action(async (page: string, options: GlobalOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const templates = await client.getTemplates(page);

    if (options.json) {
      printJson({ page, templates });
      return;
    }
    console.log(`\n  ${color.bold(page)}: ${templates.length} templates\n`);
    for (const template of templates) {
      console.log(`    ${template}`);
    }
    console.log('');
  })
);
