/**
 * Redirect Commands
 *
 * `redirects` resolves titles to their final destination; `redirects-to`
 * lists the pages that redirect to a page.
 */

import { Command } from 'commander';
import type { RedirectMap } from '../api/types.js';
import { overwriteRedirects } from '../processing/redirects.js';
import { color, formatTable } from './utils.js';
import { clientFromOptions, printJson, progressReporter, runAction, withClientOptions, type GlobalOptions } from './shared.js';

interface RedirectsOptions extends GlobalOptions {
  overwrite: boolean;
}

export function renderRedirects(redirects: RedirectMap): string {
  const rows = [...redirects].map(([title, destination]) => ({
    Title: title,
    Destination: destination ?? color.dim('(not a redirect)'),
  }));
  return formatTable(rows, ['Title', 'Destination']);
}

export const redirectsCommand = withClientOptions(
  new Command('redirects')
    .description('Resolve titles to their redirect destinations')
    .argument('<titles...>', 'Page titles')
    .option('-o, --overwrite', 'Print the deduplicated list of resolved titles', false)
).action(async (titles: string[], options: RedirectsOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const progress = progressReporter(!options.json && (process.stderr.isTTY ?? false));
    const redirects = await client.resolveRedirects(titles, { onProgress: progress.onProgress });
    progress.finish();

    if (options.overwrite) {
      const resolved = overwriteRedirects(titles, redirects);
      if (options.json) {
        printJson(resolved);
      } else {
        console.log(resolved.join('\n'));
      }
      return;
    }

    if (options.json) {
      printJson(redirects);
      return;
    }
    console.log(renderRedirects(redirects));
  })
);

export const redirectsToCommand = withClientOptions(
  new Command('redirects-to')
    .description('List the pages that redirect to a page')
    .argument('<page>', 'Target page title')
).action(async (page: string, options: GlobalOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const sources = await client.getRedirectsTo(page);

    if (options.json) {
      printJson({ page, redirects: sources });
      return;
    }
    console.log(`\n  ${color.bold(page)}: ${sources.length} redirects\n`);
    for (const source of sources) {
      console.log(`    ${source}`);
    }
    console.log('');
  })
);
