/**
 * Headings Command
 *
 * Fetch articles and tabulate their most frequent level-2 headings.
 */

import { Command } from 'commander';
import { DEFAULT_TOP_HEADINGS } from '../lib/constants.js';
import { countHeadings, topHeadings, type HeadingFrequency } from '../processing/heading-frequency.js';
import { formatNumber, formatTable, parsePositiveInt, warn } from './utils.js';
import { clientFromOptions, printJson, progressReporter, runAction, withClientOptions, type GlobalOptions } from './shared.js';

interface HeadingsOptions extends GlobalOptions {
  top: string;
}

export function renderHeadingFrequency(frequencies: readonly HeadingFrequency[]): string {
  const rows = frequencies.map((frequency) => ({
    Heading: frequency.heading,
    Count: formatNumber(frequency.count),
    Proportion: `${(frequency.proportion * 100).toFixed(1)}%`,
  }));
  return formatTable(rows, ['Heading', 'Count', 'Proportion']);
}

export const headingsCommand = withClientOptions(
  new Command('headings')
    .description('Show the most frequent section headings of articles')
    .argument('<titles...>', 'Article titles')
    .option('-n, --top <count>', 'Number of headings to show', String(DEFAULT_TOP_HEADINGS))
).action(async (titles: string[], options: HeadingsOptions) =>
  runAction(async () => {
    const top = parsePositiveInt(options.top, '--top');
    const client = await clientFromOptions(options);
    const progress = progressReporter(!options.json && (process.stderr.isTTY ?? false));
    const batch = await client.getArticles(titles, { onProgress: progress.onProgress });
    progress.finish();

    const frequencies = topHeadings(countHeadings(batch.articles.map((article) => article.text)), top);

    if (options.json) {
      printJson(frequencies);
      return;
    }
    if (frequencies.length === 0) {
      console.log('\n  No level-2 headings found.\n');
    } else {
      console.log(`\n  Top headings across ${formatNumber(batch.articles.length)} articles\n`);
      console.log(renderHeadingFrequency(frequencies));
      console.log('');
    }
    if (batch.missing.length > 0) {
      warn(`Not found: ${batch.missing.join(', ')}`);
    }
  })
);
