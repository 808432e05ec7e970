/**
 * Article Command
 *
 * Fetch the plaintext of one or more articles.
 */

import { Command } from 'commander';
import type { ArticleBatch } from '../api/types.js';
import { cutArticlesAtHeadings } from '../processing/text.js';
import { color, formatNumber, formatTable, parseList, warn } from './utils.js';
import { clientFromOptions, printJson, progressReporter, runAction, withClientOptions, type GlobalOptions } from './shared.js';

/** Article command options */
interface ArticleOptions extends GlobalOptions {
  text: boolean;
  cut?: string;
}

/**
 * Render fetched articles as a summary table, or as full text
 */
export function renderArticles(batch: ArticleBatch, showText: boolean): string {
  if (showText) {
    return batch.articles.map((article) => `${color.bold(`# ${article.title}`)}\n\n${article.text}\n`).join('\n');
  }

  const rows = batch.articles.map((article) => ({
    Title: article.title,
    'Page ID': String(article.pageId),
    Characters: formatNumber(article.text.length),
    Truncated: article.possiblyTruncated ? color.yellow('maybe') : 'no',
  }));
  return formatTable(rows, ['Title', 'Page ID', 'Characters', 'Truncated']);
}

export const articleCommand = withClientOptions(
  new Command('article')
    .description('Fetch the plaintext of articles')
    .argument('<titles...>', 'Article titles')
    .option('-t, --text', 'Print the full text instead of a summary', false)
    .option('--cut <headings>', 'Drop text from these headings onward (comma-separated)')
).action(async (titles: string[], options: ArticleOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const progress = progressReporter(!options.json && (process.stderr.isTTY ?? false));
    const batch = await client.getArticles(titles, { onProgress: progress.onProgress });
    progress.finish();

    if (options.cut) {
      const cut = cutArticlesAtHeadings(
        batch.articles.map((article) => article.text),
        parseList(options.cut)
      );
      batch.articles = batch.articles.map((article, i) => ({ ...article, text: cut[i] ?? article.text }));
    }

    if (options.json) {
      printJson(batch);
      return;
    }

    console.log(renderArticles(batch, options.text));
    if (batch.missing.length > 0) {
      warn(`Not found: ${batch.missing.join(', ')}`);
    }
  })
);
