/**
 * Links Command
 *
 * List the outgoing links of a page, or the pages linking to it.
 */

import { Command } from 'commander';
import type { WikiLink } from '../api/types.js';
import { ValidationError } from '../lib/errors.js';
import { color, formatNumber, formatTable, parseList } from './utils.js';
import { clientFromOptions, printJson, runAction, withClientOptions, type GlobalOptions } from './shared.js';

interface LinksOptions extends GlobalOptions {
  incoming: boolean;
  namespaces: string;
}

export function renderLinks(page: string, links: readonly WikiLink[], incoming: boolean): string {
  const heading = incoming ? `Pages linking to ${page}` : `Links from ${page}`;
  if (links.length === 0) {
    return color.yellow(`\n  ${heading}: none\n`);
  }
  const rows = links.map((link) => ({ Title: link.title, 'Page ID': String(link.pageId), NS: String(link.ns) }));
  return `\n  ${color.bold(heading)}: ${formatNumber(links.length)}\n\n${formatTable(rows, ['Title', 'Page ID', 'NS'])}\n`;
}

/**
 * Parse a comma-separated namespace list such as "0,14"
 */
export function parseNamespaces(value: string): number[] {
  return parseList(value).map((item) => {
    const ns = Number(item);
    if (!Number.isInteger(ns) || ns < 0) {
      throw new ValidationError(`Invalid namespace: ${item}`);
    }
    return ns;
  });
}

export const linksCommand = withClientOptions(
  new Command('links')
    .description('List links from a page, or to it with --incoming')
    .argument('<page>', 'Page title')
    .option('-i, --incoming', 'List pages linking to the page', false)
    .option('-n, --namespaces <ids>', 'Namespaces to include (comma-separated)', '0')
).action(async (page: string, options: LinksOptions) =>
  runAction(async () => {
    const client = await clientFromOptions(options);
    const links = await client.getLinks(page, {
      direction: options.incoming ? 'incoming' : 'outgoing',
      namespaces: parseNamespaces(options.namespaces),
    });

    if (options.json) {
      printJson({ page, direction: options.incoming ? 'incoming' : 'outgoing', links });
      return;
    }
    console.log(renderLinks(page, links, options.incoming));
  })
);
