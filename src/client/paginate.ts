/**
 * Continuation-driven pagination
 *
 * MediaWiki list queries return a `continue` block while more results
 * exist. Each endpoint reads its own key from that block (`cmcontinue`,
 * `plcontinue`, ...); a block without that key ends the loop just like a
 * missing block does.
 */

import type { MediaWikiTransport, QueryParams } from './transport.js';
import { readContinuation, type ApiResponse } from './schemas.js';

/** One page of a paginated listing */
export interface PageResult<T> {
  items: T[];
  continuation?: string;
}

/** Inputs of a pagination loop */
export interface PaginateOptions<T> {
  transport: MediaWikiTransport;
  /** Parameters of the first request; later requests add the continuation key */
  params: QueryParams;
  lang: string;
  /** Endpoint-specific continuation parameter, e.g. `cmcontinue` */
  continueKey: string;
  /** Extract the items of one response */
  parse: (body: ApiResponse) => T[];
}

/**
 * Split one response into its items and continuation token
 */
export function toPageResult<T>(
  body: ApiResponse,
  continueKey: string,
  parse: (body: ApiResponse) => T[]
): PageResult<T> {
  const continuation = readContinuation(body, continueKey);
  const items = parse(body);
  return continuation === undefined ? { items } : { items, continuation };
}

/**
 * Yield pages in server continuation order
 *
 * Pages of one cursor chain are fetched strictly one after another.
 */
export async function* paginate<T>(options: PaginateOptions<T>): AsyncGenerator<PageResult<T>> {
  const { transport, lang, continueKey, parse } = options;
  const params: QueryParams = { ...options.params };

  for (;;) {
    const body = await transport.request(params, lang);
    const page = toPageResult(body, continueKey, parse);
    yield page;

    if (page.continuation === undefined) {
      return;
    }
    params[continueKey] = page.continuation;
  }
}

/**
 * Fetch every page and concatenate the items in cursor order
 */
export async function collectPages<T>(options: PaginateOptions<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const page of paginate(options)) {
    items.push(...page.items);
  }
  return items;
}
