/**
 * Redirect resolution
 *
 * Single titles rely on the server following the chain. Batches of up to 50
 * titles come back as one flat `redirects` table plus a `normalized` table,
 * and the chain for every requested title is chased locally.
 */

import { createLogger } from '../lib/logger.js';
import { MAX_REDIRECT_HOPS, MAX_TITLES_PER_REQUEST } from '../lib/constants.js';
import { RedirectLoopError } from '../lib/errors.js';
import { fetchBatch } from '../client/batch.js';
import { collectPages } from '../client/paginate.js';
import { firstPage, requireQuery, type ApiResponse } from '../client/schemas.js';
import type { QueryParams } from '../client/transport.js';
import { resolveContext } from './context.js';
import type { ApiOptions, BatchApiOptions, RedirectMap } from './types.js';

const getLog = () => createLogger('api:redirects');

// ── Single redirect resolution ───────────────────────────────────────────────

export function redirectParams(titles: readonly string[]): QueryParams {
  return {
    action: 'query',
    titles: titles.join('|'),
    redirects: '',
  };
}

/**
 * Final destination reported for a single-title query, null when not a redirect
 */
export function parseRedirect(body: ApiResponse): string | null {
  const redirects = requireQuery(body, 'redirect').redirects ?? [];
  return redirects.at(-1)?.to ?? null;
}

/**
 * Destination of a title if it is a redirect, else null
 */
export async function resolveRedirect(title: string, options: ApiOptions = {}): Promise<string | null> {
  const { transport, lang } = resolveContext(options);
  getLog().info('Checking redirect status', { title, lang });

  const body = await transport.request(redirectParams([title]), lang);
  return parseRedirect(body);
}

// ── Batch redirect resolution ────────────────────────────────────────────────

/**
 * Follow a from→to table starting at `title`
 *
 * @returns The last title of the chain, or null if `title` is not a redirect
 * @throws {RedirectLoopError} When the chain revisits a title or exceeds `maxHops`
 */
export function chaseRedirect(
  title: string,
  table: ReadonlyMap<string, string>,
  maxHops: number = MAX_REDIRECT_HOPS
): string | null {
  let destination = table.get(title);
  if (destination === undefined) {
    return null;
  }

  const chain = [title, destination];
  const seen = new Set(chain);
  for (let next = table.get(destination); next !== undefined; next = table.get(destination)) {
    chain.push(next);
    if (seen.has(next) || chain.length - 1 > maxHops) {
      throw new RedirectLoopError(title, chain);
    }
    seen.add(next);
    destination = next;
  }
  return destination;
}

/**
 * Map every requested title of one batch response to its final destination
 */
export function parseBatchRedirects(body: ApiResponse, titles: readonly string[]): RedirectMap {
  const query = requireQuery(body, 'batch redirects');
  const table = new Map((query.redirects ?? []).map((rd) => [rd.from, rd.to] as const));
  const normalized = new Map((query.normalized ?? []).map((norm) => [norm.from, norm.to] as const));

  const result: RedirectMap = new Map();
  for (const title of titles) {
    const canonical = normalized.get(title) ?? title;
    result.set(title, chaseRedirect(canonical, table));
  }
  return result;
}

/**
 * Split titles into request-sized chunks
 */
export function chunkTitles(titles: readonly string[], size: number = MAX_TITLES_PER_REQUEST): string[][] {
  const chunks: string[][] = [];
  for (let i = 0; i < titles.length; i += size) {
    chunks.push(titles.slice(i, i + size));
  }
  return chunks;
}

/**
 * Resolve redirects for many titles, 50 per request, with bounded concurrency
 *
 * @returns Every input title exactly once, in input order
 */
export async function resolveRedirects(
  titles: readonly string[],
  options: BatchApiOptions = {}
): Promise<RedirectMap> {
  const { transport, lang } = resolveContext(options);
  const chunks = chunkTitles(titles);
  if (chunks.length > 0) {
    getLog().info('Resolving redirects', { titles: titles.length, requests: chunks.length, lang });
  }

  const { results } = await fetchBatch(
    chunks,
    async (chunk) => parseBatchRedirects(await transport.request(redirectParams(chunk), lang), chunk),
    { ...options, logger: getLog() }
  );

  const merged: RedirectMap = new Map();
  for (const chunkResult of results) {
    for (const [title, destination] of chunkResult) {
      merged.set(title, destination);
    }
  }

  const ordered: RedirectMap = new Map();
  for (const title of titles) {
    ordered.set(title, merged.get(title) ?? null);
  }
  return ordered;
}

// ── Pages that redirect TO a given page ──────────────────────────────────────

export function redirectsToParams(page: string): QueryParams {
  return {
    action: 'query',
    prop: 'redirects',
    titles: page,
    rdlimit: 'max',
  };
}

export function parseRedirectsTo(body: ApiResponse): string[] {
  const page = firstPage(requireQuery(body, 'redirects to'));
  return (page?.redirects ?? []).map((rd) => rd.title);
}

/**
 * List the pages that redirect to `page`
 */
export async function getRedirectsTo(page: string, options: ApiOptions = {}): Promise<string[]> {
  const { transport, lang } = resolveContext(options);
  getLog().info('Retrieving redirects to page', { page, lang });

  return collectPages({
    transport,
    params: redirectsToParams(page),
    lang,
    continueKey: 'rdcontinue',
    parse: parseRedirectsTo,
  });
}
