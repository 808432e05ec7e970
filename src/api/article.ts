/**
 * Article text retrieval
 */

import { createLogger } from '../lib/logger.js';
import { fetchBatch } from '../client/batch.js';
import { firstPage, requireQuery, type ApiResponse } from '../client/schemas.js';
import type { QueryParams } from '../client/transport.js';
import { resolveContext } from './context.js';
import type { ApiOptions, Article, ArticleBatch, BatchApiOptions } from './types.js';

const getLog = () => createLogger('api:article');

/** Extracts shorter than this share of the wikitext size look truncated */
const TRUNCATION_RATIO = 0.5;

export function articleParams(title: string): QueryParams {
  return {
    action: 'query',
    prop: 'extracts|info',
    explaintext: '1',
    titles: title,
  };
}

/**
 * Whether an extract looks cut short
 *
 * A trailing ellipsis, or an extract under half the reported wikitext size.
 * This is a heuristic signal only.
 */
export function isPossiblyTruncated(text: string, wikitextLength?: number): boolean {
  const trimmed = text.trimEnd();
  if (trimmed.endsWith('…') || trimmed.endsWith('...')) {
    return true;
  }
  if (wikitextLength !== undefined && wikitextLength > 0) {
    return text.length < wikitextLength * TRUNCATION_RATIO;
  }
  return false;
}

export function parseArticle(body: ApiResponse, title: string, lang: string): Article {
  const page = firstPage(requireQuery(body, `article '${title}'`));
  const text = page?.extract ?? '';
  const article: Article = {
    title: page?.title ?? title,
    text,
    pageId: page?.pageid ?? -1,
    lang,
    possiblyTruncated: isPossiblyTruncated(text, page?.length),
  };
  if (page?.length !== undefined) {
    article.wikitextLength = page.length;
  }
  return article;
}

/**
 * Retrieve the plaintext of one article
 *
 * @throws {PageNotFoundError} If the page does not exist
 */
export async function getArticle(title: string, options: ApiOptions = {}): Promise<Article> {
  const { transport, lang } = resolveContext(options);
  getLog().info('Retrieving article text', { title, lang });

  const body = await transport.request(articleParams(title), lang, { checkMissing: true, title });
  return parseArticle(body, title, lang);
}

/**
 * Retrieve many articles with bounded concurrency
 *
 * Missing pages are listed in `missing`; any other failure rejects the batch.
 */
export async function getArticles(
  titles: readonly string[],
  options: BatchApiOptions = {}
): Promise<ArticleBatch> {
  const context = resolveContext(options);
  const { results, missing } = await fetchBatch(
    titles,
    (title) => getArticle(title, context),
    { ...options, logger: getLog() }
  );
  return { articles: results, missing };
}
