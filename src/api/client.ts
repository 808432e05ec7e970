/**
 * WikiCorpusClient
 *
 * One transport, one default language and one concurrency bound shared by
 * every operation. Per-call options override the defaults.
 *
 * @example
 * ```typescript
 * const client = new WikiCorpusClient({ lang: 'de', maxConcurrency: 8 });
 * const { articles, missing } = await client.getArticles(['Berlin', 'Hamburg']);
 * ```
 */

import { DEFAULT_LANG, DEFAULT_MAX_CONCURRENCY } from '../lib/constants.js';
import { ValidationError } from '../lib/errors.js';
import { RateLimiter } from '../client/rate-limiter.js';
import { MediaWikiTransport, type TransportConfig, type TransportStats } from '../client/transport.js';
import type { ClientConfig } from '../lib/config-schema.js';
import { getArticle, getArticles } from './article.js';
import { getCategoryMembers, getPageCategories, type CategoryMembersOptions, type PageCategoriesOptions } from './category.js';
import { getCategoryMembersMatrix, type CategoryMatrixOptions } from './category-matrix.js';
import { getLinks, type LinksOptions } from './links.js';
import { getRedirectsTo, resolveRedirect, resolveRedirects } from './redirects.js';
import { getTemplates } from './templates.js';
import type { CategoryMatrix } from '../processing/matrix.js';
import type {
  ApiOptions,
  Article,
  ArticleBatch,
  BatchApiOptions,
  CategoryMember,
  RedirectMap,
  WikiLink,
} from './types.js';

/** Client configuration */
export interface WikiCorpusClientConfig extends TransportConfig {
  /** Default wiki language (default: 'en') */
  lang?: string;
  /** Default concurrency for batch operations (default: 4) */
  maxConcurrency?: number;
  /** Transport to use instead of building one from this config */
  transport?: MediaWikiTransport;
}

/** Per-call overrides; the transport is always the client's own */
type CallOptions<T extends ApiOptions> = Omit<T, 'transport'>;

export class WikiCorpusClient {
  readonly lang: string;
  readonly maxConcurrency: number;
  readonly transport: MediaWikiTransport;

  constructor(config: WikiCorpusClientConfig = {}) {
    this.lang = config.lang ?? DEFAULT_LANG;
    this.maxConcurrency = config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
      throw new ValidationError(`maxConcurrency must be a positive integer, got ${this.maxConcurrency}`);
    }
    this.transport = config.transport ?? new MediaWikiTransport(config);
  }

  private options<T extends ApiOptions>(overrides: T): T & { lang: string; transport: MediaWikiTransport } {
    return { ...overrides, lang: overrides.lang ?? this.lang, transport: this.transport };
  }

  private batchOptions<T extends BatchApiOptions>(
    overrides: T
  ): T & { lang: string; transport: MediaWikiTransport; maxConcurrency: number } {
    return { ...this.options(overrides), maxConcurrency: overrides.maxConcurrency ?? this.maxConcurrency };
  }

  getArticle(title: string, options: CallOptions<ApiOptions> = {}): Promise<Article> {
    return getArticle(title, this.options(options));
  }

  getArticles(titles: readonly string[], options: CallOptions<BatchApiOptions> = {}): Promise<ArticleBatch> {
    return getArticles(titles, this.batchOptions(options));
  }

  getCategoryMembers(
    category: string,
    options: CallOptions<CategoryMembersOptions> = {}
  ): Promise<CategoryMember[]> {
    return getCategoryMembers(category, this.options(options));
  }

  getCategoryMembersMatrix(
    categories: readonly string[],
    options: CallOptions<CategoryMatrixOptions> = {}
  ): Promise<CategoryMatrix> {
    return getCategoryMembersMatrix(categories, this.batchOptions(options));
  }

  getPageCategories(page: string, options: CallOptions<PageCategoriesOptions> = {}): Promise<string[]> {
    return getPageCategories(page, this.options(options));
  }

  getLinks(page: string, options: CallOptions<LinksOptions> = {}): Promise<WikiLink[]> {
    return getLinks(page, this.options(options));
  }

  getTemplates(page: string, options: CallOptions<ApiOptions> = {}): Promise<string[]> {
    return getTemplates(page, this.options(options));
  }

  resolveRedirect(title: string, options: CallOptions<ApiOptions> = {}): Promise<string | null> {
    return resolveRedirect(title, this.options(options));
  }

  resolveRedirects(titles: readonly string[], options: CallOptions<BatchApiOptions> = {}): Promise<RedirectMap> {
    return resolveRedirects(titles, this.batchOptions(options));
  }

  getRedirectsTo(page: string, options: CallOptions<ApiOptions> = {}): Promise<string[]> {
    return getRedirectsTo(page, this.options(options));
  }

  getStats(): TransportStats {
    return this.transport.getStats();
  }
}

/**
 * Build a client from validated configuration
 */
export function createClient(config: ClientConfig = {}, overrides: TransportConfig = {}): WikiCorpusClient {
  const rateLimiter =
    overrides.rateLimiter ??
    new RateLimiter({ capacity: config.rateLimitCapacity, refillRate: config.rateLimitRefillRate });

  return new WikiCorpusClient({
    ...overrides,
    rateLimiter,
    lang: config.lang,
    maxConcurrency: config.maxConcurrency,
    maxRetries: overrides.maxRetries ?? config.maxRetries,
    baseDelayMs: overrides.baseDelayMs ?? config.baseDelayMs,
    timeoutMs: overrides.timeoutMs ?? config.timeoutMs,
    userAgent: overrides.userAgent ?? config.userAgent,
  });
}
