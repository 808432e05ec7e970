/**
 * wikicorpus - Main Library Entry Point
 *
 * Re-exports the client, the endpoint operations and the corpus processing
 * helpers for library consumers.
 */

// ============================================================================
// CLIENT - Rate limiting, transport, pagination, batching
// ============================================================================
export { RateLimiter, sleep } from './client/rate-limiter.js'
export type { RateLimiterConfig } from './client/rate-limiter.js'

export { MediaWikiTransport, createTransport, parseRetryAfter, classifyBody } from './client/transport.js'
export type {
  QueryParams,
  RequestOutcome,
  RequestOptions,
  TransportConfig,
  TransportStats,
} from './client/transport.js'

export { paginate, collectPages } from './client/paginate.js'
export type { PageResult, PaginateOptions } from './client/paginate.js'

export { fetchBatch, settleItem } from './client/batch.js'
export type { BatchOptions, BatchResult, ItemOutcome } from './client/batch.js'

export type { ApiResponse, Page, PageRef, Query } from './client/schemas.js'

// ============================================================================
// API - Endpoint operations
// ============================================================================
export { WikiCorpusClient, createClient } from './api/client.js'
export type { WikiCorpusClientConfig } from './api/client.js'

export { getArticle, getArticles, isPossiblyTruncated } from './api/article.js'
export {
  getCategoryMembers,
  getPageCategories,
  normalizeCategory,
  stripCategoryPrefix,
} from './api/category.js'
export type { CategoryMembersOptions, PageCategoriesOptions } from './api/category.js'
export { getCategoryMembersMatrix } from './api/category-matrix.js'
export type { CategoryMatrixOptions } from './api/category-matrix.js'
export { getLinks } from './api/links.js'
export type { LinksOptions } from './api/links.js'
export { getTemplates } from './api/templates.js'
export { resolveRedirect, resolveRedirects, getRedirectsTo } from './api/redirects.js'

export { Namespace } from './api/types.js'
export type {
  ApiOptions,
  Article,
  ArticleBatch,
  BatchApiOptions,
  CategoryMember,
  LinkDirection,
  RedirectMap,
  WikiLink,
} from './api/types.js'

// ============================================================================
// PROCESSING - Matrices, similarity, text
// ============================================================================
export { SparseBinaryMatrix, buildMatrix, columnIndex } from './processing/matrix.js'
export type { CategoryMatrix, LabeledSparseMatrix, LinkMatrix, Relations } from './processing/matrix.js'

export { computeSeedSimilarity, computeInDegrees } from './processing/seed-similarity.js'
export type { InDegreeCounts, InDegrees, SeedSimilarityResult } from './processing/seed-similarity.js'

export {
  getHeadings,
  splitText,
  joinSections,
  cutAtHeadings,
  cutArticlesAtHeadings,
} from './processing/text.js'
export type { Section } from './processing/text.js'

export { countHeadings, topHeadings } from './processing/heading-frequency.js'
export type { HeadingFrequency } from './processing/heading-frequency.js'

export { overwriteRedirects } from './processing/redirects.js'

// ============================================================================
// ERRORS, LOGGING, CONFIG
// ============================================================================
export {
  NetworkError,
  RateLimitError,
  HttpStatusError,
  ApiError,
  PageNotFoundError,
  ValidationError,
  RedirectLoopError,
  isTypedError,
  isRetryableKind,
} from './lib/errors.js'
export type { ErrorKind, TypedError, WikiCorpusError } from './lib/errors.js'

export {
  Logger,
  createLogger,
  setLoggerProvider,
  resetLoggerProvider,
  withRunContext,
  generateRunId,
} from './lib/logger.js'
export type { EntryLevel, LogEntry, LogFormat, LogLevel, LogSink, LoggerConfig, LoggerProvider, RunContext } from './lib/logger.js'

export { ClientConfigSchema, validateClientConfig } from './lib/config-schema.js'
export type { ClientConfig } from './lib/config-schema.js'
