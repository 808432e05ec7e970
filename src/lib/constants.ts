/**
 * Centralized constants for the MediaWiki client
 *
 * Defaults shared across the transport, the batch helpers and the CLI.
 * Import from here to ensure consistency.
 */

// ============================================================================
// Wire
// ============================================================================

/** Client version reported in the User-Agent */
export const CLIENT_VERSION = '0.1.0';

/** Identifying User-Agent sent with every request */
export const DEFAULT_USER_AGENT = `wikicorpus/${CLIENT_VERSION} (corpus harvesting client; Node.js fetch)`;

/** Default wiki language code */
export const DEFAULT_LANG = 'en';

/** Build the api.php endpoint for a language edition */
export function defaultEndpoint(lang: string): string {
  return `https://${lang}.wikipedia.org/w/api.php`;
}

// ============================================================================
// Retry Configuration
// ============================================================================

/** Default maximum number of retries after the first attempt */
export const DEFAULT_MAX_RETRIES = 3;

/** Base backoff delay in milliseconds (doubles each retry) */
export const DEFAULT_RETRY_DELAY_MS = 1000;

// ============================================================================
// Timeout Configuration
// ============================================================================

/** Default request timeout in milliseconds (30 seconds) */
export const DEFAULT_TIMEOUT_MS = 30_000;

// ============================================================================
// Rate Limiting
// ============================================================================

/** Token bucket capacity (burst size) */
export const DEFAULT_RATE_LIMIT_CAPACITY = 10;

/** Tokens added per second */
export const DEFAULT_RATE_LIMIT_REFILL_RATE = 50;

// ============================================================================
// Batching
// ============================================================================

/** Default number of concurrent requests in batch operations */
export const DEFAULT_MAX_CONCURRENCY = 4;

/** MediaWiki accepts at most 50 titles per query for anonymous clients */
export const MAX_TITLES_PER_REQUEST = 50;

/** Hop cap when chasing redirect chains */
export const MAX_REDIRECT_HOPS = 20;

// ============================================================================
// Namespaces
// ============================================================================

/** Prefix of the category namespace */
export const CATEGORY_PREFIX = 'Category:';

/** Category expansion beyond this depth is usually combinatorial */
export const DEPTH_WARNING_THRESHOLD = 3;

/** Default number of rows in a heading frequency table */
export const DEFAULT_TOP_HEADINGS = 25;
