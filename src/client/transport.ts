/**
 * HTTP transport for the MediaWiki API
 *
 * The single owner of network I/O. Every physical request:
 * - waits for a rate limiter token
 * - is classified into a RequestOutcome
 * - is retried with exponential backoff on transient failures and HTTP 429
 *
 * Everything else (HTTP errors, API error envelopes, missing pages) surfaces
 * immediately as a typed error.
 */

import { createLogger, type Logger } from '../lib/logger.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  defaultEndpoint,
} from '../lib/constants.js';
import {
  ApiError,
  HttpStatusError,
  NetworkError,
  PageNotFoundError,
  RateLimitError,
  ValidationError,
} from '../lib/errors.js';
import { RateLimiter, sleep } from './rate-limiter.js';
import { ApiResponseSchema, firstPage, parseQuery, type ApiResponse } from './schemas.js';

/** Query-string parameters of one request (`format=json` is added) */
export type QueryParams = Record<string, string>;

/** Result of one physical round trip */
export type RequestOutcome =
  | { kind: 'success'; body: ApiResponse }
  | { kind: 'transient'; cause: unknown }
  | { kind: 'rate_limited'; retryAfterMs?: number }
  | { kind: 'client_error'; status: number; message: string }
  | { kind: 'api_error'; code: string; info: string };

/** Transport configuration */
export interface TransportConfig {
  /** Fetch implementation, e.g. one bound to a keep-alive agent (default: global fetch) */
  fetch?: typeof fetch;
  /** Shared rate limiter; a private one is built when omitted */
  rateLimiter?: RateLimiter;
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Base backoff delay in ms, doubled per attempt (default: 1000) */
  baseDelayMs?: number;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  userAgent?: string;
  /** api.php URL for a language code */
  endpoint?: (lang: string) => string;
  /** Suspension used for backoff */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Per-request options */
export interface RequestOptions {
  /** Raise PageNotFoundError when the sole page of the response is missing */
  checkMissing?: boolean;
  /** Title reported in PageNotFoundError */
  title?: string;
}

/** Counters for one transport instance */
export interface TransportStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  retries: number;
  rateLimitHits: number;
}

function emptyStats(): TransportStats {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    retries: 0,
    rateLimitHits: 0,
  };
}

/**
 * Parse a Retry-After header given in seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return seconds * 1000;
}

export class MediaWikiTransport {
  readonly rateLimiter: RateLimiter;
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly timeoutMs: number;
  readonly userAgent: string;

  private readonly fetchFn: typeof fetch;
  private readonly endpoint: (lang: string) => string;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly log: Logger;
  private stats: TransportStats = emptyStats();

  constructor(config: TransportConfig = {}) {
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.rateLimiter = config.rateLimiter ?? new RateLimiter();
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = config.baseDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.endpoint = config.endpoint ?? defaultEndpoint;
    this.sleepFn = config.sleep ?? sleep;
    this.log = config.logger ?? createLogger('client:transport');

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new ValidationError(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }
  }

  /**
   * Issue a GET against api.php, retrying transient failures and 429s
   *
   * @throws {NetworkError} Transport failure on every attempt
   * @throws {RateLimitError} HTTP 429 on every attempt
   * @throws {HttpStatusError} Any other status >= 400
   * @throws {ApiError} MediaWiki error envelope
   * @throws {PageNotFoundError} `checkMissing` and the page does not exist
   */
  async request(
    params: QueryParams,
    lang: string,
    options: RequestOptions = {}
  ): Promise<ApiResponse> {
    const url = this.buildUrl(params, lang);

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      await this.rateLimiter.acquire();
      this.stats.totalRequests++;

      const outcome = await this.attempt(url);
      const isLast = attempt === this.maxRetries;

      switch (outcome.kind) {
        case 'success':
          this.stats.successfulRequests++;
          this.checkMissing(outcome.body, lang, options);
          return outcome.body;

        case 'transient': {
          if (isLast) {
            this.stats.failedRequests++;
            const reason = outcome.cause instanceof Error ? outcome.cause.message : String(outcome.cause);
            throw new NetworkError(`Request to ${lang} wiki failed: ${reason}`, { cause: outcome.cause });
          }
          const delay = this.baseDelayMs * 2 ** attempt;
          this.log.warn(
            'Transient error, retrying',
            { attempt: attempt + 1, maxRetries: this.maxRetries, delayMs: delay, error: outcome.cause }
          );
          this.stats.retries++;
          await this.sleepFn(delay);
          break;
        }

        case 'rate_limited': {
          this.stats.rateLimitHits++;
          if (isLast) {
            this.stats.failedRequests++;
            throw new RateLimitError('HTTP 429: Too Many Requests', outcome.retryAfterMs);
          }
          const delay = outcome.retryAfterMs ?? this.baseDelayMs * 2 ** attempt;
          this.log.warn(
            'Rate limited, retrying',
            { attempt: attempt + 1, maxRetries: this.maxRetries, delayMs: delay }
          );
          this.stats.retries++;
          await this.sleepFn(delay);
          break;
        }

        case 'client_error':
          this.stats.failedRequests++;
          throw new HttpStatusError(outcome.message, outcome.status);

        case 'api_error':
          this.stats.failedRequests++;
          throw new ApiError(outcome.info || 'Unknown API error', outcome.code, outcome.info);
      }
    }

    // The loop either returns or throws on its last attempt
    throw new NetworkError('Retry loop exited without a result');
  }

  /**
   * Perform one round trip and classify it
   */
  async attempt(url: URL): Promise<RequestOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: controller.signal,
      });

      if (response.status === 429) {
        return { kind: 'rate_limited', retryAfterMs: parseRetryAfter(response.headers.get('Retry-After')) };
      }
      if (response.status >= 400) {
        return {
          kind: 'client_error',
          status: response.status,
          message: `HTTP ${response.status}: ${response.statusText}`,
        };
      }

      const text = await response.text();
      return classifyBody(response.status, text);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return { kind: 'transient', cause: new Error(`Request timeout after ${this.timeoutMs}ms`) };
      }
      return { kind: 'transient', cause: error };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Full request URL for a parameter set
   */
  buildUrl(params: QueryParams, lang: string): URL {
    const url = new URL(this.endpoint(lang));
    url.searchParams.set('format', 'json');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private checkMissing(body: ApiResponse, lang: string, options: RequestOptions): void {
    if (!options.checkMissing) {
      return;
    }
    const query = parseQuery(body);
    if (!query.success) {
      return;
    }
    const page = firstPage(query.data);
    if (page && page.missing !== undefined) {
      throw new PageNotFoundError(options.title ?? page.title ?? '', lang);
    }
  }

  getStats(): TransportStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }
}

/**
 * Classify a 2xx body: JSON envelope, API error, or unusable payload
 */
export function classifyBody(status: number, text: string): RequestOutcome {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { kind: 'client_error', status, message: `HTTP ${status}: response is not valid JSON` };
  }

  const parsed = ApiResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'client_error', status, message: `HTTP ${status}: unexpected response shape` };
  }

  const body = parsed.data;
  if (body.error) {
    return {
      kind: 'api_error',
      code: body.error.code ?? 'unknown',
      info: body.error.info ?? '',
    };
  }
  return { kind: 'success', body };
}

/**
 * Create a transport instance
 */
export function createTransport(config: TransportConfig = {}): MediaWikiTransport {
  return new MediaWikiTransport(config);
}
