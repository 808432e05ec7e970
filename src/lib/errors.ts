/**
 * Typed error hierarchy for the MediaWiki client
 *
 * Every failure the client surfaces carries a `kind` discriminator so callers
 * can decide whether to retry, skip or abort without string matching.
 *
 * Usage:
 * ```ts
 * import { PageNotFoundError, isTypedError } from './lib/errors.js';
 *
 * try {
 *   await getArticle('Some title');
 * } catch (error) {
 *   if (error instanceof PageNotFoundError) { ... }
 *   if (isTypedError(error) && error.kind === 'RATE_LIMIT') { ... }
 * }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'NETWORK'
  | 'RATE_LIMIT'
  | 'HTTP_STATUS'
  | 'API'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'REDIRECT_LOOP';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Connection-level failure (reset, refused, protocol error, timeout)
 *
 * Carries status 0 since no HTTP response was received.
 */
export class NetworkError extends Error implements TypedError {
  readonly kind = 'NETWORK' as const;
  readonly status = 0;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Server answered HTTP 429 on every attempt
 */
export class RateLimitError extends Error implements TypedError {
  readonly kind = 'RATE_LIMIT' as const;
  readonly status = 429;

  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Non-2xx response other than a retried 429
 */
export class HttpStatusError extends Error implements TypedError {
  readonly kind = 'HTTP_STATUS' as const;

  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'HttpStatusError';
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

/**
 * MediaWiki `error` envelope in an otherwise successful response
 */
export class ApiError extends Error implements TypedError {
  readonly kind = 'API' as const;

  constructor(
    message: string,
    public readonly code: string,
    public readonly info: string
  ) {
    super(message);
    this.name = 'ApiError';
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

/**
 * The requested page does not exist
 *
 * An expected outcome in batch operations, where it is recorded rather than thrown.
 */
export class PageNotFoundError extends Error implements TypedError {
  readonly kind = 'NOT_FOUND' as const;

  constructor(
    public readonly title: string,
    public readonly lang: string
  ) {
    super(`Page not found: '${title}' (lang=${lang})`);
    this.name = 'PageNotFoundError';
    Object.setPrototypeOf(this, PageNotFoundError.prototype);
  }
}

/**
 * Caller supplied invalid parameters; raised before any network call
 */
export class ValidationError extends Error implements TypedError {
  readonly kind = 'VALIDATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Redirect table contains a cycle or a chain longer than the hop cap
 */
export class RedirectLoopError extends Error implements TypedError {
  readonly kind = 'REDIRECT_LOOP' as const;

  constructor(
    public readonly title: string,
    public readonly chain: readonly string[]
  ) {
    super(`Redirect chain for '${title}' did not terminate: ${chain.join(' -> ')}`);
    this.name = 'RedirectLoopError';
    Object.setPrototypeOf(this, RedirectLoopError.prototype);
  }
}

/** Every concrete error class the client throws */
export type WikiCorpusError =
  | NetworkError
  | RateLimitError
  | HttpStatusError
  | ApiError
  | PageNotFoundError
  | ValidationError
  | RedirectLoopError;

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'NETWORK',
  'RATE_LIMIT',
  'HTTP_STATUS',
  'API',
  'NOT_FOUND',
  'VALIDATION',
  'REDIRECT_LOOP',
]);

/**
 * Type guard to check if an error is one of the client's typed errors
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string' &&
    ERROR_KINDS.has(error.kind)
  );
}

/**
 * Whether the transport retries this kind locally before surfacing it
 */
export function isRetryableKind(kind: ErrorKind): boolean {
  switch (kind) {
    case 'NETWORK':
    case 'RATE_LIMIT':
      return true;
    default:
      return false;
  }
}
