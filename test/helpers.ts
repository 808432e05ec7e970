/**
 * Test helpers and utilities
 */

import { vi, type Mock } from 'vitest';
import { RateLimiter } from '../src/client/rate-limiter.js';
import { MediaWikiTransport, type TransportConfig } from '../src/client/transport.js';
import { Logger, type LogEntry, type LoggerProvider } from '../src/lib/logger.js';

/** Responds to one request given its query parameters and call index */
export type FetchHandler = (params: URLSearchParams, call: number) => Response | Promise<Response>;

export type FetchMock = Mock<typeof fetch>;

/**
 * Create a JSON response
 */
export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

/**
 * Query parameters of a fetch input
 */
export function requestParams(input: string | URL | Request): URLSearchParams {
  if (input instanceof URL) {
    return input.searchParams;
  }
  return new URL(typeof input === 'string' ? input : input.url).searchParams;
}

/**
 * Create a fetch mock driven by a handler
 */
export function createFetchMock(handler: FetchHandler): FetchMock {
  let call = 0;
  return vi.fn<typeof fetch>(async (input) => handler(requestParams(input), call++));
}

/**
 * Create a fetch mock that answers every request with the same body
 */
export function fetchReturning(body: unknown): FetchMock {
  return createFetchMock(() => jsonResponse(body));
}

/**
 * Query parameters of the nth call of a fetch mock
 */
export function paramsOfCall(fetchMock: FetchMock, index: number): URLSearchParams {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} times, no call #${index}`);
  }
  return requestParams(call[0]);
}

/**
 * Rate limiter that never makes a test wait
 */
export function createUnlimitedLimiter(): RateLimiter {
  return new RateLimiter({ capacity: 1_000_000, refillRate: 1_000_000 });
}

/**
 * Transport with instant backoff and an unlimited rate limiter
 */
export function createTestTransport(
  fetchMock: typeof fetch,
  overrides: TransportConfig = {}
): MediaWikiTransport {
  return new MediaWikiTransport({
    fetch: fetchMock,
    rateLimiter: createUnlimitedLimiter(),
    baseDelayMs: 0,
    sleep: async () => undefined,
    ...overrides,
  });
}

/**
 * Logger provider whose loggers write JSON entries into one shared list
 */
export function createRecordingLoggerProvider(): LoggerProvider & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const loggers = new Map<string, Logger>();
  return {
    entries,
    createLogger(name: string): Logger {
      let logger = loggers.get(name);
      if (!logger) {
        logger = new Logger({
          name,
          level: 'debug',
          format: 'json',
          sink: (line) => {
            entries.push(JSON.parse(line));
          },
        });
        loggers.set(name, logger);
      }
      return logger;
    },
  };
}

/**
 * Single-page query body in formatversion 1 shape
 */
export function pageBody(page: Record<string, unknown>, extra: Record<string, unknown> = {}): Record<string, unknown> {
  const id = typeof page['pageid'] === 'number' ? String(page['pageid']) : '-1';
  return {
    batchcomplete: '',
    ...extra,
    query: { pages: { [id]: page } },
  };
}

/**
 * Body of a missing page
 */
export function missingPageBody(title: string): Record<string, unknown> {
  return pageBody({ ns: 0, title, missing: '' });
}

/**
 * Resolves once every pending microtask and timer callback queued so far has run
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
