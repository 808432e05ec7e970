/**
 * Bounded-concurrency fan-out over independent fetches
 *
 * A fixed pool of workers pulls items from one shared iterator, so at most
 * `maxConcurrency` fetches are in flight and nothing is started ahead of a
 * free slot. Missing pages are recorded per item; any other failure stops
 * the pool and rejects the whole batch.
 */

import { createLogger, type Logger } from '../lib/logger.js';
import { DEFAULT_MAX_CONCURRENCY } from '../lib/constants.js';
import { PageNotFoundError, ValidationError } from '../lib/errors.js';

/** Outcome of one item; errors other than a missing page are thrown instead */
export type ItemOutcome<I, R> =
  | { kind: 'ok'; item: I; value: R }
  | { kind: 'missing'; item: I; error: PageNotFoundError };

/** Completed batch */
export interface BatchResult<I, R> {
  /** Successful values in completion order */
  results: R[];
  /** Items whose page does not exist */
  missing: I[];
}

/** Batch options */
export interface BatchOptions {
  /** Maximum fetches in flight (default: 4) */
  maxConcurrency?: number;
  /** Called after every settled item */
  onProgress?: (done: number, total: number) => void;
  logger?: Logger;
}

/**
 * Run `worker` for one item, turning a missing page into a tagged outcome
 */
export async function settleItem<I, R>(
  item: I,
  worker: (item: I) => Promise<R>
): Promise<ItemOutcome<I, R>> {
  try {
    return { kind: 'ok', item, value: await worker(item) };
  } catch (error) {
    if (error instanceof PageNotFoundError) {
      return { kind: 'missing', item, error };
    }
    throw error;
  }
}

/**
 * Fetch every item with bounded concurrency
 *
 * @throws The first error that is not a PageNotFoundError; no new items start after it
 */
export async function fetchBatch<I, R>(
  items: readonly I[],
  worker: (item: I) => Promise<R>,
  options: BatchOptions = {}
): Promise<BatchResult<I, R>> {
  const maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new ValidationError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
  }

  const results: R[] = [];
  const missing: I[] = [];
  if (items.length === 0) {
    return { results, missing };
  }

  const log = options.logger ?? createLogger('client:batch');
  const total = items.length;
  const pending = items[Symbol.iterator]();
  let done = 0;
  let failed = false;

  const runWorker = async (): Promise<void> => {
    for (let next = pending.next(); !next.done && !failed; next = pending.next()) {
      let outcome: ItemOutcome<I, R>;
      try {
        outcome = await settleItem(next.value, worker);
      } catch (error) {
        failed = true;
        throw error;
      }

      if (outcome.kind === 'ok') {
        results.push(outcome.value);
      } else {
        log.warn('Skipping missing page', { title: outcome.error.title, lang: outcome.error.lang });
        missing.push(outcome.item);
      }

      done++;
      options.onProgress?.(done, total);
    }
  };

  const poolSize = Math.min(maxConcurrency, total);
  await Promise.all(Array.from({ length: poolSize }, runWorker));

  if (missing.length > 0) {
    log.warn('Skipped missing pages', { skipped: missing.length, requested: total });
  }

  return { results, missing };
}
