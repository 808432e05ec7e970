/**
 * Options and plumbing shared by every command
 */

import type { Command } from 'commander';
import { createClient, WikiCorpusClient } from '../api/client.js';
import type { TransportConfig } from '../client/transport.js';
import { safeValidateClientConfig, formatValidationError } from '../lib/config-schema.js';
import { ValidationError, isTypedError } from '../lib/errors.js';
import { createProgressBar, fatal, loadConfig, parsePositiveInt, type ProgressBar } from './utils.js';

/** Options every command accepts */
export interface GlobalOptions {
  lang?: string;
  concurrency?: string;
  json: boolean;
}

/**
 * Add --lang, --concurrency and --json to a command
 */
export function withClientOptions(command: Command): Command {
  return command
    .option('-l, --lang <code>', 'Wiki language code (default: en)')
    .option('-c, --concurrency <n>', 'Concurrent requests for batch operations (default: 4)')
    .option('--json', 'Output as JSON', false);
}

/**
 * Build a client from configuration files, environment and command options
 */
export async function clientFromOptions(
  options: GlobalOptions,
  overrides: TransportConfig = {}
): Promise<WikiCorpusClient> {
  const config = await loadConfig();
  const merged = {
    ...config,
    ...(options.lang ? { lang: options.lang } : {}),
    ...(options.concurrency ? { maxConcurrency: parsePositiveInt(options.concurrency, '--concurrency') } : {}),
  };

  const result = safeValidateClientConfig(merged);
  if (!result.success) {
    throw new ValidationError(`Invalid options:\n${formatValidationError(result.error)}`);
  }
  return createClient(result.data, overrides);
}

/**
 * Progress reporting for batch operations, drawn on stderr when it is a terminal
 *
 * The bar is rebuilt whenever the total changes, as happens between the
 * levels of a category expansion.
 */
export function progressReporter(enabled: boolean = process.stderr.isTTY ?? false): {
  onProgress?: (done: number, total: number) => void;
  finish: () => void;
} {
  if (!enabled) {
    return { finish: () => undefined };
  }

  let bar: ProgressBar | undefined;
  let barTotal = 0;

  return {
    onProgress(done, total) {
      if (!bar || total !== barTotal) {
        bar?.complete();
        bar = createProgressBar({ total });
        barTotal = total;
      }
      bar.update(done);
    },
    finish() {
      bar?.complete();
    },
  };
}

/**
 * Print a value as indented JSON; Maps become objects
 */
export function printJson(value: unknown): void {
  console.log(
    JSON.stringify(value, (_key, item: unknown) => (item instanceof Map ? Object.fromEntries(item) : item), 2)
  );
}

/**
 * Human-readable message for an error surfaced to the terminal
 */
export function describeError(error: unknown): string {
  if (isTypedError(error)) {
    return `${error.message} [${error.kind}]`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a command body, reporting any failure and exiting non-zero
 */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    fatal(describeError(error), error);
  }
}
