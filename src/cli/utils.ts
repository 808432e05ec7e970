/**
 * CLI Utilities
 *
 * Shared utilities for the wikicorpus CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { createLogger } from '../lib/logger.js';
import { ValidationError } from '../lib/errors.js';
import {
  type ClientConfig,
  safeValidateClientConfig,
  formatValidationError,
} from '../lib/config-schema.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
} as const;

/** Check if color output is supported */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function paint(codes: string, s: string): string {
  return supportsColor() ? `${codes}${s}${colors.reset}` : s;
}

/** Color output helpers, plain text when stdout is not a terminal */
export const color = {
  bold: (s: string) => paint(colors.bold, s),
  dim: (s: string) => paint(colors.dim, s),
  green: (s: string) => paint(colors.green, s),
  yellow: (s: string) => paint(colors.yellow, s),
  gray: (s: string) => paint(colors.gray, s),
  error: (s: string) => paint(colors.red + colors.bold, s),
  warning: (s: string) => paint(colors.yellow + colors.bold, s),
};

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Progress bar configuration */
export interface ProgressBarConfig {
  /** Total items to process */
  total: number;
  /** Bar width in characters */
  width?: number;
  /** Format string: :label :bar :current/:total :percent :eta */
  format?: string;
  /** Stream to write to */
  stream?: NodeJS.WritableStream;
  /** Clear on complete */
  clearOnComplete?: boolean;
}

/** Progress bar handle */
export interface ProgressBar {
  update: (current: number, tokens?: Record<string, string | number>) => void;
  complete: () => void;
}

/**
 * Create a progress bar
 *
 * `update` matches the `onProgress(done, total)` callback of batch operations.
 */
export function createProgressBar(config: ProgressBarConfig): ProgressBar {
  const {
    total,
    width = 30,
    format = '  :bar :percent | :current/:total | ETA :eta',
    stream = process.stderr,
    clearOnComplete = true,
  } = config;

  let startTime = 0;

  function render(current: number, tokens: Record<string, string | number> = {}): void {
    if (startTime === 0) {
      startTime = Date.now();
    }

    const elapsed = (Date.now() - startTime) / 1000;
    const rate = elapsed > 0 ? current / elapsed : 0;
    const percent = total > 0 ? Math.min(1, current / total) : 0;
    const eta = rate > 0 ? (total - current) / rate : Infinity;

    const filled = Math.round(width * percent);
    const bar = color.green('█'.repeat(filled)) + color.gray('░'.repeat(width - filled));

    let output = format
      .replace(':bar', bar)
      .replace(':current', formatNumber(current))
      .replace(':total', formatNumber(total))
      .replace(':percent', `${(percent * 100).toFixed(1)}%`.padStart(6))
      .replace(':eta', formatDuration(eta));

    for (const [key, value] of Object.entries(tokens)) {
      output = output.replace(`:${key}`, String(value));
    }

    stream.write(`\r${output}\x1b[K`);
  }

  function complete(): void {
    render(total);
    stream.write(clearOnComplete ? '\r\x1b[K' : '\n');
  }

  return { update: render, complete };
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format table data
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns?: string[],
  options: { padding?: number; header?: boolean } = {}
): string {
  if (rows.length === 0) return '';

  const { padding = 2, header = true } = options;
  const firstRow = rows[0];
  const cols = columns || (firstRow ? Object.keys(firstRow) : []);

  // Calculate column widths
  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const stripped = stripAnsi(String(row[col] ?? ''));
      widths[col] = Math.max(widths[col] ?? 0, stripped.length);
    }
  }

  const lines: string[] = [];
  const pad = ' '.repeat(padding);

  if (header) {
    lines.push(`    ${cols.map((col) => color.bold(col.padEnd(widths[col] ?? 0))).join(pad)}`);
    lines.push(`    ${cols.map((col) => color.dim('─'.repeat(widths[col] ?? 0))).join(pad)}`);
  }

  for (const row of rows) {
    const rowLine = cols
      .map((col) => {
        const value = String(row[col] ?? '');
        const padLength = (widths[col] ?? 0) - stripAnsi(value).length;
        return value + ' '.repeat(Math.max(0, padLength));
      })
      .join(pad);
    lines.push(`    ${rowLine}`);
  }

  return lines.join('\n');
}

/** Configuration file name, looked up in the working and home directories */
export const CONFIG_FILE = '.wikicorpusrc';

/** Environment variable → config key, with numeric parsing where needed */
const ENV_OVERRIDES: ReadonlyArray<[string, keyof ClientConfig, 'string' | 'number']> = [
  ['WIKICORPUS_LANG', 'lang', 'string'],
  ['WIKICORPUS_MAX_CONCURRENCY', 'maxConcurrency', 'number'],
  ['WIKICORPUS_MAX_RETRIES', 'maxRetries', 'number'],
  ['WIKICORPUS_BASE_DELAY_MS', 'baseDelayMs', 'number'],
  ['WIKICORPUS_TIMEOUT_MS', 'timeoutMs', 'number'],
  ['WIKICORPUS_RATE_LIMIT_CAPACITY', 'rateLimitCapacity', 'number'],
  ['WIKICORPUS_RATE_LIMIT_REFILL_RATE', 'rateLimitRefillRate', 'number'],
  ['WIKICORPUS_USER_AGENT', 'userAgent', 'string'],
];

/** Where loadConfig looks */
export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(path: string): Promise<object | undefined> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid configuration in ${path}: ${reason}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`Invalid configuration in ${path}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from .wikicorpusrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. WIKICORPUS_* environment variables (highest priority)
 * 2. .wikicorpusrc in current directory
 * 3. .wikicorpusrc in home directory (lowest priority, read only when 2 is absent)
 *
 * @returns Validated client configuration
 * @throws {ValidationError} If the file or the merged configuration is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ClientConfig> {
  const env = options.env ?? process.env;
  const config: Record<string, unknown> = {};

  const configPaths = [
    join(options.cwd ?? process.cwd(), CONFIG_FILE),
    join(options.home ?? homedir(), CONFIG_FILE),
  ];

  for (const configPath of configPaths) {
    const parsed = await readConfigFile(configPath);
    if (parsed) {
      getLog().debug('Loaded configuration file', { path: configPath });
      Object.assign(config, parsed);
      break;
    }
  }

  for (const [name, key, type] of ENV_OVERRIDES) {
    const value = env[name];
    if (value) {
      config[key] = type === 'number' ? Number(value) : value;
    }
  }

  const result = safeValidateClientConfig(config);
  if (!result.success) {
    throw new ValidationError(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}

/**
 * Print error message and exit
 *
 * The underlying error, stack included, is logged at debug level.
 */
export function fatal(message: string, cause?: unknown): never {
  if (cause instanceof Error) {
    getLog().debug('Command failed', { error: cause });
  }
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(1);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.error(`${color.warning('Warning:')} ${message}`);
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
