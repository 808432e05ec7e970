/**
 * Structured logging
 *
 * Every line goes to stderr, so command output on stdout stays parseable.
 * Level and format come from LOG_LEVEL and LOG_FORMAT unless set explicitly;
 * `silent` switches a logger off.
 *
 * Calls made inside `withRunContext` are tagged with the run id, so the
 * requests of one harvest can be told apart in a shared log.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Levels a line can be written at */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export type LogFormat = 'text' | 'json';

/** Receives each formatted line */
export type LogSink = (line: string, level: EntryLevel) => void;

/** Harvest run context stored in AsyncLocalStorage */
export interface RunContext {
  runId: string;
  /** Extra fields attached to every line of the run */
  tags?: Record<string, unknown>;
}

const runStorage = new AsyncLocalStorage<RunContext>();

export function generateRunId(): string {
  return randomUUID();
}

/**
 * Run `fn` with a run context; its log lines carry `context.runId`
 */
export async function withRunContext<T>(context: RunContext, fn: () => Promise<T>): Promise<T> {
  return runStorage.run(context, fn);
}

export function getRunContext(): RunContext | undefined {
  return runStorage.getStore();
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

/** Error attached to a line through `data.error` */
export interface LoggedError {
  name: string;
  message: string;
  /** Discriminator of the client's typed errors */
  kind?: string;
  stack?: string;
}

/** One log line, as written in JSON format */
export interface LogEntry {
  time: string;
  level: EntryLevel;
  /** Module that logged, such as `client:transport` */
  logger: string;
  msg: string;
  runId?: string;
  data?: Record<string, unknown>;
  err?: LoggedError;
}

export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;
  format: LogFormat;
  /** Module name */
  name: string;
  /** Prefix text lines with the time of day */
  timestamps: boolean;
  /** ANSI colors in text format */
  colors: boolean;
  sink: LogSink;
}

function levelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL']?.toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

function formatFromEnv(): LogFormat {
  return process.env['LOG_FORMAT']?.toLowerCase() === 'json' ? 'json' : 'text';
}

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
} as const;

const LEVEL_STYLE: Record<EntryLevel, { label: string; color: string }> = {
  debug: { label: 'DEBUG', color: '\x1b[90m' },
  info: { label: 'INFO ', color: '\x1b[34m' },
  warn: { label: 'WARN ', color: '\x1b[33m' },
  error: { label: 'ERROR', color: '\x1b[31m' },
};

function describeLoggedError(error: Error): LoggedError {
  const logged: LoggedError = { name: error.name, message: error.message };
  if ('kind' in error && typeof error.kind === 'string') {
    logged.kind = error.kind;
  }
  if (error.stack) {
    logged.stack = error.stack;
  }
  return logged;
}

/**
 * `HH:MM:SS LEVEL [run] name: message key=value ...`
 */
function formatText(entry: LogEntry, config: LoggerConfig): string {
  const paint = (code: string, text: string) => (config.colors ? `${code}${text}${ANSI.reset}` : text);
  const parts: string[] = [];

  if (config.timestamps) {
    parts.push(paint(ANSI.dim, entry.time.slice(11, 19)));
  }
  const style = LEVEL_STYLE[entry.level];
  parts.push(paint(style.color, style.label));
  if (entry.runId) {
    parts.push(paint(ANSI.dim, `[${entry.runId.slice(0, 8)}]`));
  }
  parts.push(`${paint(ANSI.cyan, entry.logger)}: ${entry.msg}`);

  const fields = Object.entries(entry.data ?? {});
  if (entry.err) {
    fields.push(['error', entry.err.kind ? `${entry.err.message} [${entry.err.kind}]` : entry.err.message]);
  }
  if (fields.length > 0) {
    parts.push(paint(ANSI.dim, fields.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ')));
  }

  let line = parts.join(' ');
  if (entry.err?.stack && entry.level === 'error') {
    line += `\n${paint(ANSI.dim, entry.err.stack)}`;
  }
  return line;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      name: config.name ?? 'wikicorpus',
      level: config.level ?? levelFromEnv(),
      format: config.format ?? formatFromEnv(),
      timestamps: config.timestamps ?? true,
      colors: config.colors ?? process.stderr.isTTY ?? false,
      sink: config.sink ?? writeToStderr,
    };
  }

  get name(): string {
    return this.config.name;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get format(): LogFormat {
    return this.config.format;
  }

  isEnabled(level: EntryLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.config.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  /**
   * Logger for a sub-module, sharing this logger's settings
   */
  child(name: string): Logger {
    return new Logger({ ...this.config, name: `${this.config.name}:${name}` });
  }

  private write(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const run = getRunContext();
    const entry: LogEntry = {
      time: new Date().toISOString(),
      level,
      logger: this.config.name,
      msg: message,
    };
    if (run) {
      entry.runId = run.runId;
    }

    const fields: Record<string, unknown> = { ...run?.tags, ...data };
    const error = fields['error'];
    if (error instanceof Error) {
      entry.err = describeLoggedError(error);
      delete fields['error'];
    }
    if (Object.keys(fields).length > 0) {
      entry.data = fields;
    }

    this.config.sink(this.config.format === 'json' ? JSON.stringify(entry) : formatText(entry, this.config), level);
  }
}

/**
 * Factory behind `createLogger`, replaceable in tests
 */
export interface LoggerProvider {
  createLogger(name: string): Logger;
}

class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggers = new Map<string, Logger>();

  createLogger(name: string): Logger {
    let logger = this.loggers.get(name);
    if (!logger) {
      logger = new Logger({ name });
      this.loggers.set(name, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

export function getLoggerProvider(): LoggerProvider {
  return loggerProvider;
}

/**
 * @returns The previous provider, for restoring
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = loggerProvider;
  loggerProvider = provider;
  return previous;
}

export function resetLoggerProvider(): void {
  loggerProvider = new DefaultLoggerProvider();
}

/**
 * Logger for a module, from the current provider
 */
export function createLogger(name: string): Logger {
  return loggerProvider.createLogger(name);
}
