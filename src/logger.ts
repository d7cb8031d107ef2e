/**
 * Structured logging: one record per line with timestamp, level, message and
 * extra context. Records render as JSON or as key=value text, filtered by a level threshold.
 */

export const LOG_LEVELS = ['panic', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['json', 'text'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Optional extra key-value for context. */
  [key: string]: unknown;
}

export interface LogSink {
  write(line: string): unknown;
}

export interface Logger {
  error(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  debug(message: string, extra?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  stdout?: LogSink;
  stderr?: LogSink;
  clock?: () => Date;
}

/** Parses a level name; `warning` is accepted as an alias of `warn`. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.trim().toLowerCase();
  if (lower === 'warning') return 'warn';
  return LOG_LEVELS.find((level) => level === lower);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function textValue(value: unknown): string {
  if (typeof value === 'string') {
    return value === '' || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? 'undefined';
}

export function formatText(record: LogRecord): string {
  const { timestamp, level, message, ...rest } = record;
  const fields = Object.entries(rest)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${textValue(value)}`);
  return [`time=${JSON.stringify(timestamp)}`, `level=${level}`, `msg=${JSON.stringify(message)}`, ...fields].join(' ');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = options.format ?? 'json';
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const clock = options.clock ?? (() => new Date());

  function log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) > threshold) return;
    const record: LogRecord = {
      timestamp: clock().toISOString(),
      level,
      message,
      ...extra,
    };
    const line = (format === 'json' ? JSON.stringify(record) : formatText(record)) + '\n';
    const out = level === 'error' ? stderr : stdout;
    out.write(line);
  }

  return {
    error: (message, extra) => log('error', message, extra),
    warn: (message, extra) => log('warn', message, extra),
    info: (message, extra) => log('info', message, extra),
    debug: (message, extra) => log('debug', message, extra),
  };
}

/** Discards everything; handy for embedding and tests. */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
