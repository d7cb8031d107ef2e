/**
 * Start-up configuration validation and normalization.
 * Invalid values produce a ValidationError naming the offending field; the
 * entrypoint turns that into a non-zero exit.
 */

import { DEFAULTS, MAX_PORT, MIN_PORT } from './constants.js';
import type { LogFormat, LogLevel } from './logger.js';
import { isLogFormat, parseLogLevel } from './logger.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message, field);
  }
}

/** Options as they arrive from the command line, before validation. */
export type RawConfig = {
  cert?: string;
  key?: string;
  logFormat?: string;
  logLevel?: string;
  port?: string | number;
  metricsPort?: string | number;
};

export interface WebhookConfig {
  certFile: string;
  /** Private key for {@link certFile}. */
  keyFile: string;
  logFormat: LogFormat;
  logLevel: LogLevel;
  port: number;
  metricsPort: number;
}

function parsePort(value: string | number, field: string): number {
  const port = typeof value === 'number' ? value : Number(value.trim());
  assert(
    Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT,
    `${field} must be an integer between ${MIN_PORT} and ${MAX_PORT}`,
    field
  );
  return port;
}

/**
 * Validates raw options and applies defaults.
 * Throws ValidationError naming the offending field.
 */
export function validateConfig(raw: RawConfig): WebhookConfig {
  assert(raw != null && typeof raw === 'object', 'config must be an object');

  const certFile = raw.cert ?? DEFAULTS.certFile;
  assert(certFile.trim() !== '', 'cert must be a non-empty path', 'cert');

  const keyFile = raw.key ?? DEFAULTS.keyFile;
  assert(keyFile.trim() !== '', 'key must be a non-empty path', 'key');

  const logFormat = raw.logFormat ?? DEFAULTS.logFormat;
  assert(isLogFormat(logFormat), `log format '${logFormat}' is not recognized`, 'logFormat');

  const rawLevel = raw.logLevel ?? DEFAULTS.logLevel;
  const logLevel = parseLogLevel(rawLevel);
  assert(logLevel !== undefined, `not a valid log level: '${rawLevel}'`, 'logLevel');

  const port = parsePort(raw.port ?? DEFAULTS.port, 'port');
  const metricsPort = parsePort(raw.metricsPort ?? DEFAULTS.metricsPort, 'metricsPort');
  assert(port !== metricsPort, 'port and metricsPort must differ', 'metricsPort');

  return { certFile, keyFile, logFormat, logLevel, port, metricsPort };
}
