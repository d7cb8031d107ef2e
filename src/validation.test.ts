/**
 * Start-up configuration validation and defaults.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { validateConfig, ValidationError } from './validation.js';
import { DEFAULTS } from './constants.js';

describe('validateConfig', () => {
  it('applies defaults to an empty config', () => {
    assert.deepEqual(validateConfig({}), {
      certFile: DEFAULTS.certFile,
      keyFile: DEFAULTS.keyFile,
      logFormat: 'text',
      logLevel: 'info',
      port: 8443,
      metricsPort: 8080,
    });
  });

  it('accepts json format, every level name and numeric ports', () => {
    const config = validateConfig({ logFormat: 'json', logLevel: 'DEBUG', port: '9443', metricsPort: 9090 });
    assert.equal(config.logFormat, 'json');
    assert.equal(config.logLevel, 'debug');
    assert.equal(config.port, 9443);
    assert.equal(config.metricsPort, 9090);
    assert.equal(validateConfig({ logLevel: 'warning' }).logLevel, 'warn');
    assert.equal(validateConfig({ logLevel: 'trace' }).logLevel, 'trace');
  });

  it('rejects an unknown log format', () => {
    assert.throws(
      () => validateConfig({ logFormat: 'yaml' }),
      (err: Error) =>
        err instanceof ValidationError &&
        err.field === 'logFormat' &&
        err.message === "log format 'yaml' is not recognized"
    );
  });

  it('rejects an unknown log level', () => {
    assert.throws(
      () => validateConfig({ logLevel: 'verbose' }),
      (err: Error) => err instanceof ValidationError && err.field === 'logLevel'
    );
  });

  it('rejects out-of-range and non-numeric ports', () => {
    for (const port of ['0', '65536', 'https', '80.5']) {
      assert.throws(
        () => validateConfig({ port }),
        (err: Error) => err instanceof ValidationError && err.field === 'port'
      );
    }
  });

  it('rejects the same port for webhook and metrics', () => {
    assert.throws(
      () => validateConfig({ port: 8080, metricsPort: 8080 }),
      (err: Error) => err instanceof ValidationError && err.field === 'metricsPort'
    );
  });

  it('rejects empty certificate and key paths', () => {
    assert.throws(
      () => validateConfig({ cert: '' }),
      (err: Error) => err instanceof ValidationError && err.field === 'cert'
    );
    assert.throws(
      () => validateConfig({ key: ' ' }),
      (err: Error) => err instanceof ValidationError && err.field === 'key'
    );
  });
});
