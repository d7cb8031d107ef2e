#!/usr/bin/env node
/**
 * Container entrypoint: parse flags, validate, configure logging, load TLS
 * material, then start the webhook and the health/metrics listeners.
 * Handles SIGTERM/SIGINT for graceful shutdown (close listeners and exit).
 * Exit codes: 0 = success, EXIT_CONFIG (1) = flag/config error, EXIT_RUNTIME (2) = start/stop failure.
 */

import { readFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import { CommanderError } from 'commander';
import { loadConfig } from './config.js';
import { ValidationError } from './validation.js';
import type { WebhookConfig } from './validation.js';
import { createLogger } from './logger.js';
import { createWebhookContext } from './handler.js';
import { createWebhookServer, startServer } from './server.js';
import { createHealthServer } from './health.js';
import { MetricsCollector } from './metrics.js';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { errorMessage } from './errors.js';

const bootstrapLogger = createLogger();

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function parseFlags(): WebhookConfig | undefined {
  try {
    return loadConfig(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      process.exitCode = err.code === 'commander.helpDisplayed' ? 0 : EXIT_CONFIG;
      return undefined;
    }
    const msg = errorMessage(err);
    bootstrapLogger.error('Invalid config: ' + msg, err instanceof ValidationError && err.field ? { field: err.field } : undefined);
    process.exitCode = EXIT_CONFIG;
    return undefined;
  }
}

async function main(): Promise<void> {
  const config = parseFlags();
  if (!config) return;

  const logger = createLogger({ format: config.logFormat, level: config.logLevel });

  const metrics = new MetricsCollector();
  const context = createWebhookContext({ logger, metrics });

  // The TLS context is built here, so a malformed or mismatched pair fails as a key-pair error.
  let webhookServer: Server;
  try {
    const [cert, key] = await Promise.all([readFile(config.certFile), readFile(config.keyFile)]);
    webhookServer = createWebhookServer({ context, tls: { cert, key } });
  } catch (err) {
    logger.error('Failed to load key pair', { cert: config.certFile, key: config.keyFile, err: errorMessage(err) });
    process.exitCode = EXIT_RUNTIME;
    return;
  }

  let ready = false;
  const healthServer = createHealthServer({ metrics, isReady: () => ready });

  try {
    await startServer(healthServer, config.metricsPort, context, 'Health server');
    await startServer(webhookServer, config.port, context);
  } catch (err) {
    logger.error('Server start failed', { err: errorMessage(err) });
    healthServer.close();
    process.exitCode = EXIT_RUNTIME;
    return;
  }
  ready = true;

  function shutdown(signal: string): void {
    logger.info(`Received ${signal}, shutting down`);
    ready = false;
    Promise.all([closeServer(webhookServer), closeServer(healthServer)])
      .then(() => {
        logger.info('Shutting down cleanly');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error during shutdown', { err: errorMessage(err) });
        process.exit(EXIT_RUNTIME);
      });
  }

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  bootstrapLogger.error('Entrypoint failed', { err: errorMessage(err) });
  process.exit(EXIT_RUNTIME);
});
