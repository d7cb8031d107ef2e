/**
 * Command-line surface of the webhook.
 */

import { Command } from 'commander';
import { DEFAULTS } from './constants.js';
import type { RawConfig, WebhookConfig } from './validation.js';
import { validateConfig } from './validation.js';

export function buildCli(): Command {
  return new Command()
    .name('exporter-sidecar-webhook')
    .description('Mutating admission webhook that injects a metrics exporter sidecar into annotated Pods')
    .option('--cert <file>', 'File containing the x509 certificate for HTTPS', DEFAULTS.certFile)
    .option('--key <file>', 'File containing the x509 private key for --cert', DEFAULTS.keyFile)
    .option('--log-format <format>', "Log format, either 'json' or 'text'", DEFAULTS.logFormat)
    .option('--log-level <level>', 'Logging verbosity level', DEFAULTS.logLevel)
    .option('--port <port>', 'HTTPS port for the webhook', String(DEFAULTS.port))
    .option('--metrics-port <port>', 'HTTP port for health and metrics', String(DEFAULTS.metricsPort))
    .exitOverride();
}

/**
 * Parse and validate the command line. `from: 'node'` expects process.argv
 * (runtime and script first); `from: 'user'` expects only the arguments.
 */
export function loadConfig(argv: readonly string[], from: 'node' | 'user' = 'node'): WebhookConfig {
  const cli = buildCli();
  cli.parse([...argv], { from });
  return validateConfig(cli.opts<RawConfig>());
}
