/** Exit code: configuration error (unknown log format or level, bad port, etc.). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (TLS material unreadable, listener failed). */
export const EXIT_RUNTIME = 2;

/** Marks a Pod that has already been through the webhook. */
export const STATUS_ANNOTATION = 'exporter-sidecar/status';
/** Opt-in trigger set by whoever owns the Pod. */
export const INJECT_ANNOTATION = 'exporter-sidecar/inject';

export const PROMETHEUS_SCRAPE_ANNOTATION = 'prometheus.io/scrape';
export const PROMETHEUS_PORT_ANNOTATION = 'prometheus.io/port';
export const PROMETHEUS_PATH_ANNOTATION = 'prometheus.io/path';

export const INJECTED_VALUE = 'injected';

/** Inject annotation values (compared lowercased) that request the sidecar. */
export const TRUTHY_TOKENS: ReadonlySet<string> = new Set(['y', 'yes', 'true', 'on']);

export const JSON_CONTENT_TYPE = 'application/json';
export const MUTATE_PATH = '/mutate';

export const DEFAULTS = {
  certFile: './cert.pem',
  keyFile: './key.pem',
  logFormat: 'text',
  logLevel: 'info',
  port: 8443,
  metricsPort: 8080,
} as const;

export const MIN_PORT = 1;
export const MAX_PORT = 65_535;
