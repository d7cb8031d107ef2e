/**
 * Liveness, readiness and metrics listener, served on its own plain-HTTP port.
 */

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { MetricsCollector } from './metrics.js';

export const HEALTH_PATHS = {
  alive: '/isAlive',
  ready: '/isReady',
  metrics: '/metrics',
} as const;

export interface HealthServerOptions {
  metrics: MetricsCollector;
  /** Reports readiness; the webhook is ready once its listener is bound. */
  isReady?: () => boolean;
}

export function createHealthServer(options: HealthServerOptions): Server {
  const isReady = options.isReady ?? (() => true);

  return createServer((req, res) => {
    const path = (req.url ?? '').split('?')[0];

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.writeHead(405, { 'Content-Type': 'text/plain; charset=utf-8', Allow: 'GET, HEAD' });
      res.end('Method Not Allowed\n');
      return;
    }

    switch (path) {
      case HEALTH_PATHS.alive:
        res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
        res.end('ok\n');
        return;
      case HEALTH_PATHS.ready: {
        const ready = isReady();
        res.writeHead(ready ? 200 : 503, { 'Content-Type': 'text/plain; charset=utf-8' });
        res.end(ready ? 'ok\n' : 'not ready\n');
        return;
      }
      case HEALTH_PATHS.metrics:
        res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
        res.end(options.metrics.generatePrometheusMetrics());
        return;
      default:
        res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
        res.end('Not Found\n');
    }
  });
}
