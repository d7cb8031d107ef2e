/**
 * HTTPS server for the mutating webhook.
 * Expects POST /mutate with an AdmissionReview JSON body; returns AdmissionReview JSON.
 * Without TLS material it serves plain HTTP (local runs and tests).
 */

import { createServer as createHttpServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import { createServer as createHttpsServer } from 'node:https';
import type { HttpReply, WebhookContext } from './handler.js';
import { serveMutate } from './handler.js';
import { MUTATE_PATH } from './constants.js';
import { errorMessage } from './errors.js';

export interface TlsMaterial {
  cert: string | Buffer;
  key: string | Buffer;
}

export interface ServerOptions {
  context: WebhookContext;
  tls?: TlsMaterial;
}

function sendText(res: ServerResponse, status: number, text: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(`${text}\n`);
}

function handleRequest(req: IncomingMessage, res: ServerResponse, context: WebhookContext): void {
  const { logger } = context;
  const path = (req.url ?? '').split('?')[0];

  if (path !== MUTATE_PATH) {
    sendText(res, 404, 'Not Found');
    return;
  }
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    sendText(res, 405, 'Method Not Allowed');
    return;
  }

  res.on('error', (err) => {
    logger.error("Can't write response", { err: errorMessage(err) });
  });

  const chunks: Buffer[] = [];
  req.on('data', (chunk: Buffer) => chunks.push(chunk));
  req.on('end', () => {
    let reply: HttpReply;
    try {
      reply = serveMutate({ body: Buffer.concat(chunks), contentType: req.headers['content-type'] }, context);
    } catch (err) {
      logger.error('Unexpected error while handling admission review', { err: errorMessage(err) });
      sendText(res, 500, 'Internal Server Error');
      return;
    }
    res.writeHead(reply.status, { 'Content-Type': reply.contentType });
    res.end(reply.body);
  });
  req.on('error', (err) => {
    logger.error("Can't read request body", { err: errorMessage(err) });
    sendText(res, 500, 'Internal Server Error');
  });
}

/**
 * Create the webhook server. Does not start listening; call server.listen()
 * or use {@link startServer}.
 */
export function createWebhookServer(options: ServerOptions): Server {
  const listener = (req: IncomingMessage, res: ServerResponse) => handleRequest(req, res, options.context);
  return options.tls ? createHttpsServer({ cert: options.tls.cert, key: options.tls.key }, listener) : createHttpServer(listener);
}

/** Start listening; resolves once the port is bound. */
export function startServer(server: Server, port: number, context: WebhookContext, name = 'Webhook server'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      context.logger.info(`${name} listening`, { port });
      resolve(server);
    });
  });
}
