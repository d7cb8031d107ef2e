/**
 * AdmissionReview request/response handling.
 * Validates the body framing, decodes the review, evaluates the policy and
 * returns the AdmissionReview response with an optional JSON Patch.
 */

import type { V1Container } from '@kubernetes/client-node';
import type { AdmissionRequest, AdmissionResponse, AdmissionReviewRequest, AdmissionReviewResponse, Pod } from './types.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import type { ReviewCodec } from './review.js';
import { defaultCodec, parseJson } from './review.js';
import { MetricsCollector, METRICS } from './metrics.js';
import { mutationRequired } from './eligibility.js';
import { buildPatch } from './patch.js';
import { DEFAULT_SIDECAR } from './sidecar.js';
import {
  EmptyBodyError,
  ResponseEncodeError,
  TransportError,
  UnsupportedMediaTypeError,
  errorMessage,
} from './errors.js';
import { JSON_CONTENT_TYPE } from './constants.js';

const DEFAULT_API_VERSION = 'admission.k8s.io/v1';
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

/** Built once at start-up and shared by every request. */
export interface WebhookContext {
  readonly logger: Logger;
  readonly codec: ReviewCodec;
  readonly sidecar: Readonly<V1Container>;
  readonly metrics: MetricsCollector;
}

export function createWebhookContext(overrides: Partial<WebhookContext> = {}): WebhookContext {
  return Object.freeze({
    logger: overrides.logger ?? createLogger(),
    codec: overrides.codec ?? defaultCodec,
    sidecar: overrides.sidecar ?? DEFAULT_SIDECAR,
    metrics: overrides.metrics ?? new MetricsCollector(),
  });
}

export interface MutateInput {
  body: Buffer | string;
  contentType: string | undefined;
}

export interface HttpReply {
  status: number;
  contentType: string;
  body: string;
}

function failure(message: string): AdmissionResponse {
  return { uid: '', allowed: false, result: { message } };
}

/**
 * Decide on one decoded request. Never rejects the Pod: errors come back as
 * `result.message` with the Pod let through unmodified.
 */
export function mutate(request: AdmissionRequest, ctx: WebhookContext): AdmissionResponse {
  const { logger, codec, metrics } = ctx;

  let pod: Pod;
  try {
    pod = codec.decodePod(request.object);
  } catch (err) {
    logger.error("Couldn't decode pod object", { uid: request.uid, err: errorMessage(err) });
    metrics.incrementCounter(METRICS.ADMISSION_REQUESTS_TOTAL, { result: 'error' });
    return failure(errorMessage(err));
  }

  logger.info('AdmissionReview received', {
    kind: `${request.kind.group}/${request.kind.version}, Kind=${request.kind.kind}`,
    namespace: request.namespace ?? '',
    name: request.name ?? '',
    podName: pod.metadata?.name ?? '',
    uid: request.uid,
    operation: request.operation ?? '',
    username: request.userInfo?.username ?? '',
  });

  if (!mutationRequired(pod, logger)) {
    logger.info('Skipping mutation due to policy check', {
      namespace: pod.metadata?.namespace ?? '',
      name: pod.metadata?.name ?? '',
    });
    metrics.incrementCounter(METRICS.ADMISSION_REQUESTS_TOTAL, { result: 'skipped' });
    return { uid: '', allowed: true };
  }

  let patch: string;
  try {
    patch = codec.encodePatch(buildPatch(pod, ctx.sidecar));
  } catch (err) {
    logger.error("Couldn't encode patch", { uid: request.uid, err: errorMessage(err) });
    metrics.incrementCounter(METRICS.ADMISSION_REQUESTS_TOTAL, { result: 'error' });
    return failure(errorMessage(err));
  }

  logger.debug('AdmissionResponse patch', {
    uid: request.uid,
    patch: Buffer.from(patch, 'base64').toString('utf8'),
  });
  metrics.incrementCounter(METRICS.ADMISSION_REQUESTS_TOTAL, { result: 'mutated' });
  return { uid: '', allowed: true, patchType: 'JSONPatch', patch };
}

function respond(input: MutateInput, ctx: WebhookContext): HttpReply {
  if (input.body.length === 0) {
    throw new EmptyBodyError();
  }
  if (input.contentType !== JSON_CONTENT_TYPE) {
    throw new UnsupportedMediaTypeError(input.contentType);
  }

  const json = parseJson(typeof input.body === 'string' ? input.body : input.body.toString('utf8'));

  const decoded = decodeReview(json, ctx);
  const response: AdmissionResponse = decoded.ok
    ? { ...mutate(decoded.review.request, ctx), uid: decoded.review.request.uid }
    : failure(decoded.message);

  const envelope: AdmissionReviewResponse = {
    apiVersion: decoded.ok ? decoded.review.apiVersion : DEFAULT_API_VERSION,
    kind: 'AdmissionReview',
    response,
  };

  let body: string;
  try {
    body = ctx.codec.encodeReview(envelope);
  } catch (err) {
    throw new ResponseEncodeError(errorMessage(err));
  }

  return { status: 200, contentType: JSON_CONTENT_TYPE, body };
}

type DecodeResult = { ok: true; review: AdmissionReviewRequest } | { ok: false; message: string };

function decodeReview(json: unknown, ctx: WebhookContext): DecodeResult {
  try {
    return { ok: true, review: ctx.codec.decodeReview(json) };
  } catch (err) {
    ctx.logger.error("Can't decode body", { err: errorMessage(err) });
    ctx.metrics.incrementCounter(METRICS.ADMISSION_REQUESTS_TOTAL, { result: 'error' });
    return { ok: false, message: errorMessage(err) };
  }
}

/**
 * Handle one POST /mutate. Framing problems map to HTTP errors with a
 * plain-text body; everything after the body is accepted answers 200.
 */
export function serveMutate(input: MutateInput, ctx: WebhookContext): HttpReply {
  try {
    return respond(input, ctx);
  } catch (err) {
    if (!(err instanceof TransportError)) throw err;
    ctx.logger.error(err.message, { status: err.statusCode, contentType: input.contentType ?? '' });
    ctx.metrics.incrementCounter(METRICS.HTTP_ERRORS_TOTAL, { status: String(err.statusCode) });
    return { status: err.statusCode, contentType: TEXT_CONTENT_TYPE, body: `${err.message}\n` };
  }
}
