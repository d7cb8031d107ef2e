/**
 * Exporter sidecar webhook: library surface for embedding the handler in
 * another server or driving it from tests.
 */

export { shouldMutate, mutationRequired } from './eligibility.js';
export { addSidecar, buildPatch, encodePatch, escapePointerToken, toJsonPatch, updateAnnotations } from './patch.js';
export { DEFAULT_SIDECAR, EXPORTER_CONTAINER_NAME, EXPORTER_IMAGE, EXPORTER_PORT } from './sidecar.js';
export { createWebhookContext, mutate, serveMutate } from './handler.js';
export type { HttpReply, MutateInput, WebhookContext } from './handler.js';
export { decodePod, decodeReview, defaultCodec, encodeReview, parseJson } from './review.js';
export type { ReviewCodec } from './review.js';
export { createWebhookServer, startServer } from './server.js';
export type { ServerOptions, TlsMaterial } from './server.js';
export { createHealthServer, HEALTH_PATHS } from './health.js';
export { MetricsCollector, METRICS } from './metrics.js';
export { createLogger, silentLogger } from './logger.js';
export type { LogFormat, LogLevel, Logger } from './logger.js';
export { loadConfig } from './config.js';
export { validateConfig, ValidationError } from './validation.js';
export type { RawConfig, WebhookConfig } from './validation.js';
export {
  DomainDecodeError,
  EmptyBodyError,
  MalformedBodyError,
  PatchEncodeError,
  ResponseEncodeError,
  TransportError,
  UnsupportedMediaTypeError,
} from './errors.js';
export {
  INJECT_ANNOTATION,
  INJECTED_VALUE,
  PROMETHEUS_PATH_ANNOTATION,
  PROMETHEUS_PORT_ANNOTATION,
  PROMETHEUS_SCRAPE_ANNOTATION,
  STATUS_ANNOTATION,
  TRUTHY_TOKENS,
} from './constants.js';
export type {
  AdmissionRequest,
  AdmissionResponse,
  AdmissionReviewRequest,
  AdmissionReviewResponse,
  JsonPatchOp,
  PatchOperation,
  PatchValue,
  Pod,
} from './types.js';
