/**
 * AdmissionReview and Pod decoding/encoding.
 * Shapes are checked with zod; anything the webhook does not read is dropped.
 */

import { z } from 'zod';
import type { AdmissionReviewRequest, AdmissionReviewResponse, PatchOperation, Pod } from './types.js';
import { ADMISSION_API_VERSIONS } from './types.js';
import { DomainDecodeError, MalformedBodyError, errorMessage } from './errors.js';
import { encodePatch } from './patch.js';

/** Kubernetes serializes absent optionals as either a missing key or `null`. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

const groupVersionKindSchema = z.object({
  group: z.string(),
  version: z.string(),
  kind: z.string(),
});

const groupVersionResourceSchema = z.object({
  group: z.string(),
  version: z.string(),
  resource: z.string(),
});

const userInfoSchema = z.object({
  username: optional(z.string()),
  uid: optional(z.string()),
  groups: optional(z.array(z.string())),
});

const admissionRequestSchema = z.object({
  uid: z.string().min(1),
  kind: groupVersionKindSchema,
  resource: optional(groupVersionResourceSchema),
  namespace: optional(z.string()),
  name: optional(z.string()),
  operation: optional(z.enum(['CREATE', 'UPDATE', 'DELETE', 'CONNECT'])),
  userInfo: optional(userInfoSchema),
  object: z.unknown(),
  dryRun: optional(z.boolean()),
});

export const admissionReviewSchema = z.object({
  apiVersion: z.enum(ADMISSION_API_VERSIONS),
  kind: z.literal('AdmissionReview'),
  request: admissionRequestSchema,
});

export const podSchema = z.object({
  apiVersion: optional(z.string()),
  kind: optional(z.string()),
  metadata: optional(
    z.object({
      name: optional(z.string()),
      namespace: optional(z.string()),
      annotations: optional(z.record(z.string())),
    })
  ),
});

/** Renders zod issues as `path: message` pairs. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Parses raw body text; text that is not JSON is a framing error, not a decode error. */
export function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new MalformedBodyError(errorMessage(err));
  }
}

export function decodeReview(input: unknown): AdmissionReviewRequest {
  const parsed = admissionReviewSchema.safeParse(input);
  if (!parsed.success) {
    throw new DomainDecodeError(`invalid AdmissionReview: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function decodePod(object: unknown): Pod {
  if (object === undefined || object === null) {
    throw new DomainDecodeError('invalid Pod: request.object is missing');
  }
  const parsed = podSchema.safeParse(object);
  if (!parsed.success) {
    throw new DomainDecodeError(`invalid Pod: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function encodeReview(review: AdmissionReviewResponse): string {
  return JSON.stringify(review);
}

/**
 * Everything the handler needs to move between bytes and typed values.
 * Built once and shared read-only by every request.
 */
export interface ReviewCodec {
  readonly decodeReview: (input: unknown) => AdmissionReviewRequest;
  readonly decodePod: (object: unknown) => Pod;
  readonly encodePatch: (ops: readonly PatchOperation[]) => string;
  readonly encodeReview: (review: AdmissionReviewResponse) => string;
}

export const defaultCodec: ReviewCodec = Object.freeze({
  decodeReview,
  decodePod,
  encodePatch,
  encodeReview,
});
