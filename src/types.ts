/**
 * Kubernetes AdmissionReview, Pod and JSON Patch types for the mutating webhook.
 * Wire shapes follow the admission.k8s.io/v1 and v1beta1 AdmissionReview API.
 */

import type { V1Container } from '@kubernetes/client-node';

// --- AdmissionReview envelope (what the API server sends) ---

export interface GroupVersionKind {
  group: string;
  version: string;
  kind: string;
}

export interface GroupVersionResource {
  group: string;
  version: string;
  resource: string;
}

export interface UserInfo {
  username?: string;
  uid?: string;
  groups?: string[];
}

export type AdmissionOperation = 'CREATE' | 'UPDATE' | 'DELETE' | 'CONNECT';

/** A single admission request. `object` stays raw JSON until the Pod is decoded. */
export interface AdmissionRequest {
  uid: string;
  kind: GroupVersionKind;
  resource?: GroupVersionResource;
  namespace?: string;
  name?: string;
  operation?: AdmissionOperation;
  userInfo?: UserInfo;
  object?: unknown;
  dryRun?: boolean;
}

export const ADMISSION_API_VERSIONS = ['admission.k8s.io/v1', 'admission.k8s.io/v1beta1'] as const;
export type AdmissionApiVersion = (typeof ADMISSION_API_VERSIONS)[number];

export interface AdmissionReviewRequest {
  apiVersion: AdmissionApiVersion;
  kind: 'AdmissionReview';
  request: AdmissionRequest;
}

// --- AdmissionReview envelope (what we return) ---

export interface AdmissionResponse {
  uid: string;
  allowed: boolean;
  /** base64 of the JSON Patch bytes. */
  patch?: string;
  patchType?: 'JSONPatch';
  result?: { message: string };
}

export interface AdmissionReviewResponse {
  apiVersion: AdmissionApiVersion;
  kind: 'AdmissionReview';
  response: AdmissionResponse;
}

// --- Pod (the object under review) ---

export interface PodMetadata {
  name?: string;
  namespace?: string;
  annotations?: Record<string, string>;
}

/** Minimal Pod shape the webhook reads; `spec` and every other field are left to the API server. */
export interface Pod {
  apiVersion?: string;
  kind?: string;
  metadata?: PodMetadata;
}

// --- JSON Patch (RFC 6902) ---

export type PatchOp = 'add' | 'replace' | 'remove';

export type PatchValue =
  | { kind: 'container'; container: V1Container }
  | { kind: 'annotations'; annotations: Record<string, string> }
  | { kind: 'string'; value: string };

export interface PatchOperation {
  op: PatchOp;
  path: string;
  value?: PatchValue;
}

/** Plain RFC 6902 operation as it goes on the wire. */
export interface JsonPatchOp {
  op: PatchOp;
  path: string;
  value?: V1Container | Record<string, string> | string;
}
