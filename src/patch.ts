/**
 * Build the JSON Patch (RFC 6902) that adds the exporter sidecar and marks the
 * Pod as injected. Operations are typed with a tagged value and only flattened
 * to wire JSON in {@link toJsonPatch}.
 */

import type { V1Container } from '@kubernetes/client-node';
import type { JsonPatchOp, PatchOperation, PatchValue, Pod } from './types.js';
import {
  INJECTED_VALUE,
  INJECT_ANNOTATION,
  PROMETHEUS_PATH_ANNOTATION,
  PROMETHEUS_PORT_ANNOTATION,
  PROMETHEUS_SCRAPE_ANNOTATION,
} from './constants.js';
import { DEFAULT_SIDECAR } from './sidecar.js';
import { PatchEncodeError, errorMessage } from './errors.js';

/** Escapes one reference token of a JSON pointer (RFC 6901). */
export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function addSidecar(sidecar: V1Container = DEFAULT_SIDECAR): PatchOperation {
  return {
    op: 'add',
    path: '/spec/containers/-',
    value: { kind: 'container', container: sidecar },
  };
}

/**
 * Without an inject value the whole annotation map is written, so any other
 * annotations the Pod carried are dropped. With one, only that key is replaced.
 */
export function updateAnnotations(annotations: Readonly<Record<string, string>> | null | undefined): PatchOperation {
  if (!annotations || !annotations[INJECT_ANNOTATION]) {
    return {
      op: 'add',
      path: '/metadata/annotations',
      value: {
        kind: 'annotations',
        annotations: {
          [INJECT_ANNOTATION]: INJECTED_VALUE,
          [PROMETHEUS_SCRAPE_ANNOTATION]: 'true',
          [PROMETHEUS_PORT_ANNOTATION]: '',
          [PROMETHEUS_PATH_ANNOTATION]: '/metrics',
        },
      },
    };
  }

  return {
    op: 'replace',
    path: `/metadata/annotations/${escapePointerToken(INJECT_ANNOTATION)}`,
    value: { kind: 'string', value: INJECTED_VALUE },
  };
}

/**
 * Produce the patch for an eligible Pod: sidecar first, then the annotation update.
 */
export function buildPatch(pod: Pod, sidecar: V1Container = DEFAULT_SIDECAR): PatchOperation[] {
  return [addSidecar(sidecar), updateAnnotations(pod.metadata?.annotations)];
}

function toJsonValue(value: PatchValue): NonNullable<JsonPatchOp['value']> {
  switch (value.kind) {
    case 'container':
      return value.container;
    case 'annotations':
      return value.annotations;
    case 'string':
      return value.value;
    default: {
      const unreachable: never = value;
      throw new PatchEncodeError(`unknown patch value ${JSON.stringify(unreachable)}`);
    }
  }
}

export function toJsonPatch(ops: readonly PatchOperation[]): JsonPatchOp[] {
  return ops.map(({ op, path, value }) => (value === undefined ? { op, path } : { op, path, value: toJsonValue(value) }));
}

/** Serializes the patch and base64-encodes it, as the API server expects in `response.patch`. */
export function encodePatch(ops: readonly PatchOperation[]): string {
  let json: string;
  try {
    json = JSON.stringify(toJsonPatch(ops));
  } catch (err) {
    if (err instanceof PatchEncodeError) throw err;
    throw new PatchEncodeError(`could not encode patch: ${errorMessage(err)}`);
  }
  return Buffer.from(json, 'utf8').toString('base64');
}
