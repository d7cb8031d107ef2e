/**
 * Annotation-based eligibility for sidecar injection.
 * A Pod opts in through the inject annotation; the status annotation marks a
 * Pod that already went through the webhook, so a resubmission is left alone.
 */

import type { Pod } from './types.js';
import type { Logger } from './logger.js';
import { INJECTED_VALUE, INJECT_ANNOTATION, STATUS_ANNOTATION, TRUTHY_TOKENS } from './constants.js';

/**
 * Returns true if the annotations ask for the sidecar and do not mark the Pod as already injected.
 */
export function shouldMutate(annotations: Readonly<Record<string, string>> | null | undefined): boolean {
  if (!annotations) return false;
  const status = annotations[STATUS_ANNOTATION] ?? '';
  if (status.toLowerCase() === INJECTED_VALUE) return false;
  const inject = annotations[INJECT_ANNOTATION] ?? '';
  return TRUTHY_TOKENS.has(inject.toLowerCase());
}

/** Applies {@link shouldMutate} to a Pod and logs the decision. */
export function mutationRequired(pod: Pod, logger: Logger): boolean {
  const annotations = pod.metadata?.annotations;
  const required = shouldMutate(annotations);
  logger.info('Mutation policy evaluated', {
    namespace: pod.metadata?.namespace ?? '',
    name: pod.metadata?.name ?? '',
    status: annotations?.[STATUS_ANNOTATION] ?? '',
    required,
  });
  return required;
}
