/**
 * The exporter sidecar injected into opted-in Pods.
 * Requests equal limits so the container lands in the Guaranteed QoS class.
 */

import type { V1Container } from '@kubernetes/client-node';

export const EXPORTER_IMAGE = 'oliver006/redis_exporter:v0.33.0-alpine';
export const EXPORTER_CONTAINER_NAME = 'exporter';
export const EXPORTER_PORT = 9121;

const EXPORTER_RESOURCES = { cpu: '100m', memory: '100Mi' } as const;

export const DEFAULT_SIDECAR: Readonly<V1Container> = Object.freeze({
  name: EXPORTER_CONTAINER_NAME,
  image: EXPORTER_IMAGE,
  imagePullPolicy: 'IfNotPresent',
  ports: [{ containerPort: EXPORTER_PORT, name: 'http', protocol: 'TCP' }],
  resources: {
    requests: { ...EXPORTER_RESOURCES },
    limits: { ...EXPORTER_RESOURCES },
  },
});
