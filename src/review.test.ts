/**
 * AdmissionReview and Pod decoding.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodePod, decodeReview, encodeReview, parseJson } from './review.js';
import { DomainDecodeError, MalformedBodyError } from './errors.js';

const request = {
  uid: '705ab4f5-6393-11e8-b7cc-42010a800002',
  kind: { group: '', version: 'v1', kind: 'Pod' },
  resource: { group: '', version: 'v1', resource: 'pods' },
  namespace: 'payments',
  operation: 'CREATE',
  userInfo: { username: 'system:serviceaccount:kube-system:replicaset-controller', groups: ['system:serviceaccounts'] },
  object: { metadata: { name: 'cache-0' } },
  oldObject: null,
  dryRun: false,
  options: null,
};

describe('parseJson', () => {
  it('parses JSON text', () => {
    assert.deepEqual(parseJson('{"a":[1,"b"]}'), { a: [1, 'b'] });
  });

  it('throws MalformedBodyError on text that is not JSON', () => {
    assert.throws(
      () => parseJson('{"apiVersion":'),
      (err: Error) => err instanceof MalformedBodyError && err.statusCode === 400 && err.message.startsWith('malformed JSON body: ')
    );
  });
});

describe('decodeReview', () => {
  it('decodes a v1 review and keeps the raw object', () => {
    const review = decodeReview({ apiVersion: 'admission.k8s.io/v1', kind: 'AdmissionReview', request });
    assert.equal(review.apiVersion, 'admission.k8s.io/v1');
    assert.equal(review.request.uid, request.uid);
    assert.equal(review.request.namespace, 'payments');
    assert.equal(review.request.name, undefined);
    assert.equal(review.request.operation, 'CREATE');
    assert.equal(review.request.userInfo?.username, 'system:serviceaccount:kube-system:replicaset-controller');
    assert.deepEqual(review.request.object, { metadata: { name: 'cache-0' } });
  });

  it('accepts v1beta1 reviews', () => {
    const review = decodeReview({ apiVersion: 'admission.k8s.io/v1beta1', kind: 'AdmissionReview', request });
    assert.equal(review.apiVersion, 'admission.k8s.io/v1beta1');
  });

  it('rejects a review without a request', () => {
    assert.throws(
      () => decodeReview({ apiVersion: 'admission.k8s.io/v1', kind: 'AdmissionReview' }),
      (err: Error) => err instanceof DomainDecodeError && err.message === 'invalid AdmissionReview: request: Required'
    );
  });

  it('rejects a request without a uid', () => {
    const { uid: _uid, ...withoutUid } = request;
    assert.throws(
      () => decodeReview({ apiVersion: 'admission.k8s.io/v1', kind: 'AdmissionReview', request: withoutUid }),
      (err: Error) => err instanceof DomainDecodeError && err.message === 'invalid AdmissionReview: request.uid: Required'
    );
  });

  it('rejects objects of another kind', () => {
    assert.throws(
      () => decodeReview({ apiVersion: 'v1', kind: 'Pod', request }),
      (err: Error) =>
        err instanceof DomainDecodeError &&
        err.message.startsWith('invalid AdmissionReview: apiVersion: ') &&
        err.message.includes('; kind: ')
    );
  });

  it('rejects JSON that is not an object', () => {
    assert.throws(
      () => decodeReview([1, 2, 3]),
      (err: Error) => err instanceof DomainDecodeError && err.message.startsWith('invalid AdmissionReview: (root): ')
    );
  });
});

describe('decodePod', () => {
  it('reads metadata and leaves the spec undecoded', () => {
    const pod = decodePod({
      apiVersion: 'v1',
      kind: 'Pod',
      metadata: { name: 'cache-0', namespace: 'payments', annotations: { team: 'payments' }, labels: { app: 'cache' } },
      spec: { containers: [{ name: 'redis', image: 'redis:7', ports: [{ containerPort: 6379 }] }] },
    });
    assert.deepEqual(pod, {
      apiVersion: 'v1',
      kind: 'Pod',
      metadata: { name: 'cache-0', namespace: 'payments', annotations: { team: 'payments' } },
    });
  });

  it('treats null annotations as absent', () => {
    const pod = decodePod({ metadata: { name: 'cache-0', annotations: null } });
    assert.equal(pod.metadata?.annotations, undefined);
  });

  it('rejects a missing object', () => {
    assert.throws(
      () => decodePod(undefined),
      (err: Error) => err instanceof DomainDecodeError && err.message === 'invalid Pod: request.object is missing'
    );
  });

  it('accepts containers without a name', () => {
    const pod = decodePod({ metadata: { name: 'cache-0' }, spec: { containers: [{ image: 'redis:7' }] } });
    assert.deepEqual(pod, { metadata: { name: 'cache-0' } });
  });

  it('rejects non-string annotation values', () => {
    assert.throws(
      () => decodePod({ metadata: { annotations: { replicas: 3 } } }),
      (err: Error) => err instanceof DomainDecodeError && err.message.startsWith('invalid Pod: metadata.annotations.replicas: ')
    );
  });
});

describe('encodeReview', () => {
  it('leaves out absent optional fields', () => {
    const body = encodeReview({
      apiVersion: 'admission.k8s.io/v1',
      kind: 'AdmissionReview',
      response: { uid: 'abc', allowed: true },
    });
    assert.equal(body, '{"apiVersion":"admission.k8s.io/v1","kind":"AdmissionReview","response":{"uid":"abc","allowed":true}}');
  });
});
