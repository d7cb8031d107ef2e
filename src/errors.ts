/**
 * Error taxonomy for the webhook.
 *
 * TransportError subclasses end the request with an HTTP error status and a
 * plain-text body. DomainDecodeError and PatchEncodeError are reported inside a
 * well-formed AdmissionReview (`response.result.message`) with HTTP 200.
 */

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class EmptyBodyError extends TransportError {
  constructor() {
    super('empty body', 400);
    this.name = 'EmptyBodyError';
    Object.setPrototypeOf(this, EmptyBodyError.prototype);
  }
}

export class UnsupportedMediaTypeError extends TransportError {
  constructor(public readonly contentType: string | undefined) {
    super('invalid Content-Type, expected `application/json`', 415);
    this.name = 'UnsupportedMediaTypeError';
    Object.setPrototypeOf(this, UnsupportedMediaTypeError.prototype);
  }
}

/** Body bytes are not JSON at all. */
export class MalformedBodyError extends TransportError {
  constructor(cause: string) {
    super(`malformed JSON body: ${cause}`, 400);
    this.name = 'MalformedBodyError';
    Object.setPrototypeOf(this, MalformedBodyError.prototype);
  }
}

export class ResponseEncodeError extends TransportError {
  constructor(cause: string) {
    super(`could not encode response: ${cause}`, 500);
    this.name = 'ResponseEncodeError';
    Object.setPrototypeOf(this, ResponseEncodeError.prototype);
  }
}

/** The AdmissionReview envelope or the embedded Pod could not be decoded. */
export class DomainDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainDecodeError';
    Object.setPrototypeOf(this, DomainDecodeError.prototype);
  }
}

export class PatchEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PatchEncodeError';
    Object.setPrototypeOf(this, PatchEncodeError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
