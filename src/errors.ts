// Error kinds surfaced by the decoder.
//
// All errors extend UmpError so callers can catch the family with one
// instanceof check. UpstreamError is the only one delivered as an event value
// instead of being thrown through the reader.

export class UmpError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UmpError";
  }
}

/** Input ended mid-varint, mid-header or mid-payload. */
export class TruncatedInputError extends UmpError {
  constructor(message: string) {
    super(message);
    this.name = "TruncatedInputError";
  }
}

export class ProtocolViolationError extends UmpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolViolationError";
  }
}

export class UnknownHeaderIdError extends ProtocolViolationError {
  readonly headerId: number;

  constructor(headerId: number, partName: string) {
    super(`${partName} for unknown header id ${headerId}`);
    this.name = "UnknownHeaderIdError";
    this.headerId = headerId;
  }
}

export class MissingCryptoParamsError extends UmpError {
  constructor(message: string) {
    super(message);
    this.name = "MissingCryptoParamsError";
  }
}

export class InvalidKeyLengthError extends UmpError {
  readonly expected: readonly number[];
  readonly actual: number;

  constructor(expected: readonly number[], actual: number) {
    super(`invalid key length: expected ${expected.join(" or ")} bytes, got ${actual}`);
    this.name = "InvalidKeyLengthError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class AuthenticationFailedError extends UmpError {
  constructor() {
    super("onesie envelope HMAC mismatch");
    this.name = "AuthenticationFailedError";
  }
}

export class DecompressionFailedError extends UmpError {
  constructor(codec: string, cause: unknown) {
    super(`${codec} decompression failed`, { cause });
    this.name = "DecompressionFailedError";
  }
}

/** A PLAYER_RESPONSE whose wrapper reports a non-OK proxy status or a non-200 status. */
export class UpstreamError extends UmpError {
  readonly proxyStatus: number;
  readonly status: number;
  readonly body: Uint8Array;

  constructor(proxyStatus: number, status: number, body: Uint8Array) {
    super(`upstream player response failed: proxyStatus=${proxyStatus} status=${status}`);
    this.name = "UpstreamError";
    this.proxyStatus = proxyStatus;
    this.status = status;
    this.body = body;
  }
}
