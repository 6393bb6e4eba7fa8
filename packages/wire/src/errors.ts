/**
 * Wire Codec Errors
 */

/**
 * Base class for frames that cannot be put on the wire. The frame is
 * dropped; the stream continues with the next one.
 */
export class EncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

/**
 * Encoded datagram would not fit in one UDP packet.
 */
export class PayloadTooLargeError extends EncodingError {
  constructor(
    public readonly size: number,
    public readonly limit: number
  ) {
    super(`Encoded datagram is ${size} bytes, limit is ${limit}`);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * A value the wire schema cannot represent (non-integer id, bad label).
 */
export class UnsupportedValueError extends EncodingError {
  constructor(
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(`Unsupported value for ${field}: ${String(value)}`);
    this.name = 'UnsupportedValueError';
  }
}

/**
 * Datagram or payload does not follow the wire format.
 */
export class PayloadDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadDecodeError';
  }
}
