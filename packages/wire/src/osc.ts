/**
 * OSC Envelope
 *
 * Each datagram is one OSC 1.0 message: the routing label as address
 * pattern, the type tag string ",b" and a single blob argument holding
 * the encoded frame.
 *
 *   [address\0 pad4][",b\0\0"][size:int32 BE][payload pad4]
 *
 * @module wire/osc
 */

import { PayloadDecodeError, UnsupportedValueError } from './errors';

const BLOB_TYPE_TAGS = ',b';

/** OSC addresses: leading slash, printable ASCII, no spaces */
const ADDRESS_PATTERN = /^\/[\x21-\x7e]*$/;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/** Round up to the 4-byte OSC alignment */
function pad4(n: number): number {
  return (n + 3) & ~3;
}

/** Encoded size of a NUL-terminated, padded OSC string */
function stringSize(byteLength: number): number {
  return pad4(byteLength + 1);
}

export function isValidAddress(address: string): boolean {
  return ADDRESS_PATTERN.test(address);
}

export function assertValidAddress(address: string): void {
  if (!isValidAddress(address)) {
    throw new UnsupportedValueError('label', address);
  }
}

/**
 * Size in bytes of the OSC message that would carry `payloadLength` bytes
 */
export function oscMessageSize(address: string, payloadLength: number): number {
  return stringSize(address.length) + stringSize(BLOB_TYPE_TAGS.length) + 4 + pad4(payloadLength);
}

/**
 * Wrap a payload as an OSC message with a single blob argument.
 * @throws UnsupportedValueError when the address is not a valid OSC address
 */
export function encodeOscMessage(address: string, payload: Uint8Array): Uint8Array {
  assertValidAddress(address);

  const addressSize = stringSize(address.length);
  const tagsSize = stringSize(BLOB_TYPE_TAGS.length);
  const out = new Uint8Array(oscMessageSize(address, payload.length));

  out.set(textEncoder.encode(address), 0);
  out.set(textEncoder.encode(BLOB_TYPE_TAGS), addressSize);

  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setInt32(addressSize + tagsSize, payload.length, false);
  out.set(payload, addressSize + tagsSize + 4);

  return out;
}

export interface OscBlobMessage {
  address: string;
  payload: Uint8Array;
}

function readString(data: Uint8Array, offset: number, what: string): { value: string; next: number } {
  const end = data.indexOf(0, offset);
  if (end === -1) {
    throw new PayloadDecodeError(`Unterminated ${what}`);
  }
  const next = offset + stringSize(end - offset);
  if (next > data.length) {
    throw new PayloadDecodeError(`Truncated ${what}`);
  }
  return { value: textDecoder.decode(data.subarray(offset, end)), next };
}

/**
 * Unwrap an OSC message carrying a single blob argument.
 * The returned payload is a view into `datagram`.
 */
export function decodeOscMessage(datagram: Uint8Array): OscBlobMessage {
  const address = readString(datagram, 0, 'address');
  if (!isValidAddress(address.value)) {
    throw new PayloadDecodeError(`Invalid OSC address: ${address.value}`);
  }

  const tags = readString(datagram, address.next, 'type tags');
  if (tags.value !== BLOB_TYPE_TAGS) {
    throw new PayloadDecodeError(`Expected type tags "${BLOB_TYPE_TAGS}", got "${tags.value}"`);
  }

  if (tags.next + 4 > datagram.length) {
    throw new PayloadDecodeError('Truncated blob size');
  }
  const view = new DataView(datagram.buffer, datagram.byteOffset, datagram.byteLength);
  const size = view.getInt32(tags.next, false);
  const start = tags.next + 4;
  if (size < 0 || start + size > datagram.length) {
    throw new PayloadDecodeError(`Blob size ${size} exceeds datagram`);
  }

  return {
    address: address.value,
    payload: datagram.subarray(start, start + size),
  };
}
