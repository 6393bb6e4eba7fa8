import { describe, it, expect } from 'vitest';
import { decodeOscMessage, encodeOscMessage, oscMessageSize } from './osc';
import { PayloadDecodeError, UnsupportedValueError } from './errors';

describe('OSC envelope', () => {
  it('lays out address, type tags and blob on 4-byte boundaries', () => {
    const datagram = encodeOscMessage('/a', new Uint8Array([1, 2, 3]));

    expect(Array.from(datagram)).toEqual([
      0x2f, 0x61, 0x00, 0x00, // "/a"
      0x2c, 0x62, 0x00, 0x00, // ",b"
      0x00, 0x00, 0x00, 0x03, // blob size
      0x01, 0x02, 0x03, 0x00, // blob + pad
    ]);
  });

  it('adds a full pad word when the address fills its slot exactly', () => {
    // "/abc" is 4 bytes, so its terminator needs another 4-byte word
    expect(oscMessageSize('/abc', 4)).toBe(8 + 4 + 4 + 4);
    expect(encodeOscMessage('/abc', new Uint8Array(4))).toHaveLength(20);
  });

  it('sizes the tracking label envelope', () => {
    // "/tracking/event" is 15 chars → 16, ",b" → 4, size → 4
    expect(oscMessageSize('/tracking/event', 0)).toBe(24);
    expect(oscMessageSize('/tracking/event', 5)).toBe(32);
  });

  it('unwraps what it wraps', () => {
    const payload = new Uint8Array([9, 8, 7, 6, 5]);
    const message = decodeOscMessage(encodeOscMessage('/tracking/event', payload));

    expect(message.address).toBe('/tracking/event');
    expect(Array.from(message.payload)).toEqual([9, 8, 7, 6, 5]);
  });

  it('rejects addresses that are not OSC addresses', () => {
    expect(() => encodeOscMessage('tracking', new Uint8Array())).toThrow(UnsupportedValueError);
    expect(() => encodeOscMessage('/with space', new Uint8Array())).toThrow(UnsupportedValueError);
  });

  it('rejects datagrams that are not single-blob messages', () => {
    const datagram = encodeOscMessage('/a', new Uint8Array([1, 2, 3]));

    expect(() => decodeOscMessage(datagram.subarray(0, 10))).toThrow(PayloadDecodeError);
    expect(() => decodeOscMessage(new Uint8Array([0x2f, 0x61]))).toThrow('Unterminated address');

    const wrongTags = datagram.slice();
    wrongTags[5] = 0x66; // ",f"
    expect(() => decodeOscMessage(wrongTags)).toThrow('Expected type tags ",b", got ",f"');

    const oversizedBlob = datagram.slice();
    oversizedBlob[11] = 0x40;
    expect(() => decodeOscMessage(oversizedBlob)).toThrow('Blob size 64 exceeds datagram');
  });
});
