/**
 * @wire - Wire codec for tracking frames
 *
 * Provides:
 * - FrameEncoder: TrackingFrame → MessagePack payload, with size limit
 * - OSC envelope: routing label + payload → datagram
 * - Decoders for consumers and tests
 */

export {
  FrameEncoder,
  encodeFrame,
  toWireFrame,
  type FrameEncoderOptions,
  type EncodedFrame,
} from './encoder';

export { decodeFrame, decodeDatagram, type DecodedDatagram } from './decoder';

export {
  encodeOscMessage,
  decodeOscMessage,
  oscMessageSize,
  isValidAddress,
  type OscBlobMessage,
} from './osc';

export {
  EncodingError,
  PayloadTooLargeError,
  UnsupportedValueError,
  PayloadDecodeError,
} from './errors';

export type {
  WireFrame,
  WireHand,
  WireFinger,
  WireBone,
  WireVector,
  WireQuaternion,
} from './schema';
