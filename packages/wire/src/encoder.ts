/**
 * Frame Encoder
 *
 * Serializes a TrackingFrame to MessagePack for the wire. Output is
 * deterministic: the same frame value always produces the same bytes.
 *
 * @module wire/encoder
 */

import { encode } from '@msgpack/msgpack';
import { MAX_UDP_PAYLOAD, TRACKING_EVENT_LABEL } from '@core/sensor/config';
import type { Bone, Finger, Hand, Quaternion, TrackingFrame, Vector3 } from '@core/types';
import { PayloadTooLargeError, UnsupportedValueError } from './errors';
import { assertValidAddress, oscMessageSize } from './osc';
import type { WireBone, WireFinger, WireFrame, WireHand, WireQuaternion, WireVector } from './schema';

/**
 * Every number is written as float64 (so 10 stays 10.0 on the wire);
 * integers travel as bigint and are written as 64-bit ints.
 */
const MSGPACK_OPTIONS = {
  useBigInt64: true,
  forceIntegerToFloat: true,
} as const;

// ===== Type Definitions =====

export interface FrameEncoderOptions {
  /** Routing label / OSC address (default: '/tracking/event') */
  label?: string;
  /** Largest datagram allowed, envelope included (default: 65507) */
  maxDatagramBytes?: number;
}

export interface EncodedFrame {
  label: string;
  /** MessagePack-encoded TrackingFrame */
  payload: Uint8Array;
  /** Size of the datagram once wrapped in the OSC envelope */
  datagramSize: number;
}

// ===== Wire Conversion =====

function wireInt(value: number, field: string): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new UnsupportedValueError(field, value);
  }
  return BigInt(value);
}

function wireVector(v: Vector3): WireVector {
  return { x: v.x, y: v.y, z: v.z };
}

function wireQuaternion(q: Quaternion): WireQuaternion {
  return { x: q.x, y: q.y, z: q.z, w: q.w };
}

function wireBone(bone: Bone): WireBone {
  return {
    start_position: wireVector(bone.startPosition),
    end_position: wireVector(bone.endPosition),
    center: wireVector(bone.center),
    orientation: wireQuaternion(bone.orientation),
    length: bone.length,
    width: bone.width,
  };
}

function wireFinger(finger: Finger): WireFinger {
  return {
    id: wireInt(finger.id, 'finger.id'),
    tip_position: wireVector(finger.tipPosition),
    is_extended: finger.isExtended,
    bones: finger.bones.map(wireBone),
  };
}

function wireHand(hand: Hand): WireHand {
  return {
    id: wireInt(hand.id, 'hand.id'),
    is_left: hand.isLeft,
    confidence: hand.confidence,
    grab_strength: hand.grabStrength,
    pinch_strength: hand.pinchStrength,
    pinch_distance: hand.pinchDistance,
    palm_position: wireVector(hand.palmPosition),
    palm_velocity: wireVector(hand.palmVelocity),
    palm_normal: wireVector(hand.palmNormal),
    direction: wireVector(hand.direction),
    palm_width: hand.palmWidth,
    wrist_position: wireVector(hand.wristPosition),
    elbow_position: wireVector(hand.elbowPosition),
    fingers: hand.fingers.map(wireFinger),
  };
}

/**
 * Build the wire record for a frame. Keys are always written in the
 * same order, whatever the key order of the input objects.
 * @throws UnsupportedValueError for ids or timestamps that are not safe integers
 */
export function toWireFrame(frame: TrackingFrame): WireFrame {
  return {
    frame_id: wireInt(frame.frameId, 'frame_id'),
    timestamp: wireInt(frame.timestamp, 'timestamp'),
    hands: frame.hands.map(wireHand),
  };
}

/**
 * MessagePack bytes of a frame, without the OSC envelope
 */
export function encodeFrame(frame: TrackingFrame): Uint8Array {
  return encode(toWireFrame(frame), MSGPACK_OPTIONS);
}

// ===== Encoder =====

export class FrameEncoder {
  private readonly label: string;
  private readonly maxDatagramBytes: number;

  constructor(options: FrameEncoderOptions = {}) {
    this.label = options.label ?? TRACKING_EVENT_LABEL;
    this.maxDatagramBytes = options.maxDatagramBytes ?? MAX_UDP_PAYLOAD;
    assertValidAddress(this.label);
  }

  getLabel(): string {
    return this.label;
  }

  /**
   * Encode a frame for transport.
   * @throws PayloadTooLargeError when the datagram would exceed the limit
   * @throws UnsupportedValueError when the frame holds an unrepresentable value
   */
  encode(frame: TrackingFrame): EncodedFrame {
    const payload = encodeFrame(frame);
    const datagramSize = oscMessageSize(this.label, payload.length);
    if (datagramSize > this.maxDatagramBytes) {
      throw new PayloadTooLargeError(datagramSize, this.maxDatagramBytes);
    }
    return { label: this.label, payload, datagramSize };
  }
}
