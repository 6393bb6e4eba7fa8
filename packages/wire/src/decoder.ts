/**
 * Frame Decoder
 *
 * Consumer side of the wire format: OSC datagram → TrackingFrame.
 * Used by tests and by in-process consumers; other languages decode the
 * same bytes with any MessagePack library.
 *
 * @module wire/decoder
 */

import { decode } from '@msgpack/msgpack';
import type { TrackingFrame } from '@core/types';
import { PayloadDecodeError } from './errors';
import { decodeOscMessage } from './osc';
import { wireFrameSchema, type DecodedWireFrame } from './schema';

type DecodedHand = DecodedWireFrame['hands'][number];

function fromWireHand(hand: DecodedHand): TrackingFrame['hands'][number] {
  return {
    id: hand.id,
    isLeft: hand.is_left,
    confidence: hand.confidence,
    grabStrength: hand.grab_strength,
    pinchStrength: hand.pinch_strength,
    pinchDistance: hand.pinch_distance,
    palmPosition: hand.palm_position,
    palmVelocity: hand.palm_velocity,
    palmNormal: hand.palm_normal,
    direction: hand.direction,
    palmWidth: hand.palm_width,
    wristPosition: hand.wrist_position,
    elbowPosition: hand.elbow_position,
    fingers: hand.fingers.map((finger) => ({
      id: finger.id,
      tipPosition: finger.tip_position,
      isExtended: finger.is_extended,
      bones: finger.bones.map((bone) => ({
        startPosition: bone.start_position,
        endPosition: bone.end_position,
        center: bone.center,
        orientation: bone.orientation,
        length: bone.length,
        width: bone.width,
      })),
    })),
  };
}

/**
 * Decode a MessagePack payload back into a TrackingFrame.
 * @throws PayloadDecodeError when the bytes are not a wire frame
 */
export function decodeFrame(payload: Uint8Array): TrackingFrame {
  let raw: unknown;
  try {
    raw = decode(payload, { useBigInt64: true });
  } catch (err) {
    throw new PayloadDecodeError(`Malformed MessagePack: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = wireFrameSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PayloadDecodeError(`Not a tracking frame: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }

  return {
    frameId: parsed.data.frame_id,
    timestamp: parsed.data.timestamp,
    hands: parsed.data.hands.map(fromWireHand),
  };
}

export interface DecodedDatagram {
  label: string;
  frame: TrackingFrame;
}

/**
 * Decode a full datagram as received from the socket.
 */
export function decodeDatagram(datagram: Uint8Array): DecodedDatagram {
  const message = decodeOscMessage(datagram);
  return { label: message.address, frame: decodeFrame(message.payload) };
}
