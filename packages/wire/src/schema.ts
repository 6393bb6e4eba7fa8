/**
 * Wire Schema
 *
 * MessagePack layout of a TrackingFrame. Every record is a map with
 * snake_case string keys, written in the order declared here. Floats are
 * always float64; ids and timestamps are always 64-bit integers.
 *
 *   frame:  { frame_id, timestamp, hands[] }
 *   hand:   { id, is_left, confidence, grab_strength, pinch_strength,
 *             pinch_distance, palm_position, palm_velocity, palm_normal,
 *             direction, palm_width, wrist_position, elbow_position, fingers[] }
 *   finger: { id, tip_position, is_extended, bones[] }
 *   bone:   { start_position, end_position, center, orientation, length, width }
 *   vector: { x, y, z }      quaternion: { x, y, z, w }
 *
 * @module wire/schema
 */

import { z } from 'zod';

export interface WireVector {
  x: number;
  y: number;
  z: number;
}

export interface WireQuaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

export interface WireBone {
  start_position: WireVector;
  end_position: WireVector;
  center: WireVector;
  orientation: WireQuaternion;
  length: number;
  width: number;
}

export interface WireFinger {
  id: bigint;
  tip_position: WireVector;
  is_extended: boolean;
  bones: WireBone[];
}

export interface WireHand {
  id: bigint;
  is_left: boolean;
  confidence: number;
  grab_strength: number;
  pinch_strength: number;
  pinch_distance: number;
  palm_position: WireVector;
  palm_velocity: WireVector;
  palm_normal: WireVector;
  direction: WireVector;
  palm_width: number;
  wrist_position: WireVector;
  elbow_position: WireVector;
  fingers: WireFinger[];
}

export interface WireFrame {
  frame_id: bigint;
  timestamp: bigint;
  hands: WireHand[];
}

// ===== Decoding Schemas =====

const float = z.union([z.number(), z.nan()]);

/** 64-bit integer read back as a JS number; must stay within the safe range */
const int64 = z.bigint().transform((value, ctx) => {
  const n = Number(value);
  if (!Number.isSafeInteger(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Integer ${value} exceeds the safe range` });
    return z.NEVER;
  }
  return n;
});

const wireVector = z.object({ x: float, y: float, z: float });

const wireQuaternion = z.object({ x: float, y: float, z: float, w: float });

const wireBone = z.object({
  start_position: wireVector,
  end_position: wireVector,
  center: wireVector,
  orientation: wireQuaternion,
  length: float,
  width: float,
});

const wireFinger = z.object({
  id: int64,
  tip_position: wireVector,
  is_extended: z.boolean(),
  bones: z.array(wireBone),
});

const wireHand = z.object({
  id: int64,
  is_left: z.boolean(),
  confidence: float,
  grab_strength: float,
  pinch_strength: float,
  pinch_distance: float,
  palm_position: wireVector,
  palm_velocity: wireVector,
  palm_normal: wireVector,
  direction: wireVector,
  palm_width: float,
  wrist_position: wireVector,
  elbow_position: wireVector,
  fingers: z.array(wireFinger),
});

export const wireFrameSchema = z.object({
  frame_id: int64,
  timestamp: int64,
  hands: z.array(wireHand),
});

export type DecodedWireFrame = z.infer<typeof wireFrameSchema>;
