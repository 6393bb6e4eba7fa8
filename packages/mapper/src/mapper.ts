/**
 * Frame Mapper
 *
 * Maps the tracking service's native frame onto the canonical tracking
 * model. Pure: no I/O, no state. Sub-structures that fail their contract
 * are left out and reported through `onIssue`; only a frame whose own
 * fields are unusable fails as a whole.
 *
 * Numbers are copied verbatim. No unit conversion, clamping or rounding.
 *
 * @module mapper
 */

import {
  BONE_NAMES,
  MAX_FINGERS,
  MAX_HANDS,
  ZERO_VECTOR3,
  distance,
  midpoint,
  quat,
  vec3,
  type Bone,
  type Finger,
  type Hand,
  type NativeBone,
  type NativeVector,
  type Quaternion,
  type TrackingFrame,
  type Vector3,
} from '@core/types';
import {
  armSchema,
  boneSchema,
  describeIssues,
  digitSchema,
  frameSchema,
  handSchema,
  type DigitFields,
  type HandFields,
} from './schema';

// ===== Type Definitions =====

/** Level at which a sub-structure was dropped */
export type MappingIssueKind = 'hand' | 'digit' | 'bone' | 'arm';

/**
 * A sub-structure the mapper left out (or substituted) while mapping.
 */
export interface MappingIssue {
  kind: MappingIssueKind;
  /** Location in the native frame, e.g. "hands[0].digits[2].distal" */
  path: string;
  reason: string;
}

export interface MapFrameOptions {
  /** Called once per skipped or substituted sub-structure */
  onIssue?: (issue: MappingIssue) => void;
}

export interface MapResult {
  frame: TrackingFrame;
  issues: MappingIssue[];
}

// ===== Errors =====

/**
 * The frame's own fields (id, timestamp, hand list) failed the contract.
 */
export class FrameMappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameMappingError';
  }
}

// ===== Leaf Conversions =====

function toVector(v: NativeVector): Vector3 {
  return vec3(v.x, v.y, v.z);
}

function toQuaternion(q: { x: number; y: number; z: number; w: number }): Quaternion {
  return quat(q.x, q.y, q.z, q.w);
}

/**
 * Convert a validated native bone. Center and length are derived from
 * the joints when the source leaves them out.
 */
export function mapBone(bone: NativeBone): Bone {
  const start = toVector(bone.prev_joint);
  const end = toVector(bone.next_joint);
  return {
    startPosition: start,
    endPosition: end,
    center: bone.center ? toVector(bone.center) : midpoint(start, end),
    orientation: toQuaternion(bone.rotation),
    length: bone.length ?? distance(start, end),
    width: bone.width,
  };
}

// ===== Mapping Context =====

class MappingContext {
  readonly issues: MappingIssue[] = [];

  constructor(private readonly onIssue?: (issue: MappingIssue) => void) {}

  report(kind: MappingIssueKind, path: string, reason: string): void {
    const issue: MappingIssue = { kind, path, reason };
    this.issues.push(issue);
    this.onIssue?.(issue);
  }
}

// ===== Digits =====

function mapDigit(digit: DigitFields, position: number, path: string, ctx: MappingContext): Finger {
  if (digit.finger_id !== undefined && digit.finger_id !== position) {
    ctx.report('digit', path, `finger_id ${digit.finger_id} differs from position ${position}; using position`);
  }

  const bones: Bone[] = [];
  let distal: Bone | null = null;

  for (const name of BONE_NAMES) {
    const raw = digit[name];
    if (raw === undefined || raw === null) continue;

    const parsed = boneSchema.safeParse(raw);
    if (!parsed.success) {
      ctx.report('bone', `${path}.${name}`, describeIssues(parsed.error));
      continue;
    }

    const bone = mapBone(parsed.data);
    bones.push(bone);
    if (name === 'distal') distal = bone;
  }

  let tipPosition: Vector3 = ZERO_VECTOR3;
  if (digit.tip_position) {
    tipPosition = toVector(digit.tip_position);
  } else if (distal) {
    tipPosition = distal.endPosition;
  }

  return {
    id: position,
    tipPosition,
    isExtended: digit.is_extended,
    bones,
  };
}

// ===== Hands =====

function mapHand(hand: HandFields, path: string, ctx: MappingContext): Hand {
  let wristPosition: Vector3 = ZERO_VECTOR3;
  let elbowPosition: Vector3 = ZERO_VECTOR3;

  if (hand.arm !== undefined && hand.arm !== null) {
    const arm = armSchema.safeParse(hand.arm);
    if (arm.success) {
      elbowPosition = toVector(arm.data.prev_joint);
      wristPosition = toVector(arm.data.next_joint);
    } else {
      ctx.report('arm', `${path}.arm`, `${describeIssues(arm.error)}; wrist and elbow set to zero`);
    }
  }

  const fingers: Finger[] = [];
  hand.digits.forEach((raw, i) => {
    const digitPath = `${path}.digits[${i}]`;
    if (i >= MAX_FINGERS) {
      ctx.report('digit', digitPath, `more than ${MAX_FINGERS} digits`);
      return;
    }

    const parsed = digitSchema.safeParse(raw);
    if (!parsed.success) {
      ctx.report('digit', digitPath, describeIssues(parsed.error));
      return;
    }
    fingers.push(mapDigit(parsed.data, i, digitPath, ctx));
  });

  return {
    id: hand.id,
    isLeft: hand.type === 'left',
    confidence: hand.confidence,
    grabStrength: hand.grab_strength,
    pinchStrength: hand.pinch_strength,
    pinchDistance: hand.pinch_distance,
    palmPosition: toVector(hand.palm.position),
    palmVelocity: toVector(hand.palm.velocity),
    palmNormal: toVector(hand.palm.normal),
    direction: toVector(hand.palm.direction),
    palmWidth: hand.palm.width,
    wristPosition,
    elbowPosition,
    fingers,
  };
}

// ===== Frames =====

/**
 * Map one native frame.
 *
 * @param native - Frame as delivered by the connection
 * @throws FrameMappingError when the frame's own fields are unusable
 */
export function mapFrame(native: unknown, options: MapFrameOptions = {}): MapResult {
  const parsed = frameSchema.safeParse(native);
  if (!parsed.success) {
    throw new FrameMappingError(`Invalid tracking frame: ${describeIssues(parsed.error)}`);
  }

  const ctx = new MappingContext(options.onIssue);
  const hands: Hand[] = [];

  parsed.data.hands.forEach((raw, i) => {
    const path = `hands[${i}]`;
    if (hands.length >= MAX_HANDS) {
      ctx.report('hand', path, `more than ${MAX_HANDS} hands`);
      return;
    }

    const hand = handSchema.safeParse(raw);
    if (!hand.success) {
      ctx.report('hand', path, describeIssues(hand.error));
      return;
    }
    hands.push(mapHand(hand.data, path, ctx));
  });

  return {
    frame: {
      frameId: parsed.data.tracking_frame_id,
      timestamp: parsed.data.timestamp,
      hands,
    },
    issues: ctx.issues,
  };
}
