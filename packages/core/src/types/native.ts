/**
 * Native Frame Contract
 *
 * Shape of the tracking service's frame as delivered to connection
 * listeners. Field names follow the service (snake_case). Everything
 * arriving over a connection is validated against this contract before
 * it is mapped; see @mapper for the runtime schemas.
 *
 * @module core/types/native
 */

export interface NativeVector {
  x: number;
  y: number;
  z: number;
}

export interface NativeQuaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

/**
 * A bone as reported by the service. The service's own struct carries
 * only the joints, rotation and width; `center` and `length` are filled
 * in by recorders and SDKs that precompute them.
 */
export interface NativeBone {
  prev_joint: NativeVector;
  next_joint: NativeVector;
  center?: NativeVector | null;
  rotation: NativeQuaternion;
  length?: number | null;
  width: number;
}

/** Forearm segment: prev_joint is the elbow, next_joint the wrist */
export interface NativeArm {
  prev_joint: NativeVector;
  next_joint: NativeVector;
}

export interface NativeDigit {
  finger_id?: number;
  is_extended: boolean;
  tip_position?: NativeVector | null;
  metacarpal?: NativeBone | null;
  proximal?: NativeBone | null;
  intermediate?: NativeBone | null;
  distal?: NativeBone | null;
}

export interface NativePalm {
  position: NativeVector;
  velocity: NativeVector;
  normal: NativeVector;
  direction: NativeVector;
  width: number;
}

export type NativeHandType = 'left' | 'right';

export interface NativeHand {
  id: number;
  type: NativeHandType;
  confidence: number;
  grab_strength: number;
  pinch_strength: number;
  pinch_distance: number;
  palm: NativePalm;
  arm?: NativeArm | null;
  digits: NativeDigit[];
}

export interface NativeTrackingFrame {
  tracking_frame_id: number;
  /** Microseconds, sensor clock */
  timestamp: number;
  hands: NativeHand[];
}
