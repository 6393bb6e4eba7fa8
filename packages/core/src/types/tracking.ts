/**
 * Canonical Tracking Model
 *
 * Fixed-schema record hierarchy delivered to every downstream consumer:
 *
 *   TrackingFrame → Hand[0..2] → Finger[0..5] → Bone[0..4]
 *
 * Independent of the sensor's native representation. Consumers index
 * fingers and bones by position, so sequences stay in anatomical order
 * (thumb → pinky, metacarpal → distal) from mapping through encoding.
 *
 * @module core/types/tracking
 */

import type { Quaternion, Vector3 } from './geometry';

// ===== Anatomy =====

/** Names of the five fingers, in delivery order */
export type FingerName = 'thumb' | 'index' | 'middle' | 'ring' | 'pinky';

/** Array of finger names in order; a finger's id is its index here */
export const FINGER_NAMES: readonly FingerName[] = ['thumb', 'index', 'middle', 'ring', 'pinky'] as const;

/** Names of the four finger bones, proximal to distal */
export type BoneName = 'metacarpal' | 'proximal' | 'intermediate' | 'distal';

/** Array of bone names in order */
export const BONE_NAMES: readonly BoneName[] = ['metacarpal', 'proximal', 'intermediate', 'distal'] as const;

/** Most hands a single frame carries */
export const MAX_HANDS = 2;

/** Most fingers a hand carries */
export const MAX_FINGERS = FINGER_NAMES.length;

// ===== Records =====

/**
 * One phalange segment between two joints.
 */
export interface Bone {
  /** Joint closer to the wrist (mm) */
  readonly startPosition: Vector3;
  /** Joint closer to the fingertip (mm) */
  readonly endPosition: Vector3;
  /** Midpoint of the segment (mm) */
  readonly center: Vector3;
  readonly orientation: Quaternion;
  /** Segment length (mm) */
  readonly length: number;
  /** Segment width (mm) */
  readonly width: number;
}

export interface Finger {
  /** 0 = thumb … 4 = pinky */
  readonly id: number;
  readonly tipPosition: Vector3;
  readonly isExtended: boolean;
  /** Present bones in metacarpal → distal order; absent segments are left out */
  readonly bones: readonly Bone[];
}

export interface Hand {
  /** Sensor-assigned id, stable while the hand stays in view */
  readonly id: number;
  readonly isLeft: boolean;
  /** Tracking confidence (0-1) */
  readonly confidence: number;
  /** Grab strength (0-1) */
  readonly grabStrength: number;
  /** Pinch strength (0-1) */
  readonly pinchStrength: number;
  /** Distance between thumb and index tips (mm) */
  readonly pinchDistance: number;
  readonly palmPosition: Vector3;
  /** mm/s */
  readonly palmVelocity: Vector3;
  readonly palmNormal: Vector3;
  /** Unit vector from palm toward the fingers */
  readonly direction: Vector3;
  /** Palm width (mm) */
  readonly palmWidth: number;
  /** Zero when the sensor did not report arm geometry */
  readonly wristPosition: Vector3;
  /** Zero when the sensor did not report arm geometry */
  readonly elbowPosition: Vector3;
  readonly fingers: readonly Finger[];
}

export interface TrackingFrame {
  /** Sensor-assigned, monotonically non-decreasing */
  readonly frameId: number;
  /** Microseconds, sensor clock domain */
  readonly timestamp: number;
  /** Zero hands is a valid frame ("no hands present") */
  readonly hands: readonly Hand[];
}
