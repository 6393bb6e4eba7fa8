/**
 * Core Geometry Types
 *
 * Canonical 3D primitives shared by the tracking model, the mapper and the
 * wire codec. Values are immutable once built; construct them with the
 * helpers below rather than mutating in place.
 *
 * @module core/types/geometry
 */

// ===== Vector Types =====

/** 3D vector with x, y, z components (mm for positions, mm/s for velocities) */
export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

// ===== Rotation Types =====

/**
 * Quaternion for 3D rotation representation.
 * Uses Hamilton convention: q = w + xi + yj + zk
 *
 * Sensor orientations are carried as delivered, so a value is not
 * guaranteed to be unit-norm.
 */
export interface Quaternion {
  /** X component of imaginary part */
  readonly x: number;
  /** Y component of imaginary part */
  readonly y: number;
  /** Z component of imaginary part */
  readonly z: number;
  /** Scalar (real) component */
  readonly w: number;
}

// ===== Constructors =====

/** Zero vector, substituted for geometry the sensor did not report */
export const ZERO_VECTOR3: Vector3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec3(x: number, y: number, z: number): Vector3 {
  return { x, y, z };
}

export function quat(x: number, y: number, z: number, w: number): Quaternion {
  return { x, y, z, w };
}

// ===== Operations =====

/** Point halfway between a and b */
export function midpoint(a: Vector3, b: Vector3): Vector3 {
  return vec3((a.x + b.x) / 2, (a.y + b.y) / 2, (a.z + b.z) / 2);
}

/** Euclidean distance between a and b */
export function distance(a: Vector3, b: Vector3): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const dz = b.z - a.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}
