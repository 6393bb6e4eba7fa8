/**
 * Core Types for HANDLINK
 *
 * Re-exports all types from submodules for convenient importing:
 *
 *   import { Vector3, TrackingFrame, NativeTrackingFrame } from '@core/types';
 *
 * Type Modules:
 * - geometry: Vector3, Quaternion and their constructors
 * - tracking: Bone, Finger, Hand, TrackingFrame
 * - native: the tracking service's frame contract
 * - device: DeviceInfo, listener and connection interfaces
 *
 * @module core/types
 */

// Geometry primitives (canonical source)
export * from './geometry';

// Canonical tracking model
export * from './tracking';

// Native frame contract
export type * from './native';

// Device and connection types
export type * from './device';
