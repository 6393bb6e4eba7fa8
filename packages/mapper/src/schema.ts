/**
 * Runtime Schemas for the Native Frame Contract
 *
 * Each level is validated separately so that one malformed hand, digit
 * or bone is skipped without losing its siblings. Nested structures the
 * mapper validates on its own are accepted as `unknown` by their parent.
 *
 * Sensor noise may carry NaN and ±Infinity; numeric fields accept both.
 *
 * @module mapper/schema
 */

import { z } from 'zod';
import type { NativeArm, NativeBone, NativeQuaternion, NativeVector } from '@core/types';

/** Any float64, NaN included */
const float = z.union([z.number(), z.nan()]);

const integer = z.number().int();

export const vectorSchema: z.ZodType<NativeVector> = z.object({
  x: float,
  y: float,
  z: float,
});

export const quaternionSchema: z.ZodType<NativeQuaternion> = z.object({
  x: float,
  y: float,
  z: float,
  w: float,
});

export const boneSchema: z.ZodType<NativeBone> = z.object({
  prev_joint: vectorSchema,
  next_joint: vectorSchema,
  center: vectorSchema.nullish(),
  rotation: quaternionSchema,
  length: float.nullish(),
  width: float,
});

export const armSchema: z.ZodType<NativeArm> = z.object({
  prev_joint: vectorSchema,
  next_joint: vectorSchema,
});

/** Digit fields; bones are validated one by one */
export const digitSchema = z.object({
  finger_id: integer.optional(),
  is_extended: z.boolean(),
  tip_position: vectorSchema.nullish(),
  metacarpal: z.unknown(),
  proximal: z.unknown(),
  intermediate: z.unknown(),
  distal: z.unknown(),
});

export const palmSchema = z.object({
  position: vectorSchema,
  velocity: vectorSchema,
  normal: vectorSchema,
  direction: vectorSchema,
  width: float,
});

/** Hand fields; arm and digits are validated one by one */
export const handSchema = z.object({
  id: integer,
  type: z.enum(['left', 'right']),
  confidence: float,
  grab_strength: float,
  pinch_strength: float,
  pinch_distance: float,
  palm: palmSchema,
  arm: z.unknown(),
  digits: z.array(z.unknown()),
});

/** Frame fields; hands are validated one by one */
export const frameSchema = z.object({
  tracking_frame_id: integer,
  timestamp: integer,
  hands: z.array(z.unknown()),
});

export type DigitFields = z.infer<typeof digitSchema>;
export type HandFields = z.infer<typeof handSchema>;

/**
 * One-line summary of a failed parse: first issue's path and message
 */
export function describeIssues(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) return 'invalid';
  const path = first.path.length > 0 ? first.path.join('.') : '(root)';
  const more = error.issues.length > 1 ? ` (+${error.issues.length - 1} more)` : '';
  return `${path}: ${first.message}${more}`;
}
