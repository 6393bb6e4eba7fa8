/**
 * @mapper - Native tracking frame → canonical tracking model
 */

export {
  mapFrame,
  mapBone,
  FrameMappingError,
  type MapFrameOptions,
  type MapResult,
  type MappingIssue,
  type MappingIssueKind,
} from './mapper';

export {
  vectorSchema,
  quaternionSchema,
  boneSchema,
  armSchema,
  digitSchema,
  palmSchema,
  handSchema,
  frameSchema,
  describeIssues,
} from './schema';
