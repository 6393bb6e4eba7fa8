/**
 * @core - Shared types, constants and logging for HANDLINK
 */

export * from './types';
export * from './sensor/config';
export * from './logger';
