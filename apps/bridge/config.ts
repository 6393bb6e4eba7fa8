/**
 * Bridge Configuration
 *
 * Reads HANDLINK_* settings from the environment. main.ts loads `.env`
 * into process.env first (dotenv); loadConfig itself only reads the
 * object it is given.
 */

import { z } from 'zod';
import type { LogLevel } from '@core/logger';
import {
  DEFAULT_FPS_WINDOW,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_STATUS_EVERY,
  MAX_UDP_PAYLOAD,
  TRACKING_EVENT_LABEL,
} from '@core/sensor/config';

// ===== Schema =====

const envSchema = z.object({
  HANDLINK_HOST: z.string().min(1).default(DEFAULT_HOST),
  HANDLINK_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  HANDLINK_LABEL: z.string().regex(/^\/[\x21-\x7e]*$/, 'must be an OSC address starting with "/"').default(TRACKING_EVENT_LABEL),
  HANDLINK_MAX_DATAGRAM: z.coerce.number().int().min(64).max(MAX_UDP_PAYLOAD).default(MAX_UDP_PAYLOAD),
  HANDLINK_FPS_WINDOW: z.coerce.number().int().min(1).default(DEFAULT_FPS_WINDOW),
  HANDLINK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  HANDLINK_STATUS_EVERY: z.coerce.number().int().min(0).default(DEFAULT_STATUS_EVERY),
});

// ===== Type Definitions =====

export interface BridgeConfig {
  host: string;
  port: number;
  label: string;
  maxDatagramBytes: number;
  fpsWindow: number;
  logLevel: LogLevel;
  /** Frames between status lines; 0 disables them */
  statusEvery: number;
}

// ===== Errors =====

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ===== Loading =====

/**
 * Build the bridge configuration from environment variables.
 * Empty strings count as unset.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BridgeConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    host: e.HANDLINK_HOST,
    port: e.HANDLINK_PORT,
    label: e.HANDLINK_LABEL,
    maxDatagramBytes: e.HANDLINK_MAX_DATAGRAM,
    fpsWindow: e.HANDLINK_FPS_WINDOW,
    logLevel: e.HANDLINK_LOG_LEVEL,
    statusEvery: e.HANDLINK_STATUS_EVERY,
  };
}
