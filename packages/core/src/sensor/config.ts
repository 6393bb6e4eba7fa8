/**
 * Bridge Configuration Constants
 *
 * Defaults for the tracking stream. Runtime values come from the
 * environment (see apps/bridge/config.ts); these are the fallbacks.
 */

/** Default destination host of the UDP stream */
export const DEFAULT_HOST = '127.0.0.1';

/** Default destination port of the UDP stream */
export const DEFAULT_PORT = 5005;

/** OSC address of per-frame tracking messages */
export const TRACKING_EVENT_LABEL = '/tracking/event';

/**
 * Largest UDP payload over IPv4: 65535 minus the 8-byte UDP header and
 * the 20-byte IP header. Datagrams above this cannot be sent at all.
 */
export const MAX_UDP_PAYLOAD = 65507;

/** Rate estimator window (samples) */
export const DEFAULT_FPS_WINDOW = 30;

/** Frames between status log lines */
export const DEFAULT_STATUS_EVERY = 100;

/**
 * Palm height band (mm above the sensor) where tracking is most reliable
 */
export const PALM_HEIGHT_RANGE = {
  min: 100,
  max: 400,
} as const;

/** Microseconds per second, for the sensor clock */
export const MICROS_PER_SECOND = 1_000_000;
