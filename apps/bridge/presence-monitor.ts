/**
 * Presence Monitor
 *
 * Tracks whether hands are in the sensor's field of view and whether the
 * palm sits at a height the sensor tracks well. Diagnostic only; feeds
 * operator logs and the end-of-session summary.
 */

import { PALM_HEIGHT_RANGE } from '@core/sensor/config';
import { createLogger, type Logger } from '@core/logger';
import type { TrackingFrame } from '@core/types';

// ===== Type Definitions =====

export type PalmPlacement = 'too-close' | 'too-far' | 'good';

export interface HandPlacement {
  handId: number;
  isLeft: boolean;
  /** Palm height above the sensor (mm) */
  height: number;
  placement: PalmPlacement;
}

export interface PresenceSummary {
  frames: number;
  framesWithHands: number;
  /** Percentage of frames with at least one hand (0-100) */
  detectionRate: number;
  /** Wall-clock seconds of the last frame with a hand, null if never */
  lastHandSeenAt: number | null;
}

// ===== Classification =====

/**
 * Classify palm height (mm above the sensor) against the tracking band
 */
export function classifyPalmHeight(height: number): PalmPlacement {
  if (height < PALM_HEIGHT_RANGE.min) return 'too-close';
  if (height > PALM_HEIGHT_RANGE.max) return 'too-far';
  return 'good';
}

const PLACEMENT_ADVICE: Record<PalmPlacement, string> = {
  'too-close': `too close, move higher (${PALM_HEIGHT_RANGE.min}-${PALM_HEIGHT_RANGE.max} mm is best)`,
  'too-far': `too far, move closer (${PALM_HEIGHT_RANGE.min}-${PALM_HEIGHT_RANGE.max} mm is best)`,
  'good': 'good height',
};

// ===== Monitor =====

export class PresenceMonitor {
  private frames = 0;
  private framesWithHands = 0;
  private lastHandSeenAt: number | null = null;
  private lastPlacement = new Map<number, PalmPlacement>();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('Presence');
  }

  /**
   * Record one frame.
   * @param now - Wall-clock arrival time (seconds)
   */
  observe(frame: TrackingFrame, now: number): HandPlacement[] {
    this.frames++;

    if (frame.hands.length === 0) {
      if (this.lastPlacement.size > 0) {
        this.log.info(`No hands (frame ${frame.frameId})`);
        this.lastPlacement.clear();
      }
      return [];
    }

    this.framesWithHands++;
    this.lastHandSeenAt = now;

    const placements = frame.hands.map((hand): HandPlacement => ({
      handId: hand.id,
      isLeft: hand.isLeft,
      height: hand.palmPosition.y,
      placement: classifyPalmHeight(hand.palmPosition.y),
    }));

    const seen = new Set<number>();
    for (const p of placements) {
      seen.add(p.handId);
      if (this.lastPlacement.get(p.handId) !== p.placement) {
        const side = p.isLeft ? 'Left' : 'Right';
        this.log.info(`${side} hand ${p.handId} at ${p.height.toFixed(0)} mm: ${PLACEMENT_ADVICE[p.placement]}`);
        this.lastPlacement.set(p.handId, p.placement);
      }
    }
    for (const id of [...this.lastPlacement.keys()]) {
      if (!seen.has(id)) this.lastPlacement.delete(id);
    }

    return placements;
  }

  summary(): PresenceSummary {
    return {
      frames: this.frames,
      framesWithHands: this.framesWithHands,
      detectionRate: this.frames === 0 ? 0 : (100 * this.framesWithHands) / this.frames,
      lastHandSeenAt: this.lastHandSeenAt,
    };
  }

  reset(): void {
    this.frames = 0;
    this.framesWithHands = 0;
    this.lastHandSeenAt = null;
    this.lastPlacement.clear();
  }
}
