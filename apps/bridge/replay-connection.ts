/**
 * Replay Connection
 *
 * Plays back a recorded session as a tracking connection. A recording is
 * NDJSON: one native tracking frame per line. Frames are emitted at the
 * pace of their sensor timestamps, scaled by `speed`.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { MICROS_PER_SECOND } from '@core/sensor/config';
import { createLogger, errorMessage, type Logger } from '@core/logger';
import type { TrackingConnection, TrackingEventListener } from '@core/types';

// ===== Type Definitions =====

export interface ReplayConnectionOptions {
  /** Path to the NDJSON recording */
  path: string;
  /** Playback speed multiplier (default: 1) */
  speed?: number;
  /** Restart from the first frame after the last (default: false) */
  loop?: boolean;
  /** Serial reported to listeners on open (default: 'REPLAY') */
  serial?: string;
  /** Gap used when timestamps are missing or go backwards (ms, default: ~90 Hz) */
  fallbackIntervalMs?: number;
  logger?: Logger;
}

export interface RecordingLineError {
  /** 1-based line number */
  line: number;
  message: string;
}

export interface ParsedRecording {
  frames: unknown[];
  errors: RecordingLineError[];
}

// ===== Constants =====

const DEFAULT_FALLBACK_INTERVAL_MS = 1000 / 90;

const timestampSchema = z.object({ timestamp: z.number() });

// ===== Parsing =====

/**
 * Split a recording into frames. Blank lines are ignored; lines that are
 * not JSON are reported and skipped. Frame contents are not validated
 * here; that is the listener's job.
 */
export function parseRecording(text: string): ParsedRecording {
  const frames: unknown[] = [];
  const errors: RecordingLineError[] = [];

  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === '') return;
    try {
      frames.push(JSON.parse(line));
    } catch (err) {
      errors.push({ line: i + 1, message: errorMessage(err) });
    }
  });

  return { frames, errors };
}

/**
 * Milliseconds between two recorded frames, from their sensor timestamps
 */
export function frameGapMs(current: unknown, next: unknown, fallbackMs: number): number {
  const a = timestampSchema.safeParse(current);
  const b = timestampSchema.safeParse(next);
  if (!a.success || !b.success) return fallbackMs;

  const gap = ((b.data.timestamp - a.data.timestamp) / MICROS_PER_SECOND) * 1000;
  return Number.isFinite(gap) && gap >= 0 ? gap : fallbackMs;
}

// ===== Connection =====

export class ReplayConnection implements TrackingConnection {
  private readonly path: string;
  private readonly speed: number;
  private readonly loop: boolean;
  private readonly serial: string;
  private readonly fallbackIntervalMs: number;
  private readonly log: Logger;

  private listeners: TrackingEventListener[] = [];
  private frames: unknown[] = [];
  private index = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private opened = false;
  private finished = false;
  private resolveDone: () => void = () => {};
  private readonly done: Promise<void>;

  constructor(options: ReplayConnectionOptions) {
    const speed = options.speed ?? 1;
    if (!(speed > 0) || !Number.isFinite(speed)) {
      throw new RangeError(`speed must be a positive number, got ${speed}`);
    }
    this.path = options.path;
    this.speed = speed;
    this.loop = options.loop ?? false;
    this.serial = options.serial ?? 'REPLAY';
    this.fallbackIntervalMs = options.fallbackIntervalMs ?? DEFAULT_FALLBACK_INTERVAL_MS;
    this.log = options.logger ?? createLogger('Replay');
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  addListener(listener: TrackingEventListener): void {
    this.listeners.push(listener);
  }

  /**
   * Load the recording and start playback. Resolves once the first frame
   * is scheduled; use whenDone() to wait for the end of playback.
   */
  async open(): Promise<void> {
    if (this.opened) return;
    this.opened = true;

    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (!this.finished) {
        this.listeners.forEach((l) => l.onError(error));
      }
      this.finish();
      throw error;
    }

    // closed while the file was loading
    if (this.finished) return;

    const { frames, errors } = parseRecording(text);
    for (const e of errors) {
      this.log.warn(`Line ${e.line} skipped: ${e.message}`);
    }
    this.frames = frames;
    this.log.info(`Loaded ${frames.length} frames from ${this.path}`);

    this.listeners.forEach((l) => l.onConnection());
    this.listeners.forEach((l) => l.onDevice({ serial: this.serial, product: 'Recorded session' }));

    if (frames.length === 0) {
      this.end('recording is empty');
      return;
    }
    this.schedule(0);
  }

  /**
   * Stop playback. Pending frames are not delivered.
   */
  close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.finish();
  }

  /** Resolves when playback ends or the connection is closed */
  whenDone(): Promise<void> {
    return this.done;
  }

  /** Frames delivered in the current pass */
  position(): number {
    return this.index;
  }

  // ===== Playback =====

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => this.tick(), delayMs / this.speed);
  }

  private tick(): void {
    this.timer = null;
    if (this.finished) return;

    const frame = this.frames[this.index];
    this.emitFrame(frame);
    this.index++;

    if (this.index < this.frames.length) {
      this.schedule(frameGapMs(frame, this.frames[this.index], this.fallbackIntervalMs));
      return;
    }

    if (this.loop) {
      this.index = 0;
      this.schedule(this.fallbackIntervalMs);
      return;
    }

    this.end('end of recording');
  }

  private emitFrame(frame: unknown): void {
    for (const listener of this.listeners) {
      try {
        listener.onTracking(frame);
      } catch (err) {
        listener.onError(err instanceof Error ? err : new Error(String(err)));
      }
    }
  }

  private end(reason: string): void {
    this.listeners.forEach((l) => l.onConnectionLost(reason));
    this.finish();
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.resolveDone();
  }
}
