/**
 * Tracking Listener
 *
 * Entry point for connection callbacks. Runs each tracking frame through
 * map → rate update → encode → send, and owns the state that outlives a
 * frame: the rate window and the outbound socket.
 *
 * States: disconnected → connected → tracking. `tracking` lasts until the
 * process stops.
 *
 * The first tracking frame has no earlier arrival, so it is mapped and
 * rate-tracked but not sent. Every later frame is sent.
 */

import { createLogger, errorMessage, type Logger } from '@core/logger';
import type { DeviceInfo, TrackingEventListener, TrackingFrame } from '@core/types';
import { RateEstimator } from '@filters';
import { FrameMappingError, mapFrame, type MappingIssue } from '@mapper';
import { EncodingError, FrameEncoder, type EncodedFrame } from '@wire';
import { PresenceMonitor } from './presence-monitor';

// ===== Type Definitions =====

export type ListenerState = 'disconnected' | 'connected' | 'tracking';

/**
 * Where encoded frames go. DatagramDispatcher in production.
 */
export interface FrameSink {
  /** @returns false when the frame was dropped */
  send(label: string, payload: Uint8Array): boolean;
  close(): Promise<void>;
}

export interface TrackingListenerOptions {
  dispatcher: FrameSink;
  encoder?: FrameEncoder;
  rateEstimator?: RateEstimator;
  presence?: PresenceMonitor;
  /** Wall clock in seconds (default: Date.now() / 1000) */
  now?: () => number;
  /** Frames between status lines; 0 disables them (default: 100) */
  statusEvery?: number;
  logger?: Logger;
}

export interface ListenerStats {
  /** Tracking callbacks received */
  frames: number;
  /** Frames handed to the dispatcher */
  sent: number;
  /** Frames dropped by mapping, encoding or transport */
  dropped: number;
  /** Sub-structures skipped or substituted while mapping */
  mappingIssues: number;
}

// ===== Listener =====

export class TrackingListener implements TrackingEventListener {
  private state: ListenerState = 'disconnected';
  private readonly dispatcher: FrameSink;
  private readonly encoder: FrameEncoder;
  private readonly rate: RateEstimator;
  private readonly presence: PresenceMonitor | null;
  private readonly now: () => number;
  private readonly statusEvery: number;
  private readonly log: Logger;
  private lastFrame: TrackingFrame | null = null;
  private counters: ListenerStats = { frames: 0, sent: 0, dropped: 0, mappingIssues: 0 };
  private shuttingDown: Promise<void> | null = null;

  constructor(options: TrackingListenerOptions) {
    this.dispatcher = options.dispatcher;
    this.encoder = options.encoder ?? new FrameEncoder();
    this.rate = options.rateEstimator ?? new RateEstimator();
    this.presence = options.presence ?? null;
    this.now = options.now ?? (() => Date.now() / 1000);
    this.statusEvery = options.statusEvery ?? 100;
    this.log = options.logger ?? createLogger('Listener');
  }

  // ===== Connection Events =====

  onConnection(): void {
    this.log.info('Connected to tracking service');
    if (this.state === 'disconnected') {
      this.state = 'connected';
    }
  }

  onDevice(info: DeviceInfo): void {
    const product = info.product ? ` (${info.product})` : '';
    this.log.info(`Found device ${info.serial}${product}`);
  }

  onConnectionLost(reason: string): void {
    this.log.warn(`Connection lost: ${reason}`);
  }

  onError(error: Error): void {
    this.log.error(`Connection error: ${error.message}`);
  }

  // ===== Tracking =====

  /**
   * @param arrivalSeconds - Arrival time; defaults to the injected clock
   */
  onTracking(event: unknown, arrivalSeconds?: number): void {
    const arrival = arrivalSeconds ?? this.now();

    if (this.state !== 'tracking') {
      if (this.state === 'disconnected') {
        this.log.warn('Tracking frame before connection event');
      }
      this.state = 'tracking';
      this.log.info('Tracking started');
    }
    this.counters.frames++;

    const frame = this.map(event);
    const hadPrevious = this.rate.hasPrevious();
    this.rate.update(arrival);

    if (!frame) {
      this.counters.dropped++;
      return;
    }
    this.lastFrame = frame;
    this.presence?.observe(frame, arrival);

    if (hadPrevious) {
      this.forward(frame);
    }

    if (this.statusEvery > 0 && this.counters.frames % this.statusEvery === 0) {
      const fps = this.rate.mean();
      const fpsText = fps === null ? 'n/a' : fps.toFixed(1);
      this.log.info(`Frame ${frame.frameId}: ${frame.hands.length} hand(s), ${fpsText} fps, ${this.counters.sent} sent, ${this.counters.dropped} dropped`);
    }
  }

  private map(event: unknown): TrackingFrame | null {
    try {
      return mapFrame(event, {
        onIssue: (issue: MappingIssue) => {
          this.counters.mappingIssues++;
          this.log.warn(`Skipped ${issue.kind} at ${issue.path}: ${issue.reason}`);
        },
      }).frame;
    } catch (err) {
      if (err instanceof FrameMappingError) {
        this.log.warn(`${err.message}; frame dropped`);
      } else {
        this.log.error(`Mapping failed, frame dropped: ${errorMessage(err)}`);
      }
      return null;
    }
  }

  private forward(frame: TrackingFrame): void {
    let encoded: EncodedFrame;
    try {
      encoded = this.encoder.encode(frame);
    } catch (err) {
      this.counters.dropped++;
      if (err instanceof EncodingError) {
        this.log.warn(`Frame ${frame.frameId} not encoded: ${err.message}`);
      } else {
        this.log.error(`Frame ${frame.frameId} not encoded: ${errorMessage(err)}`);
      }
      return;
    }

    if (this.dispatcher.send(encoded.label, encoded.payload)) {
      this.counters.sent++;
    } else {
      this.counters.dropped++;
    }
  }

  // ===== Lifecycle =====

  /**
   * Release the outbound socket. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.log.info('Shutting down');
      this.shuttingDown = this.dispatcher.close();
    }
    return this.shuttingDown;
  }

  // ===== Accessors =====

  getState(): ListenerState {
    return this.state;
  }

  /** Mean frame rate over the window, null before the second frame */
  getFps(): number | null {
    return this.rate.mean();
  }

  getLastFrame(): TrackingFrame | null {
    return this.lastFrame;
  }

  stats(): ListenerStats {
    return { ...this.counters };
  }
}
