/**
 * Bridge
 *
 * Wires a replay connection to the tracking listener and its UDP
 * dispatcher. `run()` resolves when playback ends; `stop()` releases the
 * socket and logs the session summary, once, on every exit path.
 */

import { createLogger, type Logger } from '@core/logger';
import { RateEstimator } from '@filters';
import { DatagramDispatcher, type DatagramSocket } from '@transport';
import { FrameEncoder } from '@wire';
import type { BridgeConfig } from './config';
import { PresenceMonitor } from './presence-monitor';
import { ReplayConnection } from './replay-connection';
import { TrackingListener } from './tracking-listener';

export interface BridgeOptions {
  settings: BridgeConfig;
  recording: string;
  speed?: number;
  loop?: boolean;
  /** Creates the outbound socket (default: udp4 dgram socket) */
  socketFactory?: () => DatagramSocket;
  logger?: Logger;
}

export class Bridge {
  private readonly connection: ReplayConnection;
  private readonly listener: TrackingListener;
  private readonly presence = new PresenceMonitor();
  private readonly log: Logger;
  private stopping: Promise<void> | null = null;

  constructor(options: BridgeOptions) {
    const { settings } = options;
    this.log = options.logger ?? createLogger('Bridge');

    const dispatcher = new DatagramDispatcher({
      host: settings.host,
      port: settings.port,
      socketFactory: options.socketFactory,
    });
    const encoder = new FrameEncoder({ label: settings.label, maxDatagramBytes: settings.maxDatagramBytes });
    this.listener = new TrackingListener({
      dispatcher,
      encoder,
      rateEstimator: new RateEstimator({ windowSize: settings.fpsWindow }),
      presence: this.presence,
      statusEvery: settings.statusEvery,
    });

    const speed = options.speed ?? 1;
    const loop = options.loop ?? false;
    this.connection = new ReplayConnection({ path: options.recording, speed, loop });
    this.connection.addListener(this.listener);

    this.log.info(`Replaying ${options.recording} at ${speed}x as ${encoder.getLabel()} to ${dispatcher.destination()}${loop ? ', looping' : ''}`);
  }

  /**
   * Play the recording to the end. The socket is released whether
   * playback finishes or fails.
   */
  async run(): Promise<void> {
    try {
      await this.connection.open();
      await this.connection.whenDone();
    } finally {
      await this.stop();
    }
  }

  /**
   * Stop playback, release the socket and log the summary. Safe to call
   * more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  getListener(): TrackingListener {
    return this.listener;
  }

  private async shutdown(): Promise<void> {
    this.connection.close();
    await this.listener.shutdown();

    const seen = this.presence.summary();
    const stats = this.listener.stats();
    const fps = this.listener.getFps();
    this.log.info(`Total frames: ${seen.frames}`);
    this.log.info(`Hands detected in ${seen.framesWithHands} frames (${seen.detectionRate.toFixed(1)}%)`);
    this.log.info(`Sent ${stats.sent}, dropped ${stats.dropped}, mapping issues ${stats.mappingIssues}`);
    this.log.info(`Mean rate: ${fps === null ? 'n/a' : `${fps.toFixed(1)} fps`}`);
  }
}
