/**
 * Datagram Dispatcher
 *
 * Owns the outbound UDP socket. One send attempt per frame: a failed
 * send is logged and the frame is dropped. Nothing is retried or queued;
 * a late hand position is worth less than none.
 *
 * @module transport/dispatcher
 */

import { createSocket } from 'dgram';
import { createLogger, errorMessage, type Logger } from '@core/logger';
import { encodeOscMessage } from '@wire';

// ===== Type Definitions =====

/**
 * The part of a dgram socket the dispatcher uses.
 */
export interface DatagramSocket {
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback: (error: Error | null, bytes: number) => void
  ): void;
  close(callback?: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface DatagramDispatcherOptions {
  host: string;
  port: number;
  /** Creates the socket (default: udp4 dgram socket) */
  socketFactory?: () => DatagramSocket;
  logger?: Logger;
}

export interface DispatcherStats {
  /** Datagrams handed to the socket */
  dispatched: number;
  /** Datagrams the socket reported as written */
  sent: number;
  /** Datagrams dropped, before or after reaching the socket */
  failed: number;
  /** Bytes reported as written */
  bytes: number;
}

function defaultSocketFactory(): DatagramSocket {
  return createSocket('udp4');
}

// ===== Dispatcher =====

export class DatagramDispatcher {
  private readonly host: string;
  private readonly port: number;
  private readonly log: Logger;
  private socket: DatagramSocket | null;
  private closing: Promise<void> | null = null;
  private counters: DispatcherStats = { dispatched: 0, sent: 0, failed: 0, bytes: 0 };

  constructor(options: DatagramDispatcherOptions) {
    this.host = options.host;
    this.port = options.port;
    this.log = options.logger ?? createLogger('Transport');

    this.socket = (options.socketFactory ?? defaultSocketFactory)();
    this.socket.on('error', (err) => {
      this.log.warn(`Socket error: ${err.message}`);
    });

    this.log.info(`Sending to udp://${this.host}:${this.port}`);
  }

  /**
   * Send one labelled payload. Returns once the datagram is handed to the
   * socket; delivery is never awaited.
   * @returns false when the frame was dropped before reaching the socket
   */
  send(label: string, payload: Uint8Array): boolean {
    if (!this.socket) {
      this.drop('socket closed');
      return false;
    }

    let datagram: Uint8Array;
    try {
      datagram = encodeOscMessage(label, payload);
    } catch (err) {
      this.drop(errorMessage(err));
      return false;
    }

    try {
      this.socket.send(datagram, this.port, this.host, (error, bytes) => {
        if (error) {
          this.drop(error.message);
          return;
        }
        this.counters.sent++;
        this.counters.bytes += bytes;
      });
    } catch (err) {
      this.drop(errorMessage(err));
      return false;
    }

    this.counters.dispatched++;
    return true;
  }

  stats(): DispatcherStats {
    return { ...this.counters };
  }

  destination(): string {
    return `${this.host}:${this.port}`;
  }

  isOpen(): boolean {
    return this.socket !== null;
  }

  /**
   * Release the socket. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;

    const socket = this.socket;
    this.socket = null;
    this.closing = new Promise<void>((resolve) => {
      if (!socket) {
        resolve();
        return;
      }
      socket.close(() => {
        this.log.info('Socket closed');
        resolve();
      });
    });
    return this.closing;
  }

  private drop(reason: string): void {
    this.counters.failed++;
    this.log.warn(`Send failed, frame dropped: ${reason}`);
  }
}
