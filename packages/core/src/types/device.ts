/**
 * Device and Connection Types
 *
 * Boundary between the bridge and whatever delivers tracking events
 * (the tracking service, a recorded session, a test double).
 *
 * @module core/types/device
 */

// ===== Device Identification =====

/**
 * Tracking device identification, as reported on attach.
 */
export interface DeviceInfo {
  /** Device serial number */
  serial: string;
  /** Product name (optional) */
  product?: string;
}

// ===== Listener =====

/**
 * Callbacks a connection invokes. The connection serializes its calls:
 * no two callbacks of one listener overlap.
 */
export interface TrackingEventListener {
  /** Connection to the tracking source established */
  onConnection(): void;
  /** A tracking device was found (informational) */
  onDevice(info: DeviceInfo): void;
  /**
   * One tracking frame. Typed as unknown: the payload comes from outside
   * the process and is validated by the receiver.
   */
  onTracking(frame: unknown): void;
  /** Connection to the tracking source lost */
  onConnectionLost(reason: string): void;
  /** Connection-level failure (device cannot be opened, read error) */
  onError(error: Error): void;
}

// ===== Connection =====

/**
 * A source of tracking events. Its lifecycle (discovery, open, close)
 * is owned by the implementation.
 */
export interface TrackingConnection {
  addListener(listener: TrackingEventListener): void;
  open(): Promise<void>;
  close(): void;
}
