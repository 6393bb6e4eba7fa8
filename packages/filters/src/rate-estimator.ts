/**
 * Frame Rate Estimator
 *
 * Sliding window of instantaneous rates (1 / interval) computed from
 * wall-clock arrival times. Arrival time is used rather than the sensor's
 * own timestamp: the two clocks are different domains, and the rate of
 * interest is the one this process actually sees.
 */

export interface RateEstimatorOptions {
  /** Number of rate samples kept (default: 30) */
  windowSize?: number;
}

export class RateEstimator {
  private windowSize: number;
  private samples: number[];
  private lastTime: number | null;

  constructor(options: RateEstimatorOptions = {}) {
    const windowSize = options.windowSize ?? 30;
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
    }
    this.windowSize = windowSize;
    this.samples = [];
    this.lastTime = null;
  }

  /**
   * Record an arrival.
   * @param now - Arrival time in seconds
   * @returns The rate sample pushed (Hz), or null when there was no usable interval
   */
  update(now: number): number | null {
    const previous = this.lastTime;
    this.lastTime = now;

    if (previous === null) {
      return null;
    }

    const interval = now - previous;
    // Same-tick or out-of-order arrivals have no finite rate
    if (!(interval > 0)) {
      return null;
    }

    const rate = 1 / interval;
    this.samples.push(rate);
    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
    return rate;
  }

  /** Whether an earlier arrival has been recorded */
  hasPrevious(): boolean {
    return this.lastTime !== null;
  }

  /** Mean rate over the window (Hz), or null before the first interval */
  mean(): number | null {
    if (this.samples.length === 0) return null;
    return this.samples.reduce((a, b) => a + b, 0) / this.samples.length;
  }

  sampleCount(): number {
    return this.samples.length;
  }

  getWindowSize(): number {
    return this.windowSize;
  }

  reset(): void {
    this.samples = [];
    this.lastTime = null;
  }
}
