import { LIMITS, TIME } from '../constants';

export interface RateEstimatorOptions {
  /** Samples kept in the moving window */
  windowSize?: number;
  /** Gaps shorter than this only refresh the last-seen time */
  burstThresholdMs?: number;
  /** Clock in ms, overridable for tests */
  now?: () => number;
}

/**
 * Moving-window estimate of a message arrival rate, in Hz.
 *
 * Each arrival pushes `1 / dt` (seconds) into a FIFO of `windowSize` samples;
 * the estimate is the mean of the non-zero samples. Arrivals closer than
 * `burstThresholdMs` to the previous one are treated as a burst and only move
 * the last-seen time.
 *
 * @example
 * ```typescript
 * const rate = new RateEstimator();
 * subscriber.bind('sensors.#', () => rate.record());
 * setInterval(() => console.log(`${rate.hz.toFixed(1)} Hz`), 1000);
 * ```
 */
export class RateEstimator {
  private readonly windowSize: number;
  private readonly burstThresholdMs: number;
  private readonly now: () => number;
  private samples: number[] = [];
  private lastSeen?: number;
  private current = 0;

  constructor(options: RateEstimatorOptions = {}) {
    this.windowSize = Math.max(1, options.windowSize ?? LIMITS.RATE_WINDOW_SAMPLES);
    this.burstThresholdMs = options.burstThresholdMs ?? TIME.RATE_BURST_THRESHOLD_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record one arrival at `at` (defaults to the clock)
   */
  record(at: number = this.now()): void {
    if (this.lastSeen === undefined) {
      this.lastSeen = at;
      return;
    }

    const dtMs = at - this.lastSeen;
    this.lastSeen = at;

    if (dtMs < this.burstThresholdMs) return;

    this.samples.push(1000 / dtMs);
    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }

    const nonZero = this.samples.filter((sample) => sample > 0);
    this.current =
      nonZero.length === 0 ? 0 : nonZero.reduce((sum, sample) => sum + sample, 0) / nonZero.length;
  }

  get hz(): number {
    return this.current;
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  reset(): void {
    this.samples = [];
    this.lastSeen = undefined;
    this.current = 0;
  }
}
