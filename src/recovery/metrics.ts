/**
 * Run counters and throughput.
 *
 * @packageDocumentation
 */

import type { RunMetrics } from './types.js';

/** Shortest run for which a rate is reported. */
export const MIN_RATE_WINDOW_MS = 1000;

/**
 * Attempts per second, or undefined for runs shorter than
 * {@link MIN_RATE_WINDOW_MS}.
 */
export function computeRate(attempted: number, elapsedMs: number): number | undefined {
  if (elapsedMs < MIN_RATE_WINDOW_MS) {
    return undefined;
  }
  return attempted / (elapsedMs / 1000);
}

/**
 * Mutable counters for one run.
 */
export class MetricsTracker {
  rejected = 0;
  anomalies = 0;
  skipped = 0;
  succeeded = 0;

  private readonly startedAt: number;

  constructor(private readonly now: () => number) {
    this.startedAt = now();
  }

  get attempted(): number {
    return this.rejected + this.anomalies + this.succeeded;
  }

  /**
   * Immutable view of the counters at this moment.
   */
  snapshot(): RunMetrics {
    const elapsedMs = Math.max(0, this.now() - this.startedAt);
    return {
      attempted: this.attempted,
      rejected: this.rejected,
      anomalies: this.anomalies,
      skipped: this.skipped,
      elapsedMs,
      ratePerSecond: computeRate(this.attempted, elapsedMs),
    };
  }
}
