import { describe, it, expect } from 'vitest';
import { MIN_RATE_WINDOW_MS, MetricsTracker, computeRate } from './metrics.js';

describe('computeRate', () => {
  it('is undefined below the minimum window', () => {
    expect(computeRate(50, 0)).toBeUndefined();
    expect(computeRate(50, MIN_RATE_WINDOW_MS - 1)).toBeUndefined();
  });

  it('divides attempts by elapsed seconds', () => {
    expect(computeRate(50, 1000)).toBe(50);
    expect(computeRate(30, 2000)).toBe(15);
  });
});

describe('MetricsTracker', () => {
  it('derives attempted from the outcome counters', () => {
    const tracker = new MetricsTracker(() => 0);
    tracker.rejected = 4;
    tracker.anomalies = 2;
    tracker.succeeded = 1;
    tracker.skipped = 9;

    expect(tracker.snapshot()).toEqual({
      attempted: 7,
      rejected: 4,
      anomalies: 2,
      skipped: 9,
      elapsedMs: 0,
      ratePerSecond: undefined,
    });
  });

  it('measures elapsed time from construction', () => {
    let clock = 5000;
    const tracker = new MetricsTracker(() => clock);
    tracker.rejected = 10;
    clock = 7000;

    const snapshot = tracker.snapshot();

    expect(snapshot.elapsedMs).toBe(2000);
    expect(snapshot.ratePerSecond).toBe(5);
  });
});
