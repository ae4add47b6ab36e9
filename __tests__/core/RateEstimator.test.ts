import { describe, it, expect } from 'vitest';
import { RateEstimator } from '../../src/core/metrics/RateEstimator';

describe('RateEstimator', () => {
  it('should report 0 Hz before two arrivals', () => {
    const rate = new RateEstimator();
    expect(rate.hz).toBe(0);

    rate.record(1_000);
    expect(rate.hz).toBe(0);
    expect(rate.sampleCount).toBe(0);
  });

  it('should converge on a steady arrival rate', () => {
    const rate = new RateEstimator();

    rate.record(0);
    for (let i = 1; i <= 150; i++) {
      rate.record(i * 50);
    }

    expect(rate.hz).toBe(20);
    expect(rate.sampleCount).toBe(100);
  });

  it('should average the samples in the window', () => {
    const rate = new RateEstimator({ windowSize: 2 });

    rate.record(0);
    rate.record(100); // 10 Hz
    rate.record(600); // 2 Hz
    expect(rate.hz).toBe(6);

    rate.record(700); // 10 Hz, pushes out the first sample
    expect(rate.hz).toBe(6);
    expect(rate.sampleCount).toBe(2);
  });

  it('should treat arrivals inside the burst threshold as one', () => {
    const rate = new RateEstimator();

    rate.record(0);
    rate.record(5);
    expect(rate.sampleCount).toBe(0);

    rate.record(105);
    expect(rate.hz).toBe(10);
  });

  it('should use the injected clock', () => {
    let clock = 0;
    const rate = new RateEstimator({ now: () => clock });

    rate.record();
    clock = 250;
    rate.record();

    expect(rate.hz).toBe(4);
  });

  it('should start over after reset()', () => {
    const rate = new RateEstimator();
    rate.record(0);
    rate.record(100);

    rate.reset();

    expect(rate.hz).toBe(0);
    expect(rate.sampleCount).toBe(0);
    rate.record(5_000);
    expect(rate.sampleCount).toBe(0);
  });
});
