import { describe, it, expect, vi, afterEach } from 'vitest';
import { stopAll, stopOnSignals, withEndpoints, type Startable } from '../../src/core/lifecycle/scope';
import type { Logger } from '../../src/core/types/Logger';

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const tracked = (name: string, events: string[], failStart = false): Startable => ({
  start: vi.fn(async () => {
    events.push(`start:${name}`);
    if (failStart) throw new Error(`${name} refused`);
  }),
  stop: vi.fn(async () => {
    events.push(`stop:${name}`);
  }),
});

describe('scope', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('withEndpoints()', () => {
    it('should start in order and stop in reverse order', async () => {
      const events: string[] = [];

      const result = await withEndpoints([tracked('a', events), tracked('b', events)], async () => {
        events.push('body');
        return 42;
      });

      expect(result).toBe(42);
      expect(events).toEqual(['start:a', 'start:b', 'body', 'stop:b', 'stop:a']);
    });

    it('should stop everything when the body throws', async () => {
      const events: string[] = [];

      await expect(
        withEndpoints([tracked('a', events)], async () => {
          throw new Error('body failed');
        })
      ).rejects.toThrow('body failed');

      expect(events).toEqual(['start:a', 'stop:a']);
    });

    it('should stop what was started when a start fails', async () => {
      const events: string[] = [];
      const body = vi.fn(async () => undefined);

      await expect(
        withEndpoints([tracked('a', events), tracked('b', events, true), tracked('c', events)], body)
      ).rejects.toThrow('b refused');

      expect(body).not.toHaveBeenCalled();
      expect(events).toEqual(['start:a', 'start:b', 'stop:b', 'stop:a']);
    });
  });

  describe('stopAll()', () => {
    it('should log a failing stop and continue', async () => {
      const logger = createMockLogger();
      const second = { stop: vi.fn(async () => undefined) };

      await stopAll([{ stop: vi.fn(async () => Promise.reject(new Error('stuck'))) }, second], logger);

      expect(logger.error).toHaveBeenCalledWith('Stop failed', new Error('stuck'));
      expect(second.stop).toHaveBeenCalledTimes(1);
    });
  });

  describe('stopOnSignals()', () => {
    it('should stop once per signal burst and detach on dispose', async () => {
      const stoppable = { stop: vi.fn(async () => undefined) };
      const before = process.listenerCount('SIGUSR2');

      const dispose = stopOnSignals([stoppable], ['SIGUSR2']);
      expect(process.listenerCount('SIGUSR2')).toBe(before + 1);

      process.emit('SIGUSR2', 'SIGUSR2');
      process.emit('SIGUSR2', 'SIGUSR2');
      await new Promise((resolve) => setImmediate(resolve));

      expect(stoppable.stop).toHaveBeenCalledTimes(1);

      dispose();
      expect(process.listenerCount('SIGUSR2')).toBe(before);
    });
  });
});
