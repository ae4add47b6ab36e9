import type { Stoppable } from '../endpoint/Endpoint';
import { toError } from '../types/Errors';
import { type Logger, SilentLogger } from '../types/Logger';

/**
 * Something that can be started and stopped as a unit
 */
export interface Startable extends Stoppable {
  start(): Promise<void>;
}

/**
 * Start `endpoints` in order, run `fn`, then stop them in reverse order.
 *
 * Endpoints are stopped on every exit path: when `fn` resolves, when it
 * throws, and when one of the starts fails part-way.
 *
 * @example
 * ```typescript
 * await withEndpoints([server, client], async () => {
 *   const result = await client.call(jsonPayload({ a: 1, b: 2 }));
 * });
 * ```
 */
export async function withEndpoints<T>(
  endpoints: readonly Startable[],
  fn: () => Promise<T>,
  logger: Logger = new SilentLogger()
): Promise<T> {
  const started: Startable[] = [];

  try {
    for (const endpoint of endpoints) {
      started.push(endpoint);
      await endpoint.start();
    }
    return await fn();
  } finally {
    await stopAll(started.reverse(), logger);
  }
}

/**
 * Stop every item in order. A failing stop is logged and the rest still run.
 */
export async function stopAll(stoppables: readonly Stoppable[], logger: Logger): Promise<void> {
  for (const stoppable of stoppables) {
    try {
      await stoppable.stop();
    } catch (error) {
      logger.error('Stop failed', toError(error));
    }
  }
}

/**
 * Stop `stoppables` (in order) when one of `signals` arrives.
 *
 * Returns a disposer that removes the listeners again. No exit hook is
 * installed: once teardown has finished, the process ends on its own when
 * nothing else keeps the event loop busy.
 */
export function stopOnSignals(
  stoppables: readonly Stoppable[],
  signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
  logger: Logger = new SilentLogger()
): () => void {
  let handled = false;

  const listener = (signal: NodeJS.Signals) => {
    if (handled) return;
    handled = true;
    logger.info('Signal received, stopping', { signal });
    void stopAll(stoppables, logger);
  };

  for (const signal of signals) {
    process.on(signal, listener);
  }

  return () => {
    for (const signal of signals) {
      process.off(signal, listener);
    }
  };
}
