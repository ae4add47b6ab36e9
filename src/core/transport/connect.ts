import { RetryPolicy, type Attempt } from '../retry/RetryPolicy';
import { ConnectionError, RetryExhaustedError } from '../types/Errors';
import type { Logger } from '../types/Logger';
import type { ConnectOutcome, TransportConnection, TransportDriver } from './Transport';

const toAttempt = (outcome: ConnectOutcome): Attempt<TransportConnection> => {
  switch (outcome.status) {
    case 'connected':
      return { ok: true, value: outcome.connection };
    case 'transient':
      return { ok: false, transient: true, error: outcome.error };
    case 'fatal':
      return { ok: false, transient: false, error: outcome.error };
  }
};

/**
 * Open a connection through the driver's bounded reconnect loop.
 *
 * Transient outcomes are retried with exponential backoff starting at the
 * driver's retry delay; fatal outcomes surface immediately. When
 * `isCancelled` returns true before an attempt, the loop ends with a
 * `closed` error.
 *
 * @throws {ConnectionError} Fatal outcome, cancellation, or `retriesExhausted` when every attempt failed
 */
export async function connectWithRetry(
  driver: TransportDriver,
  logger: Logger,
  isCancelled: () => boolean = () => false
): Promise<TransportConnection> {
  const target = driver.describe();
  const policy = new RetryPolicy(
    {
      maxAttempts: driver.reconnect.attempts,
      initialDelay: driver.reconnect.delayMs,
      maxDelay: driver.reconnect.maxDelayMs,
    },
    logger
  );

  try {
    const connection = await policy.execute(async (attempt): Promise<Attempt<TransportConnection>> => {
      if (isCancelled()) {
        return { ok: false, transient: false, error: ConnectionError.closed(`Connect to ${target} cancelled`) };
      }
      logger.debug('Connecting', { target, attempt, maxAttempts: policy.maxAttempts });
      return toAttempt(await driver.connect());
    }, target);

    logger.info('Connected', { backend: driver.backend, target });
    return connection;
  } catch (error) {
    if (error instanceof RetryExhaustedError) {
      throw ConnectionError.retriesExhausted(`Could not connect to ${target}`, error.details);
    }
    throw error;
  }
}
