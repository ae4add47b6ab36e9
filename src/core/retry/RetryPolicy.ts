import { type Logger, SilentLogger } from '../types/Logger';
import { RetryExhaustedError } from '../types/Errors';
import { LIMITS, TIME } from '../constants';

/**
 * Retry configuration options
 */
export interface RetryConfig {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
}

/**
 * Outcome of one attempt. `transient: false` stops the loop at once.
 */
export type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; transient: boolean; error: Error };

/**
 * Default retry configuration
 */
const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxAttempts: LIMITS.MAX_CONNECTION_ATTEMPTS,
  initialDelay: TIME.CONNECTION_RETRY_DELAY_MS,
  maxDelay: TIME.CONNECTION_RETRY_MAX_DELAY_MS,
  backoffMultiplier: 2,
};

/**
 * RetryPolicy implements a bounded retry loop with exponential backoff.
 *
 * Attempts report a typed outcome instead of throwing, so the caller decides
 * what is worth retrying.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 5, initialDelay: 2000 });
 * const connection = await policy.execute(async () => {
 *   const outcome = await driver.connect();
 *   return outcome.status === 'connected'
 *     ? { ok: true, value: outcome.connection }
 *     : { ok: false, transient: outcome.status === 'transient', error: outcome.error };
 * }, 'amqp://localhost');
 * ```
 */
export class RetryPolicy {
  private config: Required<RetryConfig>;
  private logger: Logger;

  constructor(config?: RetryConfig, logger?: Logger) {
    this.config = {
      maxAttempts: Math.max(1, config?.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts),
      initialDelay: config?.initialDelay ?? DEFAULT_RETRY_CONFIG.initialDelay,
      maxDelay: config?.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
      backoffMultiplier: config?.backoffMultiplier ?? DEFAULT_RETRY_CONFIG.backoffMultiplier,
    };
    this.logger = logger || new SilentLogger();
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Delay before the retry that follows `attempt` (0-based)
   */
  getDelay(attempt: number): number {
    const delay = this.config.initialDelay * Math.pow(this.config.backoffMultiplier, attempt);
    return Math.min(delay, this.config.maxDelay);
  }

  /**
   * Run `fn` until it succeeds, fails permanently, or attempts run out
   *
   * @throws The attempt's error when it is not transient
   * @throws {RetryExhaustedError} When every attempt failed transiently
   */
  async execute<T>(fn: (attempt: number) => Promise<Attempt<T>>, context?: string): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const outcome = await fn(attempt);

      if (outcome.ok) {
        if (attempt > 1) {
          this.logger.info(`Operation succeeded after ${attempt - 1} retries`, { context });
        }
        return outcome.value;
      }

      lastError = outcome.error;

      if (!outcome.transient) {
        this.logger.error('Operation failed permanently, not retrying', outcome.error, {
          context,
          attempt,
        });
        throw outcome.error;
      }

      if (attempt < this.config.maxAttempts) {
        const delay = this.getDelay(attempt - 1);
        this.logger.warn(`Operation failed, retrying in ${delay}ms`, {
          context,
          attempt,
          maxAttempts: this.config.maxAttempts,
          error: outcome.error.message,
        });
        await this.sleep(delay);
      }
    }

    throw new RetryExhaustedError(`Gave up after ${this.config.maxAttempts} attempts`, {
      context,
      attempts: this.config.maxAttempts,
      lastError: lastError?.message,
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
