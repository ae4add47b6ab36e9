import type { Logger } from '../types/Logger';
import { toError } from '../types/Errors';

/**
 * Runs async tasks strictly one after another, in push order.
 *
 * Endpoints keep one queue for inbound deliveries and one for sends, so a
 * connection sees a single reader and a single writer. A failing task is
 * reported to `onError` (or logged when none is given) and does not stop the
 * tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  constructor(
    private readonly name: string,
    private readonly logger: Logger,
    private readonly onError?: (error: Error) => void
  ) {}

  get size(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append a task. Returns false when the queue no longer takes work.
   */
  push(task: () => Promise<void> | void): boolean {
    if (this.closed) {
      this.logger.debug(`${this.name} queue closed, task dropped`);
      return false;
    }

    this.pending++;
    this.tail = this.tail
      .then(() => task())
      .catch((error: unknown) => {
        const err = toError(error);
        if (this.onError) {
          this.onError(err);
        } else {
          this.logger.error(`${this.name} task failed`, err);
        }
      })
      .finally(() => {
        this.pending--;
      });

    return true;
  }

  /**
   * Resolve once every task pushed so far has finished
   */
  drain(): Promise<void> {
    return this.tail;
  }

  /**
   * Refuse new tasks, then drain what is queued
   */
  close(): Promise<void> {
    this.closed = true;
    return this.drain();
  }
}
