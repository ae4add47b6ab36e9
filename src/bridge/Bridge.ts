import {
  BridgeError,
  METRIC,
  MetricsCollector,
  SilentLogger,
  StateError,
  scopedLogger,
  toError,
  type Endpoint,
  type Logger,
  type SerializerRegistry,
  type Stoppable,
  type TransportDriver,
} from '../core';
import { type BackendDescriptor, createTransport } from '../transports';

/**
 * Bridge lifecycle. `closed` is final.
 */
export type BridgeState =
  | 'created'
  | 'connecting-source'
  | 'connecting-destination'
  | 'relaying'
  | 'closed';

/**
 * Settings shared by both bridge kinds
 */
export interface BridgeConfig {
  source: BackendDescriptor | TransportDriver;
  destination: BackendDescriptor | TransportDriver;
  logger?: Logger;
  metrics?: MetricsCollector;
  serializers?: SerializerRegistry;
  /** Errors reported by either side after startup */
  onError?: (error: Error) => void;
}

export const toDriver = (backend: BackendDescriptor | TransportDriver): TransportDriver =>
  'connect' in backend ? backend : createTransport(backend);

/**
 * Relays traffic from a source endpoint to a destination endpoint
 *
 * Startup connects the source, then the destination, and only then begins
 * consuming (destination first). When any step fails, whatever was opened is
 * stopped again and a {@link BridgeError} is thrown, so a bridge never relays
 * with one side missing. `stop()` tears down the destination, then the
 * source.
 */
export abstract class Bridge<S extends Endpoint, D extends Endpoint> implements Stoppable {
  protected readonly logger: Logger;
  protected readonly metrics: MetricsCollector;
  private currentState: BridgeState = 'created';
  private starting?: Promise<void>;
  private stopping?: Promise<void>;
  private relayedCount = 0;
  private failedCount = 0;
  private resolveClosed: () => void = () => undefined;
  private readonly closed: Promise<void>;

  protected constructor(
    protected readonly source: S,
    protected readonly destination: D,
    config: Pick<BridgeConfig, 'logger' | 'metrics'>
  ) {
    this.logger = scopedLogger(config.logger ?? new SilentLogger(), this.constructor.name);
    this.metrics = config.metrics ?? MetricsCollector.global();
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): BridgeState {
    return this.currentState;
  }

  /**
   * Messages relayed successfully
   */
  get relayed(): number {
    return this.relayedCount;
  }

  /**
   * Messages whose relay failed or timed out
   */
  get failed(): number {
    return this.failedCount;
  }

  /**
   * Connect both sides and begin relaying. Idempotent.
   *
   * @throws {BridgeError} When either side fails to come up
   * @throws {StateError} When the bridge was already stopped
   */
  start(): Promise<void> {
    if (this.stopping) {
      return Promise.reject(new StateError(`${this.constructor.name} is closed`));
    }
    if (!this.starting) {
      this.starting = this.bringUp();
    }
    return this.starting;
  }

  /**
   * Start and resolve once the bridge is closed
   */
  async run(): Promise<void> {
    await this.start();
    return this.closed;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.tearDown();
    }
    return this.stopping;
  }

  protected recordRelayed(): void {
    this.relayedCount++;
    this.metrics.incrementCounter(METRIC.BRIDGE_RELAYED, { bridge: this.constructor.name, status: 'ok' });
  }

  protected recordFailed(): void {
    this.failedCount++;
    this.metrics.incrementCounter(METRIC.BRIDGE_RELAYED, { bridge: this.constructor.name, status: 'failed' });
  }

  private async bringUp(): Promise<void> {
    await this.step('connecting-source', 'Could not connect the source', () => this.source.connect());
    await this.step('connecting-destination', 'Could not connect the destination', () =>
      this.destination.connect()
    );
    await this.step('connecting-destination', 'Could not start relaying', async () => {
      await this.destination.start();
      await this.source.start();
    });

    this.currentState = 'relaying';
    this.logger.info('Relaying');
  }

  private async step(state: BridgeState, failure: string, fn: () => Promise<void>): Promise<void> {
    if (this.stopping) {
      throw new StateError(`${this.constructor.name} stopped while starting`);
    }
    this.currentState = state;
    try {
      await fn();
    } catch (error) {
      const cause = toError(error);
      this.logger.error(failure, cause, { state });
      await this.stop();
      throw new BridgeError(`${failure}: ${cause.message}`, { state, cause: cause.name });
    }
  }

  private async tearDown(): Promise<void> {
    await this.destination.stop();
    await this.source.stop();
    this.currentState = 'closed';
    this.logger.info('Closed', { relayed: this.relayedCount, failed: this.failedCount });
    this.resolveClosed();
  }
}
