import { connectWithRetry } from '../transport/connect';
import { LIMITS, OVERFLOW, TIME } from '../constants';
import type {
  ConsumeOptions,
  QueueOptions,
  QueueSpec,
  TransportConnection,
  TransportDriver,
} from '../transport/Transport';
import type { Address, Delivery, MessageEnvelope } from '../message/Envelope';
import { SerializerRegistry } from '../message/SerializerRegistry';
import { MetricsCollector } from '../metrics/MetricsCollector';
import { ConnectionError, StateError, ValidationError, toError } from '../types/Errors';
import { type Logger, SilentLogger, scopedLogger } from '../types/Logger';
import { SerialQueue } from '../utils/SerialQueue';

/**
 * Lifecycle of an endpoint. `connect()` reaches `connected`, `start()`
 * reaches `running`, and `stop()` always ends in `stopped`.
 */
export type EndpointState = 'idle' | 'connecting' | 'connected' | 'running' | 'stopping' | 'stopped';

/**
 * Settings shared by every endpoint
 */
export interface EndpointConfig {
  /** Backend the endpoint opens its own connection through */
  transport: TransportDriver;
  logger?: Logger;
  serializers?: SerializerRegistry;
  /** Defaults to the process-wide collector */
  metrics?: MetricsCollector;
  /** Called for connection and send errors raised after connect */
  onError?: (error: Error) => void;
}

/**
 * Fill in queue limits and check them
 *
 * @throws {ValidationError} When a limit is not a positive integer
 */
export function resolveQueueOptions(options: QueueOptions, defaultExpires: number): Required<QueueOptions> {
  const resolved: Required<QueueOptions> = {
    queueSize: options.queueSize ?? LIMITS.QUEUE_MAX_LENGTH,
    messageTtl: options.messageTtl ?? TIME.MESSAGE_TTL_MS,
    overflow: options.overflow ?? OVERFLOW.DROP_HEAD,
    expires: options.expires ?? defaultExpires,
  };

  for (const key of ['queueSize', 'messageTtl', 'expires'] as const) {
    const value = resolved[key];
    if (!Number.isInteger(value) || value < 1) {
      throw ValidationError.invalidConfig(`${key} must be a positive integer`, { [key]: value });
    }
  }
  return resolved;
}

/**
 * Anything with an idempotent asynchronous stop
 */
export interface Stoppable {
  stop(): Promise<void>;
}

/**
 * Base class of RPC servers and clients, publishers and subscribers.
 *
 * An endpoint owns exactly one transport connection. Deliveries are handled
 * one at a time on the inbound queue and sends go out in order on the
 * outbound queue, so the connection has a single reader and a single writer.
 *
 * A connection lost after connect is replaced through the driver's bounded
 * reconnect loop: resources are declared again and consumption resumes. When
 * the loop gives up, the error reaches `onError` and the endpoint stops.
 *
 * Teardown runs in a fixed order: cancel consumers, drain both queues,
 * delete the transient queues this endpoint declared, close the connection.
 * A shared queue that still has consumers is left to them.
 */
export abstract class Endpoint implements Stoppable {
  protected readonly driver: TransportDriver;
  protected readonly logger: Logger;
  protected readonly serializers: SerializerRegistry;
  protected readonly metrics: MetricsCollector;
  protected readonly inbound: SerialQueue;
  protected readonly outbound: SerialQueue;

  private readonly errorCallback?: (error: Error) => void;
  private currentState: EndpointState = 'idle';
  private connection?: TransportConnection;
  private connecting?: Promise<void>;
  private starting?: Promise<void>;
  private stopping?: Promise<void>;
  private consumerTags: string[] = [];
  private transientQueues: Array<{ name: string; exclusive: boolean }> = [];
  private recovering?: Promise<boolean>;
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => undefined;

  constructor(config: EndpointConfig) {
    this.driver = config.transport;
    this.logger = scopedLogger(config.logger ?? new SilentLogger(), this.constructor.name);
    this.serializers = config.serializers ?? new SerializerRegistry();
    this.metrics = config.metrics ?? MetricsCollector.global();
    this.errorCallback = config.onError;

    const report = (error: Error) => this.reportError(error);
    this.inbound = new SerialQueue(`${this.constructor.name} inbound`, this.logger, report);
    this.outbound = new SerialQueue(`${this.constructor.name} outbound`, this.logger, report);

    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get state(): EndpointState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.currentState === 'running';
  }

  /**
   * Open the connection and declare broker resources without consuming.
   * Idempotent. On failure everything opened so far is released and the
   * endpoint returns to `idle`.
   */
  connect(): Promise<void> {
    if (this.stopping) {
      return Promise.reject(new StateError(`${this.constructor.name} is stopped`));
    }
    if (!this.connecting) {
      this.connecting = this.openConnection();
      this.connecting.catch(() => {
        this.connecting = undefined;
      });
    }
    return this.connecting;
  }

  /**
   * Connect if needed, then begin consuming. Idempotent.
   */
  start(): Promise<void> {
    if (this.stopping) {
      return Promise.reject(new StateError(`${this.constructor.name} is stopped`));
    }
    if (!this.starting) {
      this.starting = this.beginConsuming();
      this.starting.catch(() => {
        this.starting = undefined;
      });
    }
    return this.starting;
  }

  /**
   * Start and resolve only once the endpoint has stopped
   */
  async run(): Promise<void> {
    await this.start();
    return this.stopped;
  }

  /**
   * Resolves when the endpoint reaches `stopped`
   */
  whenStopped(): Promise<void> {
    return this.stopped;
  }

  /**
   * Stop accepting work, release broker resources and close the connection.
   * Concurrent and repeated calls share a single teardown.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown();
    }
    return this.stopping;
  }

  /**
   * Checks run before any connection is opened
   */
  protected validate(): void {}

  /**
   * Declare exchanges and queues on a freshly opened connection
   */
  protected abstract declare(connection: TransportConnection): Promise<void>;

  /**
   * Begin consuming. Endpoints that only send leave this empty.
   */
  protected abstract consume(connection: TransportConnection): Promise<void>;

  /**
   * Runs at stop, after consumers are cancelled and before the queues drain
   */
  protected async beforeDrain(): Promise<void> {}

  /**
   * Declare a queue that is deleted again when the endpoint stops
   */
  protected async declareTransientQueue(
    connection: TransportConnection,
    spec: QueueSpec
  ): Promise<string> {
    const name = await connection.declareQueue(spec);
    this.transientQueues.push({ name, exclusive: spec.exclusive });
    return name;
  }

  /**
   * Consume `queue`, handling each delivery on the inbound queue
   */
  protected async subscribe(
    connection: TransportConnection,
    queue: string,
    handler: (delivery: Delivery) => Promise<void>,
    options: ConsumeOptions
  ): Promise<void> {
    const tag = await connection.consume(
      queue,
      (delivery) => {
        this.inbound.push(() => handler(delivery));
      },
      options
    );
    this.consumerTags.push(tag);
  }

  /**
   * Send on the outbound queue and resolve when the send has finished
   */
  protected send(address: Address, envelope: MessageEnvelope): Promise<void> {
    return new Promise((resolve, reject) => {
      const accepted = this.outbound.push(async () => {
        try {
          await this.requireConnection().publish(address, envelope);
          resolve();
        } catch (error) {
          reject(toError(error));
        }
      });

      if (!accepted) {
        reject(new StateError(`${this.constructor.name} is stopping, send refused`));
      }
    });
  }

  protected requireConnection(): TransportConnection {
    if (!this.connection || !this.connection.isOpen()) {
      throw ConnectionError.notConnected(`${this.constructor.name} has no open connection`);
    }
    return this.connection;
  }

  protected reportError(error: Error): void {
    this.logger.error('Endpoint error', error, { state: this.currentState });
    this.errorCallback?.(error);
  }

  private setState(state: EndpointState): void {
    this.logger.debug('State change', { from: this.currentState, to: state });
    this.currentState = state;
  }

  private async openConnection(): Promise<void> {
    this.validate();
    this.setState('connecting');

    let connection: TransportConnection | undefined;
    try {
      connection = await connectWithRetry(this.driver, this.logger);
      this.attach(connection);
      await this.declare(connection);
    } catch (error) {
      this.logger.error('Connect failed', toError(error), { target: this.driver.describe() });
      await this.releaseBroker();
      if (!this.stopping) this.setState('idle');
      throw error;
    }

    if (this.currentState === 'connecting') this.setState('connected');
  }

  private attach(connection: TransportConnection): void {
    this.connection = connection;
    connection.onError((error) => this.handleConnectionError(connection, error));
  }

  private handleConnectionError(connection: TransportConnection, error: Error): void {
    this.reportError(error);

    const lost =
      connection === this.connection &&
      !connection.isOpen() &&
      !this.stopping &&
      !this.recovering &&
      (this.currentState === 'connected' || this.currentState === 'running');
    if (!lost) return;

    const recovery = this.recover(connection);
    this.recovering = recovery;
    recovery
      .then((recovered) => {
        this.recovering = undefined;
        return recovered ? undefined : this.stop();
      })
      .catch((stopError: unknown) => {
        this.logger.error('Stop after failed reconnect failed', toError(stopError));
      });
  }

  /**
   * Replace a lost connection, declare again and resume consuming when the
   * endpoint was running. Resolves false when the endpoint cannot go on.
   */
  private async recover(lost: TransportConnection): Promise<boolean> {
    const resume = this.currentState === 'running';
    this.logger.warn('Connection lost, reconnecting', { target: this.driver.describe() });

    this.connection = undefined;
    this.consumerTags = [];
    this.transientQueues = [];
    this.setState('connecting');
    await lost.close().catch((error: unknown) => {
      this.logger.debug('Close of lost connection failed', { error: toError(error).message });
    });

    let connection: TransportConnection;
    try {
      connection = await connectWithRetry(this.driver, this.logger, () => this.stopping !== undefined);
    } catch (error) {
      if (!this.stopping) {
        this.logger.error('Reconnect gave up, stopping', toError(error));
        this.reportError(toError(error));
      }
      return false;
    }

    this.attach(connection);
    if (this.stopping) return true;

    try {
      await this.declare(connection);
      if (resume) await this.consume(connection);
    } catch (error) {
      this.reportError(toError(error));
      return false;
    }

    if (!this.stopping) {
      this.setState(resume ? 'running' : 'connected');
      this.logger.info(`${this.constructor.name} reconnected`, { target: this.driver.describe() });
    }
    return true;
  }

  private async beginConsuming(): Promise<void> {
    await this.connect();

    if (this.stopping) {
      throw new StateError(`${this.constructor.name} stopped while starting`);
    }

    await this.consume(this.requireConnection());
    this.setState('running');
    this.logger.info(`${this.constructor.name} started`);
  }

  private async teardown(): Promise<void> {
    if (this.recovering) {
      await this.recovering;
    }

    const pending = this.starting ?? this.connecting;
    if (pending) {
      await pending.then(
        () => undefined,
        (error: unknown) =>
          this.logger.debug('Startup did not complete before stop', {
            error: toError(error).message,
          })
      );
    }

    if (this.currentState === 'idle') {
      await this.inbound.close();
      await this.outbound.close();
      this.setState('stopped');
      this.resolveStopped();
      return;
    }

    this.setState('stopping');

    for (const tag of this.consumerTags.splice(0)) {
      await this.attempt('Cancel consumer', () => this.requireConnection().cancel(tag));
    }

    await this.attempt('Before drain', () => this.beforeDrain());
    await this.inbound.close();
    await this.outbound.close();
    await this.releaseBroker();

    this.setState('stopped');
    this.logger.info(`${this.constructor.name} stopped`);
    this.resolveStopped();
  }

  /**
   * Delete transient queues (each exactly once) and close the connection
   */
  private async releaseBroker(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    if (!connection) return;

    for (const queue of this.transientQueues.splice(0)) {
      if (!connection.isOpen()) break;
      await this.attempt('Delete queue', () => this.deleteUnlessShared(connection, queue), {
        queue: queue.name,
      });
    }

    await this.attempt('Close connection', () => connection.close());
  }

  private async deleteUnlessShared(
    connection: TransportConnection,
    queue: { name: string; exclusive: boolean }
  ): Promise<void> {
    if (!queue.exclusive) {
      const info = await connection.inspectQueue(queue.name);
      if (info.consumerCount > 0) {
        this.logger.debug('Queue still consumed by peers, left in place', {
          queue: queue.name,
          consumers: info.consumerCount,
        });
        return;
      }
    }
    await connection.deleteQueue(queue.name);
  }

  private async attempt(
    step: string,
    fn: () => Promise<void>,
    context?: Record<string, unknown>
  ): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.warn(`${step} failed during shutdown`, {
        ...context,
        error: toError(error).message,
      });
    }
  }
}
