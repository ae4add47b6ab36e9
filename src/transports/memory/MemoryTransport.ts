import { LIMITS, TIME } from '../../core/constants';
import type { Address, DeliveryToken, MessageEnvelope } from '../../core/message/Envelope';
import type {
  ConnectOutcome,
  ConsumeOptions,
  DeliveryCallback,
  ExchangeKind,
  QueueInfo,
  QueueSpec,
  ReconnectSettings,
  TransportConnection,
  TransportDriver,
} from '../../core/transport/Transport';
import { ConnectionError, isTransientError, toError } from '../../core/types/Errors';
import type { MemoryBroker } from './MemoryBroker';

/**
 * A session on a {@link MemoryBroker}
 */
export class MemoryConnection implements TransportConnection {
  readonly backend = 'memory';
  private listeners: Array<(error: Error) => void> = [];
  private closed = false;
  private readonly session: string;

  constructor(private readonly broker: MemoryBroker) {
    this.session = broker.openSession((error) => {
      this.closed = true;
      for (const listener of this.listeners) listener(error);
    });
  }

  async declareQueue(spec: QueueSpec): Promise<string> {
    this.ensureOpen();
    return this.broker.declareQueue(this.session, spec);
  }

  async declareReplyQueue(): Promise<string> {
    return this.declareQueue({ name: '', exclusive: true });
  }

  async inspectQueue(name: string): Promise<QueueInfo> {
    this.ensureOpen();
    return this.broker.inspectQueue(name);
  }

  async declareExchange(name: string, kind: ExchangeKind): Promise<void> {
    this.ensureOpen();
    this.broker.declareExchange(name, kind);
  }

  async bindQueue(queue: string, exchange: string, filter: string): Promise<void> {
    this.ensureOpen();
    this.broker.bindQueue(queue, exchange, filter);
  }

  async deleteQueue(name: string): Promise<void> {
    this.ensureOpen();
    this.broker.deleteQueue(name);
  }

  async publish(address: Address, envelope: MessageEnvelope): Promise<void> {
    this.ensureOpen();
    this.broker.publish(address, envelope);
  }

  async consume(queue: string, callback: DeliveryCallback, options: ConsumeOptions): Promise<string> {
    this.ensureOpen();
    return this.broker.consume(this.session, queue, callback, options);
  }

  async cancel(consumerTag: string): Promise<void> {
    this.ensureOpen();
    this.broker.cancel(consumerTag);
  }

  ack(token: DeliveryToken): void {
    this.ensureOpen();
    this.broker.ack(token);
  }

  onError(listener: (error: Error) => void): void {
    this.listeners.push(listener);
  }

  isOpen(): boolean {
    return !this.closed && this.broker.isSessionOpen(this.session);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.broker.closeSession(this.session);
  }

  private ensureOpen(): void {
    if (!this.isOpen()) {
      throw ConnectionError.notConnected('Memory connection is closed');
    }
  }
}

export interface MemoryDriverOptions {
  reconnect?: Partial<ReconnectSettings>;
}

/**
 * Opens sessions on a shared in-process broker
 */
export class MemoryDriver implements TransportDriver {
  readonly backend = 'memory';
  readonly reconnect: ReconnectSettings;

  constructor(
    readonly broker: MemoryBroker,
    options: MemoryDriverOptions = {}
  ) {
    this.reconnect = Object.freeze({
      attempts: options.reconnect?.attempts ?? LIMITS.MAX_CONNECTION_ATTEMPTS,
      delayMs: options.reconnect?.delayMs ?? TIME.CONNECTION_RETRY_DELAY_MS,
      maxDelayMs: options.reconnect?.maxDelayMs ?? TIME.CONNECTION_RETRY_MAX_DELAY_MS,
    });
  }

  describe(): string {
    return 'memory://local';
  }

  async connect(): Promise<ConnectOutcome> {
    try {
      return { status: 'connected', connection: new MemoryConnection(this.broker) };
    } catch (error) {
      const err = toError(error);
      const wrapped =
        err instanceof ConnectionError ? err : ConnectionError.failed(err.message, { cause: err.name });
      return isTransientError(wrapped)
        ? { status: 'transient', error: wrapped }
        : { status: 'fatal', error: wrapped };
    }
  }
}
