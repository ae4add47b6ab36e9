import type { ConnectionError } from '../types/Errors';
import type { Address, Delivery, DeliveryToken, MessageEnvelope } from '../message/Envelope';

/**
 * Backends shipped with relaykit
 */
export type BackendKind = 'amqp' | 'memory';

/**
 * Exchange kinds. `default` routes straight to the queue named by the routing key.
 */
export type ExchangeKind = 'topic' | 'direct' | 'fanout' | 'default';

export type OverflowPolicy = 'drop-head' | 'reject-publish';

/**
 * Transient queue declaration. A blank name lets the broker pick one.
 */
export interface QueueSpec {
  name: string;
  exclusive: boolean;
  maxLength?: number;
  messageTtl?: number;
  overflow?: OverflowPolicy;
  /** Idle expiry in ms */
  expires?: number;
}

/**
 * Limits of the queue a consuming endpoint declares for itself
 */
export interface QueueOptions {
  /** Messages kept before `overflow` applies */
  queueSize?: number;
  /** Per-message TTL in ms */
  messageTtl?: number;
  overflow?: OverflowPolicy;
  /** Idle expiry in ms */
  expires?: number;
}

export interface QueueInfo {
  exists: boolean;
  consumerCount: number;
}

export interface ConsumeOptions {
  /** Deliveries are settled on receipt; `ack` must not be called */
  noAck: boolean;
  /** Unacknowledged deliveries allowed in flight (ignored with noAck) */
  prefetch?: number;
}

export type DeliveryCallback = (delivery: Delivery) => void;

/**
 * One physical connection (and its channel) to a broker.
 *
 * A connection is single-reader single-writer: endpoints funnel every call
 * through their own serial queues and never share a connection.
 */
export interface TransportConnection {
  readonly backend: BackendKind;
  /** Declare a transient queue and return its (possibly broker-assigned) name */
  declareQueue(spec: QueueSpec): Promise<string>;
  /** Queue an RPC client consumes replies from, without acknowledgements */
  declareReplyQueue(): Promise<string>;
  inspectQueue(name: string): Promise<QueueInfo>;
  declareExchange(name: string, kind: ExchangeKind): Promise<void>;
  bindQueue(queue: string, exchange: string, filter: string): Promise<void>;
  deleteQueue(name: string): Promise<void>;
  publish(address: Address, envelope: MessageEnvelope): Promise<void>;
  /** Start consuming and return the consumer tag */
  consume(queue: string, callback: DeliveryCallback, options: ConsumeOptions): Promise<string>;
  cancel(consumerTag: string): Promise<void>;
  ack(token: DeliveryToken): void;
  /** Register a listener for errors raised after the connection was opened */
  onError(listener: (error: Error) => void): void;
  isOpen(): boolean;
  close(): Promise<void>;
}

/**
 * Outcome of a single connect attempt, classified by the driver
 */
export type ConnectOutcome =
  | { status: 'connected'; connection: TransportConnection }
  | { status: 'transient'; error: ConnectionError }
  | { status: 'fatal'; error: ConnectionError };

/**
 * Bounds of the reconnect loop
 */
export interface ReconnectSettings {
  attempts: number;
  delayMs: number;
  maxDelayMs?: number;
}

/**
 * A concrete backend. Each `connect()` opens a fresh connection owned by the caller.
 */
export interface TransportDriver {
  readonly backend: BackendKind;
  readonly reconnect: ReconnectSettings;
  /** Human-readable target for logs (credentials masked) */
  describe(): string;
  connect(): Promise<ConnectOutcome>;
}
