import { randomUUID } from 'crypto';
import {
  EXCHANGE,
  Endpoint,
  METRIC,
  RPC_TIMEOUT_MESSAGE,
  StateError,
  TIME,
  ValidationError,
  createEnvelope,
  errorPayload,
  toInbound,
  type Delivery,
  type EndpointConfig,
  type InboundMessage,
  type JsonPayload,
  type MessageMetadata,
  type OutboundMessage,
  type Payload,
  type TransportConnection,
} from '../../core';

/**
 * RPC client configuration
 */
export interface RpcClientConfig extends EndpointConfig {
  /** Service address requests are sent to */
  address: string;
  /** Exchange requests are published on; the default exchange routes by queue name */
  exchange?: string;
  /** Default per-call timeout in ms */
  timeout?: number;
}

/**
 * Result of `call()`
 */
export type RpcResult =
  | { status: 'ok'; payload: Payload; metadata: MessageMetadata; latencyMs: number }
  | { status: 'timeout'; payload: JsonPayload; latencyMs: number };

/**
 * Result of `forward()`: the reply is left undecoded
 */
export type RawRpcResult =
  | { status: 'ok'; message: InboundMessage; latencyMs: number }
  | { status: 'timeout'; latencyMs: number };

interface PendingCall {
  correlationId: string;
  startedAt: number;
  settle: (reply: InboundMessage | undefined) => void;
  timer: NodeJS.Timeout;
}

/**
 * RpcClient sends requests to an RPC address and waits for the reply
 *
 * Every request carries a fresh correlation id and the client's private reply
 * address; replies with any other correlation id are dropped. A client has at
 * most one call in flight: use one client per concurrent caller.
 *
 * A call that gets no reply within its timeout resolves with
 * `{ status: 'timeout', payload: { error: 'RPC Response timeout' } }`
 * instead of rejecting.
 *
 * @example
 * ```typescript
 * const client = new RpcClient({ transport: new MemoryDriver(broker), address: 'sum' });
 *
 * const result = await client.call(jsonPayload([1, 2, 3]), 1000);
 * if (result.status === 'ok') {
 *   console.log(result.payload); // { kind: 'json', value: 6 }
 * }
 *
 * await client.stop();
 * ```
 */
export class RpcClient extends Endpoint {
  private readonly address: string;
  private readonly exchange: string;
  private readonly defaultTimeout: number;
  private replyQueue?: string;
  private pending?: PendingCall;
  private lastDelay = 0;
  private totalDelay = 0;
  private completedCalls = 0;

  constructor(config: RpcClientConfig) {
    super(config);
    if (!config.address) {
      throw ValidationError.addressRequired('RpcClient needs an address');
    }
    this.address = config.address;
    this.exchange = config.exchange ?? EXCHANGE.DEFAULT;
    this.defaultTimeout = config.timeout ?? TIME.DEFAULT_RPC_TIMEOUT_MS;
  }

  /**
   * Latency of the last completed call in ms
   */
  get delay(): number {
    return this.lastDelay;
  }

  /**
   * Mean latency of all completed calls in ms
   */
  get meanDelay(): number {
    return this.completedCalls === 0 ? 0 : this.totalDelay / this.completedCalls;
  }

  get target(): string {
    return this.address;
  }

  /**
   * Send a payload and wait for the decoded reply or the timeout
   *
   * @throws {StateError} When another call on this client is still in flight
   * @throws {SerializationError} When the payload cannot be encoded
   */
  async call(payload: Payload, timeout: number = this.defaultTimeout): Promise<RpcResult> {
    const encoded = this.serializers.encode(payload);
    const result = await this.forward(
      { body: encoded.body, contentType: encoded.contentType, contentEncoding: encoded.contentEncoding },
      timeout
    );

    if (result.status === 'timeout') {
      return {
        status: 'timeout',
        payload: errorPayload(RPC_TIMEOUT_MESSAGE),
        latencyMs: result.latencyMs,
      };
    }

    const decoded = this.serializers.decode(
      result.message.body,
      result.message.metadata.contentType,
      result.message.properties.contentEncoding
    );
    if (decoded.error) {
      this.logger.warn('Reply returned as raw bytes', {
        address: this.address,
        error: decoded.error.message,
      });
      this.metrics.incrementCounter(METRIC.SERIALIZATION_ERRORS, { endpoint: 'rpc-client' });
    }

    return {
      status: 'ok',
      payload: decoded.payload,
      metadata: result.message.metadata,
      latencyMs: result.latencyMs,
    };
  }

  /**
   * Send an already encoded message and wait for the undecoded reply.
   * Starts the client on first use.
   *
   * @throws {StateError} When another call on this client is still in flight
   */
  async forward(message: OutboundMessage, timeout: number = this.defaultTimeout): Promise<RawRpcResult> {
    if (this.pending) {
      throw new StateError('RpcClient already has a call in flight', {
        address: this.address,
        correlationId: this.pending.correlationId,
      });
    }

    const correlationId = randomUUID();
    const startedAt = Date.now();
    const reply = new Promise<InboundMessage | undefined>((resolve) => {
      this.pending = {
        correlationId,
        startedAt,
        settle: resolve,
        timer: setTimeout(() => this.settle(undefined), timeout),
      };
    });

    try {
      await this.start();
      const replyTo = this.requireReplyQueue();

      // Timed out while connecting: nobody waits for this reply any more
      if (!this.isPending(correlationId)) {
        this.logger.debug('Call timed out before it was sent', { address: this.address, correlationId });
        return this.finish(await reply, startedAt, timeout, correlationId);
      }

      await this.send(
        { exchange: this.exchange, routingKey: this.address },
        createEnvelope(message.body, {
          contentType: message.contentType,
          contentEncoding: message.contentEncoding,
          timestamp: message.timestamp,
          messageId: message.messageId,
          appId: message.appId,
          correlationId,
          replyTo,
        })
      );
    } catch (error) {
      if (this.isPending(correlationId)) this.clearPending();
      throw error;
    }

    return this.finish(await reply, startedAt, timeout, correlationId);
  }

  private finish(
    received: InboundMessage | undefined,
    startedAt: number,
    timeout: number,
    correlationId: string
  ): RawRpcResult {
    const latencyMs = Date.now() - startedAt;
    const status = received ? 'ok' : 'timeout';

    this.metrics.incrementCounter(METRIC.RPC_CLIENT_CALLS, { address: this.address, status });
    this.metrics.observeHistogram(
      METRIC.RPC_CLIENT_DURATION,
      { address: this.address, status },
      latencyMs / 1000
    );

    if (!received) {
      this.logger.warn('RPC call timed out', { address: this.address, timeout, correlationId });
      return { status: 'timeout', latencyMs };
    }

    this.lastDelay = latencyMs;
    this.totalDelay += latencyMs;
    this.completedCalls++;
    return { status: 'ok', message: received, latencyMs };
  }

  protected async declare(connection: TransportConnection): Promise<void> {
    this.replyQueue = await connection.declareReplyQueue();
  }

  protected async consume(connection: TransportConnection): Promise<void> {
    await this.subscribe(connection, this.requireReplyQueue(), async (delivery) => this.handleReply(delivery), {
      noAck: true,
    });
  }

  /**
   * A call still waiting when the client stops ends as a timeout
   */
  protected async beforeDrain(): Promise<void> {
    if (this.pending) {
      this.logger.debug('Stopping with a call in flight', { correlationId: this.pending.correlationId });
      this.settle(undefined);
    }
  }

  private handleReply(delivery: Delivery): void {
    const correlationId = delivery.envelope.properties.correlationId;

    if (!this.pending || correlationId !== this.pending.correlationId) {
      this.logger.debug('Dropping reply with unknown correlation id', { correlationId });
      return;
    }

    this.settle(toInbound(delivery));
  }

  private settle(reply: InboundMessage | undefined): void {
    const pending = this.pending;
    if (!pending) return;

    this.clearPending();
    pending.settle(reply);
  }

  private isPending(correlationId: string): boolean {
    return this.pending?.correlationId === correlationId;
  }

  private clearPending(): void {
    if (this.pending) {
      clearTimeout(this.pending.timer);
      this.pending = undefined;
    }
  }

  private requireReplyQueue(): string {
    if (!this.replyQueue) {
      throw new StateError('RpcClient reply queue was not declared');
    }
    return this.replyQueue;
  }
}
