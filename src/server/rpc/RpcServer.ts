import {
  CONTENT_TYPE,
  DEFAULT_CONTENT_ENCODING,
  DuplicateBindingError,
  EXCHANGE,
  Endpoint,
  LIMITS,
  METRIC,
  StateError,
  TIME,
  ValidationError,
  createEnvelope,
  errorPayload,
  resolveQueueOptions,
  toError,
  toInbound,
  type Delivery,
  type EncodedPayload,
  type EndpointConfig,
  type ExchangeKind,
  type InboundMessage,
  type MessageMetadata,
  type OutboundMessage,
  type Payload,
  type QueueOptions,
  type TransportConnection,
} from '../../core';

/**
 * Handler for decoded requests. A returned payload is encoded by its kind.
 */
export type RpcHandler = (payload: Payload, metadata: MessageMetadata) => Promise<Payload> | Payload;

/**
 * Handler for undecoded requests. The reply is sent exactly as returned.
 */
export type RawRpcHandler = (message: InboundMessage) => Promise<OutboundMessage> | OutboundMessage;

/**
 * RPC server configuration
 */
export interface RpcServerConfig extends EndpointConfig, QueueOptions {
  /** Service address, can also be given to `bind()` */
  address?: string;
  /** Exchange the request queue is bound to, with the address as routing key */
  exchange?: string;
  exchangeKind?: ExchangeKind;
  /** Unacknowledged requests in flight */
  prefetch?: number;
}

type Binding =
  | { raw: false; handler: RpcHandler }
  | { raw: true; handler: RawRpcHandler };

/**
 * RpcServer answers requests sent to a named service address
 *
 * Requests are handled one at a time: the handler runs, the reply is
 * published to the request's reply address under its correlation id, and only
 * then is the request acknowledged. Handler failures are answered with
 * `{ error, status: 500 }` and reply encoding failures with
 * `{ error: 'Internal server error: ...', status: 501 }`.
 *
 * @example
 * ```typescript
 * const server = new RpcServer({ transport: new MemoryDriver(broker) });
 *
 * server.bind('sum', (payload) => {
 *   if (payload.kind !== 'json' || !Array.isArray(payload.value)) {
 *     throw new Error('expected a list of numbers');
 *   }
 *   return jsonPayload(payload.value.reduce((acc, n) => acc + Number(n), 0));
 * });
 *
 * await server.run();
 * ```
 */
export class RpcServer extends Endpoint {
  private address?: string;
  private binding?: Binding;
  private rejectIfAddressTaken = true;
  private readonly exchange: string;
  private readonly exchangeKind: ExchangeKind;
  private readonly prefetch: number;
  private readonly queueOptions: Required<QueueOptions>;
  private queue?: string;

  constructor(config: RpcServerConfig) {
    super(config);
    this.address = config.address;
    this.exchange = config.exchange ?? EXCHANGE.DEFAULT;
    this.exchangeKind = config.exchangeKind ?? (this.exchange === EXCHANGE.DEFAULT ? 'default' : 'direct');
    this.prefetch = config.prefetch ?? LIMITS.RPC_SERVER_DEFAULT_PREFETCH;
    this.queueOptions = resolveQueueOptions(config, TIME.RPC_QUEUE_EXPIRES_MS);
  }

  /**
   * Serve `address` with a handler working on decoded payloads
   *
   * @param rejectIfAddressTaken - Fail startup when another server already consumes the address
   * @throws {StateError} When called after the server connected
   */
  bind(address: string, handler: RpcHandler, rejectIfAddressTaken = true): this {
    return this.setBinding(address, { raw: false, handler }, rejectIfAddressTaken);
  }

  /**
   * Serve `address` with a handler that sees and returns undecoded bodies
   */
  bindRaw(address: string, handler: RawRpcHandler, rejectIfAddressTaken = true): this {
    return this.setBinding(address, { raw: true, handler }, rejectIfAddressTaken);
  }

  get boundAddress(): string | undefined {
    return this.address;
  }

  protected validate(): void {
    if (!this.address) {
      throw ValidationError.addressRequired('RpcServer needs an address');
    }
    if (!this.binding) {
      throw ValidationError.handlerRequired(`No handler bound for <${this.address}>`, {
        address: this.address,
      });
    }
  }

  protected async declare(connection: TransportConnection): Promise<void> {
    const address = this.requireAddress();

    if (this.rejectIfAddressTaken) {
      const info = await connection.inspectQueue(address);
      if (info.exists && info.consumerCount > 0) {
        throw new DuplicateBindingError(address, { consumers: info.consumerCount });
      }
    }

    this.queue = await this.declareTransientQueue(connection, {
      name: address,
      exclusive: false,
      maxLength: this.queueOptions.queueSize,
      messageTtl: this.queueOptions.messageTtl,
      overflow: this.queueOptions.overflow,
      expires: this.queueOptions.expires,
    });

    if (this.exchange !== EXCHANGE.DEFAULT) {
      await connection.declareExchange(this.exchange, this.exchangeKind);
      await connection.bindQueue(this.queue, this.exchange, address);
    }
  }

  protected async consume(connection: TransportConnection): Promise<void> {
    const queue = this.queue ?? this.requireAddress();
    await this.subscribe(connection, queue, (delivery) => this.handleRequest(connection, delivery), {
      noAck: false,
      prefetch: this.prefetch,
    });
    this.logger.info('Serving RPC address', { address: this.address, queue });
  }

  private setBinding(address: string, binding: Binding, rejectIfAddressTaken: boolean): this {
    if (!address) {
      throw ValidationError.addressRequired('RPC address is required');
    }
    if (this.state !== 'idle') {
      throw new StateError('Cannot bind after the server connected', { address, state: this.state });
    }

    this.address = address;
    this.binding = binding;
    this.rejectIfAddressTaken = rejectIfAddressTaken;
    return this;
  }

  private requireAddress(): string {
    if (!this.address) {
      throw ValidationError.addressRequired('RpcServer needs an address');
    }
    return this.address;
  }

  /**
   * Requests are acknowledged on the connection that delivered them; after a
   * reconnect the broker redelivers whatever was left unacknowledged.
   */
  private async handleRequest(connection: TransportConnection, delivery: Delivery): Promise<void> {
    const message = toInbound(delivery);
    const { correlationId, replyTo } = message.metadata;
    const address = this.address ?? delivery.routingKey;

    try {
      const reply = await this.respond(message);

      if (replyTo === undefined || correlationId === undefined) {
        this.logger.debug('Request without reply address, no reply sent', { address });
      } else {
        await this.send(
          { exchange: EXCHANGE.DEFAULT, routingKey: replyTo },
          createEnvelope(reply.body, {
            contentType: reply.contentType,
            contentEncoding: reply.contentEncoding,
            timestamp: reply.timestamp,
            messageId: reply.messageId,
            appId: reply.appId,
            correlationId,
            replyTo,
          })
        );
      }
    } catch (error) {
      this.reportError(toError(error));
    } finally {
      if (connection.isOpen()) connection.ack(delivery.token);
    }
  }

  /**
   * Run the bound handler and encode its answer, mapping failures to error replies
   */
  private async respond(message: InboundMessage): Promise<OutboundMessage> {
    const address = this.address ?? message.metadata.routingKey;
    const binding = this.binding;

    if (!binding) {
      return this.encodeError(`No handler bound for <${address}>`, 500);
    }

    if (binding.raw) {
      try {
        const reply = await binding.handler(message);
        this.countRequest(address, 'ok');
        return reply;
      } catch (error) {
        this.logger.error('Raw handler failed', toError(error), { address });
        this.countRequest(address, 'error');
        return this.encodeError(toError(error).message, 500);
      }
    }

    const decoded = this.serializers.decode(
      message.body,
      message.metadata.contentType,
      message.properties.contentEncoding
    );
    if (decoded.error) {
      this.logger.warn('Request passed to handler as raw bytes', {
        address,
        error: decoded.error.message,
      });
      this.metrics.incrementCounter(METRIC.SERIALIZATION_ERRORS, { endpoint: 'rpc-server' });
    }

    let result: Payload;
    try {
      result = await binding.handler(decoded.payload, message.metadata);
    } catch (error) {
      this.logger.error('Handler failed', toError(error), { address });
      this.countRequest(address, 'error');
      return this.encodeError(toError(error).message, 500);
    }

    let encoded: EncodedPayload;
    try {
      encoded = this.serializers.encode(result);
    } catch (error) {
      this.logger.error('Reply encoding failed', toError(error), { address });
      this.countRequest(address, 'error');
      return this.encodeError(`Internal server error: ${toError(error).message}`, 501);
    }

    this.countRequest(address, 'ok');
    return { body: encoded.body, contentType: encoded.contentType, contentEncoding: encoded.contentEncoding };
  }

  private encodeError(message: string, status: number): OutboundMessage {
    const body = Buffer.from(JSON.stringify(errorPayload(message, status).value), DEFAULT_CONTENT_ENCODING);
    return { body, contentType: CONTENT_TYPE.JSON, contentEncoding: DEFAULT_CONTENT_ENCODING };
  }

  private countRequest(address: string, status: 'ok' | 'error'): void {
    this.metrics.incrementCounter(METRIC.RPC_SERVER_REQUESTS, { address, status });
  }
}
