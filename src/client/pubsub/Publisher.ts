import {
  EXCHANGE,
  EXCHANGE_KIND,
  Endpoint,
  METRIC,
  StateError,
  ValidationError,
  createEnvelope,
  type EndpointConfig,
  type ExchangeKind,
  type MessageEnvelope,
  type OutboundMessage,
  type Payload,
  type TransportConnection,
} from '../../core';

const toEnvelope = (message: OutboundMessage): MessageEnvelope =>
  createEnvelope(message.body, {
    contentType: message.contentType,
    contentEncoding: message.contentEncoding,
    timestamp: message.timestamp,
    messageId: message.messageId,
    appId: message.appId,
  });

/**
 * Publisher configuration
 */
export interface PublisherConfig extends EndpointConfig {
  /** Routing key every message is published under */
  topic: string;
  exchange?: string;
  exchangeKind?: ExchangeKind;
}

/**
 * Publisher sends fire-and-forget messages to a topic
 *
 * `publish()` returns at once: the send is queued behind earlier sends on the
 * publisher's own connection and goes out in call order. Nothing is awaited
 * from the broker and nothing is retried; failures reach the `onError`
 * callback and the log. Use `flush()` to wait for queued sends.
 *
 * @example
 * ```typescript
 * const publisher = new Publisher({ transport: new MemoryDriver(broker), topic: 'sensors.temp' });
 * await publisher.start();
 *
 * publisher.publish(jsonPayload({ celsius: 21.5 }));
 * publisher.publish(textPayload('calibrating'));
 *
 * await publisher.flush();
 * await publisher.stop();
 * ```
 */
export class Publisher extends Endpoint {
  private readonly topic: string;
  private readonly exchange: string;
  private readonly exchangeKind: ExchangeKind;

  constructor(config: PublisherConfig) {
    super(config);
    if (!config.topic) {
      throw ValidationError.addressRequired('Publisher needs a topic');
    }
    this.topic = config.topic;
    this.exchange = config.exchange ?? EXCHANGE.TOPIC;
    this.exchangeKind = config.exchangeKind ?? EXCHANGE_KIND.TOPIC;
  }

  get routingKey(): string {
    return this.topic;
  }

  /**
   * Queue a payload for sending, encoded by its kind
   */
  publish(payload: Payload): void {
    this.enqueue(() => {
      const encoded = this.serializers.encode(payload);
      return createEnvelope(encoded.body, {
        contentType: encoded.contentType,
        contentEncoding: encoded.contentEncoding,
      });
    });
  }

  /**
   * Queue an already encoded message, keeping its content metadata
   */
  publishRaw(message: OutboundMessage): void {
    this.enqueue(() => toEnvelope(message));
  }

  /**
   * Queue an already encoded message and wait until it was handed to the
   * broker. Keeps its place in line with `publish()` calls made before it.
   *
   * @throws {ConnectionError} When the send failed
   */
  async publishRawAndWait(message: OutboundMessage): Promise<void> {
    await this.start();
    await this.send({ exchange: this.exchange, routingKey: this.topic }, toEnvelope(message));
    this.metrics.incrementCounter(METRIC.MESSAGES_PUBLISHED, { topic: this.topic });
  }

  /**
   * Resolve once every message queued so far has been handed to the broker
   */
  flush(): Promise<void> {
    return this.outbound.drain();
  }

  protected async declare(connection: TransportConnection): Promise<void> {
    await connection.declareExchange(this.exchange, this.exchangeKind);
  }

  protected async consume(): Promise<void> {
    this.logger.debug('Publisher ready', { exchange: this.exchange, topic: this.topic });
  }

  private enqueue(build: () => MessageEnvelope): void {
    const accepted = this.outbound.push(async () => {
      await this.start();
      const envelope = build();
      await this.requireConnection().publish({ exchange: this.exchange, routingKey: this.topic }, envelope);
      this.metrics.incrementCounter(METRIC.MESSAGES_PUBLISHED, { topic: this.topic });
    });

    if (!accepted) {
      this.reportError(new StateError(`Publisher for <${this.topic}> is stopped, message dropped`));
    }
  }
}
