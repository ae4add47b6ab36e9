import {
  EXCHANGE,
  EXCHANGE_KIND,
  Endpoint,
  METRIC,
  RateEstimator,
  StateError,
  TIME,
  ValidationError,
  resolveQueueOptions,
  toError,
  toInbound,
  type Delivery,
  type EndpointConfig,
  type ExchangeKind,
  type InboundMessage,
  type MessageMetadata,
  type Payload,
  type QueueOptions,
  type TransportConnection,
} from '../../core';

/**
 * Handler for decoded topic messages
 */
export type TopicHandler = (payload: Payload, metadata: MessageMetadata) => Promise<void> | void;

/**
 * Handler for undecoded topic messages
 */
export type RawTopicHandler = (message: InboundMessage) => Promise<void> | void;

/**
 * Subscriber configuration
 */
export interface SubscriberConfig extends EndpointConfig, QueueOptions {
  /** Topic filter, can also be given to `bind()` */
  topic?: string;
  exchange?: string;
  exchangeKind?: ExchangeKind;
}

type Binding =
  | { raw: false; handler: TopicHandler }
  | { raw: true; handler: RawTopicHandler };

/**
 * Subscriber receives messages whose routing key matches a topic filter
 *
 * Each subscriber reads from its own exclusive, broker-named queue bound to
 * the exchange with the filter (`*` matches one word, `#` zero or more).
 * Messages are delivered one at a time; a failing handler is logged and the
 * next message is still delivered. `hz` estimates the arrival rate.
 *
 * @example
 * ```typescript
 * const subscriber = new Subscriber({ transport: new MemoryDriver(broker) });
 *
 * subscriber.bind('sensors.#', (payload, metadata) => {
 *   console.log(metadata.routingKey, payload);
 * });
 *
 * await subscriber.start();
 * console.log(`${subscriber.hz.toFixed(1)} Hz`);
 * ```
 */
export class Subscriber extends Endpoint {
  private topic?: string;
  private binding?: Binding;
  private readonly exchange: string;
  private readonly exchangeKind: ExchangeKind;
  private readonly rate = new RateEstimator();
  private readonly queueOptions: Required<QueueOptions>;
  private queue?: string;

  constructor(config: SubscriberConfig) {
    super(config);
    this.topic = config.topic;
    this.exchange = config.exchange ?? EXCHANGE.TOPIC;
    this.exchangeKind = config.exchangeKind ?? EXCHANGE_KIND.TOPIC;
    this.queueOptions = resolveQueueOptions(config, TIME.TOPIC_QUEUE_EXPIRES_MS);
  }

  /**
   * Deliver messages matching `topicFilter` to a handler working on decoded payloads
   *
   * @throws {StateError} When called after the subscriber connected
   */
  bind(topicFilter: string, handler: TopicHandler): this {
    return this.setBinding(topicFilter, { raw: false, handler });
  }

  /**
   * Deliver matching messages undecoded
   */
  bindRaw(topicFilter: string, handler: RawTopicHandler): this {
    return this.setBinding(topicFilter, { raw: true, handler });
  }

  /**
   * Arrival rate in Hz over the last 100 inter-arrival samples
   */
  get hz(): number {
    return this.rate.hz;
  }

  get queueName(): string | undefined {
    return this.queue;
  }

  protected validate(): void {
    if (!this.topic) {
      throw ValidationError.addressRequired('Subscriber needs a topic filter');
    }
    if (!this.binding) {
      throw ValidationError.handlerRequired(`No handler bound for topic <${this.topic}>`, {
        topic: this.topic,
      });
    }
  }

  protected async declare(connection: TransportConnection): Promise<void> {
    const topic = this.requireTopic();

    await connection.declareExchange(this.exchange, this.exchangeKind);
    this.queue = await this.declareTransientQueue(connection, {
      name: '',
      exclusive: true,
      maxLength: this.queueOptions.queueSize,
      messageTtl: this.queueOptions.messageTtl,
      overflow: this.queueOptions.overflow,
      expires: this.queueOptions.expires,
    });
    await connection.bindQueue(this.queue, this.exchange, topic);
  }

  protected async consume(connection: TransportConnection): Promise<void> {
    if (!this.queue) {
      throw new StateError('Subscriber queue was not declared');
    }
    await this.subscribe(connection, this.queue, (delivery) => this.handleMessage(delivery), {
      noAck: true,
    });
    this.logger.info('Subscribed', { topic: this.topic, exchange: this.exchange, queue: this.queue });
  }

  private setBinding(topicFilter: string, binding: Binding): this {
    if (!topicFilter) {
      throw ValidationError.addressRequired('Topic filter is required');
    }
    if (this.state !== 'idle') {
      throw new StateError('Cannot bind after the subscriber connected', {
        topic: topicFilter,
        state: this.state,
      });
    }

    this.topic = topicFilter;
    this.binding = binding;
    return this;
  }

  private requireTopic(): string {
    if (!this.topic) {
      throw ValidationError.addressRequired('Subscriber needs a topic filter');
    }
    return this.topic;
  }

  private async handleMessage(delivery: Delivery): Promise<void> {
    this.rate.record();
    const message = toInbound(delivery);
    const topic = this.topic ?? delivery.routingKey;
    this.metrics.incrementCounter(METRIC.MESSAGES_RECEIVED, { topic });

    const binding = this.binding;
    if (!binding) return;

    try {
      if (binding.raw) {
        await binding.handler(message);
        return;
      }

      const decoded = this.serializers.decode(
        message.body,
        message.metadata.contentType,
        message.properties.contentEncoding
      );
      if (decoded.error) {
        this.logger.warn('Message passed to handler as raw bytes', {
          topic,
          error: decoded.error.message,
        });
        this.metrics.incrementCounter(METRIC.SERIALIZATION_ERRORS, { endpoint: 'subscriber' });
      }

      await binding.handler(decoded.payload, message.metadata);
    } catch (error) {
      this.logger.error('Handler failed', toError(error), {
        topic,
        routingKey: delivery.routingKey,
      });
    }
  }
}
