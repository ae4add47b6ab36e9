import { randomUUID } from 'crypto';
import { EXCHANGE, EXCHANGE_KIND } from '../../core/constants';
import type { Address, Delivery, MessageEnvelope } from '../../core/message/Envelope';
import type {
  ConsumeOptions,
  DeliveryCallback,
  ExchangeKind,
  QueueInfo,
  QueueSpec,
} from '../../core/transport/Transport';
import { ConnectionError, toError } from '../../core/types/Errors';
import { type Logger, SilentLogger } from '../../core/types/Logger';
import { topicMatches } from '../../core/utils/topicMatch';

interface Binding {
  queue: string;
  filter: string;
}

interface Exchange {
  kind: ExchangeKind;
  bindings: Binding[];
}

interface StoredMessage {
  envelope: MessageEnvelope;
  exchange: string;
  routingKey: string;
  arrivedAt: number;
}

interface Consumer {
  tag: string;
  session: string;
  callback: DeliveryCallback;
  noAck: boolean;
  prefetch: number;
  unacked: Map<number, StoredMessage>;
}

interface Queue {
  name: string;
  spec: QueueSpec;
  owner?: string;
  messages: StoredMessage[];
  consumers: Consumer[];
  nextConsumer: number;
  dispatchScheduled: boolean;
  expiryTimer?: NodeJS.Timeout;
}

/**
 * Broker-side error in the shape of an AMQP channel error
 */
export class BrokerError extends Error {
  constructor(
    message: string,
    public readonly code: number
  ) {
    super(message);
    this.name = 'BrokerError';
  }
}

export interface MemoryBrokerOptions {
  logger?: Logger;
  now?: () => number;
}

/**
 * In-process message broker with AMQP-style routing.
 *
 * Supports the default, topic, direct and fanout exchanges (`amq.topic`,
 * `amq.direct` and `amq.fanout` exist from the start), bounded queues with
 * TTL and overflow policies, idle expiry, exclusive queues owned by a
 * session, prefetch windows and acknowledgements.
 *
 * Deliveries are dispatched on a microtask, never from inside `publish`.
 *
 * @example
 * ```typescript
 * const broker = new MemoryBroker();
 * const server = new RpcServer({ transport: new MemoryDriver(broker), address: 'sum' });
 * const client = new RpcClient({ transport: new MemoryDriver(broker), address: 'sum' });
 * ```
 */
export class MemoryBroker {
  private readonly logger: Logger;
  private readonly now: () => number;
  private exchanges = new Map<string, Exchange>();
  private queues = new Map<string, Queue>();
  private sessions = new Map<string, (error: Error) => void>();
  private nextToken = 1;
  private accepting = true;

  constructor(options: MemoryBrokerOptions = {}) {
    this.logger = options.logger ?? new SilentLogger();
    this.now = options.now ?? Date.now;

    this.exchanges.set(EXCHANGE.DEFAULT, { kind: EXCHANGE_KIND.DEFAULT, bindings: [] });
    this.exchanges.set(EXCHANGE.TOPIC, { kind: EXCHANGE_KIND.TOPIC, bindings: [] });
    this.exchanges.set(EXCHANGE.DIRECT, { kind: EXCHANGE_KIND.DIRECT, bindings: [] });
    this.exchanges.set(EXCHANGE.FANOUT, { kind: EXCHANGE_KIND.FANOUT, bindings: [] });
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Open a session. `onError` hears about forced disconnects.
   *
   * @throws {ConnectionError} While the broker refuses connections
   */
  openSession(onError: (error: Error) => void): string {
    if (!this.accepting) {
      throw ConnectionError.failed('ECONNREFUSED: memory broker is not accepting connections');
    }
    const id = randomUUID();
    this.sessions.set(id, onError);
    return id;
  }

  /**
   * Close a session: cancel its consumers and delete its exclusive queues
   */
  closeSession(session: string): void {
    if (!this.sessions.delete(session)) return;

    for (const queue of [...this.queues.values()]) {
      if (queue.owner === session) {
        this.removeQueue(queue.name);
        continue;
      }
      for (const consumer of queue.consumers.filter((c) => c.session === session)) {
        this.cancel(consumer.tag);
      }
    }
  }

  /**
   * Drop every session and refuse new ones until `resume()`
   */
  pause(reason = 'memory broker went away'): void {
    this.accepting = false;
    for (const [session, onError] of [...this.sessions]) {
      this.closeSession(session);
      onError(ConnectionError.closed(reason));
    }
  }

  resume(): void {
    this.accepting = true;
  }

  isSessionOpen(session: string): boolean {
    return this.sessions.has(session);
  }

  declareExchange(name: string, kind: ExchangeKind): void {
    const existing = this.exchanges.get(name);
    if (existing && existing.kind !== kind) {
      throw new BrokerError(
        `PRECONDITION_FAILED - exchange '${name}' already declared as ${existing.kind}`,
        406
      );
    }
    if (!existing) {
      this.exchanges.set(name, { kind, bindings: [] });
    }
  }

  declareQueue(session: string, spec: QueueSpec): string {
    const name = spec.name || `amq.gen-${randomUUID()}`;
    const existing = this.queues.get(name);

    if (existing) {
      if (existing.owner !== undefined && existing.owner !== session) {
        throw new BrokerError(`RESOURCE_LOCKED - queue '${name}' is exclusive to another connection`, 405);
      }
      return name;
    }

    const queue: Queue = {
      name,
      spec: { ...spec, name },
      owner: spec.exclusive ? session : undefined,
      messages: [],
      consumers: [],
      nextConsumer: 0,
      dispatchScheduled: false,
    };
    this.queues.set(name, queue);
    this.armExpiry(queue);
    return name;
  }

  inspectQueue(name: string): QueueInfo {
    const queue = this.queues.get(name);
    return { exists: queue !== undefined, consumerCount: queue?.consumers.length ?? 0 };
  }

  /**
   * Messages currently waiting in a queue (not counting unacknowledged ones)
   */
  depth(name: string): number {
    const queue = this.queues.get(name);
    if (!queue) return 0;
    this.dropExpired(queue);
    return queue.messages.length;
  }

  queueNames(): string[] {
    return [...this.queues.keys()];
  }

  bindQueue(queue: string, exchange: string, filter: string): void {
    const target = this.requireExchange(exchange);
    this.requireQueue(queue);

    if (target.kind === EXCHANGE_KIND.DEFAULT) {
      throw new BrokerError(`ACCESS_REFUSED - operation not permitted on the default exchange`, 403);
    }
    if (!target.bindings.some((b) => b.queue === queue && b.filter === filter)) {
      target.bindings.push({ queue, filter });
    }
  }

  deleteQueue(name: string): void {
    this.removeQueue(name);
  }

  publish(address: Address, envelope: MessageEnvelope): void {
    const exchange = this.requireExchange(address.exchange);
    const targets = this.route(exchange, address.routingKey);

    if (targets.length === 0) {
      this.logger.debug('Unroutable message dropped', { ...address });
      return;
    }

    for (const queue of targets) {
      this.enqueue(queue, {
        envelope: { body: envelope.body, properties: { ...envelope.properties } },
        exchange: address.exchange,
        routingKey: address.routingKey,
        arrivedAt: this.now(),
      });
    }
  }

  consume(session: string, queueName: string, callback: DeliveryCallback, options: ConsumeOptions): string {
    const queue = this.requireQueue(queueName);

    if (queue.owner !== undefined && queue.owner !== session) {
      throw new BrokerError(`RESOURCE_LOCKED - queue '${queueName}' is exclusive to another connection`, 405);
    }

    const tag = `ctag-${randomUUID()}`;
    queue.consumers.push({
      tag,
      session,
      callback,
      noAck: options.noAck,
      prefetch: options.prefetch ?? 0,
      unacked: new Map(),
    });
    this.clearExpiry(queue);
    this.scheduleDispatch(queue);
    return tag;
  }

  /**
   * Remove a consumer; its unacknowledged messages go back to the queue head
   */
  cancel(tag: string): void {
    for (const queue of this.queues.values()) {
      const index = queue.consumers.findIndex((c) => c.tag === tag);
      if (index === -1) continue;

      const [consumer] = queue.consumers.splice(index, 1);
      queue.messages.unshift(...consumer.unacked.values());
      consumer.unacked.clear();

      this.armExpiry(queue);
      this.scheduleDispatch(queue);
      return;
    }
  }

  ack(token: number): void {
    for (const queue of this.queues.values()) {
      for (const consumer of queue.consumers) {
        if (consumer.unacked.delete(token)) {
          this.scheduleDispatch(queue);
          return;
        }
      }
    }
    this.logger.warn('Ack for unknown delivery token', { token });
  }

  private route(exchange: Exchange, routingKey: string): Queue[] {
    if (exchange.kind === EXCHANGE_KIND.DEFAULT) {
      const queue = this.queues.get(routingKey);
      return queue ? [queue] : [];
    }

    const names = new Set<string>();
    for (const binding of exchange.bindings) {
      const matched =
        exchange.kind === EXCHANGE_KIND.FANOUT ||
        (exchange.kind === EXCHANGE_KIND.DIRECT && binding.filter === routingKey) ||
        (exchange.kind === EXCHANGE_KIND.TOPIC && topicMatches(binding.filter, routingKey));
      if (matched) names.add(binding.queue);
    }

    const queues: Queue[] = [];
    for (const name of names) {
      const queue = this.queues.get(name);
      if (queue) queues.push(queue);
    }
    return queues;
  }

  private enqueue(queue: Queue, message: StoredMessage): void {
    this.dropExpired(queue);
    const { maxLength, overflow } = queue.spec;

    if (maxLength !== undefined && queue.messages.length >= maxLength) {
      if (overflow === 'reject-publish') {
        this.logger.debug('Queue full, message rejected', { queue: queue.name });
        return;
      }
      queue.messages.shift();
    }

    queue.messages.push(message);
    this.scheduleDispatch(queue);
  }

  private dropExpired(queue: Queue): void {
    const ttl = queue.spec.messageTtl;
    if (ttl === undefined) return;

    const cutoff = this.now() - ttl;
    queue.messages = queue.messages.filter((message) => message.arrivedAt > cutoff);
  }

  private scheduleDispatch(queue: Queue): void {
    if (queue.dispatchScheduled) return;
    queue.dispatchScheduled = true;

    queueMicrotask(() => {
      queue.dispatchScheduled = false;
      if (this.queues.get(queue.name) === queue) this.dispatch(queue);
    });
  }

  private dispatch(queue: Queue): void {
    this.dropExpired(queue);

    while (queue.messages.length > 0) {
      const consumer = this.nextReadyConsumer(queue);
      if (!consumer) return;

      const message = queue.messages.shift();
      if (!message) return;

      const token = this.nextToken++;
      if (!consumer.noAck) consumer.unacked.set(token, message);

      const delivery: Delivery = {
        envelope: message.envelope,
        brokerTimestamp: message.arrivedAt,
        exchange: message.exchange,
        routingKey: message.routingKey,
        token,
      };

      try {
        consumer.callback(delivery);
      } catch (error) {
        this.logger.error('Consumer callback failed', toError(error), {
          queue: queue.name,
          consumerTag: consumer.tag,
        });
      }
    }
  }

  private nextReadyConsumer(queue: Queue): Consumer | undefined {
    const count = queue.consumers.length;

    for (let i = 0; i < count; i++) {
      const index = (queue.nextConsumer + i) % count;
      const consumer = queue.consumers[index];
      if (consumer.noAck || consumer.prefetch === 0 || consumer.unacked.size < consumer.prefetch) {
        queue.nextConsumer = (index + 1) % count;
        return consumer;
      }
    }
    return undefined;
  }

  private armExpiry(queue: Queue): void {
    const expires = queue.spec.expires;
    if (expires === undefined || queue.consumers.length > 0) return;

    this.clearExpiry(queue);
    queue.expiryTimer = setTimeout(() => {
      if (queue.consumers.length === 0) {
        this.logger.debug('Idle queue expired', { queue: queue.name });
        this.removeQueue(queue.name);
      }
    }, expires);
    queue.expiryTimer.unref();
  }

  private clearExpiry(queue: Queue): void {
    if (queue.expiryTimer) {
      clearTimeout(queue.expiryTimer);
      queue.expiryTimer = undefined;
    }
  }

  private removeQueue(name: string): void {
    const queue = this.queues.get(name);
    if (!queue) return;

    this.clearExpiry(queue);
    this.queues.delete(name);
    for (const exchange of this.exchanges.values()) {
      exchange.bindings = exchange.bindings.filter((b) => b.queue !== name);
    }
  }

  private requireExchange(name: string): Exchange {
    const exchange = this.exchanges.get(name);
    if (!exchange) {
      throw new BrokerError(`NOT_FOUND - no exchange '${name}'`, 404);
    }
    return exchange;
  }

  private requireQueue(name: string): Queue {
    const queue = this.queues.get(name);
    if (!queue) {
      throw new BrokerError(`NOT_FOUND - no queue '${name}'`, 404);
    }
    return queue;
  }
}
