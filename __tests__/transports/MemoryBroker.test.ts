import { describe, it, expect, vi, afterEach } from 'vitest';
import { BrokerError, MemoryBroker } from '../../src/transports/memory/MemoryBroker';
import { MemoryConnection, MemoryDriver } from '../../src/transports/memory/MemoryTransport';
import { createEnvelope, type Delivery } from '../../src/core/message/Envelope';
import { ConnectionError } from '../../src/core/types/Errors';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const envelope = (text: string) => createEnvelope(Buffer.from(text), { contentType: 'text/plain', timestamp: 1 });

const bodies = (deliveries: Delivery[]) => deliveries.map((d) => d.envelope.body.toString());

describe('MemoryBroker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('routing', () => {
    it('should route the default exchange by queue name', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const received: Delivery[] = [];

      await connection.declareQueue({ name: 'sum', exclusive: false });
      await connection.consume('sum', (d) => received.push(d), { noAck: true });
      await connection.publish({ exchange: '', routingKey: 'sum' }, envelope('a'));
      await connection.publish({ exchange: '', routingKey: 'nobody' }, envelope('lost'));
      await flush();

      expect(bodies(received)).toEqual(['a']);
      expect(received[0].exchange).toBe('');
      expect(received[0].routingKey).toBe('sum');
    });

    it('should route topic exchanges by filter', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const all: Delivery[] = [];
      const temps: Delivery[] = [];

      const allQueue = await connection.declareQueue({ name: '', exclusive: true });
      const tempQueue = await connection.declareQueue({ name: '', exclusive: true });
      await connection.bindQueue(allQueue, 'amq.topic', 'sensors.#');
      await connection.bindQueue(tempQueue, 'amq.topic', 'sensors.temp');
      await connection.consume(allQueue, (d) => all.push(d), { noAck: true });
      await connection.consume(tempQueue, (d) => temps.push(d), { noAck: true });

      await connection.publish({ exchange: 'amq.topic', routingKey: 'sensors.temp' }, envelope('t'));
      await connection.publish({ exchange: 'amq.topic', routingKey: 'sensors.humidity' }, envelope('h'));
      await flush();

      expect(bodies(all)).toEqual(['t', 'h']);
      expect(bodies(temps)).toEqual(['t']);
      expect(allQueue.startsWith('amq.gen-')).toBe(true);
    });

    it('should route direct and fanout exchanges', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      await connection.declareQueue({ name: 'q1', exclusive: false });
      await connection.declareQueue({ name: 'q2', exclusive: false });
      await connection.bindQueue('q1', 'amq.direct', 'red');
      await connection.bindQueue('q1', 'amq.fanout', '');
      await connection.bindQueue('q2', 'amq.fanout', '');

      await connection.publish({ exchange: 'amq.direct', routingKey: 'red' }, envelope('d'));
      await connection.publish({ exchange: 'amq.direct', routingKey: 'blue' }, envelope('x'));
      await connection.publish({ exchange: 'amq.fanout', routingKey: 'ignored' }, envelope('f'));

      expect(broker.depth('q1')).toBe(2);
      expect(broker.depth('q2')).toBe(1);
    });

    it('should refuse bindings on the default exchange', async () => {
      const connection = new MemoryConnection(new MemoryBroker());
      await connection.declareQueue({ name: 'q', exclusive: false });

      await expect(connection.bindQueue('q', '', 'q')).rejects.toMatchObject({ code: 403 });
    });

    it('should reject an exchange redeclared with another kind', async () => {
      const connection = new MemoryConnection(new MemoryBroker());

      await expect(connection.declareExchange('amq.topic', 'fanout')).rejects.toBeInstanceOf(BrokerError);
      await connection.declareExchange('events', 'fanout');
      await expect(connection.declareExchange('events', 'fanout')).resolves.toBeUndefined();
    });

    it('should fail publishing to a missing exchange', async () => {
      const connection = new MemoryConnection(new MemoryBroker());

      await expect(connection.publish({ exchange: 'nope', routingKey: 'x' }, envelope('a'))).rejects.toThrow(
        "NOT_FOUND - no exchange 'nope'"
      );
    });
  });

  describe('queue limits', () => {
    it('should drop the oldest message on overflow', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const received: Delivery[] = [];
      await connection.declareQueue({ name: 'q', exclusive: false, maxLength: 2, overflow: 'drop-head' });

      for (const text of ['1', '2', '3']) {
        await connection.publish({ exchange: '', routingKey: 'q' }, envelope(text));
      }
      await connection.consume('q', (d) => received.push(d), { noAck: true });
      await flush();

      expect(bodies(received)).toEqual(['2', '3']);
    });

    it('should reject new messages with reject-publish', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const received: Delivery[] = [];
      await connection.declareQueue({ name: 'q', exclusive: false, maxLength: 2, overflow: 'reject-publish' });

      for (const text of ['1', '2', '3']) {
        await connection.publish({ exchange: '', routingKey: 'q' }, envelope(text));
      }
      await connection.consume('q', (d) => received.push(d), { noAck: true });
      await flush();

      expect(bodies(received)).toEqual(['1', '2']);
    });

    it('should expire messages past their TTL', async () => {
      let clock = 1_000;
      const broker = new MemoryBroker({ now: () => clock });
      const connection = new MemoryConnection(broker);
      await connection.declareQueue({ name: 'q', exclusive: false, messageTtl: 100 });

      await connection.publish({ exchange: '', routingKey: 'q' }, envelope('old'));
      clock = 1_050;
      await connection.publish({ exchange: '', routingKey: 'q' }, envelope('new'));
      clock = 1_120;

      expect(broker.depth('q')).toBe(1);
    });

    it('should delete a queue left idle past its expiry', async () => {
      vi.useFakeTimers();
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      await connection.declareQueue({ name: 'idle', exclusive: false, expires: 1_000 });

      vi.advanceTimersByTime(999);
      expect(broker.inspectQueue('idle').exists).toBe(true);
      vi.advanceTimersByTime(1);
      expect(broker.inspectQueue('idle').exists).toBe(false);
    });

    it('should not expire a queue while it has consumers', async () => {
      vi.useFakeTimers();
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      await connection.declareQueue({ name: 'busy', exclusive: false, expires: 1_000 });
      await connection.consume('busy', () => undefined, { noAck: true });

      vi.advanceTimersByTime(5_000);

      expect(broker.inspectQueue('busy')).toEqual({ exists: true, consumerCount: 1 });
    });
  });

  describe('consumers', () => {
    it('should stamp the broker arrival time', async () => {
      const broker = new MemoryBroker({ now: () => 5_000 });
      const connection = new MemoryConnection(broker);
      const received: Delivery[] = [];
      await connection.declareQueue({ name: 'q', exclusive: false });
      await connection.consume('q', (d) => received.push(d), { noAck: true });

      await connection.publish({ exchange: '', routingKey: 'q' }, envelope('a'));
      await flush();

      expect(received[0].brokerTimestamp).toBe(5_000);
      expect(received[0].envelope.properties.timestamp).toBe(1);
    });

    it('should hold back deliveries beyond the prefetch window until acked', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const received: Delivery[] = [];
      await connection.declareQueue({ name: 'q', exclusive: false });
      await connection.consume('q', (d) => received.push(d), { noAck: false, prefetch: 1 });

      await connection.publish({ exchange: '', routingKey: 'q' }, envelope('1'));
      await connection.publish({ exchange: '', routingKey: 'q' }, envelope('2'));
      await flush();
      expect(bodies(received)).toEqual(['1']);

      connection.ack(received[0].token);
      await flush();
      expect(bodies(received)).toEqual(['1', '2']);
    });

    it('should alternate between consumers of one queue', async () => {
      const broker = new MemoryBroker();
      const first = new MemoryConnection(broker);
      const second = new MemoryConnection(broker);
      const a: Delivery[] = [];
      const b: Delivery[] = [];
      await first.declareQueue({ name: 'work', exclusive: false });
      await first.consume('work', (d) => a.push(d), { noAck: true });
      await second.consume('work', (d) => b.push(d), { noAck: true });

      for (const text of ['1', '2', '3', '4']) {
        await first.publish({ exchange: '', routingKey: 'work' }, envelope(text));
      }
      await flush();

      expect(bodies(a)).toEqual(['1', '3']);
      expect(bodies(b)).toEqual(['2', '4']);
    });

    it('should requeue unacked messages when a consumer is cancelled', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const received: Delivery[] = [];
      await connection.declareQueue({ name: 'q', exclusive: false });
      const tag = await connection.consume('q', (d) => received.push(d), { noAck: false, prefetch: 1 });

      await connection.publish({ exchange: '', routingKey: 'q' }, envelope('1'));
      await flush();
      await connection.cancel(tag);

      expect(broker.depth('q')).toBe(1);
      expect(broker.inspectQueue('q').consumerCount).toBe(0);
    });

    it('should keep exclusive queues to their session', async () => {
      const broker = new MemoryBroker();
      const owner = new MemoryConnection(broker);
      const other = new MemoryConnection(broker);
      const name = await owner.declareQueue({ name: '', exclusive: true });

      await expect(other.consume(name, () => undefined, { noAck: true })).rejects.toMatchObject({ code: 405 });
      await expect(other.declareQueue({ name, exclusive: true })).rejects.toThrow('RESOURCE_LOCKED');

      await owner.close();
      expect(broker.inspectQueue(name).exists).toBe(false);
    });
  });

  describe('sessions', () => {
    it('should drop every session on pause and refuse new ones until resume', async () => {
      const broker = new MemoryBroker();
      const connection = new MemoryConnection(broker);
      const onError = vi.fn();
      connection.onError(onError);

      broker.pause('maintenance');

      expect(connection.isOpen()).toBe(false);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toMatchObject({ code: 'CONNECTION_ERROR:CLOSED', message: 'maintenance' });
      await expect(connection.publish({ exchange: '', routingKey: 'q' }, envelope('a'))).rejects.toMatchObject({
        code: 'CONNECTION_ERROR:NOT_CONNECTED',
      });
      expect(() => new MemoryConnection(broker)).toThrow(ConnectionError);

      broker.resume();
      expect(new MemoryConnection(broker).isOpen()).toBe(true);
    });
  });
});

describe('MemoryDriver', () => {
  it('should classify a paused broker as transient', async () => {
    const broker = new MemoryBroker();
    broker.pause();

    const outcome = await new MemoryDriver(broker).connect();

    expect(outcome.status).toBe('transient');
  });

  it('should freeze its reconnect settings', () => {
    const driver = new MemoryDriver(new MemoryBroker(), { reconnect: { attempts: 2 } });

    expect(driver.reconnect).toEqual({ attempts: 2, delayMs: 2_000, maxDelayMs: 60_000 });
    expect(Object.isFrozen(driver.reconnect)).toBe(true);
    expect(driver.describe()).toBe('memory://local');
  });
});
