import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RpcClient } from '../../src/client/rpc/RpcClient';
import { RpcServer } from '../../src/server/rpc/RpcServer';
import { MemoryBroker } from '../../src/transports/memory/MemoryBroker';
import { MemoryConnection, MemoryDriver } from '../../src/transports/memory/MemoryTransport';
import { METRIC, MetricsCollector } from '../../src/core/metrics/MetricsCollector';
import { createEnvelope } from '../../src/core/message/Envelope';
import { jsonPayload, type Payload } from '../../src/core/message/Payload';
import { StateError, ValidationError } from '../../src/core/types/Errors';
import type { TransportDriver } from '../../src/core/transport/Transport';
import { sleep } from '../helpers/memory';

const double = async (payload: Payload): Promise<Payload> => {
  if (payload.kind !== 'json' || typeof payload.value !== 'number') {
    throw new Error('expected a number');
  }
  await sleep(2);
  return jsonPayload(payload.value * 2);
};

describe('RpcClient', () => {
  let broker: MemoryBroker;
  let metrics: MetricsCollector;
  let client: RpcClient;

  beforeEach(() => {
    broker = new MemoryBroker();
    metrics = new MetricsCollector();
    client = new RpcClient({ transport: new MemoryDriver(broker), address: 'double', metrics });
  });

  afterEach(async () => {
    await client.stop();
  });

  it('should require an address', () => {
    expect(() => new RpcClient({ transport: new MemoryDriver(broker), address: '' })).toThrow(ValidationError);
  });

  it('should give every client its own reply', async () => {
    const server = new RpcServer({ transport: new MemoryDriver(broker), metrics });
    await server.bind('double', double).start();
    const clients = [1, 2, 3, 4, 5].map(
      () => new RpcClient({ transport: new MemoryDriver(broker), address: 'double', metrics })
    );

    const results = await Promise.all(clients.map((c, i) => c.call(jsonPayload(i + 1), 2_000)));

    expect(results.map((r) => r.payload)).toEqual([2, 4, 6, 8, 10].map((n) => jsonPayload(n)));
    for (const c of clients) await c.stop();
    await server.stop();
  });

  it('should resolve with a timeout result when nobody answers', async () => {
    const result = await client.call(jsonPayload(1), 200);

    expect(result.status).toBe('timeout');
    expect(result.payload).toEqual({ kind: 'json', value: { error: 'RPC Response timeout' } });
    expect(result.latencyMs).toBeGreaterThanOrEqual(190);
    expect(result.latencyMs).toBeLessThan(1_000);
    expect(metrics.getValue(METRIC.RPC_CLIENT_CALLS, { address: 'double', status: 'timeout' })).toBe(1);
    expect(metrics.getValue(METRIC.RPC_CLIENT_DURATION, { address: 'double', status: 'timeout' })).toBe(1);
  });

  it('should refuse a second call while one is in flight', async () => {
    const first = client.call(jsonPayload(1), 50);

    await expect(client.call(jsonPayload(2), 50)).rejects.toBeInstanceOf(StateError);
    await expect(first).resolves.toMatchObject({ status: 'timeout' });

    // The client is usable again afterwards
    await expect(client.call(jsonPayload(3), 50)).resolves.toMatchObject({ status: 'timeout' });
  });

  it('should ignore replies meant for other calls', async () => {
    const responder = new MemoryConnection(broker);
    await responder.declareQueue({ name: 'double', exclusive: false });
    await responder.consume(
      'double',
      (delivery) => {
        const { correlationId, replyTo } = delivery.envelope.properties;
        if (!correlationId || !replyTo) return;
        const reply = (body: string, id: string) =>
          responder.publish(
            { exchange: '', routingKey: replyTo },
            createEnvelope(Buffer.from(body), { contentType: 'application/json', correlationId: id, replyTo })
          );
        void reply('"stale"', 'some-other-call').then(() => reply('"fresh"', correlationId));
      },
      { noAck: true }
    );

    const result = await client.call(jsonPayload(1), 1_000);

    expect(result.payload).toEqual(jsonPayload('fresh'));
    await responder.close();
  });

  it('should track the latency of completed calls only', async () => {
    const server = new RpcServer({ transport: new MemoryDriver(broker), metrics });
    await server
      .bind('double', async (payload) => {
        await sleep(20);
        return payload;
      })
      .start();

    await client.call(jsonPayload(1));
    const firstDelay = client.delay;
    expect(firstDelay).toBeGreaterThanOrEqual(15);
    expect(client.meanDelay).toBe(firstDelay);

    await server.stop();
    await client.call(jsonPayload(2), 50);

    expect(client.delay).toBe(firstDelay);
    expect(client.meanDelay).toBe(firstDelay);
  });

  it('should pass raw bodies through forward()', async () => {
    const server = new RpcServer({ transport: new MemoryDriver(broker), metrics });
    await server
      .bindRaw('double', (message) => ({ body: message.body, contentType: message.properties.contentType }))
      .start();

    const result = await client.forward({ body: Buffer.from('as-is'), contentType: 'application/x-custom' });

    expect(result.status).toBe('ok');
    if (result.status === 'ok') {
      expect(result.message.body.toString()).toBe('as-is');
      expect(result.message.metadata.contentType).toBe('application/x-custom');
    }
    await server.stop();
  });

  it('should not send a request whose call timed out while connecting', async () => {
    const watcher = new MemoryConnection(broker);
    await watcher.declareQueue({ name: 'double', exclusive: false });
    const inner = new MemoryDriver(broker);
    const slow: TransportDriver = {
      backend: 'memory',
      reconnect: inner.reconnect,
      describe: () => inner.describe(),
      connect: async () => {
        await sleep(100);
        return inner.connect();
      },
    };
    const late = new RpcClient({ transport: slow, address: 'double', metrics });

    const result = await late.call(jsonPayload(1), 20);

    expect(result.status).toBe('timeout');
    expect(late.isRunning).toBe(true);
    expect(broker.depth('double')).toBe(0);
    await late.stop();
    await watcher.close();
  });

  it('should settle an in-flight call as a timeout when stopped', async () => {
    await client.start();
    const pending = client.call(jsonPayload(1), 5_000);

    await client.stop();

    await expect(pending).resolves.toMatchObject({ status: 'timeout' });
    expect(client.state).toBe('stopped');
  });
});
