/**
 * Example: RPC over the in-process broker
 *
 * A server sums a list of numbers; a client calls it once with a generous
 * timeout and once against an address nobody serves.
 */

import {
  ConsoleLogger,
  MemoryBroker,
  MemoryDriver,
  RpcClient,
  RpcServer,
  jsonPayload,
  withEndpoints,
} from '../src';

const logger = new ConsoleLogger('info');
const broker = new MemoryBroker();

const server = new RpcServer({ transport: new MemoryDriver(broker), logger }).bind('sum', (payload) => {
  if (payload.kind !== 'json' || !Array.isArray(payload.value)) {
    throw new Error('expected a list of numbers');
  }
  return jsonPayload(payload.value.reduce<number>((acc, n) => acc + Number(n), 0));
});

const client = new RpcClient({ transport: new MemoryDriver(broker), address: 'sum', logger });
const nobody = new RpcClient({ transport: new MemoryDriver(broker), address: 'nobody-home', logger });

async function main(): Promise<void> {
  await withEndpoints(
    [server, client, nobody],
    async () => {
      const result = await client.call(jsonPayload([1, 2, 3, 4]), 1000);
      console.log('sum:', result.status, result.payload, `${result.latencyMs}ms`);

      const missing = await nobody.call(jsonPayload([1]), 200);
      console.log('nobody-home:', missing.status, missing.payload);
    },
    logger
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
