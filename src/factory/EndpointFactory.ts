import type { TransportDriver } from '../core';
import { Publisher, type PublisherConfig } from '../client/pubsub/Publisher';
import { RpcClient, type RpcClientConfig } from '../client/rpc/RpcClient';
import { RpcServer, type RpcServerConfig } from '../server/rpc/RpcServer';
import { Subscriber, type SubscriberConfig } from '../server/pubsub/Subscriber';
import { type BackendDescriptor, createTransport } from '../transports';

/**
 * Endpoint classes and their configuration, keyed by endpoint kind
 */
export interface EndpointRegistry {
  'rpc-server': { endpoint: RpcServer; config: RpcServerConfig };
  'rpc-client': { endpoint: RpcClient; config: RpcClientConfig };
  publisher: { endpoint: Publisher; config: PublisherConfig };
  subscriber: { endpoint: Subscriber; config: SubscriberConfig };
}

export type EndpointKind = keyof EndpointRegistry;

/**
 * Endpoint configuration without the transport, which the factory supplies
 */
export type EndpointOptions<K extends EndpointKind> = Omit<EndpointRegistry[K]['config'], 'transport'>;

const CONSTRUCTORS: {
  [K in EndpointKind]: (
    options: EndpointOptions<K>,
    transport: TransportDriver
  ) => EndpointRegistry[K]['endpoint'];
} = {
  'rpc-server': (options, transport) => new RpcServer({ ...options, transport }),
  'rpc-client': (options, transport) => new RpcClient({ ...options, transport }),
  publisher: (options, transport) => new Publisher({ ...options, transport }),
  subscriber: (options, transport) => new Subscriber({ ...options, transport }),
};

/**
 * Build an endpoint of `kind` on a backend, given as a descriptor or a ready driver
 *
 * @example
 * ```typescript
 * const broker = new MemoryBroker();
 * const server = createEndpoint('rpc-server', { kind: 'memory', broker }, { address: 'sum' });
 * const client = createEndpoint('rpc-client', { kind: 'memory', broker }, { address: 'sum', timeout: 1000 });
 * ```
 */
export function createEndpoint<K extends EndpointKind>(
  kind: K,
  backend: BackendDescriptor | TransportDriver,
  options: EndpointOptions<K>
): EndpointRegistry[K]['endpoint'] {
  const transport = 'connect' in backend ? backend : createTransport(backend);
  return CONSTRUCTORS[kind](options, transport);
}
