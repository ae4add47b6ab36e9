export { RpcClient } from './rpc/RpcClient';
export type { RpcClientConfig, RpcResult, RawRpcResult } from './rpc/RpcClient';
export { Publisher } from './pubsub/Publisher';
export type { PublisherConfig } from './pubsub/Publisher';
