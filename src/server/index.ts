export { RpcServer } from './rpc/RpcServer';
export type { RpcServerConfig, RpcHandler, RawRpcHandler } from './rpc/RpcServer';
export { Subscriber } from './pubsub/Subscriber';
export type { SubscriberConfig, TopicHandler, RawTopicHandler } from './pubsub/Subscriber';
