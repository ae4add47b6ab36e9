export { Bridge, toDriver } from './Bridge';
export type { BridgeConfig, BridgeState } from './Bridge';
export { TopicBridge } from './TopicBridge';
export type { TopicBridgeConfig } from './TopicBridge';
export { RpcBridge } from './RpcBridge';
export type { RpcBridgeConfig } from './RpcBridge';
