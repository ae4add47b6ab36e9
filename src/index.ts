/**
 * relaykit - RPC and publish/subscribe over interchangeable broker backends,
 * with bridges relaying traffic between two backends.
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Messages, Lifecycle, Retry Logic, Metrics, Errors
// ============================================================================

/**
 * Payloads, envelopes and content-type negotiation
 */
export {
  jsonPayload,
  textPayload,
  bytesPayload,
  errorPayload,
  isJsonObject,
  createEnvelope,
  toMetadata,
  toInbound,
  toOutbound,
  SerializerRegistry,
  JsonSerializer,
  TextSerializer,
  RawSerializer,
  CONTENT_TYPE,
  EXCHANGE,
  EXCHANGE_KIND,
  TIME,
  LIMITS,
} from './core';

export type {
  JsonValue,
  Payload,
  PayloadKind,
  JsonPayload,
  TextPayload,
  BytesPayload,
  MessageEnvelope,
  EnvelopeProperties,
  MessageMetadata,
  InboundMessage,
  OutboundMessage,
  Address,
  Delivery,
  Serializer,
  EncodedPayload,
  DecodeResult,
} from './core';

/**
 * Endpoint lifecycle and scoped teardown
 */
export { Endpoint, withEndpoints, stopAll, stopOnSignals, connectWithRetry, RetryPolicy } from './core';
export type {
  EndpointConfig,
  EndpointState,
  Stoppable,
  Startable,
  RetryConfig,
  BackendKind,
  ExchangeKind,
  QueueSpec,
  QueueOptions,
  QueueInfo,
  ConnectOutcome,
  TransportConnection,
  TransportDriver,
} from './core';

/**
 * Logging, metrics and errors
 */
export {
  SilentLogger,
  ConsoleLogger,
  createLoggerFromEnv,
  parseLogLevel,
  MetricsCollector,
  METRIC,
  RateEstimator,
  RelayError,
  ConnectionError,
  SerializationError,
  DuplicateBindingError,
  ValidationError,
  StateError,
  RetryExhaustedError,
  PublishError,
  BridgeError,
  isTransientError,
} from './core';
export type { Logger, LogLevel, LogContext } from './core';

// ============================================================================
// TRANSPORTS - AMQP and in-process backends
// ============================================================================

export {
  createTransport,
  AmqpDriver,
  MemoryBroker,
  MemoryDriver,
  parseConnectionUrl,
  connectionParametersFromEnv,
  DEFAULT_CONNECTION_PARAMETERS,
} from './transports';
export type { BackendDescriptor, ConnectionParameters } from './transports';

// ============================================================================
// CLIENT - RPC Client & Publisher
// ============================================================================

export { RpcClient, Publisher } from './client';
export type { RpcClientConfig, RpcResult, RawRpcResult, PublisherConfig } from './client';

// ============================================================================
// SERVER - RPC Server & Subscriber
// ============================================================================

export { RpcServer, Subscriber } from './server';
export type {
  RpcServerConfig,
  RpcHandler,
  RawRpcHandler,
  SubscriberConfig,
  TopicHandler,
  RawTopicHandler,
} from './server';

// ============================================================================
// FACTORY & BRIDGES
// ============================================================================

export { createEndpoint } from './factory/EndpointFactory';
export type { EndpointKind, EndpointOptions, EndpointRegistry } from './factory/EndpointFactory';

export { TopicBridge, RpcBridge } from './bridge';
export type { BridgeConfig, BridgeState, TopicBridgeConfig, RpcBridgeConfig } from './bridge';
