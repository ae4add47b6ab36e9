/**
 * relaykit core - endpoint lifecycle, messages, transports and shared utilities
 */

// Constants
export {
  TIME,
  LIMITS,
  CONTENT_TYPE,
  DEFAULT_CONTENT_ENCODING,
  EXCHANGE_KIND,
  EXCHANGE,
  OVERFLOW,
  DIRECT_REPLY_TO,
  BROKER_TIMESTAMP_HEADER,
  RPC_TIMEOUT_MESSAGE,
} from './constants';

// Messages
export * from './message';

// Transport contract
export type {
  BackendKind,
  ExchangeKind,
  OverflowPolicy,
  QueueSpec,
  QueueOptions,
  QueueInfo,
  ConsumeOptions,
  DeliveryCallback,
  TransportConnection,
  ConnectOutcome,
  ReconnectSettings,
  TransportDriver,
} from './transport/Transport';
export { connectWithRetry } from './transport/connect';

// Endpoint lifecycle
export { Endpoint, resolveQueueOptions } from './endpoint/Endpoint';
export type { EndpointConfig, EndpointState, Stoppable } from './endpoint/Endpoint';
export { withEndpoints, stopAll, stopOnSignals } from './lifecycle/scope';
export type { Startable } from './lifecycle/scope';

// Retry Policy
export { RetryPolicy } from './retry/RetryPolicy';
export type { RetryConfig, Attempt } from './retry/RetryPolicy';

// Metrics
export { MetricsCollector, METRIC, DEFAULT_BUCKETS } from './metrics/MetricsCollector';
export type { MetricType, Labels } from './metrics/MetricsCollector';
export { RateEstimator } from './metrics/RateEstimator';
export type { RateEstimatorOptions } from './metrics/RateEstimator';

// Utilities
export { SerialQueue } from './utils/SerialQueue';
export { topicMatches } from './utils/topicMatch';

// Logging
export type { Logger, LogContext, LogLevel } from './types/Logger';
export {
  SilentLogger,
  ConsoleLogger,
  parseLogLevel,
  createLoggerFromEnv,
  scopedLogger,
} from './types/Logger';

// Errors
export {
  RelayError,
  ConnectionError,
  SerializationError,
  DuplicateBindingError,
  ValidationError,
  StateError,
  RetryExhaustedError,
  PublishError,
  BridgeError,
  toError,
  isTransientError,
} from './types/Errors';
export type { ErrorDetails } from './types/Errors';
