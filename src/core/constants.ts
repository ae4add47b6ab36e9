/**
 * Centralized constants for relaykit
 *
 * This file contains all magic numbers and string constants used throughout the library.
 */

/**
 * Time intervals in milliseconds
 */
export const TIME = {
  /**
   * Default timeout for RPC calls (5 seconds)
   */
  DEFAULT_RPC_TIMEOUT_MS: 5_000,

  /**
   * Base delay between connection attempts (2 seconds)
   */
  CONNECTION_RETRY_DELAY_MS: 2_000,

  /**
   * Maximum delay between connection attempts (60 seconds)
   */
  CONNECTION_RETRY_MAX_DELAY_MS: 60_000,

  /**
   * Socket connection timeout (120 seconds)
   */
  SOCKET_TIMEOUT_MS: 120_000,

  /**
   * Default per-queue message TTL (60 seconds)
   */
  MESSAGE_TTL_MS: 60_000,

  /**
   * Idle expiry for RPC request queues (10 minutes)
   */
  RPC_QUEUE_EXPIRES_MS: 600_000,

  /**
   * Idle expiry for topic subscription queues (5 minutes)
   */
  TOPIC_QUEUE_EXPIRES_MS: 300_000,

  /**
   * Inter-arrival gap below which a delivery counts as a burst duplicate
   */
  RATE_BURST_THRESHOLD_MS: 10,
} as const;

/**
 * Size limits and capacity constraints
 */
export const LIMITS = {
  /**
   * Default prefetch for RPC servers (one outstanding request)
   */
  RPC_SERVER_DEFAULT_PREFETCH: 1,

  /**
   * Default queue depth
   */
  QUEUE_MAX_LENGTH: 10,

  /**
   * Connection attempts before giving up
   */
  MAX_CONNECTION_ATTEMPTS: 5,

  /**
   * Heartbeat interval in seconds
   */
  HEARTBEAT_SECONDS: 60,

  /**
   * Channel concurrency cap per connection
   */
  CHANNEL_MAX: 128,

  /**
   * Samples kept by the subscriber arrival-rate estimator
   */
  RATE_WINDOW_SAMPLES: 100,
} as const;

/**
 * Content type tags understood by the default serializer registry
 */
export const CONTENT_TYPE = {
  JSON: 'application/json',
  TEXT: 'text/plain',
  BYTES: 'application/octet-stream',
} as const;

/**
 * Content encoding used when a message does not declare one
 */
export const DEFAULT_CONTENT_ENCODING = 'utf8';

/**
 * Exchange kind constants. `default` means no exchange indirection:
 * the routing key is the queue name.
 */
export const EXCHANGE_KIND = {
  TOPIC: 'topic',
  DIRECT: 'direct',
  FANOUT: 'fanout',
  DEFAULT: 'default',
} as const;

/**
 * Well-known exchange names
 */
export const EXCHANGE = {
  DEFAULT: '',
  TOPIC: 'amq.topic',
  DIRECT: 'amq.direct',
  FANOUT: 'amq.fanout',
} as const;

/**
 * Queue overflow policies
 */
export const OVERFLOW = {
  DROP_HEAD: 'drop-head',
  REJECT_PUBLISH: 'reject-publish',
} as const;

/**
 * RabbitMQ pseudo-queue used for direct reply-to
 */
export const DIRECT_REPLY_TO = 'amq.rabbitmq.reply-to';

/**
 * Header carrying the broker arrival time (rabbitmq_message_timestamp plugin)
 */
export const BROKER_TIMESTAMP_HEADER = 'timestamp_in_ms';

/**
 * Error text of the timeout result returned by RPC clients
 */
export const RPC_TIMEOUT_MESSAGE = 'RPC Response timeout';
