import { DEFAULT_CONTENT_ENCODING } from '../constants';
import { ValidationError } from '../types/Errors';

/**
 * Wire-level message properties. Every backend that can carry opaque
 * metadata must round-trip these unchanged.
 */
export interface EnvelopeProperties {
  contentType?: string;
  contentEncoding?: string;
  /** Producer-side time in ms since epoch */
  timestamp: number;
  correlationId?: string;
  replyTo?: string;
  messageId?: string;
  userId?: string;
  appId?: string;
  /** Backend-specific durability hint, opaque to relaykit */
  deliveryMode?: number;
}

/**
 * The unit exchanged between endpoints and transports
 */
export interface MessageEnvelope {
  body: Buffer;
  properties: EnvelopeProperties;
}

/**
 * Where a message is sent: an exchange plus routing key. With the default
 * exchange (`''`) the routing key is the destination queue.
 */
export interface Address {
  exchange: string;
  routingKey: string;
}

/**
 * Opaque delivery handle used to acknowledge a message
 */
export type DeliveryToken = number;

/**
 * Inbound message as handed over by a transport
 */
export interface Delivery {
  envelope: MessageEnvelope;
  /** Broker arrival time, delivered out of band */
  brokerTimestamp?: number;
  exchange: string;
  routingKey: string;
  token: DeliveryToken;
}

/**
 * Metadata passed to handlers next to the decoded payload
 */
export interface MessageMetadata {
  contentType?: string;
  contentEncoding: string;
  timestampProducer?: number;
  timestampBroker?: number;
  deliveryMode?: number;
  correlationId?: string;
  replyTo?: string;
  messageId?: string;
  userId?: string;
  appId?: string;
  exchange: string;
  routingKey: string;
}

/**
 * An undecoded message handed to raw handlers
 */
export interface InboundMessage {
  body: Buffer;
  /** Properties exactly as they arrived */
  properties: EnvelopeProperties;
  metadata: MessageMetadata;
}

/**
 * An already-encoded message to send. Routing properties (correlation id,
 * reply address) are owned by the sending endpoint and cannot be set here.
 */
export interface OutboundMessage {
  body: Buffer;
  contentType?: string;
  contentEncoding?: string;
  timestamp?: number;
  messageId?: string;
  appId?: string;
}

/**
 * Create an envelope, stamping the producer timestamp when absent.
 *
 * @throws {ValidationError} When only one of correlationId/replyTo is set
 */
export function createEnvelope(
  body: Buffer,
  properties: Partial<EnvelopeProperties> = {}
): MessageEnvelope {
  const hasCorrelation = properties.correlationId !== undefined;
  const hasReplyTo = properties.replyTo !== undefined;

  if (hasCorrelation !== hasReplyTo) {
    throw ValidationError.invalidEnvelope(
      'correlationId and replyTo must be present together or both absent',
      { correlationId: properties.correlationId, replyTo: properties.replyTo }
    );
  }

  return {
    body,
    properties: {
      ...properties,
      timestamp: properties.timestamp ?? Date.now(),
    },
  };
}

/**
 * Flatten a delivery into the metadata handlers see
 */
export function toMetadata(delivery: Delivery): MessageMetadata {
  const props = delivery.envelope.properties;

  return {
    contentType: props.contentType,
    contentEncoding: props.contentEncoding ?? DEFAULT_CONTENT_ENCODING,
    timestampProducer: props.timestamp,
    timestampBroker: delivery.brokerTimestamp,
    deliveryMode: props.deliveryMode,
    correlationId: props.correlationId,
    replyTo: props.replyTo,
    messageId: props.messageId,
    userId: props.userId,
    appId: props.appId,
    exchange: delivery.exchange,
    routingKey: delivery.routingKey,
  };
}

export function toInbound(delivery: Delivery): InboundMessage {
  return {
    body: delivery.envelope.body,
    properties: delivery.envelope.properties,
    metadata: toMetadata(delivery),
  };
}

/**
 * Turn an inbound message into the pass-through shape relayed by bridges.
 *
 * Body, content type, content encoding, producer timestamp, message id and
 * app id are kept as they arrived. Routing properties are dropped, and so
 * are `userId` (brokers check it against the publishing connection) and
 * `deliveryMode` (meaningful only to the backend that set it).
 */
export function toOutbound(message: InboundMessage): OutboundMessage {
  const props = message.properties;

  return {
    body: message.body,
    contentType: props.contentType,
    contentEncoding: props.contentEncoding,
    timestamp: props.timestamp,
    messageId: props.messageId,
    appId: props.appId,
  };
}
