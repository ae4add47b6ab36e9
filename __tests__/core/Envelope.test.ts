import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createEnvelope,
  toInbound,
  toMetadata,
  toOutbound,
  type Delivery,
} from '../../src/core/message/Envelope';
import { ValidationError } from '../../src/core/types/Errors';

const delivery = (overrides: Partial<Delivery> = {}): Delivery => ({
  envelope: {
    body: Buffer.from('{"t":21.5}'),
    properties: {
      contentType: 'application/json',
      timestamp: 1_700_000_000_000,
      messageId: 'm-1',
      userId: 'guest',
      appId: 'sensor-gw',
      deliveryMode: 2,
    },
  },
  brokerTimestamp: 1_700_000_000_250,
  exchange: 'amq.topic',
  routingKey: 'sensors.temp',
  token: 7,
  ...overrides,
});

describe('Envelope', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createEnvelope()', () => {
    it('should stamp the producer timestamp', () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);

      const envelope = createEnvelope(Buffer.from('x'));

      expect(envelope.properties.timestamp).toBe(1_700_000_000_000);
    });

    it('should keep an explicit timestamp', () => {
      expect(createEnvelope(Buffer.from('x'), { timestamp: 42 }).properties.timestamp).toBe(42);
    });

    it('should require correlationId and replyTo together', () => {
      expect(() => createEnvelope(Buffer.from('x'), { correlationId: 'c-1' })).toThrow(ValidationError);
      expect(() => createEnvelope(Buffer.from('x'), { replyTo: 'reply' })).toThrow(
        'correlationId and replyTo must be present together or both absent'
      );
      expect(createEnvelope(Buffer.from('x'), { correlationId: 'c-1', replyTo: 'reply' }).properties).toMatchObject(
        { correlationId: 'c-1', replyTo: 'reply' }
      );
    });
  });

  describe('toMetadata()', () => {
    it('should default the content encoding and carry the broker timestamp', () => {
      const metadata = toMetadata(delivery());

      expect(metadata.contentEncoding).toBe('utf8');
      expect(metadata.timestampProducer).toBe(1_700_000_000_000);
      expect(metadata.timestampBroker).toBe(1_700_000_000_250);
      expect(metadata.routingKey).toBe('sensors.temp');
      expect(metadata.exchange).toBe('amq.topic');
    });
  });

  describe('toOutbound()', () => {
    it('should keep content metadata and drop routing properties', () => {
      const inbound = toInbound(
        delivery({
          envelope: {
            body: Buffer.from('abc'),
            properties: {
              contentType: 'text/plain',
              contentEncoding: 'latin1',
              timestamp: 5,
              correlationId: 'c-1',
              replyTo: 'reply',
              messageId: 'm-2',
              userId: 'guest',
              appId: 'edge',
              deliveryMode: 2,
            },
          },
        })
      );

      expect(toOutbound(inbound)).toEqual({
        body: Buffer.from('abc'),
        contentType: 'text/plain',
        contentEncoding: 'latin1',
        timestamp: 5,
        messageId: 'm-2',
        appId: 'edge',
      });
    });

    it('should not invent a content encoding the sender left out', () => {
      expect(toOutbound(toInbound(delivery())).contentEncoding).toBeUndefined();
    });
  });
});
