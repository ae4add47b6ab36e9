import { CONTENT_TYPE, DEFAULT_CONTENT_ENCODING } from '../constants';
import { SerializationError, toError } from '../types/Errors';
import {
  bytesPayload,
  jsonPayload,
  textPayload,
  type JsonValue,
  type Payload,
  type PayloadKind,
} from './Payload';

/**
 * Serializer interface for message serialization
 */
export interface Serializer {
  readonly contentType: string;
  readonly contentEncoding: string;
  encode(payload: Payload): Buffer;
  decode(body: Buffer, encoding: BufferEncoding): Payload;
}

/**
 * Result of encoding a payload
 */
export interface EncodedPayload {
  body: Buffer;
  contentType: string;
  contentEncoding: string;
}

/**
 * Result of decoding a body. On failure `payload` holds the raw bytes and
 * `error` says why decoding was skipped.
 */
export interface DecodeResult {
  payload: Payload;
  error?: SerializationError;
  /** True when the content type was missing or unknown and the default codec ran */
  usedDefault: boolean;
}

/**
 * JSON serializer implementation
 */
export class JsonSerializer implements Serializer {
  readonly contentType = CONTENT_TYPE.JSON;
  readonly contentEncoding = DEFAULT_CONTENT_ENCODING;

  encode(payload: Payload): Buffer {
    if (payload.kind !== 'json') {
      throw new SerializationError(`JSON serializer cannot encode a ${payload.kind} payload`);
    }
    return Buffer.from(JSON.stringify(payload.value), this.contentEncoding);
  }

  decode(body: Buffer, encoding: BufferEncoding): Payload {
    const value: JsonValue = JSON.parse(body.toString(encoding));
    return jsonPayload(value);
  }
}

/**
 * Plain text serializer
 */
export class TextSerializer implements Serializer {
  readonly contentType = CONTENT_TYPE.TEXT;
  readonly contentEncoding = DEFAULT_CONTENT_ENCODING;

  encode(payload: Payload): Buffer {
    if (payload.kind !== 'text') {
      throw new SerializationError(`Text serializer cannot encode a ${payload.kind} payload`);
    }
    return Buffer.from(payload.value, this.contentEncoding);
  }

  decode(body: Buffer, encoding: BufferEncoding): Payload {
    return textPayload(body.toString(encoding));
  }
}

/**
 * Opaque bytes, passed through untouched
 */
export class RawSerializer implements Serializer {
  readonly contentType = CONTENT_TYPE.BYTES;
  readonly contentEncoding = DEFAULT_CONTENT_ENCODING;

  encode(payload: Payload): Buffer {
    if (payload.kind !== 'bytes') {
      throw new SerializationError(`Raw serializer cannot encode a ${payload.kind} payload`);
    }
    return payload.value;
  }

  decode(body: Buffer): Payload {
    return bytesPayload(body);
  }
}

/**
 * Maps content-type tags to serializers and payload kinds to content types.
 *
 * Bodies without a content type, or with one nobody registered, are decoded
 * with the default serializer (JSON unless configured otherwise).
 *
 * @example
 * ```typescript
 * const registry = new SerializerRegistry();
 * const encoded = registry.encode(jsonPayload({ a: 1 }));
 * // encoded.contentType === 'application/json'
 *
 * const { payload } = registry.decode(encoded.body, encoded.contentType);
 * ```
 */
export class SerializerRegistry {
  private serializers = new Map<string, Serializer>();
  private kinds: Record<PayloadKind, string> = {
    json: CONTENT_TYPE.JSON,
    text: CONTENT_TYPE.TEXT,
    bytes: CONTENT_TYPE.BYTES,
  };
  private defaultContentType: string = CONTENT_TYPE.JSON;

  constructor() {
    this.register(new JsonSerializer());
    this.register(new TextSerializer());
    this.register(new RawSerializer());
  }

  /**
   * Register (or replace) the serializer for its content type
   */
  register(serializer: Serializer): this {
    this.serializers.set(serializer.contentType, serializer);
    return this;
  }

  /**
   * Route outgoing payloads of `kind` to `contentType`
   */
  mapKind(kind: PayloadKind, contentType: string): this {
    if (!this.serializers.has(contentType)) {
      throw new SerializationError(`No serializer registered for ${contentType}`);
    }
    this.kinds[kind] = contentType;
    return this;
  }

  /**
   * Choose the serializer used when a body carries no usable content type
   */
  setDefault(contentType: string): this {
    if (!this.serializers.has(contentType)) {
      throw new SerializationError(`No serializer registered for ${contentType}`);
    }
    this.defaultContentType = contentType;
    return this;
  }

  has(contentType: string): boolean {
    return this.serializers.has(contentType);
  }

  /**
   * Encode a payload using the serializer mapped to its kind
   *
   * @throws {SerializationError} When the serializer rejects the payload
   */
  encode(payload: Payload): EncodedPayload {
    const serializer = this.lookup(this.kinds[payload.kind]);

    try {
      return {
        body: serializer.encode(payload),
        contentType: serializer.contentType,
        contentEncoding: serializer.contentEncoding,
      };
    } catch (error) {
      if (error instanceof SerializationError) throw error;
      throw new SerializationError(`Failed to encode ${payload.kind} payload`, {
        error: toError(error).message,
      });
    }
  }

  /**
   * Decode a body. Never throws: failures come back as raw bytes with an error.
   */
  decode(body: Buffer, contentType?: string, contentEncoding?: string): DecodeResult {
    const known = contentType !== undefined && this.serializers.has(contentType);
    const serializer = this.lookup(known ? contentType : this.defaultContentType);
    const encoding = contentEncoding ?? DEFAULT_CONTENT_ENCODING;

    if (!Buffer.isEncoding(encoding)) {
      return {
        payload: bytesPayload(body),
        usedDefault: !known,
        error: new SerializationError(`Unsupported content encoding: ${encoding}`, {
          contentType,
          contentEncoding: encoding,
        }),
      };
    }

    try {
      return { payload: serializer.decode(body, encoding), usedDefault: !known };
    } catch (error) {
      return {
        payload: bytesPayload(body),
        usedDefault: !known,
        error: new SerializationError(`Could not deserialize ${serializer.contentType} body`, {
          contentType,
          contentEncoding: encoding,
          error: toError(error).message,
        }),
      };
    }
  }

  private lookup(contentType: string): Serializer {
    const serializer = this.serializers.get(contentType);
    if (!serializer) {
      throw new SerializationError(`No serializer registered for ${contentType}`);
    }
    return serializer;
  }
}
