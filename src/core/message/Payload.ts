/**
 * Any value that survives a JSON round trip
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface JsonPayload {
  kind: 'json';
  value: JsonValue;
}

export interface TextPayload {
  kind: 'text';
  value: string;
}

export interface BytesPayload {
  kind: 'bytes';
  value: Buffer;
}

/**
 * Message body as seen by handlers and callers.
 *
 * The variant is chosen by the caller, so the content type of an outgoing
 * message is a function of `kind` alone.
 */
export type Payload = JsonPayload | TextPayload | BytesPayload;

export type PayloadKind = Payload['kind'];

export const jsonPayload = (value: JsonValue): JsonPayload => ({ kind: 'json', value });

export const textPayload = (value: string): TextPayload => ({ kind: 'text', value });

export const bytesPayload = (value: Buffer): BytesPayload => ({ kind: 'bytes', value });

/**
 * Structured error body returned by RPC servers and timed-out clients
 */
export const errorPayload = (error: string, status?: number): JsonPayload =>
  jsonPayload(status === undefined ? { error } : { error, status });

/**
 * Narrow a json payload value to a plain object
 */
export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
