/**
 * Structured details attached to an error for logging and diagnostics
 */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all relaykit errors
 */
export class RelayError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Connection-related errors.
 * - ConnectionError.failed() - A single connect attempt failed
 * - ConnectionError.closed() - Connection closed unexpectedly
 * - ConnectionError.auth() - Credentials were refused by the broker
 * - ConnectionError.timeout() - Socket or blocked-connection timeout
 * - ConnectionError.retriesExhausted() - Bounded reconnect loop gave up
 * - ConnectionError.notConnected() - Operation needs an open connection
 */
export class ConnectionError extends RelayError {
  private constructor(message: string, code: string, details?: ErrorDetails) {
    super(message, code, details);
  }

  static failed(message: string, details?: ErrorDetails): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:FAILED', details);
  }

  static closed(message: string, details?: ErrorDetails): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:CLOSED', details);
  }

  static auth(message: string, details?: ErrorDetails): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:AUTH', details);
  }

  static timeout(message: string, details?: ErrorDetails): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:TIMEOUT', details);
  }

  static retriesExhausted(message: string, details?: ErrorDetails): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:RETRIES_EXHAUSTED', details);
  }

  static notConnected(message: string, details?: ErrorDetails): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:NOT_CONNECTED', details);
  }
}

/**
 * Payload could not be encoded or decoded under its content type
 */
export class SerializationError extends RelayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SERIALIZATION_ERROR', details);
  }
}

/**
 * An RPC address is already served by another server instance
 */
export class DuplicateBindingError extends RelayError {
  constructor(address: string, details?: ErrorDetails) {
    super(`RPC <${address}> is already bound on the broker`, 'DUPLICATE_BINDING', {
      address,
      ...details,
    });
  }
}

/**
 * Validation errors.
 * - ValidationError.addressRequired() - Address/topic is required
 * - ValidationError.handlerRequired() - Handler is required/missing
 * - ValidationError.invalidEnvelope() - Envelope breaks a structural rule
 * - ValidationError.invalidConfig() - Invalid configuration
 */
export class ValidationError extends RelayError {
  private constructor(message: string, code: string, details?: ErrorDetails) {
    super(message, code, details);
  }

  static addressRequired(message: string, details?: ErrorDetails): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:ADDRESS_REQUIRED', details);
  }

  static handlerRequired(message: string, details?: ErrorDetails): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:HANDLER_REQUIRED', details);
  }

  static invalidEnvelope(message: string, details?: ErrorDetails): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:INVALID_ENVELOPE', details);
  }

  static invalidConfig(message: string, details?: ErrorDetails): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:INVALID_CONFIG', details);
  }
}

/**
 * State-related errors
 * Used when operations are attempted on objects in invalid states
 * (e.g., binding after start, or a second concurrent RPC call on one client)
 */
export class StateError extends RelayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'STATE_ERROR', details);
  }
}

/**
 * Retry exhausted errors
 * Used when all retry attempts have been exhausted
 */
export class RetryExhaustedError extends RelayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'RETRY_EXHAUSTED_ERROR', details);
  }
}

/**
 * Publish-related errors
 * - PublishError.publishFailed() - Failed to hand a message to the broker
 */
export class PublishError extends RelayError {
  private constructor(message: string, code: string, details?: ErrorDetails) {
    super(message, code, details);
  }

  static publishFailed(message: string, details?: ErrorDetails): PublishError {
    return new PublishError(message, 'PUBLISH_ERROR:PUBLISH_FAILED', details);
  }
}

/**
 * A bridge could not enter the relaying state
 */
export class BridgeError extends RelayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'BRIDGE_ERROR', details);
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

/**
 * Heuristic used by drivers to classify library errors as transient.
 */
export function isTransientError(error: Error): boolean {
  if (error instanceof ConnectionError) {
    return error.code !== 'CONNECTION_ERROR:AUTH';
  }

  const msg = error.message || '';
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';

  if (/ACCESS_REFUSED|ACCESS-REFUSED|403/.test(msg)) {
    return false;
  }

  const transientPatterns: Array<RegExp> = [
    /timeout/i,
    /ECONNREFUSED/,
    /ECONNRESET/,
    /ETIMEDOUT/,
    /ENOTFOUND/,
    /EHOSTUNREACH/,
    /EAI_AGAIN/,
    /503/,
    /socket closed/i,
    /connection/i,
  ];

  return transientPatterns.some((p) => p.test(msg) || p.test(code) || p.test(error.name));
}
