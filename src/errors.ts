/**
 * Error kinds raised by the messaging layer.
 * Every error carries a stable `code` so callers can branch without instanceof chains.
 */

import type { CircuitState } from './types';

/**
 * Base class for all messaging errors.
 */
export class MessagingError extends Error {
  readonly code: string;

  constructor(message: string, code = 'MESSAGING_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Transport-level failure. Potentially transient.
 */
export class ConnectionFailureError extends MessagingError {
  constructor(message: string, options?: { cause?: unknown }, code = 'CONNECTION_FAILURE') {
    super(message, code, options);
  }
}

/**
 * The broker connection was closed underneath us.
 */
export class ConnectionClosedError extends ConnectionFailureError {
  constructor(message = 'Connection closed', options?: { cause?: unknown }) {
    super(message, options, 'CONNECTION_CLOSED');
  }
}

/**
 * The channel was closed (by the broker or because its connection died).
 */
export class ChannelClosedError extends ConnectionFailureError {
  constructor(message = 'Channel closed', options?: { cause?: unknown }) {
    super(message, options, 'CHANNEL_CLOSED');
  }
}

/**
 * Raised by a circuit breaker that refuses to run the operation.
 */
export class CircuitOpenError extends MessagingError {
  readonly circuit: string;
  readonly state: CircuitState;

  constructor(circuit: string, state: CircuitState) {
    super(`Circuit ${circuit} is OPEN`, 'CIRCUIT_OPEN');
    this.circuit = circuit;
    this.state = state;
  }
}

export class SchemaNotFoundError extends MessagingError {
  readonly schema: string;

  constructor(schema: string) {
    super(`Schema '${schema}' not found`, 'SCHEMA_NOT_FOUND');
    this.schema = schema;
  }
}

/**
 * Field-level validation failure. Messages failing validation are never requeued.
 */
export class MessageValidationError extends MessagingError {
  readonly errors: Record<string, string[]>;

  constructor(errors: Record<string, string[]>, message = 'Message validation failed') {
    super(message, 'MESSAGE_VALIDATION_FAILED');
    this.errors = errors;
  }
}

export class SerializationError extends MessagingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SERIALIZATION_ERROR', options);
  }
}

/**
 * A publish reported failure through its return value.
 */
export class PublishFailedError extends MessagingError {
  readonly routingKey: string;

  constructor(routingKey: string) {
    super(`Failed to publish message to ${routingKey}`, 'PUBLISH_FAILED');
    this.routingKey = routingKey;
  }
}

export class QueueConfigurationError extends MessagingError {
  constructor(message: string) {
    super(message, 'QUEUE_CONFIGURATION');
  }
}

/**
 * Normalizes an unknown thrown value to an Error.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
