/**
 * Resilient messaging over RabbitMQ.
 *
 * Publishing goes through a circuit breaker and a retry policy; consumers reconnect
 * with doubling delays and replay their queue setup when the broker connection drops.
 *
 * @example
 * ```typescript
 * import { createMessagingService } from 'resilient-amqp';
 *
 * // Configuration is read from RABBITMQ_* environment variables
 * const messaging = createMessagingService();
 *
 * // Publish to the default exchange
 * await messaging.publish('order.created', { order_id: 1 });
 *
 * // Route rejected messages to a dead letter queue
 * await messaging.setupQueue('orders', { bindingKeys: ['order.*'] });
 * await messaging.setupDeadLetterQueue('orders', 'orders.failed', ['order.failed']);
 *
 * // Consume until the channel closes; returning false leaves the message unacknowledged
 * await messaging.consume('orders', async (data, delivery) => {
 *   console.log(delivery.fields.routingKey, data);
 * });
 * ```
 */

// Core exports
export { MessagingService, createMessagingService, PUBLISHER_CIRCUIT } from './service';
export { ConnectionManager } from './connection-manager';
export { Publisher } from './publisher';
export { Consumer, decodeJsonBody } from './consumer';
export { EventPublisher, EventConsumer, deriveRoutingKey, matchesRoutingPattern } from './events';

// Resilience
export { RetryPolicy } from './retry-policy';
export { CircuitBreaker } from './circuit-breaker';

// Transport
export { BrokerConnection, BrokerChannel, openConnection, buildConnectArguments } from './connection';
export { exchangeBinding, declareExchange, deadLetterExchangeName } from './exchange';
export { buildQueueArguments, configuredQueue, declareAndBindQueue } from './queue';

// Serialization, validation, telemetry
export {
  JsonSerializer,
  MessagePackSerializer,
  createSerializer,
  isSerializationFormat,
  SERIALIZATION_HEADER,
} from './serializers';
export { ZodMessageValidator } from './validator';
export { Telemetry } from './telemetry';

// Configuration and logging
export { configSchema, loadConfig, resolveConfig } from './config';
export { createLogger, silentLogger } from './logger';

// Errors
export {
  MessagingError,
  ConnectionFailureError,
  ConnectionClosedError,
  ChannelClosedError,
  CircuitOpenError,
  SchemaNotFoundError,
  MessageValidationError,
  SerializationError,
  PublishFailedError,
  QueueConfigurationError,
} from './errors';

// Types
export type { PublishOptions, ServiceConsumeOptions, MessagingServiceOptions, CreateMessagingServiceOptions } from './service';
export type { ConnectionManagerOptions, ConnectionFactory } from './connection-manager';
export type { PublisherOptions } from './publisher';
export type { ConsumerOptions } from './consumer';
export type { EventMetadata, EventPayload, EventBridgeOptions } from './events';
export type { RetryPolicyOptions, RetryCallback, ErrorClass } from './retry-policy';
export type { Clock } from './circuit-breaker';
export type { ChannelOptions, Connect, ConnectArguments } from './connection';
export type { ExchangeSpec } from './exchange';
export type { QueueArgumentSpec } from './queue';
export type { SerializationFormat, Serializer } from './serializers';
export type { MessageValidator, ValidationErrors } from './validator';
export type { OperationMetrics, OperationTimer } from './telemetry';
export type {
  MessagingConfig,
  MessagingConfigInput,
  ConnectionConfig,
  ExchangeConfig,
  ResilienceConfig,
  ConsumerConfig,
  PublisherConfig,
  PredefinedQueueConfig,
} from './config';
export type { Logger, LogContext, LoggerOptions } from './logger';
export type {
  ExchangeType,
  CircuitState,
  ExchangeBinding,
  QueueArguments,
  QueueDeclareOptions,
  QueueSetupOptions,
  QueueInfo,
  ConfiguredQueue,
  PredefinedQueue,
  MessageHeaders,
  MessageProperties,
  Envelope,
  BatchMessage,
  Delivery,
  DeliveryHandler,
  MessageCallback,
  BodyDecoder,
  ConsumeOptions,
  AmqpChannel,
  AmqpConnection,
  ConnectionProvider,
  RawConnection,
  RawChannel,
} from './types';
