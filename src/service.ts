/**
 * Messaging façade.
 * Publishes through a circuit breaker and a retry policy, and wraps consumer callbacks
 * with telemetry, message IDs, body format detection and validation-aware rejection.
 */

import { CircuitBreaker } from './circuit-breaker';
import { loadConfig, resolveConfig, type MessagingConfig, type MessagingConfigInput } from './config';
import { ConnectionManager, type ConnectionFactory } from './connection-manager';
import { Consumer } from './consumer';
import {
  CircuitOpenError,
  MessageValidationError,
  PublishFailedError,
  QueueConfigurationError,
  toError,
} from './errors';
import { declareExchange, deadLetterExchangeName, exchangeBinding } from './exchange';
import { createLogger, type LogContext, type Logger } from './logger';
import { Publisher } from './publisher';
import { buildQueueArguments } from './queue';
import { RetryPolicy } from './retry-policy';
import {
  createSerializer,
  isSerializationFormat,
  SERIALIZATION_HEADER,
  type SerializationFormat,
  type Serializer,
} from './serializers';
import { Telemetry, type OperationTimer } from './telemetry';
import type {
  BatchMessage,
  BodyDecoder,
  ConnectionProvider,
  ConsumeOptions,
  Delivery,
  MessageCallback,
  MessageProperties,
  PredefinedQueue,
  QueueInfo,
  QueueSetupOptions,
} from './types';
import type { MessageValidator } from './validator';

export interface PublishOptions extends MessageProperties {
  /** Name of the schema the payload must satisfy. */
  schema?: string;
}

export type ServiceConsumeOptions = Omit<ConsumeOptions, 'decode'>;

export interface MessagingServiceOptions {
  config?: MessagingConfig;
  validator?: MessageValidator;
  logger?: Logger;
  retryPolicy?: RetryPolicy;
  circuitBreaker?: CircuitBreaker;
  telemetry?: Telemetry;
}

interface BatchStats {
  total: number;
  processed: number;
  failed: number;
}

export const PUBLISHER_CIRCUIT = 'rabbitmq-publisher';

export class MessagingService {
  private connection: ConnectionProvider;
  private publisher: Publisher;
  private consumer: Consumer;
  private validator: MessageValidator | null;
  private config: MessagingConfig;
  private logger: Logger;
  private retryPolicy: RetryPolicy;
  private circuitBreaker: CircuitBreaker;
  private telemetry: Telemetry;
  private serializer: Serializer;

  constructor(
    connection: ConnectionProvider,
    publisher: Publisher,
    consumer: Consumer,
    options: MessagingServiceOptions = {}
  ) {
    this.connection = connection;
    this.publisher = publisher;
    this.consumer = consumer;
    this.validator = options.validator ?? null;
    this.config = options.config ?? resolveConfig();
    this.logger = options.logger ?? createLogger({ channel: this.config.logging.channel, debug: this.config.debug });

    const { resilience } = this.config;
    this.retryPolicy =
      options.retryPolicy ??
      new RetryPolicy({
        maxAttempts: resilience.maxAttempts,
        baseDelayMs: resilience.baseDelayMs,
        maxDelayMs: resilience.maxDelayMs,
        jitterFactor: resilience.jitterFactor,
        logger: this.logger,
      });
    this.circuitBreaker =
      options.circuitBreaker ??
      new CircuitBreaker(PUBLISHER_CIRCUIT, resilience.failureThreshold, resilience.resetTimeout, Date.now, this.logger);
    this.telemetry = options.telemetry ?? new Telemetry(this.logger);

    this.serializer = createSerializer(this.config.serialization.format);
    this.publisher.setSerializer(this.serializer);
  }

  /**
   * Publishes a message through the circuit breaker and the retry policy.
   *
   * @param options - Message properties, plus an optional schema to validate the payload against
   * @returns false when the message could not be published
   * @throws CircuitOpenError while the publisher circuit is open
   */
  async publish(routingKey: string, data: unknown, options: PublishOptions = {}): Promise<boolean> {
    const timer = this.telemetry.start('publish');
    const { schema, ...properties } = options;

    try {
      if (schema !== undefined && this.validator) {
        this.validateMessage(data, schema);
      }

      await this.circuitBreaker.execute(() =>
        this.retryPolicy.execute(async () => {
          if (! (await this.publisher.publish(routingKey, data, properties))) {
            throw new PublishFailedError(routingKey);
          }
          return true;
        })
      );
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        this.handlePublishError(error, routingKey, timer, { circuitState: this.circuitBreaker.getState() });
        throw error;
      }

      this.handlePublishError(toError(error), routingKey, timer);
      return false;
    }

    timer.success({ routingKey });
    return true;
  }

  /**
   * Publishes a domain event. The event name doubles as the routing key.
   * The body is `{ event, timestamp, payload }`; event headers describe the type and the body format.
   */
  async publishEvent(eventName: string, payload: unknown, options: PublishOptions = {}): Promise<boolean> {
    const format = this.serializer.format;

    try {
      return await this.publish(
        eventName,
        { event: eventName, timestamp: Date.now(), payload },
        {
          ...options,
          headers: {
            ...(options.headers ?? {}),
            event_type: eventName,
            content_type: `application/${format}`,
            [SERIALIZATION_HEADER]: format,
          },
        }
      );
    } catch (error) {
      this.logger.error(`Failed to publish event: ${toError(error).message}`, {
        event: eventName,
        error: toError(error).message,
      });
      return false;
    }
  }

  /**
   * Publishes messages one by one, in chunks of `publisher.batchSize`.
   * Each message goes through the full resilience stack; malformed entries count as failures.
   *
   * @returns true only when every message was published
   */
  async publishBatch(messages: readonly BatchMessage[]): Promise<boolean> {
    const timer = this.telemetry.start('publishBatch');
    const batchSize = this.config.publisher.batchSize;
    const stats: BatchStats = { total: messages.length, processed: 0, failed: 0 };

    try {
      for (let offset = 0, batchIndex = 0; offset < messages.length; offset += batchSize, batchIndex++) {
        for (const message of messages.slice(offset, offset + batchSize)) {
          if (! this.isValidBatchMessage(message)) {
            this.logger.error('Invalid message format for batch publishing', { message });
            stats.failed++;
            continue;
          }

          if (! (await this.publish(message.routingKey, message.data, message.properties ?? {}))) {
            stats.failed++;
          }
          stats.processed++;
        }

        if (stats.total > batchSize) {
          this.logger.info('Batch publishing progress', { batch: batchIndex + 1, ...stats });
        }
      }
    } catch (error) {
      timer.failure(toError(error), { totalMessages: stats.total });
      this.logger.error(`Failed to publish batch of messages: ${toError(error).message}`, {
        error: toError(error).message,
      });
      return false;
    }

    timer.success({
      totalMessages: stats.total,
      processedMessages: stats.processed,
      failedMessages: stats.failed,
    });

    return stats.failed === 0;
  }

  async setupQueue(queueName: string, options: QueueSetupOptions = {}): Promise<this> {
    await this.consumer.setupQueue(queueName, options);
    return this;
  }

  /**
   * Routes messages rejected from a queue to a dead letter queue.
   * Declares `<deadLetterQueue>.exchange` (topic), binds the dead letter queue to it,
   * and redeclares the source queue with dead-letter arguments.
   *
   * @param bindingKeys - Keys binding the dead letter queue; the first is also the dead-letter routing key
   */
  async setupDeadLetterQueue(sourceQueue: string, deadLetterQueue: string, bindingKeys: string[] = []): Promise<this> {
    const deadLetterExchange = deadLetterExchangeName(deadLetterQueue);
    const channel = await this.connection.getChannel();

    await declareExchange(channel, exchangeBinding(deadLetterExchange, { type: 'topic' }));

    await this.consumer.setupQueue(deadLetterQueue, {
      bindingKeys: bindingKeys.length > 0 ? bindingKeys : ['#'],
      exchange: deadLetterExchange,
    });

    const source = this.consumer.getQueueConfiguration(sourceQueue);
    await this.consumer.setupQueue(sourceQueue, {
      bindingKeys: source?.bindingKeys ?? [],
      durable: source?.durable ?? true,
      autoDelete: source?.autoDelete ?? false,
      exchange: source?.exchange,
      arguments: buildQueueArguments({
        arguments: source?.arguments,
        deadLetterExchange,
        deadLetterRoutingKey: bindingKeys[0] ?? sourceQueue,
      }),
    });

    return this;
  }

  /**
   * Sets up a queue from the `queues` configuration.
   *
   * @throws QueueConfigurationError for an unknown key
   */
  async setupPredefinedQueue(queueKey: string): Promise<this> {
    const queue = this.getPredefinedQueue(queueKey);
    await this.setupQueue(queue.name, queue);
    return this;
  }

  /**
   * Sets up a queue from the `queues` configuration and consumes from it.
   *
   * @throws QueueConfigurationError for an unknown key
   */
  async consumeFromPredefinedQueue(
    queueKey: string,
    callback: MessageCallback,
    options: Omit<ServiceConsumeOptions, 'bindingKeys'> = {}
  ): Promise<void> {
    const queue = this.getPredefinedQueue(queueKey);
    await this.setupPredefinedQueue(queueKey);
    await this.consume(queue.name, callback, { ...options, bindingKeys: queue.bindingKeys });
  }

  /**
   * Consumes from a queue until consumption ends.
   * Bodies are decoded according to their `serialization_format` header (JSON when absent).
   * Validation failures are rejected without requeue; other failures are requeued.
   */
  async consume(queueName: string, callback: MessageCallback, options: ServiceConsumeOptions = {}): Promise<void> {
    const autoAck = options.autoAck ?? this.config.consumer.autoAck;

    const wrapped: MessageCallback = async (data, delivery) => {
      const messageId = this.getMessageId(delivery);
      const timer = this.telemetry.start('consume');

      try {
        const result = await callback(data, delivery);

        if (! autoAck && result !== false) {
          this.consumer.acknowledge(delivery);
        }

        timer.success({ queue: queueName, messageId });
      } catch (error) {
        const err = toError(error);
        timer.failure(err, { queue: queueName, messageId });

        if (! autoAck) {
          this.consumer.reject(delivery, ! (err instanceof MessageValidationError));
        }

        this.logger.error(`Error processing RabbitMQ message: ${err.message}`, {
          queue: queueName,
          messageId,
          exception: err.name,
        });

        if (this.config.consumer.throwExceptions) {
          throw err;
        }
      }

      // Settled above
      return false;
    };

    await this.consumer.consume(queueName, wrapped, { ...options, autoAck, decode: this.decodeBody });
  }

  async getMessageFromQueue(queueName: string): Promise<Delivery | null> {
    return this.consumer.getMessageFromQueue(queueName);
  }

  /**
   * Removes every ready message from a queue. Unacknowledged deliveries stay.
   *
   * @returns the number of messages removed
   */
  async purgeQueue(queueName: string): Promise<number> {
    const channel = await this.connection.getChannel();
    const purged = await channel.purgeQueue(queueName);

    this.logger.info(`Purged ${purged} messages from queue '${queueName}'`);
    return purged;
  }

  /**
   * Reads the ready message and consumer counts of an existing queue.
   * The broker closes the channel when the queue does not exist; the next operation opens a new one.
   */
  async getQueueInfo(queueName: string): Promise<QueueInfo> {
    const channel = await this.connection.getChannel();

    try {
      return await channel.checkQueue(queueName);
    } catch (error) {
      this.logger.error(`Failed to inspect queue '${queueName}'`, { error: toError(error).message });
      throw error;
    }
  }

  acknowledge(delivery: Delivery): void {
    this.consumer.acknowledge(delivery);
  }

  reject(delivery: Delivery, requeue = false): void {
    this.consumer.reject(delivery, requeue);
  }

  async closeConnection(): Promise<void> {
    await this.connection.closeConnection();
  }

  /**
   * Switches the body format of published messages.
   *
   * @throws SerializationError for an unsupported format
   */
  setSerializationFormat(format: string): this {
    this.serializer = createSerializer(format);
    this.publisher.setSerializer(this.serializer);
    return this;
  }

  getSerializationFormat(): SerializationFormat {
    return this.serializer.format;
  }

  /**
   * Validates a payload against a named schema. Without a validator every payload passes.
   *
   * @throws MessageValidationError with the field errors when validation fails
   */
  validateMessage(data: unknown, schemaName: string): boolean {
    if (! this.validator) {
      return true;
    }

    if (! this.validator.validate(data, schemaName)) {
      throw new MessageValidationError(this.validator.getErrors());
    }

    return true;
  }

  getConnectionManager(): ConnectionProvider {
    return this.connection;
  }

  getPublisher(): Publisher {
    return this.publisher;
  }

  getConsumer(): Consumer {
    return this.consumer;
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  getRetryPolicy(): RetryPolicy {
    return this.retryPolicy;
  }

  getValidator(): MessageValidator | null {
    return this.validator;
  }

  private decodeBody: BodyDecoder = (delivery) => {
    const format: unknown = delivery.properties.headers?.[SERIALIZATION_HEADER];
    return createSerializer(isSerializationFormat(format) ? format : 'json').deserialize(delivery.content);
  };

  private getMessageId(delivery: Delivery): string {
    const messageId: unknown = delivery.properties.messageId;
    if (typeof messageId === 'string' && messageId !== '') {
      return messageId;
    }

    return this.publisher.generateMessageId();
  }

  private getPredefinedQueue(queueKey: string): PredefinedQueue {
    const queue = this.config.queues[queueKey];
    if (! queue) {
      throw new QueueConfigurationError(`Queue configuration for '${queueKey}' not found`);
    }

    return {
      name: queue.name ?? queueKey,
      bindingKeys: queue.bindingKeys,
      durable: queue.durable,
      autoDelete: queue.autoDelete,
      arguments: queue.arguments,
    };
  }

  private isValidBatchMessage(message: BatchMessage): boolean {
    return typeof message.routingKey === 'string' && message.routingKey !== '' && message.data !== undefined;
  }

  private handlePublishError(error: Error, routingKey: string, timer: OperationTimer, context: LogContext = {}): void {
    const details = { routingKey, error: error.message, exception: error.name, ...context };
    timer.failure(error, details);
    this.logger.error(`Failed to publish message: ${error.message}`, details);
  }
}

export interface CreateMessagingServiceOptions {
  validator?: MessageValidator;
  logger?: Logger;
  /** Opens broker connections. Default: amqplib. */
  connect?: ConnectionFactory;
}

/**
 * Wires a messaging service from configuration.
 *
 * @param config - Configuration overrides; when omitted, read from `RABBITMQ_*` environment variables
 */
export const createMessagingService = (
  config?: MessagingConfigInput,
  options: CreateMessagingServiceOptions = {}
): MessagingService => {
  const resolved = config === undefined ? loadConfig() : resolveConfig(config);
  const logger = options.logger ?? createLogger({ channel: resolved.logging.channel, debug: resolved.debug });

  const connection = new ConnectionManager({
    connection: resolved.connection,
    exchange: resolved.exchange,
    debug: resolved.debug,
    logger,
    connect: options.connect,
  });

  const publisher = new Publisher(connection, {
    confirmSelect: resolved.publisher.confirmSelect,
    debug: resolved.debug,
    logger,
  });

  const consumer = new Consumer(connection, resolved.consumer, { debug: resolved.debug, logger });

  return new MessagingService(connection, publisher, consumer, {
    config: resolved,
    validator: options.validator,
    logger,
  });
};
