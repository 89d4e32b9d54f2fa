/**
 * Publishes messages to the default exchange.
 */

import { randomBytes } from 'node:crypto';
import { MessagingError, toError } from './errors';
import { createLogger, type Logger } from './logger';
import { JsonSerializer, SERIALIZATION_HEADER, type Serializer } from './serializers';
import type { AmqpChannel, BatchMessage, ConnectionProvider, Envelope, MessageProperties } from './types';

export interface PublisherOptions {
  /** Wait for broker confirms after every publish. Default: false. */
  confirmSelect?: boolean;
  /** Body serializer. Default: JSON. */
  serializer?: Serializer;
  debug?: boolean;
  logger?: Logger;
}

let sequence = 0;

export class Publisher {
  private connection: ConnectionProvider;
  private confirmSelect: boolean;
  private serializer: Serializer;
  private debug: boolean;
  private logger: Logger;

  constructor(connection: ConnectionProvider, options: PublisherOptions = {}) {
    this.connection = connection;
    this.confirmSelect = options.confirmSelect ?? false;
    this.serializer = options.serializer ?? new JsonSerializer();
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Publishes one message.
   *
   * @param routingKey - Routing key on the default exchange
   * @param data - Message payload, serialized with the current serializer
   * @param properties - AMQP properties; these win over the defaults
   * @returns true when the message was handed to the broker (and confirmed, with confirmSelect)
   */
  async publish(routingKey: string, data: unknown, properties: MessageProperties = {}): Promise<boolean> {
    const exchange = this.connection.getExchangeName();

    try {
      const channel = await this.connection.getChannel();
      const envelope = this.buildEnvelope(routingKey, data, properties);

      const flushed = channel.publish(exchange, envelope.routingKey, envelope.body, envelope.properties);
      if (! flushed) {
        this.logger.warn(`RabbitMQ write buffer is full after publishing to '${exchange}'`, { routingKey });
      }

      if (this.confirmSelect) {
        await channel.waitForConfirms();
      }

      if (this.debug) {
        this.logger.debug(`Published message to exchange '${exchange}' with routing key '${routingKey}'`, {
          dataSize: envelope.body.length,
        });
      }

      return true;
    } catch (error) {
      this.logger.error(`Failed to publish message: ${toError(error).message}`, {
        routingKey,
        exchange,
        error: toError(error).message,
      });
      return false;
    }
  }

  /**
   * Publishes messages in one transaction: either all of them reach the broker or none does.
   *
   * @returns true when the transaction was committed
   */
  async publishBatch(messages: BatchMessage[]): Promise<boolean> {
    const exchange = this.connection.getExchangeName();
    let channel: AmqpChannel | null = null;

    try {
      channel = await this.connection.getChannel();
      channel.txSelect();

      for (const message of messages) {
        if (! message.routingKey) {
          throw new MessagingError('Missing routing key for batch message', 'MISSING_ROUTING_KEY');
        }

        const envelope = this.buildEnvelope(message.routingKey, message.data, message.properties ?? {});
        channel.publish(exchange, envelope.routingKey, envelope.body, envelope.properties);
      }

      await channel.txCommit();

      if (this.debug) {
        this.logger.debug(`Published batch of ${messages.length} messages to exchange '${exchange}'`);
      }

      return true;
    } catch (error) {
      if (channel !== null && channel.isOpen()) {
        try {
          channel.txRollback();
        } catch (rollbackError) {
          this.logger.error('Failed to rollback transaction', toError(rollbackError));
        }
      }

      this.logger.error(`Failed to publish batch of messages: ${toError(error).message}`, {
        messageCount: messages.length,
        exchange,
        error: toError(error).message,
      });
      return false;
    }
  }

  /**
   * Generates a unique message ID usable as an idempotency token.
   * Combines the clock, a process-wide counter and 40 random bits.
   */
  generateMessageId(): string {
    sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER;
    return `msg_${Date.now().toString(36)}-${sequence.toString(36)}-${randomBytes(5).toString('hex')}`;
  }

  setSerializer(serializer: Serializer): this {
    this.serializer = serializer;
    return this;
  }

  getSerializer(): Serializer {
    return this.serializer;
  }

  private buildEnvelope(routingKey: string, data: unknown, properties: MessageProperties): Envelope {
    const headers = { ...(properties.headers ?? {}) };
    if (this.serializer.format !== 'json' && headers[SERIALIZATION_HEADER] === undefined) {
      headers[SERIALIZATION_HEADER] = this.serializer.format;
    }

    const messageProperties: MessageProperties = {
      contentType: this.serializer.contentType,
      deliveryMode: 2,
      ...properties,
      messageId: properties.messageId ?? this.generateMessageId(),
    };

    if (Object.keys(headers).length > 0) {
      messageProperties.headers = headers;
    }

    return {
      routingKey,
      body: this.serializer.serialize(data),
      properties: messageProperties,
    };
  }
}
