/**
 * Queue consumer with connection recovery.
 *
 * `consume()` registers a handler and then waits on the channel until consumption ends.
 * When the channel or connection drops, the consumer reconnects with doubling delays,
 * replays the queue setup from its registry and re-registers the same handler.
 */

import { configSchema, type ConsumerConfig } from './config';
import { ConnectionClosedError, ConnectionFailureError, SerializationError, toError } from './errors';
import { createLogger, type LogContext, type Logger } from './logger';
import { configuredQueue, declareAndBindQueue, sameBindingKeys } from './queue';
import type {
  AmqpChannel,
  BodyDecoder,
  ConfiguredQueue,
  ConnectionProvider,
  ConsumeOptions,
  Delivery,
  DeliveryHandler,
  MessageCallback,
  QueueSetupOptions,
} from './types';
import { sleep } from './utils';

export interface ConsumerOptions {
  debug?: boolean;
  logger?: Logger;
}

/**
 * Decodes a delivery body as UTF-8 JSON.
 *
 * @throws SerializationError when the body is not valid JSON
 */
export const decodeJsonBody: BodyDecoder = (delivery) => {
  try {
    return JSON.parse(delivery.content.toString('utf8'));
  } catch (error) {
    throw new SerializationError(`Invalid JSON in message body: ${toError(error).message}`, { cause: error });
  }
};

export class Consumer {
  private connection: ConnectionProvider;
  private settings: ConsumerConfig;
  private debug: boolean;
  private logger: Logger;
  private configuredQueues: Map<string, ConfiguredQueue> = new Map();
  private settled: WeakSet<Delivery> = new WeakSet();

  /**
   * @param connection - Connection/channel owner
   * @param config - Consumer settings; missing values take the configuration defaults
   * @param options - Debug flag and logger
   */
  constructor(connection: ConnectionProvider, config: Partial<ConsumerConfig> = {}, options: ConsumerOptions = {}) {
    this.connection = connection;
    this.settings = configSchema.shape.consumer.parse(config);
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Declares a queue, binds it to the exchange for every binding key and records its configuration.
   * A later call for the same queue replaces the recorded configuration.
   *
   * @throws the declare or bind error, after logging it
   */
  async setupQueue(queueName: string, options: QueueSetupOptions = {}): Promise<this> {
    const queue = configuredQueue(options);
    const exchange = queue.exchange ?? this.connection.getExchangeName();

    try {
      const channel = await this.connection.getChannel();
      await declareAndBindQueue(channel, queueName, exchange, queue);

      this.configuredQueues.set(queueName, queue);

      this.logDebug(`Set up queue '${queueName}' bound to exchange '${exchange}'`, {
        bindingKeys: queue.bindingKeys,
        durable: queue.durable,
        autoDelete: queue.autoDelete,
        arguments: queue.arguments,
      });

      return this;
    } catch (error) {
      this.logger.error(`Failed to set up queue: ${toError(error).message}`, {
        queue: queueName,
        exchange,
        bindingKeys: queue.bindingKeys,
        arguments: queue.arguments,
        error: toError(error).message,
      });
      throw error;
    }
  }

  /**
   * Gets the recorded configuration of a queue set up by this consumer.
   */
  getQueueConfiguration(queueName: string): ConfiguredQueue | undefined {
    const queue = this.configuredQueues.get(queueName);
    return queue ? configuredQueue(queue) : undefined;
  }

  /**
   * Consumes messages from a queue until consumption ends.
   *
   * The queue is set up first when it is unknown, or when binding keys are given that differ from the recorded ones.
   * The callback's return value decides acknowledgement: anything but `false` acks the message.
   *
   * @throws ConnectionClosedError when reconnection attempts are exhausted
   */
  async consume(queueName: string, callback: MessageCallback, options: ConsumeOptions = {}): Promise<void> {
    const {
      bindingKeys = [],
      autoAck = this.settings.autoAck,
      arguments: args = {},
      decode = decodeJsonBody,
    } = options;

    try {
      const configured = this.configuredQueues.get(queueName);
      if (! configured || (bindingKeys.length > 0 && ! sameBindingKeys(configured.bindingKeys, bindingKeys))) {
        await this.setupQueue(queueName, { bindingKeys, durable: true, autoDelete: false, arguments: args });
      }

      const channel = await this.connection.getChannel();
      const handler = this.createMessageHandler(callback, queueName, autoAck, decode);

      await this.startConsuming(channel, queueName, handler, autoAck);

      this.logger.info(`Started consuming from queue '${queueName}'`);

      await this.processMessagesUntilClosed(channel, queueName, handler, autoAck);
    } catch (error) {
      this.logger.error(`Failed to consume from queue: ${toError(error).message}`, {
        queue: queueName,
        error: toError(error).message,
      });
      throw error;
    }
  }

  /**
   * Fetches a single message, to be acknowledged explicitly.
   *
   * @returns the delivery, or null when the queue is empty or the channel is unavailable
   */
  async getMessageFromQueue(queueName: string): Promise<Delivery | null> {
    try {
      const channel = await this.connection.getChannel();
      if (! channel.isOpen()) {
        this.logger.warn('Cannot get message: Channel is not open', { queue: queueName });
        return null;
      }

      return await channel.get(queueName, { noAck: false });
    } catch (error) {
      this.logger.error(`Failed to get message from queue: ${toError(error).message}`, {
        queue: queueName,
        error: toError(error).message,
      });
      return null;
    }
  }

  /**
   * Acknowledges a delivery. Deliveries whose channel is gone are skipped with a warning.
   */
  acknowledge(delivery: Delivery): void {
    const { deliveryTag } = delivery.fields;

    try {
      const channel = this.validateDelivery(delivery);
      if (typeof channel === 'string') {
        this.logger.warn(`Cannot acknowledge message: ${channel}`, { deliveryTag });
        return;
      }

      channel.ack(delivery);
      this.settled.add(delivery);
      this.logDebug('Successfully acknowledged message', { deliveryTag });
    } catch (error) {
      this.logger.warn(`Failed to acknowledge message: ${toError(error).message}`, {
        error: toError(error).message,
        deliveryTag,
      });
    }
  }

  /**
   * Rejects a delivery. Deliveries whose channel is gone are skipped with a warning.
   */
  reject(delivery: Delivery, requeue = false): void {
    const { deliveryTag } = delivery.fields;

    try {
      const channel = this.validateDelivery(delivery);
      if (typeof channel === 'string') {
        this.logger.warn(`Cannot reject message: ${channel}`, { deliveryTag, requeue });
        return;
      }

      channel.reject(delivery, requeue);
      this.settled.add(delivery);
      this.logDebug('Successfully rejected message', { deliveryTag, requeue });
    } catch (error) {
      this.logger.warn(`Failed to reject message: ${toError(error).message}`, {
        error: toError(error).message,
        deliveryTag,
        requeue,
      });
    }
  }

  private createMessageHandler(
    callback: MessageCallback,
    queueName: string,
    autoAck: boolean,
    decode: BodyDecoder
  ): DeliveryHandler {
    return async (delivery) => {
      try {
        const data = decode(delivery);
        const result = await callback(data, delivery);

        if (! autoAck && result !== false) {
          this.acknowledge(delivery);
        }
      } catch (error) {
        const err = toError(error);

        this.logger.error(`Error processing message from queue: ${err.message}`, {
          queue: queueName,
          error: err.message,
          deliveryTag: delivery.fields.deliveryTag,
          body: delivery.content.toString('utf8'),
        });

        if (! autoAck) {
          this.reject(delivery, this.settings.requeueOnError);
        }

        if (this.settings.throwExceptions) {
          throw err;
        }
      }
    };
  }

  private async startConsuming(
    channel: AmqpChannel,
    queueName: string,
    handler: DeliveryHandler,
    autoAck: boolean
  ): Promise<void> {
    if (this.settings.prefetchCount > 0) {
      await channel.prefetch(this.settings.prefetchCount);
    }

    await channel.consume(queueName, handler, { noAck: autoAck });
  }

  private async processMessagesUntilClosed(
    channel: AmqpChannel,
    queueName: string,
    handler: DeliveryHandler,
    autoAck: boolean
  ): Promise<void> {
    const waitTimeoutMs = this.settings.waitTimeout * 1000;
    let current = channel;

    while (true) {
      try {
        await current.wait(waitTimeoutMs);
      } catch (error) {
        if (error instanceof ConnectionFailureError) {
          current = await this.handleReconnection(queueName, handler, autoAck);
          continue;
        }

        this.logger.error(`Error during message processing: ${toError(error).message}`, {
          queue: queueName,
          error: toError(error).message,
        });

        if (this.settings.stopOnCriticalError) {
          this.logger.warn('Stopping message consumption due to critical error');
          await this.closeChannelGracefully(current);
        }
      }

      if (! current.isConsuming()) {
        return;
      }
    }
  }

  private async handleReconnection(
    queueName: string,
    handler: DeliveryHandler,
    autoAck: boolean
  ): Promise<AmqpChannel> {
    this.logger.warn('Consumer channel or connection closed unexpectedly', { queue: queueName });

    const maxRetries = this.settings.reconnectMaxRetries;
    let delay = this.settings.reconnectDelay;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        this.logDebug(`Attempting to reconnect (attempt ${attempt}/${maxRetries}) in ${delay} seconds`);
        await sleep(delay * 1000);

        if (! (await this.connection.reconnect())) {
          throw new ConnectionFailureError('Reconnection to the broker failed');
        }

        const channel = await this.connection.getChannel();
        await this.setupQueue(queueName, this.configuredQueues.get(queueName) ?? {});
        await this.startConsuming(channel, queueName, handler, autoAck);

        this.logger.info(`Successfully reconnected and resumed consuming from queue '${queueName}'`);
        return channel;
      } catch (error) {
        this.logger.error(`Reconnection attempt ${attempt}/${maxRetries} failed: ${toError(error).message}`, {
          queue: queueName,
          error: toError(error).message,
        });
        delay *= 2;
      }
    }

    this.logger.critical(`Failed to reconnect after ${maxRetries} attempts`, { queue: queueName });
    throw new ConnectionClosedError(`Failed to reconnect after ${maxRetries} attempts`);
  }

  private async closeChannelGracefully(channel: AmqpChannel): Promise<void> {
    try {
      if (channel.isOpen()) {
        await channel.close();
      }
    } catch (error) {
      this.logDebug(`Could not close channel: ${toError(error).message}`);
    }
  }

  /**
   * Gets the channel a delivery can be settled on, or the reason it cannot.
   */
  private validateDelivery(delivery: Delivery): AmqpChannel | string {
    if (this.settled.has(delivery)) {
      return 'Message already settled';
    }

    const { channel } = delivery;
    if (! channel) {
      return 'No channel available';
    }
    if (! channel.isOpen()) {
      return 'Channel is not open';
    }

    const { deliveryTag } = delivery.fields;
    if (! deliveryTag) {
      return 'No delivery tag';
    }
    if (! Number.isInteger(deliveryTag) || deliveryTag < 0) {
      return 'Invalid delivery tag value';
    }

    return channel;
  }

  private logDebug(message: string, context?: LogContext): void {
    if (this.debug) {
      this.logger.debug(message, context);
    }
  }
}
