/**
 * Queue declaration helpers.
 * Translate friendly queue options into RabbitMQ `x-` arguments and run declare/bind on a channel.
 */

import type { AmqpChannel, ConfiguredQueue, QueueArguments, QueueSetupOptions } from './types';

/**
 * Friendly names for common queue arguments.
 */
export interface QueueArgumentSpec {
  /** Maximum message priority. */
  maxPriority?: number;
  /** Per-message time to live in milliseconds. */
  messageTtl?: number;
  /** Queue expiration time in milliseconds. */
  expires?: number;
  /** Exchange rejected or expired messages are republished to. */
  deadLetterExchange?: string;
  /** Routing key used when dead-lettering. */
  deadLetterRoutingKey?: string;
  /** Maximum number of ready messages. */
  maxLength?: number;
  /** Additional queue arguments. */
  arguments?: QueueArguments;
}

/**
 * Builds queue arguments from a friendly spec.
 *
 * @param spec - Queue argument spec
 * @returns Arguments table for queue.declare
 */
export const buildQueueArguments = (spec: QueueArgumentSpec): QueueArguments => {
  const {
    maxPriority,
    messageTtl,
    expires,
    deadLetterExchange,
    deadLetterRoutingKey,
    maxLength,
    arguments: args = {},
  } = spec;

  const queueArgs: QueueArguments = { ...args };

  if (maxPriority !== undefined) {
    queueArgs['x-max-priority'] = maxPriority;
  }
  if (messageTtl !== undefined) {
    queueArgs['x-message-ttl'] = messageTtl;
  }
  if (expires !== undefined) {
    queueArgs['x-expires'] = expires;
  }
  if (deadLetterExchange !== undefined) {
    queueArgs['x-dead-letter-exchange'] = deadLetterExchange;
  }
  if (deadLetterRoutingKey !== undefined) {
    queueArgs['x-dead-letter-routing-key'] = deadLetterRoutingKey;
  }
  if (maxLength !== undefined) {
    queueArgs['x-max-length'] = maxLength;
  }

  return queueArgs;
};

/**
 * Fills queue setup defaults: durable, not auto-deleted, no bindings, no arguments, default exchange.
 * Binding keys and arguments are copied so later mutation by the caller does not leak in.
 */
export const configuredQueue = (options: QueueSetupOptions = {}): ConfiguredQueue => {
  const queue: ConfiguredQueue = {
    bindingKeys: [...(options.bindingKeys ?? [])],
    durable: options.durable ?? true,
    autoDelete: options.autoDelete ?? false,
    arguments: { ...(options.arguments ?? {}) },
  };

  if (options.exchange !== undefined) {
    queue.exchange = options.exchange;
  }

  return queue;
};

/**
 * Declares a queue and binds it to an exchange for every binding key.
 *
 * @param channel - Channel to declare on
 * @param name - Queue name
 * @param exchange - Exchange to bind to
 * @param queue - Queue configuration
 */
export const declareAndBindQueue = async (
  channel: AmqpChannel,
  name: string,
  exchange: string,
  queue: ConfiguredQueue
): Promise<void> => {
  await channel.assertQueue(name, {
    durable: queue.durable,
    autoDelete: queue.autoDelete,
    exclusive: false,
    arguments: queue.arguments,
  });

  for (const key of queue.bindingKeys) {
    await channel.bindQueue(name, exchange, key);
  }
};

/**
 * Compares two binding key lists, order included.
 */
export const sameBindingKeys = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((key, index) => key === b[index]);
