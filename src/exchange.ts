/**
 * Exchange declaration helpers.
 */

import type { ExchangeConfig } from './config';
import type { AmqpChannel, ExchangeBinding, ExchangeType } from './types';

/**
 * Options for building an exchange binding.
 */
export interface ExchangeSpec {
  type?: ExchangeType;
  durable?: boolean;
  autoDelete?: boolean;
  passive?: boolean;
  /** Alternate exchange for unrouteable messages. */
  alternateExchange?: string;
  arguments?: Record<string, unknown>;
}

/**
 * Builds a binding for the named exchange.
 * Defaults: topic, durable, not auto-deleted, actively declared.
 *
 * @param name - Exchange name
 * @param spec - Exchange options
 */
export const exchangeBinding = (name: string, spec: ExchangeSpec = {}): ExchangeBinding => {
  const {
    type = 'topic',
    durable = true,
    autoDelete = false,
    passive = false,
    alternateExchange,
    arguments: args = {},
  } = spec;

  const exchangeArgs: Record<string, unknown> = { ...args };
  if (alternateExchange !== undefined) {
    exchangeArgs['alternate-exchange'] = alternateExchange;
  }

  return { name, type, durable, autoDelete, passive, arguments: exchangeArgs };
};

/**
 * Builds the binding of the default exchange from configuration.
 *
 * @param config - Exchange configuration
 * @param name - Overrides the configured name
 */
export const exchangeBindingFromConfig = (config: ExchangeConfig, name = config.name): ExchangeBinding =>
  exchangeBinding(name, {
    type: config.type,
    durable: config.durable,
    autoDelete: config.autoDelete,
    passive: config.passive,
  });

/**
 * Declares an exchange on a channel.
 * A passive binding only checks that the exchange exists.
 *
 * @param channel - Channel to declare on
 * @param binding - Exchange declaration
 */
export const declareExchange = async (channel: AmqpChannel, binding: ExchangeBinding): Promise<void> => {
  await channel.assertExchange(binding.name, binding.type, {
    durable: binding.durable,
    autoDelete: binding.autoDelete,
    passive: binding.passive,
    arguments: binding.arguments,
  });
};

/**
 * Name of the exchange dead-lettered messages of a queue are routed through.
 *
 * @param deadLetterQueue - Dead letter queue name
 */
export const deadLetterExchangeName = (deadLetterQueue: string): string => `${deadLetterQueue}.exchange`;
