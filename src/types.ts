/**
 * Type definitions for the messaging layer.
 * Describes the broker transport contract the components talk to, and the message shapes they exchange.
 */

import type { ConfirmChannel, Message } from 'amqplib';

/**
 * Supported RabbitMQ exchange types.
 */
export type ExchangeType = 'direct' | 'topic' | 'fanout' | 'headers';

/**
 * Circuit breaker states.
 */
export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Exchange declaration.
 */
export interface ExchangeBinding {
  /** Exchange name. */
  name: string;
  /** Type of exchange. */
  type: ExchangeType;
  /** Whether exchange should survive broker restart. */
  durable: boolean;
  /** Whether exchange should be deleted when no longer in use. */
  autoDelete: boolean;
  /** Only check that the exchange exists instead of declaring it. */
  passive: boolean;
  /** Additional exchange arguments. */
  arguments?: Record<string, unknown>;
}

/**
 * Queue arguments such as `x-dead-letter-exchange` or `x-message-ttl`.
 */
export type QueueArguments = Record<string, unknown>;

/**
 * Options for asserting a queue on a channel.
 */
export interface QueueDeclareOptions {
  durable: boolean;
  autoDelete: boolean;
  exclusive: boolean;
  arguments: QueueArguments;
}

/**
 * Options accepted by `Consumer.setupQueue`.
 */
export interface QueueSetupOptions {
  /** Binding keys to bind the queue to the exchange with. Default: none. */
  bindingKeys?: string[];
  /** Whether queue should survive broker restart. Default: true. */
  durable?: boolean;
  /** Whether queue should be deleted when no longer in use. Default: false. */
  autoDelete?: boolean;
  /** Additional queue arguments. */
  arguments?: QueueArguments;
  /** Exchange to bind to. Default: the connection's default exchange. */
  exchange?: string;
}

/**
 * Recorded configuration of a queue set up by a consumer, replayed on reconnection.
 */
export interface ConfiguredQueue {
  bindingKeys: string[];
  durable: boolean;
  autoDelete: boolean;
  arguments: QueueArguments;
  /** Exchange the queue is bound to, when it is not the default one. */
  exchange?: string;
}

/**
 * A queue from the `queues` configuration, resolved to its broker name.
 */
export interface PredefinedQueue extends ConfiguredQueue {
  name: string;
}

/**
 * AMQP application headers table.
 */
export type MessageHeaders = Record<string, unknown>;

/**
 * Standard AMQP message properties accepted when publishing.
 */
export interface MessageProperties {
  /** MIME type of the body. Default: the serializer's content type. */
  contentType?: string;
  contentEncoding?: string;
  /** Application-specific message ID. Generated when omitted. */
  messageId?: string;
  /** 1 = transient, 2 = persistent. Default: 2. */
  deliveryMode?: 1 | 2;
  /** Correlation ID for request/reply patterns. */
  correlationId?: string;
  /** Headers moved to the AMQP headers table. */
  headers?: MessageHeaders;
  /** Message priority (requires queue maxPriority to be set). */
  priority?: number;
  /** Time to live for this message in milliseconds. */
  expiration?: string | number;
  /** Reply-to queue name for RPC patterns. */
  replyTo?: string;
  timestamp?: number;
  type?: string;
  appId?: string;
  userId?: string;
}

/**
 * Message ready to be handed to the channel.
 */
export interface Envelope {
  routingKey: string;
  body: Buffer;
  properties: MessageProperties;
}

/**
 * One entry of a batch publish.
 */
export interface BatchMessage {
  routingKey: string;
  data: unknown;
  properties?: MessageProperties;
}

/**
 * A message received from the broker, tied to the channel that delivered it.
 */
export interface Delivery extends Message {
  /** Channel the delivery came from; null once it is detached. */
  channel: AmqpChannel | null;
}

/**
 * Handler registered with the channel's consume primitive.
 */
export type DeliveryHandler = (delivery: Delivery) => Promise<void>;

/**
 * Caller callback for consumed messages.
 * Returning `false` leaves the message unacknowledged.
 */
export type MessageCallback = (
  data: unknown,
  delivery: Delivery
) => boolean | void | Promise<boolean | void>;

/**
 * Turns a delivery body into application data.
 */
export type BodyDecoder = (delivery: Delivery) => unknown;

/**
 * Options accepted by `Consumer.consume`.
 */
export interface ConsumeOptions {
  /** Binding keys the queue must be bound with. Default: none. */
  bindingKeys?: string[];
  /** Let the broker consider messages acknowledged on delivery. Default: false. */
  autoAck?: boolean;
  /** Queue arguments used when the queue has to be set up. */
  arguments?: QueueArguments;
  /** Body decoder. Default: JSON. */
  decode?: BodyDecoder;
}

/**
 * Counts reported by a passive queue declaration.
 */
export interface QueueInfo {
  queue: string;
  messageCount: number;
  consumerCount: number;
}

/**
 * Channel operations the messaging layer relies on.
 */
export interface AmqpChannel {
  /** Whether the channel can still carry traffic. */
  isOpen(): boolean;
  /** Whether at least one consumer is registered on the channel. */
  isConsuming(): boolean;
  assertExchange(
    name: string,
    type: ExchangeType,
    options: { durable: boolean; autoDelete: boolean; passive: boolean; arguments?: Record<string, unknown> }
  ): Promise<void>;
  assertQueue(name: string, options: QueueDeclareOptions): Promise<void>;
  bindQueue(queue: string, exchange: string, pattern: string): Promise<void>;
  /** Passively declares a queue to read its counts. Fails when the queue does not exist. */
  checkQueue(name: string): Promise<QueueInfo>;
  /** Removes every ready message and returns how many were removed. */
  purgeQueue(name: string): Promise<number>;
  prefetch(count: number): Promise<void>;
  /**
   * Writes a message to the channel.
   *
   * @returns false when the write buffer is full; the message is still sent
   */
  publish(exchange: string, routingKey: string, content: Buffer, properties: MessageProperties): boolean;
  /** Resolves once the broker has confirmed every outstanding publish. */
  waitForConfirms(): Promise<void>;
  /** Starts buffering publishes into a transaction. */
  txSelect(): void;
  /** Sends the buffered publishes and waits for the broker to confirm them. */
  txCommit(): Promise<void>;
  /** Discards the buffered publishes. */
  txRollback(): void;
  /** Registers a handler and returns the consumer tag. */
  consume(queue: string, handler: DeliveryHandler, options: { noAck: boolean }): Promise<string>;
  cancel(consumerTag: string): Promise<void>;
  get(queue: string, options: { noAck: boolean }): Promise<Delivery | null>;
  ack(delivery: Delivery): void;
  reject(delivery: Delivery, requeue: boolean): void;
  /**
   * Waits for the next channel event.
   * Resolves on timeout or when consumption ends; rejects with the fault that interrupted it.
   *
   * @param timeoutMs - Wake up after this many milliseconds. 0 waits indefinitely.
   */
  wait(timeoutMs?: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * Connection operations the messaging layer relies on.
 */
export interface AmqpConnection {
  isConnected(): boolean;
  createChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
}

/**
 * Owner of the connection/channel pair.
 */
export interface ConnectionProvider {
  getConnection(): Promise<AmqpConnection>;
  getChannel(): Promise<AmqpChannel>;
  getExchangeName(): string;
  setExchangeName(name: string): this;
  closeConnection(): Promise<void>;
  reconnect(): Promise<boolean>;
}

interface RawEmitter {
  on(event: string, listener: (error: Error) => void): unknown;
}

/**
 * The parts of an amqplib confirm channel the transport adapter uses.
 */
export interface RawChannel
  extends RawEmitter,
    Pick<
      ConfirmChannel,
      | 'checkExchange'
      | 'assertExchange'
      | 'assertQueue'
      | 'bindQueue'
      | 'checkQueue'
      | 'purgeQueue'
      | 'prefetch'
      | 'publish'
      | 'waitForConfirms'
      | 'consume'
      | 'cancel'
      | 'get'
      | 'ack'
      | 'reject'
      | 'close'
    > {
  setMaxListeners(n: number): unknown;
}

/**
 * The parts of an amqplib connection the transport adapter uses.
 */
export interface RawConnection extends RawEmitter {
  createConfirmChannel(): Promise<RawChannel>;
  close(): Promise<void>;
}
