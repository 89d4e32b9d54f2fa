/**
 * Transport adapter over amqplib.
 * Tracks liveness of connections and channels, turns channel events into awaitable faults,
 * and emulates AMQP transactions on top of a confirm channel.
 */

import { readFileSync } from 'node:fs';
import amqp, { type Options } from 'amqplib';
import type { ConnectionConfig } from './config';
import { ChannelClosedError, ConnectionFailureError, MessagingError, toError } from './errors';
import type {
  AmqpChannel,
  AmqpConnection,
  Delivery,
  DeliveryHandler,
  ExchangeType,
  MessageProperties,
  QueueDeclareOptions,
  QueueInfo,
  RawChannel,
  RawConnection,
} from './types';
import { withTimeout } from './utils';

interface BufferedPublish {
  exchange: string;
  routingKey: string;
  content: Buffer;
  properties: MessageProperties;
}

export interface ChannelOptions {
  /** How long to wait for publisher confirms, in milliseconds. 0 waits indefinitely. */
  confirmTimeoutMs?: number;
}

/**
 * Options handed to `amqp.connect`.
 */
export interface ConnectArguments {
  options: Options.Connect;
  socketOptions: Record<string, unknown>;
}

/**
 * Opens the raw amqplib connection.
 */
export type Connect = (options: Options.Connect, socketOptions: Record<string, unknown>) => Promise<RawConnection>;

/**
 * Builds amqplib connect arguments from configuration.
 *
 * @param config - Connection configuration
 * @returns Connect options and socket options
 */
export const buildConnectArguments = (config: ConnectionConfig): ConnectArguments => {
  const { ssl } = config;

  const socketOptions: Record<string, unknown> = {
    timeout: config.connectionTimeout * 1000,
    keepAlive: config.keepalive,
    noDelay: true,
  };

  if (ssl.enabled) {
    socketOptions.rejectUnauthorized = ssl.verifyPeer;
    if (ssl.cafile) socketOptions.ca = [readFileSync(ssl.cafile)];
    if (ssl.localCert) socketOptions.cert = readFileSync(ssl.localCert);
    if (ssl.localKey) socketOptions.key = readFileSync(ssl.localKey);
    if (ssl.passphrase) socketOptions.passphrase = ssl.passphrase;
  }

  return {
    options: {
      protocol: ssl.enabled ? 'amqps' : 'amqp',
      hostname: config.host,
      port: config.port,
      username: config.user,
      password: config.password,
      vhost: config.vhost,
      heartbeat: config.heartbeat,
      locale: 'en_US',
    },
    socketOptions,
  };
};

/**
 * Opens a broker connection.
 *
 * @param config - Connection configuration
 * @param connect - Raw connect function. Default: amqplib's.
 * @returns Promise resolving to the connection
 * @throws ConnectionFailureError if the broker cannot be reached
 */
export const openConnection = async (
  config: ConnectionConfig,
  connect: Connect = amqp.connect
): Promise<BrokerConnection> => {
  const { options, socketOptions } = buildConnectArguments(config);

  try {
    const connection = await connect(options, socketOptions);
    return new BrokerConnection(connection, { confirmTimeoutMs: config.readWriteTimeout * 1000 });
  } catch (error) {
    throw new ConnectionFailureError(
      `Failed to connect to RabbitMQ at ${config.host}:${config.port}: ${toError(error).message}`,
      { cause: error }
    );
  }
};

/**
 * A broker connection that knows whether it is still alive.
 */
export class BrokerConnection implements AmqpConnection {
  private connection: RawConnection;
  private channelOptions: ChannelOptions;
  private connected = true;
  private lastError: Error | null = null;

  constructor(connection: RawConnection, channelOptions: ChannelOptions = {}) {
    this.connection = connection;
    this.channelOptions = channelOptions;

    this.connection.on('error', (err: Error) => {
      this.lastError = err;
    });
    this.connection.on('close', () => {
      this.connected = false;
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Gets the error that brought the connection down, if any.
   */
  getLastError(): Error | null {
    return this.lastError;
  }

  /**
   * Opens a confirm channel on this connection.
   */
  async createChannel(): Promise<BrokerChannel> {
    if (! this.connected) {
      throw new ConnectionFailureError('Cannot open a channel on a closed connection', {
        cause: this.lastError ?? undefined,
      });
    }

    const channel = await this.connection.createConfirmChannel();
    return new BrokerChannel(channel, this.channelOptions);
  }

  async close(): Promise<void> {
    if (! this.connected) {
      return;
    }

    try {
      await this.connection.close();
    } finally {
      this.connected = false;
    }
  }

  /**
   * Gets underlying amqplib connection for advanced operations.
   */
  getRaw(): RawConnection {
    return this.connection;
  }
}

/**
 * A confirm channel with liveness tracking, consumer bookkeeping and an awaitable fault stream.
 */
export class BrokerChannel implements AmqpChannel {
  private channel: RawChannel;
  private confirmTimeoutMs: number;
  private open = true;
  private closing = false;
  private lastError: Error | null = null;
  private consumerTags: Set<string> = new Set();
  private faults: Error[] = [];
  private waiter: (() => void) | null = null;
  private transaction: BufferedPublish[] | null = null;

  constructor(channel: RawChannel, options: ChannelOptions = {}) {
    this.channel = channel;
    this.confirmTimeoutMs = options.confirmTimeoutMs ?? 0;

    this.channel.setMaxListeners(100);
    this.channel.on('error', (err: Error) => {
      this.lastError = err;
    });
    this.channel.on('close', () => this.handleClose());
  }

  isOpen(): boolean {
    return this.open;
  }

  isConsuming(): boolean {
    return this.open && this.consumerTags.size > 0;
  }

  async assertExchange(
    name: string,
    type: ExchangeType,
    options: { durable: boolean; autoDelete: boolean; passive: boolean; arguments?: Record<string, unknown> }
  ): Promise<void> {
    if (options.passive) {
      await this.channel.checkExchange(name);
      return;
    }

    await this.channel.assertExchange(name, type, {
      durable: options.durable,
      autoDelete: options.autoDelete,
      arguments: options.arguments ?? {},
    });
  }

  async assertQueue(name: string, options: QueueDeclareOptions): Promise<void> {
    await this.channel.assertQueue(name, options);
  }

  async bindQueue(queue: string, exchange: string, pattern: string): Promise<void> {
    await this.channel.bindQueue(queue, exchange, pattern);
  }

  async checkQueue(name: string): Promise<QueueInfo> {
    const { queue, messageCount, consumerCount } = await this.channel.checkQueue(name);
    return { queue, messageCount, consumerCount };
  }

  async purgeQueue(name: string): Promise<number> {
    const { messageCount } = await this.channel.purgeQueue(name);
    return messageCount;
  }

  async prefetch(count: number): Promise<void> {
    await this.channel.prefetch(count);
  }

  /**
   * Publishes straight away, or buffers until commit inside a transaction (buffered writes report true).
   */
  publish(exchange: string, routingKey: string, content: Buffer, properties: MessageProperties): boolean {
    if (this.transaction) {
      this.transaction.push({ exchange, routingKey, content, properties });
      return true;
    }

    return this.channel.publish(exchange, routingKey, content, properties);
  }

  async waitForConfirms(): Promise<void> {
    await withTimeout(
      this.channel.waitForConfirms(),
      this.confirmTimeoutMs,
      `Broker did not confirm publishes within ${this.confirmTimeoutMs}ms`
    );
  }

  txSelect(): void {
    if (this.transaction) {
      throw new MessagingError('A transaction is already open on this channel', 'TX_ALREADY_OPEN');
    }
    this.transaction = [];
  }

  async txCommit(): Promise<void> {
    const pending = this.transaction;
    if (! pending) {
      throw new MessagingError('No transaction is open on this channel', 'TX_NOT_OPEN');
    }
    this.transaction = null;

    for (const { exchange, routingKey, content, properties } of pending) {
      this.channel.publish(exchange, routingKey, content, properties);
    }

    await this.waitForConfirms();
  }

  txRollback(): void {
    this.transaction = null;
  }

  async consume(queue: string, handler: DeliveryHandler, options: { noAck: boolean }): Promise<string> {
    let consumerTag = '';

    const reply = await this.channel.consume(
      queue,
      (msg) => {
        if (! msg) {
          // Cancelled by the broker
          this.consumerTags.delete(consumerTag);
          this.notify();
          return;
        }

        handler({ ...msg, channel: this }).catch((error: unknown) => this.pushFault(toError(error)));
      },
      { noAck: options.noAck }
    );

    consumerTag = reply.consumerTag;
    this.consumerTags.add(consumerTag);

    return consumerTag;
  }

  async cancel(consumerTag: string): Promise<void> {
    await this.channel.cancel(consumerTag);
    this.consumerTags.delete(consumerTag);
    this.notify();
  }

  async get(queue: string, options: { noAck: boolean }): Promise<Delivery | null> {
    const msg = await this.channel.get(queue, { noAck: options.noAck });
    if (msg === false) {
      return null;
    }
    return { ...msg, channel: this };
  }

  ack(delivery: Delivery): void {
    this.channel.ack(delivery);
  }

  reject(delivery: Delivery, requeue: boolean): void {
    this.channel.reject(delivery, requeue);
  }

  async wait(timeoutMs = 0): Promise<void> {
    if (this.faults.length === 0 && this.isConsuming()) {
      await new Promise<void>((resolve) => {
        let timer: NodeJS.Timeout | undefined;
        const wake = () => {
          clearTimeout(timer);
          this.waiter = null;
          resolve();
        };
        if (timeoutMs > 0) {
          timer = setTimeout(wake, timeoutMs);
        }
        this.waiter = wake;
      });
    }

    const fault = this.faults.shift();
    if (fault) {
      throw fault;
    }
  }

  async close(): Promise<void> {
    if (! this.open) {
      return;
    }

    this.closing = true;
    try {
      await this.channel.close();
    } finally {
      this.markClosed();
    }
  }

  /**
   * Gets underlying amqplib channel for advanced operations.
   */
  getRaw(): RawChannel {
    return this.channel;
  }

  private handleClose(): void {
    const unexpected = this.open && ! this.closing;
    this.markClosed();

    if (unexpected) {
      const reason = this.lastError ? `: ${this.lastError.message}` : '';
      this.pushFault(new ChannelClosedError(`Channel closed unexpectedly${reason}`, { cause: this.lastError ?? undefined }));
    }
  }

  private markClosed(): void {
    this.open = false;
    this.transaction = null;
    this.consumerTags.clear();
    this.notify();
  }

  private pushFault(error: Error): void {
    this.faults.push(error);
    this.notify();
  }

  private notify(): void {
    this.waiter?.();
  }
}
