/**
 * Owner of the broker connection and its channel.
 * Creates both lazily, replaces them when they die, and declares the default exchange once per generation.
 */

import type { ConnectionConfig, ExchangeConfig } from './config';
import { openConnection } from './connection';
import { declareExchange, exchangeBindingFromConfig } from './exchange';
import { toError } from './errors';
import { createLogger, type Logger } from './logger';
import type { AmqpChannel, AmqpConnection, ConnectionProvider, ExchangeType } from './types';

export type ConnectionFactory = (config: ConnectionConfig) => Promise<AmqpConnection>;

export interface ConnectionManagerOptions {
  connection: ConnectionConfig;
  exchange: ExchangeConfig;
  /** Log connection lifecycle at debug level. */
  debug?: boolean;
  logger?: Logger;
  /** Opens connections. Default: amqplib through openConnection. */
  connect?: ConnectionFactory;
}

export class ConnectionManager implements ConnectionProvider {
  private connectionConfig: ConnectionConfig;
  private exchangeConfig: ExchangeConfig;
  private exchangeName: string;
  private debug: boolean;
  private logger: Logger;
  private connect: ConnectionFactory;
  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private pendingChannel: Promise<AmqpChannel> | null = null;
  private exchangeDeclared = false;

  constructor(options: ConnectionManagerOptions) {
    this.connectionConfig = options.connection;
    this.exchangeConfig = options.exchange;
    this.exchangeName = options.exchange.name;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createLogger();
    this.connect = options.connect ?? openConnection;
  }

  /**
   * Gets the live connection, opening a new one when there is none.
   */
  async getConnection(): Promise<AmqpConnection> {
    if (this.connection === null || ! this.connection.isConnected()) {
      this.connection = await this.createConnection();
    }

    return this.connection;
  }

  /**
   * Gets the open channel, creating it (and the connection under it) when needed.
   * Concurrent callers share one creation. On failure, partial state is closed and the error re-thrown.
   * An open channel is reused; it declares the exchange first when the exchange name changed.
   */
  async getChannel(): Promise<AmqpChannel> {
    if (this.pendingChannel) {
      return this.pendingChannel;
    }

    const channel = this.channel;
    if (channel !== null && channel.isOpen()) {
      if (! this.exchangeDeclared) {
        await this.declareExchange(channel);
      }
      return channel;
    }

    const pending = this.createChannel().finally(() => {
      this.pendingChannel = null;
    });
    this.pendingChannel = pending;

    return pending;
  }

  getExchangeName(): string {
    return this.exchangeName;
  }

  /**
   * Switches the default exchange. The next `getChannel` declares it.
   */
  setExchangeName(name: string): this {
    this.exchangeName = name;
    this.exchangeDeclared = false;
    return this;
  }

  getExchangeType(): ExchangeType {
    return this.exchangeConfig.type;
  }

  isConnected(): boolean {
    return this.connection !== null && this.connection.isConnected();
  }

  /**
   * Closes the channel, then the connection. Close errors are logged, never thrown.
   */
  async closeConnection(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    this.channel = null;
    this.connection = null;

    if (channel !== null && channel.isOpen()) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.warn(`Failed to close RabbitMQ channel: ${toError(error).message}`);
      }
    }

    if (connection !== null && connection.isConnected()) {
      try {
        await connection.close();
      } catch (error) {
        this.logger.warn(`Failed to close RabbitMQ connection: ${toError(error).message}`);
      }
    }
  }

  /**
   * Replaces the connection and channel with fresh ones and redeclares the exchange.
   *
   * @returns true on success, false when any step failed (partial state is cleaned up)
   */
  async reconnect(): Promise<boolean> {
    await this.closeConnection();

    try {
      this.connection = await this.createConnection();
      this.channel = await this.connection.createChannel();
      this.exchangeDeclared = false;
      await this.declareExchange(this.channel);

      if (this.debug) {
        this.logger.debug('Successfully reconnected to RabbitMQ');
      }

      return true;
    } catch (error) {
      this.logger.error('Failed to reconnect to RabbitMQ', {
        error: toError(error).message,
        host: this.connectionConfig.host,
        port: this.connectionConfig.port,
      });

      await this.closeConnection();
      return false;
    }
  }

  private async createChannel(): Promise<AmqpChannel> {
    try {
      const connection = await this.getConnection();
      const channel = await connection.createChannel();
      this.channel = channel;

      if (! this.exchangeDeclared) {
        await this.declareExchange(channel);
      }

      if (this.debug) {
        this.logger.debug('Created new RabbitMQ channel');
      }

      return channel;
    } catch (error) {
      this.logger.error('Failed to get RabbitMQ channel', { error: toError(error).message });

      await this.closeConnection();
      throw error;
    }
  }

  private async createConnection(): Promise<AmqpConnection> {
    const { host, port } = this.connectionConfig;
    const connection = await this.connect(this.connectionConfig);

    if (this.debug) {
      this.logger.debug(`Created RabbitMQ connection to ${host}:${port}`);
    }

    return connection;
  }

  private async declareExchange(channel: AmqpChannel): Promise<void> {
    const binding = exchangeBindingFromConfig(this.exchangeConfig, this.exchangeName);

    try {
      await declareExchange(channel, binding);
      this.exchangeDeclared = true;

      if (this.debug) {
        this.logger.debug(`Declared exchange '${binding.name}' of type '${binding.type}'`, {
          durable: binding.durable,
          autoDelete: binding.autoDelete,
        });
      }
    } catch (error) {
      this.logger.error('Failed to declare exchange', {
        exchange: binding.name,
        type: binding.type,
        error: toError(error).message,
      });
      throw error;
    }
  }
}
