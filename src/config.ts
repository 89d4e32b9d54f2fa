/**
 * Messaging configuration.
 *
 * One schema describes the whole configuration surface with its defaults.
 * Components receive the sections they need through their constructors;
 * nothing reads the environment after `loadConfig()` has run.
 */

import { z } from 'zod';

type Env = Record<string, string | undefined>;

const flag = (defaultValue: boolean) =>
  z
    .preprocess((value) => {
      if (typeof value !== 'string') return value;
      return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
    }, z.boolean())
    .default(defaultValue);

const count = (defaultValue: number, min = 0) => z.coerce.number().int().min(min).default(defaultValue);

const duration = (defaultValue: number) => z.coerce.number().min(0).default(defaultValue);

const sslSchema = z.object({
  enabled: flag(false),
  verifyPeer: flag(true),
  cafile: z.string().optional(),
  localCert: z.string().optional(),
  localKey: z.string().optional(),
  passphrase: z.string().optional(),
});

const connectionSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().positive().default(5672),
  user: z.string().default('guest'),
  password: z.string().default('guest'),
  vhost: z.string().default('/'),
  ssl: sslSchema.default({}),
  /** Heartbeat interval in seconds. 0 disables heartbeats. */
  heartbeat: count(60),
  /** Socket connect timeout in seconds. */
  connectionTimeout: duration(3),
  /** How long to wait for the broker to confirm writes, in seconds. 0 waits indefinitely. */
  readWriteTimeout: duration(3),
  keepalive: flag(false),
});

const exchangeSchema = z.object({
  name: z.string().min(1).default('booking_events'),
  type: z.enum(['direct', 'topic', 'fanout', 'headers']).default('topic'),
  durable: flag(true),
  autoDelete: flag(false),
  passive: flag(false),
});

const resilienceSchema = z.object({
  maxAttempts: count(3, 1),
  baseDelayMs: duration(100),
  maxDelayMs: duration(5000),
  jitterFactor: z.coerce.number().min(0).max(1).default(0.2),
  failureThreshold: count(5, 1),
  /** Seconds an open circuit waits before letting a trial call through. */
  resetTimeout: duration(30),
});

const consumerSchema = z.object({
  prefetchCount: count(1),
  /** Seconds between wake-ups of the consume loop. 0 waits indefinitely. */
  waitTimeout: duration(0),
  /** Initial reconnection delay in seconds, doubled after each failed attempt. */
  reconnectDelay: duration(5),
  reconnectMaxRetries: count(3),
  stopOnCriticalError: flag(false),
  requeueOnError: flag(false),
  throwExceptions: flag(false),
  autoAck: flag(false),
});

const publisherSchema = z.object({
  batchSize: count(100, 1),
  confirmSelect: flag(false),
});

const serializationSchema = z.object({
  format: z.enum(['json', 'msgpack']).default('json'),
});

const loggingSchema = z.object({
  channel: z.string().min(1).default('rabbitmq'),
});

const predefinedQueueSchema = z.object({
  name: z.string().min(1).optional(),
  bindingKeys: z.array(z.string()).default([]),
  durable: flag(true),
  autoDelete: flag(false),
  arguments: z.record(z.unknown()).default({}),
});

export const configSchema = z.object({
  connection: connectionSchema.default({}),
  exchange: exchangeSchema.default({}),
  resilience: resilienceSchema.default({}),
  consumer: consumerSchema.default({}),
  publisher: publisherSchema.default({}),
  serialization: serializationSchema.default({}),
  logging: loggingSchema.default({}),
  debug: flag(false),
  /** Predefined queues, keyed by the name callers refer to them with. */
  queues: z.record(predefinedQueueSchema).default({}),
});

export type MessagingConfig = z.infer<typeof configSchema>;
export type MessagingConfigInput = z.input<typeof configSchema>;
export type ConnectionConfig = MessagingConfig['connection'];
export type ExchangeConfig = MessagingConfig['exchange'];
export type ResilienceConfig = MessagingConfig['resilience'];
export type ConsumerConfig = MessagingConfig['consumer'];
export type PublisherConfig = MessagingConfig['publisher'];
export type PredefinedQueueConfig = MessagingConfig['queues'][string];

/**
 * Fills defaults into a partial configuration and validates it.
 *
 * @throws ZodError if a value is out of range
 */
export const resolveConfig = (input: MessagingConfigInput = {}): MessagingConfig => configSchema.parse(input);

/**
 * Reads the configuration from `RABBITMQ_*` environment variables.
 *
 * @param env - Environment to read. Default: process.env.
 * @param overrides - Values that win over the environment (e.g. predefined queues).
 */
export const loadConfig = (env: Env = process.env, overrides: MessagingConfigInput = {}): MessagingConfig => {
  const pick = (key: string): string | undefined => {
    const value = env[`RABBITMQ_${key}`];
    return value === undefined || value === '' ? undefined : value;
  };

  return configSchema.parse({
    connection: {
      host: pick('HOST'),
      port: pick('PORT'),
      user: pick('USER'),
      password: pick('PASSWORD'),
      vhost: pick('VHOST'),
      ssl: {
        enabled: pick('SSL'),
        verifyPeer: pick('SSL_VERIFY_PEER'),
        cafile: pick('SSL_CAFILE'),
        localCert: pick('SSL_LOCAL_CERT'),
        localKey: pick('SSL_LOCAL_KEY'),
        passphrase: pick('SSL_PASSPHRASE'),
      },
      heartbeat: pick('HEARTBEAT'),
      connectionTimeout: pick('CONNECTION_TIMEOUT'),
      readWriteTimeout: pick('READ_WRITE_TIMEOUT'),
      keepalive: pick('KEEPALIVE'),
      ...overrides.connection,
    },
    exchange: {
      name: pick('EXCHANGE_NAME'),
      type: pick('EXCHANGE_TYPE'),
      durable: pick('EXCHANGE_DURABLE'),
      autoDelete: pick('EXCHANGE_AUTO_DELETE'),
      passive: pick('EXCHANGE_PASSIVE'),
      ...overrides.exchange,
    },
    resilience: {
      maxAttempts: pick('RESILIENCE_MAX_ATTEMPTS'),
      baseDelayMs: pick('RESILIENCE_BASE_DELAY_MS'),
      maxDelayMs: pick('RESILIENCE_MAX_DELAY_MS'),
      jitterFactor: pick('RESILIENCE_JITTER_FACTOR'),
      failureThreshold: pick('RESILIENCE_FAILURE_THRESHOLD'),
      resetTimeout: pick('RESILIENCE_RESET_TIMEOUT'),
      ...overrides.resilience,
    },
    consumer: {
      prefetchCount: pick('CONSUMER_PREFETCH_COUNT'),
      waitTimeout: pick('CONSUMER_WAIT_TIMEOUT'),
      reconnectDelay: pick('CONSUMER_RECONNECT_DELAY'),
      reconnectMaxRetries: pick('CONSUMER_RECONNECT_MAX_RETRIES'),
      stopOnCriticalError: pick('CONSUMER_STOP_ON_CRITICAL_ERROR'),
      requeueOnError: pick('CONSUMER_REQUEUE_ON_ERROR'),
      throwExceptions: pick('CONSUMER_THROW_EXCEPTIONS'),
      autoAck: pick('CONSUMER_AUTO_ACK'),
      ...overrides.consumer,
    },
    publisher: {
      batchSize: pick('PUBLISHER_BATCH_SIZE'),
      confirmSelect: pick('PUBLISHER_CONFIRM_SELECT'),
      ...overrides.publisher,
    },
    serialization: {
      format: pick('SERIALIZATION_FORMAT'),
      ...overrides.serialization,
    },
    logging: {
      channel: pick('LOGGING_CHANNEL'),
      ...overrides.logging,
    },
    debug: overrides.debug ?? pick('DEBUG'),
    queues: overrides.queues ?? {},
  });
};
