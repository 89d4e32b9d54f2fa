/**
 * Tests for MessagingService.
 */

import { vi } from 'vitest';
import { encode } from '@msgpack/msgpack';
import { z } from 'zod';
import { MessagingService, createMessagingService } from '../src/service';
import { resolveConfig, type MessagingConfigInput } from '../src/config';
import { Consumer } from '../src/consumer';
import { CircuitOpenError, MessageValidationError, QueueConfigurationError } from '../src/errors';
import { Publisher } from '../src/publisher';
import { ZodMessageValidator } from '../src/validator';
import { FakeChannel, FakeConnectionProvider, createMockLogger } from './support/fake-broker';

describe('MessagingService', () => {
  let channel: FakeChannel;
  let provider: FakeConnectionProvider;
  let logger: ReturnType<typeof createMockLogger>;
  let publisher: Publisher;
  let consumer: Consumer;

  const createService = (config: MessagingConfigInput = {}, validator?: ZodMessageValidator) => {
    const resolved = resolveConfig({
      ...config,
      resilience: { baseDelayMs: 0, jitterFactor: 0, ...config.resilience },
    });
    consumer = new Consumer(provider, resolved.consumer, { logger });
    return new MessagingService(provider, publisher, consumer, { config: resolved, validator, logger });
  };

  beforeEach(() => {
    channel = new FakeChannel();
    provider = new FakeConnectionProvider(channel);
    logger = createMockLogger();
    publisher = new Publisher(provider, { logger });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('publish', () => {
    it('should publish and record telemetry', async () => {
      const service = createService();

      await expect(service.publish('order.created', { order_id: 1 })).resolves.toBe(true);

      expect(channel.published).toHaveLength(1);
      expect(logger.info).toHaveBeenCalledWith(
        'RabbitMQ operation completed',
        expect.objectContaining({ operation: 'publish', routingKey: 'order.created', status: 'success' })
      );
    });

    it('should refuse payloads that fail their schema', async () => {
      const validator = new ZodMessageValidator();
      validator.registerSchema('order', z.object({ order_id: z.number() }));
      const service = createService({}, validator);

      await expect(service.publish('order.created', { order_id: 'one' }, { schema: 'order' })).resolves.toBe(false);

      expect(channel.published).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith('Failed to publish message: Message validation failed', {
        routingKey: 'order.created',
        error: 'Message validation failed',
        exception: 'MessageValidationError',
      });
    });

    it('should not pass the schema name on as a property', async () => {
      const validator = new ZodMessageValidator();
      validator.registerSchema('order', z.object({ order_id: z.number() }));
      const service = createService({}, validator);

      await service.publish('order.created', { order_id: 1 }, { schema: 'order', priority: 2 });

      expect(channel.published[0].properties).not.toHaveProperty('schema');
      expect(channel.published[0].properties.priority).toBe(2);
    });

    it('should retry a publish that reported failure', async () => {
      const service = createService();
      const publish = vi.spyOn(publisher, 'publish').mockResolvedValueOnce(false).mockResolvedValueOnce(true);

      await expect(service.publish('order.created', {})).resolves.toBe(true);
      expect(publish).toHaveBeenCalledTimes(2);
    });

    it('should give up after the configured attempts', async () => {
      const service = createService({ resilience: { maxAttempts: 3 } });
      const publish = vi.spyOn(publisher, 'publish').mockResolvedValue(false);

      await expect(service.publish('order.created', {})).resolves.toBe(false);

      expect(publish).toHaveBeenCalledTimes(3);
      expect(service.getCircuitBreaker().getFailureCount()).toBe(1);
      expect(logger.error).toHaveBeenCalledWith('Failed to publish message: Failed to publish message to order.created', {
        routingKey: 'order.created',
        error: 'Failed to publish message to order.created',
        exception: 'PublishFailedError',
      });
    });

    it('should throw once the circuit is open', async () => {
      const service = createService({ resilience: { maxAttempts: 1, failureThreshold: 2 } });
      const publish = vi.spyOn(publisher, 'publish').mockResolvedValue(false);

      await expect(service.publish('order.created', {})).resolves.toBe(false);
      await expect(service.publish('order.created', {})).resolves.toBe(false);
      await expect(service.publish('order.created', {})).rejects.toBeInstanceOf(CircuitOpenError);

      expect(publish).toHaveBeenCalledTimes(2);
      expect(logger.error).toHaveBeenCalledWith('Failed to publish message: Circuit rabbitmq-publisher is OPEN', {
        routingKey: 'order.created',
        error: 'Circuit rabbitmq-publisher is OPEN',
        exception: 'CircuitOpenError',
        circuitState: 'open',
      });
    });
  });

  describe('publishEvent', () => {
    it('should wrap the payload and describe the event in headers', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      const service = createService();

      await expect(service.publishEvent('order.created', { id: 1 })).resolves.toBe(true);

      const [message] = channel.published;
      expect(message.routingKey).toBe('order.created');
      expect(message.content.toString()).toBe(
        '{"event":"order.created","timestamp":1700000000000,"payload":{"id":1}}'
      );
      expect(message.properties.headers).toEqual({
        event_type: 'order.created',
        content_type: 'application/json',
        serialization_format: 'json',
      });
    });

    it('should return false instead of throwing while the circuit is open', async () => {
      const service = createService({ resilience: { maxAttempts: 1, failureThreshold: 1 } });
      vi.spyOn(publisher, 'publish').mockResolvedValue(false);
      await service.publish('warm.up', {});

      await expect(service.publishEvent('order.created', {})).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Failed to publish event: Circuit rabbitmq-publisher is OPEN', {
        event: 'order.created',
        error: 'Circuit rabbitmq-publisher is OPEN',
      });
    });
  });

  describe('publishBatch', () => {
    it('should publish every message and report success', async () => {
      const service = createService();

      const ok = await service.publishBatch([
        { routingKey: 'a', data: 1 },
        { routingKey: 'b', data: 2 },
      ]);

      expect(ok).toBe(true);
      expect(channel.published.map((message) => message.routingKey)).toEqual(['a', 'b']);
      expect(logger.info).not.toHaveBeenCalledWith('Batch publishing progress', expect.anything());
    });

    it('should count malformed entries as failures and log progress per chunk', async () => {
      const service = createService({ publisher: { batchSize: 2 } });
      const malformed = { routingKey: '', data: 2 };

      const ok = await service.publishBatch([{ routingKey: 'a', data: 1 }, malformed, { routingKey: 'c', data: 3 }]);

      expect(ok).toBe(false);
      expect(channel.published.map((message) => message.routingKey)).toEqual(['a', 'c']);
      expect(logger.error).toHaveBeenCalledWith('Invalid message format for batch publishing', { message: malformed });
      expect(logger.info).toHaveBeenCalledWith('Batch publishing progress', { batch: 1, total: 3, processed: 1, failed: 1 });
      expect(logger.info).toHaveBeenCalledWith('Batch publishing progress', { batch: 2, total: 3, processed: 2, failed: 1 });
    });

    it('should treat a missing payload as malformed', async () => {
      const service = createService();

      await expect(service.publishBatch([{ routingKey: 'a', data: undefined }])).resolves.toBe(false);
      expect(channel.published).toEqual([]);
    });
  });

  describe('setupDeadLetterQueue', () => {
    it('should route rejected messages of a queue to its dead letter queue', async () => {
      const service = createService();
      await service.setupQueue('orders', { bindingKeys: ['order.*'] });

      await service.setupDeadLetterQueue('orders', 'orders.failed');

      expect(channel.exchanges).toEqual([
        {
          name: 'orders.failed.exchange',
          type: 'topic',
          options: { durable: true, autoDelete: false, passive: false, arguments: {} },
        },
      ]);
      expect(channel.bindings).toEqual([
        { queue: 'orders', exchange: 'test_exchange', pattern: 'order.*' },
        { queue: 'orders.failed', exchange: 'orders.failed.exchange', pattern: '#' },
        { queue: 'orders', exchange: 'test_exchange', pattern: 'order.*' },
      ]);
      expect(consumer.getQueueConfiguration('orders')).toEqual({
        bindingKeys: ['order.*'],
        durable: true,
        autoDelete: false,
        arguments: {
          'x-dead-letter-exchange': 'orders.failed.exchange',
          'x-dead-letter-routing-key': 'orders',
        },
      });
    });

    it('should use the first binding key as the dead letter routing key', async () => {
      const service = createService();

      await service.setupDeadLetterQueue('orders', 'orders.failed', ['failed.order', 'failed.any']);

      expect(channel.bindings).toEqual([
        { queue: 'orders.failed', exchange: 'orders.failed.exchange', pattern: 'failed.order' },
        { queue: 'orders.failed', exchange: 'orders.failed.exchange', pattern: 'failed.any' },
      ]);
      expect(consumer.getQueueConfiguration('orders')?.arguments['x-dead-letter-routing-key']).toBe('failed.order');
    });
  });

  describe('predefined queues', () => {
    const queues = { orders: { name: 'orders.v1', bindingKeys: ['order.*'] }, audit: {} };

    it('should set up a configured queue under its broker name', async () => {
      const service = createService({ queues });

      await service.setupPredefinedQueue('orders');

      expect(channel.queues.map((queue) => queue.name)).toEqual(['orders.v1']);
      expect(channel.bindings).toEqual([{ queue: 'orders.v1', exchange: 'test_exchange', pattern: 'order.*' }]);
    });

    it('should default the broker name to the key', async () => {
      const service = createService({ queues });

      await service.setupPredefinedQueue('audit');

      expect(channel.queues.map((queue) => queue.name)).toEqual(['audit']);
    });

    it('should refuse unknown keys', async () => {
      const service = createService({ queues });

      await expect(service.setupPredefinedQueue('missing')).rejects.toBeInstanceOf(QueueConfigurationError);
      await expect(service.consumeFromPredefinedQueue('missing', vi.fn())).rejects.toThrow(
        "Queue configuration for 'missing' not found"
      );
    });

    it('should consume from a configured queue without declaring it twice', async () => {
      const service = createService({ queues });
      const callback = vi.fn();
      channel.waitSteps = [(ch) => ch.deliver({ content: { n: 1 } }).then(() => undefined)];

      await service.consumeFromPredefinedQueue('orders', callback);

      expect(channel.queues).toHaveLength(1);
      expect(callback).toHaveBeenCalledWith({ n: 1 }, expect.anything());
    });
  });

  describe('consume', () => {
    it('should acknowledge processed messages and record telemetry', async () => {
      const service = createService();
      const callback = vi.fn();
      channel.waitSteps = [(ch) => ch.deliver({ content: { order_id: 1 }, messageId: 'm-1' }).then(() => undefined)];

      await service.consume('orders', callback);

      expect(callback).toHaveBeenCalledWith({ order_id: 1 }, expect.anything());
      expect(channel.acks).toHaveLength(1);
      expect(logger.info).toHaveBeenCalledWith(
        'RabbitMQ operation completed',
        expect.objectContaining({ operation: 'consume', queue: 'orders', messageId: 'm-1' })
      );
    });

    it('should generate a message ID for telemetry when the message has none', async () => {
      const service = createService();
      channel.waitSteps = [(ch) => ch.deliver().then(() => undefined)];

      await service.consume('orders', vi.fn());

      expect(logger.info).toHaveBeenCalledWith(
        'RabbitMQ operation completed',
        expect.objectContaining({ messageId: expect.stringMatching(/^msg_/) })
      );
    });

    it('should leave messages unacknowledged when the callback returns false', async () => {
      const service = createService();
      channel.waitSteps = [(ch) => ch.deliver().then(() => undefined)];

      await service.consume('orders', () => false);

      expect(channel.acks).toEqual([]);
      expect(channel.rejects).toEqual([]);
    });

    it('should decode bodies by their serialization header', async () => {
      const service = createService();
      const callback = vi.fn();
      channel.waitSteps = [
        (ch) =>
          ch
            .deliver({ content: Buffer.from(encode({ a: 1 })), headers: { serialization_format: 'msgpack' } })
            .then(() => undefined),
      ];

      await service.consume('orders', callback);

      expect(callback).toHaveBeenCalledWith({ a: 1 }, expect.anything());
    });

    it('should requeue messages whose processing failed', async () => {
      const service = createService();
      channel.waitSteps = [(ch) => ch.deliver({ messageId: 'm-2' }).then(() => undefined)];

      await service.consume('orders', () => {
        throw new Error('database down');
      });

      expect(channel.rejects).toHaveLength(1);
      expect(channel.rejects[0].requeue).toBe(true);
      expect(logger.error).toHaveBeenCalledWith('Error processing RabbitMQ message: database down', {
        queue: 'orders',
        messageId: 'm-2',
        exception: 'Error',
      });
    });

    it('should drop messages that fail validation', async () => {
      const service = createService();
      channel.waitSteps = [(ch) => ch.deliver().then(() => undefined)];

      await service.consume('orders', () => {
        throw new MessageValidationError({ order_id: ['Required'] });
      });

      expect(channel.rejects).toHaveLength(1);
      expect(channel.rejects[0].requeue).toBe(false);
    });
  });

  describe('queue inspection', () => {
    it('should purge a queue and report how many messages went', async () => {
      const service = createService();
      channel.queueCounts.set('orders', { messageCount: 4, consumerCount: 1 });

      await expect(service.purgeQueue('orders')).resolves.toBe(4);

      expect(channel.purged).toEqual(['orders']);
      expect(logger.info).toHaveBeenCalledWith("Purged 4 messages from queue 'orders'");
    });

    it('should read message and consumer counts', async () => {
      const service = createService();
      channel.queueCounts.set('orders', { messageCount: 12, consumerCount: 2 });

      await expect(service.getQueueInfo('orders')).resolves.toEqual({
        queue: 'orders',
        messageCount: 12,
        consumerCount: 2,
      });
    });

    it('should fail for queues that do not exist', async () => {
      const service = createService();

      await expect(service.getQueueInfo('missing')).rejects.toThrow("NOT_FOUND - no queue 'missing'");
      expect(logger.error).toHaveBeenCalledWith("Failed to inspect queue 'missing'", {
        error: "NOT_FOUND - no queue 'missing'",
      });
    });
  });

  describe('serialization format', () => {
    it('should follow the configured format', () => {
      const service = createService({ serialization: { format: 'msgpack' } });

      expect(service.getSerializationFormat()).toBe('msgpack');
      expect(publisher.getSerializer().format).toBe('msgpack');
    });

    it('should switch the publisher along with the service', () => {
      const service = createService();

      service.setSerializationFormat('msgpack');

      expect(service.getSerializationFormat()).toBe('msgpack');
      expect(publisher.getSerializer().format).toBe('msgpack');
      expect(() => service.setSerializationFormat('xml')).toThrow('Unsupported serialization format: xml');
    });
  });

  describe('validateMessage', () => {
    it('should accept anything without a validator', () => {
      expect(createService().validateMessage({}, 'order')).toBe(true);
    });

    it('should throw the field errors of an invalid payload', () => {
      const validator = new ZodMessageValidator();
      validator.registerSchema('order', z.object({ order_id: z.number() }));
      const service = createService({}, validator);

      const error = (() => {
        try {
          service.validateMessage({}, 'order');
          return null;
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(MessageValidationError);
      expect(error).toMatchObject({ errors: { order_id: ['Required'] } });
    });
  });

  it('should close the connection', async () => {
    await createService().closeConnection();

    expect(provider.closeCalls).toBe(1);
  });
});

describe('createMessagingService', () => {
  it('should wire the components to one connection', async () => {
    const channel = new FakeChannel();
    const connect = vi.fn().mockResolvedValue({
      isConnected: () => true,
      createChannel: async () => channel,
      close: async () => undefined,
    });

    const service = createMessagingService({ exchange: { name: 'events' } }, { logger: createMockLogger(), connect });
    await service.publish('order.created', { order_id: 1 });

    expect(connect).toHaveBeenCalledTimes(1);
    expect(channel.exchanges.map((exchange) => exchange.name)).toEqual(['events']);
    expect(channel.published[0].exchange).toBe('events');
    expect(service.getPublisher().getSerializer().format).toBe('json');
    expect(service.getValidator()).toBeNull();
  });
});
