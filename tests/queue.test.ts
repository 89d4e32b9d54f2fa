/**
 * Tests for queue declaration helpers.
 */

import { buildQueueArguments, configuredQueue, declareAndBindQueue, sameBindingKeys } from '../src/queue';
import { FakeChannel } from './support/fake-broker';

describe('queue', () => {
  describe('buildQueueArguments', () => {
    it('should map friendly names to x- arguments', () => {
      expect(
        buildQueueArguments({
          maxPriority: 10,
          messageTtl: 60000,
          expires: 3600000,
          deadLetterExchange: 'dlx',
          deadLetterRoutingKey: 'failed',
          maxLength: 1000,
        })
      ).toEqual({
        'x-max-priority': 10,
        'x-message-ttl': 60000,
        'x-expires': 3600000,
        'x-dead-letter-exchange': 'dlx',
        'x-dead-letter-routing-key': 'failed',
        'x-max-length': 1000,
      });
    });

    it('should keep extra arguments and omit unset ones', () => {
      expect(buildQueueArguments({ messageTtl: 0, arguments: { 'x-queue-type': 'quorum' } })).toEqual({
        'x-queue-type': 'quorum',
        'x-message-ttl': 0,
      });
    });
  });

  describe('configuredQueue', () => {
    it('should fill defaults', () => {
      expect(configuredQueue()).toEqual({ bindingKeys: [], durable: true, autoDelete: false, arguments: {} });
    });

    it('should copy keys and arguments', () => {
      const bindingKeys = ['order.*'];
      const args = { 'x-max-length': 5 };

      const queue = configuredQueue({ bindingKeys, arguments: args, exchange: 'orders' });
      bindingKeys.push('payment.*');
      args['x-max-length'] = 10;

      expect(queue).toEqual({
        bindingKeys: ['order.*'],
        durable: true,
        autoDelete: false,
        arguments: { 'x-max-length': 5 },
        exchange: 'orders',
      });
    });
  });

  describe('declareAndBindQueue', () => {
    it('should declare the queue and bind every key', async () => {
      const channel = new FakeChannel();

      await declareAndBindQueue(
        channel,
        'orders',
        'events',
        configuredQueue({ bindingKeys: ['order.created', 'order.updated'], durable: false })
      );

      expect(channel.queues).toEqual([
        { name: 'orders', options: { durable: false, autoDelete: false, exclusive: false, arguments: {} } },
      ]);
      expect(channel.bindings).toEqual([
        { queue: 'orders', exchange: 'events', pattern: 'order.created' },
        { queue: 'orders', exchange: 'events', pattern: 'order.updated' },
      ]);
    });

    it('should not bind a queue without keys', async () => {
      const channel = new FakeChannel();

      await declareAndBindQueue(channel, 'scratch', 'events', configuredQueue());

      expect(channel.queues).toHaveLength(1);
      expect(channel.bindings).toEqual([]);
    });
  });

  it('should compare binding keys in order', () => {
    expect(sameBindingKeys(['a', 'b'], ['a', 'b'])).toBe(true);
    expect(sameBindingKeys(['a', 'b'], ['b', 'a'])).toBe(false);
    expect(sameBindingKeys(['a'], ['a', 'b'])).toBe(false);
    expect(sameBindingKeys([], [])).toBe(true);
  });
});
