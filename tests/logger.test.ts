/**
 * Tests for the console logger.
 */

import { vi } from 'vitest';
import { createLogger } from '../src/logger';

describe('createLogger', () => {
  const originalDebug = process.env.DEBUG;

  beforeEach(() => {
    delete process.env.DEBUG;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env.DEBUG;
    } else {
      process.env.DEBUG = originalDebug;
    }
  });

  it('should prefix lines with the channel and encode context as JSON', () => {
    createLogger().info('Started consuming', { queue: 'orders' });

    expect(console.log).toHaveBeenCalledWith('[rabbitmq] Started consuming', '{"queue":"orders"}');
  });

  it('should use a custom channel', () => {
    createLogger({ channel: 'billing' }).warn('Slow broker');

    expect(console.warn).toHaveBeenCalledWith('[billing] Slow broker', '');
  });

  it('should print the message of an error', () => {
    createLogger().error('Failed to publish', new Error('socket closed'));

    expect(console.error).toHaveBeenCalledWith('[rabbitmq] Failed to publish:', 'socket closed');
  });

  it('should encode errors nested in context', () => {
    createLogger().error('Failed', { error: new TypeError('boom') });

    expect(console.error).toHaveBeenCalledWith('[rabbitmq] Failed', '{"error":{"name":"TypeError","message":"boom"}}');
  });

  it('should survive context that cannot be encoded', () => {
    const context: Record<string, unknown> = {};
    context.self = context;

    createLogger().info('Cyclic', context);

    expect(console.log).toHaveBeenCalledWith('[rabbitmq] Cyclic', '[unserializable context]');
  });

  it('should mark critical lines', () => {
    createLogger().critical('Giving up', { attempts: 3 });

    expect(console.error).toHaveBeenCalledWith('[rabbitmq] CRITICAL Giving up', '{"attempts":3}');
  });

  describe('debug', () => {
    it('should be silent by default', () => {
      createLogger().debug('noise');

      expect(console.debug).not.toHaveBeenCalled();
    });

    it('should print when enabled by option', () => {
      createLogger({ debug: true }).debug('detail');

      expect(console.debug).toHaveBeenCalledWith('[rabbitmq] detail', '');
    });

    it('should print when DEBUG mentions the channel', () => {
      process.env.DEBUG = 'app,rabbitmq';

      createLogger().debug('detail');

      expect(console.debug).toHaveBeenCalledTimes(1);
    });
  });
});
