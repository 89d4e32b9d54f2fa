/**
 * Tests for Telemetry.
 */

import { vi } from 'vitest';
import { Telemetry } from '../src/telemetry';
import { silentLogger } from '../src/logger';

const makeLogger = () => ({ ...silentLogger, info: vi.fn(), error: vi.fn() });

describe('Telemetry', () => {
  let now: number;
  let logger: ReturnType<typeof makeLogger>;
  let telemetry: Telemetry;

  beforeEach(() => {
    now = Date.UTC(2024, 0, 15, 10, 30, 0);
    logger = makeLogger();
    telemetry = new Telemetry(logger, () => now);
  });

  it('should record a successful operation', () => {
    const timer = telemetry.start('publish');
    now += 12.5;

    const metrics = timer.success({ routingKey: 'order.created' });

    expect(metrics).toEqual({
      routingKey: 'order.created',
      operation: 'publish',
      startedAt: '2024-01-15T10:30:00.000Z',
      durationMs: 12.5,
      status: 'success',
    });
    expect(logger.info).toHaveBeenCalledWith('RabbitMQ operation completed', metrics);
  });

  it('should record a failed operation with the error', () => {
    const timer = telemetry.start('consume');
    now += 40;

    const metrics = timer.failure(new TypeError('bad body'), { queue: 'orders' });

    expect(metrics).toEqual({
      error: 'bad body',
      errorClass: 'TypeError',
      queue: 'orders',
      operation: 'consume',
      startedAt: '2024-01-15T10:30:00.000Z',
      durationMs: 40,
      status: 'failure',
    });
    expect(logger.error).toHaveBeenCalledWith('RabbitMQ operation failed', metrics);
  });

  it('should not let caller data replace the timing fields', () => {
    const metrics = telemetry.start('publish').success({ operation: 'spoofed', status: 'failure' });

    expect(metrics.operation).toBe('publish');
    expect(metrics.status).toBe('success');
  });

  it('should keep the first outcome of a timer', () => {
    const timer = telemetry.start('publish');

    const first = timer.success();
    now += 100;
    const second = timer.failure(new Error('late'));

    expect(second).toBe(first);
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
  });
});
