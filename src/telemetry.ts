/**
 * Operation timing for publish and consume paths.
 */

import { createLogger, type LogContext, type Logger } from './logger';

export interface OperationMetrics extends LogContext {
  operation: string;
  startedAt: string;
  durationMs: number;
  status: 'success' | 'failure';
}

export interface OperationTimer {
  /** Logs the operation as completed and returns its metrics. */
  success(data?: LogContext): OperationMetrics;
  /** Logs the operation as failed and returns its metrics. */
  failure(error: Error, data?: LogContext): OperationMetrics;
}

export class Telemetry {
  private logger: Logger;
  private now: () => number;

  constructor(logger: Logger = createLogger(), now: () => number = Date.now) {
    this.logger = logger;
    this.now = now;
  }

  /**
   * Starts timing an operation. Each timer records one outcome; later calls return the first result.
   */
  start(operation: string): OperationTimer {
    const startedAt = this.now();
    let recorded: OperationMetrics | null = null;

    const finish = (status: OperationMetrics['status'], data: LogContext): OperationMetrics => {
      if (recorded) {
        return recorded;
      }

      recorded = {
        ...data,
        operation,
        startedAt: new Date(startedAt).toISOString(),
        durationMs: Math.round((this.now() - startedAt) * 100) / 100,
        status,
      };
      return recorded;
    };

    return {
      success: (data = {}) => {
        const first = recorded === null;
        const metrics = finish('success', data);
        if (first) {
          this.logger.info('RabbitMQ operation completed', metrics);
        }
        return metrics;
      },
      failure: (error, data = {}) => {
        const first = recorded === null;
        const metrics = finish('failure', { error: error.message, errorClass: error.name, ...data });
        if (first) {
          this.logger.error('RabbitMQ operation failed', metrics);
        }
        return metrics;
      },
    };
  }
}
