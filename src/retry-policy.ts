/**
 * Retry with exponential backoff and jitter.
 */

import { createLogger, type Logger } from './logger';
import { sleep } from './utils';

export type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryPolicyOptions {
  /** Total number of tries, the first included. Default: 3. */
  maxAttempts?: number;
  /** Delay before the first retry, in milliseconds. Default: 100. */
  baseDelayMs?: number;
  /** Upper bound of the backoff, in milliseconds. Default: 5000. */
  maxDelayMs?: number;
  /** Share of the delay randomized in both directions, between 0 and 1. Default: 0.2. */
  jitterFactor?: number;
  /** Source of uniform numbers in [0, 1). Default: Math.random. */
  random?: () => number;
  logger?: Logger;
}

export type RetryCallback = (attempt: number, error: Error, delayMs: number) => void;

export class RetryPolicy {
  private maxAttempts: number;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private jitterFactor: number;
  private random: () => number;
  private logger: Logger;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 100;
    this.maxDelayMs = options.maxDelayMs ?? 5000;
    this.jitterFactor = Math.min(1, Math.max(0, options.jitterFactor ?? 0.2));
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Runs an operation, retrying failures of the given kinds.
   * A non-retryable error, or the error of the last attempt, propagates unchanged.
   *
   * @param operation - Work to run
   * @param retryableErrors - Error classes worth retrying. Subclasses count.
   * @param onRetry - Called before each backoff wait
   */
  async execute<T>(
    operation: () => Promise<T> | T,
    retryableErrors: ErrorClass[] = [Error],
    onRetry?: RetryCallback
  ): Promise<T> {
    let attempt = 0;

    while (true) {
      attempt++;

      try {
        return await operation();
      } catch (error) {
        const retryable = retryableErrors.some((kind) => error instanceof kind);
        if (! retryable || ! (error instanceof Error) || attempt >= this.maxAttempts) {
          throw error;
        }

        const delay = this.computeDelay(attempt);

        this.logger.warn(
          `Retry attempt ${attempt}/${this.maxAttempts} after ${Math.round(delay)}ms due to: ${error.message}`
        );

        onRetry?.(attempt, error, delay);

        await sleep(delay);
      }
    }
  }

  /**
   * Backoff before the retry that follows the given attempt.
   *
   * @param attempt - 1-based number of the attempt that just failed
   * @returns Delay in milliseconds, between 0 and maxDelayMs
   */
  computeDelay(attempt: number): number {
    const delay = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));

    if (this.jitterFactor === 0) {
      return delay;
    }

    const jitter = delay * this.jitterFactor;
    return Math.min(this.maxDelayMs, Math.max(0, delay - jitter + this.random() * jitter * 2));
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }
}
