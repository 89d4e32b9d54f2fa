/**
 * Three-state circuit breaker.
 *
 * CLOSED lets calls through and counts failures. Reaching the threshold opens the circuit.
 * OPEN refuses calls until the reset timeout has elapsed since the last failure, then lets
 * one trial through in HALF_OPEN. A successful trial closes the circuit; a failed one reopens it.
 */

import { CircuitOpenError } from './errors';
import { createLogger, type Logger } from './logger';
import type { CircuitState } from './types';

export type Clock = () => number;

export class CircuitBreaker {
  private name: string;
  private failureThreshold: number;
  private resetTimeoutMs: number;
  private clock: Clock;
  private logger: Logger;
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime: number | null = null;

  /**
   * @param name - Circuit name used in logs and errors
   * @param failureThreshold - Failures that open the circuit
   * @param resetTimeoutSeconds - How long an open circuit refuses calls
   * @param clock - Millisecond clock. Default: Date.now.
   * @param logger - Logger for state transitions
   */
  constructor(
    name: string,
    failureThreshold = 5,
    resetTimeoutSeconds = 30,
    clock: Clock = Date.now,
    logger: Logger = createLogger()
  ) {
    this.name = name;
    this.failureThreshold = failureThreshold;
    this.resetTimeoutMs = resetTimeoutSeconds * 1000;
    this.clock = clock;
    this.logger = logger;
  }

  /**
   * Runs an operation under circuit protection.
   * Failures are recorded and re-thrown unchanged.
   *
   * @throws CircuitOpenError while the circuit is open
   */
  async execute<T>(operation: () => Promise<T> | T): Promise<T> {
    this.checkState();

    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  /**
   * Closes the circuit and clears failure bookkeeping.
   */
  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastFailureTime = null;
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  getName(): string {
    return this.name;
  }

  private checkState(): void {
    if (this.state !== 'open') {
      return;
    }

    const elapsed = this.lastFailureTime === null ? Infinity : this.clock() - this.lastFailureTime;
    if (elapsed < this.resetTimeoutMs) {
      throw new CircuitOpenError(this.name, this.state);
    }

    this.state = 'half_open';
    this.logger.info(`Circuit ${this.name} transitioned from OPEN to HALF-OPEN`);
  }

  private recordSuccess(): void {
    if (this.state === 'half_open') {
      this.reset();
      this.logger.info(`Circuit ${this.name} reset and transitioned to CLOSED`);
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.clock();

    if (this.state === 'half_open' || this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logger.warn(`Circuit ${this.name} transitioned to OPEN after ${this.failureCount} failures`);
    }
  }
}
