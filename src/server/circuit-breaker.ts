/**
 * Circuit breaker around terminal calls
 *
 * Closed: calls pass through and consecutive failures are counted. After
 * `failureThreshold` of them the circuit opens and calls fail fast with
 * CircuitOpenError. Once `resetTimeout` has passed it goes half-open and lets
 * calls through again: `successThreshold` successes close it, a failure
 * reopens it.
 */

import { CircuitOpenError, ConfigurationError } from '../utils/errors.js';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Successes in half-open that close it again */
  successThreshold: number;
  /** Milliseconds the circuit stays open before trying again */
  resetTimeout: number;
  /** Which errors count against the circuit; all of them by default */
  isFailure: (error: unknown) => boolean;
}

const defaultConfig: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeout: 30000,
  isFailure: () => true,
};

function requirePositiveInteger(setting: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw ConfigurationError.invalid(setting, 'must be a positive integer', value);
  }
}

export class CircuitBreaker {
  readonly config: CircuitBreakerConfig;
  private current: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private openedAt = 0;

  constructor(config: Partial<CircuitBreakerConfig> = {}, private readonly now: () => number = Date.now) {
    this.config = { ...defaultConfig, ...config };
    requirePositiveInteger('server.circuitFailureThreshold', this.config.failureThreshold);
    requirePositiveInteger('server.circuitSuccessThreshold', this.config.successThreshold);
    if (!Number.isFinite(this.config.resetTimeout) || this.config.resetTimeout < 0) {
      throw ConfigurationError.invalid(
        'server.circuitResetTimeout',
        'must be a non-negative number',
        this.config.resetTimeout
      );
    }
  }

  get state(): CircuitState {
    if (this.current === 'open' && this.remainingMs() === 0) {
      this.current = 'half_open';
      this.successes = 0;
    }
    return this.current;
  }

  /**
   * Run `task` unless the circuit is open
   * @throws CircuitOpenError without calling `task` while open
   */
  async run<T>(operation: string, task: () => T | Promise<T>): Promise<T> {
    if (this.state === 'open') {
      throw new CircuitOpenError(operation, this.remainingMs());
    }

    let result: T;
    try {
      result = await task();
    } catch (error) {
      if (this.config.isFailure(error)) {
        this.recordFailure();
      }
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  /**
   * Close the circuit and forget past failures
   */
  reset(): void {
    this.current = 'closed';
    this.failures = 0;
    this.successes = 0;
    this.openedAt = 0;
  }

  private remainingMs(): number {
    return Math.max(0, this.openedAt + this.config.resetTimeout - this.now());
  }

  private recordSuccess(): void {
    if (this.current === 'half_open') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.reset();
      }
    } else if (this.current === 'closed') {
      this.failures = 0;
    }
  }

  private recordFailure(): void {
    this.failures++;
    if (this.current === 'half_open' || (this.current === 'closed' && this.failures >= this.config.failureThreshold)) {
      this.current = 'open';
      this.openedAt = this.now();
      this.successes = 0;
    }
  }
}
