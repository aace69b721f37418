/**
 * Circuit breaker for calls across the gateway boundary.
 *
 * After `failureThreshold` consecutive failures the circuit opens and calls
 * fail fast. Once the reset timeout has passed one trial call is let
 * through (half-open); enough successes close the circuit again. Each
 * reopening doubles the reset timeout up to `maxResetTimeout`.
 */

import { Logger } from './logger';
import { errorMessage } from './error-handler';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  /** Base wait in ms before a half-open trial */
  resetTimeout: number;
  halfOpenSuccessThreshold: number;
  /** Per-call timeout in ms; 0 disables it */
  timeout: number;
  maxResetTimeout: number;
  backoffMultiplier: number;
}

export const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeout: 60000,
  halfOpenSuccessThreshold: 2,
  timeout: 15000,
  maxResetTimeout: 900000,
  backoffMultiplier: 2
};

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Service unavailable (circuit ${name} is open)`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private openedAt = 0;
  private reopenCount = 0;
  private currentResetTimeout: number;
  private readonly options: CircuitBreakerOptions;

  constructor(
    private readonly name: string,
    private readonly logger: Pick<Logger, 'warn' | 'info' | 'debug'>,
    options: Partial<CircuitBreakerOptions> = {},
    private readonly now: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_CIRCUIT_OPTIONS, ...options };
    this.currentResetTimeout = this.options.resetTimeout;
  }

  /**
   * @throws CircuitOpenError while open, or whatever `fn` throws
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.now() - this.openedAt >= this.currentResetTimeout) {
        this.halfOpen();
      } else {
        this.logger.warn(`Circuit ${this.name} is OPEN - failing fast`);
        throw new CircuitOpenError(this.name);
      }
    }

    try {
      const result = await this.withTimeout(fn);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getCurrentResetTimeout(): number {
    return this.currentResetTimeout;
  }

  private async withTimeout<T>(fn: () => Promise<T>): Promise<T> {
    if (!(this.options.timeout > 0)) {
      return fn();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Request timeout after ${this.options.timeout}ms`)), this.options.timeout);
    });
    try {
      return await Promise.race([fn(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      this.logger.debug(`Circuit ${this.name} success in HALF_OPEN state (${this.successes}/${this.options.halfOpenSuccessThreshold})`);
      if (this.successes >= this.options.halfOpenSuccessThreshold) {
        this.close();
      }
      return;
    }
    this.failures = 0;
  }

  private onFailure(error: unknown): void {
    this.failures++;
    this.logger.warn(`Circuit ${this.name} failure: ${errorMessage(error)} (${this.failures}/${this.options.failureThreshold})`);

    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.options.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    if (this.reopenCount > 0) {
      this.currentResetTimeout = Math.min(
        this.currentResetTimeout * this.options.backoffMultiplier,
        this.options.maxResetTimeout
      );
    }
    this.reopenCount++;
    this.state = CircuitState.OPEN;
    this.openedAt = this.now();
    this.failures = 0;
    this.successes = 0;
    this.logger.warn(`Circuit ${this.name} OPENED (attempt ${this.reopenCount}, retry after ${this.currentResetTimeout}ms)`);
  }

  private halfOpen(): void {
    this.state = CircuitState.HALF_OPEN;
    this.successes = 0;
    this.logger.info(`Circuit ${this.name} HALF-OPEN - testing service availability`);
  }

  private close(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.successes = 0;
    this.reopenCount = 0;
    this.currentResetTimeout = this.options.resetTimeout;
    this.logger.info(`Circuit ${this.name} CLOSED - service is operational`);
  }
}
