import { Logger, LogContext } from '../../util/logger';
import { CircuitBreaker, CircuitBreakerOptions, CircuitOpenError } from '../../util/circuit-breaker';
import { errorMessage, NetworkError } from '../../util/error-handler';

export interface RetryOptions {
  maxRetries: number;
  delayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  delayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000
};

/**
 * Base for services that talk to a remote collaborator: every call runs
 * through a circuit breaker and a bounded retry loop, and any failure
 * leaves as a NetworkError.
 */
export abstract class ServiceBase {
  protected readonly circuitBreaker: CircuitBreaker;

  constructor(
    protected readonly logger: Logger,
    circuitBreakerOptions: Partial<CircuitBreakerOptions> = {},
    protected readonly retryOptions: RetryOptions = DEFAULT_RETRY_OPTIONS,
    private readonly sleep: (ms: number) => Promise<void> = ms => new Promise(resolve => setTimeout(resolve, ms))
  ) {
    this.circuitBreaker = new CircuitBreaker(this.constructor.name, logger, circuitBreakerOptions);
  }

  /**
   * @throws NetworkError when the circuit is open or all attempts failed
   */
  protected async executeWithRetry<T>(operation: () => Promise<T>, label: string): Promise<T> {
    try {
      return await this.circuitBreaker.execute(() => this.retryableRequest(operation, label));
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }
      const reason = error instanceof CircuitOpenError ? 'circuit open' : errorMessage(error);
      throw new NetworkError(`${label} failed: ${reason}`, error, { service: this.constructor.name });
    }
  }

  private async retryableRequest<T>(operation: () => Promise<T>, label: string): Promise<T> {
    const options = this.retryOptions;
    let lastError: unknown = new Error('Unknown error');

    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        if (attempt === options.maxRetries) {
          break;
        }

        const delay = Math.min(options.delayMs * Math.pow(options.backoffMultiplier, attempt), options.maxDelayMs);
        this.logWarn(`${label} failed (attempt ${attempt + 1}), retrying in ${delay}ms`, {
          error: errorMessage(error),
          attempt: attempt + 1,
          maxRetries: options.maxRetries
        });
        await this.sleep(delay);
      }
    }

    throw new NetworkError(
      `${label} failed after ${options.maxRetries + 1} attempts: ${errorMessage(lastError)}`,
      lastError,
      { service: this.constructor.name }
    );
  }

  protected logDebug(message: string, data?: LogContext): void {
    this.logger.debug(`${this.constructor.name}: ${message}`, data);
  }

  protected logWarn(message: string, data?: LogContext): void {
    this.logger.warn(`${this.constructor.name}: ${message}`, data);
  }
}
