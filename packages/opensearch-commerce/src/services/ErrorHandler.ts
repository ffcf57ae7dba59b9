import pRetry from 'p-retry';
import { describeError, getStatusCode, getErrorType } from '../errors';
import { consoleLogger, type Logger } from './Logger';

export type RetryConfig = {
  retries?: number;
  minTimeout?: number;
  maxTimeout?: number;
  factor?: number;
  isRetryable?: (error: unknown) => boolean;
  logger?: Logger;
};

export type CircuitBreakerConfig = {
  failureThreshold?: number;
  resetTimeoutMs?: number;
};

export enum CircuitBreakerState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export class CircuitOpenError extends Error {
  constructor() {
    super('Circuit breaker is OPEN - operation not allowed');
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state = CircuitBreakerState.CLOSED;
  private failureCount = 0;
  private nextAttemptTime = 0;
  private trialInFlight = false;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;

  constructor(config: CircuitBreakerConfig = {}) {
    this.failureThreshold = config.failureThreshold ?? 5;
    this.resetTimeoutMs = config.resetTimeoutMs ?? 30_000;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state === CircuitBreakerState.OPEN) {
      if (Date.now() < this.nextAttemptTime) {
        throw new CircuitOpenError();
      }
      this.state = CircuitBreakerState.HALF_OPEN;
    }

    // half-open admits a single trial call until it settles
    const trial = this.state === CircuitBreakerState.HALF_OPEN;
    if (trial) {
      if (this.trialInFlight) throw new CircuitOpenError();
      this.trialInFlight = true;
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      if (trial) this.trialInFlight = false;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;
    this.state = CircuitBreakerState.CLOSED;
  }

  private onFailure(): void {
    this.failureCount++;

    // a failed trial reopens immediately
    if (this.state === CircuitBreakerState.HALF_OPEN || this.failureCount >= this.failureThreshold) {
      this.state = CircuitBreakerState.OPEN;
      this.nextAttemptTime = Date.now() + this.resetTimeoutMs;
    }
  }

  getState(): CircuitBreakerState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }
}

const RETRYABLE_CODES = ['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT', 'TIMEOUT'];
const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_TYPES = ['ConnectionError', 'TimeoutError', 'NoLivingConnectionsError'];
const RETRYABLE_TEXT = ['temporarily_unavailable', 'cluster_block', 'circuit_breaking', 'es_rejected_execution'];

export class ErrorHandler {
  static async withRetry<T>(operation: () => Promise<T>, config: RetryConfig = {}, operationName?: string): Promise<T> {
    const logger = config.logger ?? consoleLogger;
    const isRetryable = config.isRetryable;
    const name = operationName || 'Operation';

    return pRetry(
      async () => {
        try {
          return await operation();
        } catch (error) {
          if (isRetryable && !isRetryable(error)) {
            throw new pRetry.AbortError(error instanceof Error ? error : new Error(describeError(error)));
          }
          throw error;
        }
      },
      {
        retries: config.retries ?? 3,
        minTimeout: config.minTimeout ?? 1000,
        maxTimeout: config.maxTimeout ?? 5000,
        factor: config.factor ?? 2,
        onFailedAttempt: error => {
          logger.warn(
            `${name} attempt ${error.attemptNumber} failed: ${error.message}. ${
              error.retriesLeft > 0 ? `Retrying (${error.retriesLeft} left)...` : 'No more retries.'
            }`,
          );
        },
      },
    );
  }

  static isRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) return false;

    const code = Reflect.get(error, 'code');
    if (typeof code === 'string' && RETRYABLE_CODES.includes(code)) {
      return true;
    }

    const status = getStatusCode(error);
    if (status !== undefined) {
      return RETRYABLE_STATUSES.includes(status);
    }

    if (error instanceof Error && RETRYABLE_TYPES.includes(error.name)) {
      return true;
    }

    const text = `${getErrorType(error) ?? ''} ${describeError(error)}`.toLowerCase();
    return RETRYABLE_TEXT.some(fragment => text.includes(fragment));
  }

  static isTimeoutError(error: unknown): boolean {
    if (error instanceof Error && error.name === 'TimeoutError') return true;
    return getStatusCode(error) === 408;
  }

  /**
   * Retry predicate for cluster calls: the usual transient failures, minus
   * timeouts when the caller asked not to retry them.
   */
  static createRetryPredicate(retryOnTimeout: boolean): (error: unknown) => boolean {
    return error => {
      if (!retryOnTimeout && ErrorHandler.isTimeoutError(error)) return false;
      return ErrorHandler.isRetryableError(error);
    };
  }
}
