import { Logger } from '@nestjs/common';

import { CircuitBreakerOpenError } from '../errors/saga.errors';

export enum CircuitState {
  CLOSED = 'Closed',
  OPEN = 'Open',
  HALF_OPEN = 'HalfOpen',
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  /** How long the breaker stays open before letting a probe through */
  timeoutMs: number;
  /** Consecutive half-open successes needed to close */
  successThreshold: number;
}

export interface CircuitBreakerMetrics {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime?: Date;
  rejectedCount: number;
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  timeoutMs: 60000, // 1 minute
  successThreshold: 1,
};

/**
 * Consecutive-failure circuit breaker, one instance per saga type.
 * While open, calls are rejected without invoking the operation.
 */
export class SagaCircuitBreaker {
  private readonly logger = new Logger(SagaCircuitBreaker.name);
  private readonly options: CircuitBreakerOptions;
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private rejectedCount = 0;
  private lastFailureTime = 0;
  private probeInFlight = false;

  constructor(
    readonly name: string,
    options: Partial<CircuitBreakerOptions> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.options = { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...options };
  }

  /**
   * Run `operation` through the breaker. A thrown error is a failure; a resolved
   * value is a failure only when `isFailure` says so.
   */
  async execute<T>(operation: () => Promise<T>, isFailure?: (result: T) => boolean): Promise<T> {
    this.beforeCall();
    const isProbe = this.state === CircuitState.HALF_OPEN;
    if (isProbe) {
      this.probeInFlight = true;
    }

    try {
      const result = await operation();
      if (isFailure?.(result)) {
        this.onFailure();
      } else {
        this.onSuccess();
      }
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      if (isProbe) {
        this.probeInFlight = false;
      }
    }
  }

  getState(): CircuitState {
    if (this.state === CircuitState.OPEN && this.shouldAttemptReset()) {
      return CircuitState.HALF_OPEN;
    }
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      name: this.name,
      state: this.getState(),
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : undefined,
      rejectedCount: this.rejectedCount,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
    this.probeInFlight = false;
    this.logger.log(`Circuit breaker ${this.name} manually reset`);
  }

  private beforeCall(): void {
    if (this.state === CircuitState.OPEN) {
      if (this.shouldAttemptReset()) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        this.logger.log(`Circuit breaker ${this.name} transitioning to HALF_OPEN`);
      } else {
        this.reject();
      }
    }

    // Only one probe at a time while half-open
    if (this.state === CircuitState.HALF_OPEN && this.probeInFlight) {
      this.reject();
    }
  }

  private reject(): never {
    this.rejectedCount++;
    const retryAfterMs = Math.max(0, this.lastFailureTime + this.options.timeoutMs - this.now());
    throw new CircuitBreakerOpenError(this.name, retryAfterMs);
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.state = CircuitState.CLOSED;
        this.successCount = 0;
        this.lastFailureTime = 0;
        this.logger.log(`Circuit breaker ${this.name} transitioning to CLOSED`);
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.state = CircuitState.OPEN;
      this.successCount = 0;
      this.logger.warn(`Circuit breaker ${this.name} transitioning to OPEN (from HALF_OPEN)`);
    } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold) {
      this.state = CircuitState.OPEN;
      this.logger.warn(`Circuit breaker ${this.name} transitioning to OPEN`, {
        failureCount: this.failureCount,
      });
    }
  }

  private shouldAttemptReset(): boolean {
    return this.now() - this.lastFailureTime >= this.options.timeoutMs;
  }
}
