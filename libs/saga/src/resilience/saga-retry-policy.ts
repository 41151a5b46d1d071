export enum BackoffStrategy {
  FIXED = 'fixed',
  LINEAR = 'linear',
  EXPONENTIAL = 'exponential',
}

export interface RetryPolicyOptions {
  baseDelayMs: number;
  backoffStrategy: BackoffStrategy;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** Fraction of the delay spread around it; 0 disables jitter */
  jitterFactor: number;
}

export const DEFAULT_RETRY_POLICY_OPTIONS: RetryPolicyOptions = {
  baseDelayMs: 1000,
  backoffStrategy: BackoffStrategy.EXPONENTIAL,
  backoffMultiplier: 2,
  maxDelayMs: 5 * 60 * 1000,
  jitterFactor: 0.1,
};

export class SagaRetryPolicy {
  readonly options: RetryPolicyOptions;

  constructor(
    options: Partial<RetryPolicyOptions> = {},
    private readonly random: () => number = Math.random,
  ) {
    this.options = { ...DEFAULT_RETRY_POLICY_OPTIONS, ...options };
  }

  /**
   * Nominal delay before retrying after the given 1-based attempt, clamped to maxDelayMs
   */
  calculateNominalDelay(attempt: number): number {
    const { baseDelayMs, backoffStrategy, backoffMultiplier, maxDelayMs } = this.options;
    const n = Math.max(1, attempt);

    let delay: number;
    switch (backoffStrategy) {
      case BackoffStrategy.FIXED:
        delay = baseDelayMs;
        break;
      case BackoffStrategy.LINEAR:
        delay = baseDelayMs * n;
        break;
      case BackoffStrategy.EXPONENTIAL:
      default:
        delay = baseDelayMs * Math.pow(backoffMultiplier, n - 1);
        break;
    }

    return Math.min(delay, maxDelayMs);
  }

  /**
   * Nominal delay perturbed by up to ±jitterFactor/2 of itself
   */
  calculateDelay(attempt: number): number {
    const delay = this.calculateNominalDelay(attempt);
    const { jitterFactor } = this.options;
    if (jitterFactor <= 0) {
      return delay;
    }

    const jitter = delay * jitterFactor * (this.random() - 0.5);
    return Math.max(0, Math.round(delay + jitter));
  }

  /**
   * Whether another attempt fits in a step's budget of `maxAttempts`
   */
  shouldRetry(attempt: number, maxAttempts: number): boolean {
    return attempt < maxAttempts;
  }
}
