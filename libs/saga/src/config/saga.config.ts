import { plainToInstance, Type } from 'class-transformer';
import { IsEnum, IsInt, IsNumber, IsOptional, Max, Min, validateSync } from 'class-validator';
import { ConfigService } from '@nestjs/config';
import { formatValidationErrors } from '@conductor/shared';

import { CircuitBreakerOptions } from '../resilience/saga-circuit-breaker';
import { BackoffStrategy, RetryPolicyOptions } from '../resilience/saga-retry-policy';

export const SAGA_OPTIONS = Symbol('SAGA_OPTIONS');

export interface SagaMonitorOptions {
  cleanupIntervalMs: number;
  metricsRetentionMs: number;
  healthWindowMs: number;
  metricsWindowMs: number;
  stuckThresholdMs: number;
  maxMetricsHistory: number;
}

export interface SagaOptions {
  timeoutCheckIntervalMs: number;
  monitor: SagaMonitorOptions;
  retry: RetryPolicyOptions;
  circuitBreaker: CircuitBreakerOptions;
}

export interface SagaOptionsOverrides {
  timeoutCheckIntervalMs?: number;
  monitor?: Partial<SagaMonitorOptions>;
  retry?: Partial<RetryPolicyOptions>;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
}

/**
 * Environment variables read by the saga engine
 */
export class SagaEnvironment {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(100)
  SAGA_TIMEOUT_CHECK_INTERVAL_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1000)
  SAGA_MONITOR_CLEANUP_INTERVAL_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_METRICS_RETENTION_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_HEALTH_WINDOW_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_METRICS_WINDOW_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_STUCK_THRESHOLD_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_MAX_METRICS_HISTORY?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  SAGA_RETRY_BASE_DELAY_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  SAGA_RETRY_MAX_DELAY_MS?: number;

  @IsOptional()
  @IsEnum(BackoffStrategy)
  SAGA_RETRY_BACKOFF?: BackoffStrategy;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  SAGA_RETRY_MULTIPLIER?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  SAGA_RETRY_JITTER_FACTOR?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_CIRCUIT_FAILURE_THRESHOLD?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SAGA_CIRCUIT_TIMEOUT_MS?: number;
}

/**
 * ConfigModule `validate` hook: converts and checks the saga variables,
 * failing startup with every violated constraint
 */
export function validateSagaEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const environment = plainToInstance(SagaEnvironment, config, { enableImplicitConversion: false });
  const errors = validateSync(environment, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid saga configuration:\n${formatValidationErrors(errors).join('\n')}`);
  }

  return { ...config, ...environment };
}

export function buildSagaOptions(configService: ConfigService, overrides: SagaOptionsOverrides = {}): SagaOptions {
  const read = (key: keyof SagaEnvironment, defaultValue: number): number => {
    const value = Number(configService.get(key, defaultValue));
    return Number.isFinite(value) ? value : defaultValue;
  };
  const backoff = configService.get<BackoffStrategy>('SAGA_RETRY_BACKOFF', BackoffStrategy.EXPONENTIAL);

  return {
    timeoutCheckIntervalMs: overrides.timeoutCheckIntervalMs ?? read('SAGA_TIMEOUT_CHECK_INTERVAL_MS', 60000),
    monitor: {
      cleanupIntervalMs: read('SAGA_MONITOR_CLEANUP_INTERVAL_MS', 5 * 60 * 1000),
      metricsRetentionMs: read('SAGA_METRICS_RETENTION_MS', 7 * 24 * 60 * 60 * 1000),
      healthWindowMs: read('SAGA_HEALTH_WINDOW_MS', 60 * 60 * 1000),
      metricsWindowMs: read('SAGA_METRICS_WINDOW_MS', 24 * 60 * 60 * 1000),
      stuckThresholdMs: read('SAGA_STUCK_THRESHOLD_MS', 2 * 60 * 60 * 1000),
      maxMetricsHistory: read('SAGA_MAX_METRICS_HISTORY', 10000),
      ...overrides.monitor,
    },
    retry: {
      baseDelayMs: read('SAGA_RETRY_BASE_DELAY_MS', 1000),
      backoffStrategy: Object.values(BackoffStrategy).includes(backoff) ? backoff : BackoffStrategy.EXPONENTIAL,
      backoffMultiplier: read('SAGA_RETRY_MULTIPLIER', 2),
      maxDelayMs: read('SAGA_RETRY_MAX_DELAY_MS', 5 * 60 * 1000),
      jitterFactor: read('SAGA_RETRY_JITTER_FACTOR', 0.1),
      ...overrides.retry,
    },
    circuitBreaker: {
      failureThreshold: read('SAGA_CIRCUIT_FAILURE_THRESHOLD', 5),
      timeoutMs: read('SAGA_CIRCUIT_TIMEOUT_MS', 60000),
      successThreshold: 1,
      ...overrides.circuitBreaker,
    },
  };
}
