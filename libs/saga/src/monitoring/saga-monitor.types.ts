export enum SagaHealthStatus {
  HEALTHY = 'Healthy',
  DEGRADED = 'Degraded',
  UNHEALTHY = 'Unhealthy',
}

export enum SagaExecutionOutcome {
  COMPLETED = 'Completed',
  FAILED = 'Failed',
  TIMED_OUT = 'TimedOut',
  ABORTED = 'Aborted',
  COMPENSATED = 'Compensated',
}

/** Anything that identifies a saga: a SagaState or a SagaEvent both qualify */
export interface TrackedSaga {
  sagaId: string;
  sagaType: string;
  correlationId?: string;
}

export interface ActiveSagaMetrics {
  sagaId: string;
  sagaType: string;
  correlationId?: string;
  startedAt: Date;
  currentStep?: string;
  stepStartTimes: Record<string, number>;
  completedSteps: string[];
  failedSteps: string[];
  version: number;
  stuckReported: boolean;
}

export interface SagaExecutionRecord {
  sagaId: string;
  sagaType: string;
  outcome: SagaExecutionOutcome;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  stepCount: number;
  errorMessage?: string;
}

export interface StepTypeMetrics {
  stepName: string;
  executionCount: number;
  failureCount: number;
  totalExecutionTimeMs: number;
  averageExecutionTimeMs: number;
  successRate: number;
  lastExecutedAt?: Date;
  lastFailureAt?: Date;
  lastFailureReason?: string;
}

export interface SagaTypeMetrics {
  sagaType: string;
  activeCount: number;
  completedCount: number;
  failedCount: number;
  timedOutCount: number;
  abortedCount: number;
  compensatedCount: number;
  totalExecutionTimeMs: number;
  averageExecutionTimeMs: number;
  steps: Record<string, StepTypeMetrics>;
}

export interface PersistenceHealthCheck {
  persistenceType: string;
  sagaTypes: string[];
  status: SagaHealthStatus;
  responseTimeMs: number;
  errorMessage?: string;
}

export interface SagaHealthReport {
  timestamp: Date;
  overallStatus: SagaHealthStatus;
  activeSagaCount: number;
  totalSagasInWindow: number;
  completedSagasInWindow: number;
  failedSagasInWindow: number;
  timedOutSagasInWindow: number;
  successRate: number;
  averageExecutionTimeMs: number;
  longestRunningSagaMs?: number;
  persistenceHealthChecks: PersistenceHealthCheck[];
}

export interface SagaPerformanceMetrics {
  timestamp: Date;
  sagaType?: string;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  activeExecutions: number;
  averageExecutionTimeMs: number;
  successRate: number;
  stepMetrics: StepTypeMetrics[];
}
