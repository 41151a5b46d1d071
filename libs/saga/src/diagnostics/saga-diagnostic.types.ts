import { SagaStateDocument } from '../entities/saga-state.serializer';
import { SagaStatus, SagaStepStatus } from '../enums/saga-status.enum';
import { SagaStatistics } from '../interfaces/saga-persistence.interface';
import { SagaPerformanceMetrics } from '../monitoring/saga-monitor.types';
import { CircuitBreakerMetrics } from '../resilience/saga-circuit-breaker';

export enum DiagnosticStatus {
  HEALTHY = 'Healthy',
  WARNING = 'Warning',
  CRITICAL = 'Critical',
  ERROR = 'Error',
  NOT_FOUND = 'NotFound',
}

export enum AnomalyType {
  HIGH_FAILURE_RATE = 'HighFailureRate',
  SLOW_EXECUTION = 'SlowExecution',
  STUCK_SAGA = 'StuckSaga',
  HIGH_RETRY_COUNT = 'HighRetryCount',
  HIGH_STEP_FAILURE_RATE = 'HighStepFailureRate',
  SLOW_STEP = 'SlowStep',
}

export enum AnomalySeverity {
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High',
}

export enum SagaExportFormat {
  JSON = 'json',
  XML = 'xml',
  CSV = 'csv',
}

export interface AnomalyThresholds {
  minSuccessRate: number;
  maxAverageExecutionMs: number;
  maxLongestRunningMs: number;
  maxSagaRunningMs: number;
  minStepSuccessRate: number;
  maxStepAverageMs: number;
}

export const DEFAULT_ANOMALY_THRESHOLDS: AnomalyThresholds = {
  minSuccessRate: 0.95,
  maxAverageExecutionMs: 30 * 60 * 1000,
  maxLongestRunningMs: 2 * 60 * 60 * 1000,
  maxSagaRunningMs: 60 * 60 * 1000,
  minStepSuccessRate: 0.9,
  maxStepAverageMs: 10 * 60 * 1000,
};

export interface SagaAnomaly {
  type: AnomalyType;
  severity: AnomalySeverity;
  description: string;
  detectedAt: Date;
  value?: number;
  threshold?: number;
  sagaId?: string;
  sagaType?: string;
  stepName?: string;
}

export interface StepExecutionTrace {
  stepName: string;
  stepType: string;
  status: SagaStepStatus;
  startedAt?: Date;
  completedAt?: Date;
  durationMs?: number;
  retryCount: number;
  maxRetries: number;
  errorMessage?: string;
}

export interface CompensationTrace {
  stepName: string;
  action: string;
  status: SagaStepStatus;
  executedAt?: Date;
  errorMessage?: string;
  retryCount: number;
}

export interface SagaExecutionTrace {
  sagaId: string;
  generatedAt: Date;
  found: boolean;
  sagaType?: string;
  status?: SagaStatus;
  correlationId?: string;
  createdAt?: Date;
  lastUpdatedAt?: Date;
  completedAt?: Date;
  totalDurationMs?: number;
  steps: StepExecutionTrace[];
  compensations: CompensationTrace[];
}

export interface SagaDiagnosticReport {
  sagaId: string;
  generatedAt: Date;
  status: DiagnosticStatus;
  summary: string;
  sagaState?: SagaStateDocument;
  executionTrace?: SagaExecutionTrace;
  performanceMetrics?: SagaPerformanceMetrics;
  anomalies: SagaAnomaly[];
  errors: string[];
}

export interface SagaValidationIssue {
  field: string;
  error: string;
}

export interface PersistenceDebugInfo {
  persistenceType?: string;
  version?: number;
  lastSaveTime?: Date;
  statistics?: SagaStatistics;
  errorMessage?: string;
}

export interface SagaDebugInfo {
  sagaId: string;
  generatedAt: Date;
  found: boolean;
  serializedState?: string;
  stepHandlers: string[];
  persistence: PersistenceDebugInfo;
  validationResults: SagaValidationIssue[];
  allowedTransitions: SagaStatus[];
  nextPossibleSteps: string[];
  circuitBreaker?: CircuitBreakerMetrics;
  errorMessage?: string;
}
