import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import { getErrorMessage } from '@conductor/shared';

import { SAGA_OPTIONS, SagaOptions } from '../config/saga.config';
import { SagaStatus } from '../enums/saga-status.enum';
import { SAGA_EVENT_PATTERNS, SagaEventTypes } from '../events/saga-event-types';
import { SAGA_EVENT_PUBLISHER, SagaEvent, SagaEventPublisher } from '../interfaces/saga-event-publisher.interface';
import { SagaRegistry } from '../registry/saga-registry.service';
import {
  ActiveSagaMetrics,
  PersistenceHealthCheck,
  SagaExecutionOutcome,
  SagaExecutionRecord,
  SagaHealthReport,
  SagaHealthStatus,
  SagaPerformanceMetrics,
  SagaTypeMetrics,
  StepTypeMetrics,
  TrackedSaga,
} from './saga-monitor.types';

const CLEANUP_INTERVAL_NAME = 'saga-monitor-cleanup';

export function calculateHealthStatus(failed: number, total: number): SagaHealthStatus {
  if (total === 0) {
    return SagaHealthStatus.HEALTHY;
  }
  const failureRate = failed / total;
  if (failureRate <= 0.05) {
    return SagaHealthStatus.HEALTHY;
  }
  if (failureRate <= 0.15) {
    return SagaHealthStatus.DEGRADED;
  }
  return SagaHealthStatus.UNHEALTHY;
}

function emptyTypeMetrics(sagaType: string): SagaTypeMetrics {
  return {
    sagaType,
    activeCount: 0,
    completedCount: 0,
    failedCount: 0,
    timedOutCount: 0,
    abortedCount: 0,
    compensatedCount: 0,
    totalExecutionTimeMs: 0,
    averageExecutionTimeMs: 0,
    steps: {},
  };
}

function emptyStepMetrics(stepName: string): StepTypeMetrics {
  return {
    stepName,
    executionCount: 0,
    failureCount: 0,
    totalExecutionTimeMs: 0,
    averageExecutionTimeMs: 0,
    successRate: 1,
  };
}

/**
 * In-process metrics over saga executions, fed by lifecycle events
 */
@Injectable()
export class SagaMonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SagaMonitorService.name);
  private readonly active = new Map<string, ActiveSagaMetrics>();
  private readonly typeMetrics = new Map<string, SagaTypeMetrics>();
  private history: SagaExecutionRecord[] = [];
  private isProcessing = false;

  constructor(
    private readonly registry: SagaRegistry,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(SAGA_EVENT_PUBLISHER) private readonly publisher: SagaEventPublisher,
    @Inject(SAGA_OPTIONS) private readonly options: SagaOptions,
  ) {}

  onModuleInit() {
    const interval = setInterval(() => {
      void this.runMaintenance();
    }, this.options.monitor.cleanupIntervalMs);
    this.schedulerRegistry.addInterval(CLEANUP_INTERVAL_NAME, interval);
    this.logger.log('Saga monitor started');
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', CLEANUP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(CLEANUP_INTERVAL_NAME);
    }
    this.logger.log('Saga monitor stopped');
  }

  trackSagaStarted(saga: TrackedSaga): void {
    if (this.active.has(saga.sagaId)) {
      return;
    }
    this.active.set(saga.sagaId, {
      sagaId: saga.sagaId,
      sagaType: saga.sagaType,
      correlationId: saga.correlationId,
      startedAt: new Date(),
      stepStartTimes: {},
      completedSteps: [],
      failedSteps: [],
      version: 0,
      stuckReported: false,
    });
    this.typeMetricsFor(saga.sagaType).activeCount++;
  }

  trackSagaCompleted(saga: TrackedSaga): void {
    this.trackSagaFinished(saga, SagaExecutionOutcome.COMPLETED);
  }

  trackSagaFailed(saga: TrackedSaga, reason: string): void {
    this.trackSagaFinished(saga, SagaExecutionOutcome.FAILED, reason);
  }

  /**
   * Close an in-flight saga and move it into the rolling history.
   * Sagas that are not in flight are ignored.
   */
  trackSagaFinished(saga: TrackedSaga, outcome: SagaExecutionOutcome, errorMessage?: string): void {
    const metrics = this.active.get(saga.sagaId);
    if (!metrics) {
      return;
    }
    this.active.delete(saga.sagaId);

    const finishedAt = new Date();
    const durationMs = finishedAt.getTime() - metrics.startedAt.getTime();
    const typeMetrics = this.typeMetricsFor(metrics.sagaType);
    typeMetrics.activeCount = Math.max(0, typeMetrics.activeCount - 1);

    switch (outcome) {
      case SagaExecutionOutcome.COMPLETED:
        typeMetrics.completedCount++;
        typeMetrics.totalExecutionTimeMs += durationMs;
        typeMetrics.averageExecutionTimeMs = typeMetrics.totalExecutionTimeMs / typeMetrics.completedCount;
        break;
      case SagaExecutionOutcome.FAILED:
        typeMetrics.failedCount++;
        break;
      case SagaExecutionOutcome.TIMED_OUT:
        typeMetrics.timedOutCount++;
        break;
      case SagaExecutionOutcome.ABORTED:
        typeMetrics.abortedCount++;
        break;
      case SagaExecutionOutcome.COMPENSATED:
        typeMetrics.compensatedCount++;
        break;
    }

    this.history.push({
      sagaId: metrics.sagaId,
      sagaType: metrics.sagaType,
      outcome,
      startedAt: metrics.startedAt,
      finishedAt,
      durationMs,
      stepCount: metrics.completedSteps.length + metrics.failedSteps.length,
      errorMessage,
    });
    if (this.history.length > this.options.monitor.maxMetricsHistory) {
      this.history.splice(0, this.history.length - this.options.monitor.maxMetricsHistory);
    }
  }

  trackStepStarted(saga: TrackedSaga, stepName: string): void {
    const metrics = this.active.get(saga.sagaId);
    if (metrics) {
      metrics.currentStep = stepName;
      metrics.stepStartTimes[stepName] = Date.now();
    }
  }

  trackStepCompleted(saga: TrackedSaga, stepName: string, durationMs?: number): void {
    const elapsed = durationMs ?? this.elapsedForStep(saga.sagaId, stepName);
    this.active.get(saga.sagaId)?.completedSteps.push(stepName);

    const step = this.stepMetricsFor(saga.sagaType, stepName);
    step.executionCount++;
    step.totalExecutionTimeMs += elapsed;
    step.lastExecutedAt = new Date();
    this.refreshStepAverages(step);
  }

  trackStepFailed(saga: TrackedSaga, stepName: string, error: string, durationMs?: number): void {
    const elapsed = durationMs ?? this.elapsedForStep(saga.sagaId, stepName);
    this.active.get(saga.sagaId)?.failedSteps.push(stepName);

    const step = this.stepMetricsFor(saga.sagaType, stepName);
    step.executionCount++;
    step.failureCount++;
    step.totalExecutionTimeMs += elapsed;
    step.lastExecutedAt = new Date();
    step.lastFailureAt = new Date();
    step.lastFailureReason = error;
    this.refreshStepAverages(step);
  }

  async getHealthReport(windowMs: number = this.options.monitor.healthWindowMs): Promise<SagaHealthReport> {
    const now = Date.now();
    const recent = this.getExecutionHistory(undefined, windowMs);
    const total = recent.length;
    const failed = recent.filter(record => record.outcome === SagaExecutionOutcome.FAILED).length;
    const timedOut = recent.filter(record => record.outcome === SagaExecutionOutcome.TIMED_OUT).length;
    const completed = recent.filter(record => record.outcome === SagaExecutionOutcome.COMPLETED).length;

    const oldestActive = Math.min(...[...this.active.values()].map(metrics => metrics.startedAt.getTime()));

    return {
      timestamp: new Date(now),
      overallStatus: calculateHealthStatus(failed + timedOut, total),
      activeSagaCount: this.active.size,
      totalSagasInWindow: total,
      completedSagasInWindow: completed,
      failedSagasInWindow: failed,
      timedOutSagasInWindow: timedOut,
      successRate: total > 0 ? (total - failed - timedOut) / total : 1,
      averageExecutionTimeMs: total > 0 ? recent.reduce((sum, record) => sum + record.durationMs, 0) / total : 0,
      longestRunningSagaMs: this.active.size > 0 ? now - oldestActive : undefined,
      persistenceHealthChecks: await this.checkPersistenceHealth(),
    };
  }

  getPerformanceMetrics(sagaType?: string): SagaPerformanceMetrics {
    if (sagaType !== undefined) {
      const metrics = this.typeMetrics.get(sagaType) ?? emptyTypeMetrics(sagaType);
      const total =
        metrics.completedCount +
        metrics.failedCount +
        metrics.timedOutCount +
        metrics.abortedCount +
        metrics.compensatedCount;

      return {
        timestamp: new Date(),
        sagaType,
        totalExecutions: total,
        successfulExecutions: metrics.completedCount,
        failedExecutions: total - metrics.completedCount,
        activeExecutions: metrics.activeCount,
        averageExecutionTimeMs: metrics.averageExecutionTimeMs,
        successRate: total > 0 ? metrics.completedCount / total : 1,
        stepMetrics: Object.values(metrics.steps).map(step => ({ ...step })),
      };
    }

    const recent = this.getExecutionHistory(undefined, this.options.monitor.metricsWindowMs);
    const successful = recent.filter(record => record.outcome === SagaExecutionOutcome.COMPLETED).length;

    return {
      timestamp: new Date(),
      totalExecutions: recent.length,
      successfulExecutions: successful,
      failedExecutions: recent.length - successful,
      activeExecutions: this.active.size,
      averageExecutionTimeMs: recent.length
        ? recent.reduce((sum, record) => sum + record.durationMs, 0) / recent.length
        : 0,
      successRate: recent.length > 0 ? successful / recent.length : 1,
      stepMetrics: [...this.typeMetrics.values()].flatMap(metrics =>
        Object.values(metrics.steps).map(step => ({ ...step })),
      ),
    };
  }

  getTypeMetrics(sagaType: string): SagaTypeMetrics | undefined {
    const metrics = this.typeMetrics.get(sagaType);
    return metrics ? { ...metrics, steps: { ...metrics.steps } } : undefined;
  }

  /**
   * Finished executions, newest last, optionally filtered by type and age
   */
  getExecutionHistory(sagaType?: string, windowMs?: number): SagaExecutionRecord[] {
    const since = windowMs === undefined ? -Infinity : Date.now() - windowMs;
    return this.history.filter(
      record =>
        record.finishedAt.getTime() >= since && (sagaType === undefined || record.sagaType === sagaType),
    );
  }

  getActiveSagas(): ActiveSagaMetrics[] {
    return [...this.active.values()].map(metrics => ({ ...metrics }));
  }

  getActiveSagaCount(): number {
    return this.active.size;
  }

  /**
   * Drop history past retention, then trim to the count cap
   */
  cleanupOldMetrics(): number {
    const before = this.history.length;
    const cutoff = Date.now() - this.options.monitor.metricsRetentionMs;
    this.history = this.history.filter(record => record.finishedAt.getTime() >= cutoff);

    const excess = this.history.length - this.options.monitor.maxMetricsHistory;
    if (excess > 0) {
      this.history.splice(0, excess);
    }
    return before - this.history.length;
  }

  /**
   * Publish a Stuck event once for every in-flight saga older than the threshold
   */
  checkForStuckSagas(): ActiveSagaMetrics[] {
    const now = Date.now();
    const threshold = now - this.options.monitor.stuckThresholdMs;
    const stuck = [...this.active.values()].filter(
      metrics => !metrics.stuckReported && metrics.startedAt.getTime() < threshold,
    );

    for (const metrics of stuck) {
      const runningForMs = now - metrics.startedAt.getTime();
      metrics.stuckReported = true;
      this.logger.warn(`Detected stuck saga ${metrics.sagaId} running for ${runningForMs}ms`, {
        sagaId: metrics.sagaId,
        sagaType: metrics.sagaType,
        correlationId: metrics.correlationId,
      });

      this.publisher.publish({
        sagaId: metrics.sagaId,
        sagaType: metrics.sagaType,
        eventType: SagaEventTypes.STUCK,
        data: { runningForMs, currentStep: metrics.currentStep ?? null },
        timestamp: new Date(now),
        correlationId: metrics.correlationId,
        metadata: {
          status: SagaStatus.RUNNING,
          currentStep: metrics.currentStep ?? '',
          version: metrics.version,
        },
      });
    }

    return stuck;
  }

  @OnEvent(SAGA_EVENT_PATTERNS.ALL)
  handleSagaEvent(event: SagaEvent): void {
    const active = this.active.get(event.sagaId);
    if (active) {
      active.version = event.metadata.version;
    }

    const stepName = typeof event.data.stepName === 'string' ? event.data.stepName : undefined;
    const durationMs = typeof event.data.durationMs === 'number' ? event.data.durationMs : undefined;

    switch (event.eventType) {
      case SagaEventTypes.STARTED:
        this.trackSagaStarted(event);
        break;
      case SagaEventTypes.COMPLETED:
        this.trackSagaCompleted(event);
        break;
      case SagaEventTypes.FAILED:
        this.trackSagaFailed(event, typeof event.data.error === 'string' ? event.data.error : 'Saga failed');
        break;
      case SagaEventTypes.TIMED_OUT:
        this.trackSagaFinished(event, SagaExecutionOutcome.TIMED_OUT, 'Saga timed out');
        break;
      case SagaEventTypes.ABORTED:
        this.trackSagaFinished(
          event,
          SagaExecutionOutcome.ABORTED,
          typeof event.data.reason === 'string' ? event.data.reason : undefined,
        );
        break;
      case SagaEventTypes.COMPENSATED:
        this.trackSagaFinished(event, SagaExecutionOutcome.COMPENSATED);
        break;
      case SagaEventTypes.STEP_STARTED:
        if (stepName) {
          this.trackStepStarted(event, stepName);
        }
        break;
      case SagaEventTypes.STEP_COMPLETED:
        if (stepName) {
          this.trackStepCompleted(event, stepName, durationMs);
        }
        break;
      case SagaEventTypes.STEP_FAILED:
        if (stepName) {
          const error = typeof event.data.error === 'string' ? event.data.error : 'Step failed';
          this.trackStepFailed(event, stepName, error, durationMs);
        }
        break;
      default:
        break;
    }
  }

  private async runMaintenance(): Promise<void> {
    if (this.isProcessing) {
      return;
    }
    this.isProcessing = true;

    try {
      const removed = this.cleanupOldMetrics();
      if (removed > 0) {
        this.logger.debug(`Evicted ${removed} saga metric records`);
      }
      this.checkForStuckSagas();
    } catch (error) {
      this.logger.error('Error in saga monitoring cleanup', { error: getErrorMessage(error) });
    } finally {
      this.isProcessing = false;
    }
  }

  private async checkPersistenceHealth(): Promise<PersistenceHealthCheck[]> {
    const checks: PersistenceHealthCheck[] = [];

    for (const persistence of this.registry.getPersistences()) {
      const sagaTypes = this.registry
        .getRegistrations()
        .filter(registration => registration.persistence === persistence)
        .map(registration => registration.sagaType);
      const startedAt = Date.now();

      try {
        await persistence.getStatistics();
        checks.push({
          persistenceType: persistence.constructor.name,
          sagaTypes,
          status: SagaHealthStatus.HEALTHY,
          responseTimeMs: Date.now() - startedAt,
        });
      } catch (error) {
        checks.push({
          persistenceType: persistence.constructor.name,
          sagaTypes,
          status: SagaHealthStatus.UNHEALTHY,
          responseTimeMs: Date.now() - startedAt,
          errorMessage: getErrorMessage(error),
        });
      }
    }

    return checks;
  }

  private typeMetricsFor(sagaType: string): SagaTypeMetrics {
    let metrics = this.typeMetrics.get(sagaType);
    if (!metrics) {
      metrics = emptyTypeMetrics(sagaType);
      this.typeMetrics.set(sagaType, metrics);
    }
    return metrics;
  }

  private stepMetricsFor(sagaType: string, stepName: string): StepTypeMetrics {
    const typeMetrics = this.typeMetricsFor(sagaType);
    let step = typeMetrics.steps[stepName];
    if (!step) {
      step = emptyStepMetrics(stepName);
      typeMetrics.steps[stepName] = step;
    }
    return step;
  }

  private refreshStepAverages(step: StepTypeMetrics): void {
    step.averageExecutionTimeMs = step.totalExecutionTimeMs / step.executionCount;
    step.successRate = (step.executionCount - step.failureCount) / step.executionCount;
  }

  private elapsedForStep(sagaId: string, stepName: string): number {
    const startedAt = this.active.get(sagaId)?.stepStartTimes[stepName];
    return startedAt === undefined ? 0 : Math.max(0, Date.now() - startedAt);
  }
}
