import { Injectable, Logger } from '@nestjs/common';
import { formatDuration, getErrorMessage, isValidUUID } from '@conductor/shared';

import { SagaCallContext } from '../context/saga-call-context';
import { SagaState, getAllowedTransitions } from '../entities/saga-state.entity';
import { toSagaDocument } from '../entities/saga-state.serializer';
import { SagaStatus, SagaStepStatus, TERMINAL_SAGA_STATUSES } from '../enums/saga-status.enum';
import { SagaMonitorService } from '../monitoring/saga-monitor.service';
import { SagaExecutionOutcome } from '../monitoring/saga-monitor.types';
import { SagaRegistry } from '../registry/saga-registry.service';
import { escapeXml, toCsvLine } from '../utils/export-format';
import {
  AnomalySeverity,
  AnomalyThresholds,
  AnomalyType,
  DEFAULT_ANOMALY_THRESHOLDS,
  DiagnosticStatus,
  PersistenceDebugInfo,
  SagaAnomaly,
  SagaDebugInfo,
  SagaDiagnosticReport,
  SagaExecutionTrace,
  SagaExportFormat,
  SagaValidationIssue,
} from './saga-diagnostic.types';

const DEFAULT_LOOKBACK_MS = 24 * 60 * 60 * 1000;

/**
 * Read-only reporting over persisted sagas and monitor metrics
 */
@Injectable()
export class SagaDiagnosticService {
  private readonly logger = new Logger(SagaDiagnosticService.name);
  private thresholds: AnomalyThresholds = { ...DEFAULT_ANOMALY_THRESHOLDS };

  constructor(
    private readonly registry: SagaRegistry,
    private readonly monitor: SagaMonitorService,
  ) {}

  setThresholds(thresholds: Partial<AnomalyThresholds>): void {
    this.thresholds = { ...this.thresholds, ...thresholds };
  }

  getThresholds(): AnomalyThresholds {
    return { ...this.thresholds };
  }

  async generateReport(sagaId: string, context?: SagaCallContext): Promise<SagaDiagnosticReport> {
    this.logger.debug(`Generating diagnostic report for saga ${sagaId}`);

    const report: SagaDiagnosticReport = {
      sagaId,
      generatedAt: new Date(),
      status: DiagnosticStatus.HEALTHY,
      summary: '',
      anomalies: [],
      errors: [],
    };

    try {
      const state = await this.registry.findSaga(sagaId, context);
      if (!state) {
        report.status = DiagnosticStatus.NOT_FOUND;
        report.summary = 'Saga not found in any persistence store';
        return report;
      }

      report.sagaState = toSagaDocument(state);
      report.executionTrace = this.buildTrace(state);
      report.performanceMetrics = this.monitor.getPerformanceMetrics(state.sagaType);
      report.anomalies = this.detectSagaAnomalies(state);
      report.status = this.determineStatus(report.anomalies);
      report.summary = this.buildSummary(state, report.anomalies);
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(`Failed to generate diagnostic report for saga ${sagaId}`, { sagaId, error: message });
      report.status = DiagnosticStatus.ERROR;
      report.summary = `Error generating report: ${message}`;
      report.errors.push(message);
    }

    return report;
  }

  async getExecutionTrace(sagaId: string, context?: SagaCallContext): Promise<SagaExecutionTrace> {
    const state = await this.registry.findSaga(sagaId, context);
    return state
      ? this.buildTrace(state)
      : { sagaId, generatedAt: new Date(), found: false, steps: [], compensations: [] };
  }

  /**
   * Type-level anomalies from the monitor's history, active sagas and step metrics
   */
  detectAnomalies(sagaType?: string, lookbackMs: number = DEFAULT_LOOKBACK_MS): SagaAnomaly[] {
    const now = Date.now();
    const detectedAt = new Date(now);
    const anomalies: SagaAnomaly[] = [];
    const records = this.monitor.getExecutionHistory(sagaType, lookbackMs);

    if (records.length > 0) {
      const completed = records.filter(record => record.outcome === SagaExecutionOutcome.COMPLETED).length;
      const successRate = completed / records.length;
      if (successRate < this.thresholds.minSuccessRate) {
        anomalies.push({
          type: AnomalyType.HIGH_FAILURE_RATE,
          severity: AnomalySeverity.HIGH,
          description: `Success rate ${(successRate * 100).toFixed(2)}% is below ${(this.thresholds.minSuccessRate * 100).toFixed(2)}%`,
          detectedAt,
          value: successRate,
          threshold: this.thresholds.minSuccessRate,
          sagaType,
        });
      }

      const averageMs = records.reduce((sum, record) => sum + record.durationMs, 0) / records.length;
      if (averageMs > this.thresholds.maxAverageExecutionMs) {
        anomalies.push({
          type: AnomalyType.SLOW_EXECUTION,
          severity: AnomalySeverity.MEDIUM,
          description: `Average execution time ${formatDuration(averageMs)} exceeds ${formatDuration(this.thresholds.maxAverageExecutionMs)}`,
          detectedAt,
          value: averageMs,
          threshold: this.thresholds.maxAverageExecutionMs,
          sagaType,
        });
      }
    }

    const active = this.monitor
      .getActiveSagas()
      .filter(metrics => sagaType === undefined || metrics.sagaType === sagaType);
    if (active.length > 0) {
      const longestMs = Math.max(...active.map(metrics => now - metrics.startedAt.getTime()));
      if (longestMs > this.thresholds.maxLongestRunningMs) {
        anomalies.push({
          type: AnomalyType.STUCK_SAGA,
          severity: AnomalySeverity.HIGH,
          description: `Longest running saga has been active for ${formatDuration(longestMs)}`,
          detectedAt,
          value: longestMs,
          threshold: this.thresholds.maxLongestRunningMs,
          sagaType,
        });
      }
    }

    for (const step of this.monitor.getPerformanceMetrics(sagaType).stepMetrics) {
      if (step.executionCount === 0) {
        continue;
      }
      if (step.successRate < this.thresholds.minStepSuccessRate) {
        anomalies.push({
          type: AnomalyType.HIGH_STEP_FAILURE_RATE,
          severity: AnomalySeverity.MEDIUM,
          description: `Step '${step.stepName}' has high failure rate: ${(step.successRate * 100).toFixed(2)}% success`,
          detectedAt,
          value: step.successRate,
          threshold: this.thresholds.minStepSuccessRate,
          sagaType,
          stepName: step.stepName,
        });
      }
      if (step.averageExecutionTimeMs > this.thresholds.maxStepAverageMs) {
        anomalies.push({
          type: AnomalyType.SLOW_STEP,
          severity: AnomalySeverity.LOW,
          description: `Step '${step.stepName}' is slow: ${formatDuration(step.averageExecutionTimeMs)}`,
          detectedAt,
          value: step.averageExecutionTimeMs,
          threshold: this.thresholds.maxStepAverageMs,
          sagaType,
          stepName: step.stepName,
        });
      }
    }

    return anomalies;
  }

  /**
   * Anomalies visible on a single saga's persisted state
   */
  detectSagaAnomalies(state: SagaState): SagaAnomaly[] {
    const detectedAt = new Date();
    const anomalies: SagaAnomaly[] = [];

    for (const step of state.steps) {
      const limit = Math.floor(step.maxRetries / 2);
      if (step.retryCount > limit) {
        anomalies.push({
          type: AnomalyType.HIGH_RETRY_COUNT,
          severity: AnomalySeverity.MEDIUM,
          description: `Step '${step.name}' retried ${step.retryCount} of ${step.maxRetries} times`,
          detectedAt,
          value: step.retryCount,
          threshold: limit,
          sagaId: state.sagaId,
          sagaType: state.sagaType,
          stepName: step.name,
        });
      }
    }

    const runningMs = detectedAt.getTime() - state.createdAt.getTime();
    if (state.status === SagaStatus.RUNNING && runningMs > this.thresholds.maxSagaRunningMs) {
      anomalies.push({
        type: AnomalyType.STUCK_SAGA,
        severity: AnomalySeverity.HIGH,
        description: `Saga has been running for ${formatDuration(runningMs)}`,
        detectedAt,
        value: runningMs,
        threshold: this.thresholds.maxSagaRunningMs,
        sagaId: state.sagaId,
        sagaType: state.sagaType,
      });
    }

    return anomalies;
  }

  async getDebugInfo(sagaId: string, context?: SagaCallContext): Promise<SagaDebugInfo> {
    const debugInfo: SagaDebugInfo = {
      sagaId,
      generatedAt: new Date(),
      found: false,
      stepHandlers: [],
      persistence: {},
      validationResults: [],
      allowedTransitions: [],
      nextPossibleSteps: [],
    };

    try {
      const state = await this.registry.findSaga(sagaId, context);
      if (!state) {
        return debugInfo;
      }

      debugInfo.found = true;
      debugInfo.serializedState = JSON.stringify(toSagaDocument(state), null, 2);
      debugInfo.validationResults = this.validateSagaState(state);
      debugInfo.allowedTransitions = [...getAllowedTransitions(state.status)];

      if (this.registry.has(state.sagaType)) {
        const registration = this.registry.getRegistration(state.sagaType);
        debugInfo.stepHandlers = registration.orchestrator.getHandlerNames();
        debugInfo.nextPossibleSteps = this.getNextPossibleSteps(state);
        debugInfo.circuitBreaker = registration.circuitBreaker?.getMetrics();
        debugInfo.persistence = await this.getPersistenceInfo(state, context);
      }
    } catch (error) {
      this.logger.error(`Failed to get debug info for saga ${sagaId}`, { sagaId, error: getErrorMessage(error) });
      debugInfo.errorMessage = getErrorMessage(error);
    }

    return debugInfo;
  }

  /**
   * Structural checks on a saga state; an empty list means valid
   */
  validateSagaState(state: SagaState): SagaValidationIssue[] {
    const issues: SagaValidationIssue[] = [];

    if (!isValidUUID(state.sagaId)) {
      issues.push({ field: 'sagaId', error: 'sagaId must be a UUID' });
    }
    if (!state.sagaType.trim()) {
      issues.push({ field: 'sagaType', error: 'sagaType cannot be empty' });
    }
    if (Number.isNaN(state.createdAt.getTime())) {
      issues.push({ field: 'createdAt', error: 'createdAt must be set' });
    }
    if (state.status !== SagaStatus.NOT_STARTED && state.version <= 0) {
      issues.push({ field: 'version', error: 'version must be greater than 0 once started' });
    }
    if (TERMINAL_SAGA_STATUSES.has(state.status) && !state.completedAt) {
      issues.push({ field: 'completedAt', error: `completedAt must be set when ${state.status}` });
    }
    if (state.currentStep && !state.getStep(state.currentStep)) {
      issues.push({ field: 'currentStep', error: `currentStep ${state.currentStep} is not a step of this saga` });
    }

    const runningWithoutStart = state.steps.filter(
      step => step.status === SagaStepStatus.RUNNING && !step.startedAt,
    );
    if (runningWithoutStart.length > 0) {
      issues.push({
        field: 'steps',
        error: `Steps with Running status must have startedAt set: ${runningWithoutStart.map(step => step.name).join(', ')}`,
      });
    }

    const overRetried = state.steps.filter(step => step.retryCount > step.maxRetries);
    if (overRetried.length > 0) {
      issues.push({
        field: 'steps',
        error: `Steps retried beyond maxRetries: ${overRetried.map(step => step.name).join(', ')}`,
      });
    }

    return issues;
  }

  /**
   * Serialized saga in the requested format; empty when the saga is unknown
   */
  async exportSagaData(
    sagaId: string,
    format: SagaExportFormat = SagaExportFormat.JSON,
    context?: SagaCallContext,
  ): Promise<string> {
    const state = await this.registry.findSaga(sagaId, context);
    if (!state) {
      return '';
    }

    switch (format) {
      case SagaExportFormat.XML:
        return this.toXml(state);
      case SagaExportFormat.CSV:
        return this.toCsv(state);
      case SagaExportFormat.JSON:
      default:
        return JSON.stringify(toSagaDocument(state), null, 2);
    }
  }

  private buildTrace(state: SagaState): SagaExecutionTrace {
    return {
      sagaId: state.sagaId,
      generatedAt: new Date(),
      found: true,
      sagaType: state.sagaType,
      status: state.status,
      correlationId: state.correlationId,
      createdAt: state.createdAt,
      lastUpdatedAt: state.lastUpdatedAt,
      completedAt: state.completedAt,
      totalDurationMs: (state.completedAt ?? new Date()).getTime() - state.createdAt.getTime(),
      steps: state.steps.map(step => ({
        stepName: step.name,
        stepType: step.stepType,
        status: step.status,
        startedAt: step.startedAt,
        completedAt: step.completedAt,
        durationMs:
          step.startedAt && step.completedAt
            ? step.completedAt.getTime() - step.startedAt.getTime()
            : undefined,
        retryCount: step.retryCount,
        maxRetries: step.maxRetries,
        errorMessage: step.errorMessage,
      })),
      compensations: state.compensations.map(compensation => ({
        stepName: compensation.stepName,
        action: compensation.action,
        status: compensation.status,
        executedAt: compensation.executedAt,
        errorMessage: compensation.errorMessage,
        retryCount: compensation.retryCount,
      })),
    };
  }

  private getNextPossibleSteps(state: SagaState): string[] {
    const orchestrator = this.registry.getOrchestrator(state.sagaType);
    return state.steps
      .filter(step => step.status !== SagaStepStatus.COMPLETED && step.status !== SagaStepStatus.SKIPPED)
      .map(step => step.name)
      .filter(stepName => orchestrator.canExecuteStep(state, stepName));
  }

  private async getPersistenceInfo(state: SagaState, context?: SagaCallContext): Promise<PersistenceDebugInfo> {
    const persistence = this.registry.getPersistence(state.sagaType);
    const info: PersistenceDebugInfo = {
      persistenceType: persistence.constructor.name,
      version: state.version,
      lastSaveTime: state.lastUpdatedAt,
    };

    try {
      info.statistics = await persistence.getStatistics(context);
    } catch (error) {
      info.errorMessage = getErrorMessage(error);
    }
    return info;
  }

  private determineStatus(anomalies: SagaAnomaly[]): DiagnosticStatus {
    if (anomalies.some(anomaly => anomaly.severity === AnomalySeverity.HIGH)) {
      return DiagnosticStatus.CRITICAL;
    }
    if (anomalies.some(anomaly => anomaly.severity === AnomalySeverity.MEDIUM)) {
      return DiagnosticStatus.WARNING;
    }
    return DiagnosticStatus.HEALTHY;
  }

  private buildSummary(state: SagaState, anomalies: SagaAnomaly[]): string {
    const completedSteps = state.steps.filter(step => step.status === SagaStepStatus.COMPLETED).length;
    const lines = [
      `Saga ${state.sagaId} (${state.sagaType})`,
      `Status: ${state.status}`,
      `Created: ${state.createdAt.toISOString()}`,
      state.completedAt
        ? `Duration: ${formatDuration(state.completedAt.getTime() - state.createdAt.getTime())}`
        : `Running for: ${formatDuration(Date.now() - state.createdAt.getTime())}`,
      `Steps: ${state.steps.length} total, ${completedSteps} completed`,
    ];
    if (anomalies.length > 0) {
      lines.push(`Anomalies: ${anomalies.length} detected`);
    }
    return lines.join('\n');
  }

  private toXml(state: SagaState): string {
    const element = (name: string, value: string | number | undefined) =>
      value === undefined ? [] : [`  <${name}>${escapeXml(String(value))}</${name}>`];

    const steps = state.steps.map(
      step =>
        `    <Step Name="${escapeXml(step.name)}" Status="${step.status}" RetryCount="${step.retryCount}" />`,
    );
    const compensations = state.compensations.map(
      compensation =>
        `    <Compensation StepName="${escapeXml(compensation.stepName)}" Action="${escapeXml(compensation.action)}" Status="${compensation.status}" />`,
    );

    return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<SagaState>',
      ...element('SagaId', state.sagaId),
      ...element('SagaType', state.sagaType),
      ...element('Status', state.status),
      ...element('CurrentStep', state.currentStep || undefined),
      ...element('CorrelationId', state.correlationId),
      ...element('CreatedAt', state.createdAt.toISOString()),
      ...element('LastUpdatedAt', state.lastUpdatedAt.toISOString()),
      ...element('CompletedAt', state.completedAt?.toISOString()),
      ...element('Version', state.version),
      '  <Steps>',
      ...steps,
      '  </Steps>',
      '  <Compensations>',
      ...compensations,
      '  </Compensations>',
      '</SagaState>',
    ].join('\n');
  }

  private toCsv(state: SagaState): string {
    const rows: string[][] = [
      ['Field', 'Value'],
      ['SagaId', state.sagaId],
      ['SagaType', state.sagaType],
      ['Status', state.status],
      ['CorrelationId', state.correlationId ?? ''],
      ['CreatedAt', state.createdAt.toISOString()],
      ['LastUpdatedAt', state.lastUpdatedAt.toISOString()],
      ['CompletedAt', state.completedAt?.toISOString() ?? ''],
      ['Version', String(state.version)],
      ['StepCount', String(state.steps.length)],
      ...state.steps.map(step => [`Step:${step.name}`, step.status]),
      ...state.compensations.map(compensation => [`Compensation:${compensation.stepName}`, compensation.status]),
    ];
    return rows.map(toCsvLine).join('\n');
  }
}
