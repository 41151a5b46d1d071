import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';

import { buildSagaOptions } from '../config/saga.config';
import { SagaState } from '../entities/saga-state.entity';
import { SagaStatus, SagaStepStatus } from '../enums/saga-status.enum';
import { SagaMonitorService } from '../monitoring/saga-monitor.service';
import { SagaExecutionOutcome } from '../monitoring/saga-monitor.types';
import { SagaRegistry } from '../registry/saga-registry.service';
import { CircuitState } from '../resilience/saga-circuit-breaker';
import { RecordingSagaEventPublisher, ScriptedStepHandler } from '../testing/saga-test.fixtures';
import { SagaDiagnosticService } from './saga-diagnostic.service';
import { AnomalySeverity, AnomalyType, DiagnosticStatus, SagaExportFormat } from './saga-diagnostic.types';

const SAGA_ID = '3f1c2b9a-5d4e-4f6a-8b7c-1d2e3f4a5b6c';

describe('SagaDiagnosticService', () => {
  let registry: SagaRegistry;
  let monitor: SagaMonitorService;
  let diagnostics: SagaDiagnosticService;

  beforeEach(() => {
    const options = buildSagaOptions(new ConfigService({}));
    const publisher = new RecordingSagaEventPublisher();
    registry = new SagaRegistry(options, publisher);
    registry.register({
      sagaType: 'ORDER',
      handlers: [new ScriptedStepHandler('ReserveInventory'), new ScriptedStepHandler('BookPartner')],
    });
    monitor = new SagaMonitorService(registry, new SchedulerRegistry(), publisher, options);
    diagnostics = new SagaDiagnosticService(registry, monitor);
  });

  function createState(): SagaState {
    return SagaState.create({
      sagaType: 'ORDER',
      sagaId: SAGA_ID,
      correlationId: 'corr-1',
      steps: [{ name: 'ReserveInventory' }, { name: 'BookPartner' }],
    });
  }

  async function saveCompensatedSaga(): Promise<SagaState> {
    const state = createState();
    state.transitionTo(SagaStatus.RUNNING);
    state.completeStep('ReserveInventory');
    state.updateStepStatus('BookPartner', SagaStepStatus.FAILED, 'No courier available');
    state.transitionTo(SagaStatus.COMPENSATING);
    state.recordCompensation({
      stepName: 'ReserveInventory',
      action: 'ReleaseInventory',
      status: SagaStepStatus.COMPENSATED,
      executedAt: new Date('2024-05-01T10:00:04.000Z'),
      retryCount: 0,
    });
    state.transitionTo(SagaStatus.COMPENSATED);
    state.createdAt = new Date('2024-05-01T10:00:00.000Z');
    state.lastUpdatedAt = new Date('2024-05-01T10:00:05.000Z');
    state.completedAt = new Date('2024-05-01T10:00:05.000Z');
    await registry.getPersistence('ORDER').save(state);
    return state;
  }

  async function saveLongRunningSaga(): Promise<SagaState> {
    const state = createState();
    state.transitionTo(SagaStatus.RUNNING);
    state.startStep('ReserveInventory');
    state.recordStepAttemptFailure('ReserveInventory', 'timeout');
    state.recordStepAttemptFailure('ReserveInventory', 'timeout');
    state.createdAt = new Date(Date.now() - 2 * 60 * 60 * 1000);
    await registry.getPersistence('ORDER').save(state);
    return state;
  }

  describe('generateReport', () => {
    it('should summarize a finished saga', async () => {
      await saveCompensatedSaga();

      const report = await diagnostics.generateReport(SAGA_ID);

      expect(report.status).toBe(DiagnosticStatus.HEALTHY);
      expect(report.summary).toBe(
        [
          `Saga ${SAGA_ID} (ORDER)`,
          'Status: Compensated',
          'Created: 2024-05-01T10:00:00.000Z',
          'Duration: 5s',
          'Steps: 2 total, 0 completed',
        ].join('\n'),
      );
      expect(report.sagaState?.version).toBe(6);
      expect(report.executionTrace?.totalDurationMs).toBe(5000);
      expect(report.executionTrace?.compensations).toEqual([
        expect.objectContaining({ stepName: 'ReserveInventory', action: 'ReleaseInventory' }),
      ]);
      expect(report.performanceMetrics?.sagaType).toBe('ORDER');
      expect(report.errors).toEqual([]);
    });

    it('should flag a long-running saga with heavy retries as critical', async () => {
      await saveLongRunningSaga();

      const report = await diagnostics.generateReport(SAGA_ID);

      expect(report.status).toBe(DiagnosticStatus.CRITICAL);
      expect(report.anomalies.map(anomaly => [anomaly.type, anomaly.severity])).toEqual([
        [AnomalyType.HIGH_RETRY_COUNT, AnomalySeverity.MEDIUM],
        [AnomalyType.STUCK_SAGA, AnomalySeverity.HIGH],
      ]);
      expect(report.summary.split('\n')).toContain('Anomalies: 2 detected');
    });

    it('should report a missing saga', async () => {
      const report = await diagnostics.generateReport(SAGA_ID);

      expect(report.status).toBe(DiagnosticStatus.NOT_FOUND);
      expect(report.summary).toBe('Saga not found in any persistence store');
    });

    it('should report lookup errors instead of throwing', async () => {
      const controller = new AbortController();
      controller.abort();

      const report = await diagnostics.generateReport(SAGA_ID, { signal: controller.signal });

      expect(report.status).toBe(DiagnosticStatus.ERROR);
      expect(report.errors).toEqual(['Operation cancelled']);
      expect(report.summary).toBe('Error generating report: Operation cancelled');
    });
  });

  describe('getExecutionTrace', () => {
    it('should trace every step', async () => {
      await saveCompensatedSaga();

      const trace = await diagnostics.getExecutionTrace(SAGA_ID);

      expect(trace.found).toBe(true);
      expect(trace.steps.map(step => [step.stepName, step.status])).toEqual([
        ['ReserveInventory', SagaStepStatus.COMPENSATED],
        ['BookPartner', SagaStepStatus.FAILED],
      ]);
      expect(trace.steps[1].errorMessage).toBe('No courier available');
    });

    it('should mark unknown sagas as not found', async () => {
      const trace = await diagnostics.getExecutionTrace('missing');

      expect(trace).toMatchObject({ sagaId: 'missing', found: false, steps: [], compensations: [] });
    });
  });

  describe('detectAnomalies', () => {
    it('should flag a success rate below threshold', () => {
      for (let i = 0; i < 9; i++) {
        monitor.trackSagaStarted({ sagaId: `saga-${i}`, sagaType: 'ORDER' });
        monitor.trackSagaCompleted({ sagaId: `saga-${i}`, sagaType: 'ORDER' });
      }
      monitor.trackSagaStarted({ sagaId: 'saga-9', sagaType: 'ORDER' });
      monitor.trackSagaFinished({ sagaId: 'saga-9', sagaType: 'ORDER' }, SagaExecutionOutcome.FAILED);

      const anomalies = diagnostics.detectAnomalies('ORDER');

      expect(anomalies).toHaveLength(1);
      expect(anomalies[0]).toMatchObject({
        type: AnomalyType.HIGH_FAILURE_RATE,
        severity: AnomalySeverity.HIGH,
        description: 'Success rate 90.00% is below 95.00%',
        sagaType: 'ORDER',
      });
    });

    it('should flag failing and slow steps', () => {
      monitor.trackStepFailed({ sagaId: 'saga-1', sagaType: 'ORDER' }, 'BookPartner', 'timeout', 11 * 60 * 1000);

      const anomalies = diagnostics.detectAnomalies('ORDER');

      expect(anomalies.map(anomaly => [anomaly.type, anomaly.severity, anomaly.stepName])).toEqual([
        [AnomalyType.HIGH_STEP_FAILURE_RATE, AnomalySeverity.MEDIUM, 'BookPartner'],
        [AnomalyType.SLOW_STEP, AnomalySeverity.LOW, 'BookPartner'],
      ]);
      expect(anomalies[1].description).toBe("Step 'BookPartner' is slow: 11m 00s");
    });

    it('should honour custom thresholds', () => {
      diagnostics.setThresholds({ minStepSuccessRate: 0, maxStepAverageMs: Number.MAX_SAFE_INTEGER });
      monitor.trackStepFailed({ sagaId: 'saga-1', sagaType: 'ORDER' }, 'BookPartner', 'timeout', 1000);

      expect(diagnostics.detectAnomalies('ORDER')).toEqual([]);
      expect(diagnostics.getThresholds().minSuccessRate).toBe(0.95);
    });
  });

  describe('getDebugInfo', () => {
    it('should describe handlers, transitions and persistence', async () => {
      await saveLongRunningSaga();

      const info = await diagnostics.getDebugInfo(SAGA_ID);

      expect(info.found).toBe(true);
      expect(info.stepHandlers).toEqual(['ReserveInventory', 'BookPartner']);
      expect(info.nextPossibleSteps).toEqual(['ReserveInventory', 'BookPartner']);
      expect(info.allowedTransitions).toEqual([
        SagaStatus.COMPLETED,
        SagaStatus.FAILED,
        SagaStatus.COMPENSATING,
        SagaStatus.SUSPENDED,
        SagaStatus.TIMED_OUT,
        SagaStatus.ABORTED,
      ]);
      expect(info.circuitBreaker?.state).toBe(CircuitState.CLOSED);
      expect(info.persistence).toMatchObject({ persistenceType: 'InMemorySagaPersistence', version: 4 });
      expect(info.persistence.statistics?.runningSagas).toBe(1);
      expect(info.validationResults).toEqual([]);
      expect(JSON.parse(info.serializedState ?? '{}').sagaId).toBe(SAGA_ID);
    });

    it('should report unknown sagas as not found', async () => {
      const info = await diagnostics.getDebugInfo('missing');

      expect(info.found).toBe(false);
      expect(info.stepHandlers).toEqual([]);
    });
  });

  describe('validateSagaState', () => {
    it('should accept a freshly created saga', () => {
      expect(diagnostics.validateSagaState(createState())).toEqual([]);
    });

    it('should list structural problems', () => {
      const state = createState();
      state.status = SagaStatus.COMPLETED;
      state.currentStep = 'Ghost';
      state.requireStep('BookPartner').retryCount = 5;

      expect(diagnostics.validateSagaState(state).map(issue => issue.field)).toEqual([
        'version',
        'completedAt',
        'currentStep',
        'steps',
      ]);
    });
  });

  describe('exportSagaData', () => {
    it('should export XML', async () => {
      await saveCompensatedSaga();

      await expect(diagnostics.exportSagaData(SAGA_ID, SagaExportFormat.XML)).resolves.toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          '<SagaState>',
          `  <SagaId>${SAGA_ID}</SagaId>`,
          '  <SagaType>ORDER</SagaType>',
          '  <Status>Compensated</Status>',
          '  <CorrelationId>corr-1</CorrelationId>',
          '  <CreatedAt>2024-05-01T10:00:00.000Z</CreatedAt>',
          '  <LastUpdatedAt>2024-05-01T10:00:05.000Z</LastUpdatedAt>',
          '  <CompletedAt>2024-05-01T10:00:05.000Z</CompletedAt>',
          '  <Version>6</Version>',
          '  <Steps>',
          '    <Step Name="ReserveInventory" Status="Compensated" RetryCount="0" />',
          '    <Step Name="BookPartner" Status="Failed" RetryCount="0" />',
          '  </Steps>',
          '  <Compensations>',
          '    <Compensation StepName="ReserveInventory" Action="ReleaseInventory" Status="Compensated" />',
          '  </Compensations>',
          '</SagaState>',
        ].join('\n'),
      );
    });

    it('should export CSV', async () => {
      await saveCompensatedSaga();

      await expect(diagnostics.exportSagaData(SAGA_ID, SagaExportFormat.CSV)).resolves.toBe(
        [
          'Field,Value',
          `SagaId,${SAGA_ID}`,
          'SagaType,ORDER',
          'Status,Compensated',
          'CorrelationId,corr-1',
          'CreatedAt,2024-05-01T10:00:00.000Z',
          'LastUpdatedAt,2024-05-01T10:00:05.000Z',
          'CompletedAt,2024-05-01T10:00:05.000Z',
          'Version,6',
          'StepCount,2',
          'Step:ReserveInventory,Compensated',
          'Step:BookPartner,Failed',
          'Compensation:ReserveInventory,Compensated',
        ].join('\n'),
      );
    });

    it('should export JSON by default', async () => {
      await saveCompensatedSaga();

      const exported = JSON.parse(await diagnostics.exportSagaData(SAGA_ID));

      expect(exported).toMatchObject({ sagaId: SAGA_ID, status: 'Compensated', version: 6 });
    });

    it('should export nothing for an unknown saga', async () => {
      await expect(diagnostics.exportSagaData('missing', SagaExportFormat.CSV)).resolves.toBe('');
    });
  });
});
