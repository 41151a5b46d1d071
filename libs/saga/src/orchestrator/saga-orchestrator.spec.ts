import { SagaState, SagaStepDefinition } from '../entities/saga-state.entity';
import { SagaStatus, SagaStepStatus, SagaTimeoutAction } from '../enums/saga-status.enum';
import {
  InvalidSagaTransitionError,
  SagaCancelledError,
  SagaValidationError,
} from '../errors/saga.errors';
import { SagaEventTypes } from '../events/saga-event-types';
import { SagaStepResults } from '../interfaces/saga-step-handler.interface';
import { SagaCircuitBreaker } from '../resilience/saga-circuit-breaker';
import { SagaRetryPolicy } from '../resilience/saga-retry-policy';
import {
  RecordingSagaEventPublisher,
  RecordingSagaPersistence,
  ScriptedStepHandler,
} from '../testing/saga-test.fixtures';
import { SagaOrchestrator } from './saga-orchestrator';

describe('SagaOrchestrator', () => {
  let persistence: RecordingSagaPersistence;
  let publisher: RecordingSagaEventPublisher;
  let stepA: ScriptedStepHandler;
  let stepB: ScriptedStepHandler;
  let stepC: ScriptedStepHandler;

  const retryPolicy = new SagaRetryPolicy({ baseDelayMs: 0, jitterFactor: 0 });

  beforeEach(() => {
    persistence = new RecordingSagaPersistence();
    publisher = new RecordingSagaEventPublisher();
    stepA = new ScriptedStepHandler('A');
    stepB = new ScriptedStepHandler('B');
    stepC = new ScriptedStepHandler('C');
  });

  function createOrchestrator(circuitBreaker?: SagaCircuitBreaker): SagaOrchestrator {
    return new SagaOrchestrator({
      sagaType: 'TEST',
      handlers: [stepA, stepB, stepC],
      persistence,
      publisher,
      retryPolicy,
      circuitBreaker,
    });
  }

  function createState(steps: SagaStepDefinition[], timeoutAction = SagaTimeoutAction.COMPENSATE): SagaState {
    return SagaState.create({
      sagaType: 'TEST',
      correlationId: 'corr-1',
      steps,
      metadata: { timeoutAction },
    });
  }

  describe('construction', () => {
    it('should reject duplicate step handlers', () => {
      expect(
        () =>
          new SagaOrchestrator({
            sagaType: 'TEST',
            handlers: [stepA, new ScriptedStepHandler('A')],
            persistence,
            publisher,
          }),
      ).toThrow('Duplicate handler for step A in saga TEST');
    });

    it('should reject an empty saga type', () => {
      expect(() => new SagaOrchestrator({ sagaType: '', handlers: [], persistence, publisher })).toThrow(
        SagaValidationError,
      );
    });

    it('should expose its handlers', () => {
      const orchestrator = createOrchestrator();

      expect(orchestrator.getHandlerNames()).toEqual(['A', 'B', 'C']);
      expect(orchestrator.getHandler('B')).toBe(stepB);
      expect(orchestrator.getPersistence()).toBe(persistence);
    });
  });

  describe('start', () => {
    it('should run a single step saga to completion, saving after every transition', async () => {
      const state = createState([{ name: 'A' }]);

      await createOrchestrator().start(state);

      expect(state.status).toBe(SagaStatus.COMPLETED);
      expect(persistence.savedVersions).toEqual([1, 2, 3, 4]);
      expect(publisher.types()).toEqual([
        SagaEventTypes.STARTED,
        SagaEventTypes.STEP_STARTED,
        SagaEventTypes.STEP_COMPLETED,
        SagaEventTypes.COMPLETED,
      ]);
      const stored = await persistence.get(state.sagaId);
      expect(stored?.status).toBe(SagaStatus.COMPLETED);
      expect(stored?.version).toBe(4);
    });

    it('should describe the saga in the Started event', async () => {
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state, { correlationId: 'corr-override' });

      const started = publisher.last(SagaEventTypes.STARTED);
      expect(started?.data).toEqual({ stepCount: 2, timeoutAt: null, timeoutAction: SagaTimeoutAction.COMPENSATE });
      expect(started?.correlationId).toBe('corr-override');
      expect(started?.metadata).toEqual({ status: SagaStatus.RUNNING, currentStep: '', version: 1 });
    });

    it('should merge step data into the saga and keep step output', async () => {
      stepA.willReturn(SagaStepResults.success(undefined, { reservationId: 'res-1' }));
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(state.getData('reservationId')).toBe('res-1');
      expect(state.steps.map(step => step.status)).toEqual([SagaStepStatus.COMPLETED, SagaStepStatus.COMPLETED]);
    });

    it('should reject a saga of another type', async () => {
      const state = SagaState.create({ sagaType: 'OTHER', steps: [{ name: 'A' }] });

      await expect(createOrchestrator().start(state)).rejects.toBeInstanceOf(SagaValidationError);
    });

    it('should reject starting a saga twice', async () => {
      const state = createState([{ name: 'A' }]);
      const orchestrator = createOrchestrator();
      await orchestrator.start(state);

      await expect(orchestrator.start(state)).rejects.toBeInstanceOf(InvalidSagaTransitionError);
    });
  });

  describe('step results', () => {
    it('should follow an explicit next step', async () => {
      const order: string[] = [];
      for (const handler of [stepA, stepB, stepC]) {
        handler.willRun(async () => {
          order.push(handler.stepName);
          return handler === stepA ? SagaStepResults.success(undefined, undefined, 'C') : SagaStepResults.success();
        });
      }
      const state = createState([{ name: 'A' }, { name: 'B' }, { name: 'C' }]);

      await createOrchestrator().start(state);

      expect(order).toEqual(['A', 'C', 'B']);
      expect(state.status).toBe(SagaStatus.COMPLETED);
    });

    it('should complete the saga early on a Complete action', async () => {
      stepA.willReturn(SagaStepResults.complete());
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(state.status).toBe(SagaStatus.COMPLETED);
      expect(stepB.executeCalls).toBe(0);
      expect(state.requireStep('B').status).toBe(SagaStepStatus.PENDING);
    });

    it('should compensate completed steps when a step asks for compensation', async () => {
      stepB.willReturn(SagaStepResults.compensate('No courier available'));
      const state = createState([{ name: 'A', compensationAction: 'UndoA' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(state.status).toBe(SagaStatus.COMPENSATED);
      expect(stepA.compensateCalls).toBe(1);
      expect(stepB.compensateCalls).toBe(0);
      expect(state.compensations).toHaveLength(1);
      expect(state.compensations[0]).toMatchObject({
        stepName: 'A',
        action: 'UndoA',
        status: SagaStepStatus.COMPENSATED,
      });
      expect(state.requireStep('B')).toMatchObject({
        status: SagaStepStatus.FAILED,
        errorMessage: 'No courier available',
      });
      expect(state.getData('compensationReason')).toBe('No courier available');
      expect(publisher.types()).toContain(SagaEventTypes.STEP_FAILED);
      expect(publisher.types().slice(-2)).toEqual([SagaEventTypes.COMPENSATING, SagaEventTypes.COMPENSATED]);
    });

    it('should abort without compensating on an Abort action', async () => {
      stepB.willReturn(SagaStepResults.abort('Order total must be positive'));
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(state.status).toBe(SagaStatus.ABORTED);
      expect(stepA.compensateCalls).toBe(0);
      expect(state.getData('abortReason')).toBe('Order total must be positive');
    });

    it('should suspend and later resume at the same step', async () => {
      stepB.willReturn(SagaStepResults.suspend('Awaiting manual review'));
      const state = createState([{ name: 'A' }, { name: 'B' }]);
      const orchestrator = createOrchestrator();

      await orchestrator.start(state);

      expect(state.status).toBe(SagaStatus.SUSPENDED);
      expect(state.currentStep).toBe('B');
      expect(state.requireStep('B').status).toBe(SagaStepStatus.PENDING);

      await orchestrator.resume(state);

      expect(state.status).toBe(SagaStatus.COMPLETED);
      expect(stepA.executeCalls).toBe(1);
      expect(stepB.executeCalls).toBe(2);
      expect(publisher.types()).toContain(SagaEventTypes.RESUMED);
    });

    it('should refuse to resume a saga that is not suspended', async () => {
      const state = createState([{ name: 'A' }]);
      const orchestrator = createOrchestrator();
      await orchestrator.start(state);

      await expect(orchestrator.resume(state)).rejects.toBeInstanceOf(InvalidSagaTransitionError);
    });
  });

  describe('retries', () => {
    it('should fail the saga once a throwing step exhausts its attempts', async () => {
      stepA.willAlwaysThrow('inventory service down');
      const state = createState([{ name: 'A', maxRetries: 3 }]);

      await createOrchestrator().start(state);

      expect(stepA.executeCalls).toBe(3);
      expect(state.status).toBe(SagaStatus.FAILED);
      expect(state.requireStep('A')).toMatchObject({ status: SagaStepStatus.FAILED, retryCount: 3 });
      expect(state.getData('failureReason')).toBe('Step A failed after 3 attempts: inventory service down');
      expect(state.getData('failedStep')).toBe('A');
    });

    it('should succeed when a retry recovers', async () => {
      stepA.willReturn(SagaStepResults.failure('busy'), SagaStepResults.retry('still busy', 0));
      const state = createState([{ name: 'A', maxRetries: 3 }]);

      await createOrchestrator().start(state);

      expect(stepA.executeCalls).toBe(3);
      expect(state.status).toBe(SagaStatus.COMPLETED);
      expect(state.requireStep('A').retryCount).toBe(2);
    });

    it('should fail fast on a non-retryable failure', async () => {
      stepA.willReturn(SagaStepResults.failure('Insufficient inventory', false));
      const state = createState([{ name: 'A', maxRetries: 3 }]);

      await createOrchestrator().start(state);

      expect(stepA.executeCalls).toBe(1);
      expect(state.status).toBe(SagaStatus.FAILED);
      expect(state.getData('failureReason')).toBe('Insufficient inventory');
    });

    it('should compensate earlier steps after a step fails', async () => {
      stepB.willAlwaysThrow('partner api down');
      const state = createState([{ name: 'A' }, { name: 'B', maxRetries: 2 }]);

      await createOrchestrator().start(state);

      expect(state.status).toBe(SagaStatus.COMPENSATED);
      expect(stepA.compensateCalls).toBe(1);
      expect(publisher.types()).toContain(SagaEventTypes.FAILED);
    });

    it('should time out a slow attempt and retry it', async () => {
      stepA.willRun(() => new Promise(() => undefined));
      const state = createState([{ name: 'A', timeoutMs: 10, maxRetries: 2 }]);

      await createOrchestrator().start(state);

      expect(stepA.executeCalls).toBe(2);
      expect(state.status).toBe(SagaStatus.COMPLETED);
      expect(state.requireStep('A').retryCount).toBe(1);
    });

    it('should stop retrying as soon as the circuit breaker opens', async () => {
      stepA.willAlwaysThrow('inventory service down');
      const breaker = new SagaCircuitBreaker('TEST', { failureThreshold: 1, timeoutMs: 60000 });
      const state = createState([{ name: 'A', maxRetries: 3 }]);

      await createOrchestrator(breaker).start(state);

      expect(stepA.executeCalls).toBe(1);
      expect(state.status).toBe(SagaStatus.FAILED);
      expect(state.requireStep('A').retryCount).toBe(1);
      expect(state.getData('failureReason')).toBe('Circuit breaker TEST is open');
    });

    it('should cancel a timed out attempt and keep its late changes out of the saga', async () => {
      let firstSignal: AbortSignal | undefined;
      stepA.willRun(async (snapshot, context) => {
        firstSignal = context.signal;
        await new Promise(resolve => setTimeout(resolve, 60));
        snapshot.setData('late', true);
        return SagaStepResults.success(undefined, { late: true });
      });
      const state = createState([{ name: 'A', timeoutMs: 10, maxRetries: 2 }]);

      await createOrchestrator().start(state);
      const versionAfterStart = state.version;
      await new Promise(resolve => setTimeout(resolve, 100));

      expect(state.status).toBe(SagaStatus.COMPLETED);
      expect(firstSignal?.aborted).toBe(true);
      expect(state.version).toBe(versionAfterStart);
      expect(state.getData('late')).toBeUndefined();
      expect((await persistence.get(state.sagaId))?.getData('late')).toBeUndefined();
    });

    it('should not count business actions against the circuit breaker', async () => {
      stepA.willReturn(SagaStepResults.compensate('declined'));
      const breaker = new SagaCircuitBreaker('TEST', { failureThreshold: 1 });

      await createOrchestrator(breaker).start(createState([{ name: 'A' }]));

      expect(breaker.getMetrics().failureCount).toBe(0);
    });
  });

  describe('compensation', () => {
    it('should compensate in reverse order and keep going after a failure', async () => {
      stepA.compensateWith(async () => {
        throw new Error('refund api down');
      });
      stepC.willReturn(SagaStepResults.compensate('rollback requested'));
      const state = createState([{ name: 'A' }, { name: 'B' }, { name: 'C' }]);

      await createOrchestrator().start(state);

      expect(state.status).toBe(SagaStatus.COMPENSATED);
      expect(state.compensations.map(entry => [entry.stepName, entry.status])).toEqual([
        ['B', SagaStepStatus.COMPENSATED],
        ['A', SagaStepStatus.COMPENSATION_FAILED],
      ]);
      expect(state.compensations[1].errorMessage).toBe('refund api down');
      expect(state.requireStep('A').status).toBe(SagaStepStatus.COMPENSATION_FAILED);
    });

    it('should record a failed compensation result', async () => {
      stepA.compensateWith(async () => SagaStepResults.failure('already shipped', false));
      stepB.willReturn(SagaStepResults.compensate('rollback requested'));
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(state.compensations[0]).toMatchObject({
        stepName: 'A',
        status: SagaStepStatus.COMPENSATION_FAILED,
        errorMessage: 'already shipped',
      });
    });

    it('should skip steps whose handler refuses compensation', async () => {
      stepA.compensable = false;
      stepB.willReturn(SagaStepResults.compensate('rollback requested'));
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(stepA.compensateCalls).toBe(0);
      expect(state.compensations).toEqual([]);
      expect(state.status).toBe(SagaStatus.COMPENSATED);
    });

    it('should name the compensation after the handler when no action is configured', async () => {
      stepB.willReturn(SagaStepResults.compensate('rollback requested'));
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await createOrchestrator().start(state);

      expect(state.compensations[0].action).toBe('ScriptedStepHandler');
    });

    it('should compensate a running saga on request', async () => {
      stepB.willReturn(SagaStepResults.suspend('waiting'));
      const state = createState([{ name: 'A' }, { name: 'B' }]);
      const orchestrator = createOrchestrator();
      await orchestrator.start(state);
      state.transitionTo(SagaStatus.RUNNING);

      await orchestrator.compensate(state, 'Customer cancelled');

      expect(state.status).toBe(SagaStatus.COMPENSATED);
      expect(stepA.compensateCalls).toBe(1);
    });
  });

  describe('timeouts', () => {
    function runningWithCompletedStep(timeoutAction: SagaTimeoutAction): SagaState {
      const state = createState([{ name: 'A' }, { name: 'B' }], timeoutAction);
      state.transitionTo(SagaStatus.RUNNING);
      state.completeStep('A');
      return state;
    }

    it('should compensate after timing out', async () => {
      const state = runningWithCompletedStep(SagaTimeoutAction.COMPENSATE);

      await createOrchestrator().handleTimeout(state);

      expect(state.status).toBe(SagaStatus.COMPENSATED);
      expect(publisher.types()).toEqual([
        SagaEventTypes.TIMED_OUT,
        SagaEventTypes.COMPENSATING,
        SagaEventTypes.COMPENSATED,
      ]);
    });

    it('should abort after timing out', async () => {
      const state = runningWithCompletedStep(SagaTimeoutAction.ABORT);

      await createOrchestrator().handleTimeout(state);

      expect(state.status).toBe(SagaStatus.ABORTED);
      expect(stepA.compensateCalls).toBe(0);
      expect(publisher.types()).toEqual([SagaEventTypes.TIMED_OUT, SagaEventTypes.ABORTED]);
    });

    it('should stop at TimedOut when no action is configured', async () => {
      const state = runningWithCompletedStep(SagaTimeoutAction.NONE);

      await createOrchestrator().handleTimeout(state);

      expect(state.status).toBe(SagaStatus.TIMED_OUT);
      expect(publisher.types()).toEqual([SagaEventTypes.TIMED_OUT]);
    });

    it('should fail a step left running when the saga times out', async () => {
      const state = runningWithCompletedStep(SagaTimeoutAction.ABORT);
      state.startStep('B');

      await createOrchestrator().handleTimeout(state);

      expect(state.status).toBe(SagaStatus.ABORTED);
      expect(state.requireStep('B')).toMatchObject({
        status: SagaStepStatus.FAILED,
        errorMessage: 'Saga timed out',
      });
      expect(state.requireStep('A').status).toBe(SagaStepStatus.COMPLETED);
    });

    it('should cancel the current run of a busy saga past its deadline instead of waiting for it', async () => {
      let entered: () => void = () => undefined;
      const inStep = new Promise<void>(resolve => {
        entered = resolve;
      });
      stepA.willRun(() => {
        entered();
        return new Promise(() => undefined);
      });
      const state = SagaState.create({
        sagaType: 'TEST',
        steps: [{ name: 'A' }],
        metadata: { timeoutMs: 50, timeoutAction: SagaTimeoutAction.ABORT },
      });
      const orchestrator = createOrchestrator();
      const later = new Date(state.createdAt.getTime() + 1000);

      const running = expect(orchestrator.start(state)).rejects.toBeInstanceOf(SagaCancelledError);
      await inStep;

      await expect(orchestrator.handleExpiredSaga(state.sagaId, {}, later)).resolves.toBeUndefined();
      await running;

      const handled = await orchestrator.handleExpiredSaga(state.sagaId, {}, later);
      expect(handled?.status).toBe(SagaStatus.ABORTED);
      expect(handled?.requireStep('A')).toMatchObject({
        status: SagaStepStatus.FAILED,
        errorMessage: 'Operation cancelled',
      });
    });

    it('should only handle persisted sagas that are past their deadline', async () => {
      const orchestrator = createOrchestrator();
      const state = SagaState.create({
        sagaType: 'TEST',
        steps: [{ name: 'A' }],
        metadata: { timeoutMs: 1000, timeoutAction: SagaTimeoutAction.ABORT },
      });
      state.transitionTo(SagaStatus.RUNNING);
      await persistence.save(state);
      const deadline = state.createdAt.getTime() + 1000;

      await expect(orchestrator.handleExpiredSaga(state.sagaId, {}, new Date(deadline - 1))).resolves.toBeUndefined();
      const handled = await orchestrator.handleExpiredSaga(state.sagaId, {}, new Date(deadline + 1));

      expect(handled?.status).toBe(SagaStatus.ABORTED);
      expect((await persistence.get(state.sagaId))?.status).toBe(SagaStatus.ABORTED);
      await expect(orchestrator.handleExpiredSaga('missing')).resolves.toBeUndefined();
    });
  });

  describe('concurrency', () => {
    function gate() {
      let open: () => void = () => undefined;
      const opened = new Promise<void>(resolve => {
        open = resolve;
      });
      return { opened, open };
    }

    it('should run operations on the same saga one after the other', async () => {
      const entered = gate();
      const release = gate();
      const calls: string[] = [];
      stepA.willRun(async () => {
        calls.push('start:enter');
        entered.open();
        await release.opened;
        calls.push('start:leave');
        return SagaStepResults.suspend('waiting for approval');
      });
      stepA.willRun(async () => {
        calls.push('resume');
        return SagaStepResults.success();
      });
      const state = createState([{ name: 'A' }]);
      const orchestrator = createOrchestrator();

      const starting = orchestrator.start(state);
      await entered.opened;
      const resuming = orchestrator.resume(state);
      release.open();

      await expect(starting).resolves.toBe(state);
      await expect(resuming).resolves.toBe(state);
      expect(calls).toEqual(['start:enter', 'start:leave', 'resume']);
      expect(state.status).toBe(SagaStatus.COMPLETED);
      const versions = persistence.savedVersions;
      expect(versions).toEqual([...versions].sort((a, b) => a - b));
      expect(new Set(versions).size).toBe(versions.length);
    });

    it('should run different sagas concurrently', async () => {
      const entered = gate();
      const release = gate();
      stepA.willRun(async () => {
        entered.open();
        await release.opened;
        return SagaStepResults.success();
      });
      const blocked = createState([{ name: 'A' }]);
      const free = createState([{ name: 'A' }]);
      const orchestrator = createOrchestrator();

      const blockedRun = orchestrator.start(blocked);
      await entered.opened;
      const freeRun = await orchestrator.start(free);

      expect(freeRun.status).toBe(SagaStatus.COMPLETED);
      expect(blocked.status).toBe(SagaStatus.RUNNING);

      release.open();
      await expect(blockedRun).resolves.toMatchObject({ status: SagaStatus.COMPLETED });
    });
  });

  describe('cancellation', () => {
    it('should mark the running step failed and leave the saga running', async () => {
      const controller = new AbortController();
      stepA.willRun(() => {
        controller.abort();
        return new Promise(() => undefined);
      });
      const state = createState([{ name: 'A' }, { name: 'B' }]);

      await expect(createOrchestrator().start(state, { signal: controller.signal })).rejects.toBeInstanceOf(
        SagaCancelledError,
      );

      const stored = await persistence.get(state.sagaId);
      expect(stored?.status).toBe(SagaStatus.RUNNING);
      expect(stored?.requireStep('A')).toMatchObject({
        status: SagaStepStatus.FAILED,
        errorMessage: 'Operation cancelled',
      });
      expect(stepB.executeCalls).toBe(0);
    });

    it('should refuse work for an already cancelled context', async () => {
      const controller = new AbortController();
      controller.abort();
      const state = createState([{ name: 'A' }]);

      await expect(createOrchestrator().start(state, { signal: controller.signal })).rejects.toBeInstanceOf(
        SagaCancelledError,
      );
      expect(state.status).toBe(SagaStatus.NOT_STARTED);
    });
  });

  it('should only allow running sagas to execute steps', async () => {
    const orchestrator = createOrchestrator();
    const state = createState([{ name: 'A' }]);

    expect(orchestrator.canExecuteStep(state, 'A')).toBe(false);
    state.transitionTo(SagaStatus.RUNNING);
    expect(orchestrator.canExecuteStep(state, 'A')).toBe(true);
    expect(orchestrator.canExecuteStep(state, 'Z')).toBe(false);
  });
});
