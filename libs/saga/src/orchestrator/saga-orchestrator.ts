import { Logger } from '@nestjs/common';
import { JsonObject, elapsedMs, getErrorMessage } from '@conductor/shared';

import {
  SagaCallContext,
  delay,
  linkAbortController,
  throwIfCancelled,
  withDeadline,
} from '../context/saga-call-context';
import { SagaState, SagaStep } from '../entities/saga-state.entity';
import { cloneSagaState } from '../entities/saga-state.serializer';
import {
  SagaStatus,
  SagaStepAction,
  SagaStepStatus,
  SagaTimeoutAction,
} from '../enums/saga-status.enum';
import {
  CircuitBreakerOpenError,
  InvalidSagaTransitionError,
  SagaCancelledError,
  SagaNotFoundError,
  SagaValidationError,
  StepExecutionError,
  StepTimeoutError,
} from '../errors/saga.errors';
import { SagaEventType, SagaEventTypes } from '../events/saga-event-types';
import { SagaEventPublisher } from '../interfaces/saga-event-publisher.interface';
import { SagaPersistence } from '../interfaces/saga-persistence.interface';
import { SagaStepHandler, SagaStepResult } from '../interfaces/saga-step-handler.interface';
import { SagaCircuitBreaker } from '../resilience/saga-circuit-breaker';
import { SagaRetryPolicy } from '../resilience/saga-retry-policy';
import { KeyedLock } from './saga-lock';

export interface SagaOrchestratorOptions {
  sagaType: string;
  handlers: SagaStepHandler[];
  persistence: SagaPersistence;
  publisher: SagaEventPublisher;
  retryPolicy?: SagaRetryPolicy;
  circuitBreaker?: SagaCircuitBreaker;
}

const BUSINESS_ACTIONS: ReadonlySet<SagaStepAction> = new Set([
  SagaStepAction.COMPLETE,
  SagaStepAction.COMPENSATE,
  SagaStepAction.SUSPEND,
  SagaStepAction.ABORT,
]);

/**
 * Drives sagas of one type through their steps. Public operations are
 * serialized per sagaId; the state passed in is mutated and persisted after
 * every transition, then returned.
 */
export class SagaOrchestrator {
  private readonly logger = new Logger(SagaOrchestrator.name);
  private readonly handlers = new Map<string, SagaStepHandler>();
  private readonly lock = new KeyedLock();
  private readonly runs = new Map<string, AbortController>();
  private readonly persistence: SagaPersistence;
  private readonly publisher: SagaEventPublisher;
  private readonly retryPolicy: SagaRetryPolicy;
  readonly sagaType: string;
  readonly circuitBreaker?: SagaCircuitBreaker;

  constructor(options: SagaOrchestratorOptions) {
    if (!options.sagaType?.trim()) {
      throw new SagaValidationError('Saga type is required');
    }

    for (const handler of options.handlers) {
      if (!handler.stepName?.trim()) {
        throw new SagaValidationError(`Handler for saga ${options.sagaType} has an empty step name`);
      }
      if (this.handlers.has(handler.stepName)) {
        throw new SagaValidationError(
          `Duplicate handler for step ${handler.stepName} in saga ${options.sagaType}`,
        );
      }
      this.handlers.set(handler.stepName, handler);
    }

    this.sagaType = options.sagaType;
    this.persistence = options.persistence;
    this.publisher = options.publisher;
    this.retryPolicy = options.retryPolicy ?? new SagaRetryPolicy();
    this.circuitBreaker = options.circuitBreaker;
  }

  getHandlerNames(): string[] {
    return [...this.handlers.keys()];
  }

  getHandler(stepName: string): SagaStepHandler | undefined {
    return this.handlers.get(stepName);
  }

  getPersistence(): SagaPersistence {
    return this.persistence;
  }

  /**
   * Start a new saga and run it until it finishes, suspends or fails
   */
  async start(state: SagaState, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);

    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      state.transitionTo(SagaStatus.RUNNING);
      await this.persistence.save(state, context);

      const timeoutAt = state.timeoutAt;
      this.publishEvent(state, SagaEventTypes.STARTED, context, {
        stepCount: state.steps.length,
        timeoutAt: timeoutAt ? timeoutAt.toISOString() : null,
        timeoutAction: state.metadata.timeoutAction,
      });

      this.logger.log(`Started saga: ${state.sagaId} of type: ${state.sagaType}`, {
        sagaId: state.sagaId,
        correlationId: this.correlationIdOf(state, context),
        steps: state.steps.length,
      });

      const firstStep = state.getNextPendingStep();
      if (firstStep) {
        await this.executeFrom(state, firstStep.name, context);
      }
      return state;
    });
  }

  /**
   * Run the named step and everything after it
   */
  async continue(state: SagaState, stepName: string, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);
    if (!stepName?.trim()) {
      throw new SagaValidationError('Step name is required', state.sagaId);
    }

    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      if (state.status !== SagaStatus.RUNNING) {
        throw new SagaValidationError(
          `Saga ${state.sagaId} cannot continue while ${state.status}`,
          state.sagaId,
        );
      }
      await this.executeFrom(state, stepName, context);
      return state;
    });
  }

  async compensate(state: SagaState, reason: string, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);
    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      await this.compensateSaga(state, reason, context);
      return state;
    });
  }

  async abort(state: SagaState, reason: string, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);
    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      await this.abortSaga(state, reason, context);
      return state;
    });
  }

  async suspend(state: SagaState, reason: string, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);
    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      await this.suspendSaga(state, reason, context);
      return state;
    });
  }

  /**
   * Resume a suspended saga at its current step
   */
  async resume(state: SagaState, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);
    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      if (state.status !== SagaStatus.SUSPENDED) {
        throw new InvalidSagaTransitionError(state.status, SagaStatus.RUNNING, state.sagaId);
      }

      state.transitionTo(SagaStatus.RUNNING);
      await this.persistence.save(state, context);
      this.publishEvent(state, SagaEventTypes.RESUMED, context, { stepName: state.currentStep });
      this.logger.log(`Resumed saga: ${state.sagaId}`, {
        sagaId: state.sagaId,
        currentStep: state.currentStep,
        correlationId: this.correlationIdOf(state, context),
      });

      const resumeAt = this.resolveResumeStep(state);
      if (resumeAt) {
        await this.executeFrom(state, resumeAt, context);
      } else if (state.allStepsFinished()) {
        await this.completeSaga(state, context);
      }
      return state;
    });
  }

  /**
   * True only while the saga is running and the step's handler accepts it. No side effects.
   */
  canExecuteStep(state: SagaState, stepName: string): boolean {
    if (state.status !== SagaStatus.RUNNING) {
      return false;
    }
    const handler = this.handlers.get(stepName);
    return handler !== undefined && handler.canExecute(state);
  }

  async handleTimeout(state: SagaState, context: SagaCallContext = {}): Promise<SagaState> {
    this.assertOwnType(state);
    return this.exclusive(state.sagaId, context, async context => {
      throwIfCancelled(context, state.sagaId);
      await this.timeoutSaga(state, context);
      return state;
    });
  }

  /**
   * Re-read a saga and time it out if it is still running or suspended past its deadline.
   * Returns undefined when nothing was done.
   */
  async handleExpiredSaga(
    sagaId: string,
    context: SagaCallContext = {},
    now: Date = new Date(),
  ): Promise<SagaState | undefined> {
    if (this.lock.isLocked(sagaId)) {
      // Never queue behind a busy saga; cancel its run and let the next scan time it out
      const state = await this.persistence.get(sagaId, context);
      const run = this.runs.get(sagaId);
      if (state && run && this.isExpired(state, now)) {
        this.logger.warn(`Saga ${sagaId} is past its deadline while running, cancelling the current run`, {
          sagaId,
          currentStep: state.currentStep,
        });
        run.abort();
      }
      return undefined;
    }

    return this.exclusive(sagaId, context, async context => {
      const state = await this.persistence.get(sagaId, context);
      if (!state || !this.isExpired(state, now)) {
        return undefined;
      }

      await this.timeoutSaga(state, context);
      return state;
    });
  }

  private isExpired(state: SagaState, now: Date): boolean {
    const timeoutAt = state.timeoutAt;
    const active = state.status === SagaStatus.RUNNING || state.status === SagaStatus.SUSPENDED;
    return active && timeoutAt !== undefined && timeoutAt <= now;
  }

  /**
   * Serialize work per sagaId. The work receives the caller's context with a signal
   * that also fires when a timeout scan cancels the run.
   */
  private exclusive<T>(
    sagaId: string,
    context: SagaCallContext,
    work: (context: SagaCallContext) => Promise<T>,
  ): Promise<T> {
    return this.lock.runExclusive(sagaId, async () => {
      const { controller, unlink } = linkAbortController(context.signal);
      this.runs.set(sagaId, controller);
      try {
        return await work({ ...context, signal: controller.signal });
      } finally {
        unlink();
        this.runs.delete(sagaId);
      }
    });
  }

  private async executeFrom(state: SagaState, stepName: string, context: SagaCallContext): Promise<void> {
    let next: string | undefined = stepName;
    while (next) {
      next = await this.executeStep(state, next, context);
    }
  }

  /**
   * Run one step; returns the step to run next, if any
   */
  private async executeStep(
    state: SagaState,
    stepName: string,
    context: SagaCallContext,
  ): Promise<string | undefined> {
    const step = state.requireStep(stepName);
    const handler = this.handlers.get(stepName);
    if (!handler) {
      throw new SagaNotFoundError(`No handler found for step ${stepName}`, state.sagaId);
    }

    this.logger.debug(`Executing step ${stepName} for saga ${state.sagaId}`, {
      sagaId: state.sagaId,
      stepName,
      correlationId: this.correlationIdOf(state, context),
    });

    state.startStep(stepName);
    await this.persistence.save(state, context);
    this.publishEvent(state, SagaEventTypes.STEP_STARTED, context, { stepName });

    let result: SagaStepResult;
    try {
      result = await this.executeWithRetry(handler, state, step, context);
    } catch (error) {
      if (error instanceof SagaCancelledError) {
        await this.persistCancellation(state, stepName, context);
        throw error;
      }
      if (error instanceof StepExecutionError) {
        await this.failSaga(state, stepName, error, context);
        return undefined;
      }
      throw error;
    }

    switch (result.action) {
      case SagaStepAction.COMPLETE:
        await this.completeStep(state, stepName, result, context);
        await this.completeSaga(state, context);
        return undefined;

      case SagaStepAction.COMPENSATE: {
        const reason = result.error ?? 'Step requested compensation';
        await this.failStep(state, stepName, reason, context);
        await this.compensateSaga(state, reason, context);
        return undefined;
      }

      case SagaStepAction.SUSPEND:
        state.resetStep(stepName);
        await this.suspendSaga(state, result.error ?? 'Step requested suspension', context);
        return undefined;

      case SagaStepAction.ABORT: {
        const reason = result.error ?? 'Step requested abort';
        await this.failStep(state, stepName, reason, context);
        await this.abortSaga(state, reason, context);
        return undefined;
      }

      case SagaStepAction.CONTINUE:
      case SagaStepAction.RETRY:
      default:
        await this.completeStep(state, stepName, result, context);
        if (result.nextStep) {
          return result.nextStep;
        }
        if (state.allStepsFinished()) {
          await this.completeSaga(state, context);
          return undefined;
        }
        return state.getNextPendingStep()?.name;
    }
  }

  /**
   * Attempt loop bounded by the step's maxRetries. Resolves with a successful or
   * business-action result; throws StepExecutionError when the step cannot succeed.
   */
  private async executeWithRetry(
    handler: SagaStepHandler,
    state: SagaState,
    step: SagaStep,
    context: SagaCallContext,
  ): Promise<SagaStepResult> {
    const maxAttempts = step.maxRetries;
    let lastError = 'Max retries exceeded';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(context, state.sagaId);

      let result: SagaStepResult;
      try {
        result = await this.invokeHandler(handler, state, step, context);
      } catch (error) {
        if (error instanceof SagaCancelledError || context.signal?.aborted) {
          throw new SagaCancelledError(state.sagaId);
        }
        if (error instanceof CircuitBreakerOpenError) {
          // The handler never ran, so the rejection is not an attempt
          throw new StepExecutionError(error.message, step.name, attempt - 1, state.sagaId);
        }

        lastError = getErrorMessage(error);
        await this.recordAttemptFailure(state, step, lastError, context);
        this.logger.warn(`Step ${step.name} failed with error, attempt ${attempt}/${maxAttempts}`, {
          sagaId: state.sagaId,
          stepName: step.name,
          error: lastError,
          timedOut: error instanceof StepTimeoutError,
        });
        if (this.retryPolicy.shouldRetry(attempt, maxAttempts)) {
          await delay(this.retryPolicy.calculateDelay(attempt), context.signal);
        }
        continue;
      }

      if (BUSINESS_ACTIONS.has(result.action)) {
        return result;
      }
      if (result.success && result.action === SagaStepAction.CONTINUE) {
        return result;
      }

      lastError = result.error ?? `Step ${step.name} failed`;
      await this.recordAttemptFailure(state, step, lastError, context);

      if (result.action === SagaStepAction.CONTINUE && !result.shouldRetry) {
        throw new StepExecutionError(lastError, step.name, attempt, state.sagaId);
      }

      if (this.retryPolicy.shouldRetry(attempt, maxAttempts)) {
        this.logger.warn(`Step ${step.name} failed, retrying ${attempt}/${maxAttempts}`, {
          sagaId: state.sagaId,
          stepName: step.name,
          error: lastError,
        });
        await delay(result.retryDelayMs ?? this.retryPolicy.calculateDelay(attempt), context.signal);
      }
    }

    throw new StepExecutionError(
      `Step ${step.name} failed after ${maxAttempts} attempts: ${lastError}`,
      step.name,
      maxAttempts,
      state.sagaId,
    );
  }

  /**
   * One handler attempt. The handler gets a snapshot of the state and a signal of its
   * own, aborted when the attempt times out, so a late attempt cannot touch the saga.
   */
  private invokeHandler(
    handler: SagaStepHandler,
    state: SagaState,
    step: SagaStep,
    context: SagaCallContext,
  ): Promise<SagaStepResult> {
    const run = async () => {
      const { controller, unlink } = linkAbortController(context.signal);
      try {
        return await withDeadline(
          handler.execute(cloneSagaState(state), { ...context, signal: controller.signal }),
          {
            timeoutMs: step.timeoutMs,
            signal: context.signal,
            onTimeout: () => {
              controller.abort();
              return new StepTimeoutError(step.name, step.timeoutMs ?? 0, state.sagaId);
            },
            onAbort: () => new SagaCancelledError(state.sagaId),
          },
        );
      } finally {
        unlink();
      }
    };

    if (!this.circuitBreaker) {
      return run();
    }
    // Business actions are outcomes, not dependency failures
    return this.circuitBreaker.execute(
      run,
      result =>
        !result.success &&
        (result.action === SagaStepAction.CONTINUE || result.action === SagaStepAction.RETRY),
    );
  }

  private async recordAttemptFailure(
    state: SagaState,
    step: SagaStep,
    errorMessage: string,
    context: SagaCallContext,
  ): Promise<void> {
    state.recordStepAttemptFailure(step.name, errorMessage);
    await this.persistence.save(state, context);
  }

  private async completeStep(
    state: SagaState,
    stepName: string,
    result: SagaStepResult,
    context: SagaCallContext,
  ): Promise<void> {
    const step = state.completeStep(stepName, result.output, result.data);
    await this.persistence.save(state, context);

    this.publishEvent(state, SagaEventTypes.STEP_COMPLETED, context, {
      stepName,
      durationMs: this.stepDurationMs(step),
    });
  }

  private async failStep(
    state: SagaState,
    stepName: string,
    reason: string,
    context: SagaCallContext,
  ): Promise<void> {
    const step = state.updateStepStatus(stepName, SagaStepStatus.FAILED, reason);
    await this.persistence.save(state, context);

    this.publishEvent(state, SagaEventTypes.STEP_FAILED, context, {
      stepName,
      error: reason,
      durationMs: this.stepDurationMs(step),
    });
  }

  private async failSaga(
    state: SagaState,
    stepName: string,
    error: StepExecutionError,
    context: SagaCallContext,
  ): Promise<void> {
    this.logger.error(`Step ${stepName} failed for saga ${state.sagaId}`, {
      sagaId: state.sagaId,
      stepName,
      attempts: error.attempts,
      error: error.message,
      correlationId: this.correlationIdOf(state, context),
    });

    await this.failStep(state, stepName, error.message, context);
    state.transitionTo(SagaStatus.FAILED, { failureReason: error.message, failedStep: stepName });
    await this.persistence.save(state, context);
    this.publishEvent(state, SagaEventTypes.FAILED, context, {
      stepName,
      error: error.message,
      durationMs: this.sagaDurationMs(state),
    });

    if (state.canCompensate()) {
      await this.compensateSaga(state, `Step ${stepName} failed: ${error.message}`, context);
    }
  }

  private async completeSaga(state: SagaState, context: SagaCallContext): Promise<void> {
    this.logger.log(`Completing saga ${state.sagaId}`, {
      sagaId: state.sagaId,
      correlationId: this.correlationIdOf(state, context),
    });

    state.currentStep = '';
    state.transitionTo(SagaStatus.COMPLETED);
    await this.persistence.save(state, context);
    this.publishEvent(state, SagaEventTypes.COMPLETED, context, {
      durationMs: this.sagaDurationMs(state),
    });
  }

  /**
   * Best-effort reverse compensation. Once started it runs to the end: a failing
   * compensation is recorded and the remaining steps are still compensated.
   */
  private async compensateSaga(state: SagaState, reason: string, context: SagaCallContext): Promise<void> {
    this.logger.warn(`Compensating saga ${state.sagaId}`, {
      sagaId: state.sagaId,
      reason,
      correlationId: this.correlationIdOf(state, context),
    });

    const saveContext = this.detached(context);
    state.transitionTo(SagaStatus.COMPENSATING, { compensationReason: reason });
    await this.persistence.save(state, saveContext);
    this.publishEvent(state, SagaEventTypes.COMPENSATING, context, { reason });

    for (const step of state.getCompensableSteps()) {
      const handler = this.handlers.get(step.name);
      const action = step.compensationAction ?? handler?.constructor.name ?? 'Compensate';

      if (handler && !handler.canCompensate(state)) {
        this.logger.warn(`Step ${step.name} cannot be compensated, skipping`, {
          sagaId: state.sagaId,
          stepName: step.name,
        });
        continue;
      }

      let status = SagaStepStatus.COMPENSATED;
      let errorMessage: string | undefined;
      let output: SagaStepResult['output'];

      if (!handler) {
        status = SagaStepStatus.COMPENSATION_FAILED;
        errorMessage = `No handler found for step ${step.name}`;
      } else {
        try {
          const result = await handler.compensate(state, context);
          output = result.output;
          if (!result.success) {
            status = SagaStepStatus.COMPENSATION_FAILED;
            errorMessage = result.error ?? 'Compensation failed';
          }
        } catch (error) {
          status = SagaStepStatus.COMPENSATION_FAILED;
          errorMessage = getErrorMessage(error);
        }
      }

      if (status === SagaStepStatus.COMPENSATION_FAILED) {
        this.logger.error(`Compensation failed for step ${step.name}`, {
          sagaId: state.sagaId,
          stepName: step.name,
          error: errorMessage,
        });
      }

      state.recordCompensation({
        stepName: step.name,
        action,
        status,
        executedAt: new Date(),
        errorMessage,
        retryCount: 0,
        input: step.output,
        output,
      });
      await this.persistence.save(state, saveContext);
    }

    state.transitionTo(SagaStatus.COMPENSATED);
    await this.persistence.save(state, saveContext);
    this.publishEvent(state, SagaEventTypes.COMPENSATED, context, {
      reason,
      compensations: state.compensations.length,
      durationMs: this.sagaDurationMs(state),
    });
  }

  private async suspendSaga(state: SagaState, reason: string, context: SagaCallContext): Promise<void> {
    state.transitionTo(SagaStatus.SUSPENDED, { suspendReason: reason });
    await this.persistence.save(state, context);
    this.publishEvent(state, SagaEventTypes.SUSPENDED, context, { reason, stepName: state.currentStep });

    this.logger.warn(`Suspended saga ${state.sagaId}: ${reason}`, {
      sagaId: state.sagaId,
      currentStep: state.currentStep,
    });
  }

  private async abortSaga(state: SagaState, reason: string, context: SagaCallContext): Promise<void> {
    state.transitionTo(SagaStatus.ABORTED, { abortReason: reason });
    await this.persistence.save(state, context);
    this.publishEvent(state, SagaEventTypes.ABORTED, context, {
      reason,
      durationMs: this.sagaDurationMs(state),
    });

    this.logger.warn(`Aborted saga ${state.sagaId}: ${reason}`, { sagaId: state.sagaId });
  }

  private async timeoutSaga(state: SagaState, context: SagaCallContext): Promise<void> {
    this.logger.warn(`Handling timeout for saga ${state.sagaId}`, {
      sagaId: state.sagaId,
      timeoutAction: state.metadata.timeoutAction,
    });

    for (const step of state.steps) {
      if (step.status === SagaStepStatus.RUNNING) {
        state.updateStepStatus(step.name, SagaStepStatus.FAILED, 'Saga timed out');
      }
    }
    state.transitionTo(SagaStatus.TIMED_OUT, { timeoutReason: 'Saga timed out' });
    await this.persistence.save(state, context);
    this.publishEvent(state, SagaEventTypes.TIMED_OUT, context, {
      timeoutAction: state.metadata.timeoutAction,
      durationMs: this.sagaDurationMs(state),
    });

    switch (state.metadata.timeoutAction) {
      case SagaTimeoutAction.COMPENSATE:
        await this.compensateSaga(state, 'Saga timed out', context);
        break;
      case SagaTimeoutAction.ABORT:
        await this.abortSaga(state, 'Saga timed out', context);
        break;
      default:
        break;
    }
  }

  /**
   * Leave no step persisted as Running after a cancelled call
   */
  private async persistCancellation(state: SagaState, stepName: string, context: SagaCallContext): Promise<void> {
    const step = state.getStep(stepName);
    if (step?.status === SagaStepStatus.RUNNING) {
      state.updateStepStatus(stepName, SagaStepStatus.FAILED, 'Operation cancelled');
    }
    await this.persistence.save(state, this.detached(context));

    this.logger.warn(`Saga ${state.sagaId} cancelled during step ${stepName}`, {
      sagaId: state.sagaId,
      stepName,
    });
  }

  private resolveResumeStep(state: SagaState): string | undefined {
    const current = state.currentStep ? state.getStep(state.currentStep) : undefined;
    if (
      current &&
      current.status !== SagaStepStatus.COMPLETED &&
      current.status !== SagaStepStatus.SKIPPED
    ) {
      return current.name;
    }
    return state.getNextPendingStep()?.name;
  }

  private publishEvent(
    state: SagaState,
    eventType: SagaEventType,
    context: SagaCallContext,
    data: JsonObject = {},
  ): void {
    try {
      this.publisher.publish({
        sagaId: state.sagaId,
        sagaType: state.sagaType,
        eventType,
        data,
        timestamp: new Date(),
        correlationId: this.correlationIdOf(state, context),
        metadata: {
          status: state.status,
          currentStep: state.currentStep,
          version: state.version,
        },
      });
    } catch (error) {
      this.logger.error(`Failed to publish ${eventType} for saga ${state.sagaId}`, {
        sagaId: state.sagaId,
        error: getErrorMessage(error),
      });
    }
  }

  private assertOwnType(state: SagaState): void {
    if (state.sagaType !== this.sagaType) {
      throw new SagaValidationError(
        `Saga ${state.sagaId} of type ${state.sagaType} cannot run on the ${this.sagaType} orchestrator`,
        state.sagaId,
      );
    }
  }

  private detached(context: SagaCallContext): SagaCallContext {
    return { correlationId: context.correlationId, initiatedBy: context.initiatedBy };
  }

  private correlationIdOf(state: SagaState, context: SagaCallContext): string | undefined {
    return context.correlationId ?? state.correlationId;
  }

  private stepDurationMs(step: SagaStep): number | null {
    return step.startedAt && step.completedAt ? elapsedMs(step.startedAt, step.completedAt) : null;
  }

  private sagaDurationMs(state: SagaState): number {
    return elapsedMs(state.createdAt, state.completedAt ?? new Date());
  }
}
