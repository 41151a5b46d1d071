import { JsonObject, JsonValue, addMilliseconds, generateUUID, isValidUUID } from '@conductor/shared';

import {
  SagaPriority,
  SagaStatus,
  SagaStepStatus,
  SagaTimeoutAction,
  TERMINAL_SAGA_STATUSES,
  TERMINAL_STEP_STATUSES,
} from '../enums/saga-status.enum';
import {
  InvalidSagaTransitionError,
  SagaNotFoundError,
  SagaValidationError,
} from '../errors/saga.errors';
import { SagaPayload } from '../utils/saga-payload';

export const DEFAULT_STEP_MAX_RETRIES = 3;

export interface SagaStep {
  name: string;
  stepType: string;
  status: SagaStepStatus;
  startedAt?: Date;
  completedAt?: Date;
  input?: SagaPayload;
  output?: SagaPayload;
  retryCount: number;
  maxRetries: number;
  timeoutMs?: number;
  compensationAction?: string;
  isCompensable: boolean;
  errorMessage?: string;
}

export interface SagaCompensation {
  stepName: string;
  action: string;
  status: SagaStepStatus;
  executedAt?: Date;
  errorMessage?: string;
  retryCount: number;
  input?: SagaPayload;
  output?: SagaPayload;
}

export interface SagaMetadata {
  initiatedBy?: string;
  businessContext?: string;
  timeoutMs?: number;
  timeoutAction: SagaTimeoutAction;
  priority: SagaPriority;
  parentSagaId?: string;
  childSagaIds: string[];
  tags: Record<string, string>;
  isCritical: boolean;
}

export interface SagaStepDefinition {
  name: string;
  stepType?: string;
  maxRetries?: number;
  timeoutMs?: number;
  compensationAction?: string;
  isCompensable?: boolean;
  input?: SagaPayload;
}

export interface CreateSagaStateOptions {
  sagaType: string;
  sagaId?: string;
  correlationId?: string;
  data?: JsonObject;
  steps?: SagaStepDefinition[];
  metadata?: Partial<SagaMetadata>;
}

export interface SagaStateProps {
  sagaId: string;
  sagaType: string;
  status: SagaStatus;
  currentStep: string;
  createdAt: Date;
  lastUpdatedAt: Date;
  completedAt?: Date;
  version: number;
  correlationId?: string;
  data: JsonObject;
  steps: SagaStep[];
  compensations: SagaCompensation[];
  metadata: SagaMetadata;
}

const ALLOWED_TRANSITIONS: Readonly<Record<SagaStatus, readonly SagaStatus[]>> = {
  [SagaStatus.NOT_STARTED]: [SagaStatus.RUNNING],
  [SagaStatus.RUNNING]: [
    SagaStatus.COMPLETED,
    SagaStatus.FAILED,
    SagaStatus.COMPENSATING,
    SagaStatus.SUSPENDED,
    SagaStatus.TIMED_OUT,
    SagaStatus.ABORTED,
  ],
  [SagaStatus.FAILED]: [SagaStatus.COMPENSATING],
  [SagaStatus.COMPENSATING]: [SagaStatus.COMPENSATED],
  [SagaStatus.SUSPENDED]: [SagaStatus.RUNNING, SagaStatus.TIMED_OUT, SagaStatus.ABORTED],
  [SagaStatus.TIMED_OUT]: [SagaStatus.COMPENSATING, SagaStatus.ABORTED],
  [SagaStatus.COMPLETED]: [],
  [SagaStatus.COMPENSATED]: [],
  [SagaStatus.ABORTED]: [],
};

// Statuses that close the saga's execution window
const FINISHING_STATUSES: ReadonlySet<SagaStatus> = new Set([
  SagaStatus.COMPLETED,
  SagaStatus.FAILED,
  SagaStatus.COMPENSATED,
  SagaStatus.TIMED_OUT,
  SagaStatus.ABORTED,
]);

export function canTransition(from: SagaStatus, to: SagaStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function getAllowedTransitions(from: SagaStatus): readonly SagaStatus[] {
  return ALLOWED_TRANSITIONS[from];
}

export function createDefaultMetadata(overrides: Partial<SagaMetadata> = {}): SagaMetadata {
  return {
    timeoutAction: SagaTimeoutAction.COMPENSATE,
    priority: SagaPriority.NORMAL,
    childSagaIds: [],
    tags: {},
    isCritical: false,
    ...overrides,
  };
}

/**
 * One workflow instance. Every mutating method touches the state exactly once,
 * so the version counts logical mutations.
 */
export class SagaState {
  readonly sagaId: string;
  readonly sagaType: string;
  status: SagaStatus;
  currentStep: string;
  createdAt: Date;
  lastUpdatedAt: Date;
  completedAt?: Date;
  version: number;
  correlationId?: string;
  data: JsonObject;
  steps: SagaStep[];
  compensations: SagaCompensation[];
  metadata: SagaMetadata;

  constructor(props: SagaStateProps) {
    this.sagaId = props.sagaId;
    this.sagaType = props.sagaType;
    this.status = props.status;
    this.currentStep = props.currentStep;
    this.createdAt = props.createdAt;
    this.lastUpdatedAt = props.lastUpdatedAt;
    this.completedAt = props.completedAt;
    this.version = props.version;
    this.correlationId = props.correlationId;
    this.data = props.data;
    this.steps = props.steps;
    this.compensations = props.compensations;
    this.metadata = props.metadata;
  }

  static create(options: CreateSagaStateOptions): SagaState {
    if (!options.sagaType?.trim()) {
      throw new SagaValidationError('Saga type is required');
    }
    if (options.sagaId !== undefined && !isValidUUID(options.sagaId)) {
      throw new SagaValidationError(`Saga id must be a UUID: ${options.sagaId}`);
    }
    if (options.metadata?.timeoutMs !== undefined && options.metadata.timeoutMs <= 0) {
      throw new SagaValidationError('Saga timeout must be positive');
    }

    const now = new Date();
    const state = new SagaState({
      sagaId: options.sagaId ?? generateUUID(),
      sagaType: options.sagaType,
      status: SagaStatus.NOT_STARTED,
      currentStep: '',
      createdAt: now,
      lastUpdatedAt: now,
      version: 0,
      correlationId: options.correlationId,
      data: { ...(options.data ?? {}) },
      steps: [],
      compensations: [],
      metadata: createDefaultMetadata(options.metadata),
    });

    for (const definition of options.steps ?? []) {
      state.steps.push(state.buildStep(definition));
    }

    return state;
  }

  get timeoutAt(): Date | undefined {
    return this.metadata.timeoutMs === undefined
      ? undefined
      : addMilliseconds(this.createdAt, this.metadata.timeoutMs);
  }

  isTerminal(): boolean {
    return TERMINAL_SAGA_STATUSES.has(this.status);
  }

  touch(): void {
    this.lastUpdatedAt = new Date();
    this.version += 1;
  }

  getData(key: string): JsonValue | undefined {
    return this.data[key];
  }

  setData(key: string, value: JsonValue): void {
    this.data[key] = value;
    this.touch();
  }

  mergeData(values: JsonObject): void {
    Object.assign(this.data, values);
    this.touch();
  }

  getStep(name: string): SagaStep | undefined {
    return this.steps.find(step => step.name === name);
  }

  requireStep(name: string): SagaStep {
    const step = this.getStep(name);
    if (!step) {
      throw new SagaNotFoundError(`Step ${name} not found in saga ${this.sagaId}`, this.sagaId);
    }
    return step;
  }

  addStep(definition: SagaStepDefinition): SagaStep {
    const step = this.buildStep(definition);
    this.steps.push(step);
    this.touch();
    return step;
  }

  /**
   * Set a step's status. StartedAt is stamped on the first entry to Running and
   * CompletedAt on the first terminal status; neither is overwritten later.
   */
  updateStepStatus(name: string, status: SagaStepStatus, errorMessage?: string): SagaStep {
    const step = this.requireStep(name);
    this.applyStepStatus(step, status, errorMessage);
    this.touch();
    return step;
  }

  startStep(name: string): SagaStep {
    const step = this.requireStep(name);
    this.applyStepStatus(step, SagaStepStatus.RUNNING);
    step.errorMessage = undefined;
    this.currentStep = name;
    this.touch();
    return step;
  }

  completeStep(name: string, output?: SagaPayload, data?: JsonObject): SagaStep {
    const step = this.requireStep(name);
    this.applyStepStatus(step, SagaStepStatus.COMPLETED);
    if (output !== undefined) {
      step.output = output;
    }
    if (data) {
      Object.assign(this.data, data);
    }
    this.touch();
    return step;
  }

  recordStepAttemptFailure(name: string, errorMessage: string): SagaStep {
    const step = this.requireStep(name);
    step.retryCount += 1;
    step.errorMessage = errorMessage;
    this.touch();
    return step;
  }

  /**
   * Put a step back to Pending so it runs again on the next continuation
   */
  resetStep(name: string): SagaStep {
    const step = this.requireStep(name);
    step.status = SagaStepStatus.PENDING;
    this.touch();
    return step;
  }

  recordCompensation(compensation: SagaCompensation): void {
    const step = this.getStep(compensation.stepName);
    if (step) {
      this.applyStepStatus(step, compensation.status, compensation.errorMessage);
    }
    this.compensations.push(compensation);
    this.touch();
  }

  /**
   * Move the saga to a new status; data is merged within the same mutation
   */
  transitionTo(status: SagaStatus, data?: JsonObject): void {
    if (!canTransition(this.status, status)) {
      throw new InvalidSagaTransitionError(this.status, status, this.sagaId);
    }

    const now = new Date();
    if (this.status === SagaStatus.NOT_STARTED && status === SagaStatus.RUNNING) {
      this.createdAt = now;
    }
    if (FINISHING_STATUSES.has(status)) {
      this.completedAt = now;
    }
    if (data) {
      Object.assign(this.data, data);
    }
    this.status = status;
    this.touch();
  }

  canCompensate(): boolean {
    return this.getCompensableSteps().length > 0;
  }

  /**
   * Completed compensable steps, most recently completed first
   */
  getCompensableSteps(): SagaStep[] {
    return this.steps
      .map((step, index) => ({ step, index }))
      .filter(({ step }) => step.status === SagaStepStatus.COMPLETED && step.isCompensable)
      .sort((a, b) => {
        const byCompletion = (b.step.completedAt?.getTime() ?? 0) - (a.step.completedAt?.getTime() ?? 0);
        return byCompletion !== 0 ? byCompletion : b.index - a.index;
      })
      .map(({ step }) => step);
  }

  /**
   * First Pending step in declared order
   */
  getNextPendingStep(): SagaStep | undefined {
    return this.steps.find(step => step.status === SagaStepStatus.PENDING);
  }

  allStepsFinished(): boolean {
    return this.steps.every(
      step => step.status === SagaStepStatus.COMPLETED || step.status === SagaStepStatus.SKIPPED,
    );
  }

  private applyStepStatus(step: SagaStep, status: SagaStepStatus, errorMessage?: string): void {
    const now = new Date();
    if (status === SagaStepStatus.RUNNING && !step.startedAt) {
      step.startedAt = now;
    }
    if (TERMINAL_STEP_STATUSES.has(status) && !step.completedAt) {
      step.completedAt = now;
    }
    if (errorMessage !== undefined) {
      step.errorMessage = errorMessage;
    }
    step.status = status;
  }

  private buildStep(definition: SagaStepDefinition): SagaStep {
    if (!definition.name?.trim()) {
      throw new SagaValidationError('Step name is required', this.sagaId);
    }
    if (this.getStep(definition.name)) {
      throw new SagaValidationError(`Duplicate step name: ${definition.name}`, this.sagaId);
    }
    const maxRetries = definition.maxRetries ?? DEFAULT_STEP_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new SagaValidationError(`Step ${definition.name} maxRetries must be a positive integer`, this.sagaId);
    }

    return {
      name: definition.name,
      stepType: definition.stepType ?? definition.name,
      status: SagaStepStatus.PENDING,
      input: definition.input,
      retryCount: 0,
      maxRetries,
      timeoutMs: definition.timeoutMs,
      compensationAction: definition.compensationAction,
      isCompensable: definition.isCompensable ?? true,
    };
  }
}
