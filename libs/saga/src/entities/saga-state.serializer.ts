import { JsonObject, formatDateToISO, parseISOString } from '@conductor/shared';

import {
  SagaPriority,
  SagaStatus,
  SagaStepStatus,
  SagaTimeoutAction,
} from '../enums/saga-status.enum';
import { SagaPersistenceError } from '../errors/saga.errors';
import { SagaPayload, SagaPayloadDocument, SagaPayloads } from '../utils/saga-payload';
import { SagaCompensation, SagaMetadata, SagaState, SagaStep } from './saga-state.entity';

export interface SagaStepDocument {
  name: string;
  stepType: string;
  status: SagaStepStatus;
  startedAt?: string;
  completedAt?: string;
  input?: SagaPayloadDocument;
  output?: SagaPayloadDocument;
  retryCount: number;
  maxRetries: number;
  timeoutMs?: number;
  compensationAction?: string;
  isCompensable: boolean;
  errorMessage?: string;
}

export interface SagaCompensationDocument {
  stepName: string;
  action: string;
  status: SagaStepStatus;
  executedAt?: string;
  errorMessage?: string;
  retryCount: number;
  input?: SagaPayloadDocument;
  output?: SagaPayloadDocument;
}

export interface SagaMetadataDocument {
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

/**
 * Persisted layout: one document per saga keyed by sagaId
 */
export interface SagaStateDocument {
  sagaId: string;
  sagaType: string;
  status: SagaStatus;
  currentStep: string;
  createdAt: string;
  lastUpdatedAt: string;
  completedAt?: string;
  version: number;
  correlationId?: string;
  data: JsonObject;
  steps: SagaStepDocument[];
  compensations: SagaCompensationDocument[];
  metadata: SagaMetadataDocument;
}

const SAGA_STATUSES: ReadonlySet<string> = new Set(Object.values(SagaStatus));
const STEP_STATUSES: ReadonlySet<string> = new Set(Object.values(SagaStepStatus));

function optionalDate(value: Date | undefined): string | undefined {
  return value ? formatDateToISO(value) : undefined;
}

function readOptionalDate(value: string | undefined): Date | undefined {
  return value === undefined ? undefined : parseISOString(value);
}

function optionalPayload(payload: SagaPayload | undefined): SagaPayloadDocument | undefined {
  return payload ? SagaPayloads.toDocument(payload) : undefined;
}

function readOptionalPayload(document: SagaPayloadDocument | undefined): SagaPayload | undefined {
  return document ? SagaPayloads.fromDocument(document) : undefined;
}

function stepToDocument(step: SagaStep): SagaStepDocument {
  return {
    ...step,
    startedAt: optionalDate(step.startedAt),
    completedAt: optionalDate(step.completedAt),
    input: optionalPayload(step.input),
    output: optionalPayload(step.output),
  };
}

function compensationToDocument(compensation: SagaCompensation): SagaCompensationDocument {
  return {
    ...compensation,
    executedAt: optionalDate(compensation.executedAt),
    input: optionalPayload(compensation.input),
    output: optionalPayload(compensation.output),
  };
}

export function toSagaDocument(state: SagaState): SagaStateDocument {
  const metadata: SagaMetadata = state.metadata;
  return {
    sagaId: state.sagaId,
    sagaType: state.sagaType,
    status: state.status,
    currentStep: state.currentStep,
    createdAt: formatDateToISO(state.createdAt),
    lastUpdatedAt: formatDateToISO(state.lastUpdatedAt),
    completedAt: optionalDate(state.completedAt),
    version: state.version,
    correlationId: state.correlationId,
    data: structuredClone(state.data),
    steps: state.steps.map(stepToDocument),
    compensations: state.compensations.map(compensationToDocument),
    metadata: {
      ...metadata,
      childSagaIds: [...metadata.childSagaIds],
      tags: { ...metadata.tags },
    },
  };
}

export function fromSagaDocument(document: SagaStateDocument): SagaState {
  if (!SAGA_STATUSES.has(document.status)) {
    throw new SagaPersistenceError(`Unknown saga status in document: ${document.status}`, document.sagaId);
  }

  const steps = document.steps.map((step): SagaStep => {
    if (!STEP_STATUSES.has(step.status)) {
      throw new SagaPersistenceError(`Unknown step status in document: ${step.status}`, document.sagaId);
    }
    return {
      ...step,
      startedAt: readOptionalDate(step.startedAt),
      completedAt: readOptionalDate(step.completedAt),
      input: readOptionalPayload(step.input),
      output: readOptionalPayload(step.output),
    };
  });

  return new SagaState({
    sagaId: document.sagaId,
    sagaType: document.sagaType,
    status: document.status,
    currentStep: document.currentStep,
    createdAt: parseISOString(document.createdAt),
    lastUpdatedAt: parseISOString(document.lastUpdatedAt),
    completedAt: readOptionalDate(document.completedAt),
    version: document.version,
    correlationId: document.correlationId,
    data: structuredClone(document.data),
    steps,
    compensations: document.compensations.map(compensation => ({
      ...compensation,
      executedAt: readOptionalDate(compensation.executedAt),
      input: readOptionalPayload(compensation.input),
      output: readOptionalPayload(compensation.output),
    })),
    metadata: {
      ...document.metadata,
      childSagaIds: [...document.metadata.childSagaIds],
      tags: { ...document.metadata.tags },
    },
  });
}

export function serializeSagaState(state: SagaState): string {
  return JSON.stringify(toSagaDocument(state));
}

export function deserializeSagaState(json: string): SagaState {
  let document: SagaStateDocument;
  try {
    document = JSON.parse(json);
  } catch (error) {
    throw new SagaPersistenceError(`Corrupt saga document: ${error instanceof Error ? error.message : String(error)}`);
  }
  return fromSagaDocument(document);
}

/**
 * Detached deep copy, as a persistence round trip would produce
 */
export function cloneSagaState(state: SagaState): SagaState {
  return deserializeSagaState(serializeSagaState(state));
}
