import { SagaCallContext } from '../context/saga-call-context';
import { SagaState } from '../entities/saga-state.entity';
import { SagaStatus } from '../enums/saga-status.enum';

export interface SagaStatistics {
  totalSagas: number;
  runningSagas: number;
  completedSagas: number;
  failedSagas: number;
  compensatingSagas: number;
  compensatedSagas: number;
  suspendedSagas: number;
  timedOutSagas: number;
  abortedSagas: number;
  sagasByType: Record<string, number>;
  averageExecutionTimeMs: number;
}

/**
 * Storage contract for saga state. `save` is a full-state upsert keyed by sagaId;
 * every backend returns detached copies so callers never share instances.
 */
export interface SagaPersistence {
  get(sagaId: string, context?: SagaCallContext): Promise<SagaState | undefined>;
  save(state: SagaState, context?: SagaCallContext): Promise<void>;
  delete(sagaId: string, context?: SagaCallContext): Promise<boolean>;
  getByStatus(status: SagaStatus, context?: SagaCallContext): Promise<SagaState[]>;
  /** Running sagas whose createdAt + timeout is at or before `before` */
  getTimedOutSagas(before: Date, context?: SagaCallContext): Promise<SagaState[]>;
  getByCorrelationId(correlationId: string, context?: SagaCallContext): Promise<SagaState[]>;
  getStatistics(context?: SagaCallContext): Promise<SagaStatistics>;
}
