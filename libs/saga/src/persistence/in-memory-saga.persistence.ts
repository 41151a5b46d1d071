import { Injectable, Logger } from '@nestjs/common';

import { SagaCallContext, throwIfCancelled } from '../context/saga-call-context';
import { SagaState } from '../entities/saga-state.entity';
import { deserializeSagaState, serializeSagaState } from '../entities/saga-state.serializer';
import { SagaStatus } from '../enums/saga-status.enum';
import { SagaConcurrencyError, SagaValidationError } from '../errors/saga.errors';
import { SagaPersistence, SagaStatistics } from '../interfaces/saga-persistence.interface';

/**
 * Reference persistence: serialized snapshots in a map keyed by sagaId.
 * Reads always return fresh instances.
 */
@Injectable()
export class InMemorySagaPersistence implements SagaPersistence {
  private readonly logger = new Logger(InMemorySagaPersistence.name);
  private readonly sagas = new Map<string, string>();
  private readonly versions = new Map<string, number>();

  async get(sagaId: string, context?: SagaCallContext): Promise<SagaState | undefined> {
    throwIfCancelled(context, sagaId);
    const json = this.sagas.get(sagaId);
    return json === undefined ? undefined : deserializeSagaState(json);
  }

  async save(state: SagaState, context?: SagaCallContext): Promise<void> {
    throwIfCancelled(context, state.sagaId);

    const storedVersion = this.versions.get(state.sagaId);
    if (storedVersion !== undefined && storedVersion > state.version) {
      throw new SagaConcurrencyError(state.sagaId, state.version, storedVersion);
    }

    this.sagas.set(state.sagaId, serializeSagaState(state));
    this.versions.set(state.sagaId, state.version);

    this.logger.debug(`Saved saga ${state.sagaId}`, {
      sagaId: state.sagaId,
      status: state.status,
      version: state.version,
    });
  }

  async delete(sagaId: string, context?: SagaCallContext): Promise<boolean> {
    throwIfCancelled(context, sagaId);
    this.versions.delete(sagaId);
    return this.sagas.delete(sagaId);
  }

  async getByStatus(status: SagaStatus, context?: SagaCallContext): Promise<SagaState[]> {
    throwIfCancelled(context);
    return this.loadAll().filter(saga => saga.status === status);
  }

  async getTimedOutSagas(before: Date, context?: SagaCallContext): Promise<SagaState[]> {
    throwIfCancelled(context);
    return this.loadAll().filter(saga => {
      const timeoutAt = saga.timeoutAt;
      return saga.status === SagaStatus.RUNNING && timeoutAt !== undefined && timeoutAt <= before;
    });
  }

  async getByCorrelationId(correlationId: string, context?: SagaCallContext): Promise<SagaState[]> {
    if (!correlationId) {
      throw new SagaValidationError('Correlation id is required');
    }
    throwIfCancelled(context);
    return this.loadAll().filter(saga => saga.correlationId === correlationId);
  }

  async getStatistics(context?: SagaCallContext): Promise<SagaStatistics> {
    throwIfCancelled(context);
    const sagas = this.loadAll();
    const countOf = (status: SagaStatus) => sagas.filter(saga => saga.status === status).length;

    const sagasByType: Record<string, number> = {};
    for (const saga of sagas) {
      sagasByType[saga.sagaType] = (sagasByType[saga.sagaType] ?? 0) + 1;
    }

    const durations = sagas.flatMap(saga =>
      saga.completedAt ? [saga.completedAt.getTime() - saga.createdAt.getTime()] : [],
    );

    return {
      totalSagas: sagas.length,
      runningSagas: countOf(SagaStatus.RUNNING),
      completedSagas: countOf(SagaStatus.COMPLETED),
      failedSagas: countOf(SagaStatus.FAILED),
      compensatingSagas: countOf(SagaStatus.COMPENSATING),
      compensatedSagas: countOf(SagaStatus.COMPENSATED),
      suspendedSagas: countOf(SagaStatus.SUSPENDED),
      timedOutSagas: countOf(SagaStatus.TIMED_OUT),
      abortedSagas: countOf(SagaStatus.ABORTED),
      sagasByType,
      averageExecutionTimeMs: durations.length
        ? durations.reduce((sum, duration) => sum + duration, 0) / durations.length
        : 0,
    };
  }

  private loadAll(): SagaState[] {
    return [...this.sagas.values()].map(deserializeSagaState);
  }
}
