import { Inject, Injectable, Logger } from '@nestjs/common';

import { SAGA_OPTIONS, SagaOptions } from '../config/saga.config';
import { SagaCallContext } from '../context/saga-call-context';
import { SagaState } from '../entities/saga-state.entity';
import { SagaNotFoundError, SagaValidationError } from '../errors/saga.errors';
import { SAGA_EVENT_PUBLISHER, SagaEventPublisher } from '../interfaces/saga-event-publisher.interface';
import { SagaPersistence } from '../interfaces/saga-persistence.interface';
import { SagaStepHandler } from '../interfaces/saga-step-handler.interface';
import { SagaOrchestrator } from '../orchestrator/saga-orchestrator';
import { InMemorySagaPersistence } from '../persistence/in-memory-saga.persistence';
import { CircuitBreakerOptions, SagaCircuitBreaker } from '../resilience/saga-circuit-breaker';
import { RetryPolicyOptions, SagaRetryPolicy } from '../resilience/saga-retry-policy';

export interface SagaDefinition {
  sagaType: string;
  handlers: SagaStepHandler[];
  persistence?: SagaPersistence;
  retryPolicy?: Partial<RetryPolicyOptions>;
  /** `false` runs the saga type without a breaker */
  circuitBreaker?: Partial<CircuitBreakerOptions> | false;
}

export interface SagaRegistration {
  sagaType: string;
  orchestrator: SagaOrchestrator;
  persistence: SagaPersistence;
  circuitBreaker?: SagaCircuitBreaker;
}

/**
 * Startup-time map from saga type to its orchestrator, persistence and handlers
 */
@Injectable()
export class SagaRegistry {
  private readonly logger = new Logger(SagaRegistry.name);
  private readonly registrations = new Map<string, SagaRegistration>();

  constructor(
    @Inject(SAGA_OPTIONS) private readonly options: SagaOptions,
    @Inject(SAGA_EVENT_PUBLISHER) private readonly publisher: SagaEventPublisher,
  ) {}

  /**
   * Register a saga definition
   */
  register(definition: SagaDefinition): SagaOrchestrator {
    const sagaType = definition.sagaType?.trim();
    if (!sagaType) {
      throw new SagaValidationError('Saga type is required');
    }
    if (this.registrations.has(sagaType)) {
      throw new SagaValidationError(`Saga type already registered: ${sagaType}`);
    }

    const persistence = definition.persistence ?? new InMemorySagaPersistence();
    const circuitBreaker =
      definition.circuitBreaker === false
        ? undefined
        : new SagaCircuitBreaker(sagaType, { ...this.options.circuitBreaker, ...definition.circuitBreaker });

    const orchestrator = new SagaOrchestrator({
      sagaType,
      handlers: definition.handlers,
      persistence,
      publisher: this.publisher,
      retryPolicy: new SagaRetryPolicy({ ...this.options.retry, ...definition.retryPolicy }),
      circuitBreaker,
    });

    this.registrations.set(sagaType, { sagaType, orchestrator, persistence, circuitBreaker });
    this.logger.log(`Registered saga: ${sagaType} with ${definition.handlers.length} step handlers`);
    return orchestrator;
  }

  has(sagaType: string): boolean {
    return this.registrations.has(sagaType);
  }

  getOrchestrator(sagaType: string): SagaOrchestrator {
    return this.getRegistration(sagaType).orchestrator;
  }

  getPersistence(sagaType: string): SagaPersistence {
    return this.getRegistration(sagaType).persistence;
  }

  getHandlerNames(sagaType: string): string[] {
    return this.getRegistration(sagaType).orchestrator.getHandlerNames();
  }

  getRegistration(sagaType: string): SagaRegistration {
    const registration = this.registrations.get(sagaType);
    if (!registration) {
      throw new SagaNotFoundError(`Saga definition not found: ${sagaType}`);
    }
    return registration;
  }

  getRegistrations(): SagaRegistration[] {
    return [...this.registrations.values()];
  }

  /**
   * Distinct persistence backends; several saga types may share one
   */
  getPersistences(): SagaPersistence[] {
    return [...new Set(this.getRegistrations().map(registration => registration.persistence))];
  }

  /**
   * Look a saga up across every registered backend
   */
  async findSaga(sagaId: string, context?: SagaCallContext): Promise<SagaState | undefined> {
    for (const persistence of this.getPersistences()) {
      const state = await persistence.get(sagaId, context);
      if (state) {
        return state;
      }
    }
    return undefined;
  }
}
