import { ConfigService } from '@nestjs/config';

import { buildSagaOptions } from '../config/saga.config';
import { SagaState } from '../entities/saga-state.entity';
import { SagaNotFoundError, SagaValidationError } from '../errors/saga.errors';
import { InMemorySagaPersistence } from '../persistence/in-memory-saga.persistence';
import { RecordingSagaEventPublisher, ScriptedStepHandler } from '../testing/saga-test.fixtures';
import { SagaRegistry } from './saga-registry.service';

describe('SagaRegistry', () => {
  let registry: SagaRegistry;

  beforeEach(() => {
    registry = new SagaRegistry(buildSagaOptions(new ConfigService({})), new RecordingSagaEventPublisher());
  });

  it('should register a saga type with its own persistence and breaker', () => {
    const orchestrator = registry.register({ sagaType: 'ORDER', handlers: [new ScriptedStepHandler('A')] });

    expect(registry.has('ORDER')).toBe(true);
    expect(registry.getOrchestrator('ORDER')).toBe(orchestrator);
    expect(registry.getHandlerNames('ORDER')).toEqual(['A']);
    expect(registry.getPersistence('ORDER')).toBeInstanceOf(InMemorySagaPersistence);
    expect(registry.getRegistration('ORDER').circuitBreaker?.name).toBe('ORDER');
  });

  it('should allow a saga type without a breaker', () => {
    registry.register({ sagaType: 'ORDER', handlers: [], circuitBreaker: false });

    expect(registry.getRegistration('ORDER').circuitBreaker).toBeUndefined();
  });

  it('should reject duplicate and empty saga types', () => {
    registry.register({ sagaType: 'ORDER', handlers: [] });

    expect(() => registry.register({ sagaType: 'ORDER', handlers: [] })).toThrow(
      'Saga type already registered: ORDER',
    );
    expect(() => registry.register({ sagaType: '  ', handlers: [] })).toThrow(SagaValidationError);
  });

  it('should throw for unknown saga types', () => {
    expect(() => registry.getOrchestrator('PAYMENT')).toThrow(SagaNotFoundError);
  });

  it('should list shared persistence backends once', () => {
    const shared = new InMemorySagaPersistence();
    registry.register({ sagaType: 'ORDER', handlers: [], persistence: shared });
    registry.register({ sagaType: 'REFUND', handlers: [], persistence: shared });
    registry.register({ sagaType: 'PAYMENT', handlers: [] });

    expect(registry.getPersistences()).toHaveLength(2);
    expect(registry.getRegistrations().map(registration => registration.sagaType)).toEqual([
      'ORDER',
      'REFUND',
      'PAYMENT',
    ]);
  });

  it('should find a saga in any registered backend', async () => {
    registry.register({ sagaType: 'ORDER', handlers: [] });
    registry.register({ sagaType: 'PAYMENT', handlers: [] });
    const state = SagaState.create({ sagaType: 'PAYMENT' });
    await registry.getPersistence('PAYMENT').save(state);

    const found = await registry.findSaga(state.sagaId);

    expect(found?.sagaType).toBe('PAYMENT');
    await expect(registry.findSaga('missing')).resolves.toBeUndefined();
  });
});
