// Module
export * from './saga.module';

// Configuration
export * from './config/saga.config';
export * from './context/saga-call-context';

// State
export * from './enums/saga-status.enum';
export * from './entities/saga-state.entity';
export * from './entities/saga-state.serializer';
export * from './utils/saga-payload';

// Contracts
export * from './errors/saga.errors';
export * from './events/saga-event-types';
export * from './interfaces/saga-event-publisher.interface';
export * from './interfaces/saga-persistence.interface';
export * from './interfaces/saga-step-handler.interface';

// Engine
export * from './events/event-emitter-saga-event.publisher';
export * from './orchestrator/saga-orchestrator';
export * from './persistence/in-memory-saga.persistence';
export * from './registry/saga-registry.service';
export * from './resilience/saga-circuit-breaker';
export * from './resilience/saga-retry-policy';
export * from './timeout/saga-timeout.manager';

// Observability
export * from './diagnostics/saga-diagnostic.service';
export * from './diagnostics/saga-diagnostic.types';
export * from './monitoring/saga-monitor.service';
export * from './monitoring/saga-monitor.types';
