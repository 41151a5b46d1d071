export type SagaErrorCode =
  | 'STEP_EXECUTION_FAILED'
  | 'STEP_TIMEOUT'
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'PERSISTENCE_FAILED'
  | 'VERSION_CONFLICT'
  | 'INVALID_TRANSITION'
  | 'CIRCUIT_OPEN'
  | 'CANCELLED';

export class SagaError extends Error {
  constructor(
    message: string,
    readonly code: SagaErrorCode,
    readonly sagaId?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A handler threw or returned failure on every allowed attempt
 */
export class StepExecutionError extends SagaError {
  constructor(
    message: string,
    readonly stepName: string,
    readonly attempts: number,
    sagaId?: string,
    code: SagaErrorCode = 'STEP_EXECUTION_FAILED',
  ) {
    super(message, code, sagaId);
  }
}

export class StepTimeoutError extends StepExecutionError {
  constructor(stepName: string, readonly timeoutMs: number, sagaId?: string) {
    super(`Step ${stepName} timed out after ${timeoutMs}ms`, stepName, 1, sagaId, 'STEP_TIMEOUT');
  }
}

export class SagaValidationError extends SagaError {
  constructor(message: string, sagaId?: string) {
    super(message, 'VALIDATION_FAILED', sagaId);
  }
}

export class SagaNotFoundError extends SagaError {
  constructor(message: string, sagaId?: string) {
    super(message, 'NOT_FOUND', sagaId);
  }
}

export class SagaPersistenceError extends SagaError {
  constructor(message: string, sagaId?: string, code: SagaErrorCode = 'PERSISTENCE_FAILED') {
    super(message, code, sagaId);
  }
}

export class SagaConcurrencyError extends SagaPersistenceError {
  constructor(
    sagaId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(
      `Saga ${sagaId} version conflict: stored version ${actualVersion} is newer than ${expectedVersion}`,
      sagaId,
      'VERSION_CONFLICT',
    );
  }
}

export class InvalidSagaTransitionError extends SagaError {
  constructor(
    readonly from: string,
    readonly to: string,
    sagaId?: string,
  ) {
    super(`Invalid saga transition from ${from} to ${to}`, 'INVALID_TRANSITION', sagaId);
  }
}

export class CircuitBreakerOpenError extends SagaError {
  constructor(
    readonly circuitName: string,
    readonly retryAfterMs: number,
  ) {
    super(`Circuit breaker ${circuitName} is open`, 'CIRCUIT_OPEN');
  }
}

export class SagaCancelledError extends SagaError {
  constructor(sagaId?: string) {
    super('Operation cancelled', 'CANCELLED', sagaId);
  }
}
