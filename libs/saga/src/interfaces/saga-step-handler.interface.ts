import { JsonObject } from '@conductor/shared';

import { SagaCallContext } from '../context/saga-call-context';
import { SagaState } from '../entities/saga-state.entity';
import { SagaStepAction } from '../enums/saga-status.enum';
import { SagaPayload } from '../utils/saga-payload';

export interface SagaStepResult {
  success: boolean;
  output?: SagaPayload;
  error?: string;
  nextStep?: string;
  shouldRetry?: boolean;
  retryDelayMs?: number;
  action: SagaStepAction;
  /** Merged into the saga's data bag when the step succeeds */
  data?: JsonObject;
}

/**
 * Business logic for one named step. `execute` receives a snapshot of the saga
 * state; changes belong in the returned result, which the orchestrator applies.
 */
export interface SagaStepHandler {
  readonly stepName: string;
  execute(state: SagaState, context: SagaCallContext): Promise<SagaStepResult>;
  compensate(state: SagaState, context: SagaCallContext): Promise<SagaStepResult>;
  canExecute(state: SagaState): boolean;
  canCompensate(state: SagaState): boolean;
}

export const SagaStepResults = {
  success(output?: SagaPayload, data?: JsonObject, nextStep?: string): SagaStepResult {
    return { success: true, output, data, nextStep, action: SagaStepAction.CONTINUE };
  },

  failure(error: string, shouldRetry = true, retryDelayMs?: number): SagaStepResult {
    return { success: false, error, shouldRetry, retryDelayMs, action: SagaStepAction.CONTINUE };
  },

  complete(output?: SagaPayload, data?: JsonObject): SagaStepResult {
    return { success: true, output, data, action: SagaStepAction.COMPLETE };
  },

  compensate(reason: string): SagaStepResult {
    return { success: false, error: reason, action: SagaStepAction.COMPENSATE };
  },

  suspend(reason: string): SagaStepResult {
    return { success: false, error: reason, action: SagaStepAction.SUSPEND };
  },

  abort(reason: string): SagaStepResult {
    return { success: false, error: reason, action: SagaStepAction.ABORT };
  },

  retry(error: string, retryDelayMs?: number): SagaStepResult {
    return { success: false, error, shouldRetry: true, retryDelayMs, action: SagaStepAction.RETRY };
  },
};

export abstract class BaseSagaStepHandler implements SagaStepHandler {
  abstract readonly stepName: string;

  /**
   * Execute the saga step
   */
  abstract execute(state: SagaState, context: SagaCallContext): Promise<SagaStepResult>;

  /**
   * Compensate/rollback the saga step
   */
  abstract compensate(state: SagaState, context: SagaCallContext): Promise<SagaStepResult>;

  canExecute(_state: SagaState): boolean {
    return true;
  }

  canCompensate(_state: SagaState): boolean {
    return true;
  }
}
