import { Injectable, Logger } from '@nestjs/common';
import {
  BaseSagaStepHandler,
  SagaCallContext,
  SagaPayloads,
  SagaState,
  SagaStepResult,
  SagaStepResults,
} from '@conductor/saga';

import { readOrderSagaData } from '../dto/order-saga-data.dto';
import { ORDER_SAGA_STEPS } from '../order-saga.constants';

export const MANUAL_REVIEW_REQUIRED = 'manualReviewRequired';
export const MANUAL_REVIEW_APPROVED = 'manualReviewApproved';

@Injectable()
export class ConfirmOrderStep extends BaseSagaStepHandler {
  readonly stepName = ORDER_SAGA_STEPS.CONFIRM_ORDER;

  private readonly logger = new Logger(ConfirmOrderStep.name);

  async execute(state: SagaState, context: SagaCallContext): Promise<SagaStepResult> {
    const order = readOrderSagaData(state);

    if (order.totalAmount <= 0) {
      return SagaStepResults.abort(`Order total must be positive, got ${order.totalAmount}`);
    }

    if (state.getData(MANUAL_REVIEW_REQUIRED) === true && state.getData(MANUAL_REVIEW_APPROVED) !== true) {
      this.logger.log(`Order awaiting manual review`, {
        sagaId: state.sagaId,
        orderId: order.orderId,
        correlationId: context.correlationId,
      });
      return SagaStepResults.suspend('Awaiting manual review');
    }

    const confirmationCode = `CONF-${state.sagaId.slice(0, 8).toUpperCase()}`;
    const confirmedAt = new Date().toISOString();

    this.logger.log(`Order confirmed`, {
      sagaId: state.sagaId,
      orderId: order.orderId,
      confirmationCode,
      correlationId: context.correlationId,
    });

    return SagaStepResults.complete(SagaPayloads.json({ confirmationCode, confirmedAt }), {
      confirmationCode,
      confirmedAt,
    });
  }

  // Confirmation is the last step and is never rolled back
  async compensate(_state: SagaState, _context: SagaCallContext): Promise<SagaStepResult> {
    return SagaStepResults.success();
  }

  canCompensate(_state: SagaState): boolean {
    return false;
  }
}
