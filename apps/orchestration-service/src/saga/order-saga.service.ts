import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  SagaCallContext,
  SagaNotFoundError,
  SagaOrchestrator,
  SagaRegistry,
  SagaState,
  SagaTimeoutAction,
} from '@conductor/saga';
import { generateCorrelationId } from '@conductor/shared';

import { OrderSagaDataDto, parseOrderSagaData, toOrderSagaData } from './dto/order-saga-data.dto';
import { ORDER_SAGA_STEPS, ORDER_SAGA_TIMEOUT_MS, ORDER_SAGA_TYPE } from './order-saga.constants';
import { BookPartnerStep } from './steps/book-partner.step';
import { ConfirmOrderStep, MANUAL_REVIEW_APPROVED, MANUAL_REVIEW_REQUIRED } from './steps/confirm-order.step';
import { ReserveInventoryStep } from './steps/reserve-inventory.step';

export interface StartOrderSagaOptions {
  correlationId?: string;
  initiatedBy?: string;
  requireManualReview?: boolean;
  signal?: AbortSignal;
}

@Injectable()
export class OrderSagaService implements OnModuleInit {
  private readonly logger = new Logger(OrderSagaService.name);
  private orchestrator?: SagaOrchestrator;

  constructor(
    private readonly sagaRegistry: SagaRegistry,
    private readonly reserveInventoryStep: ReserveInventoryStep,
    private readonly bookPartnerStep: BookPartnerStep,
    private readonly confirmOrderStep: ConfirmOrderStep,
  ) {}

  onModuleInit(): void {
    this.orchestrator = this.sagaRegistry.register({
      sagaType: ORDER_SAGA_TYPE,
      handlers: [this.reserveInventoryStep, this.bookPartnerStep, this.confirmOrderStep],
    });

    this.logger.log('Order saga registered successfully');
  }

  /**
   * Start order processing saga and run it until it settles
   */
  async startOrderProcessingSaga(order: object, options: StartOrderSagaOptions = {}): Promise<SagaState> {
    const orderData: OrderSagaDataDto = parseOrderSagaData(order);
    const correlationId = options.correlationId ?? generateCorrelationId('order');

    this.logger.log(`Starting order processing saga`, {
      orderId: orderData.orderId,
      correlationId,
    });

    const state = SagaState.create({
      sagaType: ORDER_SAGA_TYPE,
      correlationId,
      data: {
        ...toOrderSagaData(orderData),
        [MANUAL_REVIEW_REQUIRED]: options.requireManualReview ?? false,
      },
      steps: [
        {
          name: ORDER_SAGA_STEPS.RESERVE_INVENTORY,
          timeoutMs: 5000,
          compensationAction: 'ReleaseInventory',
        },
        {
          name: ORDER_SAGA_STEPS.BOOK_PARTNER,
          timeoutMs: 8000,
          compensationAction: 'CancelPartnerBooking',
        },
        {
          name: ORDER_SAGA_STEPS.CONFIRM_ORDER,
          timeoutMs: 5000,
          isCompensable: false,
        },
      ],
      metadata: {
        initiatedBy: options.initiatedBy,
        businessContext: `Order ${orderData.orderId}`,
        timeoutMs: ORDER_SAGA_TIMEOUT_MS,
        timeoutAction: SagaTimeoutAction.COMPENSATE,
        tags: { orderId: orderData.orderId, restaurantId: orderData.restaurantId },
      },
    });

    return this.getOrchestrator().start(state, this.toContext(correlationId, options));
  }

  /**
   * Approve an order held for manual review and resume its saga
   */
  async approveManualReview(sagaId: string, context: SagaCallContext = {}): Promise<SagaState> {
    const state = await this.requireSaga(sagaId, context);
    state.setData(MANUAL_REVIEW_APPROVED, true);

    this.logger.log(`Manual review approved`, {
      sagaId,
      correlationId: state.correlationId,
    });

    return this.getOrchestrator().resume(state, context);
  }

  async getSaga(sagaId: string, context: SagaCallContext = {}): Promise<SagaState | undefined> {
    return this.getOrchestrator().getPersistence().get(sagaId, context);
  }

  async getSagasByCorrelationId(correlationId: string, context: SagaCallContext = {}): Promise<SagaState[]> {
    return this.getOrchestrator().getPersistence().getByCorrelationId(correlationId, context);
  }

  private async requireSaga(sagaId: string, context: SagaCallContext): Promise<SagaState> {
    const state = await this.getSaga(sagaId, context);
    if (!state) {
      throw new SagaNotFoundError(`Saga ${sagaId} not found`, sagaId);
    }
    return state;
  }

  private getOrchestrator(): SagaOrchestrator {
    return this.orchestrator ?? this.sagaRegistry.getOrchestrator(ORDER_SAGA_TYPE);
  }

  private toContext(correlationId: string, options: StartOrderSagaOptions): SagaCallContext {
    return { correlationId, initiatedBy: options.initiatedBy, signal: options.signal };
  }
}
