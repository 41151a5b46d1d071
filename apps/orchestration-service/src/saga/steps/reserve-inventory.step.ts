import { Injectable, Logger } from '@nestjs/common';
import {
  BaseSagaStepHandler,
  SagaCallContext,
  SagaPayloads,
  SagaState,
  SagaStepResult,
  SagaStepResults,
} from '@conductor/saga';
import { generateUUID } from '@conductor/shared';

import { readOrderSagaData } from '../dto/order-saga-data.dto';
import { ORDER_SAGA_STEPS } from '../order-saga.constants';

export interface InventoryReservation {
  reservationId: string;
  restaurantId: string;
  items: Array<{ itemId: string; reservedQuantity: number }>;
  reservedAt: Date;
}

// Largest quantity of a single item the kitchen will hold for one order
export const MAX_RESERVABLE_QUANTITY = 100;

@Injectable()
export class ReserveInventoryStep extends BaseSagaStepHandler {
  readonly stepName = ORDER_SAGA_STEPS.RESERVE_INVENTORY;

  private readonly logger = new Logger(ReserveInventoryStep.name);
  private readonly reservations = new Map<string, InventoryReservation>();

  async execute(state: SagaState, context: SagaCallContext): Promise<SagaStepResult> {
    const order = readOrderSagaData(state);

    this.logger.debug(`Reserving inventory for order`, {
      sagaId: state.sagaId,
      orderId: order.orderId,
      correlationId: context.correlationId,
    });

    if (order.items.some(item => item.quantity > MAX_RESERVABLE_QUANTITY)) {
      return SagaStepResults.failure('Insufficient inventory for requested quantity', false);
    }

    const reservation: InventoryReservation = {
      reservationId: `res_${generateUUID()}`,
      restaurantId: order.restaurantId,
      items: order.items.map(item => ({ itemId: item.itemId, reservedQuantity: item.quantity })),
      reservedAt: new Date(),
    };
    this.reservations.set(reservation.reservationId, reservation);

    this.logger.log(`Inventory reserved successfully`, {
      sagaId: state.sagaId,
      reservationId: reservation.reservationId,
      correlationId: context.correlationId,
    });

    return SagaStepResults.success(
      SagaPayloads.json({ reservationId: reservation.reservationId, itemCount: reservation.items.length }),
      { reservationId: reservation.reservationId },
    );
  }

  async compensate(state: SagaState, context: SagaCallContext): Promise<SagaStepResult> {
    const reservationId = state.getData('reservationId');
    if (typeof reservationId !== 'string') {
      this.logger.warn(`No reservation found for compensation`, {
        sagaId: state.sagaId,
        correlationId: context.correlationId,
      });
      return SagaStepResults.success();
    }

    const released = this.reservations.delete(reservationId);
    this.logger.log(`Inventory reservation released`, {
      sagaId: state.sagaId,
      reservationId,
      released,
      correlationId: context.correlationId,
    });

    return SagaStepResults.success(SagaPayloads.json({ reservationId, released }));
  }

  getActiveReservations(): InventoryReservation[] {
    return Array.from(this.reservations.values());
  }
}
