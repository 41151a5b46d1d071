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

export interface DeliveryPartner {
  partnerId: string;
  partnerName: string;
  rating: number;
  maxItems: number;
}

export interface PartnerBooking {
  bookingId: string;
  partnerId: string;
  estimatedDeliveryMinutes: number;
  deliveryFee: number;
}

const PARTNERS: readonly DeliveryPartner[] = [
  { partnerId: 'partner-express', partnerName: 'Express Riders', rating: 4.8, maxItems: 5 },
  { partnerId: 'partner-city', partnerName: 'City Couriers', rating: 4.5, maxItems: 20 },
  { partnerId: 'partner-bulk', partnerName: 'Bulk Movers', rating: 4.1, maxItems: 100 },
];

const BASE_DELIVERY_MINUTES = 20;
const MINUTES_PER_ITEM = 2;
const MIN_DELIVERY_FEE = 2.5;
const DELIVERY_FEE_RATE = 0.08;

export function estimateDeliveryMinutes(itemCount: number): number {
  return BASE_DELIVERY_MINUTES + MINUTES_PER_ITEM * itemCount;
}

export function calculateDeliveryFee(totalAmount: number): number {
  return Math.round(Math.max(MIN_DELIVERY_FEE, totalAmount * DELIVERY_FEE_RATE) * 100) / 100;
}

@Injectable()
export class BookPartnerStep extends BaseSagaStepHandler {
  readonly stepName = ORDER_SAGA_STEPS.BOOK_PARTNER;

  private readonly logger = new Logger(BookPartnerStep.name);
  private readonly bookings = new Map<string, PartnerBooking>();

  async execute(state: SagaState, context: SagaCallContext): Promise<SagaStepResult> {
    const order = readOrderSagaData(state);
    const itemCount = order.items.reduce((sum, item) => sum + item.quantity, 0);

    const partner = this.findOptimalPartner(itemCount);
    if (!partner) {
      return SagaStepResults.failure(`No delivery partner can carry ${itemCount} items`, false);
    }

    const estimatedDeliveryMinutes = estimateDeliveryMinutes(itemCount);
    if (order.maxDeliveryTimeMinutes !== undefined && order.maxDeliveryTimeMinutes < estimatedDeliveryMinutes) {
      return SagaStepResults.compensate(
        `Estimated delivery of ${estimatedDeliveryMinutes} minutes exceeds limit of ${order.maxDeliveryTimeMinutes}`,
      );
    }

    const booking: PartnerBooking = {
      bookingId: `bkg_${generateUUID()}`,
      partnerId: partner.partnerId,
      estimatedDeliveryMinutes,
      deliveryFee: calculateDeliveryFee(order.totalAmount),
    };
    this.bookings.set(booking.bookingId, booking);

    this.logger.log(`Partner booked successfully`, {
      sagaId: state.sagaId,
      bookingId: booking.bookingId,
      partnerId: booking.partnerId,
      correlationId: context.correlationId,
    });

    return SagaStepResults.success(SagaPayloads.json({ ...booking }), {
      bookingId: booking.bookingId,
      partnerId: booking.partnerId,
      deliveryFee: booking.deliveryFee,
    });
  }

  async compensate(state: SagaState, context: SagaCallContext): Promise<SagaStepResult> {
    const bookingId = state.getData('bookingId');
    if (typeof bookingId !== 'string') {
      this.logger.warn(`No booking data found for compensation`, {
        sagaId: state.sagaId,
        correlationId: context.correlationId,
      });
      return SagaStepResults.success();
    }

    this.bookings.delete(bookingId);
    this.logger.log(`Partner booking cancelled`, {
      sagaId: state.sagaId,
      bookingId,
      correlationId: context.correlationId,
    });

    return SagaStepResults.success(SagaPayloads.json({ bookingId, cancelled: true }));
  }

  getActiveBookings(): PartnerBooking[] {
    return Array.from(this.bookings.values());
  }

  private findOptimalPartner(itemCount: number): DeliveryPartner | undefined {
    return PARTNERS.filter(partner => partner.maxItems >= itemCount).sort((a, b) => b.rating - a.rating)[0];
  }
}
