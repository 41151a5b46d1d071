import { Module } from '@nestjs/common';

import { OrderSagaService } from './order-saga.service';
import { BookPartnerStep } from './steps/book-partner.step';
import { ConfirmOrderStep } from './steps/confirm-order.step';
import { ReserveInventoryStep } from './steps/reserve-inventory.step';

@Module({
  providers: [OrderSagaService, ReserveInventoryStep, BookPartnerStep, ConfirmOrderStep],
  exports: [OrderSagaService],
})
export class OrderSagaModule {}
