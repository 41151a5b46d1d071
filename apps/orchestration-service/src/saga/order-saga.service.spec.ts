import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { Test, TestingModule } from '@nestjs/testing';
import {
  SagaModule,
  SagaMonitorService,
  SagaStatus,
  SagaStepStatus,
  SagaValidationError,
  validateSagaEnvironment,
} from '@conductor/saga';

import { ORDER_SAGA_STEPS, ORDER_SAGA_TYPE } from './order-saga.constants';
import { OrderSagaModule } from './order-saga.module';
import { OrderSagaService } from './order-saga.service';
import { ReserveInventoryStep } from './steps/reserve-inventory.step';

describe('OrderSagaService', () => {
  let moduleRef: TestingModule;
  let service: OrderSagaService;
  let inventory: ReserveInventoryStep;

  const order = {
    orderId: 'order-42',
    customerId: 'customer-123',
    restaurantId: 'restaurant-456',
    items: [{ itemId: 'item-1', name: 'Pizza Margherita', quantity: 2, unitPrice: 15 }],
    deliveryLocation: { latitude: 40.7128, longitude: -74.006, address: '123 Main St' },
    totalAmount: 30,
    maxDeliveryTimeMinutes: 45,
  };

  const flushEvents = () => new Promise(resolve => setImmediate(resolve));

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate: validateSagaEnvironment }),
        EventEmitterModule.forRoot({ wildcard: true, delimiter: '.' }),
        ScheduleModule.forRoot(),
        SagaModule.forRoot({ retry: { baseDelayMs: 0, jitterFactor: 0 } }),
        OrderSagaModule,
      ],
    }).compile();
    await moduleRef.init();

    service = moduleRef.get(OrderSagaService);
    inventory = moduleRef.get(ReserveInventoryStep);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('should run an order through every step', async () => {
    const saga = await service.startOrderProcessingSaga(order, { correlationId: 'corr-happy' });

    expect(saga.status).toBe(SagaStatus.COMPLETED);
    expect(saga.steps.map(step => step.status)).toEqual([
      SagaStepStatus.COMPLETED,
      SagaStepStatus.COMPLETED,
      SagaStepStatus.COMPLETED,
    ]);
    expect(saga.getData('confirmationCode')).toBe(`CONF-${saga.sagaId.slice(0, 8).toUpperCase()}`);
    expect(saga.getData('partnerId')).toBe('partner-express');
    expect(inventory.getActiveReservations()).toHaveLength(1);
  });

  it('should record the finished saga in the monitor', async () => {
    await service.startOrderProcessingSaga(order);
    await flushEvents();

    const monitor = moduleRef.get(SagaMonitorService);
    expect(monitor.getActiveSagaCount()).toBe(0);
    expect(monitor.getTypeMetrics(ORDER_SAGA_TYPE)?.completedCount).toBe(1);
  });

  it('should fail when inventory cannot be reserved', async () => {
    const saga = await service.startOrderProcessingSaga({
      ...order,
      items: [{ itemId: 'item-1', name: 'Pizza Margherita', quantity: 150, unitPrice: 15 }],
    });

    expect(saga.status).toBe(SagaStatus.FAILED);
    expect(saga.getData('failureReason')).toBe('Insufficient inventory for requested quantity');
    expect(saga.requireStep(ORDER_SAGA_STEPS.RESERVE_INVENTORY).retryCount).toBe(1);
    expect(saga.compensations).toEqual([]);
  });

  it('should release inventory when no partner can deliver in time', async () => {
    const saga = await service.startOrderProcessingSaga({ ...order, maxDeliveryTimeMinutes: 10 });

    expect(saga.status).toBe(SagaStatus.COMPENSATED);
    expect(saga.compensations).toHaveLength(1);
    expect(saga.compensations[0]).toMatchObject({
      stepName: ORDER_SAGA_STEPS.RESERVE_INVENTORY,
      action: 'ReleaseInventory',
      status: SagaStepStatus.COMPENSATED,
    });
    expect(saga.getData('compensationReason')).toBe('Estimated delivery of 24 minutes exceeds limit of 10');
    expect(inventory.getActiveReservations()).toEqual([]);
  });

  it('should hold an order for manual review and finish it once approved', async () => {
    const suspended = await service.startOrderProcessingSaga(order, { requireManualReview: true });

    expect(suspended.status).toBe(SagaStatus.SUSPENDED);
    expect(suspended.currentStep).toBe(ORDER_SAGA_STEPS.CONFIRM_ORDER);

    const resumed = await service.approveManualReview(suspended.sagaId);

    expect(resumed.status).toBe(SagaStatus.COMPLETED);
    expect(resumed.getData('confirmationCode')).toBe(`CONF-${suspended.sagaId.slice(0, 8).toUpperCase()}`);
  });

  it('should abort an order with a zero total', async () => {
    const saga = await service.startOrderProcessingSaga({ ...order, totalAmount: 0 });

    expect(saga.status).toBe(SagaStatus.ABORTED);
    expect(saga.getData('abortReason')).toBe('Order total must be positive, got 0');
  });

  it('should reject an invalid order before starting a saga', async () => {
    await expect(service.startOrderProcessingSaga({ ...order, items: [] })).rejects.toThrow(SagaValidationError);
  });

  it('should find sagas by correlation id', async () => {
    const saga = await service.startOrderProcessingSaga(order, { correlationId: 'corr-lookup' });

    const found = await service.getSagasByCorrelationId('corr-lookup');

    expect(found.map(state => state.sagaId)).toEqual([saga.sagaId]);
    expect(await service.getSaga('3f1c2b9a-5d4e-4f6a-8b7c-1d2e3f4a5b6c')).toBeUndefined();
  });
});
