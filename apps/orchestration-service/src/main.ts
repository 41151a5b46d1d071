import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SagaDiagnosticService, SagaMonitorService } from '@conductor/saga';
import { getErrorMessage, getErrorStack } from '@conductor/shared';

import { AppModule } from './app.module';
import { OrderSagaService } from './saga/order-saga.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: ['error', 'warn', 'log', 'debug', 'verbose'],
    });
    app.enableShutdownHooks();

    const configService = app.get(ConfigService);
    const environment = configService.get<string>('NODE_ENV', 'development');
    logger.log(`Orchestration service started (${environment})`);

    const orderSagaService = app.get(OrderSagaService);
    const saga = await orderSagaService.startOrderProcessingSaga({
      orderId: 'order-1001',
      customerId: 'customer-42',
      restaurantId: 'restaurant-7',
      items: [
        { itemId: 'item-1', name: 'Margherita', quantity: 2, unitPrice: 9.5 },
        { itemId: 'item-2', name: 'Lemonade', quantity: 1, unitPrice: 3 },
      ],
      deliveryLocation: { latitude: 30.0444, longitude: 31.2357, address: '12 Nile Street' },
      totalAmount: 22,
      maxDeliveryTimeMinutes: 45,
    });

    const monitor = app.get(SagaMonitorService);
    const diagnostics = app.get(SagaDiagnosticService);
    const report = await diagnostics.generateReport(saga.sagaId);
    const health = await monitor.getHealthReport();

    logger.log(`Sample saga finished as ${saga.status}`, { sagaId: saga.sagaId });
    logger.log(report.summary);
    logger.log(`Saga engine health: ${health.overallStatus}`, {
      totalSagas: health.totalSagasInWindow,
      activeSagas: health.activeSagaCount,
    });
  } catch (error) {
    logger.error(`Failed to start orchestration service: ${getErrorMessage(error)}`, getErrorStack(error));
    process.exit(1);
  }
}

void bootstrap();
