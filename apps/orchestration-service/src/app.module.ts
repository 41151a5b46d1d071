import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { SagaModule, validateSagaEnvironment } from '@conductor/saga';

// Feature Modules
import { OrderSagaModule } from './saga/order-saga.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateSagaEnvironment,
    }),

    // Event Emitter
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),

    // Scheduling
    ScheduleModule.forRoot(),

    // Saga engine
    SagaModule.forRoot(),

    OrderSagaModule,
  ],
})
export class AppModule {}
