import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { SAGA_OPTIONS, SagaOptionsOverrides, buildSagaOptions } from './config/saga.config';
import { SagaDiagnosticService } from './diagnostics/saga-diagnostic.service';
import { EventEmitterSagaEventPublisher } from './events/event-emitter-saga-event.publisher';
import { SAGA_EVENT_PUBLISHER } from './interfaces/saga-event-publisher.interface';
import { SagaMonitorService } from './monitoring/saga-monitor.service';
import { SagaRegistry } from './registry/saga-registry.service';
import { SagaTimeoutManager } from './timeout/saga-timeout.manager';

/**
 * Saga engine wiring. Expects ConfigModule (global), EventEmitterModule and
 * ScheduleModule to be registered by the importing application.
 */
@Module({})
export class SagaModule {
  static forRoot(overrides: SagaOptionsOverrides = {}): DynamicModule {
    return {
      module: SagaModule,
      global: true,
      providers: [
        {
          provide: SAGA_OPTIONS,
          useFactory: (configService: ConfigService) => buildSagaOptions(configService, overrides),
          inject: [ConfigService],
        },
        {
          provide: SAGA_EVENT_PUBLISHER,
          useClass: EventEmitterSagaEventPublisher,
        },
        SagaRegistry,
        SagaTimeoutManager,
        SagaMonitorService,
        SagaDiagnosticService,
      ],
      exports: [
        SAGA_OPTIONS,
        SAGA_EVENT_PUBLISHER,
        SagaRegistry,
        SagaTimeoutManager,
        SagaMonitorService,
        SagaDiagnosticService,
      ],
    };
  }
}
