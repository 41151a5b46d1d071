import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { getErrorMessage } from '@conductor/shared';

import { SagaEvent, SagaEventPublisher } from '../interfaces/saga-event-publisher.interface';
import { sagaEventName } from './saga-event-types';

@Injectable()
export class EventEmitterSagaEventPublisher implements SagaEventPublisher {
  private readonly logger = new Logger(EventEmitterSagaEventPublisher.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  publish(event: SagaEvent): void {
    const eventName = sagaEventName(event.eventType);

    try {
      this.eventEmitter
        .emitAsync(eventName, event)
        .catch(error => this.logFailure(eventName, event, error));
    } catch (error) {
      this.logFailure(eventName, event, error);
    }
  }

  private logFailure(eventName: string, event: SagaEvent, error: unknown): void {
    this.logger.error(`Failed to publish saga event ${eventName}`, {
      sagaId: event.sagaId,
      sagaType: event.sagaType,
      correlationId: event.correlationId,
      error: getErrorMessage(error),
    });
  }
}
