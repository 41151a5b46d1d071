import { JsonObject } from '@conductor/shared';

import { SagaStatus } from '../enums/saga-status.enum';
import { SagaEventType } from '../events/saga-event-types';

export interface SagaEvent {
  sagaId: string;
  sagaType: string;
  eventType: SagaEventType;
  data: JsonObject;
  timestamp: Date;
  correlationId?: string;
  metadata: {
    status: SagaStatus;
    currentStep: string;
    version: number;
  };
}

/**
 * Fire-and-forget sink for lifecycle events. Implementations log their own
 * failures; `publish` never rejects.
 */
export interface SagaEventPublisher {
  publish(event: SagaEvent): void;
}

export const SAGA_EVENT_PUBLISHER = Symbol('SAGA_EVENT_PUBLISHER');
