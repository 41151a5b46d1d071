export const SagaEventTypes = {
  STARTED: 'Started',
  STEP_STARTED: 'StepStarted',
  STEP_COMPLETED: 'StepCompleted',
  STEP_FAILED: 'StepFailed',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
  COMPENSATING: 'Compensating',
  COMPENSATED: 'Compensated',
  SUSPENDED: 'Suspended',
  RESUMED: 'Resumed',
  TIMED_OUT: 'TimedOut',
  ABORTED: 'Aborted',
  STUCK: 'Stuck',
} as const;

export type SagaEventType = (typeof SagaEventTypes)[keyof typeof SagaEventTypes];

/** Emitter channel prefix; events go out as `saga.<EventType>` */
export const SAGA_EVENT_PREFIX = 'saga';

export function sagaEventName(eventType: SagaEventType): string {
  return `${SAGA_EVENT_PREFIX}.${eventType}`;
}

export const SAGA_EVENT_PATTERNS = {
  ALL: `${SAGA_EVENT_PREFIX}.*`,
  STARTED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.STARTED}`,
  STEP_STARTED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.STEP_STARTED}`,
  STEP_COMPLETED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.STEP_COMPLETED}`,
  STEP_FAILED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.STEP_FAILED}`,
  COMPLETED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.COMPLETED}`,
  FAILED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.FAILED}`,
  COMPENSATED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.COMPENSATED}`,
  TIMED_OUT: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.TIMED_OUT}`,
  ABORTED: `${SAGA_EVENT_PREFIX}.${SagaEventTypes.ABORTED}`,
} as const;
