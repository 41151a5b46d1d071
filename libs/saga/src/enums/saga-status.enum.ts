export enum SagaStatus {
  NOT_STARTED = 'NotStarted',
  RUNNING = 'Running',
  COMPLETED = 'Completed',
  FAILED = 'Failed',
  COMPENSATING = 'Compensating',
  COMPENSATED = 'Compensated',
  SUSPENDED = 'Suspended',
  TIMED_OUT = 'TimedOut',
  ABORTED = 'Aborted',
}

export enum SagaStepStatus {
  PENDING = 'Pending',
  RUNNING = 'Running',
  COMPLETED = 'Completed',
  FAILED = 'Failed',
  SKIPPED = 'Skipped',
  COMPENSATING = 'Compensating',
  COMPENSATED = 'Compensated',
  COMPENSATION_FAILED = 'CompensationFailed',
}

export enum SagaStepAction {
  CONTINUE = 'Continue',
  COMPLETE = 'Complete',
  COMPENSATE = 'Compensate',
  SUSPEND = 'Suspend',
  ABORT = 'Abort',
  RETRY = 'Retry',
}

export enum SagaTimeoutAction {
  COMPENSATE = 'Compensate',
  ABORT = 'Abort',
  NONE = 'None',
}

export enum SagaPriority {
  LOW = 'Low',
  NORMAL = 'Normal',
  HIGH = 'High',
  CRITICAL = 'Critical',
}

export const TERMINAL_SAGA_STATUSES: ReadonlySet<SagaStatus> = new Set([
  SagaStatus.COMPLETED,
  SagaStatus.COMPENSATED,
  SagaStatus.ABORTED,
]);

export const TERMINAL_STEP_STATUSES: ReadonlySet<SagaStepStatus> = new Set([
  SagaStepStatus.COMPLETED,
  SagaStepStatus.FAILED,
  SagaStepStatus.SKIPPED,
  SagaStepStatus.COMPENSATED,
  SagaStepStatus.COMPENSATION_FAILED,
]);
