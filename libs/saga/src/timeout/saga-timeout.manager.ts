import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import { getErrorMessage, parseISOString } from '@conductor/shared';

import { SAGA_OPTIONS, SagaOptions } from '../config/saga.config';
import { SagaCallContext } from '../context/saga-call-context';
import { SagaState } from '../entities/saga-state.entity';
import { SAGA_EVENT_PATTERNS } from '../events/saga-event-types';
import { SagaEvent } from '../interfaces/saga-event-publisher.interface';
import { SagaRegistry } from '../registry/saga-registry.service';

export interface ScheduledTimeout {
  sagaId: string;
  sagaType: string;
  deadline: Date;
}

export interface TimeoutScanResult {
  expired: number;
  handled: number;
  failed: number;
}

const TIMEOUT_INTERVAL_NAME = 'saga-timeout-check';

/**
 * Background scanner that times out sagas past their deadline. Deadlines come
 * from Started events and from a scan of every registered persistence backend.
 */
@Injectable()
export class SagaTimeoutManager implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SagaTimeoutManager.name);
  private readonly deadlines = new Map<string, ScheduledTimeout>();
  private currentScan?: Promise<TimeoutScanResult>;
  private stopped = true;

  constructor(
    private readonly registry: SagaRegistry,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(SAGA_OPTIONS) private readonly options: SagaOptions,
  ) {}

  onModuleInit() {
    this.start();
  }

  async onModuleDestroy() {
    await this.stop();
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;

    const interval = setInterval(() => {
      void this.runScheduledScan();
    }, this.options.timeoutCheckIntervalMs);
    this.schedulerRegistry.addInterval(TIMEOUT_INTERVAL_NAME, interval);

    this.logger.log(`Saga timeout manager started, checking every ${this.options.timeoutCheckIntervalMs}ms`);
  }

  /**
   * Stop scheduling scans; a scan already running is awaited
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    if (this.schedulerRegistry.doesExist('interval', TIMEOUT_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(TIMEOUT_INTERVAL_NAME);
    }
    if (this.currentScan) {
      await this.currentScan;
    }

    this.logger.log('Saga timeout manager stopped');
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  scheduleTimeout(state: SagaState): void {
    const deadline = state.timeoutAt;
    if (!deadline) {
      return;
    }
    this.deadlines.set(state.sagaId, { sagaId: state.sagaId, sagaType: state.sagaType, deadline });
  }

  cancelTimeout(sagaId: string): boolean {
    return this.deadlines.delete(sagaId);
  }

  getScheduledTimeouts(): ScheduledTimeout[] {
    return [...this.deadlines.values()];
  }

  @OnEvent(SAGA_EVENT_PATTERNS.STARTED)
  handleSagaStarted(event: SagaEvent): void {
    const timeoutAt = event.data.timeoutAt;
    if (typeof timeoutAt !== 'string') {
      return;
    }

    try {
      this.deadlines.set(event.sagaId, {
        sagaId: event.sagaId,
        sagaType: event.sagaType,
        deadline: parseISOString(timeoutAt),
      });
    } catch (error) {
      this.logger.warn(`Ignoring saga ${event.sagaId} with unreadable deadline`, {
        sagaId: event.sagaId,
        error: getErrorMessage(error),
      });
    }
  }

  @OnEvent(SAGA_EVENT_PATTERNS.COMPLETED)
  @OnEvent(SAGA_EVENT_PATTERNS.COMPENSATED)
  @OnEvent(SAGA_EVENT_PATTERNS.ABORTED)
  @OnEvent(SAGA_EVENT_PATTERNS.TIMED_OUT)
  handleSagaFinished(event: SagaEvent): void {
    this.deadlines.delete(event.sagaId);
  }

  /**
   * One scan over scheduled deadlines and persisted running sagas.
   * A scan already in progress is joined rather than duplicated.
   */
  checkTimeouts(now: Date = new Date(), context: SagaCallContext = {}): Promise<TimeoutScanResult> {
    if (!this.currentScan) {
      this.currentScan = this.scan(now, context).finally(() => {
        this.currentScan = undefined;
      });
    }
    return this.currentScan;
  }

  private async runScheduledScan(): Promise<void> {
    if (this.stopped || this.currentScan) {
      return;
    }

    try {
      const result = await this.checkTimeouts();
      if (result.expired > 0) {
        this.logger.log(`Timeout scan handled ${result.handled}/${result.expired} expired sagas`, { ...result });
      }
    } catch (error) {
      this.logger.error('Saga timeout scan failed', { error: getErrorMessage(error) });
    }
  }

  private async scan(now: Date, context: SagaCallContext): Promise<TimeoutScanResult> {
    const expired = new Map<string, string>();

    for (const scheduled of this.deadlines.values()) {
      if (scheduled.deadline <= now) {
        expired.set(scheduled.sagaId, scheduled.sagaType);
      }
    }

    for (const persistence of this.registry.getPersistences()) {
      try {
        for (const saga of await persistence.getTimedOutSagas(now, context)) {
          expired.set(saga.sagaId, saga.sagaType);
        }
      } catch (error) {
        this.logger.error('Failed to query timed out sagas', { error: getErrorMessage(error) });
      }
    }

    const result: TimeoutScanResult = { expired: expired.size, handled: 0, failed: 0 };

    for (const [sagaId, sagaType] of expired) {
      try {
        const orchestrator = this.registry.getOrchestrator(sagaType);
        const handled = await orchestrator.handleExpiredSaga(sagaId, context, now);
        if (handled) {
          result.handled++;
          this.logger.warn(`Saga ${sagaId} timed out`, {
            sagaId,
            sagaType,
            status: handled.status,
          });
        }
        this.deadlines.delete(sagaId);
      } catch (error) {
        result.failed++;
        this.logger.error(`Failed to handle timeout for saga ${sagaId}`, {
          sagaId,
          sagaType,
          error: getErrorMessage(error),
        });
      }
    }

    return result;
  }
}
