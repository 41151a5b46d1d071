import { SagaCancelledError } from '../errors/saga.errors';

/**
 * Per-call context threaded through every engine operation
 */
export interface SagaCallContext {
  signal?: AbortSignal;
  correlationId?: string;
  initiatedBy?: string;
}

export function throwIfCancelled(context: SagaCallContext | undefined, sagaId?: string): void {
  if (context?.signal?.aborted) {
    throw new SagaCancelledError(sagaId);
  }
}

/**
 * Resolves after `ms`, or rejects with SagaCancelledError when the signal fires first
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new SagaCancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SagaCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedAbortController {
  controller: AbortController;
  /** Detach from the parent signal once the child is no longer needed */
  unlink: () => void;
}

/**
 * Child controller that aborts with its parent but can also be aborted on its own
 */
export function linkAbortController(parent?: AbortSignal): LinkedAbortController {
  const controller = new AbortController();
  if (!parent) {
    return { controller, unlink: () => undefined };
  }
  if (parent.aborted) {
    controller.abort();
    return { controller, unlink: () => undefined };
  }

  const forward = () => controller.abort();
  parent.addEventListener('abort', forward, { once: true });
  return { controller, unlink: () => parent.removeEventListener('abort', forward) };
}

export interface DeadlineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  onTimeout: () => Error;
  onAbort: () => Error;
}

/**
 * Settle with `work`, or reject when the timeout elapses or the signal fires first
 */
export function withDeadline<T>(work: Promise<T>, options: DeadlineOptions): Promise<T> {
  const { timeoutMs, signal } = options;
  if (timeoutMs === undefined && !signal) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(options.onAbort());
    };

    work.then(
      value => {
        cleanup();
        resolve(value);
      },
      error => {
        cleanup();
        reject(error);
      },
    );

    if (signal?.aborted) {
      reject(options.onAbort());
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(options.onTimeout());
      }, timeoutMs);
    }
  });
}
