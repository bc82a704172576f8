import { CancelledError } from './errors';

export interface ScopedSignal {
  signal: AbortSignal;
  /** True once the deadline fired, as opposed to the caller aborting. */
  timedOut(): boolean;
  /** Restarts the deadline; streaming callers use it as an idle timer. */
  refresh(): void;
  dispose(): void;
}

/**
 * Combines a per-call deadline with the caller's signal, if any.
 * Always call `dispose()` once the request settles.
 */
export function scopedSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): ScopedSignal {
  const controller = new AbortController();
  let expired = false;

  const arm = () => {
    const handle = setTimeout(() => {
      expired = true;
      controller.abort();
    }, timeoutMs);
    handle.unref();
    return handle;
  };
  let timer = arm();

  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    refresh: () => {
      if (controller.signal.aborted) return;
      clearTimeout(timer);
      timer = arm();
    },
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** Resolves after `ms`, or rejects with `CancelledError` once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Cancelled while waiting to retry'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Cancelled while waiting to retry'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Turn cancelled by caller');
  }
}
