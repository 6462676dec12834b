//shardcore/core/time.ts

import { CancelledError } from "./errors";

/** setTimeout as a promise; rejects with CancelledError when the signal fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError(signal.reason));

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * A signal that fires when either `parent` fires or `ms` elapses.
 * Call `dispose()` once the guarded wait is over so the timer does not linger.
 */
export function deadlineSignal(
  ms: number,
  parent?: AbortSignal,
): { signal: AbortSignal; expired: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new CancelledError());
  }, Math.max(0, ms));

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    expired: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
