export type Clock = {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const err = new Error(typeof reason === 'string' ? reason : 'aborted');
  err.name = 'AbortError';
  return err;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const delayMs = Math.max(0, ms);
  if (!signal) {
    return new Promise<void>((resolve) => setTimeout(resolve, delayMs));
  }
  const guard: AbortSignal = signal;
  if (guard.aborted) {
    return Promise.reject(abortReason(guard));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(guard));
    };
    const timer = setTimeout(() => {
      guard.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);
    guard.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep
};

/**
 * Links a parent signal to a fresh controller that also aborts after `timeoutMs`.
 * Call `dispose` once the guarded work settles so the timer and listener are dropped.
 */
export function withTimeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; dispose: () => void; timedOut: () => boolean } {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, Math.max(0, timeoutMs));
  const onParentAbort = () => {
    if (parent) controller.abort(abortReason(parent));
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
    timedOut: () => expired
  };
}
