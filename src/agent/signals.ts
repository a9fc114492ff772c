/**
 * Abort-signal helpers shared by the client and the poll loop.
 */

export interface CombinedSignal {
  signal: AbortSignal;
  /** Detach from the source signals; call once the guarded work settles */
  dispose: () => void;
}

/**
 * Abort when any of the given signals aborts.
 */
export function combineSignals(...signals: AbortSignal[]): CombinedSignal {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  const dispose = (): void => {
    for (const detach of detachers.splice(0)) {
      detach();
    }
  };

  for (const signal of signals) {
    if (signal.aborted) {
      dispose();
      controller.abort(signal.reason);
      return { signal: controller.signal, dispose };
    }

    const onAbort = (): void => {
      dispose();
      controller.abort(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => signal.removeEventListener('abort', onAbort));
  }

  return { signal: controller.signal, dispose };
}

/**
 * Sleep for `ms`, waking early (without rejecting) when the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      resolve();
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
