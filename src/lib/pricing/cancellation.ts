export class AnalysisCancelledError extends Error {
  constructor(message = 'Analysis cancelled') {
    super(message);
    this.name = 'AnalysisCancelledError';
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AnalysisCancelledError();
  }
}

/**
 * Run a task with its own AbortSignal and reject with TimeoutError once `ms`
 * elapses. The task's signal is aborted at the same moment, so fetch-based
 * tasks release their sockets.
 */
export async function withTimeout<T>(
  ms: number,
  label: string,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // settle first so the race reports the timeout, not the task's abort error
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
      controller.abort();
    }, ms);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Wait for a promise unless the caller's signal fires first. The underlying
 * work is not cancelled; only this caller stops waiting for it.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AnalysisCancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AnalysisCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
