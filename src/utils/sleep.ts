/**
 * Abortable delay used between poll cycles
 */

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
