import { CancellationError } from '../errors/app-error.js';

const neverAbortingSignals = new WeakSet<AbortSignal>();

/**
 * A signal whose controller is discarded on creation and therefore can
 * never fire.
 */
export function createNeverAbortSignal(): AbortSignal {
  const signal = new AbortController().signal;
  neverAbortingSignals.add(signal);
  return signal;
}

/** True when the signal is known never to fire. */
export function neverAborts(signal: AbortSignal): boolean {
  return neverAbortingSignals.has(signal);
}

export function throwIfAborted(signal: AbortSignal | null | undefined): void {
  if (!signal?.aborted) return;
  throw new CancellationError(signal.reason);
}

/**
 * Settles with `promise`, or rejects with a CancellationError as soon as
 * `signal` fires, whichever comes first.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | null | undefined
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    void promise.catch(() => undefined);
    return Promise.reject(new CancellationError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CancellationError(signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
