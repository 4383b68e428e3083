import { CancellationError } from './errors.js';

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return reason === undefined ? 'aborted' : String(reason);
}

function cancellation(signal: AbortSignal, prefix: string): CancellationError {
  return new CancellationError(`${prefix}: ${abortReason(signal)}`, { cause: signal.reason });
}

export function throwIfAborted(signal: AbortSignal | undefined, prefix = 'search cancelled'): void {
  if (signal?.aborted) {
    throw cancellation(signal, prefix);
  }
}

/**
 * Resolves after `ms`, or rejects with a CancellationError as soon as the
 * signal aborts. The timer is cleared on abort so nothing stays scheduled.
 */
export function sleep(ms: number, signal?: AbortSignal, prefix = 'search cancelled'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, Math.max(0, ms));
      return;
    }
    if (signal.aborted) {
      reject(cancellation(signal, prefix));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(cancellation(signal, prefix));
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
