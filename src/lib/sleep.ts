export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  return new Error(typeof reason === 'string' ? reason : 'aborted');
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Exponential delay for retry `attempt` (1-based), capped at `maxMs`, plus up to `jitterMs` of noise.
 */
export function backoff(attempt: number, baseMs = 500, maxMs = 15000, jitterMs = 250): number {
  const delay = Math.min(baseMs * Math.pow(2, Math.max(0, attempt - 1)), maxMs);
  return delay + Math.floor(Math.random() * jitterMs);
}
