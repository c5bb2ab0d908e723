export type Deadline = {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
};

/**
 * A signal that aborts when `timeoutMs` elapses or when `parent` aborts, whichever comes first.
 * `timedOut()` tells the two apart afterwards. Call `dispose()` once the guarded work settles.
 */
export function withDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
