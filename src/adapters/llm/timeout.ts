export interface ArmedTimeout {
  readonly signal: AbortSignal;
  /** True when the deadline fired (not when the caller aborted). */
  timedOut(): boolean;
  clear(): void;
}

/**
 * Abort controller that fires after `timeoutMs`, or as soon as the optional
 * parent signal aborts. Call `clear()` once the request settles.
 */
export function armTimeout(timeoutMs: number, parent?: AbortSignal): ArmedTimeout {
  const abortController = new AbortController();
  let fired = false;

  const timeoutId = setTimeout(() => {
    fired = true;
    abortController.abort();
  }, timeoutMs);

  const onParentAbort = () => abortController.abort();
  if (parent) {
    if (parent.aborted) {
      abortController.abort();
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    signal: abortController.signal,
    timedOut: () => fired,
    clear: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
