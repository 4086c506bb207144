export interface DeadlineOptions {
  timeoutMs: number;
  /** aborting the parent aborts the task with the parent's reason */
  signal?: AbortSignal;
  /** rejection value once the time is up */
  onTimeout: () => Error;
}

/**
 * Runs `task` with its own AbortSignal and settles no later than `timeoutMs`,
 * whether or not the task honours the signal.
 */
export async function withDeadline<T>(task: (signal: AbortSignal) => Promise<T>, opts: DeadlineOptions): Promise<T> {
  // an already-aborted parent never starts the task
  opts.signal?.throwIfAborted();
  const ac = new AbortController();
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(ac.signal.reason);
    ac.signal.addEventListener("abort", onAbort, { once: true });
  });
  const parent = opts.signal;
  const onParentAbort = () => ac.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });
  const timer = setTimeout(() => ac.abort(opts.onTimeout()), opts.timeoutMs);

  try {
    return await Promise.race([task(ac.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
    if (onAbort) ac.signal.removeEventListener("abort", onAbort);
  }
}
