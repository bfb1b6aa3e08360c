/** Abort-signal plumbing shared by the model client and the cycle engine. */

export interface Deadline {
  /** Aborts when the parent aborts or the timeout elapses */
  signal: AbortSignal;
  /** True once the timeout (not the parent) caused the abort */
  timedOut(): boolean;
  /** Start the timeout over from now; a no-op once aborted */
  restart(): void;
  /** Stop the clock until the next restart */
  suspend(): void;
  /** Clears the timer and detaches from the parent */
  dispose(): void;
}

/**
 * Derive a signal that aborts on `parent` or after `timeoutMs`.
 * A non-positive or missing timeout means no deadline.
 */
export function createDeadline(parent: AbortSignal | undefined, timeoutMs: number | undefined): Deadline {
  const controller = new AbortController();
  let expired = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const suspend = () => {
    if (timer) clearTimeout(timer);
    timer = undefined;
  };
  const restart = () => {
    suspend();
    if (timeoutMs === undefined || timeoutMs <= 0 || controller.signal.aborted) return;
    timer = setTimeout(() => {
      expired = true;
      controller.abort(new Error(`deadline of ${timeoutMs}ms exceeded`));
    }, timeoutMs);
  };
  restart();

  return {
    signal: controller.signal,
    timedOut: () => expired,
    restart,
    suspend,
    dispose() {
      suspend();
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export class AbortedError extends Error {
  constructor(reason?: unknown) {
    super(reason instanceof Error ? reason.message : 'operation aborted');
    this.name = 'AbortedError';
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new AbortedError(signal.reason);
}

/** Resolve after `ms`, or reject with AbortedError as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
