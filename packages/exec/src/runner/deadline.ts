import { TimeoutError } from '@benchkit/shared';

interface DeadlineScope {
  signal: AbortSignal;
  /** Rejects with the TimeoutError once the deadline passes */
  expired: Promise<never>;
  dispose(): void;
}

function openDeadline(timeoutMs: number, operation: string, parent?: AbortSignal): DeadlineScope {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, { timeoutMs });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  // Only the racing variant observes the rejection.
  expired.catch(() => undefined);

  return {
    signal: controller.signal,
    expired,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Runs `fn` with its own deadline.
 *
 * The signal handed to `fn` aborts (with a TimeoutError as its reason) when
 * the deadline passes or when `parent` aborts. The returned promise rejects
 * with the TimeoutError as soon as the deadline passes, even if `fn` ignores
 * the signal. Each call owns its timer, so deadlines nest and run side by side.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  const scope = openDeadline(timeoutMs, operation, parent);
  try {
    return await Promise.race([fn(scope.signal), scope.expired]);
  } finally {
    scope.dispose();
  }
}

/**
 * Runs `fn` with a deadline that only aborts its signal. The result is
 * whatever `fn` settles with, so work that commits side effects is never
 * reported as timed out while it is still running.
 */
export async function withSignalDeadline<T>(
  timeoutMs: number,
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  const scope = openDeadline(timeoutMs, operation, parent);
  try {
    return await fn(scope.signal);
  } finally {
    scope.dispose();
  }
}
