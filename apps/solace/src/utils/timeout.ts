/**
 * Bounded remote calls
 */

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs` or when the
 * optional parent signal aborts. The returned promise settles on expiry or
 * parent abort even if the task ignores its signal: TimeoutError on expiry,
 * the parent's abort reason otherwise.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const cleanup: Array<() => void> = [];

  const expiry = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  const cancelled = new Promise<never>((_, reject) => {
    const source = parent;
    if (!source) return;
    const onAbort = () => {
      reject(source.reason);
      controller.abort(source.reason);
    };
    source.addEventListener('abort', onAbort, { once: true });
    cleanup.push(() => source.removeEventListener('abort', onAbort));
  });

  try {
    return await Promise.race([task(controller.signal), expiry, cancelled]);
  } finally {
    clearTimeout(timeoutId);
    cleanup.forEach((release) => release());
  }
}
