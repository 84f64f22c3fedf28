export class CapabilityTimeout extends Error {
  override name = 'CapabilityTimeout' as const;

  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class CapabilityCancelled extends Error {
  override name = 'CapabilityCancelled' as const;

  constructor(readonly label: string) {
    super(`${label} was cancelled`);
  }
}

/**
 * Race `task` against a timer and the caller's `signal`. On expiry or
 * cancellation the task's signal is aborted and the returned promise rejects
 * with CapabilityTimeout or CapabilityCancelled.
 */
export function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CapabilityCancelled(label));
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CapabilityTimeout(label, timeoutMs));
    }, timeoutMs);
    if (signal) {
      onAbort = () => {
        controller.abort();
        reject(new CapabilityCancelled(label));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  return Promise.race([task(controller.signal), expired]).finally(() => {
    clearTimeout(timer);
    if (onAbort) signal?.removeEventListener('abort', onAbort);
  });
}
