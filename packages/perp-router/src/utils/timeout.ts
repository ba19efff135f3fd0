/** Largest delay a Node timer honours; longer ones fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Raised when a bounded call does not settle in time
 */
export class TimeoutError extends Error {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `task` with an abort signal that fires after `timeoutMs`.
 * The returned promise rejects with TimeoutError when the time runs out,
 * whether or not the task honours the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    controller.abort();
    throw new TimeoutError(label, 0);
  }

  const delayMs = Math.min(timeoutMs, MAX_TIMER_DELAY_MS);
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(label, delayMs));
      controller.abort();
    }, delayMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
