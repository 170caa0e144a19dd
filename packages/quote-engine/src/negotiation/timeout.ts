import { QuoteEngineError, QuoteErrorCode } from '../errors.js';

/**
 * Run `task` with an abort signal that fires after `timeoutMs`. Rejects with
 * DECISION_CLIENT_UNAVAILABLE on timeout, whether or not the task honours the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new QuoteEngineError(
          QuoteErrorCode.DECISION_CLIENT_UNAVAILABLE,
          `Decision client did not answer within ${timeoutMs}ms`,
          { timeout_ms: timeoutMs },
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
