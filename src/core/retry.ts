import { logger } from "./logger";
import { OperationCancelledError } from "./errors";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 10000,
    jitterMs: 500,
  },
  context?: string
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterMs } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts) break;

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const jitter = Math.random() * jitterMs;
      const totalDelay = delay + jitter;

      logger.debug({ attempt, delay: totalDelay, context }, "Retrying after error");
      await sleep(totalDelay);
    }
  }

  throw lastError;
}

export function throwIfAborted(signal: AbortSignal | undefined, context: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(`${context} was cancelled`, cancelCode(signal));
  }
}

function cancelCode(signal: AbortSignal): string {
  return signal.reason instanceof OperationCancelledError ? signal.reason.code : "CANCELLED";
}

/**
 * Sleeps for `ms`, rejecting early with OperationCancelledError if the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new OperationCancelledError("Wait was cancelled", cancelCode(signal)));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError("Wait was cancelled", cancelCode(signal)));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export interface OperationScope {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Combines the caller's signal with a global operation timeout. Expiry only
 * aborts the signal; whoever holds it stops at the next boundary it checks.
 */
export function createOperationScope(
  parent: AbortSignal | undefined,
  timeoutMs: number | undefined,
  context: string,
): OperationScope {
  const controller = new AbortController();

  const onParentAbort = () => {
    controller.abort(new OperationCancelledError(`${context} was cancelled by the caller`, "CANCELLED"));
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => {
          controller.abort(
            new OperationCancelledError(`${context} exceeded its ${timeoutMs}ms timeout`, "OPERATION_TIMEOUT"),
          );
        }, timeoutMs)
      : null;

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
