/**
 * Miscellaneous utility helpers.
 */

import { AbortedError, TimeoutError } from "../errors";

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const status = (err as { status: unknown }).status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Async retry with exponential backoff. Skips retry for 4xx errors.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  baseDelayMs = 1000,
): Promise<T> {
  let lastError: unknown = new Error("withRetry called with maxRetries < 1");

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      const status = statusOf(err);
      if (status && status >= 400 && status < 500) {
        throw err;
      }

      if (attempt === maxRetries - 1) {
        break;
      }

      const delay = baseDelayMs * Math.pow(2, attempt);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

/**
 * Race a promise against a timer. The timer is always cleared.
 * The underlying work is not cancelled; pass an AbortController to
 * `onTimeout` when it must stop committing.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  onTimeout?: () => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function throwIfAborted(
  signal: AbortSignal | undefined,
  stage: string,
): void {
  if (signal?.aborted) {
    throw new AbortedError(stage);
  }
}

/** Round to a fixed number of decimals, for stable scores in output */
export function round(value: number, decimals = 4): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
