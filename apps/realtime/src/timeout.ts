import { SendTimeoutError } from "./errors.js";

/**
 * Wrap a promise with a timeout.
 * Rejects with SendTimeoutError when the timer wins; the wrapped promise
 * is left to settle on its own.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  operation = "operation"
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new SendTimeoutError(operation, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
