export interface RetryOptions<T> {
  attempts: number;                           // Total tries, including the first
  delayMs: number;                            // Fixed wait between tries
  shouldRetry: (result: T) => boolean;        // true = result not ready yet
  onRetry?: (attempt: number) => void;        // Called before each wait
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wait for the given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call fn until shouldRetry() accepts its result or attempts run out.
 * Returns the last result either way; errors thrown by fn propagate at once.
 *
 * Meant for calls that depend on the remote service provisioning something
 * asynchronously (a fresh fork's branches, for example).
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions<T>): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const wait = options.sleep ?? sleep;

  let result = await fn();
  for (let attempt = 2; attempt <= attempts && options.shouldRetry(result); attempt++) {
    options.onRetry?.(attempt);
    await wait(options.delayMs);
    result = await fn();
  }

  return result;
}
