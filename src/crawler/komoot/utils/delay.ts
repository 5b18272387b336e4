/**
 * Delay helpers for backoff and polite pacing between page waves
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Creates a random delay between min and max milliseconds
 * @param min - Minimum delay in milliseconds
 * @param max - Maximum delay in milliseconds
 */
export function randomDelay(min: number, max: number): Promise<void> {
  const delay = Math.floor(Math.random() * (max - min + 1)) + min;
  return sleep(delay);
}

/**
 * Exponential backoff step: base * 2^(attempt - 1), attempt counted from 1
 */
export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * 2 ** (attempt - 1);
}
