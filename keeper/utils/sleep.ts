/**
 * Sleep for a given number of milliseconds
 *
 * @param ms - Milliseconds to sleep (clamped to 0 if negative)
 */
export function sleep(ms: number): Promise<void> {
  const sleepTime = Math.max(0, ms);
  return new Promise((resolve) => setTimeout(resolve, sleepTime));
}
