/**
 * Time helpers shared by the collector loop
 */

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Format a duration as whole minutes and seconds, e.g. 125.7s -> "2m 5s".
 * Negative or non-finite input formats as "0m 0s".
 */
export function formatMinutesSeconds(totalSeconds: number): string {
  const safe = Number.isFinite(totalSeconds) && totalSeconds > 0 ? totalSeconds : 0;
  const minutes = Math.floor(safe / 60);
  const seconds = Math.floor(safe % 60);
  return `${minutes}m ${seconds}s`;
}
