/**
 * Millisecond clock. Injected into every stateful component so tests can
 * control time.
 */
export type NowFn = () => number;

export const defaultNow: NowFn = () => Date.now();

/**
 * High-resolution monotonic clock used to time probes.
 */
export const defaultTimer: NowFn = () => performance.now();

const MS_PER_DAY = 86_400_000;

/**
 * Whole days from `now` until `until`, rounded down.
 *
 * Negative once `until` is in the past, so a moment just after it already
 * counts as -1.
 */
export function daysBetween(now: number, until: number): number {
  return Math.floor((until - now) / MS_PER_DAY);
}

/**
 * Render a duration as `H:MM:SS`, prefixed with `N day, ` / `N days, ` past
 * 24 hours.
 */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(whole / 86_400);
  const hours = Math.floor((whole % 86_400) / 3_600);
  const minutes = Math.floor((whole % 3_600) / 60);
  const seconds = whole % 60;

  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
  if (days === 0) return clock;
  return `${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
}
