import { defaultNow, type NowFn } from './time.js';

/**
 * Configuration for an `IntervalGate` instance.
 */
type IntervalGateOptions = {
  /**
   * Minimum time between two passes, in milliseconds.
   *
   * If this is `0`, the gate is always open.
   */
  intervalMs: number;

  /**
   * Time source override used in tests.
   *
   * Defaults to `Date.now`.
   */
  now?: NowFn;
};

/**
 * Minimum-interval rate limiter.
 *
 * Unlike a TTL cache this says nothing about freshness; it only spaces out
 * executions of an expensive operation. One gate is shared by every caller of
 * the operation it guards.
 */
export class IntervalGate {
  private readonly intervalMs: number;
  private readonly now: NowFn;
  private lastPassAt = Number.NEGATIVE_INFINITY;

  constructor(options: IntervalGateOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.now = options.now ?? defaultNow;
  }

  /**
   * True when the interval has elapsed since the last recorded pass.
   */
  isOpen(): boolean {
    return this.now() - this.lastPassAt >= this.intervalMs;
  }

  /**
   * Record a pass at `at` (defaults to now).
   */
  mark(at: number = this.now()): void {
    this.lastPassAt = at;
  }

  /**
   * Check and claim the gate in one step.
   *
   * Returns false without side effects when the gate is closed. Claiming is
   * synchronous, so overlapping async callers cannot both pass.
   */
  tryPass(): boolean {
    const now = this.now();
    if (now - this.lastPassAt < this.intervalMs) return false;
    this.lastPassAt = now;
    return true;
  }
}
