import type { ConnectTarget, LatencyStats, TcpConnector } from '../types/latency.js';
import type { DiagnosticsLogger } from '../types/logger.js';
import type { ProbeOutcome, TrackOutcome } from '../types/outcome.js';

import { ProbeError } from '../errors.js';
import { silentLogger } from '../logging/logger.js';
import { tcpConnect } from '../probes/tcp.js';
import { IntervalGate } from '../utils/gate.js';
import { defaultNow, defaultTimer, type NowFn } from '../utils/time.js';
import { RollingWindow } from '../utils/window.js';

const DEFAULT_PORT = 80;
const DEFAULT_TIMEOUT_MS = 1_000;
const DEFAULT_TRACK_INTERVAL_MS = 5_000;
const DEFAULT_HISTORY_LIMIT = 100;

export type LatencyMonitorOptions = {
  /** Opens the probe connection. Defaults to a `node:net` connect. */
  connector?: TcpConnector;

  /** Default connect timeout for `measure`. Defaults to 1s. */
  timeoutMs?: number;

  /** Minimum time between two `track` probes, across all hosts. Defaults to 5s. */
  trackIntervalMs?: number;

  /** Samples retained per host. Defaults to 100. */
  historyLimit?: number;

  logger?: DiagnosticsLogger;

  /** Clock for the track rate limit. Defaults to `Date.now`. */
  now?: NowFn;

  /** Clock used to time a connect. Defaults to `performance.now`. */
  timer?: NowFn;
};

/**
 * Summarize latency samples. Undefined for an empty list.
 */
export function summarizeLatencies(samples: readonly number[]): LatencyStats | undefined {
  if (samples.length === 0) return undefined;

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let sum = 0;
  for (const sample of samples) {
    min = Math.min(min, sample);
    max = Math.max(max, sample);
    sum += sample;
  }
  return { min, max, avg: sum / samples.length };
}

/**
 * TCP connect latency probes, with a rate-limited rolling history per host.
 *
 * The `track` rate limit is one gate for the whole monitor, not one per host:
 * tracking host A also holds back an immediate `track` of host B.
 */
export class LatencyMonitor {
  private readonly connector: TcpConnector;
  private readonly timeoutMs: number;
  private readonly historyLimit: number;
  private readonly logger: DiagnosticsLogger;
  private readonly timer: NowFn;
  private readonly gate: IntervalGate;
  private readonly histories = new Map<string, RollingWindow<number>>();

  constructor(options: LatencyMonitorOptions = {}) {
    this.connector = options.connector ?? tcpConnect;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.logger = options.logger ?? silentLogger;
    this.timer = options.timer ?? defaultTimer;
    this.gate = new IntervalGate({
      intervalMs: options.trackIntervalMs ?? DEFAULT_TRACK_INTERVAL_MS,
      now: options.now ?? defaultNow,
    });
  }

  /**
   * Time one TCP connect to `host:port`, in seconds.
   *
   * Timeouts and connection errors are expected outcomes: they are logged at
   * warn level and returned as a failed outcome. Anything else is rethrown.
   */
  async measure(
    host: string,
    port = DEFAULT_PORT,
    timeoutMs = this.timeoutMs,
  ): Promise<ProbeOutcome<number>> {
    const target: ConnectTarget = { host, port, timeoutMs };
    const startedAt = this.timer();

    try {
      await this.connector(target);
    } catch (error) {
      if (!(error instanceof ProbeError)) throw error;
      this.logger.warn(`Failed to measure latency to ${host}: ${error.message}`);
      return { ok: false, reason: error.reason, message: error.message };
    }

    const latency = Math.max(0, (this.timer() - startedAt) / 1000);
    return { ok: true, value: latency, fromCache: false };
  }

  /**
   * Measure `count` times in sequence, stopping at the first failure.
   *
   * Samples are not added to the tracked history.
   */
  async measureSeries(
    host: string,
    port = DEFAULT_PORT,
    count = 5,
    timeoutMs = this.timeoutMs,
  ): Promise<ProbeOutcome<number[]>> {
    const latencies: number[] = [];
    for (let i = 0; i < count; i++) {
      const outcome = await this.measure(host, port, timeoutMs);
      if (!outcome.ok) return outcome;
      latencies.push(outcome.value);
    }
    return { ok: true, value: latencies, fromCache: false };
  }

  /**
   * Rate-limited measurement that appends to `host`'s history.
   *
   * Inside the track interval (counted from the previous `track` of any host)
   * nothing is attempted. Otherwise the interval restarts whether or not the
   * probe succeeds, and only a success is recorded.
   */
  async track(host: string, port = DEFAULT_PORT): Promise<TrackOutcome> {
    if (!this.gate.tryPass()) {
      this.logger.debug(`Skipping latency measurement for ${host}: within track interval`);
      return { status: 'skipped' };
    }

    const outcome = await this.measure(host, port);
    if (!outcome.ok) {
      this.logger.debug(`No latency measurement recorded for ${host}`);
      return { status: 'failed', reason: outcome.reason, message: outcome.message };
    }

    this.historyFor(host).push(outcome.value);
    this.logger.debug(`Added latency ${outcome.value} for ${host}`);
    return { status: 'recorded', latency: outcome.value };
  }

  /**
   * min/max/avg over every retained sample for `host`; undefined before the
   * first recorded sample.
   */
  stats(host: string): LatencyStats | undefined {
    return summarizeLatencies(this.history(host));
  }

  /**
   * Retained samples for `host`, oldest first.
   */
  history(host: string): readonly number[] {
    return this.histories.get(host)?.toArray() ?? [];
  }

  /**
   * Hosts with at least one recorded sample.
   */
  hosts(): string[] {
    return [...this.histories.keys()];
  }

  private historyFor(host: string): RollingWindow<number> {
    let rolling = this.histories.get(host);
    if (!rolling) {
      rolling = new RollingWindow<number>(this.historyLimit);
      this.histories.set(host, rolling);
    }
    return rolling;
  }
}
