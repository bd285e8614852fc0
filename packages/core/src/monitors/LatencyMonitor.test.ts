import { describe, expect, it, vi } from 'vitest';

import type { ConnectTarget, TcpConnector } from '../types/latency.js';

import { ConnectError, ProbeTimeoutError } from '../errors.js';
import { ManualClock, createRecordingLogger } from '../testing/fakes.js';

import { LatencyMonitor, summarizeLatencies } from './LatencyMonitor.js';

/**
 * Connector whose n-th call "takes" `durationsMs[n]` on the given timer.
 */
function timedConnector(timer: ManualClock, durationsMs: readonly number[]) {
  let calls = 0;
  return vi.fn(async (_target: ConnectTarget): Promise<void> => {
    const duration = durationsMs[calls % durationsMs.length] ?? 0;
    calls += 1;
    timer.advance(duration);
  });
}

function setup(connector: TcpConnector, timer = new ManualClock()) {
  const clock = new ManualClock();
  const logger = createRecordingLogger();
  const monitor = new LatencyMonitor({ connector, logger, now: clock.now, timer: timer.now });
  return { monitor, clock, logger };
}

describe('summarizeLatencies', () => {
  it('computes min, max and mean', () => {
    const stats = summarizeLatencies([0.1, 0.2, 0.3]);
    expect(stats?.min).toBe(0.1);
    expect(stats?.max).toBe(0.3);
    expect(stats?.avg).toBeCloseTo(0.2, 10);
  });

  it('is undefined without samples', () => {
    expect(summarizeLatencies([])).toBeUndefined();
  });
});

describe('LatencyMonitor.measure', () => {
  it('returns the connect time in seconds', async () => {
    const timer = new ManualClock();
    const connector = timedConnector(timer, [120]);
    const { monitor } = setup(connector, timer);

    expect(await monitor.measure('example.test', 443)).toEqual({
      ok: true,
      value: 0.12,
      fromCache: false,
    });
    expect(connector).toHaveBeenCalledWith({ host: 'example.test', port: 443, timeoutMs: 1_000 });
  });

  it('passes an explicit timeout to the connector', async () => {
    const timer = new ManualClock();
    const connector = timedConnector(timer, [5]);
    const { monitor } = setup(connector, timer);

    await monitor.measure('example.test', 80, 250);
    expect(connector).toHaveBeenCalledWith({ host: 'example.test', port: 80, timeoutMs: 250 });
  });

  it('reports a timeout as a failed outcome and logs a warning', async () => {
    const { monitor, logger } = setup(async ({ host, port, timeoutMs }) => {
      throw new ProbeTimeoutError(`${host}:${port}`, timeoutMs);
    });

    expect(await monitor.measure('slow.test')).toEqual({
      ok: false,
      reason: 'timeout',
      message: 'Connection to slow.test:80 timed out after 1000ms',
    });
    expect(logger.records).toEqual([
      {
        level: 'warn',
        message:
          'Failed to measure latency to slow.test: Connection to slow.test:80 timed out after 1000ms',
        meta: [],
      },
    ]);
  });

  it('reports a refused connection as unreachable', async () => {
    const { monitor } = setup(async () => {
      throw new ConnectError('Failed to connect to closed.test:81: connect ECONNREFUSED');
    });

    const outcome = await monitor.measure('closed.test', 81);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.reason).toBe('unreachable');
  });

  it('rethrows unexpected errors', async () => {
    const { monitor } = setup(async () => {
      throw new TypeError('bad port');
    });

    await expect(monitor.measure('example.test')).rejects.toThrow(TypeError);
  });
});

describe('LatencyMonitor.measureSeries', () => {
  it('collects the requested number of measurements', async () => {
    const timer = new ManualClock();
    const { monitor } = setup(timedConnector(timer, [10, 20, 30]), timer);

    expect(await monitor.measureSeries('example.test', 80, 3)).toEqual({
      ok: true,
      value: [0.01, 0.02, 0.03],
      fromCache: false,
    });
    expect(monitor.history('example.test')).toEqual([]);
  });

  it('stops at the first failure', async () => {
    let calls = 0;
    const connector = vi.fn(async (): Promise<void> => {
      calls += 1;
      if (calls === 2) throw new ConnectError('reset');
    });
    const { monitor } = setup(connector);

    const outcome = await monitor.measureSeries('example.test', 80, 5);
    expect(outcome).toEqual({ ok: false, reason: 'unreachable', message: 'reset' });
    expect(connector).toHaveBeenCalledTimes(2);
  });
});

describe('LatencyMonitor.track', () => {
  it('skips a second call inside the interval and records again after it', async () => {
    const timer = new ManualClock();
    const { monitor, clock } = setup(timedConnector(timer, [40]), timer);

    expect(await monitor.track('example.test')).toEqual({ status: 'recorded', latency: 0.04 });
    clock.advance(4_999);
    expect(await monitor.track('example.test')).toEqual({ status: 'skipped' });
    expect(monitor.history('example.test')).toHaveLength(1);

    clock.advance(1);
    expect(await monitor.track('example.test')).toEqual({ status: 'recorded', latency: 0.04 });
    expect(monitor.history('example.test')).toHaveLength(2);
  });

  it('throttles across hosts with one shared interval', async () => {
    const timer = new ManualClock();
    const connector = timedConnector(timer, [40]);
    const { monitor } = setup(connector, timer);

    await monitor.track('a.test');
    expect(await monitor.track('b.test')).toEqual({ status: 'skipped' });
    expect(connector).toHaveBeenCalledTimes(1);
    expect(monitor.hosts()).toEqual(['a.test']);
  });

  it('restarts the interval after a failed probe without recording', async () => {
    const { monitor } = setup(async () => {
      throw new ConnectError('unreachable');
    });

    expect(await monitor.track('down.test')).toEqual({
      status: 'failed',
      reason: 'unreachable',
      message: 'unreachable',
    });
    expect(await monitor.track('down.test')).toEqual({ status: 'skipped' });
    expect(monitor.history('down.test')).toEqual([]);
    expect(monitor.stats('down.test')).toBeUndefined();
  });

  it('does not let overlapping calls both probe', async () => {
    const timer = new ManualClock();
    const connector = timedConnector(timer, [40]);
    const { monitor } = setup(connector, timer);

    const outcomes = await Promise.all([monitor.track('a.test'), monitor.track('a.test')]);
    expect(outcomes).toEqual([{ status: 'recorded', latency: 0.04 }, { status: 'skipped' }]);
    expect(connector).toHaveBeenCalledTimes(1);
  });

  it('keeps only the most recent 100 samples in order', async () => {
    const timer = new ManualClock();
    const durations = Array.from({ length: 150 }, (_, i) => i + 1);
    const { monitor, clock } = setup(timedConnector(timer, durations), timer);

    for (let i = 0; i < 150; i++) {
      clock.advance(5_000);
      await monitor.track('example.test');
    }

    const history = monitor.history('example.test');
    expect(history).toHaveLength(100);
    expect(history).toEqual(Array.from({ length: 100 }, (_, i) => (51 + i) / 1000));
  });

  it('computes stats over the full retained history', async () => {
    const timer = new ManualClock();
    const { monitor, clock } = setup(timedConnector(timer, [100, 200, 300]), timer);

    for (let i = 0; i < 3; i++) {
      await monitor.track('example.test');
      clock.advance(5_000);
    }

    const stats = monitor.stats('example.test');
    expect(stats?.min).toBe(0.1);
    expect(stats?.max).toBe(0.3);
    expect(stats?.avg).toBeCloseTo(0.2, 10);
  });

  it('honours a custom history limit and interval', async () => {
    const timer = new ManualClock();
    const clock = new ManualClock();
    const monitor = new LatencyMonitor({
      connector: timedConnector(timer, [1, 2, 3]),
      now: clock.now,
      timer: timer.now,
      historyLimit: 2,
      trackIntervalMs: 10,
    });

    for (let i = 0; i < 3; i++) {
      await monitor.track('example.test');
      clock.advance(10);
    }

    expect(monitor.history('example.test')).toEqual([0.002, 0.003]);
  });
});
