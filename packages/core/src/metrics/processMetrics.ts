import si from 'systeminformation';

import type { ProcessMetrics } from '../types/metrics.js';

import { formatDuration } from '../utils/time.js';

/**
 * Inputs for `readProcessMetrics`, overridable in tests.
 */
export type ProcessMetricsSources = {
  /** Resident set size in bytes. */
  residentBytes: () => number;

  /** System-wide CPU load in percent. */
  cpuLoad: () => Promise<number>;

  /** Process uptime in seconds. */
  uptime: () => number;
};

const defaultSources: ProcessMetricsSources = {
  residentBytes: () => process.memoryUsage().rss,
  cpuLoad: async () => (await si.currentLoad()).currentLoad,
  uptime: () => process.uptime(),
};

/**
 * Snapshot of this process's memory, CPU load and uptime.
 */
export async function readProcessMetrics(
  sources: ProcessMetricsSources = defaultSources,
): Promise<ProcessMetrics> {
  const uptimeSeconds = sources.uptime();
  return {
    memoryMb: sources.residentBytes() / 1024 / 1024,
    cpuPercent: await sources.cpuLoad(),
    uptimeSeconds,
    uptimeFriendly: formatDuration(uptimeSeconds),
  };
}
