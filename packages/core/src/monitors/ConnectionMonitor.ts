import type { ConnectionRecord, NetworkSnapshotSource, RawConnection } from '../types/network.js';
import type { DiagnosticsLogger } from '../types/logger.js';

import { silentLogger } from '../logging/logger.js';
import { systemSnapshotSource } from '../snapshot/systemSource.js';
import { IntervalGate } from '../utils/gate.js';
import { defaultNow, type NowFn } from '../utils/time.js';

const DEFAULT_REFRESH_INTERVAL_MS = 1_000;

export type ConnectionMonitorOptions = {
  /** Where connections are enumerated from. Defaults to `systeminformation`. */
  source?: NetworkSnapshotSource;

  /** Minimum time between two enumerations. Defaults to 1s. */
  refreshIntervalMs?: number;

  logger?: DiagnosticsLogger;
  now?: NowFn;
};

/**
 * Group connections by status, keeping enumeration order inside each group.
 */
export function groupByStatus(connections: readonly RawConnection[]): Map<string, ConnectionRecord[]> {
  const groups = new Map<string, ConnectionRecord[]>();
  for (const connection of connections) {
    const record: ConnectionRecord = {
      localAddress: connection.localAddress,
      remoteAddress: connection.remoteAddress,
      status: connection.status,
      processId: connection.processId,
    };
    const group = groups.get(connection.status);
    if (group) {
      group.push(record);
    } else {
      groups.set(connection.status, [record]);
    }
  }
  return groups;
}

/**
 * Serves grouped views of the open connections from a snapshot that is
 * re-enumerated at most once per refresh interval.
 *
 * Inside the interval the previous snapshot is served as is: the interval is
 * a rate limit on enumeration, not a freshness guarantee.
 */
export class ConnectionMonitor {
  private readonly source: NetworkSnapshotSource;
  private readonly logger: DiagnosticsLogger;
  private readonly now: NowFn;
  private readonly gate: IntervalGate;
  private snapshot = new Map<string, ConnectionRecord[]>();
  private pending: Promise<void> | undefined;

  constructor(options: ConnectionMonitorOptions = {}) {
    this.source = options.source ?? systemSnapshotSource;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? defaultNow;
    this.gate = new IntervalGate({
      intervalMs: options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
      now: this.now,
    });
  }

  /**
   * Re-enumerate connections unless the last refresh is within the interval.
   *
   * Concurrent callers share one enumeration. A failed enumeration rejects
   * and leaves the previous snapshot and timestamp untouched.
   */
  async refresh(): Promise<void> {
    if (this.pending) return await this.pending;
    if (!this.gate.isOpen()) return;

    this.pending = this.load().finally(() => {
      this.pending = undefined;
    });
    await this.pending;
  }

  /**
   * Number of connections per status.
   */
  async summary(): Promise<Record<string, number>> {
    await this.refresh();
    const summary: Record<string, number> = {};
    for (const [status, records] of this.snapshot) {
      summary[status] = records.length;
    }
    return summary;
  }

  /**
   * Connections in `status`, or an empty list for a status with none.
   */
  async byStatus(status: string): Promise<ConnectionRecord[]> {
    await this.refresh();
    return [...(this.snapshot.get(status) ?? [])];
  }

  /**
   * Status keys present in the current snapshot.
   */
  async statuses(): Promise<string[]> {
    await this.refresh();
    return [...this.snapshot.keys()];
  }

  private async load(): Promise<void> {
    const startedAt = this.now();
    const connections = await this.source.connections();
    this.snapshot = groupByStatus(connections);
    this.gate.mark(startedAt);
    this.logger.debug(`Refreshed connection snapshot: ${connections.length} connections`);
  }
}
