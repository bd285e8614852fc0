import type {
  InterfaceStats,
  NetworkSnapshotSource,
  RawConnection,
  RawInterfaceCounters,
} from '../types/network.js';

import { systemSnapshotSource } from './systemSource.js';

function counter(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

/**
 * Normalize raw interface counters. Each missing or invalid counter becomes 0
 * on its own; one bad field never zeroes the others.
 */
export function normalizeInterfaceStats(raw: RawInterfaceCounters): InterfaceStats {
  return {
    bytesSent: counter(raw.bytesSent),
    bytesRecv: counter(raw.bytesRecv),
    packetsSent: counter(raw.packetsSent),
    packetsRecv: counter(raw.packetsRecv),
    errorsIn: counter(raw.errorsIn),
    errorsOut: counter(raw.errorsOut),
    dropsIn: counter(raw.dropsIn),
    dropsOut: counter(raw.dropsOut),
  };
}

/**
 * Stateless accessor for the OS view of interfaces and open connections.
 *
 * No cache, no retries: every call queries the source, and source errors
 * propagate to the caller.
 */
export class NetworkSnapshot {
  private readonly source: NetworkSnapshotSource;

  constructor(source: NetworkSnapshotSource = systemSnapshotSource) {
    this.source = source;
  }

  /**
   * Counters per interface name.
   */
  async interfaceStats(): Promise<Record<string, InterfaceStats>> {
    const counters = await this.source.interfaceCounters();
    return Object.fromEntries(counters.map((raw) => [raw.name, normalizeInterfaceStats(raw)]));
  }

  /**
   * Every open connection, in enumeration order.
   */
  async connections(): Promise<RawConnection[]> {
    return await this.source.connections();
  }
}
