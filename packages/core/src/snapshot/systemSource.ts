import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';

import type {
  NetworkSnapshotSource,
  RawConnection,
  RawInterfaceCounters,
  SocketAddress,
} from '../types/network.js';

type SystemConnection = Pick<
  Systeminformation.NetworkConnectionsData,
  'protocol' | 'localAddress' | 'localPort' | 'peerAddress' | 'peerPort' | 'state' | 'pid'
>;

type SystemInterface = Pick<
  Systeminformation.NetworkStatsData,
  'iface' | 'rx_bytes' | 'rx_dropped' | 'rx_errors' | 'tx_bytes' | 'tx_dropped' | 'tx_errors'
>;

function toSocketAddress(ip: string, port: string): SocketAddress | null {
  const portNumber = Number(port);
  if (!ip || ip === '*' || !Number.isInteger(portNumber) || portNumber <= 0) return null;
  return { ip, port: portNumber };
}

/**
 * Map one `systeminformation` connection entry to a `RawConnection`.
 *
 * `systeminformation` does not report descriptors, so `descriptor` is null.
 * Stateless sockets (UDP) get the status `NONE`.
 */
export function fromSystemConnection(entry: SystemConnection): RawConnection {
  const protocol = entry.protocol.toLowerCase();
  return {
    localAddress: toSocketAddress(entry.localAddress, entry.localPort),
    remoteAddress: toSocketAddress(entry.peerAddress, entry.peerPort),
    status: entry.state ? entry.state.toUpperCase() : 'NONE',
    processId: Number.isInteger(entry.pid) && entry.pid > 0 ? entry.pid : null,
    family: protocol.endsWith('6') || entry.localAddress.includes(':') ? 'IPv6' : 'IPv4',
    type: protocol.startsWith('udp') ? 'dgram' : 'stream',
    protocol,
    descriptor: null,
  };
}

/**
 * Map one `systeminformation` interface entry to raw counters.
 *
 * Packet counts are not part of its output and are left for the normalizer to
 * default.
 */
export function fromSystemInterface(entry: SystemInterface): RawInterfaceCounters {
  return {
    name: entry.iface,
    bytesSent: entry.tx_bytes,
    bytesRecv: entry.rx_bytes,
    errorsIn: entry.rx_errors,
    errorsOut: entry.tx_errors,
    dropsIn: entry.rx_dropped,
    dropsOut: entry.tx_dropped,
  };
}

/**
 * Snapshot source backed by the `systeminformation` package.
 */
export const systemSnapshotSource: NetworkSnapshotSource = {
  async interfaceCounters(): Promise<RawInterfaceCounters[]> {
    const stats = await si.networkStats('*');
    return stats.map(fromSystemInterface);
  },

  async connections(): Promise<RawConnection[]> {
    const connections = await si.networkConnections();
    return connections.map(fromSystemConnection);
  },
};
