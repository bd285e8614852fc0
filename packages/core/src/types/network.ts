/**
 * IP address and port of one end of a socket.
 */
export interface SocketAddress {
  ip: string;
  port: number;
}

/**
 * A connection as seen by the connection monitor.
 */
export interface ConnectionRecord {
  /** Local end; null when the platform does not report it. */
  localAddress: SocketAddress | null;

  /** Remote end; null for listening or unconnected sockets. */
  remoteAddress: SocketAddress | null;

  /** Socket state, e.g. `ESTABLISHED`, `LISTEN`; `NONE` for stateless sockets. */
  status: string;

  /** Owning process id, when visible to the current user. */
  processId: number | null;
}

export type AddressFamily = 'IPv4' | 'IPv6';

export type SocketType = 'stream' | 'dgram';

/**
 * A connection as returned by the snapshot accessor, including the raw socket
 * fields the monitors do not group on.
 */
export interface RawConnection extends ConnectionRecord {
  family: AddressFamily;
  type: SocketType;

  /** Protocol label reported by the platform (`tcp`, `tcp6`, `udp`, ...). */
  protocol: string;

  /** File descriptor, or null where the platform does not expose it. */
  descriptor: number | null;
}

/**
 * Cumulative counters for one network interface.
 *
 * All values are non-negative integers. Counters a platform does not report
 * are 0.
 */
export interface InterfaceStats {
  bytesSent: number;
  bytesRecv: number;
  packetsSent: number;
  packetsRecv: number;
  errorsIn: number;
  errorsOut: number;
  dropsIn: number;
  dropsOut: number;
}

/**
 * Interface counters as delivered by a snapshot source, before normalization.
 *
 * Every counter is optional; sources fill in what they can.
 */
export interface RawInterfaceCounters {
  name: string;
  bytesSent?: unknown;
  bytesRecv?: unknown;
  packetsSent?: unknown;
  packetsRecv?: unknown;
  errorsIn?: unknown;
  errorsOut?: unknown;
  dropsIn?: unknown;
  dropsOut?: unknown;
}

/**
 * Where the snapshot accessor reads OS state from.
 */
export interface NetworkSnapshotSource {
  interfaceCounters(): Promise<RawInterfaceCounters[]>;
  connections(): Promise<RawConnection[]>;
}
