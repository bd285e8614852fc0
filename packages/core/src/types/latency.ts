/**
 * Summary over a host's retained latency samples, in seconds.
 */
export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
}

/**
 * Target of a TCP connect probe.
 */
export interface ConnectTarget {
  host: string;
  port: number;
  timeoutMs: number;
}

/**
 * Opens a TCP connection and resolves once it is established.
 *
 * Implementations close the socket before resolving and reject with a
 * `ProbeTimeoutError` or `ConnectError` on failure.
 */
export type TcpConnector = (target: ConnectTarget) => Promise<void>;
