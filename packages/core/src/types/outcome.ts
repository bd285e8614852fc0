/**
 * Why a probe produced no data.
 *
 * - `timeout`: the connect or handshake did not finish in time
 * - `unreachable`: the TCP connection was refused, reset or unroutable
 * - `resolution-failed`: the hostname did not resolve
 * - `handshake-failed`: TLS negotiation or peer verification failed
 * - `parse-failed`: the peer certificate could not be decoded
 */
export type ProbeFailureReason =
  | 'timeout'
  | 'unreachable'
  | 'resolution-failed'
  | 'handshake-failed'
  | 'parse-failed';

/**
 * Result of a monitor operation that talks to the network.
 *
 * Expected failures are returned, not thrown, so callers can tell "no data"
 * apart from an unexpected error.
 */
export type ProbeOutcome<T> =
  | {
      ok: true;
      value: T;
      /** True when the value was served from the monitor's cache. */
      fromCache: boolean;
    }
  | {
      ok: false;
      reason: ProbeFailureReason;
      message: string;
    };

/**
 * Result of a rate-limited `track` call.
 *
 * `skipped` means the probe was not attempted because the shared track
 * interval had not elapsed.
 */
export type TrackOutcome =
  | { status: 'skipped' }
  | { status: 'recorded'; latency: number }
  | { status: 'failed'; reason: ProbeFailureReason; message: string };
