import type { ProbeFailureReason } from './types/outcome.js';

/**
 * Base error type for failures raised by `@netdiag/core`.
 *
 * This is used so callers can differentiate diagnostics problems from
 * programming errors.
 */
export class NetDiagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetDiagError';
  }
}

/**
 * Base type for the expected failures of a network probe.
 *
 * Monitors catch these (and only these) and turn them into a failed
 * `ProbeOutcome`.
 */
export abstract class ProbeError extends NetDiagError {
  abstract readonly reason: ProbeFailureReason;
}

/**
 * Thrown when a connect or handshake exceeds its timeout.
 */
export class ProbeTimeoutError extends ProbeError {
  readonly reason = 'timeout';

  constructor(target: string, timeoutMs: number) {
    super(`Connection to ${target} timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * Thrown when a TCP connection is refused, reset or unroutable.
 */
export class ConnectError extends ProbeError {
  readonly reason = 'unreachable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectError';
  }
}

/**
 * Thrown when a hostname cannot be resolved.
 */
export class ResolutionError extends ProbeError {
  readonly reason = 'resolution-failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

/**
 * Thrown when TLS negotiation or peer verification fails.
 */
export class HandshakeError extends ProbeError {
  readonly reason = 'handshake-failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandshakeError';
  }
}

/**
 * Thrown when a peer certificate cannot be decoded.
 */
export class CertificateParseError extends ProbeError {
  readonly reason = 'parse-failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CertificateParseError';
  }
}

/**
 * Thrown when a configuration file is unreadable or invalid.
 */
export class ConfigError extends NetDiagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Best-effort message extraction for values caught from `catch`.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
