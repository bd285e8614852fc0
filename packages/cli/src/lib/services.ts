import {
  CertificateMonitor,
  ConnectionMonitor,
  DnsMonitor,
  LatencyMonitor,
  NetworkSnapshot,
  readProcessMetrics,
  type DiagnosticsLogger,
  type ProcessMetrics,
} from '@netdiag/core';

import type { CliConfigFile } from './config.js';

/**
 * Everything a `diag` command talks to. Built once per invocation from the
 * merged config.
 */
export interface DiagServices {
  snapshot: NetworkSnapshot;
  connections: ConnectionMonitor;
  latency: LatencyMonitor;
  dns: DnsMonitor;

  /** Certificate monitor; verification is chosen per command (`--insecure`). */
  certificates(options: { verify: boolean }): CertificateMonitor;

  processMetrics(): Promise<ProcessMetrics>;
}

export type ServicesFactory = (config: CliConfigFile, logger: DiagnosticsLogger) => DiagServices;

/**
 * Production services backed by the OS and the network.
 */
export const createServices: ServicesFactory = (config, logger) => ({
  snapshot: new NetworkSnapshot(),
  connections: new ConnectionMonitor({ refreshIntervalMs: config.connectionIntervalMs, logger }),
  latency: new LatencyMonitor({
    timeoutMs: config.connectTimeoutMs,
    trackIntervalMs: config.latencyIntervalMs,
    logger,
  }),
  dns: new DnsMonitor({ ttlMs: config.dnsTtlMs, logger }),
  certificates: ({ verify }) =>
    new CertificateMonitor({
      ttlMs: config.certificateTtlMs,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      verify,
      logger,
    }),
  processMetrics: () => readProcessMetrics(),
});
