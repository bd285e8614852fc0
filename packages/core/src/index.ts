export * from './types/index.js';
export * from './errors.js';

export { TtlCache } from './utils/cache.js';
export { IntervalGate } from './utils/gate.js';
export { RollingWindow } from './utils/window.js';
export { daysBetween, formatDuration } from './utils/time.js';
export type { NowFn } from './utils/time.js';

export { createLogger, silentLogger } from './logging/logger.js';
export type { LoggerOptions } from './logging/logger.js';
export { withCallLogging, withTiming } from './logging/wrap.js';

export { tcpConnect } from './probes/tcp.js';
export { lookupIPv4 } from './probes/dns.js';
export type { HostResolver } from './probes/dns.js';
export { fetchPeerCertificate } from './probes/tls.js';

export { parseCertificate, parseDistinguishedName, UNKNOWN_FIELD } from './certificates/x509.js';
export { describeCertificate } from './certificates/info.js';

export { NetworkSnapshot, normalizeInterfaceStats } from './snapshot/NetworkSnapshot.js';
export { systemSnapshotSource } from './snapshot/systemSource.js';

export { ConnectionMonitor, groupByStatus } from './monitors/ConnectionMonitor.js';
export type { ConnectionMonitorOptions } from './monitors/ConnectionMonitor.js';
export { LatencyMonitor, summarizeLatencies } from './monitors/LatencyMonitor.js';
export type { LatencyMonitorOptions } from './monitors/LatencyMonitor.js';
export { DnsMonitor } from './monitors/DnsMonitor.js';
export type { DnsMonitorOptions } from './monitors/DnsMonitor.js';
export { CertificateMonitor } from './monitors/CertificateMonitor.js';
export type { CertificateMonitorOptions } from './monitors/CertificateMonitor.js';

export { readProcessMetrics } from './metrics/processMetrics.js';
export type { ProcessMetricsSources } from './metrics/processMetrics.js';
