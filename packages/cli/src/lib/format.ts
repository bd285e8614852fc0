import type {
  CacheStats,
  CertificateInfo,
  ConnectionRecord,
  DistinguishedName,
  InterfaceStats,
  LatencyStats,
  ProcessMetrics,
  RawConnection,
  SocketAddress,
} from '@netdiag/core';

/**
 * `[ip, port]`, or null for an absent endpoint.
 */
export type AddressJson = [string, number] | null;

export type InterfaceStatsJson = {
  bytes_sent: number;
  bytes_recv: number;
  packets_sent: number;
  packets_recv: number;
  errin: number;
  errout: number;
  dropin: number;
  dropout: number;
};

export type ConnectionJson = {
  fd: number | null;
  family: string;
  type: string;
  local_addr: AddressJson;
  remote_addr: AddressJson;
  status: string;
  pid: number | null;
};

export type ConnectionRecordJson = {
  local: AddressJson;
  remote: AddressJson;
  pid: number | null;
};

export type NetworkMetricsDocument = {
  interfaces: Record<string, InterfaceStatsJson>;
  connections: ConnectionJson[];
};

export type LatencyDocument = {
  host: string;
  port: number;
  measurements: number[];
  stats: LatencyStats;
};

export type DnsDocument = {
  hostname: string;
  ip_addresses: string[];
  cache_stats: CacheStats;
};

export type NameJson = { common_name: string; organization: string };

export type CertificateJson = {
  subject: NameJson;
  issuer: NameJson;
  not_before: string;
  not_after: string;
  days_until_expiry: number;
  serial_number: string;
  version: string;
};

export type SslDocument = {
  hostname: string;
  port: number;
  certificate: CertificateJson;
  cache_stats: CacheStats;
};

export type MetricsDocument = {
  memory_usage: number;
  cpu_percent: number;
  uptime: number;
  uptime_friendly: string;
};

/**
 * Serialize a document the way every `--json` command prints it.
 */
export function toJson(document: unknown): string {
  return JSON.stringify(document, null, 2);
}

export function addressJson(address: SocketAddress | null): AddressJson {
  return address ? [address.ip, address.port] : null;
}

export function interfaceStatsJson(stats: InterfaceStats): InterfaceStatsJson {
  return {
    bytes_sent: stats.bytesSent,
    bytes_recv: stats.bytesRecv,
    packets_sent: stats.packetsSent,
    packets_recv: stats.packetsRecv,
    errin: stats.errorsIn,
    errout: stats.errorsOut,
    dropin: stats.dropsIn,
    dropout: stats.dropsOut,
  };
}

export function connectionJson(connection: RawConnection): ConnectionJson {
  return {
    fd: connection.descriptor,
    family: connection.family,
    type: connection.type,
    local_addr: addressJson(connection.localAddress),
    remote_addr: addressJson(connection.remoteAddress),
    status: connection.status,
    pid: connection.processId,
  };
}

export function connectionRecordJson(record: ConnectionRecord): ConnectionRecordJson {
  return {
    local: addressJson(record.localAddress),
    remote: addressJson(record.remoteAddress),
    pid: record.processId,
  };
}

export function networkMetricsDocument(
  interfaces: Record<string, InterfaceStats>,
  connections: readonly RawConnection[],
): NetworkMetricsDocument {
  return {
    interfaces: Object.fromEntries(
      Object.entries(interfaces).map(([name, stats]) => [name, interfaceStatsJson(stats)]),
    ),
    connections: connections.map(connectionJson),
  };
}

function nameJson(name: DistinguishedName): NameJson {
  return { common_name: name.commonName, organization: name.organization };
}

export function certificateJson(info: CertificateInfo): CertificateJson {
  return {
    subject: nameJson(info.subject),
    issuer: nameJson(info.issuer),
    not_before: info.notBefore,
    not_after: info.notAfter,
    days_until_expiry: info.daysUntilExpiry,
    serial_number: info.serialNumber,
    version: info.version,
  };
}

export function metricsDocument(metrics: ProcessMetrics): MetricsDocument {
  return {
    memory_usage: metrics.memoryMb,
    cpu_percent: metrics.cpuPercent,
    uptime: metrics.uptimeSeconds,
    uptime_friendly: metrics.uptimeFriendly,
  };
}

function formatAddress(address: AddressJson): string {
  if (!address) return '-';
  const [ip, port] = address;
  return ip.includes(':') ? `[${ip}]:${port}` : `${ip}:${port}`;
}

function seconds(value: number): string {
  return `${value.toFixed(3)}s`;
}

function keyValueLines(values: Record<string, string | number>): string[] {
  return Object.entries(values).map(([key, value]) => `  ${key}: ${value}`);
}

function cacheLines(stats: CacheStats): string[] {
  return ['Cache Statistics:', `  size: ${stats.size}`, `  entries: ${stats.entries}`];
}

export function renderNetworkMetrics(document: NetworkMetricsDocument): string {
  const lines = ['Network Interfaces:'];
  for (const [name, stats] of Object.entries(document.interfaces)) {
    lines.push('', `${name}:`, ...keyValueLines(stats));
  }
  lines.push('', 'Active Connections:');
  for (const connection of document.connections) {
    lines.push(
      `  ${connection.type} ${connection.family} ${formatAddress(connection.local_addr)} -> ` +
        `${formatAddress(connection.remote_addr)} ${connection.status} pid=${connection.pid ?? '-'}`,
    );
  }
  return lines.join('\n');
}

export function renderConnectionSummary(summary: Record<string, number>): string {
  return ['Connection Summary:', ...keyValueLines(summary)].join('\n');
}

export function renderConnectionList(status: string, records: readonly ConnectionRecordJson[]): string {
  const lines = [`Connections with status '${status}':`];
  for (const record of records) {
    lines.push(
      `  ${formatAddress(record.local)} -> ${formatAddress(record.remote)} pid=${record.pid ?? '-'}`,
    );
  }
  return lines.join('\n');
}

export function renderLatency(document: LatencyDocument): string {
  return [
    `Latency to ${document.host}:`,
    `  Min: ${seconds(document.stats.min)}`,
    `  Max: ${seconds(document.stats.max)}`,
    `  Avg: ${seconds(document.stats.avg)}`,
    '',
    'Measurements:',
    ...document.measurements.map((latency, i) => `  ${i + 1}: ${seconds(latency)}`),
  ].join('\n');
}

export function renderDns(document: DnsDocument): string {
  return [
    `DNS Resolution for ${document.hostname}:`,
    'IP Addresses:',
    ...document.ip_addresses.map((ip) => `  ${ip}`),
    '',
    ...cacheLines(document.cache_stats),
  ].join('\n');
}

export function renderSsl(document: SslDocument): string {
  const { certificate } = document;
  return [
    `SSL Certificate for ${document.hostname}:`,
    '',
    'Subject:',
    ...keyValueLines(certificate.subject),
    '',
    'Issuer:',
    ...keyValueLines(certificate.issuer),
    '',
    'Validity:',
    `  Not Before: ${certificate.not_before}`,
    `  Not After: ${certificate.not_after}`,
    `  Days Until Expiry: ${certificate.days_until_expiry}`,
    `  Serial Number: ${certificate.serial_number}`,
    `  Version: ${certificate.version}`,
    '',
    ...cacheLines(document.cache_stats),
  ].join('\n');
}

export function renderMetrics(document: MetricsDocument): string {
  return [
    'System Metrics:',
    `  memory_usage: ${document.memory_usage.toFixed(2)} MB`,
    `  cpu_percent: ${document.cpu_percent.toFixed(1)}%`,
    `  uptime: ${document.uptime.toFixed(2)}s`,
    `  uptime_friendly: ${document.uptime_friendly}`,
  ].join('\n');
}
