import { X509Certificate } from 'node:crypto';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  CertificateMonitor,
  ConnectError,
  ConnectionMonitor,
  DnsMonitor,
  LatencyMonitor,
  NetworkSnapshot,
  ResolutionError,
  type CertificateTarget,
  type DiagnosticsLogger,
  type NetworkSnapshotSource,
  type RawConnection,
} from '@netdiag/core';
import { ManualClock, createRecordingLogger } from '@netdiag/core/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CliConfigFile } from './config.js';
import { runCli, type ProgramOptions } from './program.js';
import type { DiagServices } from './services.js';

const leafDer = new X509Certificate(
  readFileSync(
    fileURLToPath(
      new URL('../../../core/src/certificates/fixtures/leaf-v3.pem', import.meta.url),
    ),
  ),
).raw;

const listening: RawConnection = {
  localAddress: { ip: '0.0.0.0', port: 22 },
  remoteAddress: null,
  status: 'LISTEN',
  processId: 812,
  family: 'IPv4',
  type: 'stream',
  protocol: 'tcp',
  descriptor: null,
};

type Fakes = {
  source: NetworkSnapshotSource;
  connector: (target: unknown) => Promise<void>;
  resolver: (hostname: string) => Promise<string[]>;
  fetcher: (target: CertificateTarget) => Promise<Buffer>;
};

function buildServices(fakes: Fakes) {
  const timer = new ManualClock();
  const clock = new ManualClock(Date.parse('2026-11-16T22:22:10.000Z'));

  return (_config: CliConfigFile, logger: DiagnosticsLogger): DiagServices => ({
    snapshot: new NetworkSnapshot(fakes.source),
    connections: new ConnectionMonitor({ source: fakes.source, logger }),
    latency: new LatencyMonitor({
      connector: async (target) => {
        await fakes.connector(target);
        timer.advance(20);
      },
      timer: timer.now,
      logger,
    }),
    dns: new DnsMonitor({ resolver: fakes.resolver, logger }),
    certificates: ({ verify }) =>
      new CertificateMonitor({ fetcher: fakes.fetcher, verify, logger, now: clock.now }),
    processMetrics: async () => ({
      memoryMb: 48,
      cpuPercent: 7.5,
      uptimeSeconds: 3.5,
      uptimeFriendly: '0:00:03',
    }),
  });
}

describe('runCli', () => {
  let cwd: string;
  let stdout: string;
  let stderr: string;
  let fakes: Fakes;
  let logger: ReturnType<typeof createRecordingLogger>;
  let loggerConfigs: CliConfigFile[];

  beforeEach(() => {
    cwd = mkdtempSync(path.join(os.tmpdir(), 'netdiag-cli-'));
    stdout = '';
    stderr = '';
    logger = createRecordingLogger();
    loggerConfigs = [];
    fakes = {
      source: {
        interfaceCounters: async () => [{ name: 'lo', bytesSent: 5, bytesRecv: 7 }],
        connections: async () => [listening],
      },
      connector: async () => undefined,
      resolver: async () => ['192.0.2.10'],
      fetcher: vi.fn(async (_target: CertificateTarget): Promise<Buffer> => leafDer),
    };
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  function run(...argv: string[]): Promise<number> {
    const services = buildServices(fakes);
    const options: ProgramOptions = {
      cwd,
      io: {
        stdout: (text) => {
          stdout += text;
        },
        stderr: (text) => {
          stderr += text;
        },
      },
      createLogger: (config) => {
        loggerConfigs.push(config);
        return logger;
      },
      createServices: (config) => services(config, logger),
    };
    return runCli(argv, options);
  }

  it('prints resolved addresses as JSON', async () => {
    expect(await run('network', 'dns', 'example.test', '--json')).toBe(0);

    expect(JSON.parse(stdout)).toEqual({
      hostname: 'example.test',
      ip_addresses: ['192.0.2.10'],
      cache_stats: { size: 1, entries: 1 },
    });
    expect(stderr).toBe('');
  });

  it('exits 1 with a targeted message when resolution fails', async () => {
    fakes.resolver = async (hostname) => {
      throw new ResolutionError(`${hostname}: ENOTFOUND`);
    };

    expect(await run('network', 'dns', 'missing.test')).toBe(1);
    expect(stdout).toBe('');
    expect(stderr).toBe('Failed to resolve missing.test\n');
  });

  it('measures latency the requested number of times', async () => {
    expect(await run('network', 'latency', 'example.test', '--count', '2', '--json')).toBe(0);

    expect(JSON.parse(stdout)).toEqual({
      host: 'example.test',
      port: 80,
      measurements: [0.02, 0.02],
      stats: { min: 0.02, max: 0.02, avg: 0.02 },
    });
  });

  it('exits 1 when a latency probe fails', async () => {
    fakes.connector = async () => {
      throw new ConnectError('Failed to connect to down.test:81: ECONNREFUSED');
    };

    expect(await run('network', 'latency', 'down.test', '--port', '81')).toBe(1);
    expect(stderr).toBe('Failed to measure latency to down.test\n');
  });

  it('rejects an out-of-range port as a usage error', async () => {
    expect(await run('network', 'latency', 'example.test', '--port', '70000')).toBe(2);
    expect(stderr).toContain('Port must be an integer between 1 and 65535.');
  });

  it('rejects an unknown command as a usage error', async () => {
    expect(await run('network', 'traceroute')).toBe(2);
  });

  it('summarizes connections by status', async () => {
    expect(await run('network', 'connections')).toBe(0);
    expect(stdout).toBe('Connection Summary:\n  LISTEN: 1\n');
  });

  it('lists connections in one status as JSON', async () => {
    expect(await run('network', 'connections', '--status', 'LISTEN', '--json')).toBe(0);
    expect(JSON.parse(stdout)).toEqual([{ local: ['0.0.0.0', 22], remote: null, pid: 812 }]);
  });

  it('reports interface counters and raw connections', async () => {
    expect(await run('network', 'metrics', '--json')).toBe(0);

    expect(JSON.parse(stdout)).toEqual({
      interfaces: {
        lo: {
          bytes_sent: 5,
          bytes_recv: 7,
          packets_sent: 0,
          packets_recv: 0,
          errin: 0,
          errout: 0,
          dropin: 0,
          dropout: 0,
        },
      },
      connections: [
        {
          fd: null,
          family: 'IPv4',
          type: 'stream',
          local_addr: ['0.0.0.0', 22],
          remote_addr: null,
          status: 'LISTEN',
          pid: 812,
        },
      ],
    });
  });

  it('prints "Error:" and exits 1 on unexpected failures', async () => {
    fakes.source = {
      interfaceCounters: async () => {
        throw new Error('permission denied');
      },
      connections: async () => [],
    };

    expect(await run('network', 'metrics')).toBe(1);
    expect(stderr).toBe('Error: permission denied\n');
  });

  it('checks a certificate without verification on a custom port', async () => {
    const code = await run(
      'network',
      'ssl',
      'service.fixture.test',
      '--port',
      '8443',
      '--insecure',
      '--json',
    );
    expect(code).toBe(0);

    expect(fakes.fetcher).toHaveBeenCalledWith({
      host: 'service.fixture.test',
      port: 8443,
      timeoutMs: 10_000,
      verify: false,
    });
    expect(JSON.parse(stdout)).toEqual({
      hostname: 'service.fixture.test',
      port: 8443,
      certificate: {
        subject: { common_name: 'service.fixture.test', organization: 'Unknown' },
        issuer: { common_name: 'Fixture Root CA', organization: 'Fixture Trust Services' },
        not_before: '2026-10-18T22:22:10.000Z',
        not_after: '2027-01-16T22:22:10.000Z',
        days_until_expiry: 61,
        serial_number: '2043453',
        version: 'v3',
      },
      cache_stats: { size: 1, entries: 1 },
    });
  });

  it('prints process metrics', async () => {
    expect(await run('metrics')).toBe(0);
    expect(stdout).toBe(
      'System Metrics:\n  memory_usage: 48.00 MB\n  cpu_percent: 7.5%\n  uptime: 3.50s\n  uptime_friendly: 0:00:03\n',
    );
  });

  it('turns on debug logging with --verbose and logs each monitor call', async () => {
    expect(await run('--verbose', 'network', 'dns', 'example.test')).toBe(0);

    expect(loggerConfigs).toEqual([{ logLevel: 'debug' }]);
    expect(logger.records[0]).toEqual({
      level: 'debug',
      message: 'Calling function: DnsMonitor.resolve',
      meta: [{ args: ['example.test'] }],
    });
  });

  it('reads the nearest config file', async () => {
    writeFileSync(path.join(cwd, '.netdiagrc.json'), JSON.stringify({ logLevel: 'warn' }));

    expect(await run('network', 'dns', 'example.test')).toBe(0);
    expect(loggerConfigs).toEqual([{ logLevel: 'warn' }]);
  });

  it('exits 1 on an invalid config file', async () => {
    writeFileSync(path.join(cwd, 'diag.json'), JSON.stringify({ logLevel: 'loud' }));

    expect(await run('--config', 'diag.json', 'metrics')).toBe(1);
    expect(stderr).toMatch(/^Error: Invalid config in .*diag\.json: logLevel: /);
  });

  it('appends log lines to the --log-file', async () => {
    fakes.resolver = async (hostname) => {
      throw new ResolutionError(`${hostname}: ENOTFOUND`);
    };
    const logFile = path.join(cwd, 'diag.log');
    const services = buildServices(fakes);

    const code = await runCli(['--log-file', logFile, 'network', 'dns', 'missing.test'], {
      cwd,
      io: { stdout: () => undefined, stderr: () => undefined },
      createServices: (config, logger) => services(config, logger),
    });

    expect(code).toBe(1);
    await vi.waitFor(
      () => {
        expect(readFileSync(logFile, 'utf8')).toContain(
          '[error] [netdiag] DNS resolution failed for missing.test: missing.test: ENOTFOUND',
        );
      },
      { timeout: 2_000 },
    );
  });
});
