import path from 'node:path';

import {
  NetDiagError,
  createLogger,
  errorMessage,
  summarizeLatencies,
  withCallLogging,
  withTiming,
  type DiagnosticsLogger,
} from '@netdiag/core';
import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { findConfigFile, loadConfigFile, mergeConfig, type CliConfigFile } from './config.js';
import {
  certificateJson,
  connectionRecordJson,
  metricsDocument,
  networkMetricsDocument,
  renderConnectionList,
  renderConnectionSummary,
  renderDns,
  renderLatency,
  renderMetrics,
  renderNetworkMetrics,
  renderSsl,
  toJson,
  type DnsDocument,
  type LatencyDocument,
  type SslDocument,
} from './format.js';
import { createServices, type DiagServices, type ServicesFactory } from './services.js';

/** Exit code for invalid usage (unknown command, bad option value). */
export const USAGE_EXIT_CODE = 2;

/**
 * A command ran but its probe failed; the message is printed as is.
 */
export class CommandFailedError extends NetDiagError {
  constructor(message: string) {
    super(message);
    this.name = 'CommandFailedError';
  }
}

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

/**
 * Progress indicator shown while a slow probe runs.
 */
export type Spinner = {
  stop(): void;
};

export type ProgramOptions = {
  io?: CliIO;

  /** Directory the config search starts from. Defaults to `process.cwd()`. */
  cwd?: string;

  createServices?: ServicesFactory;

  createLogger?: (config: CliConfigFile) => DiagnosticsLogger;

  /** Starts a spinner for slow text-mode commands; omit for none. */
  startSpinner?: (text: string) => Spinner | null;
};

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  logFile?: string;
};

type JsonOption = { json?: boolean };

type Context = {
  logger: DiagnosticsLogger;
  services: DiagServices;
  json: boolean;
};

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function integerOption(label: string, min: number, max = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`${label} must be an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

const parsePort = integerOption('Port', 1, 65_535);
const parseCount = integerOption('Count', 1);
const parseTimeout = integerOption('Timeout', 1);

/**
 * Log arguments and result at debug, and the duration at info, around `fn`.
 */
function instrument<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => Promise<R>,
  logger: DiagnosticsLogger,
): (...args: A) => Promise<R> {
  return withTiming(name, withCallLogging(name, fn, logger), logger);
}

/**
 * Build the `diag` program. Output goes through `options.io`; nothing here
 * calls `process.exit`.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? processIO;
  const cwd = options.cwd ?? process.cwd();
  const servicesFactory = options.createServices ?? createServices;
  const loggerFactory =
    options.createLogger ??
    ((config: CliConfigFile) => createLogger({ level: config.logLevel, file: config.logFile }));
  const startSpinner = options.startSpinner ?? (() => null);

  const print = (text: string): void => io.stdout(`${text}\n`);

  const contextFor = (command: Command): Context => {
    const globals = command.optsWithGlobals<GlobalOptions & JsonOption>();
    const configPath = globals.config ? path.resolve(cwd, globals.config) : findConfigFile(cwd);
    const fileConfig = configPath ? loadConfigFile(configPath) : {};
    const config = mergeConfig(fileConfig, {
      logLevel: globals.verbose ? 'debug' : undefined,
      logFile: globals.logFile,
    });
    const logger = loggerFactory(config);
    return { logger, services: servicesFactory(config, logger), json: Boolean(globals.json) };
  };

  const withSpinner = async <T>(json: boolean, text: string, run: () => Promise<T>): Promise<T> => {
    const spinner = json ? null : startSpinner(text);
    try {
      return await run();
    } finally {
      spinner?.stop();
    }
  };

  const program = new Command();
  program
    .name('diag')
    .description('Network and process diagnostics')
    .version('0.1.0')
    .option('--config <path>', 'Config file (defaults to the nearest .netdiagrc.json)')
    .option('--verbose', 'Log debug output to stderr')
    .option('--log-file <path>', 'Also write log lines to this file')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command('metrics')
    .description('Show memory, CPU and uptime of this process')
    .option('--json', 'Output in JSON format')
    .action(async (_opts: JsonOption, command: Command) => {
      const { logger, services, json } = contextFor(command);
      const read = instrument('readProcessMetrics', () => services.processMetrics(), logger);
      const document = metricsDocument(await read());
      print(json ? toJson(document) : renderMetrics(document));
    });

  const network = program.command('network').description('Network diagnostics');

  network
    .command('metrics')
    .description('Show interface counters and open connections')
    .option('--json', 'Output in JSON format')
    .action(async (_opts: JsonOption, command: Command) => {
      const { logger, services, json } = contextFor(command);
      const interfaces = instrument(
        'NetworkSnapshot.interfaceStats',
        () => services.snapshot.interfaceStats(),
        logger,
      );
      const connections = instrument(
        'NetworkSnapshot.connections',
        () => services.snapshot.connections(),
        logger,
      );
      const document = networkMetricsDocument(await interfaces(), await connections());
      print(json ? toJson(document) : renderNetworkMetrics(document));
    });

  network
    .command('connections')
    .description('Summarize connections by status, or list one status')
    .option('--status <status>', 'List connections in this status (e.g. ESTABLISHED)')
    .option('--json', 'Output in JSON format')
    .action(async (_opts: unknown, command: Command) => {
      const { logger, services, json } = contextFor(command);
      const { status } = command.opts<{ status?: string }>();

      if (status) {
        const byStatus = instrument(
          'ConnectionMonitor.byStatus',
          (wanted: string) => services.connections.byStatus(wanted),
          logger,
        );
        const records = (await byStatus(status)).map(connectionRecordJson);
        print(json ? toJson(records) : renderConnectionList(status, records));
        return;
      }

      const summarize = instrument(
        'ConnectionMonitor.summary',
        () => services.connections.summary(),
        logger,
      );
      const summary = await summarize();
      print(json ? toJson(summary) : renderConnectionSummary(summary));
    });

  network
    .command('latency')
    .description('Measure TCP connect latency to a host')
    .argument('<host>', 'Host to connect to')
    .option('--port <port>', 'Port to connect to', parsePort, 80)
    .option('--count <count>', 'Number of measurements', parseCount, 5)
    .option('--timeout <ms>', 'Connect timeout per measurement in milliseconds', parseTimeout)
    .option('--json', 'Output in JSON format')
    .action(async (host: string, _opts: unknown, command: Command) => {
      const { logger, services, json } = contextFor(command);
      const { port, count, timeout } = command.opts<{
        port: number;
        count: number;
        timeout?: number;
      }>();

      const measureSeries = instrument(
        'LatencyMonitor.measureSeries',
        (target: string, targetPort: number, times: number, timeoutMs: number | undefined) =>
          services.latency.measureSeries(target, targetPort, times, timeoutMs),
        logger,
      );
      const outcome = await withSpinner(json, `Measuring latency to ${host}...`, () =>
        measureSeries(host, port, count, timeout),
      );
      if (!outcome.ok) throw new CommandFailedError(`Failed to measure latency to ${host}`);

      const measurements = outcome.value;
      const stats = summarizeLatencies(measurements);
      if (!stats) throw new CommandFailedError(`Failed to measure latency to ${host}`);

      const document: LatencyDocument = { host, port, measurements, stats };
      print(json ? toJson(document) : renderLatency(document));
    });

  network
    .command('dns')
    .description('Resolve a hostname to its IPv4 addresses')
    .argument('<hostname>', 'Hostname to resolve')
    .option('--json', 'Output in JSON format')
    .action(async (hostname: string, _opts: unknown, command: Command) => {
      const { logger, services, json } = contextFor(command);
      const resolve = instrument(
        'DnsMonitor.resolve',
        (name: string) => services.dns.resolve(name),
        logger,
      );

      const outcome = await resolve(hostname);
      if (!outcome.ok) throw new CommandFailedError(`Failed to resolve ${hostname}`);

      const document: DnsDocument = {
        hostname,
        ip_addresses: outcome.value,
        cache_stats: services.dns.cacheStats(),
      };
      print(json ? toJson(document) : renderDns(document));
    });

  network
    .command('ssl')
    .description('Inspect the TLS certificate a host presents')
    .argument('<hostname>', 'Hostname to check')
    .option('--port <port>', 'Port to connect to', parsePort, 443)
    .option('--insecure', 'Skip chain and hostname verification')
    .option('--json', 'Output in JSON format')
    .action(async (hostname: string, _opts: unknown, command: Command) => {
      const { logger, services, json } = contextFor(command);
      const { port, insecure } = command.opts<{ port: number; insecure?: boolean }>();
      const monitor = services.certificates({ verify: !insecure });

      const check = instrument(
        'CertificateMonitor.check',
        (name: string, targetPort: number) => monitor.check(name, targetPort),
        logger,
      );
      const outcome = await withSpinner(json, `Checking certificate for ${hostname}...`, () =>
        check(hostname, port),
      );
      if (!outcome.ok) throw new CommandFailedError(`Failed to check certificate for ${hostname}`);

      const document: SslDocument = {
        hostname,
        port,
        certificate: certificateJson(outcome.value),
        cache_stats: monitor.cacheStats(),
      };
      print(json ? toJson(document) : renderSsl(document));
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries), run the command and
 * return the process exit code.
 */
export async function runCli(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const program = createProgram({ ...options, io });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      const informational = ['commander.helpDisplayed', 'commander.help', 'commander.version'];
      return informational.includes(error.code) ? 0 : USAGE_EXIT_CODE;
    }
    if (error instanceof CommandFailedError) {
      io.stderr(`${error.message}\n`);
      return 1;
    }
    io.stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}
