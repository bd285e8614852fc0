import winston from 'winston';

import type { DiagnosticsLogger, LogLevel } from '../types/logger.js';
import { LOG_LEVELS } from '../types/logger.js';

export type LoggerOptions = {
  /** Most verbose level that is written. Defaults to `error`. */
  level?: LogLevel;

  /** Also append log lines to this file. */
  file?: string;

  /** Label printed on every line. Defaults to `netdiag`. */
  name?: string;
};

const { combine, timestamp, printf } = winston.format;

/**
 * Create the default logger.
 *
 * Every level goes to stderr so stdout stays clean for `--json` output.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'debug' });
 * logger.warn('Failed to measure latency to example.com', { port: 80 });
 * // 2025-01-01T00:00:00.000Z [warn] [netdiag] Failed to measure latency to example.com {"port":80}
 * ```
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const name = options.name ?? 'netdiag';

  const lineFormat = combine(
    timestamp(),
    printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level}] [${name}] ${String(message)}${metaStr}`;
    }),
  );

  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] }),
  ];
  if (options.file) {
    transports.push(new winston.transports.File({ filename: options.file }));
  }

  return winston.createLogger({
    level: options.level ?? 'error',
    format: lineFormat,
    transports,
  });
}

/**
 * Logger that drops everything. The monitors default to it so embedding the
 * library never prints unless a logger is passed in.
 */
export const silentLogger: DiagnosticsLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
