import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { ConfigError, errorMessage } from '@netdiag/core';
import { z } from 'zod';

/**
 * CLI configuration file name (searched upwards from cwd).
 */
export const CONFIG_FILE = '.netdiagrc.json';

const timeoutMs = z.number().int().positive();
const intervalMs = z.number().int().nonnegative();

/**
 * Schema of `.netdiagrc.json`. Unknown keys are rejected so typos surface.
 */
export const configSchema = z
  .object({
    /** Most verbose log level written to stderr (`error`, `warn`, `info`, `debug`). */
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),

    /** Also append log lines to this file. */
    logFile: z.string().min(1).optional(),

    /** TCP connect timeout for latency probes. */
    connectTimeoutMs: timeoutMs.optional(),

    /** Bound on connect plus TLS handshake for certificate checks. */
    handshakeTimeoutMs: timeoutMs.optional(),

    /** How long DNS answers are reused. */
    dnsTtlMs: intervalMs.optional(),

    /** How long fetched certificates are reused. */
    certificateTtlMs: intervalMs.optional(),

    /** Minimum time between two connection enumerations. */
    connectionIntervalMs: intervalMs.optional(),

    /** Minimum time between two tracked latency probes. */
    latencyIntervalMs: intervalMs.optional(),
  })
  .strict();

export type CliConfigFile = z.infer<typeof configSchema>;

/**
 * Find a config file by walking up from the starting directory.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    const full = path.join(dir, CONFIG_FILE);
    if (existsSync(full)) return full;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Validate an already-parsed config value.
 *
 * @throws ConfigError listing every invalid key
 */
export function parseConfig(value: unknown, source = CONFIG_FILE): CliConfigFile {
  const result = configSchema.safeParse(value);
  if (result.success) return result.data;

  const problems = result.error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  throw new ConfigError(`Invalid config in ${source}: ${problems}`);
}

/**
 * Load and validate a JSON config file from disk.
 *
 * @throws ConfigError when the file cannot be read, is not JSON or fails validation
 */
export function loadConfigFile(filePath: string): CliConfigFile {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return parseConfig(parsed, filePath);
}

/**
 * Merge config objects with precedence: base < overrides. Keys that are
 * `undefined` in `overrides` keep the base value.
 */
export function mergeConfig(base: CliConfigFile, overrides: CliConfigFile): CliConfigFile {
  const merged: CliConfigFile = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}
