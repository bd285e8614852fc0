#!/usr/bin/env node
import { runCli, type Spinner } from './lib/program.js';

type Ora = typeof import('ora');

/** Exit code for an interrupted run (128 + SIGINT). */
const CANCELLED_EXIT_CODE = 130;

async function main(): Promise<void> {
  process.once('SIGINT', () => {
    process.stderr.write('\nOperation cancelled by user\n');
    process.exit(CANCELLED_EXIT_CODE);
  });

  const ora = await tryImportOra();
  const startSpinner = ora
    ? (text: string): Spinner => ora.default({ text, stream: process.stderr }).start()
    : undefined;

  // exitCode rather than exit(): file log transports flush asynchronously.
  process.exitCode = await runCli(process.argv.slice(2), { startSpinner });
}

async function tryImportOra(): Promise<Ora | null> {
  try {
    return await import('ora');
  } catch {
    return null;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
