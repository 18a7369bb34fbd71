#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage: `elastic-scroll-search eaddr=node1:9200,node2:9200 index=logs-* query="status:500" earliest=now-1h`
 *
 * Records are written to stdout as JSON lines while the scroll is running;
 * diagnostics and the audit entry go to stderr. Exit codes: 0 on success,
 * 3 when the scroll cursor expired and the output is incomplete, 1 on any
 * other failure.
 */
import { once } from 'node:events';
import { match } from 'dismatch';
import { AuditLogger } from './lib/auditLogger';
import { loadConfig } from './lib/config';
import { describeError } from './lib/errors';
import { FlatRecord } from './lib/flatten';
import { Logger } from './lib/logger';
import { runCommand } from './commands/runCommand';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 3;

async function writeRecord(record: FlatRecord, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    if (!process.stdout.write(JSON.stringify(record) + '\n')) {
      await once(process.stdout, 'drain', { signal });
    }
  } catch (error: unknown) {
    // The reader went away or the command was interrupted; the scroll stops on the abort.
    if (!signal.aborted) throw error;
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  const config = loadConfig();
  const logger = new Logger(config.logLevel);
  const auditLogger = new AuditLogger(config);

  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);
  process.stdout.on('error', abort);

  try {
    const outcome = await runCommand(
      argv,
      { config, logger, auditLogger, signal: controller.signal },
      (record) => writeRecord(record, controller.signal),
    );

    return match(outcome)({
      success: () => EXIT_SUCCESS,
      partial: ({ message }) => {
        process.stderr.write(`warning: ${message}\n`);
        return EXIT_PARTIAL;
      },
      error: ({ message }) => {
        process.stderr.write(`error: ${message}\n`);
        return EXIT_FAILURE;
      },
    });
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    process.stdout.off('error', abort);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`error: ${describeError(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
