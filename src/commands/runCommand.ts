/**
 * Command execution pipeline shared by every action.
 *
 * The pipeline enforces a fixed sequence for every invocation:
 * 1. Parse and validate the `key=value` arguments
 * 2. Resolve the connection, and for searches the time range and query,
 *    before any request leaves the process
 * 3. Run the action, handing each record to the sink as soon as it exists
 * 4. Classify the ending as success, partial or error
 * 5. Write one audit log entry
 *
 * Errors never escape {@link runCommand}; they come back in the
 * {@link CommandOutcome}.
 *
 * @module
 */
import { match } from 'dismatch';
import type { Model } from 'dismatch';
import { AuditEntry, AuditLogger } from '../lib/auditLogger';
import { RuntimeConfig } from '../lib/config';
import { CommandAborted, CommandError, CursorExpired, describeError, ErrorCode } from '../lib/errors';
import { FlatRecord } from '../lib/flatten';
import { Logger } from '../lib/logger';
import { NodePool } from '../lib/nodePool';
import { DefaultRange } from '../lib/timeResolver';
import { TransportFactory } from '../lib/transport';
import { clusterHealth, healthRow } from './clusterHealth';
import { parseCommandArguments } from './commandArgs';
import { resolveConnection } from './connection';
import { indexRow, listIndices } from './listIndices';
import { configuredDefaultRange, planSearch, searchRecords } from './search';

export type CommandAction = 'search' | 'indices-list' | 'cluster-health';

/**
 * How an invocation ended, discriminated on `type`. `rows` always counts the
 * records handed to the sink, including those before a failure.
 */
export type CommandOutcome =
  | Model<'success', { action: CommandAction; rows: number }>
  | Model<'partial', { action: CommandAction; rows: number; message: string }>
  | Model<
      'error',
      {
        action: CommandAction | 'unknown';
        rows: number;
        code?: ErrorCode;
        message: string;
      }
    >;

export interface CommandContext {
  config: RuntimeConfig;
  logger: Logger;
  auditLogger: AuditLogger;
  /** Clock for relative time expressions. */
  now?: () => number;
  /** Range supplied by the host for the bounds the command leaves out. */
  defaultRange?: DefaultRange;
  signal?: AbortSignal;
  createTransport?: TransportFactory;
}

type AuditFailure = Pick<AuditEntry, 'error_code' | 'error_message'>;

export type RecordSink = (record: FlatRecord) => void | Promise<void>;

export async function runCommand(
  argv: readonly string[],
  context: CommandContext,
  emit: RecordSink,
): Promise<CommandOutcome> {
  const { config, logger } = context;
  const startTime = Date.now();
  let action: CommandAction | 'unknown' = 'unknown';
  let rows = 0;
  let outcome: CommandOutcome;

  const send = async (record: FlatRecord): Promise<void> => {
    await emit(record);
    rows++;
  };

  try {
    const args = parseCommandArguments(argv);
    const current: CommandAction = args.action ?? 'search';
    action = current;

    const connection = resolveConnection(args, config);
    const pool = new NodePool(connection.endpoints, {
      transport: connection.transport,
      logger,
      createTransport: context.createTransport,
    });

    switch (current) {
      case 'indices-list':
        for (const index of await listIndices(pool)) {
          await send(indexRow(index));
        }
        break;
      case 'cluster-health':
        await send(healthRow(await clusterHealth(pool)));
        break;
      case 'search': {
        const now = (context.now ?? Date.now)();
        const defaultRange = context.defaultRange ?? (() => configuredDefaultRange(config, now));
        const descriptor = planSearch(args, connection.timestampField, defaultRange, now);

        const records = searchRecords(pool, descriptor, {
          pageSize: args.page_size ?? config.scrollPageSize,
          keepAlive: config.scrollKeepAlive,
          limit: args.limit ?? config.maxResults,
          includeClusterMeta: args.include_es,
          includeRaw: args.include_raw,
          scan: args.scan,
          logger,
          signal: context.signal,
        });
        for await (const record of records) {
          await send(record);
        }
        break;
      }
    }

    if (context.signal?.aborted) {
      throw new CommandAborted(rows);
    }
    outcome = { type: 'success', action: current, rows };
  } catch (error: unknown) {
    if (error instanceof CursorExpired && action !== 'unknown') {
      outcome = { type: 'partial', action, rows, message: error.message };
    } else {
      outcome = {
        type: 'error',
        action,
        rows,
        code: error instanceof CommandError ? error.code : undefined,
        message: describeError(error),
      };
      if (!(error instanceof CommandError)) {
        logger.error('Unexpected failure', {
          action,
          error: error instanceof Error ? error.stack : describeError(error),
        });
      }
    }
  }

  context.auditLogger.log({
    timestamp: new Date().toISOString(),
    action,
    input_parameters: argv.join(' '),
    rows_emitted: rows,
    execution_time_ms: Date.now() - startTime,
    status: outcome.type,
    ...match(outcome)({
      success: (): AuditFailure => ({}),
      partial: ({ message }): AuditFailure => ({ error_code: 'CursorExpired', error_message: message }),
      error: ({ code, message }): AuditFailure => ({ error_code: code, error_message: message }),
    }),
  });

  return outcome;
}
