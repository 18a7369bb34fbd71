/**
 * The search action: time range resolution and query planning, then a lazy
 * scroll over the cluster, yielding one flat record per hit.
 *
 * @module
 */
import { RuntimeConfig } from '../lib/config';
import { InvalidTimeRange } from '../lib/errors';
import { FlatRecord } from '../lib/flatten';
import { Logger } from '../lib/logger';
import { NodePool } from '../lib/nodePool';
import { planQuery, QueryDescriptor } from '../lib/queryPlanner';
import { toRecord } from '../lib/records';
import { scrollDocuments } from '../lib/scrollIterator';
import { DefaultRange, parseTimeExpression, resolveTimeRange, TimeRange } from '../lib/timeResolver';
import { CommandArguments } from './commandArgs';

/** The configured `DEFAULT_EARLIEST`/`DEFAULT_LATEST` range, evaluated at `now`. */
export function configuredDefaultRange(config: RuntimeConfig, now: number): TimeRange {
  const start = parseTimeExpression(config.defaultEarliest, now);
  const end = parseTimeExpression(config.defaultLatest, now);
  if (start > end) {
    throw new InvalidTimeRange(start, end);
  }
  return { start, end };
}

/** Largest page a plain (non-scroll) search may ask for. */
export const MAX_PLAIN_SEARCH_SIZE = 10000;

/**
 * Validates the search arguments and builds the query. Runs before any
 * request is sent, so configuration errors never reach the cluster.
 */
export function planSearch(
  args: CommandArguments,
  timestampField: string,
  defaultRange: DefaultRange,
  now: number,
): QueryDescriptor {
  const range = resolveTimeRange(args.earliest, args.latest, defaultRange, now);
  return planQuery(
    { index: args.index, query: args.query, tsfield: timestampField, fields: args.fields },
    range,
    timestampField,
  );
}

export interface SearchOptions {
  pageSize: number;
  keepAlive: string;
  /** Stop after this many records; the cursor is released early. */
  limit: number;
  includeClusterMeta: boolean;
  includeRaw: boolean;
  /** `false` fetches a single page of up to `limit` hits with no scroll cursor. */
  scan?: boolean;
  logger?: Logger;
  signal?: AbortSignal;
}

export async function* searchRecords(
  pool: NodePool,
  descriptor: QueryDescriptor,
  options: SearchOptions,
): AsyncGenerator<FlatRecord, void, undefined> {
  let emitted = 0;
  const scroll = options.scan ?? true;
  const documents = scrollDocuments(pool, descriptor, {
    pageSize: Math.min(scroll ? options.pageSize : MAX_PLAIN_SEARCH_SIZE, options.limit),
    keepAlive: options.keepAlive,
    scroll,
    logger: options.logger,
    signal: options.signal,
  });

  for await (const document of documents) {
    yield toRecord(document, {
      timestampField: descriptor.timestampField,
      includeClusterMeta: options.includeClusterMeta,
      includeRaw: options.includeRaw,
    });
    emitted++;
    if (emitted >= options.limit) {
      return;
    }
  }
}
