/**
 * Scroll (cursor) pagination over one search.
 *
 * {@link ScrollIterator} is a small state machine:
 *
 * ```
 * unopened --open--> open --next (empty page)--> exhausted
 *                      \                            |
 *                       +-------close-------> closed <+
 * ```
 *
 * Pages are fetched only when {@link ScrollIterator.next} is called, so at
 * most one page of documents is held at a time. Every page request goes
 * through the node pool: a node dying mid-scroll retries the same page on
 * another node, which is safe because scroll cursors are cluster-wide.
 *
 * {@link scrollDocuments} wraps the iterator in an async generator that
 * releases the cursor on every exit path.
 *
 * @module
 */
import { match } from 'dismatch';
import type { Model } from 'dismatch';
import { z } from 'zod';
import { ClusterOperationFailed, CursorExpired, describeError } from './errors';
import { Logger, silentLogger } from './logger';
import { NodePool } from './nodePool';
import { buildSearchBody, QueryDescriptor } from './queryPlanner';

/** One search hit, read-only. */
export interface ResultDocument {
  readonly index: string;
  readonly id: string;
  readonly score: number | null;
  /** Mapping type, only reported by clusters older than 7.x. */
  readonly type?: string;
  readonly source: Readonly<Record<string, unknown>>;
}

/** Cluster-issued scroll handle. Replaced by every page response. */
export interface ScrollCursor {
  readonly id: string;
  readonly pageSize: number;
  readonly keepAlive: string;
}

export interface ScrollPage {
  documents: ResultDocument[];
  done: boolean;
}

export interface ScrollOptions {
  pageSize: number;
  /** Cursor lifetime between two page requests, in cluster time units (e.g. `1m`). */
  keepAlive: string;
  /** `false` sends one plain search without a cursor; only its first page is read. */
  scroll?: boolean;
  logger?: Logger;
}

type ScrollState =
  | Model<'unopened', {}>
  | Model<'open', { cursor: ScrollCursor | null; firstPage: ResultDocument[] | null }>
  | Model<'exhausted', { cursor: ScrollCursor | null }>
  | Model<'closed', {}>;

const hitSchema = z.object({
  _index: z.string(),
  _id: z.string(),
  _type: z.string().optional(),
  _score: z.number().nullable().optional(),
  _source: z.record(z.unknown()).optional(),
});

const searchResponseSchema = z.object({
  _scroll_id: z.string().optional(),
  hits: z.object({ hits: z.array(hitSchema) }),
});

type SearchResponse = z.infer<typeof searchResponseSchema>;

function parseSearchResponse(data: unknown): SearchResponse {
  const parsed = searchResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new ClusterOperationFailed('Unexpected search response from the cluster');
  }
  return parsed.data;
}

function toResultDocument(hit: z.infer<typeof hitSchema>): ResultDocument {
  return {
    index: hit._index,
    id: hit._id,
    score: hit._score ?? null,
    type: hit._type,
    source: hit._source ?? {},
  };
}

function isCursorMissing(error: unknown): boolean {
  return (
    error instanceof ClusterOperationFailed &&
    (error.status === 404 || error.errorType === 'search_context_missing_exception')
  );
}

export class ScrollIterator {
  private state: ScrollState = { type: 'unopened' };
  private delivered = 0;
  private logger: Logger;

  constructor(
    private pool: NodePool,
    private descriptor: QueryDescriptor,
    private options: ScrollOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Documents returned by {@link next} so far. */
  get documentsDelivered(): number {
    return this.delivered;
  }

  /** Issues the initial search and keeps its first page for the first {@link next}. */
  async open(): Promise<void> {
    if (this.state.type !== 'unopened') {
      throw new Error(`Cannot open a scroll iterator in state "${this.state.type}"`);
    }

    const { pageSize, keepAlive } = this.options;
    const body = buildSearchBody(this.descriptor, pageSize);
    const response = await this.pool.execute(async (transport) =>
      parseSearchResponse(
        await transport.request({
          method: 'POST',
          path: `/${this.descriptor.indexPattern}/_search`,
          params: this.options.scroll === false ? {} : { scroll: keepAlive },
          body,
        }),
      ),
    );

    this.state = {
      type: 'open',
      cursor: response._scroll_id ? { id: response._scroll_id, pageSize, keepAlive } : null,
      firstPage: response.hits.hits.map(toResultDocument),
    };
    this.logger.debug('Scroll opened', {
      index: this.descriptor.indexPattern,
      first_page: response.hits.hits.length,
    });
  }

  /**
   * Returns the next page. An empty page means the result set is exhausted;
   * from then on `next` answers `{ documents: [], done: true }` without
   * contacting the cluster.
   *
   * @throws {CursorExpired} If the cluster no longer knows the cursor. The
   *   iterator is closed; documents already returned stay valid.
   */
  async next(): Promise<ScrollPage> {
    const state = this.state;
    if (state.type === 'unopened') {
      throw new Error('Scroll iterator must be opened before reading pages');
    }
    if (state.type !== 'open') {
      return { documents: [], done: true };
    }

    let documents: ResultDocument[];
    let cursor = state.cursor;
    if (state.firstPage) {
      documents = state.firstPage;
      this.state = { type: 'open', cursor, firstPage: null };
    } else if (cursor) {
      ({ documents, cursor } = await this.fetchPage(cursor));
      if (this.state.type !== 'open') {
        // Closed while the page was in flight; the refreshed cursor is ours to release.
        await this.release(cursor);
        return { documents: [], done: true };
      }
      this.state = { type: 'open', cursor, firstPage: null };
    } else {
      documents = [];
    }

    if (documents.length === 0) {
      this.state = { type: 'exhausted', cursor };
      return { documents: [], done: true };
    }

    this.delivered += documents.length;
    return { documents, done: false };
  }

  /**
   * Releases the cluster cursor. Best-effort: a failed release is logged and
   * left to the cluster's keep-alive expiry. Calling it again is a no-op.
   */
  async close(): Promise<void> {
    const state = this.state;
    this.state = { type: 'closed' };

    if ((state.type === 'open' || state.type === 'exhausted') && state.cursor) {
      await this.release(state.cursor);
    }
  }

  private async fetchPage(
    cursor: ScrollCursor,
  ): Promise<{ documents: ResultDocument[]; cursor: ScrollCursor }> {
    let response: SearchResponse;
    try {
      response = await this.pool.execute(async (transport) =>
        parseSearchResponse(
          await transport.request({
            method: 'POST',
            path: '/_search/scroll',
            body: { scroll: cursor.keepAlive, scroll_id: cursor.id },
          }),
        ),
      );
    } catch (error: unknown) {
      if (isCursorMissing(error)) {
        this.state = { type: 'closed' };
        throw new CursorExpired(this.delivered);
      }
      throw error;
    }

    return {
      documents: response.hits.hits.map(toResultDocument),
      cursor: response._scroll_id ? { ...cursor, id: response._scroll_id } : cursor,
    };
  }

  private async release(cursor: ScrollCursor): Promise<void> {
    const result = await this.pool.withFailover((transport) =>
      transport.request({
        method: 'DELETE',
        path: '/_search/scroll',
        body: { scroll_id: [cursor.id] },
      }),
    );

    const warnUnreleased = ({ error }: { error: unknown }): void =>
      this.logger.warn('Could not release scroll cursor; the cluster will expire it', {
        error: describeError(error),
      });

    match(result)({
      success: () => this.logger.debug('Scroll cursor released', { delivered: this.delivered }),
      unreachable: warnUnreleased,
      rejected: warnUnreleased,
    });
  }
}

/**
 * Lazily yields every document of the search, one page in memory at a time.
 *
 * The cursor is released when the loop ends for any reason: exhaustion, the
 * consumer breaking out early, an error, or the abort signal firing.
 */
export async function* scrollDocuments(
  pool: NodePool,
  descriptor: QueryDescriptor,
  options: ScrollOptions & { signal?: AbortSignal },
): AsyncGenerator<ResultDocument, void, undefined> {
  const iterator = new ScrollIterator(pool, descriptor, options);
  try {
    await iterator.open();
    while (!options.signal?.aborted) {
      const page = await iterator.next();
      if (page.done) return;

      for (const document of page.documents) {
        if (options.signal?.aborted) return;
        yield document;
      }
    }
  } finally {
    await iterator.close();
  }
}
