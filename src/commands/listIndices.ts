/**
 * **indices-list**: lists the indices the cluster reports.
 *
 * One row per index with health, status, document count and store size,
 * sorted by index name. The search arguments (`index`, `query`, ...) do not
 * apply to this action.
 *
 * @module
 */
import { z } from 'zod';
import { ClusterOperationFailed } from '../lib/errors';
import { FlatRecord } from '../lib/flatten';
import { NodePool } from '../lib/nodePool';

/** Summary metadata for a single index. */
export interface IndexDescriptor {
  readonly index: string;
  readonly health: string;
  readonly status: string;
  /** `null` for closed indices, which report no count. */
  readonly docCount: number | null;
  readonly storeSize: string | null;
}

const catIndexSchema = z
  .object({
    index: z.string(),
    health: z.string().nullish(),
    status: z.string().nullish(),
    'docs.count': z.string().nullish(),
    'store.size': z.string().nullish(),
  })
  .passthrough();

const catIndicesSchema = z.array(catIndexSchema);

export async function listIndices(pool: NodePool): Promise<IndexDescriptor[]> {
  const raw = await pool.execute((transport) =>
    transport.request({
      method: 'GET',
      path: '/_cat/indices',
      params: { format: 'json', h: 'index,health,status,docs.count,store.size' },
    }),
  );

  const parsed = catIndicesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ClusterOperationFailed('Unexpected index listing response from the cluster');
  }

  return parsed.data
    .map((idx) => ({
      index: idx.index,
      health: idx.health ?? '',
      status: idx.status ?? '',
      docCount: idx['docs.count'] ? Number(idx['docs.count']) : null,
      storeSize: idx['store.size'] ?? null,
    }))
    .sort((a, b) => (a.index < b.index ? -1 : a.index > b.index ? 1 : 0));
}

export function indexRow(descriptor: IndexDescriptor): FlatRecord {
  return {
    index: descriptor.index,
    health: descriptor.health,
    status: descriptor.status,
    doc_count: descriptor.docCount ?? '',
    store_size: descriptor.storeSize ?? '',
  };
}
