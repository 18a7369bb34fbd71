/**
 * **cluster-health**: overall cluster status with node and shard counts.
 *
 * @module
 */
import { z } from 'zod';
import { ClusterOperationFailed } from '../lib/errors';
import { FlatRecord } from '../lib/flatten';
import { NodePool } from '../lib/nodePool';

export interface ClusterHealthSummary {
  readonly clusterName: string;
  readonly status: 'green' | 'yellow' | 'red';
  readonly numberOfNodes: number;
  readonly numberOfDataNodes: number;
  readonly activePrimaryShards: number;
  readonly activeShards: number;
  readonly relocatingShards: number;
  readonly initializingShards: number;
  readonly unassignedShards: number;
  readonly timedOut: boolean;
}

const clusterHealthSchema = z
  .object({
    cluster_name: z.string(),
    status: z.enum(['green', 'yellow', 'red']),
    timed_out: z.boolean(),
    number_of_nodes: z.number(),
    number_of_data_nodes: z.number(),
    active_primary_shards: z.number(),
    active_shards: z.number(),
    relocating_shards: z.number().default(0),
    initializing_shards: z.number().default(0),
    unassigned_shards: z.number(),
  })
  .passthrough();

export async function clusterHealth(pool: NodePool): Promise<ClusterHealthSummary> {
  const raw = await pool.execute((transport) =>
    transport.request({ method: 'GET', path: '/_cluster/health' }),
  );

  const parsed = clusterHealthSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ClusterOperationFailed('Unexpected cluster health response from the cluster');
  }

  const health = parsed.data;
  return {
    clusterName: health.cluster_name,
    status: health.status,
    numberOfNodes: health.number_of_nodes,
    numberOfDataNodes: health.number_of_data_nodes,
    activePrimaryShards: health.active_primary_shards,
    activeShards: health.active_shards,
    relocatingShards: health.relocating_shards,
    initializingShards: health.initializing_shards,
    unassignedShards: health.unassigned_shards,
    timedOut: health.timed_out,
  };
}

export function healthRow(summary: ClusterHealthSummary): FlatRecord {
  return {
    cluster_name: summary.clusterName,
    status: summary.status,
    number_of_nodes: summary.numberOfNodes,
    number_of_data_nodes: summary.numberOfDataNodes,
    active_primary_shards: summary.activePrimaryShards,
    active_shards: summary.activeShards,
    relocating_shards: summary.relocatingShards,
    initializing_shards: summary.initializingShards,
    unassigned_shards: summary.unassignedShards,
    timed_out: summary.timedOut ? 'true' : 'false',
  };
}
