import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClusterOperationFailed } from '../../lib/errors';
import { NodePool } from '../../lib/nodePool';
import { clusterHealth, healthRow } from '../clusterHealth';

const mockRequest = vi.fn();

function makePool(): NodePool {
  return new NodePool([{ host: 'es1', port: 9200, isSecure: false }], {
    transport: { timeoutMs: 1000, verifyCerts: true },
    createTransport: (endpoint) => ({ endpoint, request: mockRequest }),
  });
}

const baseHealthResponse = {
  cluster_name: 'my-cluster',
  status: 'yellow',
  number_of_nodes: 3,
  number_of_data_nodes: 3,
  active_primary_shards: 10,
  active_shards: 18,
  relocating_shards: 1,
  initializing_shards: 0,
  unassigned_shards: 2,
  timed_out: false,
};

describe('clusterHealth', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('requests cluster health and returns the summary', async () => {
    mockRequest.mockResolvedValue(baseHealthResponse);

    const summary = await clusterHealth(makePool());

    expect(mockRequest).toHaveBeenCalledWith({ method: 'GET', path: '/_cluster/health' });
    expect(summary).toEqual({
      clusterName: 'my-cluster',
      status: 'yellow',
      numberOfNodes: 3,
      numberOfDataNodes: 3,
      activePrimaryShards: 10,
      activeShards: 18,
      relocatingShards: 1,
      initializingShards: 0,
      unassignedShards: 2,
      timedOut: false,
    });
  });

  it('defaults shard counts that older clusters omit', async () => {
    const older: Record<string, unknown> = { ...baseHealthResponse };
    delete older.relocating_shards;
    delete older.initializing_shards;
    mockRequest.mockResolvedValue(older);

    const summary = await clusterHealth(makePool());

    expect(summary.relocatingShards).toBe(0);
    expect(summary.initializingShards).toBe(0);
  });

  it('rejects a response of the wrong shape', async () => {
    mockRequest.mockResolvedValue({ status: 'purple' });

    await expect(clusterHealth(makePool())).rejects.toThrow(ClusterOperationFailed);
  });

  it('propagates errors that are not node failures', async () => {
    mockRequest.mockRejectedValue(new Error('Network timeout'));

    await expect(clusterHealth(makePool())).rejects.toThrow('Network timeout');
    expect(mockRequest).toHaveBeenCalledOnce();
  });
});

describe('healthRow', () => {
  it('renders the summary as one flat row', async () => {
    mockRequest.mockResolvedValue({ ...baseHealthResponse, timed_out: true });

    expect(healthRow(await clusterHealth(makePool()))).toEqual({
      cluster_name: 'my-cluster',
      status: 'yellow',
      number_of_nodes: 3,
      number_of_data_nodes: 3,
      active_primary_shards: 10,
      active_shards: 18,
      relocating_shards: 1,
      initializing_shards: 0,
      unassigned_shards: 2,
      timed_out: 'true',
    });
  });
});
