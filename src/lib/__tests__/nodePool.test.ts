import { describe, it, expect, vi } from 'vitest';
import { parseEndpoints } from '../endpoints';
import {
  AllNodesUnreachable,
  ClusterOperationFailed,
  NodeConnectionFailed,
  TransportTimeout,
} from '../errors';
import { Logger } from '../logger';
import { NodePool } from '../nodePool';
import { Transport } from '../transport';
import { FakeCluster } from './helpers/fakeCluster';

function makePool(cluster: FakeCluster, eaddr = 'nodeA:9200,nodeB:9200,nodeC:9200', logger?: Logger) {
  return new NodePool(parseEndpoints(eaddr, false), {
    transport: { timeoutMs: 100, verifyCerts: true },
    createTransport: cluster.createTransport,
    logger,
  });
}

const health = (transport: Transport) => transport.request({ method: 'GET', path: '/_cluster/health' });

describe('NodePool', () => {
  it('uses the first endpoint while it answers', async () => {
    const cluster = new FakeCluster();
    const pool = makePool(cluster);

    const result = await pool.withFailover(health);

    expect(result.type).toBe('success');
    expect(cluster.requests.map((r) => r.node)).toEqual(['nodeA:9200']);
    expect(pool.selectNode()).toEqual({ host: 'nodeA', port: 9200, isSecure: false });
  });

  it('fails over past unreachable endpoints and sticks to the one that answered', async () => {
    const cluster = new FakeCluster();
    cluster.markDown('nodeA:9200');
    cluster.markDown('nodeB:9200');
    const pool = makePool(cluster);

    const first = await pool.withFailover(health);
    expect(first).toMatchObject({
      type: 'success',
      endpoint: { host: 'nodeC', port: 9200 },
      attempts: 3,
    });
    expect(pool.selectNode().host).toBe('nodeC');

    cluster.requests.length = 0;
    const second = await pool.withFailover(health);
    expect(second).toMatchObject({ type: 'success', attempts: 1 });
    expect(cluster.requests.map((r) => r.node)).toEqual(['nodeC:9200']);
  });

  it('wraps around from the preferred endpoint when it goes down', async () => {
    const cluster = new FakeCluster();
    cluster.markDown('nodeA:9200');
    const pool = makePool(cluster);
    await pool.withFailover(health);
    expect(pool.selectNode().host).toBe('nodeB');

    cluster.markUp('nodeA:9200');
    cluster.markDown('nodeB:9200');
    cluster.requests.length = 0;
    const result = await pool.withFailover(health);

    expect(result.type).toBe('success');
    expect(cluster.requests.map((r) => r.node)).toEqual(['nodeB:9200', 'nodeC:9200']);
  });

  it('reports AllNodesUnreachable after exactly one attempt per endpoint', async () => {
    const cluster = new FakeCluster();
    cluster.markDown('nodeA:9200');
    cluster.markDown('nodeB:9200');
    cluster.markDown('nodeC:9200');
    const pool = makePool(cluster);

    const result = await pool.withFailover(health);

    expect(cluster.requests).toHaveLength(3);
    expect(result.type).toBe('unreachable');
    if (result.type !== 'unreachable') return;
    expect(result.error).toBeInstanceOf(AllNodesUnreachable);
    expect(result.error.attempts).toBe(3);
    expect(result.error.cause).toBeInstanceOf(NodeConnectionFailed);
    expect(result.error.message).toBe(
      'All 3 cluster node(s) are unreachable. Last error: Connection to nodeC:9200 failed: ECONNREFUSED connect ECONNREFUSED nodeC:9200',
    );
  });

  it('counts timeouts as node failures', async () => {
    const cluster = new FakeCluster();
    cluster.markSlow('nodeA:9200');
    const pool = makePool(cluster, 'nodeA:9200,nodeB:9200');

    const result = await pool.withFailover(health);

    expect(result).toMatchObject({ type: 'success', endpoint: { host: 'nodeB' }, attempts: 2 });
  });

  it('keeps the last timeout as the cause when every node times out', async () => {
    const cluster = new FakeCluster();
    cluster.markSlow('nodeA:9200');
    const pool = makePool(cluster, 'nodeA:9200');

    await expect(pool.execute(health)).rejects.toSatisfy(
      (error: unknown) => error instanceof AllNodesUnreachable && error.cause instanceof TransportTimeout,
    );
  });

  it('does not retry a request the cluster rejected', async () => {
    const cluster = new FakeCluster([{ _index: 'logs', _id: '1', _source: {} }]);
    const pool = makePool(cluster);

    const result = await pool.withFailover((transport) =>
      transport.request({ method: 'POST', path: '/missing/_search', body: {} }),
    );

    expect(result.type).toBe('rejected');
    expect(cluster.requests).toHaveLength(1);
    if (result.type !== 'rejected') return;
    expect(result.error).toBeInstanceOf(ClusterOperationFailed);
    expect(result.endpoint.host).toBe('nodeA');
  });

  it('execute() unwraps a success and rethrows a rejection', async () => {
    const cluster = new FakeCluster();
    const pool = makePool(cluster);

    await expect(pool.execute(health)).resolves.toMatchObject({ cluster_name: 'test-cluster' });
    await expect(
      pool.execute((transport) => transport.request({ method: 'GET', path: '/_nope' })),
    ).rejects.toThrow(ClusterOperationFailed);
  });

  it('logs every failed node at warn level', async () => {
    const cluster = new FakeCluster();
    cluster.markDown('nodeA:9200');
    const logger = new Logger('silent');
    const warn = vi.spyOn(logger, 'warn');
    const pool = makePool(cluster, 'nodeA:9200,nodeB:9200', logger);

    await pool.withFailover(health);

    expect(warn).toHaveBeenCalledOnce();
    expect(warn.mock.calls[0][0]).toBe('Cluster node failed, trying next node');
    expect(warn.mock.calls[0][1]).toMatchObject({ node: 'nodeA:9200', attempt: 1, of: 2 });
  });

  it('refuses an empty endpoint list', () => {
    expect(
      () => new NodePool([], { transport: { timeoutMs: 100, verifyCerts: true } }),
    ).toThrow('A node pool needs at least one endpoint');
  });
});
