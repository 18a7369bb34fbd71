/**
 * Node pool with sticky failover.
 *
 * The pool holds one transport per configured endpoint, in the order the
 * caller declared them. {@link NodePool.withFailover} starts at the last node
 * that answered and walks the list (wrapping around) until one node answers,
 * so every endpoint is tried exactly once per call.
 *
 * Only connection-level failures move on to the next node. A request the
 * cluster answered with an error is terminal: the same request would fail on
 * any node.
 *
 * A pool belongs to a single command invocation; nothing here is shared
 * between concurrent searches.
 *
 * @module
 */
import { match } from 'dismatch';
import type { Model } from 'dismatch';
import { ClusterEndpoint, formatEndpoint } from './endpoints';
import { AllNodesUnreachable, ClusterOperationFailed, describeError, isConnectionFailure } from './errors';
import { Logger, silentLogger } from './logger';
import { createHttpTransport, Transport, TransportFactory, TransportOptions } from './transport';

/**
 * Outcome of {@link NodePool.withFailover}, discriminated on `type`:
 *
 * - `success`: a node answered; `attempts` counts the nodes tried.
 * - `unreachable`: every node failed at the connection level.
 * - `rejected`: a node answered with an error; no other node was tried.
 */
export type FailoverResult<T> =
  | Model<'success', { value: T; endpoint: ClusterEndpoint; attempts: number }>
  | Model<'unreachable', { error: AllNodesUnreachable }>
  | Model<'rejected', { error: unknown; endpoint: ClusterEndpoint }>;

export interface NodePoolOptions {
  transport: TransportOptions;
  logger?: Logger;
  createTransport?: TransportFactory;
}

export class NodePool {
  private transports: Transport[];
  private preferred = 0;
  private logger: Logger;

  constructor(endpoints: readonly ClusterEndpoint[], options: NodePoolOptions) {
    if (endpoints.length === 0) {
      throw new Error('A node pool needs at least one endpoint');
    }
    const createTransport = options.createTransport ?? createHttpTransport;
    this.transports = endpoints.map((endpoint) => createTransport(endpoint, options.transport));
    this.logger = options.logger ?? silentLogger;
  }

  get endpoints(): ClusterEndpoint[] {
    return this.transports.map((transport) => transport.endpoint);
  }

  /** The endpoint the next request will be sent to first. */
  selectNode(): ClusterEndpoint {
    return this.transports[this.preferred].endpoint;
  }

  async withFailover<T>(operation: (transport: Transport) => Promise<T>): Promise<FailoverResult<T>> {
    const count = this.transports.length;
    let lastError: unknown;

    for (let attempt = 0; attempt < count; attempt++) {
      const index = (this.preferred + attempt) % count;
      const transport = this.transports[index];

      try {
        const value = await operation(transport);
        this.preferred = index;
        return { type: 'success', value, endpoint: transport.endpoint, attempts: attempt + 1 };
      } catch (error: unknown) {
        if (!isConnectionFailure(error)) {
          return { type: 'rejected', error, endpoint: transport.endpoint };
        }
        lastError = error;
        this.logger.warn('Cluster node failed, trying next node', {
          node: formatEndpoint(transport.endpoint),
          attempt: attempt + 1,
          of: count,
          error: describeError(error),
        });
      }
    }

    return { type: 'unreachable', error: new AllNodesUnreachable(count, lastError) };
  }

  /**
   * Runs the operation with failover and unwraps the result.
   *
   * @throws {AllNodesUnreachable} If every node failed at the connection level.
   * @throws The node's error when the cluster rejected the request.
   */
  async execute<T>(operation: (transport: Transport) => Promise<T>): Promise<T> {
    return match(await this.withFailover(operation))({
      success: ({ value }) => value,
      unreachable: ({ error }) => {
        throw error;
      },
      rejected: ({ error }) => {
        throw error instanceof Error ? error : new ClusterOperationFailed(describeError(error));
      },
    });
  }
}
