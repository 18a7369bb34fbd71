/**
 * Error taxonomy for the search command.
 *
 * Every failure the command can report extends {@link CommandError} and
 * carries a stable `code`. Validation errors are raised before any request
 * leaves the process; connection errors ({@link TransportTimeout},
 * {@link NodeConnectionFailed}) are consumed by the node pool's failover and
 * only surface wrapped in {@link AllNodesUnreachable}.
 *
 * @module
 */
import type { ClusterEndpoint } from './endpoints';

export type ErrorCode =
  | 'InvalidTimeExpression'
  | 'InvalidTimeRange'
  | 'InvalidQueryConfiguration'
  | 'AllNodesUnreachable'
  | 'CursorExpired'
  | 'ClusterOperationFailed'
  | 'TransportTimeout'
  | 'NodeConnectionFailed'
  | 'CommandAborted';

export abstract class CommandError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidTimeExpression extends CommandError {
  readonly code = 'InvalidTimeExpression';

  constructor(readonly expression: string) {
    super(
      `Invalid time expression "${expression}". Use "now", "now-<n><unit>" (units: s, m, h, d, w, mon, y), an epoch timestamp or an ISO-8601 date.`,
    );
  }
}

export class InvalidTimeRange extends CommandError {
  readonly code = 'InvalidTimeRange';

  constructor(
    readonly start: number,
    readonly end: number,
  ) {
    super(
      `Invalid time range: earliest (${new Date(start).toISOString()}) is after latest (${new Date(end).toISOString()}).`,
    );
  }
}

export class InvalidQueryConfiguration extends CommandError {
  readonly code = 'InvalidQueryConfiguration';
}

/** The per-attempt timeout elapsed before the node answered. */
export class TransportTimeout extends CommandError {
  readonly code = 'TransportTimeout';

  constructor(
    readonly endpoint: ClusterEndpoint,
    readonly timeoutMs: number,
  ) {
    super(`Request to ${endpointLabel(endpoint)} timed out after ${timeoutMs}ms`);
  }
}

/** Refused or reset connection, DNS or TLS failure, or a node reporting itself unavailable. */
export class NodeConnectionFailed extends CommandError {
  readonly code = 'NodeConnectionFailed';

  constructor(
    readonly endpoint: ClusterEndpoint,
    reason: string,
  ) {
    super(`Connection to ${endpointLabel(endpoint)} failed: ${reason}`);
  }
}

export class AllNodesUnreachable extends CommandError {
  readonly code = 'AllNodesUnreachable';

  constructor(
    readonly attempts: number,
    lastError: unknown,
  ) {
    super(
      `All ${attempts} cluster node(s) are unreachable. Last error: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}

/**
 * The cluster no longer knows the scroll cursor. Documents delivered before
 * the failure are valid; the result set is incomplete.
 */
export class CursorExpired extends CommandError {
  readonly code = 'CursorExpired';

  constructor(readonly documentsDelivered: number) {
    super(
      `Scroll cursor expired on the cluster after ${documentsDelivered} document(s); results are incomplete.`,
    );
  }
}

/** The command was interrupted (signal or closed output) before its results were complete. */
export class CommandAborted extends CommandError {
  readonly code = 'CommandAborted';

  constructor(readonly rowsEmitted: number) {
    super(`Command aborted after ${rowsEmitted} row(s); results are incomplete.`);
  }
}

/** The cluster answered, but rejected the request (bad query, missing index, ...). */
export class ClusterOperationFailed extends CommandError {
  readonly code = 'ClusterOperationFailed';

  constructor(
    reason: string,
    readonly status?: number,
    readonly errorType?: string,
  ) {
    super(status ? `Cluster rejected the request (HTTP ${status}): ${reason}` : reason);
  }
}

function endpointLabel(endpoint: ClusterEndpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

export function isConnectionFailure(
  error: unknown,
): error is TransportTimeout | NodeConnectionFailed {
  return error instanceof TransportTimeout || error instanceof NodeConnectionFailed;
}

/** Renders any thrown value as a single human-readable line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
