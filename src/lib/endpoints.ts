/**
 * Parsing of the `eaddr` node list into cluster endpoints.
 *
 * Each comma-separated entry is `[http://|https://]host[:port]`. Entries
 * without a scheme inherit the pool's TLS setting; the port defaults to 9200.
 *
 * @module
 */
import { InvalidQueryConfiguration } from './errors';

export const DEFAULT_PORT = 9200;

/** One cluster entry point. Immutable; owned by the node pool. */
export interface ClusterEndpoint {
  readonly host: string;
  readonly port: number;
  readonly isSecure: boolean;
}

const ENDPOINT_REGEX = /^(?:(https?):\/\/)?(\[[0-9a-fA-F:.]+\]|[a-zA-Z0-9\-._]+)(?::(\d{1,5}))?\/?$/;

export function parseEndpoint(value: string, useSsl: boolean): ClusterEndpoint {
  const match = ENDPOINT_REGEX.exec(value.trim());
  if (!match) {
    throw new InvalidQueryConfiguration(
      `Invalid cluster address "${value}". Expected [http[s]://]host[:port].`,
    );
  }

  const [, scheme, host, portText] = match;
  const port = portText ? parseInt(portText, 10) : DEFAULT_PORT;
  if (port < 1 || port > 65535) {
    throw new InvalidQueryConfiguration(`Invalid port ${port} in cluster address "${value}".`);
  }

  return Object.freeze({
    host,
    port,
    isSecure: scheme ? scheme === 'https' : useSsl,
  });
}

/**
 * Parses a comma-separated node list, preserving the declared order.
 *
 * @throws {InvalidQueryConfiguration} If the list is empty or an entry is malformed.
 */
export function parseEndpoints(
  value: string | readonly string[],
  useSsl: boolean,
): ClusterEndpoint[] {
  const entries = (typeof value === 'string' ? value.split(',') : value)
    .map((entry) => entry.trim())
    .filter(Boolean);

  if (entries.length === 0) {
    throw new InvalidQueryConfiguration('No cluster address given (eaddr is empty).');
  }
  return entries.map((entry) => parseEndpoint(entry, useSsl));
}

export function endpointUrl(endpoint: ClusterEndpoint): string {
  return `${endpoint.isSecure ? 'https' : 'http'}://${endpoint.host}:${endpoint.port}`;
}

export function formatEndpoint(endpoint: ClusterEndpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}
