/**
 * HTTP transport to a single cluster node.
 *
 * Each {@link HttpTransport} owns one Axios instance bound to one endpoint:
 * base URL, per-attempt timeout, credentials and TLS verification are fixed
 * when the node pool is built. Failures are translated into the command's
 * error taxonomy so the pool can tell a dead node from a rejected request:
 *
 * - no response (refused, reset, DNS, TLS) → {@link NodeConnectionFailed}
 * - timeout → {@link TransportTimeout}
 * - HTTP 502/503/504 → {@link NodeConnectionFailed} (node unavailable)
 * - any other HTTP error → {@link ClusterOperationFailed}
 *
 * @module
 */
import https from 'node:https';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { ClusterCredentials } from './config';
import { ClusterEndpoint, endpointUrl } from './endpoints';
import { ClusterOperationFailed, NodeConnectionFailed, TransportTimeout } from './errors';

export interface ClusterRequest {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  params?: Record<string, string>;
  body?: Record<string, unknown>;
}

/** A request channel to one node. Resolves with the parsed JSON body. */
export interface Transport {
  readonly endpoint: ClusterEndpoint;
  request(request: ClusterRequest): Promise<unknown>;
}

export interface TransportOptions {
  timeoutMs: number;
  /** Only consulted for `https` endpoints. */
  verifyCerts: boolean;
  credentials?: ClusterCredentials;
}

export type TransportFactory = (endpoint: ClusterEndpoint, options: TransportOptions) => Transport;

const NODE_UNAVAILABLE_STATUSES = new Set([502, 503, 504]);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const errorCauseSchema = z
  .object({ type: z.string().optional(), reason: z.string().optional() })
  .passthrough();

const errorBodySchema = z
  .object({
    error: z
      .union([
        z.string(),
        errorCauseSchema.extend({ root_cause: z.array(errorCauseSchema).optional() }),
      ])
      .optional(),
    message: z.string().optional(),
  })
  .passthrough();

/**
 * Extracts the error type and reason from an Elasticsearch error body.
 *
 * The root cause's type is preferred: a scroll on an expired cursor reports
 * `search_phase_execution_exception` at the top level and
 * `search_context_missing_exception` as the root cause.
 */
export function describeErrorBody(data: unknown): { type?: string; reason?: string } {
  const parsed = errorBodySchema.safeParse(data);
  if (!parsed.success) {
    return typeof data === 'string' && data ? { reason: data } : {};
  }

  const { error, message } = parsed.data;
  if (typeof error === 'string') {
    return { reason: error };
  }
  if (!error) {
    return { reason: message };
  }

  const rootCause = error.root_cause?.[0];
  return {
    type: rootCause?.type ?? error.type,
    reason: error.reason ?? rootCause?.reason ?? message,
  };
}

export class HttpTransport implements Transport {
  private http: AxiosInstance;

  constructor(
    readonly endpoint: ClusterEndpoint,
    private options: TransportOptions,
    adapter?: AxiosAdapter,
  ) {
    const { credentials } = options;

    this.http = axios.create({
      baseURL: endpointUrl(endpoint),
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(credentials?.type === 'api_key' ? { Authorization: `ApiKey ${credentials.apiKey}` } : {}),
      },
      auth:
        credentials?.type === 'basic'
          ? { username: credentials.username, password: credentials.password }
          : undefined,
      httpsAgent: endpoint.isSecure
        ? new https.Agent({ rejectUnauthorized: options.verifyCerts })
        : undefined,
      adapter,
    });
  }

  async request({ method, path, params, body }: ClusterRequest): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({ method, url: path, params, data: body });
      return response.data;
    } catch (error: unknown) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): unknown {
    // Anything that is not an HTTP failure is a bug and propagates unchanged.
    if (!axios.isAxiosError(error)) {
      return error;
    }

    if (error.response) {
      const { status, data } = error.response;
      const { type, reason } = describeErrorBody(data);
      if (NODE_UNAVAILABLE_STATUSES.has(status)) {
        return new NodeConnectionFailed(this.endpoint, `HTTP ${status}${reason ? ` ${reason}` : ''}`);
      }
      return new ClusterOperationFailed(reason ?? error.message, status, type);
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TransportTimeout(this.endpoint, this.options.timeoutMs);
    }
    return new NodeConnectionFailed(
      this.endpoint,
      error.code ? `${error.code} ${error.message}` : error.message,
    );
  }
}

export const createHttpTransport: TransportFactory = (endpoint, options) =>
  new HttpTransport(endpoint, options);
