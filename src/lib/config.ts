/**
 * Runtime configuration loaded from environment variables, plus the optional
 * clusters file that maps a short name to a full connection profile.
 *
 * No variable is required; every setting has a default suitable for a local
 * single-node cluster.
 *
 * @see {@link loadConfig} for the loader that populates {@link RuntimeConfig}.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InvalidQueryConfiguration } from './errors';
import type { LogLevel } from './logger';

/** Pre-resolved HTTP credentials sent with every request. */
export type ClusterCredentials =
  | { type: 'api_key'; apiKey: string }
  | { type: 'basic'; username: string; password: string };

export interface RuntimeConfig {
  /** Per-attempt HTTP timeout in milliseconds. A timeout counts as a node failure. */
  requestTimeoutMs: number;
  /** Documents requested per scroll page (1--10000). */
  scrollPageSize: number;
  /** How long the cluster keeps a scroll cursor alive between pages (e.g. `1m`). */
  scrollKeepAlive: string;
  /** Row cap applied when the command does not pass `limit`. */
  maxResults: number;
  /** Timestamp field used when neither the command nor the cluster profile names one. */
  defaultTimestampField: string;
  /** Ambient range used when the command passes neither `earliest` nor `latest`. */
  defaultEarliest: string;
  defaultLatest: string;
  /** Path of a JSON file with named cluster profiles (optional). */
  clustersFile?: string;
  credentials?: ClusterCredentials;
  auditEnabled: boolean;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function intEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function credentialsFromEnv(env: NodeJS.ProcessEnv): ClusterCredentials | undefined {
  if (env.ELASTIC_API_KEY) {
    return { type: 'api_key', apiKey: env.ELASTIC_API_KEY };
  }
  if (env.ELASTIC_USERNAME) {
    return {
      type: 'basic',
      username: env.ELASTIC_USERNAME,
      password: env.ELASTIC_PASSWORD || '',
    };
  }
  return undefined;
}

/**
 * Loads runtime configuration from environment variables.
 *
 * The scroll page size is clamped to 1--10000, the cluster's default
 * `index.max_result_window`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const pageSizeRaw = intEnv(env.SCROLL_PAGE_SIZE, 1000);
  const logLevel = LOG_LEVELS.find((level) => level === env.LOG_LEVEL) ?? 'info';

  return {
    requestTimeoutMs: Math.max(1, intEnv(env.REQUEST_TIMEOUT_MS, 30000)),
    scrollPageSize: Math.min(Math.max(1, pageSizeRaw), 10000),
    scrollKeepAlive: env.SCROLL_KEEP_ALIVE || '1m',
    maxResults: Math.max(1, intEnv(env.MAX_RESULTS, 10000)),
    defaultTimestampField: env.DEFAULT_TIMESTAMP_FIELD || '@timestamp',
    defaultEarliest: env.DEFAULT_EARLIEST || 'now-1h',
    defaultLatest: env.DEFAULT_LATEST || 'now',
    clustersFile: env.CLUSTERS_FILE || undefined,
    credentials: credentialsFromEnv(env),
    auditEnabled: env.AUDIT_ENABLED !== 'false',
    logLevel,
  };
}

const clusterProfileSchema = z
  .object({
    hosts: z.array(z.string().min(1)).min(1),
    tsfield: z.string().min(1).optional(),
    use_ssl: z.boolean().optional(),
    verify_certs: z.boolean().optional(),
    api_key: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
  })
  .strict();

const clustersFileSchema = z.record(clusterProfileSchema);

/** A named connection profile from the clusters file. */
export type ClusterProfile = z.infer<typeof clusterProfileSchema>;

/**
 * Reads and validates the clusters file.
 *
 * @throws {InvalidQueryConfiguration} If the file cannot be read or does not
 *   match the expected `{ "<name>": { "hosts": [...] } }` shape.
 */
export function loadClusterProfiles(path: string): Record<string, ClusterProfile> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidQueryConfiguration(`Cannot read clusters file ${path}: ${reason}`);
  }

  const parsed = clustersFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidQueryConfiguration(
      `Invalid clusters file ${path}: ${issue.path.join('.')} ${issue.message}`,
    );
  }
  return parsed.data;
}

export function profileCredentials(profile: ClusterProfile): ClusterCredentials | undefined {
  if (profile.api_key) {
    return { type: 'api_key', apiKey: profile.api_key };
  }
  if (profile.username) {
    return { type: 'basic', username: profile.username, password: profile.password ?? '' };
  }
  return undefined;
}
