/**
 * Resolves the cluster connection for one invocation: either `eaddr` names a
 * profile in the clusters file, or it is itself the node list.
 *
 * @module
 */
import {
  ClusterProfile,
  loadClusterProfiles,
  profileCredentials,
  RuntimeConfig,
} from '../lib/config';
import { ClusterEndpoint, parseEndpoints } from '../lib/endpoints';
import { TransportOptions } from '../lib/transport';
import { CommandArguments } from './commandArgs';

export interface ConnectionSettings {
  endpoints: ClusterEndpoint[];
  transport: TransportOptions;
  /** Timestamp field after applying argument, profile and config defaults, in that order. */
  timestampField: string;
}

/**
 * Command arguments override the profile, which overrides the runtime
 * configuration. Certificates are verified unless `verify_certs=false`.
 *
 * @throws {InvalidQueryConfiguration} If the node list is malformed or the
 *   clusters file is unreadable.
 */
export function resolveConnection(args: CommandArguments, config: RuntimeConfig): ConnectionSettings {
  const profiles = config.clustersFile ? loadClusterProfiles(config.clustersFile) : {};
  const profile: ClusterProfile | undefined = Object.hasOwn(profiles, args.eaddr)
    ? profiles[args.eaddr]
    : undefined;

  const useSsl = args.use_ssl ?? profile?.use_ssl ?? false;
  const verifyCerts = args.verify_certs ?? profile?.verify_certs ?? true;
  const credentials = (profile && profileCredentials(profile)) ?? config.credentials;

  return {
    endpoints: parseEndpoints(profile ? profile.hosts : args.eaddr, useSsl),
    transport: { timeoutMs: config.requestTimeoutMs, verifyCerts, credentials },
    timestampField: args.tsfield?.trim() || profile?.tsfield || config.defaultTimestampField,
  };
}
