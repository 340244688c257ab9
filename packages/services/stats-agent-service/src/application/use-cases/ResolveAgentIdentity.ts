import { getLogger, serializeError, toError } from '@clusterwatch/platform-core';
import { StatsAgentError } from '../errors';
import type { IClusterStatsFetcher } from '../interfaces';

const logger = getLogger('agent-identity');

export const AGENT_ID = 'clusterwatch.stats-agent';

export interface AgentIdentity {
  readonly agentId: string;
  readonly version: string;
  readonly clusterName: string;
}

/**
 * Fetches the cluster name once at startup. The agent cannot label its
 * metrics without it, so a failure here stops the agent from starting.
 */
export async function resolveAgentIdentity(fetcher: IClusterStatsFetcher, version: string): Promise<AgentIdentity> {
  try {
    const cluster = await fetcher.fetchClusterStats();
    logger.info('Cluster identity resolved', { cluster: cluster.cluster_name });
    return { agentId: AGENT_ID, version, clusterName: cluster.cluster_name };
  } catch (error) {
    const cause = toError(error);
    logger.error('Could not resolve cluster identity', { error: serializeError(cause) });
    throw StatsAgentError.identityUnavailable(cause.message, cause);
  }
}
