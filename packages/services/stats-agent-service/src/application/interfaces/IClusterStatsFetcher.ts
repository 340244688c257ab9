import type { ClusterStats, NodesStats } from '@clusterwatch/shared-contracts';

/**
 * Source of stats snapshots.
 *
 * Implementations reject with TransportError when the endpoint cannot be
 * reached or answers with a non-success status, and with ParseError when the
 * body does not match the snapshot contract.
 */
export interface IClusterStatsFetcher {
  fetchClusterStats(): Promise<ClusterStats>;
  fetchNodesStats(): Promise<NodesStats>;
}
