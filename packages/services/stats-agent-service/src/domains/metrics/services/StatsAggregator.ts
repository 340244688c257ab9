/**
 * StatsAggregator
 *
 * Cross-node summaries that no single snapshot field carries. Everything
 * here is a pure function of the current snapshot.
 */

import type { ClusterStats, NodesStats } from '@clusterwatch/shared-contracts';

export interface QueryTotals {
  search: number;
  fetch: number;
  get: number;
  index: number;
  delete: number;
}

export interface AggregateResult {
  versionCount: number;
  queries: QueryTotals;
}

export function emptyQueryTotals(): QueryTotals {
  return { search: 0, fetch: 0, get: 0, index: 0, delete: 0 };
}

export function distinctVersionCount(cluster: Pick<ClusterStats, 'nodes'>): number {
  return new Set(cluster.nodes?.versions ?? []).size;
}

export function totalQueries(nodes: Pick<NodesStats, 'nodes'>): QueryTotals {
  const totals = emptyQueryTotals();

  for (const node of Object.values(nodes.nodes)) {
    const indices = node.indices;
    totals.search += indices?.search?.query_total ?? 0;
    totals.fetch += indices?.search?.fetch_total ?? 0;
    totals.get += indices?.get?.total ?? 0;
    totals.index += indices?.indexing?.index_total ?? 0;
    totals.delete += indices?.indexing?.delete_total ?? 0;
  }

  return totals;
}

export function aggregate(cluster: Pick<ClusterStats, 'nodes'>, nodes: Pick<NodesStats, 'nodes'>): AggregateResult {
  return {
    versionCount: distinctVersionCount(cluster),
    queries: totalQueries(nodes),
  };
}
