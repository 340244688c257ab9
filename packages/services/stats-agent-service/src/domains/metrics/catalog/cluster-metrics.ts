import type { ClusterStats } from '@clusterwatch/shared-contracts';
import { counter, gauge, type MetricDefinition } from './types';

export const CLUSTER_METRICS: readonly MetricDefinition<ClusterStats>[] = [
  // Documents
  gauge('V1/ClusterStats/Indices/Docs/Count', 'documents', s => s.indices?.docs?.count),
  gauge('V1/ClusterStats/Indices/Docs/Deleted', 'documents', s => s.indices?.docs?.deleted),
  counter('V1/ClusterStats/Indices/DocsAdded', 'documents/second', s => s.indices?.docs?.count),

  // Nodes
  gauge('V1/ClusterStats/Nodes/Count/Total', 'nodes', s => s.nodes?.count?.total),
  gauge('V1/ClusterStats/Nodes/Count/Master and data', 'nodes', s => s.nodes?.count?.master_data),
  gauge('V1/ClusterStats/Nodes/Count/Master only', 'nodes', s => s.nodes?.count?.master_only),
  gauge('V1/ClusterStats/Nodes/Count/Data only', 'nodes', s => s.nodes?.count?.data_only),
  gauge('V1/ClusterStats/Nodes/Count/Client', 'nodes', s => s.nodes?.count?.client),

  // Indices and shards
  gauge('V1/ClusterStats/Indices/Indices', 'indices', s => s.indices?.count),
  gauge('V1/ClusterStats/Indices/Shards', 'shards', s => s.indices?.shards?.total),
  gauge('V1/ClusterStats/Indices/Primaries', 'shards', s => s.indices?.shards?.primaries),
  gauge('V1/ClusterStats/Indices/Replication', 'shards', s => s.indices?.shards?.replication),
  gauge('V1/ClusterStats/Indices/Segments/Count', 'segments', s => s.indices?.segments?.count),

  // Store
  gauge('V1/ClusterStats/Indices/Store/Size', 'bytes', s => s.indices?.store?.size_in_bytes),
  counter('V1/ClusterStats/Indices/Store/SizePerSec', 'bytes/second', s => s.indices?.store?.size_in_bytes),
  counter('V1/ClusterStats/Indices/Store/ThrottleTime', 'millis', s => s.indices?.store?.throttle_time_in_millis),
];
