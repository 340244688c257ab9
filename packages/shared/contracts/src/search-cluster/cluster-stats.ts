/**
 * Cluster stats contract
 *
 * Shape of the `/_cluster/stats` response, restricted to the fields the
 * stats agent reports. Unknown fields are stripped.
 */

import { z } from 'zod';
import { StatValueSchema, statSection } from './common.js';

export const ClusterNodeCountSchema = z.object({
  total: StatValueSchema,
  master_data: StatValueSchema,
  master_only: StatValueSchema,
  data_only: StatValueSchema,
  client: StatValueSchema,
});

export const ClusterStatsSchema = z.object({
  cluster_name: z.string().min(1),
  timestamp: StatValueSchema,
  nodes: statSection({
    count: ClusterNodeCountSchema.optional(),
    versions: z.array(z.string()).optional(),
  }),
  indices: statSection({
    count: StatValueSchema,
    docs: statSection({ count: StatValueSchema, deleted: StatValueSchema }),
    shards: statSection({ total: StatValueSchema, primaries: StatValueSchema, replication: StatValueSchema }),
    segments: statSection({ count: StatValueSchema }),
    store: statSection({ size_in_bytes: StatValueSchema, throttle_time_in_millis: StatValueSchema }),
  }),
});

export type ClusterStats = z.infer<typeof ClusterStatsSchema>;
