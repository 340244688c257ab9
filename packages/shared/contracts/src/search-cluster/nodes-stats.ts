/**
 * Nodes stats contract
 *
 * Shape of the `/_nodes/stats` response. `nodes` is keyed by node id; every
 * entry carries the human readable node name used in metric paths.
 */

import { z } from 'zod';
import { StatValueSchema, statSection } from './common.js';

const timedTotal = () => statSection({ total: StatValueSchema, total_time_in_millis: StatValueSchema });
const timedCount = () => statSection({ total: StatValueSchema, time_in_millis: StatValueSchema });
const cacheSize = () => statSection({ memory_size_in_bytes: StatValueSchema, evictions: StatValueSchema });
const gcCollector = () =>
  statSection({ collection_count: StatValueSchema, collection_time_in_millis: StatValueSchema });

export const ThreadPoolStatsSchema = statSection({
  completed: StatValueSchema,
  queue: StatValueSchema,
});

/**
 * Older clusters report `[1m, 5m, 15m]`, newer ones an object keyed by
 * window. Both normalize to the ordered sequence; a missing 1m value yields
 * an empty sequence.
 */
export const LoadAverageSchema = z.union([
  z.array(z.number()),
  z
    .object({ '1m': StatValueSchema, '5m': StatValueSchema, '15m': StatValueSchema })
    .transform(windows => {
      const ordered: number[] = [];
      for (const value of [windows['1m'], windows['5m'], windows['15m']]) {
        if (value === undefined) break;
        ordered.push(value);
      }
      return ordered;
    }),
]);

export const NodeStatsSchema = z.object({
  name: z.string().optional(),
  host: z.string().optional(),
  indices: statSection({
    docs: statSection({ count: StatValueSchema, deleted: StatValueSchema }),
    store: statSection({ size_in_bytes: StatValueSchema, throttle_time_in_millis: StatValueSchema }),
    indexing: statSection({
      index_total: StatValueSchema,
      index_time_in_millis: StatValueSchema,
      delete_total: StatValueSchema,
      delete_time_in_millis: StatValueSchema,
    }),
    refresh: timedTotal(),
    flush: timedTotal(),
    warmer: timedTotal(),
    search: statSection({
      query_total: StatValueSchema,
      query_time_in_millis: StatValueSchema,
      fetch_total: StatValueSchema,
      fetch_time_in_millis: StatValueSchema,
    }),
    get: timedCount(),
    suggest: timedCount(),
    merges: statSection({
      total: StatValueSchema,
      total_size_in_bytes: StatValueSchema,
      total_time_in_millis: StatValueSchema,
      total_docs: StatValueSchema,
    }),
    segments: statSection({ count: StatValueSchema }),
    filter_cache: cacheSize(),
    fielddata: cacheSize(),
    id_cache: statSection({ memory_size_in_bytes: StatValueSchema }),
    completion: statSection({ size_in_bytes: StatValueSchema }),
  }),
  jvm: statSection({
    mem: statSection({ heap_used_percent: StatValueSchema }),
    gc: statSection({
      collectors: statSection({ old: gcCollector(), young: gcCollector() }),
    }),
  }),
  process: statSection({
    cpu: statSection({ percent: StatValueSchema }),
    open_file_descriptors: StatValueSchema,
  }),
  os: statSection({
    load_average: LoadAverageSchema.optional(),
    swap: statSection({ used_in_bytes: StatValueSchema, free_in_bytes: StatValueSchema }),
  }),
  fs: statSection({
    total: statSection({ disk_read_size_in_bytes: StatValueSchema, disk_write_size_in_bytes: StatValueSchema }),
  }),
  transport: statSection({
    server_open: StatValueSchema,
    tx_size_in_bytes: StatValueSchema,
    rx_size_in_bytes: StatValueSchema,
  }),
  http: statSection({ total_opened: StatValueSchema }),
  thread_pool: statSection({
    search: ThreadPoolStatsSchema,
    index: ThreadPoolStatsSchema,
    bulk: ThreadPoolStatsSchema,
    get: ThreadPoolStatsSchema,
    merge: ThreadPoolStatsSchema,
    suggest: ThreadPoolStatsSchema,
    warmer: ThreadPoolStatsSchema,
    flush: ThreadPoolStatsSchema,
    refresh: ThreadPoolStatsSchema,
    generic: ThreadPoolStatsSchema,
  }),
});

export const NodesStatsSchema = z.object({
  cluster_name: z.string().optional(),
  nodes: z.record(z.string(), NodeStatsSchema).default({}),
});

export type NodeStats = z.infer<typeof NodeStatsSchema>;
export type NodesStats = z.infer<typeof NodesStatsSchema>;
export type ThreadPoolName = keyof NonNullable<NodeStats['thread_pool']>;
