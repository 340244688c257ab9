/**
 * Per-node metrics. Reported names get `/<nodeIdentifier>` appended.
 *
 * Some counters predate the `V1/` namespace; their names stay as they are
 * because existing dashboards query them.
 */

import type { NodeStats, ThreadPoolName } from '@clusterwatch/shared-contracts';
import { firstLoadAverage, swapUsedRatio } from '../services/special-values';
import { computed, counter, gauge, type MetricDefinition } from './types';

const THREAD_POOLS: readonly [ThreadPoolName, string][] = [
  ['search', 'Search'],
  ['index', 'Index'],
  ['bulk', 'Bulk'],
  ['get', 'Get'],
  ['merge', 'Merge'],
  ['suggest', 'Suggest'],
  ['warmer', 'Warmer'],
  ['flush', 'Flush'],
  ['refresh', 'Refresh'],
  ['generic', 'Generic'],
];

const threadPoolMetrics = (): MetricDefinition<NodeStats>[] =>
  THREAD_POOLS.flatMap(([pool, label]): MetricDefinition<NodeStats>[] => [
    counter(`NodeStats/ThreadPool/${label}/Completed`, 'threads', n => n.thread_pool?.[pool]?.completed),
    gauge(`V1/NodeStats/ThreadPool/${label}/Queue`, 'threads', n => n.thread_pool?.[pool]?.queue),
  ]);

export const NODE_METRICS: readonly MetricDefinition<NodeStats>[] = [
  // Documents and store
  gauge('V1/NodeStats/Nodes/Indices/Docs/Count', 'documents', n => n.indices?.docs?.count),
  gauge('V1/NodeStats/Indices/Store/Size', 'bytes', n => n.indices?.store?.size_in_bytes),
  counter('V1/NodeStats/Indices/Store/SizePerSec', 'bytes/second', n => n.indices?.store?.size_in_bytes),
  gauge('V1/NodeStats/Nodes/Indices/Docs/Deleted', 'documents', n => n.indices?.docs?.deleted),

  // Indexing
  counter('V1/NodeStats/Indices/Indexing/Index', 'queries', n => n.indices?.indexing?.index_total),
  counter('V1/NodeStats/Indices/Indexing/IndexTimeInMillis', 'ms', n => n.indices?.indexing?.index_time_in_millis),
  counter('V1/NodeStats/Indices/Indexing/DeleteTotal', 'queries', n => n.indices?.indexing?.delete_total),
  counter('V1/NodeStats/Indices/Indexing/DeleteTimeInMillis', 'ms', n => n.indices?.indexing?.delete_time_in_millis),
  counter('V1/NodeStats/Indices/Refresh/Total', 'refreshes', n => n.indices?.refresh?.total),
  counter('V1/NodeStats/Indices/Refresh/TotalTimeInMillis', 'ms', n => n.indices?.refresh?.total_time_in_millis),
  counter('V1/NodeStats/Indices/Flush/Total', 'flushes', n => n.indices?.flush?.total),
  counter('V1/NodeStats/Indices/Flush/TotalTimeInMillis', 'ms', n => n.indices?.flush?.total_time_in_millis),
  counter('V1/NodeStats/Indices/Warmer/Total', 'queries', n => n.indices?.warmer?.total),
  counter('V1/NodeStats/Indices/Warmer/TotalTimeInMillis', 'ms', n => n.indices?.warmer?.total_time_in_millis),

  // Search and get
  counter('V1/NodeStats/Indices/Search/QueryTotal', 'requests', n => n.indices?.search?.query_total),
  counter('V1/NodeStats/Indices/Search/QueryTimeInMillis', 'ms', n => n.indices?.search?.query_time_in_millis),
  counter('V1/NodeStats/Indices/Search/FetchTotal', 'requests', n => n.indices?.search?.fetch_total),
  counter('V1/NodeStats/Indices/Search/FetchTimeInMillis', 'ms', n => n.indices?.search?.fetch_time_in_millis),
  counter('V1/NodeStats/Indices/Get/Total', 'requests', n => n.indices?.get?.total),
  counter('V1/NodeStats/Indices/Get/TimeInMillis', 'ms', n => n.indices?.get?.time_in_millis),
  counter('V1/NodeStats/Indices/Suggest/Total', 'requests', n => n.indices?.suggest?.total),
  counter('V1/NodeStats/Indices/Suggest/TimeInMillis', 'ms', n => n.indices?.suggest?.time_in_millis),

  // Merges and segments
  counter('V1/NodeStats/Indices/Merges/Total', 'merges', n => n.indices?.merges?.total),
  counter('V1/NodeStats/Indices/Merges/TotalSizeInBytes', 'bytes/second', n => n.indices?.merges?.total_size_in_bytes),
  counter('V1/NodeStats/Indices/Merges/TotalTimeInMillis', 'ms', n => n.indices?.merges?.total_time_in_millis),
  counter('V1/NodeStats/Indices/Merges/TotalDocs', 'docs', n => n.indices?.merges?.total_docs),
  gauge('V1/NodeStats/Indices/Segments/Count', 'segments', n => n.indices?.segments?.count),

  // Caches
  gauge('V1/NodeStats/Indices/FilterCache/Size', 'bytes', n => n.indices?.filter_cache?.memory_size_in_bytes),
  gauge('V1/NodeStats/Indices/FilterCache/Evictions', 'evictions', n => n.indices?.filter_cache?.evictions),
  gauge('V1/NodeStats/Indices/Fielddata/Size', 'bytes', n => n.indices?.fielddata?.memory_size_in_bytes),
  gauge('V1/NodeStats/Indices/Fielddata/Evictions', 'evictions', n => n.indices?.fielddata?.evictions),
  gauge('V1/NodeStats/Indices/IdCache/Size', 'bytes', n => n.indices?.id_cache?.memory_size_in_bytes),
  gauge('V1/NodeStats/Indices/Completion/Size', 'bytes', n => n.indices?.completion?.size_in_bytes),

  // JVM, process and OS
  gauge('V1/NodeStats/Jvm/Mem/HeapUsedPercent', 'percent', n => n.jvm?.mem?.heap_used_percent),
  gauge('V1/NodeStats/Process/Cpu/Percent', 'percent', n => n.process?.cpu?.percent),
  computed('V1/NodeStats/Os/LoadAverage', 'units', n => firstLoadAverage(n.os?.load_average)),
  counter('NodeStats/Jvm/Gc/Old/CollectionCount', 'collections', n => n.jvm?.gc?.collectors?.old?.collection_count),
  counter(
    'NodeStats/Jvm/Gc/Old/CollectionTime',
    'milliseconds',
    n => n.jvm?.gc?.collectors?.old?.collection_time_in_millis
  ),
  counter(
    'NodeStats/Jvm/Gc/Young/CollectionCount',
    'collections',
    n => n.jvm?.gc?.collectors?.young?.collection_count
  ),
  counter(
    'NodeStats/Jvm/Gc/Young/CollectionTime',
    'milliseconds',
    n => n.jvm?.gc?.collectors?.young?.collection_time_in_millis
  ),
  computed('V1/NodeStats/Os/Swap/Percent', 'percent', n => swapUsedRatio(n.os?.swap)),

  // File system and descriptors
  counter('NodeStats/Fs/Total/DiskReadSizeInBytes', 'bytes', n => n.fs?.total?.disk_read_size_in_bytes),
  counter('NodeStats/Fs/Total/DiskWriteSizeInBytes', 'bytes', n => n.fs?.total?.disk_write_size_in_bytes),
  gauge('V1/NodeStats/Process/OpenFileDescriptors', 'descriptors', n => n.process?.open_file_descriptors),
  counter('NodeStats/Indices/Store/ThrottleTimeInMillis', 'ms', n => n.indices?.store?.throttle_time_in_millis),

  // Network
  counter('NodeStats/Transport/ServerOpen', 'bytes', n => n.transport?.server_open),
  counter('NodeStats/Http/TotalOpened', 'connections', n => n.http?.total_opened),
  counter('NodeStats/Transport/TxSizeInBytes', 'bytes', n => n.transport?.tx_size_in_bytes),
  counter('NodeStats/Transport/RxSizeInBytes', 'bytes', n => n.transport?.rx_size_in_bytes),

  ...threadPoolMetrics(),
];
