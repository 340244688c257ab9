import type { AggregateResult } from '../services/StatsAggregator';
import { computed, type MetricDefinition } from './types';

export const AGGREGATE_METRICS: readonly MetricDefinition<AggregateResult>[] = [
  computed('V1/ClusterStats/NumberOfVersionsInCluster', 'versions', a => a.versionCount),
  computed('V1/QueriesStats/Search', 'queries', a => a.queries.search),
  computed('V1/QueriesStats/Fetch', 'queries', a => a.queries.fetch),
  computed('V1/QueriesStats/Get', 'queries', a => a.queries.get),
  computed('V1/QueriesStats/Index', 'queries', a => a.queries.index),
  computed('V1/QueriesStats/Delete', 'queries', a => a.queries.delete),
];
