import { describe, it, expect } from 'vitest';
import {
  AGGREGATE_METRICS,
  CLUSTER_METRICS,
  METRIC_CLASSIFICATION,
  NODE_METRICS,
  classify,
} from '../domains/metrics/catalog';

describe('metric catalog', () => {
  const all = [...CLUSTER_METRICS, ...AGGREGATE_METRICS, ...NODE_METRICS];

  it('should classify every metric exactly once', () => {
    const names = all.map(definition => definition.name);
    expect(new Set(names).size).toBe(names.length);
    expect(METRIC_CLASSIFICATION.size).toBe(names.length);
  });

  it('should classify the cluster document metrics', () => {
    expect(classify('V1/ClusterStats/Indices/Docs/Count')).toBe('gauge');
    expect(classify('V1/ClusterStats/Indices/DocsAdded')).toBe('counter');
    expect(classify('V1/ClusterStats/Indices/Store/ThrottleTime')).toBe('counter');
  });

  it('should classify aggregates and special node metrics as computed', () => {
    expect(classify('V1/ClusterStats/NumberOfVersionsInCluster')).toBe('computed');
    expect(classify('V1/QueriesStats/Search')).toBe('computed');
    expect(classify('V1/NodeStats/Os/Swap/Percent')).toBe('computed');
    expect(classify('V1/NodeStats/Os/LoadAverage')).toBe('computed');
  });

  it('should keep the unprefixed node counter names', () => {
    expect(classify('NodeStats/Jvm/Gc/Old/CollectionCount')).toBe('counter');
    expect(classify('NodeStats/Http/TotalOpened')).toBe('counter');
    expect(classify('NodeStats/ThreadPool/Generic/Completed')).toBe('counter');
    expect(classify('V1/NodeStats/ThreadPool/Generic/Queue')).toBe('gauge');
  });

  it('should cover all ten thread pools', () => {
    const completed = NODE_METRICS.filter(d => /^NodeStats\/ThreadPool\/\w+\/Completed$/.test(d.name));
    const queued = NODE_METRICS.filter(d => /^V1\/NodeStats\/ThreadPool\/\w+\/Queue$/.test(d.name));
    expect(completed).toHaveLength(10);
    expect(queued).toHaveLength(10);
  });

  it('should return undefined for unknown names', () => {
    expect(classify('V1/Unknown')).toBeUndefined();
  });

  it('should read primaries from the primaries field', () => {
    const primaries = CLUSTER_METRICS.find(d => d.name === 'V1/ClusterStats/Indices/Primaries');
    expect(primaries?.kind).toBe('gauge');
    if (primaries?.kind !== 'gauge') return;
    expect(primaries.read({ cluster_name: 'c', indices: { shards: { total: 10, primaries: 5 } } })).toBe(5);
  });
});
