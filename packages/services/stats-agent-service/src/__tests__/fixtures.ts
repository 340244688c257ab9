import type { ClusterStats, NodeStats, NodesStats } from '@clusterwatch/shared-contracts';
import type { IClusterStatsFetcher, IMetricEmitter } from '../application/interfaces';
import type { DerivedMetric } from '../domains/metrics';

export function clusterSnapshot(docsCount: number, overrides: Partial<ClusterStats> = {}): ClusterStats {
  return {
    cluster_name: 'test-cluster',
    indices: { docs: { count: docsCount, deleted: 0 } },
    nodes: { versions: ['1.7.0'] },
    ...overrides,
  };
}

export function nodesSnapshot(nodes: Record<string, NodeStats> = {}): NodesStats {
  return { cluster_name: 'test-cluster', nodes };
}

export class StubFetcher implements IClusterStatsFetcher {
  cluster: ClusterStats | Error = clusterSnapshot(0);
  nodes: NodesStats | Error = nodesSnapshot();
  clusterCalls = 0;
  nodesCalls = 0;

  async fetchClusterStats(): Promise<ClusterStats> {
    this.clusterCalls++;
    if (this.cluster instanceof Error) throw this.cluster;
    return this.cluster;
  }

  async fetchNodesStats(): Promise<NodesStats> {
    this.nodesCalls++;
    if (this.nodes instanceof Error) throw this.nodes;
    return this.nodes;
  }
}

export class RecordingEmitter implements IMetricEmitter {
  readonly emitted: DerivedMetric[] = [];

  emit(name: string, units: string, value: number): void {
    this.emitted.push({ name, units, value });
  }

  valueOf(name: string): number | undefined {
    return this.emitted.find(metric => metric.name === name)?.value;
  }

  names(): string[] {
    return this.emitted.map(metric => metric.name);
  }

  clear(): void {
    this.emitted.length = 0;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
