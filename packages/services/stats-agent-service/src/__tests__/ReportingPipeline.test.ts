import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReportingPipeline, nodeIdentifiers } from '../application/use-cases/ReportingPipeline';
import { TransportError, ParseError } from '../application/errors';
import { MetricKey } from '../domains/metrics/value-objects/MetricKey';
import { RateDerivationEngine } from '../domains/metrics/services/RateDerivationEngine';
import { RecordingEmitter, StubFetcher, clusterSnapshot, deferred, nodesSnapshot } from './fixtures';
import type { ClusterStats } from '@clusterwatch/shared-contracts';
import { createMetrics } from '@clusterwatch/platform-core';
import { PrometheusMetricEmitter } from '../infrastructure/emitters/PrometheusMetricEmitter';
import type { IMetricEmitter } from '../application/interfaces';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('@clusterwatch/platform-core', async importOriginal => {
  const actual = await importOriginal<typeof import('@clusterwatch/platform-core')>();
  return {
    ...actual,
    createLogger: vi.fn(() => mockLogger),
    getLogger: vi.fn(() => mockLogger),
  };
});

const DOCS_ADDED = 'V1/ClusterStats/Indices/DocsAdded';

describe('ReportingPipeline', () => {
  let fetcher: StubFetcher;
  let emitter: RecordingEmitter;
  let engine: RateDerivationEngine;
  let now: number;
  let pipeline: ReportingPipeline;

  beforeEach(() => {
    vi.clearAllMocks();
    fetcher = new StubFetcher();
    emitter = new RecordingEmitter();
    engine = new RateDerivationEngine();
    now = 0;
    pipeline = new ReportingPipeline({ fetcher, emitter, engine, clock: () => now });
  });

  describe('rate continuity across a failed cycle', () => {
    it('should resume from the last good baseline', async () => {
      fetcher.cluster = clusterSnapshot(100);
      now = 0;
      const first = await pipeline.runCycle();
      expect(first).toMatchObject({ status: 'completed', cycle: 1, timestamp: 0 });
      expect(emitter.valueOf(DOCS_ADDED)).toBe(0);

      emitter.clear();
      fetcher.cluster = new TransportError('cluster', 'connect ECONNREFUSED');
      now = 60;
      const second = await pipeline.runCycle();
      expect(second.status).toBe('failed');
      expect(emitter.emitted).toEqual([]);
      expect(engine.getState(MetricKey.forCluster(DOCS_ADDED))).toEqual({ lastValue: 100, lastObservedAt: 0 });

      fetcher.cluster = clusterSnapshot(160);
      now = 120;
      const third = await pipeline.runCycle();
      expect(third).toMatchObject({ status: 'completed', cycle: 3, timestamp: 120 });
      expect(emitter.valueOf(DOCS_ADDED)).toBe(0.5);
    });
  });

  describe('fetch failures', () => {
    it('should fail without emitting when the node snapshot cannot be parsed', async () => {
      fetcher.nodes = new ParseError('nodes', 'nodes: Expected object, received string');

      const result = await pipeline.runCycle();

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.error).toBeInstanceOf(ParseError);
      expect(emitter.emitted).toEqual([]);
      expect(engine.size()).toBe(0);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Poll cycle aborted, stats could not be fetched',
        expect.objectContaining({ error: expect.objectContaining({ name: 'ParseError' }) })
      );
    });

    it('should not fetch nodes when the cluster snapshot fails', async () => {
      fetcher.cluster = new TransportError('cluster', 'timeout');

      await pipeline.runCycle();

      expect(fetcher.clusterCalls).toBe(1);
      expect(fetcher.nodesCalls).toBe(0);
    });

    it('should return to idle after a failed cycle', async () => {
      fetcher.cluster = new TransportError('cluster', 'timeout');
      await pipeline.runCycle();
      expect(pipeline.getState()).toBe('idle');
    });
  });

  describe('derivation', () => {
    it('should report missing gauges as 0 and skip missing counters', async () => {
      fetcher.cluster = clusterSnapshot(100);

      const result = await pipeline.runCycle();

      // 13 gauges, the one counter present, 6 aggregates
      expect(result).toMatchObject({ status: 'completed', emitted: 20, failedEmissions: 0 });
      expect(emitter.valueOf('V1/ClusterStats/Nodes/Count/Total')).toBe(0);
      expect(emitter.names()).not.toContain('V1/ClusterStats/Indices/Store/SizePerSec');
      expect(engine.size()).toBe(1);
    });

    it('should report aggregates over every node', async () => {
      fetcher.cluster = clusterSnapshot(0, { nodes: { versions: ['1.7.0', '1.7.0', '1.7.3'] } });
      fetcher.nodes = nodesSnapshot({
        a1: { name: 'node-a', indices: { search: { query_total: 10 } } },
        b2: { name: 'node-b', indices: { search: { query_total: 5 } } },
      });

      await pipeline.runCycle();

      expect(emitter.valueOf('V1/QueriesStats/Search')).toBe(15);
      expect(emitter.valueOf('V1/QueriesStats/Delete')).toBe(0);
      expect(emitter.valueOf('V1/ClusterStats/NumberOfVersionsInCluster')).toBe(2);
    });

    it('should suffix node metrics with the node name', async () => {
      fetcher.nodes = nodesSnapshot({
        a1: {
          name: 'node-a',
          os: { swap: { used_in_bytes: 25, free_in_bytes: 75 }, load_average: [1.5, 1.0, 0.5] },
          jvm: { mem: { heap_used_percent: 42 } },
        },
      });

      await pipeline.runCycle();

      expect(emitter.valueOf('V1/NodeStats/Os/Swap/Percent/node-a')).toBe(0.25);
      expect(emitter.valueOf('V1/NodeStats/Os/LoadAverage/node-a')).toBe(1.5);
      expect(emitter.valueOf('V1/NodeStats/Jvm/Mem/HeapUsedPercent/node-a')).toBe(42);
    });

    it('should omit the load average when the node reports none', async () => {
      fetcher.nodes = nodesSnapshot({ a1: { name: 'node-a', os: { load_average: [] } } });

      await pipeline.runCycle();

      expect(emitter.names()).not.toContain('V1/NodeStats/Os/LoadAverage/node-a');
      expect(emitter.valueOf('V1/NodeStats/Os/Swap/Percent/node-a')).toBe(0);
    });

    it('should fall back to the node id when a node has no name', async () => {
      fetcher.nodes = nodesSnapshot({ x9: { jvm: { mem: { heap_used_percent: 7 } } } });

      await pipeline.runCycle();

      expect(emitter.valueOf('V1/NodeStats/Jvm/Mem/HeapUsedPercent/x9')).toBe(7);
    });

    it('should derive node counters per node', async () => {
      const withGets = (a: number, b: number) =>
        nodesSnapshot({
          a1: { name: 'node-a', indices: { get: { total: a } } },
          b2: { name: 'node-b', indices: { get: { total: b } } },
        });

      fetcher.nodes = withGets(100, 100);
      now = 1000;
      await pipeline.runCycle();

      emitter.clear();
      fetcher.nodes = withGets(160, 40);
      now = 1060;
      await pipeline.runCycle();

      expect(emitter.valueOf('V1/NodeStats/Indices/Get/Total/node-a')).toBe(1);
      expect(emitter.valueOf('V1/NodeStats/Indices/Get/Total/node-b')).toBe(0);
    });

    it('should report nodes sharing a name under their node ids', async () => {
      const withGets = (first: number, second: number, other: number) =>
        nodesSnapshot({
          id1: { name: 'es', indices: { get: { total: first } } },
          id2: { name: 'es', indices: { get: { total: second } } },
          id3: { name: 'node-c', indices: { get: { total: other } } },
        });

      fetcher.nodes = withGets(1000, 10, 50);
      now = 0;
      await pipeline.runCycle();

      emitter.clear();
      fetcher.nodes = withGets(1060, 20, 50);
      now = 60;
      await pipeline.runCycle();

      const gets = emitter.emitted.filter(metric => metric.name.startsWith('V1/NodeStats/Indices/Get/Total/'));
      expect(gets.map(metric => metric.name)).toEqual([
        'V1/NodeStats/Indices/Get/Total/id1',
        'V1/NodeStats/Indices/Get/Total/id2',
        'V1/NodeStats/Indices/Get/Total/node-c',
      ]);
      expect(gets.map(metric => metric.value)).toEqual([1, 10 / 60, 0]);
      expect(engine.getState(MetricKey.forNode('V1/NodeStats/Indices/Get/Total', 'es'))).toBeUndefined();
    });
  });

  describe('emission', () => {
    it('should stop serving values the latest cycle did not report', async () => {
      const metrics = createMetrics('stats-agent-service');
      const reported = async (): Promise<string[]> =>
        (await metrics.exportPrometheusFormat())
          .split('\n')
          .filter(line => line.startsWith('clusterwatch_stats_agent_service_reported_value{'));
      const loadAverage = (lines: string[]) =>
        lines.some(line => line.includes('metric="V1/NodeStats/Os/LoadAverage/node-a"'));
      pipeline = new ReportingPipeline({ fetcher, emitter: new PrometheusMetricEmitter(metrics), engine, clock: () => now });

      try {
        fetcher.nodes = nodesSnapshot({ a1: { name: 'node-a', os: { load_average: [3.5] } } });
        await pipeline.runCycle();
        expect(loadAverage(await reported())).toBe(true);

        fetcher.nodes = nodesSnapshot({ a1: { name: 'node-a', os: { load_average: [] } } });
        now = 60;
        await pipeline.runCycle();
        const afterOmission = await reported();
        expect(loadAverage(afterOmission)).toBe(false);
        expect(afterOmission.length).toBeGreaterThan(0);

        fetcher.cluster = new TransportError('cluster', 'connect ECONNREFUSED');
        now = 120;
        const failed = await pipeline.runCycle();
        expect(failed.status).toBe('failed');
        expect(await reported()).toEqual([]);
      } finally {
        metrics.destroy();
      }
    });

    it('should clear the emitter before emitting and after a failed fetch', async () => {
      const calls: string[] = [];
      const tracking: IMetricEmitter = {
        emit(name) {
          calls.push(name);
        },
        clear() {
          calls.push('clear');
        },
      };
      pipeline = new ReportingPipeline({ fetcher, emitter: tracking, engine, clock: () => now });

      await pipeline.runCycle();
      expect(calls[0]).toBe('clear');
      expect(calls.filter(call => call === 'clear')).toHaveLength(1);

      calls.length = 0;
      fetcher.nodes = new ParseError('nodes', 'nodes: Required');
      await pipeline.runCycle();
      expect(calls).toEqual(['clear']);
    });

    it('should still emit when clearing the emitter fails', async () => {
      const delivered: string[] = [];
      const stale: IMetricEmitter = {
        emit(name) {
          delivered.push(name);
        },
        clear() {
          throw new Error('registry unavailable');
        },
      };
      pipeline = new ReportingPipeline({ fetcher, emitter: stale, engine, clock: () => now });

      const result = await pipeline.runCycle();

      expect(result).toMatchObject({ status: 'completed', emitted: 20, failedEmissions: 0 });
      expect(delivered).toHaveLength(20);
      expect(mockLogger.error).toHaveBeenCalledWith('Clearing reported metrics failed', expect.any(Object));
    });

    it('should keep emitting after one emission fails', async () => {
      fetcher.cluster = clusterSnapshot(100);
      const delivered: string[] = [];
      const failing: IMetricEmitter = {
        emit(name) {
          if (name === 'V1/ClusterStats/Indices/Docs/Deleted') {
            throw new RangeError('rejected');
          }
          delivered.push(name);
        },
      };
      pipeline = new ReportingPipeline({ fetcher, emitter: failing, engine, clock: () => now });

      const result = await pipeline.runCycle();

      expect(result).toMatchObject({ status: 'completed', emitted: 19, failedEmissions: 1 });
      expect(delivered).toHaveLength(19);
      expect(delivered).toContain('V1/QueriesStats/Delete');
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Metric emission failed',
        expect.objectContaining({ metric: 'V1/ClusterStats/Indices/Docs/Deleted' })
      );
    });
  });

  describe('overlap', () => {
    it('should skip a cycle requested while another is in flight', async () => {
      const pending = deferred<ClusterStats>();
      fetcher.fetchClusterStats = () => pending.promise;

      const first = pipeline.runCycle();
      expect(pipeline.getState()).toBe('fetching');

      const second = await pipeline.runCycle();
      expect(second.status).toBe('skipped');

      pending.resolve(clusterSnapshot(100));
      await expect(first).resolves.toMatchObject({ status: 'completed', cycle: 1 });
      expect(pipeline.getState()).toBe('idle');

      const third = await pipeline.runCycle();
      expect(third).toMatchObject({ status: 'completed', cycle: 2 });
    });
  });
});

describe('nodeIdentifiers', () => {
  it('should use names that are unique within the snapshot', () => {
    expect(nodeIdentifiers({ a1: { name: 'node-a' }, b2: { name: 'node-b' } })).toEqual(
      new Map([
        ['a1', 'node-a'],
        ['b2', 'node-b'],
      ])
    );
  });

  it('should fall back to the node id for missing, empty and repeated names', () => {
    expect(nodeIdentifiers({ a1: {}, b2: { name: '' }, c3: { name: 'es' }, d4: { name: 'es' }, e5: { name: 'solo' } })).toEqual(
      new Map([
        ['a1', 'a1'],
        ['b2', 'b2'],
        ['c3', 'c3'],
        ['d4', 'd4'],
        ['e5', 'solo'],
      ])
    );
  });
});
