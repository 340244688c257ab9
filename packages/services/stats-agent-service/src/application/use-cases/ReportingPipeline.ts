/**
 * ReportingPipeline
 *
 * Runs one poll cycle: fetch both snapshots, aggregate, derive every metric
 * in the catalog, then emit. Cycles never overlap; a call that arrives while
 * a cycle is in flight is skipped.
 *
 * States: idle -> fetching -> aggregating -> deriving -> emitting -> idle,
 * or fetching -> failed -> idle.
 */

import type { ClusterStats, NodesStats } from '@clusterwatch/shared-contracts';
import { generateCorrelationId, getLogger, runWithContext, serializeError, toError } from '@clusterwatch/platform-core';
import {
  AGGREGATE_METRICS,
  CLUSTER_METRICS,
  MetricKey,
  NODE_METRICS,
  aggregate,
  nodeMetricName,
  type AggregateResult,
  type DerivedMetric,
  type MetricDefinition,
  type RateDerivationEngine,
} from '../../domains/metrics';
import type { IClusterStatsFetcher, IMetricEmitter } from '../interfaces';

const logger = getLogger('reporting-pipeline');

export type PipelineState = 'idle' | 'fetching' | 'aggregating' | 'deriving' | 'emitting' | 'failed';

export type CycleResult =
  | { status: 'completed'; cycle: number; timestamp: number; emitted: number; failedEmissions: number }
  | { status: 'failed'; cycle: number; error: Error }
  | { status: 'skipped'; reason: string };

/** Epoch seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export interface ReportingPipelineDeps {
  fetcher: IClusterStatsFetcher;
  emitter: IMetricEmitter;
  engine: RateDerivationEngine;
  clock?: Clock;
}

interface Snapshots {
  cluster: ClusterStats;
  nodes: NodesStats;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled metric definition: ${JSON.stringify(value)}`);
}

/**
 * Maps each node id to the identifier its metrics are reported under. Nodes
 * are reported under their name; the node id stands in when a node has no
 * name or shares it with another node in the same snapshot.
 */
export function nodeIdentifiers(nodes: Readonly<Record<string, { name?: string }>>): Map<string, string> {
  const nameCounts = new Map<string, number>();
  for (const node of Object.values(nodes)) {
    if (node.name) {
      nameCounts.set(node.name, (nameCounts.get(node.name) ?? 0) + 1);
    }
  }

  const identifiers = new Map<string, string>();
  for (const [nodeId, node] of Object.entries(nodes)) {
    const name = node.name;
    identifiers.set(nodeId, name && nameCounts.get(name) === 1 ? name : nodeId);
  }
  return identifiers;
}

export class ReportingPipeline {
  private readonly fetcher: IClusterStatsFetcher;
  private readonly emitter: IMetricEmitter;
  private readonly engine: RateDerivationEngine;
  private readonly clock: Clock;

  private state: PipelineState = 'idle';
  private inFlight = false;
  private cycleCount = 0;

  constructor(deps: ReportingPipelineDeps) {
    this.fetcher = deps.fetcher;
    this.emitter = deps.emitter;
    this.engine = deps.engine;
    this.clock = deps.clock ?? systemClock;
  }

  getState(): PipelineState {
    return this.state;
  }

  async runCycle(): Promise<CycleResult> {
    if (this.inFlight) {
      logger.warn('Poll cycle still in flight, skipping', { state: this.state });
      return { status: 'skipped', reason: `cycle in flight (${this.state})` };
    }

    this.inFlight = true;
    const cycle = ++this.cycleCount;
    try {
      return await runWithContext({ correlationId: generateCorrelationId(), cycle }, () => this.execute(cycle));
    } finally {
      this.transition('idle');
      this.inFlight = false;
    }
  }

  private async execute(cycle: number): Promise<CycleResult> {
    const startedAt = Date.now();

    this.transition('fetching');
    let snapshots: Snapshots;
    try {
      snapshots = await this.fetchSnapshots();
    } catch (error) {
      this.transition('failed');
      logger.warn('Poll cycle aborted, stats could not be fetched', { error: serializeError(error) });
      await this.clearEmitter();
      return { status: 'failed', cycle, error: toError(error) };
    }

    this.transition('aggregating');
    const aggregates = aggregate(snapshots.cluster, snapshots.nodes);

    this.transition('deriving');
    const timestamp = this.clock();
    const metrics = this.derive(snapshots, aggregates, timestamp);

    this.transition('emitting');
    await this.clearEmitter();
    const failedEmissions = await this.emitAll(metrics);

    logger.debug('Poll cycle completed', {
      metrics: metrics.length,
      failedEmissions,
      nodes: Object.keys(snapshots.nodes.nodes).length,
      durationMs: Date.now() - startedAt,
    });

    return {
      status: 'completed',
      cycle,
      timestamp,
      emitted: metrics.length - failedEmissions,
      failedEmissions,
    };
  }

  private async fetchSnapshots(): Promise<Snapshots> {
    const cluster = await this.fetcher.fetchClusterStats();
    const nodes = await this.fetcher.fetchNodesStats();
    return { cluster, nodes };
  }

  private derive(snapshots: Snapshots, aggregates: AggregateResult, timestamp: number): DerivedMetric[] {
    const metrics: DerivedMetric[] = [];

    for (const definition of CLUSTER_METRICS) {
      this.deriveOne(definition, snapshots.cluster, MetricKey.forCluster(definition.name), timestamp, metrics);
    }

    for (const definition of AGGREGATE_METRICS) {
      this.deriveOne(definition, aggregates, MetricKey.forCluster(definition.name), timestamp, metrics);
    }

    const identifiers = nodeIdentifiers(snapshots.nodes.nodes);
    for (const [nodeId, node] of Object.entries(snapshots.nodes.nodes)) {
      const identifier = identifiers.get(nodeId) ?? nodeId;
      for (const definition of NODE_METRICS) {
        this.deriveOne(definition, node, MetricKey.forNode(definition.name, identifier), timestamp, metrics);
      }
    }

    return metrics;
  }

  private deriveOne<S>(
    definition: MetricDefinition<S>,
    source: S,
    key: MetricKey,
    timestamp: number,
    out: DerivedMetric[]
  ): void {
    const name = key.isClusterScoped ? key.name : nodeMetricName(key.name, key.entity);

    switch (definition.kind) {
      case 'gauge': {
        out.push({ name, units: definition.units, value: definition.read(source) ?? 0 });
        return;
      }
      case 'counter': {
        const raw = definition.read(source);
        if (raw === undefined) return;
        out.push({ name, units: definition.units, value: this.engine.process(key, raw, timestamp) });
        return;
      }
      case 'computed': {
        const value = definition.compute(source);
        if (value === undefined) return;
        out.push({ name, units: definition.units, value });
        return;
      }
      default:
        assertNever(definition);
    }
  }

  private async emitAll(metrics: readonly DerivedMetric[]): Promise<number> {
    let failed = 0;
    for (const metric of metrics) {
      try {
        await this.emitter.emit(metric.name, metric.units, metric.value);
      } catch (error) {
        failed++;
        logger.error('Metric emission failed', { metric: metric.name, error: serializeError(error) });
      }
    }
    return failed;
  }

  private async clearEmitter(): Promise<void> {
    if (!this.emitter.clear) return;
    try {
      await this.emitter.clear();
    } catch (error) {
      logger.error('Clearing reported metrics failed', { error: serializeError(error) });
    }
  }

  private transition(next: PipelineState): void {
    if (this.state !== next) {
      logger.debug('Pipeline state change', { from: this.state, to: next });
    }
    this.state = next;
  }
}
