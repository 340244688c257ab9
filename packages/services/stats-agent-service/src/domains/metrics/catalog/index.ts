import { AGGREGATE_METRICS } from './aggregate-metrics';
import { CLUSTER_METRICS } from './cluster-metrics';
import { NODE_METRICS } from './node-metrics';
import type { MetricKind } from './types';

export { AGGREGATE_METRICS, CLUSTER_METRICS, NODE_METRICS };
export { gauge, counter, computed } from './types';
export type {
  MetricKind,
  MetricDefinition,
  GaugeDefinition,
  CounterDefinition,
  ComputedDefinition,
} from './types';

function buildClassification(): ReadonlyMap<string, MetricKind> {
  const classification = new Map<string, MetricKind>();
  for (const definition of [...CLUSTER_METRICS, ...AGGREGATE_METRICS, ...NODE_METRICS]) {
    if (classification.has(definition.name)) {
      throw new Error(`Duplicate metric name in catalog: ${definition.name}`);
    }
    classification.set(definition.name, definition.kind);
  }
  return classification;
}

/** Metric name (without node suffix) to its kind */
export const METRIC_CLASSIFICATION = buildClassification();

export function classify(name: string): MetricKind | undefined {
  return METRIC_CLASSIFICATION.get(name);
}
