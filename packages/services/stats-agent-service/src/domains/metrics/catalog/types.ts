/**
 * Metric classification
 *
 * Every reported metric is exactly one of:
 * - gauge: point-in-time value passed through; a missing field reports 0
 * - counter: cumulative value turned into a per-second rate; a missing field
 *   is skipped for the cycle
 * - computed: derived by its own rule; undefined omits the metric
 */

export type MetricKind = 'gauge' | 'counter' | 'computed';

interface MetricDefinitionBase {
  readonly name: string;
  readonly units: string;
}

export interface GaugeDefinition<S> extends MetricDefinitionBase {
  readonly kind: 'gauge';
  readonly read: (source: S) => number | undefined;
}

export interface CounterDefinition<S> extends MetricDefinitionBase {
  readonly kind: 'counter';
  readonly read: (source: S) => number | undefined;
}

export interface ComputedDefinition<S> extends MetricDefinitionBase {
  readonly kind: 'computed';
  readonly compute: (source: S) => number | undefined;
}

export type MetricDefinition<S> = GaugeDefinition<S> | CounterDefinition<S> | ComputedDefinition<S>;

export const gauge = <S>(name: string, units: string, read: (source: S) => number | undefined): GaugeDefinition<S> => ({
  kind: 'gauge',
  name,
  units,
  read,
});

export const counter = <S>(
  name: string,
  units: string,
  read: (source: S) => number | undefined
): CounterDefinition<S> => ({
  kind: 'counter',
  name,
  units,
  read,
});

export const computed = <S>(
  name: string,
  units: string,
  compute: (source: S) => number | undefined
): ComputedDefinition<S> => ({
  kind: 'computed',
  name,
  units,
  compute,
});
