export { MetricKey } from './MetricKey';
export { nodeMetricName } from './DerivedMetric';
export type { DerivedMetric } from './DerivedMetric';
