import { STANDARD_METRICS, type PrometheusMetrics } from '@clusterwatch/platform-core';
import type { IMetricEmitter } from '../../application/interfaces';

/**
 * Publishes every reported value as a sample of one gauge family, labelled
 * with the metric path and its units. Scraped from `/metrics`; each cycle
 * replaces the previous cycle's samples.
 */
export class PrometheusMetricEmitter implements IMetricEmitter {
  constructor(private readonly metrics: PrometheusMetrics) {}

  emit(name: string, units: string, value: number): void {
    this.metrics.setGauge(STANDARD_METRICS.REPORTED_VALUE, value, { metric: name, units });
  }

  clear(): void {
    this.metrics.resetGauge(STANDARD_METRICS.REPORTED_VALUE);
  }
}
