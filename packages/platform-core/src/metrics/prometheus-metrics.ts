import client from 'prom-client';
import { Router } from 'express';
import type { Request, Response } from 'express';
import { isProduction } from '../config/environment-config.js';
import type { MetricsConfig } from './types.js';

export class PrometheusMetrics {
  private serviceName: string;
  private registry: client.Registry;
  private counters = new Map<string, client.Counter>();
  private histograms = new Map<string, client.Histogram>();
  private gauges = new Map<string, client.Gauge>();
  private knownLabelNames = new Map<string, string[]>();

  constructor(config: MetricsConfig) {
    this.serviceName = config.serviceName;
    this.registry = new client.Registry();
    this.registry.setDefaultLabels({ service: this.serviceName, ...config.defaultLabels });

    if (config.collectDefaultMetrics ?? isProduction()) {
      client.collectDefaultMetrics({ register: this.registry });
    }
  }

  getPrefix(): string {
    return `clusterwatch_${this.serviceName.replace(/-/g, '_')}`;
  }

  private fullName(name: string): string {
    return `${this.getPrefix()}_${name}`;
  }

  private resolveLabelNames(name: string, labels?: Record<string, string>): string[] {
    const fullName = this.fullName(name);
    const existing = this.knownLabelNames.get(fullName);
    if (existing) return existing;

    const labelNames = labels ? Object.keys(labels).sort() : [];
    this.knownLabelNames.set(fullName, labelNames);
    return labelNames;
  }

  private normalizeLabelValues(
    labelNames: string[],
    labels?: Record<string, string>
  ): Record<string, string> | undefined {
    if (!labels || labelNames.length === 0) return undefined;
    const normalized: Record<string, string> = {};
    for (const key of labelNames) {
      normalized[key] = labels[key] ?? '';
    }
    return normalized;
  }

  private getOrCreateCounter(name: string, labelNames: string[]): client.Counter {
    const fullName = this.fullName(name);
    let counter = this.counters.get(fullName);
    if (!counter) {
      counter = new client.Counter({
        name: fullName,
        help: `${name} counter`,
        labelNames,
        registers: [this.registry],
      });
      this.counters.set(fullName, counter);
    }
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): client.Histogram {
    const fullName = this.fullName(name);
    let histogram = this.histograms.get(fullName);
    if (!histogram) {
      histogram = new client.Histogram({
        name: fullName,
        help: `${name} histogram`,
        labelNames,
        buckets: client.exponentialBuckets(0.005, 2, 12),
        registers: [this.registry],
      });
      this.histograms.set(fullName, histogram);
    }
    return histogram;
  }

  private getOrCreateGauge(name: string, labelNames: string[]): client.Gauge {
    const fullName = this.fullName(name);
    let gauge = this.gauges.get(fullName);
    if (!gauge) {
      gauge = new client.Gauge({
        name: fullName,
        help: `${name} gauge`,
        labelNames,
        registers: [this.registry],
      });
      this.gauges.set(fullName, gauge);
    }
    return gauge;
  }

  incrementCounter(name: string, labels?: Record<string, string>, value: number = 1): void {
    const labelNames = this.resolveLabelNames(name, labels);
    const counter = this.getOrCreateCounter(name, labelNames);
    const normalized = this.normalizeLabelValues(labelNames, labels);
    if (normalized) {
      counter.inc(normalized, value);
    } else {
      counter.inc(value);
    }
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    if (!isFinite(value)) return;
    const labelNames = this.resolveLabelNames(name, labels);
    const histogram = this.getOrCreateHistogram(name, labelNames);
    const normalized = this.normalizeLabelValues(labelNames, labels);
    if (normalized) {
      histogram.observe(normalized, value);
    } else {
      histogram.observe(value);
    }
  }

  /**
   * Sets a gauge sample. Non-finite values are rejected so that a bad sample
   * surfaces at the caller instead of silently disappearing.
   */
  setGauge(name: string, value: number, labels?: Record<string, string>): void {
    if (!isFinite(value)) {
      throw new RangeError(`Gauge ${name} rejected non-finite value ${value}`);
    }
    const labelNames = this.resolveLabelNames(name, labels);
    const gauge = this.getOrCreateGauge(name, labelNames);
    const normalized = this.normalizeLabelValues(labelNames, labels);
    if (normalized) {
      gauge.set(normalized, value);
    } else {
      gauge.set(value);
    }
  }

  /** Drops every labelled sample of a gauge; the family itself stays registered. */
  resetGauge(name: string): void {
    this.gauges.get(this.fullName(name))?.reset();
  }

  async exportPrometheusFormat(): Promise<string> {
    return this.registry.metrics();
  }

  createMetricsEndpoint() {
    return async (_req: Request, res: Response): Promise<void> => {
      res.set('Content-Type', this.registry.contentType);
      res.send(await this.exportPrometheusFormat());
    };
  }

  createMetricsRouter(): Router {
    const router = Router();
    router.get('/', this.createMetricsEndpoint());
    return router;
  }

  destroy(): void {
    this.registry.clear();
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
    this.knownLabelNames.clear();
  }
}

export function createMetrics(serviceName: string, defaultLabels?: Record<string, string>): PrometheusMetrics {
  return new PrometheusMetrics({ serviceName, defaultLabels });
}
