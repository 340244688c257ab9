import {
  BaseScheduler,
  STANDARD_METRICS,
  intervalToCronExpression,
  type PrometheusMetrics,
  type SchedulerExecutionResult,
} from '@clusterwatch/platform-core';
import type { ReportingPipeline } from '../../application/use-cases';
import { SERVICE_NAME } from '../../config/agent-config';

export interface StatsPollingSchedulerOptions {
  pollIntervalMs: number;
  runOnStart?: boolean;
  /** Self-metrics about the poll loop; optional so the log emitter can run without a registry */
  metrics?: PrometheusMetrics;
}

/**
 * Triggers one reporting cycle per tick. A cycle that overruns the interval
 * keeps running; the tick that lands on it is reported as skipped.
 */
export class StatsPollingScheduler extends BaseScheduler {
  private readonly metrics?: PrometheusMetrics;

  get name(): string {
    return 'stats-polling';
  }

  get serviceName(): string {
    return SERVICE_NAME;
  }

  constructor(
    private readonly pipeline: ReportingPipeline,
    options: StatsPollingSchedulerOptions
  ) {
    super({
      cronExpression: intervalToCronExpression(options.pollIntervalMs),
      runOnStart: options.runOnStart ?? true,
      maxRetries: 0,
      timeoutMs: options.pollIntervalMs,
    });
    this.metrics = options.metrics;
    this.initLogger();
  }

  protected async execute(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    const result = await this.pipeline.runCycle();
    const durationMs = Date.now() - startTime;

    this.metrics?.incrementCounter(STANDARD_METRICS.POLL_CYCLES_TOTAL, { status: result.status });

    switch (result.status) {
      case 'completed':
        this.metrics?.recordHistogram(STANDARD_METRICS.POLL_CYCLE_DURATION, durationMs / 1000);
        if (result.failedEmissions > 0) {
          this.metrics?.incrementCounter(STANDARD_METRICS.EMISSION_FAILURES_TOTAL, undefined, result.failedEmissions);
        }
        return {
          success: true,
          message: `Cycle ${result.cycle} reported ${result.emitted} metrics`,
          data: { cycle: result.cycle, emitted: result.emitted, failedEmissions: result.failedEmissions },
          durationMs,
        };
      case 'failed':
        return { success: false, message: result.error.message, data: { cycle: result.cycle }, durationMs };
      case 'skipped':
        return { success: true, noOp: true, message: result.reason, durationMs };
    }
  }
}
