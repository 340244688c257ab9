export interface MetricsConfig {
  serviceName: string;
  /** Labels attached to every sample of the registry */
  defaultLabels?: Record<string, string>;
  collectDefaultMetrics?: boolean;
}

export const STANDARD_METRICS = {
  POLL_CYCLES_TOTAL: 'poll_cycles_total',
  POLL_CYCLE_DURATION: 'poll_cycle_duration_seconds',
  EMISSION_FAILURES_TOTAL: 'emission_failures_total',
  REPORTED_VALUE: 'reported_value',
} as const;
