import express, { type Express } from 'express';
import type { PrometheusMetrics } from '@clusterwatch/platform-core';
import type { AgentIdentity, ReportingPipeline } from '../application/use-cases';
import { createHealthRouter } from './routes/health';

export interface AgentAppDeps {
  identity: AgentIdentity;
  pipeline: ReportingPipeline;
  metrics: PrometheusMetrics;
}

export function createAgentApp({ identity, pipeline, metrics }: AgentAppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use('/metrics', metrics.createMetricsRouter());
  app.use('/health', createHealthRouter(identity, pipeline));

  return app;
}
