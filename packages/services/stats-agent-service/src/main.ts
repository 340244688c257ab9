// Load environment variables first (never override the real environment)
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

import {
  HttpClient,
  SchedulerRegistry,
  createLogger,
  createMetrics,
  registerPhasedShutdownHook,
  serializeError,
  setDefaultLogMeta,
  setupGracefulShutdown,
} from '@clusterwatch/platform-core';
import { AGENT_VERSION, SERVICE_NAME, loadAgentConfig } from './config/agent-config';
import { RateDerivationEngine } from './domains/metrics';
import { ReportingPipeline, resolveAgentIdentity } from './application/use-cases';
import type { IMetricEmitter } from './application/interfaces';
import { ClusterStatsClient } from './infrastructure/clients/ClusterStatsClient';
import { LoggingMetricEmitter, PrometheusMetricEmitter } from './infrastructure/emitters';
import { StatsPollingScheduler } from './infrastructure/jobs/StatsPollingScheduler';
import { createAgentApp } from './presentation/app';

const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  const agentConfig = loadAgentConfig();

  const http = new HttpClient({
    baseUrl: agentConfig.stats.baseUrl,
    timeout: agentConfig.stats.timeoutMs,
    retries: agentConfig.stats.retries,
    userAgent: `${SERVICE_NAME}/${AGENT_VERSION}`,
  });
  registerPhasedShutdownHook('connections', async () => http.destroy(), 'stats-http-client');

  const fetcher = new ClusterStatsClient(http);
  const identity = await resolveAgentIdentity(fetcher, AGENT_VERSION);
  setDefaultLogMeta({ cluster: identity.clusterName, version: identity.version });

  const metrics = createMetrics(SERVICE_NAME, { cluster: identity.clusterName });
  const emitter: IMetricEmitter =
    agentConfig.emitter === 'prometheus' ? new PrometheusMetricEmitter(metrics) : new LoggingMetricEmitter();

  const pipeline = new ReportingPipeline({ fetcher, emitter, engine: new RateDerivationEngine() });
  SchedulerRegistry.register(new StatsPollingScheduler(pipeline, { pollIntervalMs: agentConfig.pollIntervalMs, metrics }));

  const app = createAgentApp({ identity, pipeline, metrics });
  const server = app.listen(agentConfig.metricsPort, () => {
    logger.info('Stats agent started', {
      agentId: identity.agentId,
      cluster: identity.clusterName,
      statsUrl: agentConfig.stats.baseUrl,
      emitter: agentConfig.emitter,
      pollIntervalMs: agentConfig.pollIntervalMs,
      metricsPort: agentConfig.metricsPort,
    });
    SchedulerRegistry.startAll();
  });

  setupGracefulShutdown(server);
}

main().catch((error: unknown) => {
  logger.error('Stats agent failed to start', { error: serializeError(error) });
  process.exit(1);
});
