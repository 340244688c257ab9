export * from './domains/metrics';
export * from './application/errors';
export * from './application/use-cases';
export type { IClusterStatsFetcher, IMetricEmitter } from './application/interfaces';
export { ClusterStatsClient } from './infrastructure/clients/ClusterStatsClient';
export * from './infrastructure/emitters';
export { StatsPollingScheduler } from './infrastructure/jobs/StatsPollingScheduler';
export { loadAgentConfig, AgentConfigSchema, SERVICE_NAME, AGENT_VERSION } from './config/agent-config';
export type { AgentConfig } from './config/agent-config';
