/**
 * Stats agent configuration, read from the environment.
 */

import { z } from 'zod';
import { isExactCronInterval, loadServiceConfig, type EnvSource } from '@clusterwatch/platform-core';

export const SERVICE_NAME = 'stats-agent-service';
export const AGENT_VERSION = '1.0.0';

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);

export const AgentConfigSchema = z.object({
  STATS_HOST: z.string().min(1).default('localhost'),
  STATS_PORT: port(9200),
  STATS_PROTOCOL: z.enum(['http', 'https']).default('http'),
  POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .refine(isExactCronInterval, {
      message: 'Must be whole seconds, minutes or hours dividing the next unit evenly (e.g. 15000, 60000, 300000)',
    })
    .default(60000),
  STATS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  STATS_REQUEST_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  METRICS_EMITTER: z.enum(['prometheus', 'log']).default('prometheus'),
  METRICS_PORT: port(9464),
});

export type AgentEnv = z.infer<typeof AgentConfigSchema>;

export interface AgentConfig {
  stats: {
    baseUrl: string;
    timeoutMs: number;
    retries: number;
  };
  pollIntervalMs: number;
  emitter: AgentEnv['METRICS_EMITTER'];
  metricsPort: number;
}

export function toAgentConfig(env: AgentEnv): AgentConfig {
  return {
    stats: {
      baseUrl: `${env.STATS_PROTOCOL}://${env.STATS_HOST}:${env.STATS_PORT}`,
      timeoutMs: env.STATS_REQUEST_TIMEOUT_MS,
      retries: env.STATS_REQUEST_RETRIES,
    },
    pollIntervalMs: env.POLL_INTERVAL_MS,
    emitter: env.METRICS_EMITTER,
    metricsPort: env.METRICS_PORT,
  };
}

export function loadAgentConfig(env: EnvSource = process.env): AgentConfig {
  return toAgentConfig(loadServiceConfig(AgentConfigSchema, SERVICE_NAME, env));
}
