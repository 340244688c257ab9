import { Router } from 'express';
import { SchedulerRegistry } from '@clusterwatch/platform-core';
import type { AgentIdentity, ReportingPipeline } from '../../application/use-cases';

export function createHealthRouter(identity: AgentIdentity, pipeline: ReportingPipeline): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const report = SchedulerRegistry.getHealthReport();
    res.status(report.healthy ? 200 : 503).json({
      status: report.healthy ? 'healthy' : 'degraded',
      agent: identity,
      pipelineState: pipeline.getState(),
      schedulers: report,
    });
  });

  return router;
}
