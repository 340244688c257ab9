export { ReportingPipeline, nodeIdentifiers, systemClock } from './ReportingPipeline';
export type { CycleResult, PipelineState, Clock, ReportingPipelineDeps } from './ReportingPipeline';
export { resolveAgentIdentity, AGENT_ID } from './ResolveAgentIdentity';
export type { AgentIdentity } from './ResolveAgentIdentity';
