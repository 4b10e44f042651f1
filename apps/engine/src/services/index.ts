export { AgentDirectory } from './agent-directory';
export type { AgentInvocation, AgentInvoker, AgentReply } from './agent-invoker';
export { enhanceMessage } from './dependency-context';
export { HeartbeatService } from './heartbeat.service';
export { LeaderElector } from './leaderelector';
export { LevelParallelScheduler } from './parallel-scheduler';
export { Reaper } from './reaper';
export { aggregateStatus } from './result-aggregator';
export type { ScheduleContext, ScheduledStep, Scheduler } from './scheduler';
export { SequentialScheduler } from './sequential-scheduler';
export { StepExecutor } from './step-executor';
export { WorkflowOrchestrator } from './workflow-orchestrator';
export type { OrchestratorDeps } from './workflow-orchestrator';
export { WorkflowValidator, validateDefinition } from './workflow-validator';
