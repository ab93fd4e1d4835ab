export { ActionRunner } from './action-runner';
export { RollbackOrchestrator, nextCompensationTarget } from './rollback-orchestrator';
export type { CompensationOutcome, SnapshotCommitter } from './rollback-orchestrator';
export { SagaExecutor } from './saga-executor';
export type { SagaExecutorDeps, StepOutcome } from './saga-executor';
export { InProcessWorkflowLock, RedisWorkflowLock } from './workflow-lock';
export type { LockClient, WorkflowLock } from './workflow-lock';
export { WorkflowManager, toView } from './workflow-manager';
export type { CreateSagaOptions, ManagerOptions, ProcessResult } from './workflow-manager';
