// public api for @sagaloop/sdk
// usage:
//   import { saga, ToolRegistry } from '@sagaloop/sdk';
//   saga('refund-order', [{ name: 'charge', forward: {...}, compensation: {...} }]);

export * from './types';
export * from './errors';
export * from './collaborators';
export { ToolRegistry, registerBuiltinTools } from './tools';
export type { ToolFn } from './tools';
export { saga, sagaRegistry, freezeSteps, validateName } from './saga';
export type { SagaTemplate } from './saga';
export { createWorkflowClient, toWorkflowView } from './grpc-client';
export type {
    AgentServiceStub,
    CreateWorkflowInput,
    CreateWorkflowRequestMessage,
    DeleteSnapshotsResponseMessage,
    ListSnapshotsResponseMessage,
    ProcessRequestMessage,
    ProcessResponseMessage,
    SnapshotSummaryMessage,
    StepInfoMessage,
    WorkflowAck,
    WorkflowAckMessage,
    WorkflowClient,
    WorkflowInfoMessage,
    WorkflowRefMessage,
} from './grpc-client';
