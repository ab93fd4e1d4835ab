import * as grpc from '@grpc/grpc-js';
import {
    ErrorRecord,
    SnapshotSummary,
    StepDescriptor,
    WorkflowView,
    parseStepStatus,
    parseWorkflowStatus,
    workflowStatus,
} from './types';

// Wire shapes of packages/proto/agent.service.proto (loaded with keepCase: true).

export interface ProcessRequestMessage {
    message: string;
    max_steps: number;
}

export interface ProcessResponseMessage {
    response: string;
    truncated: boolean;
    iterations: number;
}

export interface CreateWorkflowRequestMessage {
    workflow_id: string;
    initial_message: string;
    max_steps: number;
    steps_json: string;
    saga: string;
}

export interface WorkflowRefMessage {
    workflow_id: string;
}

export interface WorkflowAckMessage {
    workflow_id: string;
    status: string;
}

export interface StepInfoMessage {
    name: string;
    status: string;
    attempt_count: number;
    output_json: string;
    error_json: string;
}

export interface WorkflowInfoMessage {
    workflow_id: string;
    status: string;
    version: number;
    steps: StepInfoMessage[];
    output_json: string;
    error_json: string;
}

export interface SnapshotSummaryMessage {
    workflow_id: string;
    version: number;
    status: string;
    timestamp: string;
}

export interface ListSnapshotsResponseMessage {
    snapshots: SnapshotSummaryMessage[];
}

export interface DeleteSnapshotsResponseMessage {
    deleted: number;
}

type GrpcCallback<T> = (err: grpc.ServiceError | null, res: T) => void;

export interface AgentServiceStub {
    processMessage(req: ProcessRequestMessage, cb: GrpcCallback<ProcessResponseMessage>): unknown;
    createWorkflow(req: CreateWorkflowRequestMessage, cb: GrpcCallback<WorkflowAckMessage>): unknown;
    getWorkflow(req: WorkflowRefMessage, cb: GrpcCallback<WorkflowInfoMessage>): unknown;
    suspendWorkflow(req: WorkflowRefMessage, cb: GrpcCallback<WorkflowAckMessage>): unknown;
    resumeWorkflow(req: WorkflowRefMessage, cb: GrpcCallback<WorkflowAckMessage>): unknown;
    listSnapshots(req: Record<string, never>, cb: GrpcCallback<ListSnapshotsResponseMessage>): unknown;
    deleteSnapshots(req: WorkflowRefMessage, cb: GrpcCallback<DeleteSnapshotsResponseMessage>): unknown;
}

export interface CreateWorkflowInput {
    workflowId: string;
    initialMessage?: string;
    maxSteps?: number;
    steps?: StepDescriptor[];
    saga?: string;
}

export interface WorkflowAck {
    workflowId: string;
    status: workflowStatus;
}

export interface WorkflowClient {
    process(message: string, maxSteps?: number): Promise<ProcessResponseMessage>;
    createWorkflow(input: CreateWorkflowInput): Promise<WorkflowAck>;
    getWorkflow(workflowId: string): Promise<WorkflowView>;
    suspendWorkflow(workflowId: string): Promise<WorkflowAck>;
    resumeWorkflow(workflowId: string): Promise<WorkflowAck>;
    listSnapshots(): Promise<SnapshotSummary[]>;
    deleteSnapshots(workflowId: string): Promise<number>;
}

function rpc<T>(fn: (cb: GrpcCallback<T>) => void): Promise<T> {
    return new Promise((resolve, reject) => {
        fn((err, res) => err ? reject(err) : resolve(res));
    });
}

function parseJson(text: string): unknown {
    return text === '' ? undefined : JSON.parse(text);
}

function parseErrorRecord(text: string): ErrorRecord | undefined {
    const value = parseJson(text);
    if (typeof value !== 'object' || value === null) return undefined;
    const name = 'name' in value && typeof value.name === 'string' ? value.name : 'Error';
    const message = 'message' in value && typeof value.message === 'string' ? value.message : '';
    const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
    return code === undefined ? { name, message } : { name, message, code };
}

function toAck(res: WorkflowAckMessage): WorkflowAck {
    return { workflowId: res.workflow_id, status: parseWorkflowStatus(res.status) };
}

export function toWorkflowView(res: WorkflowInfoMessage): WorkflowView {
    return {
        workflowId: res.workflow_id,
        status: parseWorkflowStatus(res.status),
        version: res.version,
        steps: res.steps.map(s => ({
            name: s.name,
            status: parseStepStatus(s.status),
            attemptCount: s.attempt_count,
            output: parseJson(s.output_json),
            error: parseErrorRecord(s.error_json),
        })),
        output: parseJson(res.output_json),
        error: parseErrorRecord(res.error_json),
    };
}

/**
 * Wrap a generated AgentService client so callers get promises and typed views.
 *
 * @example
 * const def = protoLoader.loadSync('packages/proto/agent.service.proto', { keepCase: true, defaults: true });
 * const Service = grpc.loadPackageDefinition(def).sagaloop.AgentService;
 * const client = createWorkflowClient(new Service('localhost:50051', grpc.credentials.createInsecure()));
 * await client.createWorkflow({ workflowId: 'wf-1', initialMessage: 'Summarise the release notes' });
 */
export function createWorkflowClient(stub: AgentServiceStub): WorkflowClient {
    return {
        process: (message, maxSteps = 0) =>
            rpc<ProcessResponseMessage>(cb => stub.processMessage({ message, max_steps: maxSteps }, cb)),

        createWorkflow: (input) =>
            rpc<WorkflowAckMessage>(cb => stub.createWorkflow({
                workflow_id: input.workflowId,
                initial_message: input.initialMessage ?? '',
                max_steps: input.maxSteps ?? 0,
                steps_json: input.steps ? JSON.stringify(input.steps) : '',
                saga: input.saga ?? '',
            }, cb)).then(toAck),

        getWorkflow: (workflowId) =>
            rpc<WorkflowInfoMessage>(cb => stub.getWorkflow({ workflow_id: workflowId }, cb))
                .then(toWorkflowView),

        suspendWorkflow: (workflowId) =>
            rpc<WorkflowAckMessage>(cb => stub.suspendWorkflow({ workflow_id: workflowId }, cb)).then(toAck),

        resumeWorkflow: (workflowId) =>
            rpc<WorkflowAckMessage>(cb => stub.resumeWorkflow({ workflow_id: workflowId }, cb)).then(toAck),

        listSnapshots: () =>
            rpc<ListSnapshotsResponseMessage>(cb => stub.listSnapshots({}, cb))
                .then(r => r.snapshots.map(s => ({
                    workflowId: s.workflow_id,
                    version: s.version,
                    status: parseWorkflowStatus(s.status),
                    timestamp: new Date(s.timestamp),
                }))),

        deleteSnapshots: (workflowId) =>
            rpc<DeleteSnapshotsResponseMessage>(cb => stub.deleteSnapshots({ workflow_id: workflowId }, cb))
                .then(r => r.deleted),
    };
}
