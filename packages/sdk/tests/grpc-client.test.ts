import * as grpc from '@grpc/grpc-js';
import {
    AgentServiceStub,
    CreateWorkflowRequestMessage,
    WorkflowInfoMessage,
    createWorkflowClient,
    stepStatus,
    toWorkflowView,
    workflowStatus,
} from '../src';

type Callback<T> = (err: grpc.ServiceError | null, res: T) => void;

// Stub answering every call from canned responses, recording requests.
function stubWith(overrides: Partial<AgentServiceStub> = {}): { stub: AgentServiceStub; requests: unknown[] } {
    const requests: unknown[] = [];
    const ack = (req: { workflow_id: string }, cb: Callback<{ workflow_id: string; status: string }>) => {
        requests.push(req);
        cb(null, { workflow_id: req.workflow_id, status: 'running' });
    };
    const stub: AgentServiceStub = {
        processMessage: (req, cb) => {
            requests.push(req);
            cb(null, { response: 'ok', truncated: false, iterations: 1 });
        },
        createWorkflow: (req, cb) => {
            requests.push(req);
            cb(null, { workflow_id: req.workflow_id, status: 'pending' });
        },
        getWorkflow: (req, cb) => {
            requests.push(req);
            cb(null, {
                workflow_id: req.workflow_id, status: 'completed', version: 3, steps: [], output_json: '', error_json: '',
            });
        },
        suspendWorkflow: ack,
        resumeWorkflow: ack,
        listSnapshots: (req, cb) => {
            requests.push(req);
            cb(null, { snapshots: [{ workflow_id: 'wf-1', version: 4, status: 'suspended', timestamp: '2026-05-01T10:00:00.000Z' }] });
        },
        deleteSnapshots: (req, cb) => {
            requests.push(req);
            cb(null, { deleted: 4 });
        },
        ...overrides,
    };
    return { stub, requests };
}

describe('createWorkflowClient', () => {
    test('should encode create requests with empty defaults', async () => {
        const { stub, requests } = stubWith();
        const client = createWorkflowClient(stub);

        expect(await client.createWorkflow({ workflowId: 'wf-1', initialMessage: 'hi' })).toEqual({
            workflowId: 'wf-1', status: workflowStatus.PENDING,
        });
        await client.createWorkflow({ workflowId: 'wf-2', saga: 'refund', maxSteps: 4 });
        await client.createWorkflow({ workflowId: 'wf-3', steps: [{ name: 'a', forward: { kind: 'noop' } }] });

        const expected: CreateWorkflowRequestMessage[] = [
            { workflow_id: 'wf-1', initial_message: 'hi', max_steps: 0, steps_json: '', saga: '' },
            { workflow_id: 'wf-2', initial_message: '', max_steps: 4, steps_json: '', saga: 'refund' },
            { workflow_id: 'wf-3', initial_message: '', max_steps: 0, steps_json: '[{"name":"a","forward":{"kind":"noop"}}]', saga: '' },
        ];
        expect(requests).toEqual(expected);
    });

    test('should map the remaining calls', async () => {
        const { stub, requests } = stubWith();
        const client = createWorkflowClient(stub);

        expect(await client.process('hello')).toEqual({ response: 'ok', truncated: false, iterations: 1 });
        expect(await client.suspendWorkflow('wf-1')).toEqual({ workflowId: 'wf-1', status: workflowStatus.RUNNING });
        expect(await client.resumeWorkflow('wf-1')).toEqual({ workflowId: 'wf-1', status: workflowStatus.RUNNING });
        expect((await client.getWorkflow('wf-1')).status).toBe(workflowStatus.COMPLETED);
        expect(await client.listSnapshots()).toEqual([
            { workflowId: 'wf-1', version: 4, status: workflowStatus.SUSPENDED, timestamp: new Date('2026-05-01T10:00:00.000Z') },
        ]);
        expect(await client.deleteSnapshots('wf-1')).toBe(4);
        expect(requests[0]).toEqual({ message: 'hello', max_steps: 0 });
    });

    test('should reject with the gRPC error', async () => {
        const failure: grpc.ServiceError = Object.assign(new Error('5 NOT_FOUND: Workflow "x" not found'), {
            code: grpc.status.NOT_FOUND,
            details: 'Workflow "x" not found',
            metadata: new grpc.Metadata(),
        });
        const { stub } = stubWith({
            getWorkflow: (_req, cb) => {
                cb(failure, {
                    workflow_id: '', status: 'pending', version: 0, steps: [], output_json: '', error_json: '',
                });
            },
        });

        await expect(createWorkflowClient(stub).getWorkflow('x')).rejects.toBe(failure);
    });
});

describe('toWorkflowView', () => {
    test('should parse statuses and JSON fields', () => {
        const info: WorkflowInfoMessage = {
            workflow_id: 'wf-1',
            status: 'failed',
            version: 8,
            steps: [
                { name: 'a', status: 'compensation_failed', attempt_count: 2, output_json: '{"answer":"x"}', error_json: '{"name":"UnrecoverableError","message":"down","code":"UNRECOVERABLE"}' },
                { name: 'b', status: 'failed', attempt_count: 0, output_json: '', error_json: '{"message":"boom"}' },
            ],
            output_json: '',
            error_json: '',
        };

        expect(toWorkflowView(info)).toEqual({
            workflowId: 'wf-1',
            status: workflowStatus.FAILED,
            version: 8,
            steps: [
                {
                    name: 'a',
                    status: stepStatus.COMPENSATION_FAILED,
                    attemptCount: 2,
                    output: { answer: 'x' },
                    error: { name: 'UnrecoverableError', message: 'down', code: 'UNRECOVERABLE' },
                },
                { name: 'b', status: stepStatus.FAILED, attemptCount: 0, output: undefined, error: { name: 'Error', message: 'boom' } },
            ],
            output: undefined,
            error: undefined,
        });
    });

    test('should reject unknown statuses', () => {
        expect(() => toWorkflowView({
            workflow_id: 'wf', status: 'exploded', version: 1, steps: [], output_json: '', error_json: '',
        })).toThrow('Unknown workflow status "exploded"');
    });
});
