import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { z } from 'zod';
import {
    ConfigurationError,
    CreateWorkflowRequestMessage,
    DeleteSnapshotsResponseMessage,
    DuplicateWorkflowError,
    ErrorRecord,
    ListSnapshotsResponseMessage,
    ProcessRequestMessage,
    ProcessResponseMessage,
    StepDescriptor,
    StorageError,
    SuspendResumeDisabledError,
    WorkflowAck,
    WorkflowAckMessage,
    WorkflowBusyError,
    WorkflowInfoMessage,
    WorkflowNotFoundError,
    WorkflowRefMessage,
    WorkflowStateError,
    WorkflowView,
} from '@sagaloop/sdk';
import { stepDescriptorSchema } from '../snapshots/codec';
import { WorkflowManager } from '../services/workflow-manager';

const TAG = '[grpc]';

// handlers read only the request
type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

const stepsJsonSchema = z.array(stepDescriptorSchema).min(1);

export function toStatusCode(err: unknown): grpc.status {
    if (err instanceof DuplicateWorkflowError) return grpc.status.ALREADY_EXISTS;
    if (err instanceof ConfigurationError) return grpc.status.INVALID_ARGUMENT;
    if (err instanceof WorkflowNotFoundError) return grpc.status.NOT_FOUND;
    if (err instanceof WorkflowBusyError
        || err instanceof WorkflowStateError
        || err instanceof SuspendResumeDisabledError) {
        return grpc.status.FAILED_PRECONDITION;
    }
    if (err instanceof StorageError) return grpc.status.UNAVAILABLE;
    return grpc.status.INTERNAL;
}

function toJson(value: unknown): string {
    return value === undefined ? '' : JSON.stringify(value);
}

function errorJson(error: ErrorRecord | undefined): string {
    return error ? JSON.stringify(error) : '';
}

function toAckMessage(ack: WorkflowAck): WorkflowAckMessage {
    return { workflow_id: ack.workflowId, status: ack.status };
}

export function toWorkflowInfo(view: WorkflowView): WorkflowInfoMessage {
    return {
        workflow_id: view.workflowId,
        status: view.status,
        version: view.version,
        steps: view.steps.map(s => ({
            name: s.name,
            status: s.status,
            attempt_count: s.attemptCount,
            output_json: toJson(s.output),
            error_json: errorJson(s.error),
        })),
        output_json: toJson(view.output),
        error_json: errorJson(view.error),
    };
}

export function parseStepsJson(text: string): StepDescriptor[] {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new ConfigurationError(`steps_json is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = stepsJsonSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw new ConfigurationError(`steps_json is not a valid step list: ${issues}`);
    }
    return parsed.data;
}

/**
 * gRPC service implementation for workflow management.
 * Domain errors map onto gRPC status codes; the message is passed through verbatim.
 */
export class AgentServiceImpl {
    constructor(private manager: WorkflowManager) { }

    private async respond<Res>(method: string, callback: sendUnaryData<Res>, fn: () => Promise<Res>): Promise<void> {
        try {
            callback(null, await fn());
        } catch (error) {
            const code = toStatusCode(error);
            if (code === grpc.status.INTERNAL || code === grpc.status.UNAVAILABLE) {
                console.error(`${TAG} ${method} error:`, error);
            } else {
                console.warn(`${TAG} ${method} rejected: ${error instanceof Error ? error.message : String(error)}`);
            }
            callback({
                code,
                message: error instanceof Error ? error.message : 'Unknown error',
            });
        }
    }

    /** Single-turn run: one reasoning step on an ephemeral workflow. */
    async processMessage(
        call: UnaryCall<ProcessRequestMessage>,
        callback: sendUnaryData<ProcessResponseMessage>
    ) {
        await this.respond('ProcessMessage', callback, async () => {
            const { message, max_steps } = call.request;
            return this.manager.process(message, max_steps || undefined);
        });
    }

    /**
     * Precedence: steps_json, then saga, then initial_message.
     * Acknowledges with the initial status; the workflow runs in the background.
     */
    async createWorkflow(
        call: UnaryCall<CreateWorkflowRequestMessage>,
        callback: sendUnaryData<WorkflowAckMessage>
    ) {
        await this.respond('CreateWorkflow', callback, async () => {
            const { workflow_id, initial_message, max_steps, steps_json, saga } = call.request;
            const maxThinkingSteps = max_steps || undefined;

            let ack: WorkflowAck;
            if (steps_json) {
                ack = await this.manager.createSaga(workflow_id, parseStepsJson(steps_json), { maxThinkingSteps });
            } else if (saga) {
                ack = await this.manager.createSaga(workflow_id, saga, { maxThinkingSteps });
            } else {
                ack = await this.manager.create(workflow_id, initial_message, maxThinkingSteps);
            }
            return toAckMessage(ack);
        });
    }

    async getWorkflow(
        call: UnaryCall<WorkflowRefMessage>,
        callback: sendUnaryData<WorkflowInfoMessage>
    ) {
        await this.respond('GetWorkflow', callback, async () =>
            toWorkflowInfo(await this.manager.get(call.request.workflow_id))
        );
    }

    async suspendWorkflow(
        call: UnaryCall<WorkflowRefMessage>,
        callback: sendUnaryData<WorkflowAckMessage>
    ) {
        await this.respond('SuspendWorkflow', callback, async () =>
            toAckMessage(await this.manager.suspend(call.request.workflow_id))
        );
    }

    async resumeWorkflow(
        call: UnaryCall<WorkflowRefMessage>,
        callback: sendUnaryData<WorkflowAckMessage>
    ) {
        await this.respond('ResumeWorkflow', callback, async () =>
            toAckMessage(await this.manager.resume(call.request.workflow_id))
        );
    }

    async listSnapshots(
        _call: UnaryCall<Record<string, never>>,
        callback: sendUnaryData<ListSnapshotsResponseMessage>
    ) {
        await this.respond('ListSnapshots', callback, async () => {
            const summaries = await this.manager.listSnapshots();
            return {
                snapshots: summaries.map(s => ({
                    workflow_id: s.workflowId,
                    version: s.version,
                    status: s.status,
                    timestamp: s.timestamp.toISOString(),
                })),
            };
        });
    }

    async deleteSnapshots(
        call: UnaryCall<WorkflowRefMessage>,
        callback: sendUnaryData<DeleteSnapshotsResponseMessage>
    ) {
        await this.respond('DeleteSnapshots', callback, async () => ({
            deleted: await this.manager.deleteSnapshots(call.request.workflow_id),
        }));
    }
}
