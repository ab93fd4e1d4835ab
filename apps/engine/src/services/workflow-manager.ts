import { v7 as uuid } from 'uuid';
import {
    ConfigurationError,
    DuplicateWorkflowError,
    ReasoningOutput,
    SnapshotSummary,
    StepDescriptor,
    SuspendResumeDisabledError,
    UnrecoverableError,
    VersionConflictError,
    WorkflowAck,
    WorkflowBusyError,
    WorkflowNotFoundError,
    WorkflowSnapshot,
    WorkflowStateError,
    WorkflowView,
    freezeSteps,
    isTerminal,
    sagaRegistry,
    stepStatus,
    terminationReason,
    validateName,
    workflowStatus,
} from '@sagaloop/sdk';
import { InMemorySnapshotStore, SnapshotStore } from '../snapshots/store';
import { ActionRunner } from './action-runner';
import { SagaExecutor } from './saga-executor';
import { InProcessWorkflowLock, WorkflowLock } from './workflow-lock';

const TAG = '[manager]';

export interface ManagerOptions {
    maxThinkingSteps: number;
    enableSuspendResume: boolean;
    // 0 keeps every snapshot version
    maxSnapshots: number;
}

const defaultOptions: ManagerOptions = {
    maxThinkingSteps: 10,
    enableSuspendResume: true,
    maxSnapshots: 0,
};

export interface CreateSagaOptions {
    maxThinkingSteps?: number;
}

export interface ProcessResult {
    response: string;
    truncated: boolean;
    iterations: number;
}

interface RunResult {
    status: workflowStatus;
    error?: unknown;
}

const TERMINATION_REASONS: ReadonlySet<string> = new Set(Object.values(terminationReason));

function isReasoningOutput(value: unknown): value is ReasoningOutput {
    return typeof value === 'object' && value !== null
        && 'answer' in value && typeof value.answer === 'string'
        && 'truncated' in value && typeof value.truncated === 'boolean'
        && 'iterations' in value && typeof value.iterations === 'number'
        && 'terminatedBy' in value && typeof value.terminatedBy === 'string'
        && TERMINATION_REASONS.has(value.terminatedBy);
}

export function toView(snapshot: WorkflowSnapshot): WorkflowView {
    return {
        workflowId: snapshot.workflowId,
        status: snapshot.status,
        version: snapshot.version,
        steps: snapshot.steps.map((step, i) => {
            const state = snapshot.stepStates[i];
            return {
                name: step.name,
                status: state.status,
                attemptCount: state.attemptCount,
                output: state.output,
                error: state.error,
            };
        }),
        output: snapshot.output,
        error: snapshot.error,
    };
}

/**
 * Owns the live workflows of this daemon. Built at startup from persisted
 * snapshots and torn down by draining in-flight runs; every run of a workflow
 * holds its WorkflowLock for the whole run.
 */
export class WorkflowManager {
    private executors = new Map<string, SagaExecutor>();
    private running = new Map<string, Promise<RunResult>>();
    private accepting = true;
    private options: ManagerOptions;

    constructor(
        private store: SnapshotStore,
        private runner: ActionRunner,
        private lock: WorkflowLock = new InProcessWorkflowLock(),
        options: Partial<ManagerOptions> = {},
    ) {
        this.options = { ...defaultOptions, ...options };
    }

    private executorFor(snapshot: WorkflowSnapshot): SagaExecutor {
        return new SagaExecutor(snapshot, {
            store: this.store,
            runner: this.runner,
            maxSnapshots: this.options.maxSnapshots,
        });
    }

    /** Register every non-terminal persisted workflow so it can be inspected and resumed. */
    async start(): Promise<number> {
        const summaries = await this.store.list();
        let registered = 0;

        for (const summary of summaries) {
            if (isTerminal(summary.status)) continue;

            if (!this.options.enableSuspendResume) {
                console.warn(`${TAG} workflow ${summary.workflowId} (${summary.status}) abandoned: suspend/resume is disabled`);
                continue;
            }

            const snapshot = await this.store.getLatest(summary.workflowId);
            if (!snapshot) continue;
            this.executors.set(snapshot.workflowId, this.executorFor(snapshot));
            registered++;
        }

        console.log(`${TAG} loaded ${summaries.length} workflows, ${registered} resumable`);
        return registered;
    }

    /** Single-message workflow: one step whose forward action reasons over the message. */
    async create(workflowId: string, initialMessage: string, maxSteps?: number): Promise<WorkflowAck> {
        if (initialMessage.trim().length === 0) {
            throw new ConfigurationError('initial_message cannot be empty');
        }
        const steps: StepDescriptor[] = [
            { name: 'respond', forward: { kind: 'reason', instruction: initialMessage } },
        ];
        return this.createSaga(workflowId, steps, { maxThinkingSteps: maxSteps });
    }

    /**
     * Create a workflow from pre-built descriptors or a registered saga name,
     * persist version 1 and start running it in the background.
     */
    async createSaga(
        workflowId: string,
        stepsOrSaga: readonly StepDescriptor[] | string,
        options: CreateSagaOptions = {},
    ): Promise<WorkflowAck> {
        this.ensureAccepting();
        validateName('Workflow id', workflowId);
        const steps = this.resolveSteps(stepsOrSaga);
        const maxThinkingSteps = this.resolveMaxSteps(options.maxThinkingSteps);

        if (!await this.lock.tryAcquire(workflowId)) {
            throw new DuplicateWorkflowError(workflowId);
        }

        let executor: SagaExecutor;
        try {
            if (this.executors.has(workflowId) || await this.store.getLatest(workflowId)) {
                throw new DuplicateWorkflowError(workflowId);
            }
            executor = await SagaExecutor.create(
                { store: this.store, runner: this.runner, maxSnapshots: this.options.maxSnapshots },
                workflowId,
                steps,
                maxThinkingSteps,
            );
        } catch (err) {
            await this.releaseLock(workflowId);
            if (err instanceof VersionConflictError) throw new DuplicateWorkflowError(workflowId);
            throw err;
        }

        this.executors.set(workflowId, executor);
        const status = executor.status;
        this.launch(executor);
        console.log(`${TAG} workflow ${workflowId} created (${steps.length} steps)`);
        return { workflowId, status };
    }

    async get(workflowId: string): Promise<WorkflowView> {
        const live = this.executors.get(workflowId);
        if (live) return toView(live.snapshot);

        const snapshot = await this.store.getLatest(workflowId);
        if (!snapshot) throw new WorkflowNotFoundError(workflowId);
        return toView(snapshot);
    }

    /**
     * Cooperative: an in-flight run stops at its next step boundary and the
     * returned status is still `running`; an idle workflow is suspended at once.
     */
    async suspend(workflowId: string): Promise<WorkflowAck> {
        if (!this.options.enableSuspendResume) throw new SuspendResumeDisabledError();

        const executor = this.executors.get(workflowId);
        if (!executor) {
            const snapshot = await this.store.getLatest(workflowId);
            if (!snapshot) throw new WorkflowNotFoundError(workflowId);
            throw new WorkflowStateError(`Workflow "${workflowId}" cannot be suspended while ${snapshot.status}`);
        }

        if (this.running.has(workflowId)) {
            if (executor.status !== workflowStatus.RUNNING && executor.status !== workflowStatus.PENDING) {
                throw new WorkflowStateError(`Workflow "${workflowId}" cannot be suspended while ${executor.status}`);
            }
            executor.requestSuspend();
            console.log(`${TAG} suspend requested for ${workflowId}`);
            return { workflowId, status: executor.status };
        }

        if (executor.status !== workflowStatus.RUNNING) {
            throw new WorkflowStateError(`Workflow "${workflowId}" cannot be suspended while ${executor.status}`);
        }
        if (executor.snapshot.stepStates.some(s => s.status === stepStatus.IN_PROGRESS)) {
            throw new WorkflowStateError(`Workflow "${workflowId}" was interrupted mid-step; resume it to recover`);
        }
        if (!await this.lock.tryAcquire(workflowId)) throw new WorkflowBusyError(workflowId);
        try {
            const status = await executor.suspend();
            return { workflowId, status };
        } finally {
            await this.releaseLock(workflowId);
        }
    }

    /**
     * Reload the latest snapshot, recover it and continue in the background.
     * Terminal workflows are left untouched.
     */
    async resume(workflowId: string): Promise<WorkflowAck> {
        if (!this.options.enableSuspendResume) throw new SuspendResumeDisabledError();
        this.ensureAccepting();

        if (this.running.has(workflowId) || !await this.lock.tryAcquire(workflowId)) {
            throw new WorkflowBusyError(workflowId);
        }

        let executor: SagaExecutor;
        try {
            const snapshot = await this.store.getLatest(workflowId);
            if (!snapshot) throw new WorkflowNotFoundError(workflowId);

            if (isTerminal(snapshot.status)) {
                this.executors.delete(workflowId);
                await this.releaseLock(workflowId);
                return { workflowId, status: snapshot.status };
            }
            executor = this.executorFor(snapshot);
            this.executors.set(workflowId, executor);
            await executor.recover();
        } catch (err) {
            await this.releaseLock(workflowId);
            throw err;
        }

        this.launch(executor);
        console.log(`${TAG} workflow ${workflowId} resumed (${executor.status})`);
        return { workflowId, status: executor.status };
    }

    /** Ad-hoc single-turn run on a private in-memory store; nothing is persisted. */
    async process(message: string, maxSteps?: number): Promise<ProcessResult> {
        this.ensureAccepting();
        if (message.trim().length === 0) {
            throw new ConfigurationError('message cannot be empty');
        }

        const executor = await SagaExecutor.create(
            { store: new InMemorySnapshotStore(), runner: this.runner },
            `process-${uuid()}`,
            freezeSteps([{ name: 'respond', forward: { kind: 'reason', instruction: message } }]),
            this.resolveMaxSteps(maxSteps),
        );
        const status = await executor.runToCompletion();
        const { output, error } = executor.snapshot;

        if (status !== workflowStatus.COMPLETED || !isReasoningOutput(output)) {
            throw new UnrecoverableError(error ? error.message : `Processing ended ${status}`);
        }
        return { response: output.answer, truncated: output.truncated, iterations: output.iterations };
    }

    /** Resolve with the workflow's status once its in-flight run (if any) ends. */
    async waitFor(workflowId: string): Promise<workflowStatus> {
        const run = this.running.get(workflowId);
        if (run) {
            const result = await run;
            if (result.error !== undefined) throw result.error;
            return result.status;
        }
        return (await this.get(workflowId)).status;
    }

    isRunning(workflowId: string): boolean {
        return this.running.has(workflowId);
    }

    /** Workflows held in memory: in-flight, suspended or awaiting resume. */
    get loadedCount(): number {
        return this.executors.size;
    }

    listSnapshots(): Promise<SnapshotSummary[]> {
        return this.store.list();
    }

    async deleteSnapshots(workflowId: string): Promise<number> {
        if (this.running.has(workflowId) || !await this.lock.tryAcquire(workflowId)) {
            throw new WorkflowBusyError(workflowId);
        }
        try {
            this.executors.delete(workflowId);
            const deleted = await this.store.delete(workflowId);
            console.log(`${TAG} deleted ${deleted} snapshots of ${workflowId}`);
            return deleted;
        } finally {
            await this.releaseLock(workflowId);
        }
    }

    /** Stop taking work, ask in-flight runs to suspend (when enabled) and wait for them. */
    async shutdown(): Promise<void> {
        this.accepting = false;
        const inFlight = Array.from(this.running.keys());

        if (this.options.enableSuspendResume) {
            for (const id of inFlight) this.executors.get(id)?.requestSuspend();
        }
        console.log(`${TAG} draining ${inFlight.length} in-flight workflows`);
        await Promise.all(Array.from(this.running.values()));
        console.log(`${TAG} drained`);
    }

    private launch(executor: SagaExecutor): void {
        const workflowId = executor.workflowId;
        this.running.set(workflowId, this.drive(executor));
    }

    // Background run; errors are kept on the result for waitFor() and logged.
    private async drive(executor: SagaExecutor): Promise<RunResult> {
        const workflowId = executor.workflowId;
        try {
            const status = await executor.runToCompletion();
            console.log(`${TAG} workflow ${workflowId} stopped: ${status}`);
            return { status };
        } catch (err) {
            console.error(`${TAG} workflow ${workflowId} halted at v${executor.snapshot.version}:`, err);
            return { status: executor.status, error: err };
        } finally {
            if (isTerminal(executor.status)) this.executors.delete(workflowId);
            this.running.delete(workflowId);
            await this.releaseLock(workflowId);
        }
    }

    private async releaseLock(workflowId: string): Promise<void> {
        try {
            await this.lock.release(workflowId);
        } catch (err) {
            console.error(`${TAG} failed to release lock on ${workflowId}:`, err);
        }
    }

    private ensureAccepting(): void {
        if (!this.accepting) throw new WorkflowStateError('Workflow manager is shutting down');
    }

    private resolveSteps(stepsOrSaga: readonly StepDescriptor[] | string): readonly StepDescriptor[] {
        if (typeof stepsOrSaga !== 'string') return freezeSteps(stepsOrSaga);

        const template = sagaRegistry.get(stepsOrSaga);
        if (!template) {
            throw new ConfigurationError(`Unknown saga "${stepsOrSaga}". Registered: [${sagaRegistry.list().join(', ')}]`);
        }
        return template.steps;
    }

    private resolveMaxSteps(maxSteps: number | undefined): number {
        if (maxSteps === undefined || maxSteps === 0) return this.options.maxThinkingSteps;
        if (!Number.isInteger(maxSteps) || maxSteps < 1) {
            throw new ConfigurationError('max_steps must be a positive integer');
        }
        return maxSteps;
    }
}
