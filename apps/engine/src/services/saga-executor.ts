import {
    ErrorRecord,
    InterruptedStepError,
    CompensationFailedError,
    SerializationError,
    StepDescriptor,
    StorageError,
    WorkflowSnapshot,
    WorkflowStateError,
    isTerminal,
    stepStatus,
    toErrorRecord,
    workflowStatus,
} from '@sagaloop/sdk';
import { SnapshotStore } from '../snapshots/store';
import { ActionRunner } from './action-runner';
import { RollbackOrchestrator, SnapshotCommitter } from './rollback-orchestrator';

const TAG = '[saga]';

export type StepOutcome =
    | { kind: 'started' }
    | { kind: 'step_succeeded'; stepIndex: number }
    | { kind: 'step_failed'; stepIndex: number; error: ErrorRecord }
    | { kind: 'step_compensated'; stepIndex: number }
    | { kind: 'compensation_failed'; stepIndex: number; error: ErrorRecord }
    | { kind: 'completed'; output: unknown }
    | { kind: 'compensated' }
    | { kind: 'idle'; status: workflowStatus };

export interface SagaExecutorDeps {
    store: SnapshotStore;
    runner: ActionRunner;
    // 0 keeps every version
    maxSnapshots?: number;
}

function cloneSnapshot(snapshot: WorkflowSnapshot): WorkflowSnapshot {
    return {
        ...snapshot,
        stepStates: snapshot.stepStates.map(state => ({ ...state })),
    };
}

/**
 * Drives one workflow through its steps. Every transition is persisted as
 * version + 1 before the in-memory state moves on; if the write fails the
 * executor stays on the last committed snapshot.
 */
export class SagaExecutor implements SnapshotCommitter {
    private current: WorkflowSnapshot;
    private rollback: RollbackOrchestrator;
    private suspendRequested = false;

    constructor(snapshot: WorkflowSnapshot, private deps: SagaExecutorDeps) {
        this.current = snapshot;
        this.rollback = new RollbackOrchestrator(deps.runner);
    }

    /** Persist version 1 of a new workflow and return an executor over it. */
    static async create(
        deps: SagaExecutorDeps,
        workflowId: string,
        steps: readonly StepDescriptor[],
        maxThinkingSteps: number,
    ): Promise<SagaExecutor> {
        const now = new Date();
        const initial: WorkflowSnapshot = {
            workflowId,
            version: 1,
            status: workflowStatus.PENDING,
            steps,
            stepStates: steps.map(() => ({ status: stepStatus.NOT_STARTED, attemptCount: 0 })),
            maxThinkingSteps,
            createdAt: now,
            updatedAt: now,
        };
        await SagaExecutor.persist(deps.store, initial);
        return new SagaExecutor(initial, deps);
    }

    private static async persist(store: SnapshotStore, snapshot: WorkflowSnapshot): Promise<void> {
        try {
            await store.put(snapshot);
        } catch (err) {
            if (err instanceof StorageError || err instanceof SerializationError) throw err;
            throw new StorageError(`Snapshot write failed: ${err instanceof Error ? err.message : String(err)}`, err);
        }
    }

    get snapshot(): WorkflowSnapshot {
        return this.current;
    }

    get workflowId(): string {
        return this.current.workflowId;
    }

    get status(): workflowStatus {
        return this.current.status;
    }

    async commit(mutate: (draft: WorkflowSnapshot) => void): Promise<WorkflowSnapshot> {
        const next = cloneSnapshot(this.current);
        mutate(next);
        next.version = this.current.version + 1;
        next.updatedAt = new Date();

        await SagaExecutor.persist(this.deps.store, next);
        this.current = next;
        await this.prune();
        return next;
    }

    private async prune(): Promise<void> {
        const keep = this.deps.maxSnapshots ?? 0;
        if (keep <= 0) return;
        try {
            await this.deps.store.prune(this.current.workflowId, keep);
        } catch (err) {
            console.warn(`${TAG} failed to prune snapshots of ${this.current.workflowId}:`, err);
        }
    }

    /**
     * Ask the executor to stop at the next step boundary. Honoured only while
     * the forward path is running; compensation always runs to the end.
     */
    requestSuspend(): void {
        this.suspendRequested = true;
    }

    get isSuspendRequested(): boolean {
        return this.suspendRequested;
    }

    /** Commit `suspended` now. Only valid at a step boundary of a running workflow. */
    async suspend(): Promise<workflowStatus> {
        if (this.current.status !== workflowStatus.RUNNING) {
            throw new WorkflowStateError(`Workflow "${this.workflowId}" cannot be suspended while ${this.current.status}`);
        }
        await this.commit(draft => {
            draft.status = workflowStatus.SUSPENDED;
        });
        this.suspendRequested = false;
        console.log(`${TAG} workflow ${this.workflowId} suspended at v${this.current.version}`);
        return this.current.status;
    }

    /**
     * Bring a reloaded snapshot back to a state it can run from. A step left
     * `in_progress` has an unknown outcome and is failed, never re-run; an
     * interrupted compensation is reported as a compensation failure.
     */
    async recover(): Promise<void> {
        const snapshot = this.current;
        this.suspendRequested = false;
        if (isTerminal(snapshot.status)) return;

        const active = snapshot.activeCompensation;
        if (active !== undefined) {
            const step = snapshot.steps[active];
            const interrupted = toErrorRecord(new InterruptedStepError(active, 'compensation'));
            const failure = new CompensationFailedError(active, step.name, interrupted);
            await this.commit(draft => {
                const state = draft.stepStates[active];
                state.status = stepStatus.COMPENSATION_FAILED;
                state.error = interrupted;
                state.completedAt = new Date();
                delete draft.activeCompensation;
                draft.status = workflowStatus.FAILED;
                draft.error = toErrorRecord(failure);
            });
            console.error(`${TAG} ${this.workflowId}: ${failure.message}`);
            return;
        }

        const inProgress = snapshot.stepStates.findIndex(s => s.status === stepStatus.IN_PROGRESS);
        if (inProgress !== -1) {
            const interrupted = toErrorRecord(new InterruptedStepError(inProgress, 'forward'));
            await this.commit(draft => {
                const state = draft.stepStates[inProgress];
                state.status = stepStatus.FAILED;
                state.error = interrupted;
                state.completedAt = new Date();
                draft.failedStep = inProgress;
                draft.status = workflowStatus.COMPENSATING;
                draft.error = interrupted;
            });
            console.warn(`${TAG} ${this.workflowId}: step ${inProgress} was interrupted, compensating`);
            return;
        }

        if (snapshot.status === workflowStatus.SUSPENDED) {
            await this.commit(draft => {
                draft.status = workflowStatus.RUNNING;
            });
            console.log(`${TAG} workflow ${this.workflowId} resumed at v${this.current.version}`);
        }
    }

    /** Perform exactly one transition. */
    async advance(): Promise<StepOutcome> {
        switch (this.current.status) {
            case workflowStatus.PENDING:
                await this.commit(draft => {
                    draft.status = workflowStatus.RUNNING;
                });
                console.log(`${TAG} workflow ${this.workflowId} started (${this.current.steps.length} steps)`);
                return { kind: 'started' };
            case workflowStatus.RUNNING:
                return this.advanceForward();
            case workflowStatus.COMPENSATING:
                return this.rollback.compensateNext(this);
            case workflowStatus.SUSPENDED:
            case workflowStatus.COMPLETED:
            case workflowStatus.COMPENSATED:
            case workflowStatus.FAILED:
                return { kind: 'idle', status: this.current.status };
            default: {
                const unknownStatus: never = this.current.status;
                throw new WorkflowStateError(`Unknown workflow status ${String(unknownStatus)}`);
            }
        }
    }

    /** Advance until the workflow is terminal or a suspend request is honoured. */
    async runToCompletion(): Promise<workflowStatus> {
        for (;;) {
            const status = this.current.status;
            if (isTerminal(status) || status === workflowStatus.SUSPENDED) return status;
            if (this.suspendRequested && status === workflowStatus.RUNNING) {
                return this.suspend();
            }
            await this.advance();
        }
    }

    private async advanceForward(): Promise<StepOutcome> {
        const index = this.current.stepStates.findIndex(s => s.status === stepStatus.NOT_STARTED);

        if (index === -1) {
            const last = this.current.stepStates[this.current.stepStates.length - 1];
            const output = last.output;
            await this.commit(draft => {
                draft.status = workflowStatus.COMPLETED;
                draft.output = output;
            });
            console.log(`${TAG} workflow ${this.workflowId} completed`);
            return { kind: 'completed', output };
        }

        const step = this.current.steps[index];
        const input = index > 0 ? this.current.stepStates[index - 1].output : undefined;

        // checkpoint before the side effect
        await this.commit(draft => {
            const state = draft.stepStates[index];
            state.status = stepStatus.IN_PROGRESS;
            state.attemptCount = 0;
            state.startedAt = new Date();
        });

        const outcome = await this.deps.runner.run(
            step.forward,
            { workflowId: this.workflowId, stepName: step.name, phase: 'forward', input },
            this.current.maxThinkingSteps,
            step.maxRetries,
        );

        if (outcome.ok) {
            await this.commit(draft => {
                const state = draft.stepStates[index];
                state.status = stepStatus.SUCCEEDED;
                state.attemptCount = outcome.retries;
                state.output = outcome.output;
                state.completedAt = new Date();
            });
            console.log(`${TAG} step ${index} (${step.name}) of ${this.workflowId} succeeded`);
            return { kind: 'step_succeeded', stepIndex: index };
        }

        await this.commit(draft => {
            const state = draft.stepStates[index];
            state.status = stepStatus.FAILED;
            state.attemptCount = outcome.retries;
            state.error = outcome.error;
            state.completedAt = new Date();
            draft.failedStep = index;
            draft.status = workflowStatus.COMPENSATING;
            draft.error = outcome.error;
        });
        console.warn(`${TAG} step ${index} (${step.name}) of ${this.workflowId} failed: ${outcome.error.message}`);
        return { kind: 'step_failed', stepIndex: index, error: outcome.error };
    }
}
