import {
    Action,
    CompensationFailedError,
    ErrorRecord,
    WorkflowSnapshot,
    stepStatus,
    toErrorRecord,
    workflowStatus,
} from '@sagaloop/sdk';
import { ActionRunner } from './action-runner';

const TAG = '[rollback]';

/** The slice of a SagaExecutor the orchestrator needs to checkpoint its progress. */
export interface SnapshotCommitter {
    readonly snapshot: WorkflowSnapshot;
    commit(mutate: (draft: WorkflowSnapshot) => void): Promise<WorkflowSnapshot>;
}

export type CompensationOutcome =
    | { kind: 'step_compensated'; stepIndex: number }
    | { kind: 'compensation_failed'; stepIndex: number; error: ErrorRecord }
    | { kind: 'compensated' };

/**
 * Next step to undo: the highest-index step still `succeeded` that declares a
 * compensation action. Steps without one are left as they are and skipped.
 */
export function nextCompensationTarget(snapshot: WorkflowSnapshot): { index: number; action: Action } | undefined {
    for (let i = snapshot.stepStates.length - 1; i >= 0; i--) {
        const action = snapshot.steps[i].compensation;
        if (snapshot.stepStates[i].status === stepStatus.SUCCEEDED && action) {
            return { index: i, action };
        }
    }
    return undefined;
}

/**
 * Compensates succeeded steps in reverse (LIFO), one per call, and halts the
 * chain at the first compensation failure.
 */
export class RollbackOrchestrator {
    constructor(private runner: ActionRunner) { }

    async compensateNext(executor: SnapshotCommitter): Promise<CompensationOutcome> {
        const { workflowId } = executor.snapshot;
        const target = nextCompensationTarget(executor.snapshot);

        if (!target) {
            await executor.commit(draft => {
                draft.status = workflowStatus.COMPENSATED;
            });
            console.log(`${TAG} workflow ${workflowId} compensated`);
            return { kind: 'compensated' };
        }

        const { index, action } = target;
        const step = executor.snapshot.steps[index];

        // crash marker: a resumed executor sees it and refuses to re-run the compensation
        const checkpoint = await executor.commit(draft => {
            draft.activeCompensation = index;
        });

        const outcome = await this.runner.run(
            action,
            { workflowId, stepName: step.name, phase: 'compensation', input: checkpoint.stepStates[index].output },
            checkpoint.maxThinkingSteps,
            step.maxRetries,
        );

        if (outcome.ok) {
            await executor.commit(draft => {
                const state = draft.stepStates[index];
                state.status = stepStatus.COMPENSATED;
                state.attemptCount = outcome.retries;
                state.completedAt = new Date();
                delete draft.activeCompensation;
            });
            console.log(`${TAG} step ${index} (${step.name}) of ${workflowId} compensated`);
            return { kind: 'step_compensated', stepIndex: index };
        }

        const failure = new CompensationFailedError(index, step.name, outcome.error);
        await executor.commit(draft => {
            const state = draft.stepStates[index];
            state.status = stepStatus.COMPENSATION_FAILED;
            state.attemptCount = outcome.retries;
            state.error = outcome.error;
            state.completedAt = new Date();
            delete draft.activeCompensation;
            draft.status = workflowStatus.FAILED;
            draft.error = toErrorRecord(failure);
        });
        console.error(`${TAG} ${failure.message}; workflow ${workflowId} needs manual remediation`);
        return { kind: 'compensation_failed', stepIndex: index, error: outcome.error };
    }
}
