import { Action, ToolExecutor, UnrecoverableError, toErrorRecord } from '@sagaloop/sdk';
import { ActionOutcome, ReasoningLoop } from '../agent/reasoning-loop';
import { PromptContext } from '../agent/prompt';
import { RetryFailure, RetryPolicy, defaultRetryPolicy, withBudget, withRetry } from '../utils/retry';

/** Dispatches a step's forward or compensation action to what carries it out. */
export class ActionRunner {
    constructor(
        private loop: ReasoningLoop,
        private tools: ToolExecutor | null = null,
        private retry: RetryPolicy = defaultRetryPolicy,
    ) { }

    /**
     * Never rejects: anything thrown on the way becomes a failed outcome.
     * `maxRetries` replaces the policy's budget for this action when set.
     */
    async run(action: Action, context: PromptContext, maxThinkingSteps: number, maxRetries?: number): Promise<ActionOutcome> {
        try {
            return await this.dispatch(action, context, maxThinkingSteps, maxRetries);
        } catch (err) {
            const error = err instanceof UnrecoverableError
                ? err
                : new UnrecoverableError(err instanceof Error ? err.message : String(err), err);
            return { ok: false, error: toErrorRecord(error), retries: 0, trajectory: [] };
        }
    }

    private async dispatch(action: Action, context: PromptContext, maxThinkingSteps: number, maxRetries?: number): Promise<ActionOutcome> {
        switch (action.kind) {
            case 'reason':
                return this.loop.run(action, context, maxThinkingSteps, maxRetries);
            case 'tool':
                return this.invokeTool(action.tool, action.args, withBudget(this.retry, maxRetries));
            case 'noop':
                return { ok: true, output: context.input ?? null, retries: 0, trajectory: [] };
            default: {
                const unknownAction: never = action;
                const error = new UnrecoverableError(`Unknown action kind: ${JSON.stringify(unknownAction)}`);
                return { ok: false, error: toErrorRecord(error), retries: 0, trajectory: [] };
            }
        }
    }

    private async invokeTool(tool: string, args: Record<string, unknown>, retry: RetryPolicy): Promise<ActionOutcome> {
        const executor = this.tools;
        if (!executor) {
            const error = new UnrecoverableError(`No tool executor is configured to run "${tool}"`);
            return { ok: false, error: toErrorRecord(error), retries: 0, trajectory: [] };
        }
        try {
            const { value, retries } = await withRetry(`tool ${tool}`, retry, () => executor.invoke(tool, args));
            return { ok: true, output: value, retries, trajectory: [] };
        } catch (err) {
            if (err instanceof RetryFailure) {
                return { ok: false, error: toErrorRecord(err.error), retries: err.retries, trajectory: [] };
            }
            throw err;
        }
    }
}
