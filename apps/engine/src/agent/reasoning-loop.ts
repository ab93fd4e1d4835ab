import {
    ErrorRecord,
    KnowledgeStore,
    ModelProvider,
    ModelResponse,
    ReasonAction,
    ReasoningOutput,
    ToolExecutor,
    ToolSpec,
    UnrecoverableError,
    terminationReason,
    toErrorRecord,
} from '@sagaloop/sdk';
import { RetryFailure, RetryPolicy, defaultRetryPolicy, withBudget, withRetry } from '../utils/retry';
import { DEFAULT_SYSTEM_PROMPT, PromptContext, TrajectoryEntry, buildPrompt, stringifyObservation } from './prompt';

const TAG = '[reasoning]';

export interface ReasoningOptions {
    systemPrompt: string;
    useMemory: boolean;
    useTools: boolean;
    maxMemoryResults: number;
    retry: RetryPolicy;
}

export const defaultReasoningOptions: ReasoningOptions = {
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
    useMemory: true,
    useTools: true,
    maxMemoryResults: 5,
    retry: defaultRetryPolicy,
};

/**
 * Result of running one action. `retries` counts transient retries spent,
 * which the executor records as the step's attempt count.
 */
export type ActionOutcome =
    | { ok: true; output: unknown; retries: number; trajectory: TrajectoryEntry[] }
    | { ok: false; error: ErrorRecord; retries: number; trajectory: TrajectoryEntry[] };

/**
 * Bounded think/act/observe loop. Never touches step state: it returns an
 * outcome and the saga executor decides what to persist.
 */
export class ReasoningLoop {
    private options: ReasoningOptions;

    constructor(
        private model: ModelProvider,
        private tools: ToolExecutor | null = null,
        private knowledge: KnowledgeStore | null = null,
        options: Partial<ReasoningOptions> = {},
    ) {
        this.options = { ...defaultReasoningOptions, ...options };
    }

    private get toolsEnabled(): boolean {
        return this.options.useTools && this.tools !== null;
    }

    async run(action: ReasonAction, context: PromptContext, maxThinkingSteps: number, maxRetries?: number): Promise<ActionOutcome> {
        const limit = action.maxThinkingSteps ?? maxThinkingSteps;
        const retry = withBudget(this.options.retry, maxRetries);
        const trajectory: TrajectoryEntry[] = [];
        const memory = await this.recall(action.instruction);
        const tools: ToolSpec[] = this.tools && this.toolsEnabled ? this.tools.list() : [];
        let retries = 0;
        let lastThought: string | undefined;
        let lastObservation: string | undefined;

        for (let iteration = 1; iteration <= limit; iteration++) {
            const request = buildPrompt({
                systemPrompt: this.options.systemPrompt,
                instruction: action.instruction,
                context,
                memory,
                trajectory,
                tools,
            });

            let response: ModelResponse;
            try {
                const result = await withRetry(`model ${this.model.name}`, retry, () => this.model.invoke(request));
                retries += result.retries;
                response = result.value;
            } catch (err) {
                return this.fail(context, err, retries, trajectory);
            }

            switch (response.kind) {
                case 'final': {
                    await this.remember(action.instruction, response.content, context);
                    const output: ReasoningOutput = {
                        answer: response.content,
                        truncated: false,
                        iterations: iteration,
                        terminatedBy: terminationReason.FINAL_ANSWER,
                    };
                    return { ok: true, output, retries, trajectory };
                }
                case 'thought':
                    trajectory.push({ kind: 'thought', content: response.content });
                    lastThought = response.content;
                    break;
                case 'tool_call': {
                    if (response.thought) {
                        trajectory.push({ kind: 'thought', content: response.thought });
                        lastThought = response.thought;
                    }
                    trajectory.push({ kind: 'tool_call', tool: response.tool, args: response.args });

                    let observation: string;
                    if (!this.tools || !this.toolsEnabled) {
                        observation = `Tool "${response.tool}" is unavailable: tools are disabled for this agent.`;
                    } else {
                        const executor = this.tools;
                        const { tool, args } = response;
                        try {
                            const result = await withRetry(`tool ${tool}`, retry, () => executor.invoke(tool, args));
                            retries += result.retries;
                            observation = stringifyObservation(result.value);
                        } catch (err) {
                            return this.fail(context, err, retries, trajectory);
                        }
                    }
                    trajectory.push({ kind: 'observation', content: observation });
                    lastObservation = observation;
                    break;
                }
                default: {
                    const unknownResponse: never = response;
                    return this.fail(context, new UnrecoverableError(`Unknown model response: ${JSON.stringify(unknownResponse)}`), retries, trajectory);
                }
            }
        }

        console.log(`${TAG} ${context.workflowId}/${context.stepName} hit the ${limit}-step limit, returning partial answer`);
        const output: ReasoningOutput = {
            answer: lastThought ?? lastObservation ?? '',
            truncated: true,
            iterations: limit,
            terminatedBy: terminationReason.STEP_LIMIT_REACHED,
        };
        return { ok: true, output, retries, trajectory };
    }

    private fail(context: PromptContext, err: unknown, retries: number, trajectory: TrajectoryEntry[]): ActionOutcome {
        const failure = err instanceof RetryFailure
            ? err
            : new RetryFailure(new UnrecoverableError(err instanceof Error ? err.message : String(err), err), 0);
        console.error(`${TAG} ${context.workflowId}/${context.stepName} failed:`, failure.error.message);
        return { ok: false, error: toErrorRecord(failure.error), retries: retries + failure.retries, trajectory };
    }

    private async recall(query: string): Promise<string[]> {
        if (!this.options.useMemory || !this.knowledge) return [];
        try {
            return await this.knowledge.fetchContext(query, this.options.maxMemoryResults);
        } catch (err) {
            console.warn(`${TAG} memory lookup failed, continuing without context:`, err);
            return [];
        }
    }

    private async remember(instruction: string, answer: string, context: PromptContext): Promise<void> {
        if (!this.options.useMemory || !this.knowledge) return;
        try {
            await this.knowledge.storeObservation(`${instruction}\n${answer}`, {
                workflowId: context.workflowId,
                step: context.stepName,
                phase: context.phase,
            });
        } catch (err) {
            console.warn(`${TAG} failed to store observation:`, err);
        }
    }
}
