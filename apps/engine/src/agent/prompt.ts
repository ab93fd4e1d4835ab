import { ChatMessage, ModelRequest, ToolSpec } from '@sagaloop/sdk';

export type TrajectoryEntry =
    | { kind: 'thought'; content: string }
    | { kind: 'tool_call'; tool: string; args: Record<string, unknown> }
    | { kind: 'observation'; content: string };

export interface PromptContext {
    workflowId: string;
    stepName: string;
    phase: 'forward' | 'compensation';
    // forward: previous step's output; compensation: this step's forward output
    input?: unknown;
}

export interface PromptInput {
    systemPrompt: string;
    instruction: string;
    context: PromptContext;
    memory: string[];
    trajectory: TrajectoryEntry[];
    tools: ToolSpec[];
}

export const DEFAULT_SYSTEM_PROMPT =
    'You are a careful assistant executing one step of a multi-step workflow. ' +
    'Work towards the instruction, use tools when they help, and answer concisely.';

const REPLY_PROTOCOL = [
    'Reply with exactly one JSON object and nothing else:',
    '  {"final": "<answer>"}                                 when you have the answer',
    '  {"tool": "<name>", "args": {...}, "thought": "<why>"}  to call a tool',
    '  {"thought": "<reasoning>"}                            to think before acting',
].join('\n');

const MAX_OBSERVATION_CHARS = 4000;

export function stringifyObservation(value: unknown): string {
    const text = typeof value === 'string' ? value : JSON.stringify(value) ?? 'null';
    return text.length > MAX_OBSERVATION_CHARS
        ? `${text.slice(0, MAX_OBSERVATION_CHARS)}… [truncated ${text.length - MAX_OBSERVATION_CHARS} chars]`
        : text;
}

function systemText(systemPrompt: string, tools: ToolSpec[]): string {
    const toolText = tools.length === 0
        ? 'No tools are available.'
        : `Available tools:\n${tools.map(t => `- ${t.name}: ${t.description}`).join('\n')}`;
    return `${systemPrompt}\n\n${REPLY_PROTOCOL}\n\n${toolText}`;
}

function taskText(input: PromptInput): string {
    const parts = [input.instruction];

    const { context } = input;
    if (context.input !== undefined) {
        const label = context.phase === 'compensation'
            ? 'Undo the effects of this earlier result'
            : 'Result of the previous step';
        parts.push(`${label}:\n${stringifyObservation(context.input)}`);
    }
    if (input.memory.length > 0) {
        parts.push(`Relevant memory:\n${input.memory.map(m => `- ${m}`).join('\n')}`);
    }
    return parts.join('\n\n');
}

function trajectoryMessage(entry: TrajectoryEntry): ChatMessage {
    switch (entry.kind) {
        case 'thought':
            return { role: 'assistant', content: JSON.stringify({ thought: entry.content }) };
        case 'tool_call':
            return { role: 'assistant', content: JSON.stringify({ tool: entry.tool, args: entry.args }) };
        case 'observation':
            return { role: 'user', content: `Observation: ${entry.content}` };
    }
}

/** Build the model request for the next iteration of a reasoning run. */
export function buildPrompt(input: PromptInput): ModelRequest {
    const messages: ChatMessage[] = [
        { role: 'user', content: taskText(input) },
        ...input.trajectory.map(trajectoryMessage),
    ];
    return { system: systemText(input.systemPrompt, input.tools), messages, tools: input.tools };
}
