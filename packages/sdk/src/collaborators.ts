// Interfaces for the engine's external collaborators. Implementations classify
// their own failures: throw TransientProviderError / TransientToolError for
// retryable conditions, anything else is treated as unrecoverable.

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

export interface ToolSpec {
    name: string;
    description: string;
}

export interface ModelRequest {
    system: string;
    messages: ChatMessage[];
    tools: ToolSpec[];
}

export type ModelResponse =
    | { kind: 'final'; content: string }
    | { kind: 'tool_call'; tool: string; args: Record<string, unknown>; thought?: string }
    | { kind: 'thought'; content: string };

export interface ModelProvider {
    readonly name: string;
    invoke(request: ModelRequest): Promise<ModelResponse>;
}

export interface ToolExecutor {
    list(): ToolSpec[];
    invoke(name: string, args: Record<string, unknown>): Promise<unknown>;
}

export interface KnowledgeStore {
    fetchContext(query: string, limit: number): Promise<string[]>;
    storeObservation(content: string, metadata: Record<string, string>): Promise<void>;
}
