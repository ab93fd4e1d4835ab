import { z } from 'zod';
import { APICallError, CoreMessage, generateText } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import {
    ChatMessage,
    ModelProvider,
    ModelRequest,
    ModelResponse,
    TransientProviderError,
    UnrecoverableError,
} from '@sagaloop/sdk';

export interface AiProviderConfig {
    baseUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

const replySchema = z.union([
    z.object({ final: z.string() }),
    z.object({
        tool: z.string().min(1),
        args: z.record(z.unknown()).default({}),
        thought: z.string().optional(),
    }),
    z.object({ thought: z.string() }),
]);

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Turn raw model text into a ModelResponse.
 * Plain prose is taken as a final answer; a JSON object must match the reply protocol.
 */
export function parseReply(text: string): ModelResponse {
    const trimmed = text.trim();
    const body = FENCED.exec(trimmed)?.[1] ?? trimmed;
    if (!body.startsWith('{')) {
        return { kind: 'final', content: trimmed };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(body);
    } catch (err) {
        throw new UnrecoverableError(`Malformed model response: invalid JSON (${err instanceof Error ? err.message : String(err)})`, err);
    }

    const parsed = replySchema.safeParse(raw);
    if (!parsed.success) {
        throw new UnrecoverableError(`Malformed model response: ${body.slice(0, 200)}`);
    }

    const reply = parsed.data;
    if ('final' in reply) return { kind: 'final', content: reply.final };
    if ('tool' in reply) {
        return reply.thought === undefined
            ? { kind: 'tool_call', tool: reply.tool, args: reply.args }
            : { kind: 'tool_call', tool: reply.tool, args: reply.args, thought: reply.thought };
    }
    return { kind: 'thought', content: reply.thought };
}

// Retries are owned by the reasoning loop, so the SDK's own retry is off and
// failures are only classified here.
export function classifyProviderError(err: unknown): Error {
    if (err instanceof TransientProviderError || err instanceof UnrecoverableError) return err;
    if (APICallError.isInstance(err)) {
        return err.isRetryable
            ? new TransientProviderError(`Model API error (${err.statusCode ?? 'no status'}): ${err.message}`, err)
            : new UnrecoverableError(`Model API rejected the request (${err.statusCode ?? 'no status'}): ${err.message}`, err);
    }
    if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
        return new TransientProviderError(`Model request timed out: ${err.message}`, err);
    }
    return new UnrecoverableError(`Model request failed: ${err instanceof Error ? err.message : String(err)}`, err);
}

function toCoreMessage(message: ChatMessage): CoreMessage {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
    }
}

/** ModelProvider over any OpenAI-compatible endpoint (Ollama by default). */
export class AiSdkModelProvider implements ModelProvider {
    readonly name: string;
    private openai: ReturnType<typeof createOpenAI>;

    constructor(private config: AiProviderConfig) {
        this.name = config.model;
        this.openai = createOpenAI({
            baseURL: config.baseUrl,
            apiKey: config.apiKey,
            compatibility: 'compatible',
        });
    }

    async invoke(request: ModelRequest): Promise<ModelResponse> {
        const abortController = new AbortController();
        const timeoutId = setTimeout(() => abortController.abort(), this.config.timeoutMs);

        let text: string;
        try {
            const result = await generateText({
                model: this.openai(this.config.model),
                system: request.system,
                messages: request.messages.map(toCoreMessage),
                temperature: this.config.temperature,
                maxTokens: this.config.maxTokens,
                maxRetries: 0,
                abortSignal: abortController.signal,
            });
            text = result.text;
        } catch (err) {
            throw classifyProviderError(err);
        } finally {
            clearTimeout(timeoutId);
        }

        return parseReply(text);
    }
}
