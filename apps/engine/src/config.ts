import { z } from 'zod';
import { ConfigurationError } from '@sagaloop/sdk';
import { DEFAULT_SYSTEM_PROMPT } from './agent/prompt';

const bool = (fallback: boolean) => z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform(v => v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes');

const int = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
    PORT: int(50051, 1),
    DATABASE_URL: z.string().url().optional(),
    REDIS_URL: z.string().url().optional(),
    SNAPSHOT_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    MEMORY_PERSISTENT: bool(true),
    MEMORY_MAX_RESULTS: int(5, 1),
    AGENT_USE_MEMORY: bool(true),
    AGENT_USE_TOOLS: bool(true),
    AGENT_MAX_THINKING_STEPS: int(10, 1),
    AGENT_SYSTEM_PROMPT: z.string().min(1).optional(),
    AGENT_RETRY_BUDGET: int(3, 0),
    WORKFLOW_ENABLE_SUSPEND_RESUME: bool(true),
    WORKFLOW_MAX_SNAPSHOTS: int(0, 0),
    LLM_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    LLM_API_KEY: z.string().min(1).default('ollama'),
    LLM_MODEL: z.string().min(1).default('llama3.1'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_TOKENS: int(1024, 1),
    LLM_TIMEOUT_MS: int(60000, 1),
    LOCK_TTL_MS: int(30000, 1000),
});

export interface AppConfig {
    server: { port: number };
    database: { url?: string };
    redis: { url?: string };
    storage: { driver: 'postgres' | 'memory' };
    memory: { persistent: boolean; maxSearchResults: number };
    agent: {
        useMemory: boolean;
        useTools: boolean;
        maxThinkingSteps: number;
        systemPrompt: string;
        retryBudget: number;
    };
    workflow: { enableSuspendResume: boolean; maxSnapshots: number };
    llm: {
        baseUrl: string;
        apiKey: string;
        model: string;
        temperature: number;
        maxTokens: number;
        timeoutMs: number;
    };
    lock: { ttlMs: number };
}

/**
 * Read the daemon configuration from environment variables (.env is loaded by
 * the entry point). Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // empty strings count as unset
    const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;

    const needsDatabase = e.SNAPSHOT_STORE === 'postgres' || e.MEMORY_PERSISTENT;
    if (needsDatabase && !e.DATABASE_URL) {
        throw new ConfigurationError(
            'DATABASE_URL is required when SNAPSHOT_STORE=postgres or MEMORY_PERSISTENT=true'
        );
    }

    return {
        server: { port: e.PORT },
        database: { url: e.DATABASE_URL },
        redis: { url: e.REDIS_URL },
        storage: { driver: e.SNAPSHOT_STORE },
        memory: { persistent: e.MEMORY_PERSISTENT, maxSearchResults: e.MEMORY_MAX_RESULTS },
        agent: {
            useMemory: e.AGENT_USE_MEMORY,
            useTools: e.AGENT_USE_TOOLS,
            maxThinkingSteps: e.AGENT_MAX_THINKING_STEPS,
            systemPrompt: e.AGENT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
            retryBudget: e.AGENT_RETRY_BUDGET,
        },
        workflow: {
            enableSuspendResume: e.WORKFLOW_ENABLE_SUSPEND_RESUME,
            maxSnapshots: e.WORKFLOW_MAX_SNAPSHOTS,
        },
        llm: {
            baseUrl: e.LLM_BASE_URL,
            apiKey: e.LLM_API_KEY,
            model: e.LLM_MODEL,
            temperature: e.LLM_TEMPERATURE,
            maxTokens: e.LLM_MAX_TOKENS,
            timeoutMs: e.LLM_TIMEOUT_MS,
        },
        lock: { ttlMs: e.LOCK_TTL_MS },
    };
}
