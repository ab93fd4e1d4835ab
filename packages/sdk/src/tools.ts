import { ToolExecutor, ToolSpec } from './collaborators';
import { UnrecoverableError } from './errors';

export type ToolFn = (args: Record<string, unknown>) => Promise<unknown>;

interface RegisteredTool {
    spec: ToolSpec;
    fn: ToolFn;
}

// In-process tool executor. Names are what the model sees, so they must be
// stable across restarts: a resumed workflow may call a tool registered by name
// in an earlier process.
export class ToolRegistry implements ToolExecutor {
    private tools = new Map<string, RegisteredTool>();

    register(name: string, description: string, fn: ToolFn): this {
        // re-registering a name replaces the tool
        this.tools.set(name, { spec: { name, description }, fn });
        return this;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    list(): ToolSpec[] {
        return Array.from(this.tools.values(), t => t.spec);
    }

    async invoke(name: string, args: Record<string, unknown>): Promise<unknown> {
        const tool = this.tools.get(name);
        if (!tool) {
            throw new UnrecoverableError(`Tool "${name}" is not registered. Registered: [${this.list().map(t => t.name).join(', ')}]`);
        }
        return tool.fn(args);
    }
}

/**
 * Register the tools every daemon ships with.
 *
 * @example
 * const tools = registerBuiltinTools(new ToolRegistry());
 * await tools.invoke('current_time', {});
 */
export function registerBuiltinTools(registry: ToolRegistry): ToolRegistry {
    return registry
        .register('system_info', 'Platform, architecture and runtime version of the host', async () => ({
            platform: process.platform,
            arch: process.arch,
            node: process.version,
        }))
        .register('current_time', 'Current date and time as an ISO-8601 string', async () => ({
            now: new Date().toISOString(),
        }));
}
