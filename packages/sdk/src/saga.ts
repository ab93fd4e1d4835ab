import { Action, StepDescriptor } from './types';
import { ConfigurationError } from './errors';

export interface SagaTemplate {
    name: string;
    steps: readonly StepDescriptor[];
}

const NAME_PATTERN = /^[a-zA-Z0-9_.:-]+$/;
const MAX_NAME_LENGTH = 100;

export function validateName(kind: string, name: string): void {
    if (!name || name.length === 0) {
        throw new ConfigurationError(`${kind} cannot be empty`);
    }
    if (name.length > MAX_NAME_LENGTH) {
        throw new ConfigurationError(`${kind} exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
    }
    if (!NAME_PATTERN.test(name)) {
        throw new ConfigurationError(`${kind} must contain only alphanumeric characters, dots, colons, dashes, and underscores`);
    }
}

function validateAction(stepName: string, role: string, action: Action): void {
    switch (action.kind) {
        case 'reason':
            if (action.instruction.trim().length === 0) {
                throw new ConfigurationError(`Step "${stepName}" ${role} action has an empty instruction`);
            }
            if (action.maxThinkingSteps !== undefined && (!Number.isInteger(action.maxThinkingSteps) || action.maxThinkingSteps < 1)) {
                throw new ConfigurationError(`Step "${stepName}" ${role} action maxThinkingSteps must be a positive integer`);
            }
            return;
        case 'tool':
            if (action.tool.trim().length === 0) {
                throw new ConfigurationError(`Step "${stepName}" ${role} action has an empty tool name`);
            }
            return;
        case 'noop':
            return;
        default: {
            const unknownAction: never = action;
            throw new ConfigurationError(`Step "${stepName}" has an unknown action kind: ${JSON.stringify(unknownAction)}`);
        }
    }
}

function freezeAction(action: Action): Action {
    return action.kind === 'tool'
        ? Object.freeze({ ...action, args: Object.freeze({ ...action.args }) })
        : Object.freeze({ ...action });
}

/**
 * Validate a step list and return a frozen copy of it.
 * Throws ConfigurationError on an empty list, duplicate step names, a malformed
 * action or a negative retry count.
 */
export function freezeSteps(steps: readonly StepDescriptor[]): readonly StepDescriptor[] {
    if (steps.length === 0) {
        throw new ConfigurationError('A workflow needs at least one step');
    }

    const seen = new Set<string>();
    const frozen = steps.map(step => {
        validateName('Step name', step.name);
        if (seen.has(step.name)) {
            throw new ConfigurationError(`Duplicate step name "${step.name}"`);
        }
        seen.add(step.name);
        validateAction(step.name, 'forward', step.forward);
        if (step.compensation) validateAction(step.name, 'compensation', step.compensation);
        if (step.maxRetries !== undefined && (!Number.isInteger(step.maxRetries) || step.maxRetries < 0)) {
            throw new ConfigurationError(`Step "${step.name}" maxRetries must be a non-negative integer`);
        }

        return Object.freeze({
            name: step.name,
            forward: freezeAction(step.forward),
            ...(step.compensation ? { compensation: freezeAction(step.compensation) } : {}),
            ...(step.maxRetries !== undefined ? { maxRetries: step.maxRetries } : {}),
        });
    });

    return Object.freeze(frozen);
}

// Named step lists that callers can instantiate by name (e.g. from the gRPC API)
// instead of shipping descriptors on every request.
class SagaRegistry {
    private templates = new Map<string, SagaTemplate>();

    register(name: string, steps: readonly StepDescriptor[]): SagaTemplate {
        validateName('Saga name', name);
        if (this.templates.has(name)) {
            throw new ConfigurationError(`Saga "${name}" is already registered.`);
        }
        const template: SagaTemplate = { name, steps: freezeSteps(steps) };
        this.templates.set(name, template);
        return template;
    }

    get(name: string): SagaTemplate | undefined {
        return this.templates.get(name);
    }

    list(): string[] {
        return Array.from(this.templates.keys());
    }

    clear(): void {
        this.templates.clear();
    }
}

export const sagaRegistry = new SagaRegistry();

export function saga(name: string, steps: readonly StepDescriptor[]): SagaTemplate {
    return sagaRegistry.register(name, steps);
}
