import { ErrorRecord } from './types';

export class SagaloopError extends Error {
    readonly code: string = 'SAGALOOP_ERROR';

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// Raised by model providers for failures worth retrying (timeouts, 429s, 5xx).
export class TransientProviderError extends SagaloopError {
    readonly code = 'TRANSIENT_PROVIDER';

    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
    }
}

export class TransientToolError extends SagaloopError {
    readonly code = 'TRANSIENT_TOOL';

    constructor(public readonly tool: string, message: string, public readonly originalError?: unknown) {
        super(message);
    }
}

export class UnrecoverableError extends SagaloopError {
    readonly code = 'UNRECOVERABLE';

    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
    }
}

export class StorageError extends SagaloopError {
    readonly code: string = 'STORAGE';

    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
    }
}

export class VersionConflictError extends StorageError {
    readonly code = 'VERSION_CONFLICT';

    constructor(
        public readonly workflowId: string,
        public readonly expected: number,
        public readonly actual: number,
    ) {
        super(`Snapshot version conflict for "${workflowId}": expected ${expected}, got ${actual}`);
    }
}

export class SerializationError extends SagaloopError {
    readonly code = 'SERIALIZATION';
}

export class ConfigurationError extends SagaloopError {
    readonly code: string = 'CONFIGURATION';
}

export class DuplicateWorkflowError extends ConfigurationError {
    readonly code = 'DUPLICATE_WORKFLOW';

    constructor(public readonly workflowId: string) {
        super(`Workflow "${workflowId}" already exists`);
    }
}

export class CompensationFailedError extends SagaloopError {
    readonly code = 'COMPENSATION_FAILED';

    constructor(
        public readonly stepIndex: number,
        public readonly stepName: string,
        public readonly reason: ErrorRecord,
    ) {
        super(`Compensation failed at step ${stepIndex} ("${stepName}"): ${reason.message}`);
    }
}

export class InterruptedStepError extends SagaloopError {
    readonly code = 'INTERRUPTED';

    constructor(public readonly stepIndex: number, phase: 'forward' | 'compensation') {
        super(`Step ${stepIndex} was interrupted during its ${phase} action; outcome unknown`);
    }
}

export class WorkflowNotFoundError extends SagaloopError {
    readonly code = 'NOT_FOUND';

    constructor(public readonly workflowId: string) {
        super(`Workflow "${workflowId}" not found`);
    }
}

export class WorkflowBusyError extends SagaloopError {
    readonly code = 'BUSY';

    constructor(public readonly workflowId: string) {
        super(`Workflow "${workflowId}" is already being executed`);
    }
}

export class WorkflowStateError extends SagaloopError {
    readonly code = 'INVALID_STATE';
}

export class SuspendResumeDisabledError extends SagaloopError {
    readonly code = 'SUSPEND_RESUME_DISABLED';

    constructor() {
        super('Suspend/resume is disabled (workflow.enable_suspend_resume = false)');
    }
}

export function isTransient(err: unknown): err is TransientProviderError | TransientToolError {
    return err instanceof TransientProviderError || err instanceof TransientToolError;
}

export function toErrorRecord(err: unknown): ErrorRecord {
    if (err instanceof CompensationFailedError) {
        return {
            name: err.name,
            message: err.message,
            code: err.code,
            details: { stepIndex: err.stepIndex, stepName: err.stepName, reason: err.reason },
        };
    }
    if (err instanceof SagaloopError) {
        return { name: err.name, message: err.message, code: err.code };
    }
    if (err instanceof Error) {
        return { name: err.name, message: err.message };
    }
    return { name: 'Error', message: String(err) };
}
