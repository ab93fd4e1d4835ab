/**
 * Lifecycle states for a workflow (saga instance).
 * PENDING → RUNNING → COMPLETED, or RUNNING → COMPENSATING → COMPENSATED/FAILED.
 * SUSPENDED is reachable only from RUNNING.
 */
export enum workflowStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    SUSPENDED = 'suspended',
    COMPENSATING = 'compensating',
    COMPLETED = 'completed',
    COMPENSATED = 'compensated',
    FAILED = 'failed',
}

/**
 * Lifecycle states for a single step within a workflow.
 */
export enum stepStatus {
    NOT_STARTED = 'not_started',
    IN_PROGRESS = 'in_progress',
    SUCCEEDED = 'succeeded',
    FAILED = 'failed',
    COMPENSATED = 'compensated',
    COMPENSATION_FAILED = 'compensation_failed',
}

export enum terminationReason {
    FINAL_ANSWER = 'final_answer',
    STEP_LIMIT_REACHED = 'step_limit_reached',
    UNRECOVERABLE_ERROR = 'unrecoverable_error',
}

const TERMINAL_STATUSES: ReadonlySet<workflowStatus> = new Set([
    workflowStatus.COMPLETED,
    workflowStatus.COMPENSATED,
    workflowStatus.FAILED,
]);

export function isTerminal(status: workflowStatus): boolean {
    return TERMINAL_STATUSES.has(status);
}

export interface ReasonAction {
    kind: 'reason';
    instruction: string;
    maxThinkingSteps?: number;
}

export interface ToolAction {
    kind: 'tool';
    tool: string;
    args: Record<string, unknown>;
}

export interface NoopAction {
    kind: 'noop';
}

export type Action = ReasonAction | ToolAction | NoopAction;

export interface StepDescriptor {
    readonly name: string;
    readonly forward: Action;
    readonly compensation?: Action;
    // Transient retries allowed for this step's actions; 0 makes it non-retryable.
    readonly maxRetries?: number;
}

export interface ErrorRecord {
    name: string;
    message: string;
    code?: string;
    details?: Record<string, unknown>;
}

export interface StepState {
    status: stepStatus;
    attemptCount: number;
    output?: unknown;
    error?: ErrorRecord;
    startedAt?: Date;
    completedAt?: Date;
}

export interface WorkflowSnapshot {
    workflowId: string;
    version: number;
    status: workflowStatus;
    steps: readonly StepDescriptor[];
    stepStates: StepState[];
    maxThinkingSteps: number;
    createdAt: Date;
    updatedAt: Date;
    failedStep?: number;
    activeCompensation?: number;
    output?: unknown;
    error?: ErrorRecord;
}

export interface SnapshotSummary {
    workflowId: string;
    version: number;
    status: workflowStatus;
    timestamp: Date;
}

export interface ReasoningOutput {
    answer: string;
    truncated: boolean;
    iterations: number;
    terminatedBy: terminationReason;
}

export interface WorkflowView {
    workflowId: string;
    status: workflowStatus;
    version: number;
    steps: Array<{
        name: string;
        status: stepStatus;
        attemptCount: number;
        output?: unknown;
        error?: ErrorRecord;
    }>;
    output?: unknown;
    error?: ErrorRecord;
}

const WORKFLOW_STATUSES: ReadonlyMap<string, workflowStatus> = new Map(
    Object.values(workflowStatus).map(s => [s, s]),
);
const STEP_STATUSES: ReadonlyMap<string, stepStatus> = new Map(
    Object.values(stepStatus).map(s => [s, s]),
);

export function parseWorkflowStatus(value: string): workflowStatus {
    const status = WORKFLOW_STATUSES.get(value);
    if (!status) throw new Error(`Unknown workflow status "${value}"`);
    return status;
}

export function parseStepStatus(value: string): stepStatus {
    const status = STEP_STATUSES.get(value);
    if (!status) throw new Error(`Unknown step status "${value}"`);
    return status;
}
