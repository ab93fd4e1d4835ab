import superjson from 'superjson';
import { z } from 'zod';
import { SerializationError, WorkflowSnapshot, stepStatus, workflowStatus } from '@sagaloop/sdk';

const MAX_SNAPSHOT_SIZE = 1024 * 1024; // 1MB

export const errorRecordSchema = z.object({
    name: z.string(),
    message: z.string(),
    code: z.string().optional(),
    details: z.record(z.unknown()).optional(),
});

export const actionSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('reason'),
        instruction: z.string().min(1),
        maxThinkingSteps: z.number().int().positive().optional(),
    }),
    z.object({
        kind: z.literal('tool'),
        tool: z.string().min(1),
        args: z.record(z.unknown()).default({}),
    }),
    z.object({ kind: z.literal('noop') }),
]);

export const stepDescriptorSchema = z.object({
    name: z.string().min(1),
    forward: actionSchema,
    compensation: actionSchema.optional(),
    maxRetries: z.number().int().nonnegative().optional(),
});

const stepStateSchema = z.object({
    status: z.nativeEnum(stepStatus),
    attemptCount: z.number().int().nonnegative(),
    output: z.unknown().optional(),
    error: errorRecordSchema.optional(),
    startedAt: z.date().optional(),
    completedAt: z.date().optional(),
});

const snapshotSchema = z.object({
    workflowId: z.string().min(1),
    version: z.number().int().positive(),
    status: z.nativeEnum(workflowStatus),
    steps: z.array(stepDescriptorSchema).min(1),
    stepStates: z.array(stepStateSchema),
    maxThinkingSteps: z.number().int().positive(),
    createdAt: z.date(),
    updatedAt: z.date(),
    failedStep: z.number().int().nonnegative().optional(),
    activeCompensation: z.number().int().nonnegative().optional(),
    output: z.unknown().optional(),
    error: errorRecordSchema.optional(),
}).refine(s => s.stepStates.length === s.steps.length, {
    message: 'stepStates must have one entry per step',
    path: ['stepStates'],
});

// superjson keeps Dates (and any Map/Set a tool returns) intact across the
// round trip, so a decoded snapshot compares equal to the one that was encoded.
export function encodeSnapshot(snapshot: WorkflowSnapshot): string {
    let encoded: string;
    try {
        encoded = superjson.stringify(snapshot);
    } catch (err) {
        throw new SerializationError(`Failed to serialize snapshot: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(encoded);
    if (size > MAX_SNAPSHOT_SIZE) {
        throw new SerializationError(
            `Snapshot for "${snapshot.workflowId}" exceeds maximum size of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
        );
    }
    return encoded;
}

export function decodeSnapshot(payload: string): WorkflowSnapshot {
    let raw: unknown;
    try {
        raw = superjson.parse<unknown>(payload);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize snapshot: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw new SerializationError(`Invalid snapshot payload: ${issues}`);
    }
    return parsed.data;
}
