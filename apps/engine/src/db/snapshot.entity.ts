import { z } from 'zod';
import { workflowStatus } from '@sagaloop/sdk';

/**
 * One persisted version of a workflow snapshot.
 * Rows are append-only: (workflow_id, version) is the primary key and a
 * workflow's versions form a gapless sequence starting at 1.
 */
export const workflowSnapshotRowSchema = z.object({
    workflow_id: z.string(),
    version: z.number().int(),
    status: z.nativeEnum(workflowStatus),
    payload: z.string(),  // superjson-encoded WorkflowSnapshot
    updated_at: z.date(),
    created_at: z.date(),
});

export type WorkflowSnapshotEntity = z.infer<typeof workflowSnapshotRowSchema>;
