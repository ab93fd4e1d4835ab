import { z } from 'zod';

/** One stored observation of the knowledge (memory) collaborator. */
export const knowledgeObservationRowSchema = z.object({
    id: z.string().uuid(),
    content: z.string(),
    metadata: z.record(z.string()),
    created_at: z.date(),
});

export type KnowledgeObservationEntity = z.infer<typeof knowledgeObservationRowSchema>;
