import { v7 as uuid } from 'uuid';
import { KnowledgeStore, StorageError } from '@sagaloop/sdk';
import { knowledgeObservationRowSchema } from '../db/knowledge.entity';
import { Queryable } from '../db/transaction.manager';
import { extractKeywords } from '../knowledge/keywords';

const contentRow = knowledgeObservationRowSchema.pick({ content: true });

/**
 * Durable knowledge store (memory.persistent = true).
 * Matching is plain keyword ILIKE, newest first; no embeddings.
 */
export class PostgresKnowledgeStore implements KnowledgeStore {
    constructor(private pool: Queryable) { }

    async fetchContext(query: string, limit: number): Promise<string[]> {
        const patterns = extractKeywords(query).map(k => `%${k}%`);
        if (patterns.length === 0 || limit <= 0) return [];

        try {
            const res = await this.pool.query(
                `SELECT content FROM knowledge_observations
                 WHERE content ILIKE ANY($1::text[])
                 ORDER BY created_at DESC
                 LIMIT $2`,
                [patterns, limit]
            );
            return res.rows.map(row => contentRow.parse(row).content);
        } catch (err) {
            throw new StorageError(`Knowledge lookup failed: ${err instanceof Error ? err.message : String(err)}`, err);
        }
    }

    async storeObservation(content: string, metadata: Record<string, string>): Promise<void> {
        try {
            await this.pool.query(
                'INSERT INTO knowledge_observations (id, content, metadata) VALUES ($1, $2, $3)',
                [uuid(), content, JSON.stringify(metadata)]
            );
        } catch (err) {
            throw new StorageError(`Knowledge write failed: ${err instanceof Error ? err.message : String(err)}`, err);
        }
    }
}
