import { KnowledgeStore } from '@sagaloop/sdk';
import { extractKeywords } from './keywords';

interface Observation {
    content: string;
    metadata: Record<string, string>;
    terms: Set<string>;
    seq: number;
}

// Ephemeral knowledge store used when memory.persistent is off. Oldest
// observations are evicted once `maxEntries` is reached.
export class InMemoryKnowledgeStore implements KnowledgeStore {
    private observations: Observation[] = [];
    private seq = 0;

    constructor(private maxEntries = 1000) { }

    async fetchContext(query: string, limit: number): Promise<string[]> {
        const keywords = extractKeywords(query);
        if (keywords.length === 0 || limit <= 0) return [];

        return this.observations
            .map(o => ({ o, score: keywords.filter(k => o.terms.has(k)).length }))
            .filter(s => s.score > 0)
            .sort((a, b) => b.score - a.score || b.o.seq - a.o.seq)
            .slice(0, limit)
            .map(s => s.o.content);
    }

    async storeObservation(content: string, metadata: Record<string, string>): Promise<void> {
        this.observations.push({
            content,
            metadata: { ...metadata },
            terms: new Set(extractKeywords(content)),
            seq: this.seq++,
        });
        if (this.observations.length > this.maxEntries) {
            this.observations.splice(0, this.observations.length - this.maxEntries);
        }
    }

    get size(): number {
        return this.observations.length;
    }
}
