import { SnapshotSummary, VersionConflictError, WorkflowSnapshot } from '@sagaloop/sdk';
import { decodeSnapshot, encodeSnapshot } from './codec';

/**
 * Durable home of workflow snapshots, keyed by (workflowId, version).
 * `put` is atomic and only accepts `latest + 1` (the first version is 1).
 */
export interface SnapshotStore {
    put(snapshot: WorkflowSnapshot): Promise<void>;
    getLatest(workflowId: string): Promise<WorkflowSnapshot | null>;
    list(): Promise<SnapshotSummary[]>;
    delete(workflowId: string): Promise<number>;
    // Keep only the newest `keep` versions of a workflow.
    prune(workflowId: string, keep: number): Promise<number>;
    ping(): Promise<void>;
}

interface StoredVersion {
    version: number;
    summary: SnapshotSummary;
    payload: string;
}

// Entries are stored encoded, so callers never share object references with
// the store and every read goes through the same codec as the Postgres store.
export class InMemorySnapshotStore implements SnapshotStore {
    private versions = new Map<string, StoredVersion[]>();

    async put(snapshot: WorkflowSnapshot): Promise<void> {
        const history = this.versions.get(snapshot.workflowId) ?? [];
        const latest = history.length > 0 ? history[history.length - 1].version : 0;
        if (snapshot.version !== latest + 1) {
            throw new VersionConflictError(snapshot.workflowId, latest + 1, snapshot.version);
        }

        const payload = encodeSnapshot(snapshot);
        history.push({
            version: snapshot.version,
            payload,
            summary: {
                workflowId: snapshot.workflowId,
                version: snapshot.version,
                status: snapshot.status,
                timestamp: snapshot.updatedAt,
            },
        });
        this.versions.set(snapshot.workflowId, history);
    }

    async getLatest(workflowId: string): Promise<WorkflowSnapshot | null> {
        const history = this.versions.get(workflowId);
        if (!history || history.length === 0) return null;
        return decodeSnapshot(history[history.length - 1].payload);
    }

    async list(): Promise<SnapshotSummary[]> {
        const summaries: SnapshotSummary[] = [];
        for (const history of this.versions.values()) {
            if (history.length > 0) summaries.push({ ...history[history.length - 1].summary });
        }
        return summaries.sort((a, b) => a.workflowId.localeCompare(b.workflowId));
    }

    async delete(workflowId: string): Promise<number> {
        const removed = this.versions.get(workflowId)?.length ?? 0;
        this.versions.delete(workflowId);
        return removed;
    }

    async prune(workflowId: string, keep: number): Promise<number> {
        const history = this.versions.get(workflowId);
        if (!history || keep <= 0 || history.length <= keep) return 0;
        const removed = history.length - keep;
        this.versions.set(workflowId, history.slice(removed));
        return removed;
    }

    async ping(): Promise<void> {
        return;
    }
}
