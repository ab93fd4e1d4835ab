import { z } from 'zod';
import {
    SagaloopError,
    SnapshotSummary,
    StorageError,
    VersionConflictError,
    WorkflowSnapshot,
} from '@sagaloop/sdk';
import { workflowSnapshotRowSchema } from '../db/snapshot.entity';
import { PoolLike, TransactionManager } from '../db/transaction.manager';
import { SnapshotStore } from '../snapshots/store';
import { decodeSnapshot, encodeSnapshot } from '../snapshots/codec';

const UNIQUE_VIOLATION = '23505';

const latestVersionRow = z.object({ version: z.number().int().nullable() });
const payloadRow = workflowSnapshotRowSchema.pick({ payload: true });
const summaryRow = workflowSnapshotRowSchema.pick({ workflow_id: true, version: true, status: true, updated_at: true });

function isUniqueViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

// Our own errors pass through; driver errors and unexpected rows become
// StorageError so the manager and gRPC layer can surface them verbatim.
function wrap(op: string, err: unknown): SagaloopError {
    if (err instanceof SagaloopError) return err;
    const message = err instanceof z.ZodError
        ? `unexpected row shape (${err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')})`
        : err instanceof Error ? err.message : String(err);
    return new StorageError(`Snapshot ${op} failed: ${message}`, err);
}

export class PostgresSnapshotStore implements SnapshotStore {
    private tx: TransactionManager;

    constructor(private pool: PoolLike) {
        this.tx = new TransactionManager(pool);
    }

    async put(snapshot: WorkflowSnapshot): Promise<void> {
        const payload = encodeSnapshot(snapshot);

        try {
            await this.tx.run(async (client) => {
                // serialises writers of the same workflow until commit
                await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [snapshot.workflowId]);

                const res = await client.query(
                    'SELECT MAX(version) AS version FROM workflow_snapshots WHERE workflow_id = $1',
                    [snapshot.workflowId]
                );
                const latest = res.rows.length > 0 ? latestVersionRow.parse(res.rows[0]).version ?? 0 : 0;
                if (snapshot.version !== latest + 1) {
                    throw new VersionConflictError(snapshot.workflowId, latest + 1, snapshot.version);
                }

                await client.query(
                    `INSERT INTO workflow_snapshots (workflow_id, version, status, payload, updated_at)
                     VALUES ($1, $2, $3, $4, $5)`,
                    [snapshot.workflowId, snapshot.version, snapshot.status, payload, snapshot.updatedAt]
                );
            });
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new VersionConflictError(snapshot.workflowId, snapshot.version + 1, snapshot.version);
            }
            throw wrap('write', err);
        }
    }

    async getLatest(workflowId: string): Promise<WorkflowSnapshot | null> {
        try {
            const res = await this.pool.query(
                'SELECT payload FROM workflow_snapshots WHERE workflow_id = $1 ORDER BY version DESC LIMIT 1',
                [workflowId]
            );
            if (res.rows.length === 0) return null;
            return decodeSnapshot(payloadRow.parse(res.rows[0]).payload);
        } catch (err) {
            throw wrap('read', err);
        }
    }

    async list(): Promise<SnapshotSummary[]> {
        try {
            const res = await this.pool.query(
                `SELECT DISTINCT ON (workflow_id) workflow_id, version, status, updated_at
                 FROM workflow_snapshots
                 ORDER BY workflow_id, version DESC`
            );
            return res.rows.map(raw => {
                const row = summaryRow.parse(raw);
                return {
                    workflowId: row.workflow_id,
                    version: row.version,
                    status: row.status,
                    timestamp: row.updated_at,
                };
            });
        } catch (err) {
            throw wrap('list', err);
        }
    }

    async delete(workflowId: string): Promise<number> {
        try {
            const res = await this.pool.query('DELETE FROM workflow_snapshots WHERE workflow_id = $1', [workflowId]);
            return res.rowCount ?? 0;
        } catch (err) {
            throw wrap('delete', err);
        }
    }

    async prune(workflowId: string, keep: number): Promise<number> {
        if (keep <= 0) return 0;
        try {
            const res = await this.pool.query(
                `DELETE FROM workflow_snapshots
                 WHERE workflow_id = $1
                   AND version <= (SELECT MAX(version) FROM workflow_snapshots WHERE workflow_id = $1) - $2`,
                [workflowId, keep]
            );
            return res.rowCount ?? 0;
        } catch (err) {
            throw wrap('prune', err);
        }
    }

    async ping(): Promise<void> {
        try {
            await this.pool.query('SELECT 1');
        } catch (err) {
            throw wrap('ping', err);
        }
    }
}
