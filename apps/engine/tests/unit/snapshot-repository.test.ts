import { StorageError, VersionConflictError, WorkflowSnapshot, stepStatus, workflowStatus } from '@sagaloop/sdk';
import { PostgresSnapshotStore } from '../../src/repositories/snapshot.repository';
import { encodeSnapshot } from '../../src/snapshots/codec';
import { FakePool, SqlResult, quietConsole } from '../helpers/fakes';

function snapshot(version: number): WorkflowSnapshot {
    return {
        workflowId: 'wf-pg',
        version,
        status: workflowStatus.RUNNING,
        steps: [{ name: 'only', forward: { kind: 'noop' } }],
        stepStates: [{ status: stepStatus.SUCCEEDED, attemptCount: 0, output: 'hi' }],
        maxThinkingSteps: 10,
        createdAt: new Date('2026-04-01T10:00:00.000Z'),
        updatedAt: new Date('2026-04-01T10:05:00.000Z'),
    };
}

function withLatestVersion(latest: number | null, insert?: () => SqlResult): (text: string) => SqlResult {
    return (text) => {
        if (text.includes('MAX(version)')) return { rows: [{ version: latest }], rowCount: 1 };
        if (text.includes('INSERT') && insert) return insert();
        return { rows: [], rowCount: null };
    };
}

describe('PostgresSnapshotStore', () => {
    let pool: FakePool;
    let store: PostgresSnapshotStore;

    beforeEach(() => {
        quietConsole();
        pool = new FakePool();
        store = new PostgresSnapshotStore(pool);
    });

    it('inserts latest + 1 inside a locked transaction', async () => {
        pool.handler = withLatestVersion(2);
        const s = snapshot(3);

        await store.put(s);

        expect(pool.texts()).toEqual([
            'BEGIN',
            'SELECT pg_advisory_xact_lock(hashtext($1))',
            'SELECT MAX(version) AS version FROM workflow_snapshots WHERE workflow_id = $1',
            'INSERT INTO workflow_snapshots (workflow_id, version, status, payload, updated_at) VALUES ($1, $2, $3, $4, $5)',
            'COMMIT',
        ]);
        expect(pool.statements[3].values).toEqual(['wf-pg', 3, 'running', encodeSnapshot(s), s.updatedAt]);
        expect(pool.release).toHaveBeenCalledTimes(1);
    });

    it('accepts version 1 for a new workflow', async () => {
        pool.handler = withLatestVersion(null);
        await store.put(snapshot(1));
        expect(pool.texts()).toContain('COMMIT');
    });

    it('rolls back on a version conflict', async () => {
        pool.handler = withLatestVersion(2);

        await expect(store.put(snapshot(2))).rejects.toBeInstanceOf(VersionConflictError);
        expect(pool.texts()).toContain('ROLLBACK');
        expect(pool.texts().some(t => t.startsWith('INSERT'))).toBe(false);
        expect(pool.release).toHaveBeenCalledTimes(1);
    });

    it('maps a primary key violation to a version conflict', async () => {
        pool.handler = withLatestVersion(0, () => {
            throw Object.assign(new Error('duplicate key value'), { code: '23505' });
        });

        await expect(store.put(snapshot(1))).rejects.toBeInstanceOf(VersionConflictError);
    });

    it('wraps driver failures in StorageError', async () => {
        pool.connectError = new Error('connection refused');

        await expect(store.put(snapshot(1))).rejects.toThrow(new StorageError('Snapshot write failed: connection refused'));
    });

    it('decodes the newest payload', async () => {
        const s = snapshot(7);
        pool.handler = () => ({ rows: [{ payload: encodeSnapshot(s) }], rowCount: 1 });

        expect(await store.getLatest('wf-pg')).toEqual(s);
        expect(pool.statements[0].values).toEqual(['wf-pg']);
    });

    it('returns null when there are no rows', async () => {
        expect(await store.getLatest('missing')).toBeNull();
    });

    it('lists one summary per workflow', async () => {
        const at = new Date('2026-04-01T11:00:00.000Z');
        pool.handler = () => ({
            rows: [{ workflow_id: 'wf-pg', version: 4, status: 'compensated', updated_at: at }],
            rowCount: 1,
        });

        expect(await store.list()).toEqual([
            { workflowId: 'wf-pg', version: 4, status: workflowStatus.COMPENSATED, timestamp: at },
        ]);
    });

    it('reports rows of the wrong shape as StorageError', async () => {
        pool.handler = () => ({ rows: [{ workflow_id: 'wf-pg', version: 'four' }], rowCount: 1 });
        await expect(store.list()).rejects.toBeInstanceOf(StorageError);
    });

    it('deletes and prunes by workflow id', async () => {
        pool.handler = () => ({ rows: [], rowCount: 3 });

        expect(await store.delete('wf-pg')).toBe(3);
        expect(await store.prune('wf-pg', 2)).toBe(3);
        expect(await store.prune('wf-pg', 0)).toBe(0);
        expect(pool.statements.map(s => s.values)).toEqual([['wf-pg'], ['wf-pg', 2]]);
    });
});
