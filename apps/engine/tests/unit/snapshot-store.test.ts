import { VersionConflictError, WorkflowSnapshot, stepStatus, workflowStatus } from '@sagaloop/sdk';
import { InMemorySnapshotStore } from '../../src/snapshots/store';

function version(workflowId: string, v: number, status = workflowStatus.RUNNING): WorkflowSnapshot {
    return {
        workflowId,
        version: v,
        status,
        steps: [{ name: 'only', forward: { kind: 'noop' } }],
        stepStates: [{ status: stepStatus.NOT_STARTED, attemptCount: 0 }],
        maxThinkingSteps: 10,
        createdAt: new Date('2026-03-01T00:00:00.000Z'),
        updatedAt: new Date(Date.UTC(2026, 2, 1, 0, v)),
    };
}

describe('InMemorySnapshotStore', () => {
    let store: InMemorySnapshotStore;

    beforeEach(() => {
        store = new InMemorySnapshotStore();
    });

    it('returns null for an unknown workflow', async () => {
        expect(await store.getLatest('missing')).toBeNull();
    });

    it('accepts a gapless version sequence starting at 1', async () => {
        await store.put(version('wf', 1, workflowStatus.PENDING));
        await store.put(version('wf', 2));

        const latest = await store.getLatest('wf');
        expect(latest?.version).toBe(2);
        expect(latest?.status).toBe(workflowStatus.RUNNING);
    });

    it('rejects a first version other than 1', async () => {
        await expect(store.put(version('wf', 2))).rejects.toBeInstanceOf(VersionConflictError);
    });

    it('rejects skipped and overwritten versions', async () => {
        await store.put(version('wf', 1));
        await store.put(version('wf', 2));

        await expect(store.put(version('wf', 4))).rejects.toThrow('expected 3, got 4');
        await expect(store.put(version('wf', 2))).rejects.toThrow('expected 3, got 2');
        expect((await store.getLatest('wf'))?.version).toBe(2);
    });

    it('hands out copies, not the stored objects', async () => {
        const original = version('wf', 1);
        await store.put(original);
        original.stepStates[0].attemptCount = 99;

        const loaded = await store.getLatest('wf');
        expect(loaded?.stepStates[0].attemptCount).toBe(0);
    });

    it('lists the latest version of each workflow', async () => {
        await store.put(version('b', 1));
        await store.put(version('a', 1));
        await store.put(version('a', 2, workflowStatus.COMPLETED));

        expect(await store.list()).toEqual([
            { workflowId: 'a', version: 2, status: workflowStatus.COMPLETED, timestamp: new Date(Date.UTC(2026, 2, 1, 0, 2)) },
            { workflowId: 'b', version: 1, status: workflowStatus.RUNNING, timestamp: new Date(Date.UTC(2026, 2, 1, 0, 1)) },
        ]);
    });

    it('prunes old versions but keeps the sequence going', async () => {
        for (let v = 1; v <= 5; v++) await store.put(version('wf', v));

        expect(await store.prune('wf', 2)).toBe(3);
        expect(await store.prune('wf', 2)).toBe(0);
        expect((await store.getLatest('wf'))?.version).toBe(5);

        await store.put(version('wf', 6));
        expect((await store.getLatest('wf'))?.version).toBe(6);
    });

    it('deletes every version of a workflow', async () => {
        await store.put(version('wf', 1));
        await store.put(version('wf', 2));

        expect(await store.delete('wf')).toBe(2);
        expect(await store.getLatest('wf')).toBeNull();
        expect(await store.list()).toEqual([]);

        await store.put(version('wf', 1));
        expect((await store.getLatest('wf'))?.version).toBe(1);
    });
});
