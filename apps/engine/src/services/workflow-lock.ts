/**
 * Per-workflow mutual exclusion: only the holder may advance a workflow.
 * `tryAcquire` never waits; a busy id returns false.
 */
export interface WorkflowLock {
    tryAcquire(workflowId: string): Promise<boolean>;
    release(workflowId: string): Promise<void>;
}

export class InProcessWorkflowLock implements WorkflowLock {
    private held = new Set<string>();

    async tryAcquire(workflowId: string): Promise<boolean> {
        if (this.held.has(workflowId)) return false;
        this.held.add(workflowId);
        return true;
    }

    async release(workflowId: string): Promise<void> {
        this.held.delete(workflowId);
    }

    isHeld(workflowId: string): boolean {
        return this.held.has(workflowId);
    }
}

/** The two ioredis commands the lock uses; an ioredis `Redis` satisfies it. */
export interface LockClient {
    set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>;
    eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
}

const KEY_PREFIX = 'sagaloop:workflow-lock:';

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("pexpire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

/**
 * Lock shared by every daemon pointed at the same Redis. Held keys carry a TTL
 * and are renewed at half of it while the workflow runs, so a crashed holder
 * frees the workflow once the TTL lapses.
 */
export class RedisWorkflowLock implements WorkflowLock {
    private ownerId: string;
    private renewals = new Map<string, NodeJS.Timeout>();

    constructor(
        private redis: LockClient,
        private ttlMs: number = 30000,
        ownerId?: string,
    ) {
        this.ownerId = ownerId || `daemon-${process.pid}-${Date.now()}`;
    }

    async tryAcquire(workflowId: string): Promise<boolean> {
        if (this.renewals.has(workflowId)) return false;

        // SET NX with TTL - atomic operation
        const result = await this.redis.set(KEY_PREFIX + workflowId, this.ownerId, 'PX', this.ttlMs, 'NX');
        if (result !== 'OK') return false;

        this.startRenewal(workflowId);
        return true;
    }

    async release(workflowId: string): Promise<void> {
        this.stopRenewal(workflowId);
        // only delete the key if we still own it
        await this.redis.eval(RELEASE_SCRIPT, 1, KEY_PREFIX + workflowId, this.ownerId);
    }

    /** Stop every renewal timer; keys expire on their own. */
    stop(): void {
        for (const workflowId of Array.from(this.renewals.keys())) {
            this.stopRenewal(workflowId);
        }
    }

    private startRenewal(workflowId: string): void {
        const timer = setInterval(() => {
            this.renew(workflowId)
                .then(stillHeld => {
                    if (!stillHeld) {
                        console.warn(`[lock] lost lock on workflow ${workflowId}`);
                        this.stopRenewal(workflowId);
                    }
                })
                .catch(err => console.error(`[lock] renewal failed for workflow ${workflowId}:`, err));
        }, Math.max(1, Math.floor(this.ttlMs / 2)));
        timer.unref();
        this.renewals.set(workflowId, timer);
    }

    private stopRenewal(workflowId: string): void {
        const timer = this.renewals.get(workflowId);
        if (timer) {
            clearInterval(timer);
            this.renewals.delete(workflowId);
        }
    }

    private async renew(workflowId: string): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, KEY_PREFIX + workflowId, this.ownerId, this.ttlMs);
        return result === 1;
    }
}
