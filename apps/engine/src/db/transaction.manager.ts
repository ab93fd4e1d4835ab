/** The part of a pg Pool/PoolClient the repositories use; rows are validated by the caller. */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface PoolLike extends Queryable {
    connect(): Promise<Queryable & { release(): void }>;
}

/**
 * Runs a callback inside a database transaction.
 * Commits on success, rolls back on error.
 */
export class TransactionManager {
    constructor(private pool: PoolLike) { }

    /**
     * @returns Result from the callback
     * @throws Re-throws any error from the callback after rollback
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [workflowId]);
     *   await client.query('INSERT INTO workflow_snapshots ...');
     * });
     */
    async run<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK').catch(rollbackErr =>
                console.error('[db] rollback failed:', rollbackErr)
            );
            throw e;
        } finally {
            client.release();
        }
    }
}
