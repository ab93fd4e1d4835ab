/**
 * Database connection management for Postgres and Redis.
 * The daemon builds these once at startup and tears them down on shutdown.
 */
import fs from 'fs';
import path from 'path';
import Redis from 'ioredis';
import { Pool } from 'pg';
import { Queryable } from './transaction.manager';

// `npm run build` copies schema.sql next to the compiled module
export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    const pool = new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
        console.error('[db] unexpected error on idle client', err);
    });

    return pool;
}

/** Redis client backing the distributed workflow lock */
export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}

/** Apply schema.sql; every statement is idempotent. */
export async function migrate(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
    const sql = await fs.promises.readFile(schemaPath, 'utf-8');
    await db.query(sql);
    console.log('[db] schema applied');
}
