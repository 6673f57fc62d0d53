import { Pool, type PoolClient, type PoolConfig } from 'pg';
import { config } from '../config';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('postgres');

// SQLSTATE codes the directory reacts to
export const PG_ERROR_CODES = {
    UNIQUE_VIOLATION: '23505',
} as const;

const SLOW_QUERY_MS = 200;

let pool: Pool | null = null;

/**
 * Lazily created shared pool. Every statement is capped at the external
 * call timeout so a stuck query cannot outlive the caller's deadline.
 */
export function getPool(): Pool {
    if (!pool) {
        const poolConfig: PoolConfig = {
            connectionString: config.databaseUrl,
            application_name: 'auth-service',
            max: config.databasePoolMax,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: config.externalCallTimeoutMs,
            statement_timeout: config.externalCallTimeoutMs,
        };
        pool = new Pool(poolConfig);
        pool.on('error', (err) => {
            log.error({ err }, 'Idle client error');
        });
    }
    return pool;
}

export async function query<T = Record<string, unknown>>(
    text: string,
    params?: unknown[]
): Promise<T[]> {
    const start = Date.now();
    const result = await getPool().query(text, params);
    const duration = Date.now() - start;

    // Parameters carry password hashes; only the statement is logged.
    const statement = text.replace(/\s+/g, ' ').trim().slice(0, 80);
    if (duration >= SLOW_QUERY_MS) {
        log.warn({ statement, duration, rows: result.rowCount }, 'Slow query');
    } else {
        log.trace({ statement, duration, rows: result.rowCount }, 'Query');
    }
    return result.rows;
}

export async function queryOne<T = Record<string, unknown>>(
    text: string,
    params?: unknown[]
): Promise<T | null> {
    const rows = await query<T>(text, params);
    return rows[0] ?? null;
}

export function hasPgCode(err: unknown, code: string): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export async function transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getPool().connect();
    try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
    } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
            log.error({ err: rollbackErr }, 'Rollback failed');
        });
        throw err;
    } finally {
        client.release();
    }
}

export async function closePool(): Promise<void> {
    if (pool) {
        const closing = pool;
        pool = null;
        await closing.end();
        log.info('Pool closed');
    }
}
