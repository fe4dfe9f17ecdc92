import pg from 'pg';
import { DbConfig } from '../bootstrap/config/db-config.js';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

/**
 * Minimal query surface shared by pools, pool clients and test stand-ins.
 * Rows are untyped here; callers parse them.
 */
export type Queryable = {
    query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
};

/**
 * PostgreSQL pool built from validated config. No connection is opened
 * until the first query.
 */
export function createPool(config: DbConfig): pg.Pool {
    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl === false
            ? false
            : { rejectUnauthorized: true, ca: config.ssl.ca }
    });

    pool.on('error', (error: Error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return pool;
}

export function asQueryable(pool: pg.Pool): Queryable {
    return {
        query: (text: string, params?: unknown[]) => pool.query(text, params)
    };
}
