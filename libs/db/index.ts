import pg from 'pg';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import type { GatewaySettings } from '../bootstrap/settings.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type Database = Queryable & {
    close(): Promise<void>;
};

/**
 * PostgreSQL pool for the processed-transaction index.
 * Every suspension point is bounded: connect, statement and client-side query timeouts.
 */
export function createPool(settings: GatewaySettings['database'], timeoutMs: number): pg.Pool {
    const pool = new Pool({
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        max: settings.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: timeoutMs,
        query_timeout: timeoutMs,
        statement_timeout: timeoutMs,
        ssl: settings.ssl
            ? { rejectUnauthorized: true, ca: settings.caCert }
            : false
    });

    pool.on('error', (error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return pool;
}

export function createDatabase(pool: pg.Pool): Database {
    return {
        query: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
            text: string,
            params?: unknown[]
        ): Promise<pg.QueryResult<T>> => {
            try {
                return await pool.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryFailure');
            }
        },

        close: async (): Promise<void> => {
            await pool.end();
        }
    };
}
