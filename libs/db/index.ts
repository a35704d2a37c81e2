import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { assertDbRole, DB_ROLES, type DbRole } from './roles.js';

const { Pool } = pg;

/**
 * PostgreSQL access for the session, audit and escalation stores.
 *
 * The pool is created on first use, after the configuration guard passes, so
 * processes that run entirely on in-memory stores never need DB settings.
 * Every query runs under an explicit role.
 */

const DB_LOG = logger.child({ component: 'db' });

let pool: pg.Pool | undefined;

function getPool(): pg.Pool {
    if (pool) return pool;

    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const isProtectedEnv = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'staging';
    const poolMax = process.env.DB_POOL_MAX ? parseInt(process.env.DB_POOL_MAX, 10) : 20;
    const useTls = isProtectedEnv || process.env.DB_SSL_QUERY === 'true';

    pool = new Pool({
        host: process.env.DB_HOST,
        port: Number(process.env.DB_PORT),
        user: process.env.DB_USER,
        password: process.env.DB_PASSWORD,
        database: process.env.DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: useTls ? { rejectUnauthorized: true, ca: process.env.DB_CA_CERT } : false
    });
    pool.on('error', error => {
        DB_LOG.error({ error }, '[DB] Idle client error');
    });
    return pool;
}

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

/**
 * The surface the stores depend on. Tests substitute a mock implementation.
 */
export interface DbClient {
    queryAsRole<T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params?: unknown[]
    ): Promise<pg.QueryResult<T>>;
    transactionAsRole<T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T>;
}

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function verifyRole(client: pg.PoolClient, role: DbRole): Promise<void> {
    const roleCheck = await client.query<{ current_user: string }>('SELECT current_user');
    const currentUser = roleCheck.rows[0]?.current_user;
    if (currentUser !== role) {
        throw new Error(`CRITICAL: Role enforcement failure. Target: ${role}, Actual: ${currentUser}`);
    }
}

async function resetRole(client: pg.PoolClient, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        DB_LOG.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        DB_LOG.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

class TaintedClientError extends Error {
    constructor(public override readonly cause: unknown) {
        super('Transaction outcome unknown; connection discarded');
        this.name = 'TaintedClientError';
    }
}

async function runTransaction<T>(
    client: pg.PoolClient,
    role: DbRole,
    callback: (tx: TxClient) => Promise<T>
): Promise<T> {
    const store = transactionContext.getStore();
    if (store?.inTx) {
        throw new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');
            await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
            await verifyRole(client, role);

            const txClient: TxClient = {
                query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<R>(text, params)
            };

            const result = await callback(txClient);
            commitAttempted = true;
            await client.query('COMMIT');
            return result;
        } catch (error) {
            let rollbackFailed = false;
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                rollbackFailed = true;
                DB_LOG.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            if (commitAttempted || rollbackFailed) {
                throw new TaintedClientError(error);
            }
            throw error;
        }
    });
}

export const db: DbClient & { probeRoles(): Promise<void>; close(): Promise<void> } = {
    /**
     * Role is applied per call, never globally.
     */
    queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params?: unknown[]
    ): Promise<pg.QueryResult<T>> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        try {
            await client.query(`SET ROLE ${quoteIdentifier(validatedRole)}`);
            await verifyRole(client, validatedRole);
            return await client.query<T>(text, params);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryAsRoleFailure');
        } finally {
            const resetOk = await resetRole(client, 'queryAsRole');
            releaseClient(client, !resetOk, 'queryAsRole');
        }
    },

    /**
     * Executes a callback within a managed transaction. Rolls back on error;
     * a connection whose commit or rollback failed is destroyed.
     */
    transactionAsRole: async <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        let forceDestroy = false;
        try {
            return await runTransaction(client, validatedRole, callback);
        } catch (error) {
            forceDestroy = error instanceof TaintedClientError;
            throw ErrorSanitizer.sanitize(
                error instanceof TaintedClientError ? error.cause : error,
                'DatabaseLayer:TransactionFailed'
            );
        } finally {
            const resetOk = await resetRole(client, 'transactionAsRole');
            releaseClient(client, forceDestroy || !resetOk, 'transactionAsRole');
        }
    },

    /**
     * Boot-time probe: DB_USER must be able to SET ROLE into each role.
     */
    probeRoles: async (): Promise<void> => {
        const client = await getPool().connect();
        try {
            for (const role of DB_ROLES) {
                await client.query('BEGIN');
                try {
                    await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
                    await verifyRole(client, role);
                    await client.query('ROLLBACK');
                } catch (error) {
                    try {
                        await client.query('ROLLBACK');
                    } catch (rollbackError) {
                        DB_LOG.error({ error: rollbackError }, '[DB] Failed to rollback role probe');
                    }
                    throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:ProbeRolesFailure');
                }
            }
        } finally {
            releaseClient(client, false, 'probeRoles');
        }
    },

    close: async (): Promise<void> => {
        if (!pool) return;
        const closing = pool;
        pool = undefined;
        await closing.end();
    }
};

export type { DbRole };
