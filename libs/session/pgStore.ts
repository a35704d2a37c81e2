import { db, type DbClient } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import type { WorkflowSession } from '../workflow/types.js';
import { decodeSession, encodeSession } from './codec.js';
import type { SessionStore } from './store.js';

/**
 * PostgreSQL session store (table `workflow_sessions`).
 *
 * The version column carries the optimistic-concurrency check; an expired
 * row is treated as absent and may be replaced by a fresh session.
 */
export class PgSessionStore implements SessionStore {
    constructor(
        private readonly role: DbRole = 'refill_workflow',
        private readonly dbClient: DbClient = db
    ) { }

    async get(sessionId: string): Promise<WorkflowSession | null> {
        const result = await this.dbClient.queryAsRole<{ payload: unknown }>(
            this.role,
            `SELECT payload FROM workflow_sessions
             WHERE session_id = $1 AND expires_at > NOW()`,
            [sessionId]
        );
        const row = result.rows[0];
        return row ? decodeSession(row.payload) : null;
    }

    async put(session: WorkflowSession, ttlMs: number): Promise<void> {
        await this.dbClient.queryAsRole(
            this.role,
            `INSERT INTO workflow_sessions (session_id, version, current_state, payload, expires_at, updated_at)
             VALUES ($1, $2, $3, $4::jsonb, NOW() + ($5 * INTERVAL '1 millisecond'), NOW())
             ON CONFLICT (session_id) DO UPDATE SET
                version = EXCLUDED.version,
                current_state = EXCLUDED.current_state,
                payload = EXCLUDED.payload,
                expires_at = EXCLUDED.expires_at,
                updated_at = NOW()`,
            [session.sessionId, session.version, session.currentState, encodeSession(session), ttlMs]
        );
    }

    async compareAndPut(
        sessionId: string,
        expectedVersion: number | null,
        session: WorkflowSession,
        ttlMs: number
    ): Promise<boolean> {
        const params = [sessionId, session.version, session.currentState, encodeSession(session), ttlMs];

        if (expectedVersion === null) {
            const inserted = await this.dbClient.queryAsRole(
                this.role,
                `INSERT INTO workflow_sessions (session_id, version, current_state, payload, expires_at, updated_at)
                 VALUES ($1, $2, $3, $4::jsonb, NOW() + ($5 * INTERVAL '1 millisecond'), NOW())
                 ON CONFLICT (session_id) DO UPDATE SET
                    version = EXCLUDED.version,
                    current_state = EXCLUDED.current_state,
                    payload = EXCLUDED.payload,
                    expires_at = EXCLUDED.expires_at,
                    updated_at = NOW()
                 WHERE workflow_sessions.expires_at <= NOW()
                 RETURNING session_id`,
                params
            );
            return inserted.rowCount === 1;
        }

        const updated = await this.dbClient.queryAsRole(
            this.role,
            `UPDATE workflow_sessions SET
                version = $2,
                current_state = $3,
                payload = $4::jsonb,
                expires_at = NOW() + ($5 * INTERVAL '1 millisecond'),
                updated_at = NOW()
             WHERE session_id = $1 AND version = $6 AND expires_at > NOW()`,
            [...params, expectedVersion]
        );
        return updated.rowCount === 1;
    }

    async delete(sessionId: string): Promise<void> {
        await this.dbClient.queryAsRole(this.role, 'DELETE FROM workflow_sessions WHERE session_id = $1', [sessionId]);
    }
}
