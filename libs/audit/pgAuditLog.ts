import crypto from 'crypto';
import { db, type DbClient } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import { logger } from '../logging/logger.js';
import type { AuditEntryDraft } from '../workflow/types.js';
import type { AuditLog } from './auditLog.js';
import { sealRecord } from './integrity.js';
import { GENESIS_HASH, type AppendOutcome, type AuditRecord } from './schema.js';

/**
 * PostgreSQL audit log (table `workflow_audit`).
 *
 * Appends for one session are serialized by a transaction-scoped advisory
 * lock so the chain head read and the insert cannot interleave. The unique
 * idempotency_token column rejects repeats.
 */
export class PgAuditLog implements AuditLog {
    private readonly log = logger.child({ component: 'audit' });

    constructor(
        private readonly role: DbRole = 'refill_auditor',
        private readonly dbClient: DbClient = db
    ) { }

    async append(entry: AuditEntryDraft): Promise<AppendOutcome> {
        const outcome = await this.dbClient.transactionAsRole(this.role, async tx => {
            await tx.query('SELECT pg_advisory_xact_lock(hashtext($1))', [entry.sessionId]);

            const existing = await tx.query(
                'SELECT 1 FROM workflow_audit WHERE idempotency_token = $1',
                [entry.token]
            );
            if (existing.rows.length > 0) {
                return 'DUPLICATE_TOKEN' as const;
            }

            const head = await tx.query<{ hash: string }>(
                `SELECT hash FROM workflow_audit
                 WHERE session_id = $1
                 ORDER BY seq DESC
                 LIMIT 1`,
                [entry.sessionId]
            );
            const prevHash = head.rows[0]?.hash ?? GENESIS_HASH;
            const record = sealRecord(entry, crypto.randomUUID(), prevHash);

            const inserted = await tx.query(
                `INSERT INTO workflow_audit (record_id, session_id, idempotency_token, record, hash, created_at)
                 VALUES ($1, $2, $3, $4::jsonb, $5, $6)
                 ON CONFLICT (idempotency_token) DO NOTHING
                 RETURNING record_id`,
                [record.recordId, record.sessionId, entry.token, JSON.stringify(record), record.integrity.hash, record.timestamp]
            );
            return inserted.rowCount === 1 ? 'ACK' as const : 'DUPLICATE_TOKEN' as const;
        });

        this.log.debug({ sessionId: entry.sessionId, outcome }, 'Audit append');
        return outcome;
    }

    async listBySession(sessionId: string): Promise<AuditRecord[]> {
        const result = await this.dbClient.queryAsRole<{ record: AuditRecord }>(
            this.role,
            'SELECT record FROM workflow_audit WHERE session_id = $1 ORDER BY seq ASC',
            [sessionId]
        );
        return result.rows.map(row => row.record);
    }
}
