import { z } from 'zod';
import { db, type DbClient } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import { validate } from '../validation/zod-middleware.js';
import { EscalationCaseSchema } from './codec.js';
import type { EscalationRepository } from './repository.js';
import type { EscalationCase } from './types.js';

/**
 * PostgreSQL escalation repository (table `escalation_cases`).
 * The case body is stored as jsonb; status and timestamps are columns so
 * transitions can be guarded in SQL.
 */

interface CaseRow {
    case_body: unknown;
    status: string;
    notified_at: Date | null;
    acknowledged_at: Date | null;
    resolved_at: Date | null;
    resolution: string | null;
}

const StatusSchema = z.enum(['PENDING', 'ACKNOWLEDGED', 'RESOLVED']);

const SELECT_COLUMNS = 'case_body, status, notified_at, acknowledged_at, resolved_at, resolution';

export class PgEscalationRepository implements EscalationRepository {
    constructor(
        private readonly role: DbRole = 'refill_workflow',
        private readonly dbClient: DbClient = db
    ) { }

    async createIfAbsent(escalation: EscalationCase): Promise<EscalationCase> {
        const inserted = await this.dbClient.queryAsRole<CaseRow>(
            this.role,
            `INSERT INTO escalation_cases
                (escalation_id, session_id, idempotency_token, reason_code, target_role, status, case_body, created_at)
             VALUES ($1, $2, $3, $4, $5, 'PENDING', $6::jsonb, $7)
             ON CONFLICT (idempotency_token) DO NOTHING
             RETURNING ${SELECT_COLUMNS}`,
            [
                escalation.escalationId,
                escalation.sessionId,
                escalation.idempotencyToken,
                escalation.reasonCode,
                escalation.targetRole,
                JSON.stringify(escalation),
                escalation.createdAt
            ]
        );
        const row = inserted.rows[0];
        if (row) return toCase(row, escalation);

        const existing = await this.dbClient.queryAsRole<CaseRow>(
            this.role,
            `SELECT ${SELECT_COLUMNS} FROM escalation_cases WHERE idempotency_token = $1`,
            [escalation.idempotencyToken]
        );
        const existingRow = existing.rows[0];
        if (!existingRow) {
            throw new Error('Escalation case vanished between insert conflict and read');
        }
        return toCase(existingRow);
    }

    async findById(escalationId: string): Promise<EscalationCase | null> {
        const result = await this.dbClient.queryAsRole<CaseRow>(
            this.role,
            `SELECT ${SELECT_COLUMNS} FROM escalation_cases WHERE escalation_id = $1`,
            [escalationId]
        );
        const row = result.rows[0];
        return row ? toCase(row) : null;
    }

    async markNotified(escalationId: string, at: string): Promise<void> {
        await this.dbClient.queryAsRole(
            this.role,
            'UPDATE escalation_cases SET notified_at = $2 WHERE escalation_id = $1 AND notified_at IS NULL',
            [escalationId, at]
        );
    }

    async markAcknowledged(escalationId: string, at: string): Promise<boolean> {
        const result = await this.dbClient.queryAsRole(
            this.role,
            `UPDATE escalation_cases SET status = 'ACKNOWLEDGED', acknowledged_at = $2
             WHERE escalation_id = $1 AND status = 'PENDING'`,
            [escalationId, at]
        );
        return result.rowCount === 1;
    }

    async markResolved(escalationId: string, resolution: string, at: string): Promise<boolean> {
        const result = await this.dbClient.queryAsRole(
            this.role,
            `UPDATE escalation_cases SET status = 'RESOLVED', resolved_at = $2, resolution = $3
             WHERE escalation_id = $1 AND status = 'ACKNOWLEDGED'`,
            [escalationId, at, resolution]
        );
        return result.rowCount === 1;
    }

    async listUndelivered(limit: number): Promise<EscalationCase[]> {
        const result = await this.dbClient.queryAsRole<CaseRow>(
            this.role,
            `SELECT ${SELECT_COLUMNS} FROM escalation_cases
             WHERE status = 'PENDING' AND notified_at IS NULL
             ORDER BY created_at ASC
             LIMIT $1`,
            [limit]
        );
        return result.rows.map(row => toCase(row));
    }
}

function iso(value: Date | null): string | null {
    return value === null ? null : value.toISOString();
}

/**
 * Row columns are authoritative for lifecycle fields; the body holds the
 * immutable part of the case.
 */
function toCase(row: CaseRow, created?: EscalationCase): EscalationCase {
    const body = created ?? parseBody(row.case_body);
    return {
        ...body,
        status: validate(StatusSchema, row.status, 'EscalationCaseRow'),
        notifiedAt: iso(row.notified_at),
        acknowledgedAt: iso(row.acknowledged_at),
        resolvedAt: iso(row.resolved_at),
        resolution: row.resolution
    };
}

function parseBody(raw: unknown): EscalationCase {
    return validate(EscalationCaseSchema, raw, 'EscalationCaseBody');
}
