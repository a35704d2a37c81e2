import crypto from 'crypto';
import type { AuditEntryDraft } from '../workflow/types.js';
import { GENESIS_HASH, type AuditRecord, type AuditRecordContents } from './schema.js';

/**
 * Audit Integrity
 * Sealing and verification of the per-session hash chain.
 */

/**
 * JSON with object keys sorted at every level. Stored JSON (jsonb in
 * particular) does not keep key order, so hashes are computed over this form.
 */
export function canonicalJson(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map(item => canonicalJson(item)).join(',')}]`;
    }
    if (value !== null && typeof value === 'object') {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
        return `{${entries.join(',')}}`;
    }
    return JSON.stringify(value);
}

export function computeRecordHash(contents: AuditRecordContents, prevHash: string): string {
    return crypto.createHash('sha256')
        .update(canonicalJson(contents) + prevHash)
        .digest('hex');
}

export function sealRecord(entry: AuditEntryDraft, recordId: string, prevHash: string): AuditRecord {
    const contents: AuditRecordContents = {
        recordId,
        sessionId: entry.sessionId,
        turnSequence: entry.turnSequence,
        fromState: entry.fromState,
        toState: entry.toState,
        trigger: entry.trigger,
        actor: entry.actor,
        timestamp: entry.timestamp,
        idempotencyToken: entry.token
    };
    return { ...contents, integrity: { prevHash, hash: computeRecordHash(contents, prevHash) } };
}

/**
 * Audit Integrity Verifier
 * Validates one session's chain, oldest record first.
 */
export function verifyAuditChain(records: readonly AuditRecord[]): {
    valid: boolean;
    violationIndex?: number;
    reason?: string
} {
    let lastHash = GENESIS_HASH;

    for (const [i, record] of records.entries()) {
        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        const { integrity, ...contents } = record;
        const computedHash = computeRecordHash(contents, integrity.prevHash);
        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}
