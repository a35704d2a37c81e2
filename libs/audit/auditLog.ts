import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import type { AuditEntryDraft } from '../workflow/types.js';
import { sealRecord } from './integrity.js';
import { GENESIS_HASH, type AppendOutcome, type AuditRecord } from './schema.js';

/**
 * Append-only audit log contract.
 * `append` is idempotent on the entry's token: a repeated token is reported,
 * never written twice.
 */
export interface AuditLog {
    append(entry: AuditEntryDraft): Promise<AppendOutcome>;
    listBySession(sessionId: string): Promise<AuditRecord[]>;
}

const AUDIT_LOG = logger.child({ component: 'audit' });

/**
 * Process-local audit log for tests and single-node development.
 */
export class InMemoryAuditLog implements AuditLog {
    private readonly bySession = new Map<string, AuditRecord[]>();
    private readonly tokens = new Set<string>();

    constructor(private readonly newRecordId: () => string = () => crypto.randomUUID()) { }

    async append(entry: AuditEntryDraft): Promise<AppendOutcome> {
        if (this.tokens.has(entry.token)) {
            return 'DUPLICATE_TOKEN';
        }

        const chain = this.bySession.get(entry.sessionId) ?? [];
        const prevHash = chain.at(-1)?.integrity.hash ?? GENESIS_HASH;
        const record = sealRecord(entry, this.newRecordId(), prevHash);

        chain.push(record);
        this.bySession.set(entry.sessionId, chain);
        this.tokens.add(entry.token);

        AUDIT_LOG.debug({
            sessionId: entry.sessionId,
            transition: `${entry.fromState}->${entry.toState}`,
            integrityHash: record.integrity.hash.substring(0, 16) + '...'
        }, 'Audit record appended');
        return 'ACK';
    }

    async listBySession(sessionId: string): Promise<AuditRecord[]> {
        return [...(this.bySession.get(sessionId) ?? [])];
    }
}
