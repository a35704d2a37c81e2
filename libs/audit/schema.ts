/**
 * Workflow Audit Schema
 *
 * One record per state transition. Records are append-only and chained per
 * session: each carries the hash of its predecessor, so removal, reordering
 * or edits anywhere in a session's history are detectable.
 */

import type { WorkflowState } from '../workflow/states.js';
import type { AuditTrigger } from '../workflow/types.js';

export const GENESIS_HASH = '0'.repeat(64);

export interface AuditRecord {
    recordId: string;
    sessionId: string;
    turnSequence: number;
    fromState: WorkflowState;
    toState: WorkflowState;
    trigger: AuditTrigger;
    actor: string;
    timestamp: string;      // ISO-8601
    idempotencyToken: string;
    integrity: {
        prevHash: string;   // Hash of the session's preceding record
        hash: string;       // SHA-256(canonical(record without integrity) || prevHash)
    };
}

export type AuditRecordContents = Omit<AuditRecord, 'integrity'>;

export type AppendOutcome = 'ACK' | 'DUPLICATE_TOKEN';
