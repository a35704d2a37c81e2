import type { WorkflowSession } from '../workflow/types.js';

/**
 * Session factory and idempotency tokens.
 */

export function createSession(sessionId: string, now: Date, ttlMs: number): WorkflowSession {
    const timestamp = now.toISOString();
    return {
        sessionId,
        currentState: 'COLLECT_REQUEST',
        patientRef: null,
        identityConfirmed: false,
        activeMedications: [],
        collectedEntities: {},
        confirmedSlots: [],
        pendingCandidates: null,
        retryCounts: {},
        confidenceHistory: [],
        transcript: [],
        turnSequence: -1,
        lastTurn: null,
        escalationId: null,
        orderId: null,
        version: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
        ttlDeadline: new Date(now.getTime() + ttlMs).toISOString()
    };
}

/** Identifies one turn; evaluator calls and escalation cases dedupe on it. */
export function turnToken(sessionId: string, turnSequence: number): string {
    return `${sessionId}:${turnSequence}`;
}

/** Identifies one audit record within a turn. */
export function auditToken(sessionId: string, turnSequence: number, step: number): string {
    return `${turnToken(sessionId, turnSequence)}:${step}`;
}

/** Audit token for the reviewer acknowledgement, which happens outside any turn. */
export function acknowledgementToken(sessionId: string, escalationId: string): string {
    return `${sessionId}:ack:${escalationId}`;
}

export function isExpired(session: WorkflowSession, now: Date): boolean {
    return Date.parse(session.ttlDeadline) <= now.getTime();
}
