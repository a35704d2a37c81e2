import type { EscalationCase } from './types.js';

/**
 * Escalation case persistence. Cases outlive the session that opened them.
 */
export interface EscalationRepository {
    /** Stores the case unless one exists for its idempotency token; returns the stored case. */
    createIfAbsent(escalation: EscalationCase): Promise<EscalationCase>;
    findById(escalationId: string): Promise<EscalationCase | null>;
    markNotified(escalationId: string, at: string): Promise<void>;
    /** PENDING -> ACKNOWLEDGED. False when the case was not PENDING. */
    markAcknowledged(escalationId: string, at: string): Promise<boolean>;
    /** ACKNOWLEDGED -> RESOLVED. False when the case was not ACKNOWLEDGED. */
    markResolved(escalationId: string, resolution: string, at: string): Promise<boolean>;
    /** Pending cases whose notification has not been delivered, oldest first. */
    listUndelivered(limit: number): Promise<EscalationCase[]>;
}

export class InMemoryEscalationRepository implements EscalationRepository {
    private readonly cases = new Map<string, EscalationCase>();
    private readonly byToken = new Map<string, string>();

    async createIfAbsent(escalation: EscalationCase): Promise<EscalationCase> {
        const existingId = this.byToken.get(escalation.idempotencyToken);
        const existing = existingId === undefined ? undefined : this.cases.get(existingId);
        if (existing) return existing;

        this.cases.set(escalation.escalationId, escalation);
        this.byToken.set(escalation.idempotencyToken, escalation.escalationId);
        return escalation;
    }

    async findById(escalationId: string): Promise<EscalationCase | null> {
        return this.cases.get(escalationId) ?? null;
    }

    async markNotified(escalationId: string, at: string): Promise<void> {
        const current = this.cases.get(escalationId);
        if (current && current.notifiedAt === null) {
            this.cases.set(escalationId, { ...current, notifiedAt: at });
        }
    }

    async markAcknowledged(escalationId: string, at: string): Promise<boolean> {
        const current = this.cases.get(escalationId);
        if (!current || current.status !== 'PENDING') return false;
        this.cases.set(escalationId, { ...current, status: 'ACKNOWLEDGED', acknowledgedAt: at });
        return true;
    }

    async markResolved(escalationId: string, resolution: string, at: string): Promise<boolean> {
        const current = this.cases.get(escalationId);
        if (!current || current.status !== 'ACKNOWLEDGED') return false;
        this.cases.set(escalationId, { ...current, status: 'RESOLVED', resolvedAt: at, resolution });
        return true;
    }

    async listUndelivered(limit: number): Promise<EscalationCase[]> {
        return [...this.cases.values()]
            .filter(c => c.status === 'PENDING' && c.notifiedAt === null)
            .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
            .slice(0, limit);
    }
}
