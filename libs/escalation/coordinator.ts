/**
 * Escalation Coordinator
 *
 * Owns the lifecycle of a handoff to a human reviewer:
 *   prepareCase   -> the case a turn will open
 *   openCase      -> PENDING (idempotent per turn token)
 *   notify        -> stamps notifiedAt once delivered
 *   acknowledge   -> ACKNOWLEDGED, and the session moves to ESCALATION_COMPLETE
 *   resolve       -> RESOLVED
 *
 * Notification is best effort and never undoes a committed turn; undelivered
 * cases are picked up again by redeliverPending().
 */

import crypto from 'crypto';
import { InvalidTransitionError, NotFoundError } from '../errors/workflowErrors.js';
import { logger } from '../logging/logger.js';
import type { WorkflowState } from '../workflow/states.js';
import type { BreakerTrip, EscalationReasonCode, VerdictMap, WorkflowSession } from '../workflow/types.js';
import { buildContextPackage } from './contextPackage.js';
import { toMessage, type EscalationNotifier } from './notifier.js';
import type { EscalationRepository } from './repository.js';
import { routeEscalation } from './routing.js';
import type { EscalationCase } from './types.js';

export interface EscalationRequest {
    readonly reasonCode: EscalationReasonCode;
    readonly trip?: BreakerTrip;
}

export type HandoffOutcome = 'COMPLETED' | 'ALREADY_COMPLETE' | 'SESSION_EXPIRED';

/**
 * Moves the session that owns an escalation to ESCALATION_COMPLETE.
 * Implemented by the session controller, which holds the session lock.
 */
export interface HandoffCompleter {
    completeHandoff(sessionId: string, escalationId: string): Promise<HandoffOutcome>;
}

export interface EscalationCoordinatorOptions {
    readonly now?: () => Date;
    readonly newId?: () => string;
    readonly redeliveryBatchSize?: number;
}

export class EscalationCoordinator {
    private readonly log = logger.child({ component: 'escalation-coordinator' });
    private readonly now: () => Date;
    private readonly newId: () => string;
    private readonly redeliveryBatchSize: number;

    constructor(
        private readonly repository: EscalationRepository,
        private readonly notifier: EscalationNotifier,
        options: EscalationCoordinatorOptions = {}
    ) {
        this.now = options.now ?? (() => new Date());
        this.newId = options.newId ?? (() => crypto.randomUUID());
        this.redeliveryBatchSize = options.redeliveryBatchSize ?? 50;
    }

    /**
     * Builds the case for an escalating turn without storing it. The
     * controller records it with the turn and stores it through openCase()
     * once the session write and its audit entries have landed.
     */
    prepareCase(
        session: WorkflowSession,
        request: EscalationRequest,
        verdicts: VerdictMap,
        escalatedFrom: WorkflowState,
        token: string
    ): EscalationCase {
        return {
            escalationId: this.newId(),
            sessionId: session.sessionId,
            idempotencyToken: token,
            reasonCode: request.reasonCode,
            trip: request.trip ?? null,
            contextPackage: buildContextPackage(session, verdicts, escalatedFrom),
            targetRole: routeEscalation(request.reasonCode),
            status: 'PENDING',
            createdAt: this.now().toISOString(),
            notifiedAt: null,
            acknowledgedAt: null,
            resolvedAt: null,
            resolution: null
        };
    }

    /**
     * Stores a prepared case, or returns the one already stored under the
     * same token.
     */
    async openCase(candidate: EscalationCase): Promise<EscalationCase> {
        const stored = await this.repository.createIfAbsent(candidate);
        this.log.info({
            escalationId: stored.escalationId,
            sessionId: stored.sessionId,
            reasonCode: stored.reasonCode,
            targetRole: stored.targetRole,
            reused: stored.escalationId !== candidate.escalationId
        }, 'Escalation case opened');
        return stored;
    }

    /**
     * Sends the reviewer notification. Failures are logged and reported as
     * undelivered; they never propagate into the turn.
     */
    async notify(escalation: EscalationCase): Promise<boolean> {
        if (escalation.notifiedAt !== null) return true;
        try {
            const { delivered } = await this.notifier.notify(toMessage(escalation));
            if (delivered) {
                await this.repository.markNotified(escalation.escalationId, this.now().toISOString());
            } else {
                this.log.warn({ escalationId: escalation.escalationId }, 'Escalation notification not delivered');
            }
            return delivered;
        } catch (error) {
            this.log.warn({
                escalationId: escalation.escalationId,
                error: error instanceof Error ? error.message : String(error)
            }, 'Escalation notification failed');
            return false;
        }
    }

    /** Retries notification for pending cases. Returns how many were delivered. */
    async redeliverPending(): Promise<number> {
        const pending = await this.repository.listUndelivered(this.redeliveryBatchSize);
        let delivered = 0;
        for (const escalation of pending) {
            if (await this.notify(escalation)) delivered += 1;
        }
        if (pending.length > 0) {
            this.log.info({ attempted: pending.length, delivered }, 'Escalation redelivery pass');
        }
        return delivered;
    }

    async getCase(escalationId: string): Promise<EscalationCase> {
        const escalation = await this.repository.findById(escalationId);
        if (!escalation) throw new NotFoundError('escalation', escalationId);
        return escalation;
    }

    /**
     * Reviewer acknowledgement. The only path to ESCALATION_COMPLETE.
     * Acknowledging a case that is no longer PENDING changes nothing.
     */
    async acknowledge(escalationId: string, completer: HandoffCompleter): Promise<EscalationCase> {
        const escalation = await this.getCase(escalationId);
        if (escalation.status !== 'PENDING') {
            return escalation;
        }

        const outcome = await completer.completeHandoff(escalation.sessionId, escalationId);
        if (outcome === 'SESSION_EXPIRED') {
            this.log.warn({ escalationId, sessionId: escalation.sessionId }, 'Escalation acknowledged after session expiry');
        }

        await this.repository.markAcknowledged(escalationId, this.now().toISOString());
        return this.getCase(escalationId);
    }

    async resolve(escalationId: string, resolution: string): Promise<EscalationCase> {
        const escalation = await this.getCase(escalationId);
        if (escalation.status === 'RESOLVED') {
            return escalation;
        }
        if (escalation.status !== 'ACKNOWLEDGED') {
            throw new InvalidTransitionError(escalation.status, 'Resolve');
        }

        await this.repository.markResolved(escalationId, resolution, this.now().toISOString());
        return this.getCase(escalationId);
    }
}
