/**
 * Applies engine directives to a session snapshot.
 *
 * Pure: returns a new session plus the side effects the controller still has
 * to carry out (evaluator calls, escalation, audit, prompt). Timestamps,
 * version and TTL are the controller's concern.
 */

import type { WorkflowState } from './states.js';
import type { BreakerTrip, Directive, EscalationReasonCode, EvaluatorName, WorkflowSession } from './types.js';

export type AuditDirective = Extract<Directive, { type: 'EMIT_AUDIT' }>;

export interface DirectiveEffects {
    readonly invoke: readonly EvaluatorName[];
    readonly audits: readonly AuditDirective[];
    readonly escalation: { readonly reasonCode: EscalationReasonCode; readonly trip?: BreakerTrip } | null;
    readonly prompt: string | null;
}

export interface ReducedSession {
    readonly session: WorkflowSession;
    readonly effects: DirectiveEffects;
}

export function applyDirectives(
    session: WorkflowSession,
    nextState: WorkflowState,
    directives: readonly Directive[],
    maxRetries: number
): ReducedSession {
    const entities: Record<string, string> = { ...session.collectedEntities };
    const confirmed = new Set(session.confirmedSlots);
    const retryCounts: Record<string, number> = { ...session.retryCounts };
    let { pendingCandidates, patientRef, identityConfirmed, activeMedications, orderId } = session;

    const invoke: EvaluatorName[] = [];
    const audits: AuditDirective[] = [];
    let escalation: DirectiveEffects['escalation'] = null;
    let prompt: string | null = null;

    for (const directive of directives) {
        switch (directive.type) {
            case 'INVOKE_EVALUATOR':
                invoke.push(directive.evaluator);
                break;
            case 'PERSIST_ENTITY':
                entities[directive.slot] = directive.value;
                confirmed.delete(directive.slot);
                break;
            case 'CONFIRM_SLOT':
                confirmed.add(directive.slot);
                break;
            case 'SET_CANDIDATES':
                pendingCandidates = directive.candidates === null ? null : [...directive.candidates];
                break;
            case 'CONFIRM_IDENTITY':
                identityConfirmed = true;
                patientRef = directive.patientRef ?? patientRef;
                activeMedications = directive.activeMedications ?? activeMedications;
                break;
            case 'CLARIFY':
                retryCounts[directive.retryKey] = Math.min((retryCounts[directive.retryKey] ?? 0) + 1, maxRetries);
                break;
            case 'RESET_RETRY':
                delete retryCounts[directive.retryKey];
                break;
            case 'RECORD_ORDER':
                orderId = directive.orderId;
                break;
            case 'REQUEST_ESCALATION':
                escalation = directive.trip === undefined
                    ? { reasonCode: directive.reasonCode }
                    : { reasonCode: directive.reasonCode, trip: directive.trip };
                break;
            case 'EMIT_AUDIT':
                audits.push(directive);
                break;
            case 'EMIT_PROMPT':
                prompt = directive.prompt;
                break;
        }
    }

    return {
        session: {
            ...session,
            currentState: nextState,
            collectedEntities: entities,
            confirmedSlots: [...confirmed].sort(),
            pendingCandidates,
            patientRef,
            identityConfirmed,
            activeMedications,
            retryCounts,
            orderId
        },
        effects: { invoke, audits, escalation, prompt }
    };
}

/** Bounded append; keeps the newest `limit` entries. */
export function appendBounded<T>(items: readonly T[], item: T, limit: number): T[] {
    return [...items, item].slice(-limit);
}
