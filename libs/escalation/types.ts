import type { WorkflowState } from '../workflow/states.js';
import type { BreakerTrip, EscalationReasonCode, EvaluatorName, VerdictReasonCode, VerdictStatus } from '../workflow/types.js';

export type TargetRole = 'PHYSICIAN' | 'PHYSICIAN_ASSISTANT';

export type EscalationStatus = 'PENDING' | 'ACKNOWLEDGED' | 'RESOLVED';

export interface MedicationEntry {
    readonly drug: string | null;
    readonly dose: string | null;
    readonly qty: string | null;
    readonly frequency: string | null;
}

/**
 * What a reviewer sees. Built from an allow-list of session fields; verdict
 * details are reduced to status and reason.
 */
export interface ContextPackage {
    readonly patientSummary: {
        readonly patientRef: string | null;
        readonly identityConfirmed: boolean;
    };
    readonly medicationList: readonly MedicationEntry[];
    readonly conversationExcerpt: readonly string[];
    readonly verdictSummary: readonly {
        readonly evaluator: EvaluatorName;
        readonly status: VerdictStatus;
        readonly reasonCode: VerdictReasonCode | null;
    }[];
    readonly escalatedFrom: WorkflowState;
}

export interface EscalationCase {
    readonly escalationId: string;
    readonly sessionId: string;
    /** Turn token of the turn that opened the case. */
    readonly idempotencyToken: string;
    readonly reasonCode: EscalationReasonCode;
    readonly trip: BreakerTrip | null;
    readonly contextPackage: ContextPackage;
    readonly targetRole: TargetRole;
    readonly status: EscalationStatus;
    readonly createdAt: string;
    readonly notifiedAt: string | null;
    readonly acknowledgedAt: string | null;
    readonly resolvedAt: string | null;
    readonly resolution: string | null;
}
