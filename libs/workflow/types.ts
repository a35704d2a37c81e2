/**
 * Refill Workflow Model
 *
 * Sessions, events, verdicts and directives exchanged between the session
 * controller, the transition engine and the circuit breaker policy.
 * Everything here is plain data; nothing is mutated after construction.
 */

import type { WorkflowState } from './states.js';
import type { EscalationCase } from '../escalation/types.js';

/**
 * Intents produced by the upstream NLU layer, plus the one system event
 * raised by the escalation coordinator.
 */
export const USER_INTENTS = ['RequestRefill', 'CancelRequest', 'StatusInquiry', 'Clarification'] as const;
export type UserIntent = typeof USER_INTENTS[number];
export type Intent = UserIntent | 'HandoffAcknowledged';

// --- Evaluator verdicts ---

export const EVALUATOR_NAMES = [
    'identity',
    'disambiguation',
    'interaction',
    'allergy',
    'controlled',
    'dosage',
    'inventory'
] as const;
export type EvaluatorName = typeof EVALUATOR_NAMES[number];

export type VerdictStatus = 'PASS' | 'FAIL' | 'REQUIRES_ESCALATION' | 'UNAVAILABLE';

export const VERDICT_REASON_CODES = [
    'IDENTITY_MISMATCH',
    'IDENTITY_NOT_FOUND',
    'DRUG_NOT_RESOLVED',
    'MAJOR_DRUG_INTERACTION',
    'MODERATE_DRUG_INTERACTION',
    'ALLERGY_MATCH',
    'ALLERGY_CROSS_SENSITIVITY',
    'CONTROLLED_SUBSTANCE',
    'DOSE_OUT_OF_RANGE',
    'INVALID_DOSE',
    'OUT_OF_STOCK',
    'TIMEOUT',
    'EVALUATOR_ERROR',
    'CIRCUIT_OPEN'
] as const;
export type VerdictReasonCode = typeof VERDICT_REASON_CODES[number];

export type Severity = 'none' | 'minor' | 'moderate' | 'major';
export type DeaSchedule = 'I' | 'II' | 'III' | 'IV' | 'V';

export interface DisambiguationCandidate {
    readonly candidate: string;
    readonly score: number;
}

export type VerdictDetail =
    | { readonly kind: 'identity'; readonly patientRef: string; readonly activeMedications?: readonly string[] }
    | { readonly kind: 'disambiguation'; readonly resolution: 'AUTO_CONFIRMED'; readonly candidate: string; readonly score: number }
    | { readonly kind: 'disambiguation'; readonly resolution: 'NEEDS_SELECTION'; readonly candidates: readonly string[] }
    | { readonly kind: 'disambiguation'; readonly resolution: 'UNRESOLVED'; readonly topScore: number | null }
    | { readonly kind: 'interaction'; readonly severity: Severity; readonly description?: string }
    | { readonly kind: 'allergy'; readonly severity: Severity; readonly substance?: string }
    | { readonly kind: 'controlled'; readonly schedule: DeaSchedule | null }
    | { readonly kind: 'dosage'; readonly requested: string; readonly minDose?: number; readonly maxDose?: number }
    | { readonly kind: 'inventory'; readonly available: boolean; readonly priorAuthRequired: boolean; readonly orderId?: string }
    | { readonly kind: 'unavailable'; readonly cause: 'TIMEOUT' | 'ERROR' | 'CIRCUIT_OPEN'; readonly timeoutMs?: number };

/**
 * Structured outcome of one evaluator. Non-PASS verdicts always carry a reason.
 */
export type EvaluatorVerdict =
    | { readonly status: 'PASS'; readonly reasonCode?: VerdictReasonCode; readonly detail?: VerdictDetail }
    | { readonly status: Exclude<VerdictStatus, 'PASS'>; readonly reasonCode: VerdictReasonCode; readonly detail?: VerdictDetail };

export type VerdictMap = Readonly<Partial<Record<EvaluatorName, EvaluatorVerdict>>>;

// --- Events ---

export interface TransitionEvent {
    readonly intent: Intent;
    /** Absent confidence counts as 0 in confidence-gated states. */
    readonly confidence?: number;
    readonly extractedEntities: Readonly<Record<string, string>>;
    readonly evaluatorVerdicts: VerdictMap;
    readonly turnSequence: number;
    readonly rawUtterance?: string;
}

// --- Circuit breaker / escalation ---

export type BreakerReasonCode =
    | 'LOW_CONFIDENCE'
    | 'IDENTITY_VERIFICATION_FAILED'
    | 'MAJOR_DRUG_INTERACTION'
    | 'ALLERGY_MATCH'
    | 'CONTROLLED_SUBSTANCE'
    | 'BACKEND_UNAVAILABLE'
    | 'MAX_RETRIES_EXCEEDED'
    | 'EVALUATOR_ESCALATION';

export type EscalationReasonCode = BreakerReasonCode | 'PRIOR_AUTHORIZATION_REQUIRED';

export interface BreakerTrip {
    readonly reasonCode: BreakerReasonCode;
    /** 1-based position of the matching rule in the policy. */
    readonly rule: number;
    readonly evaluator?: EvaluatorName;
    readonly verdictReason?: VerdictReasonCode;
}

// --- Directives ---

export type AuditTrigger =
    | { readonly kind: 'EVENT'; readonly intent: Intent; readonly condition: string }
    | { readonly kind: 'BREAKER'; readonly reasonCode: BreakerReasonCode; readonly rule: number }
    | { readonly kind: 'ROUTING'; readonly reasonCode: EscalationReasonCode }
    | { readonly kind: 'HANDOFF_ACK'; readonly escalationId: string };

export type Directive =
    | { readonly type: 'INVOKE_EVALUATOR'; readonly evaluator: EvaluatorName }
    | { readonly type: 'PERSIST_ENTITY'; readonly slot: string; readonly value: string }
    | { readonly type: 'CONFIRM_SLOT'; readonly slot: string }
    | { readonly type: 'SET_CANDIDATES'; readonly candidates: readonly string[] | null }
    | { readonly type: 'CONFIRM_IDENTITY'; readonly patientRef: string | null; readonly activeMedications?: readonly string[] }
    | { readonly type: 'CLARIFY'; readonly retryKey: string; readonly prompt: string }
    | { readonly type: 'RESET_RETRY'; readonly retryKey: string }
    | { readonly type: 'RECORD_ORDER'; readonly orderId: string }
    | { readonly type: 'REQUEST_ESCALATION'; readonly reasonCode: EscalationReasonCode; readonly trip?: BreakerTrip }
    | {
        readonly type: 'EMIT_AUDIT';
        readonly fromState: WorkflowState;
        readonly toState: WorkflowState;
        readonly trigger: AuditTrigger;
        readonly actor: string;
    }
    | { readonly type: 'EMIT_PROMPT'; readonly prompt: string };

export type DirectiveType = Directive['type'];

export interface TransitionResult {
    readonly nextState: WorkflowState;
    readonly directives: readonly Directive[];
}

// --- Turn contract ---

export type TurnErrorKind = 'InvalidTransition' | 'StaleSession' | 'NotFound' | 'ValidationFailed' | 'InternalError';

export interface TurnInput {
    readonly sessionId: string;
    readonly rawUtterance: string;
    readonly intent: UserIntent;
    readonly confidence?: number;
    readonly extractedEntities: Readonly<Record<string, string>>;
    readonly turnSequence: number;
}

export interface TurnOutput {
    readonly sessionId: string;
    readonly nextState: WorkflowState;
    readonly userPrompt?: string;
    readonly escalationId?: string;
    readonly orderId?: string;
    readonly error?: TurnErrorKind;
}

// --- Session ---

/**
 * Audit entry produced by a turn, kept on the session so a replayed turn can
 * re-append anything the first attempt failed to commit.
 */
export interface AuditEntryDraft {
    readonly token: string;
    readonly sessionId: string;
    readonly turnSequence: number;
    readonly fromState: WorkflowState;
    readonly toState: WorkflowState;
    readonly trigger: AuditTrigger;
    readonly actor: string;
    readonly timestamp: string;
}

export interface TurnReceipt {
    readonly sequence: number;
    readonly response: TurnOutput;
    readonly auditEntries: readonly AuditEntryDraft[];
    /** The case this turn opened; stored only once the turn is committed and audited. */
    readonly escalation?: EscalationCase;
}

export interface WorkflowSession {
    readonly sessionId: string;
    readonly currentState: WorkflowState;
    /** Opaque patient identifier; unverified until identityConfirmed. */
    readonly patientRef: string | null;
    readonly identityConfirmed: boolean;
    /** Active medications on the patient's record, as reported by the identity check. */
    readonly activeMedications: readonly string[];
    readonly collectedEntities: Readonly<Record<string, string>>;
    readonly confirmedSlots: readonly string[];
    readonly pendingCandidates: readonly string[] | null;
    /** Keys: `slot:<name>` and `confidence:<state>`. */
    readonly retryCounts: Readonly<Record<string, number>>;
    /** Oldest first. */
    readonly confidenceHistory: readonly number[];
    readonly transcript: readonly string[];
    readonly turnSequence: number;
    readonly lastTurn: TurnReceipt | null;
    readonly escalationId: string | null;
    readonly orderId: string | null;
    /** Optimistic-concurrency counter; 0 means never stored. */
    readonly version: number;
    readonly createdAt: string;
    readonly updatedAt: string;
    readonly ttlDeadline: string;
}
