import { z } from 'zod';
import { InputValidationError } from '../errors/workflowErrors.js';
import { EscalationCaseSchema } from '../escalation/codec.js';
import { WORKFLOW_STATES } from '../workflow/states.js';
import { USER_INTENTS, type WorkflowSession } from '../workflow/types.js';

/**
 * Stored-session codec. Sessions are persisted as JSON and validated on the
 * way back in, so a corrupt or foreign row never reaches the engine.
 */

const StateSchema = z.enum(WORKFLOW_STATES);

const BreakerReasonSchema = z.enum([
    'LOW_CONFIDENCE',
    'IDENTITY_VERIFICATION_FAILED',
    'MAJOR_DRUG_INTERACTION',
    'ALLERGY_MATCH',
    'CONTROLLED_SUBSTANCE',
    'BACKEND_UNAVAILABLE',
    'MAX_RETRIES_EXCEEDED',
    'EVALUATOR_ESCALATION'
]);

export const AuditTriggerSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('EVENT'),
        intent: z.union([z.enum(USER_INTENTS), z.literal('HandoffAcknowledged')]),
        condition: z.string()
    }),
    z.object({ kind: z.literal('BREAKER'), reasonCode: BreakerReasonSchema, rule: z.number().int() }),
    z.object({ kind: z.literal('ROUTING'), reasonCode: z.union([BreakerReasonSchema, z.literal('PRIOR_AUTHORIZATION_REQUIRED')]) }),
    z.object({ kind: z.literal('HANDOFF_ACK'), escalationId: z.string() })
]);

const AuditEntryDraftSchema = z.object({
    token: z.string(),
    sessionId: z.string(),
    turnSequence: z.number().int(),
    fromState: StateSchema,
    toState: StateSchema,
    trigger: AuditTriggerSchema,
    actor: z.string(),
    timestamp: z.string()
});

const TurnOutputSchema = z.object({
    sessionId: z.string(),
    nextState: StateSchema,
    userPrompt: z.string().optional(),
    escalationId: z.string().optional(),
    orderId: z.string().optional(),
    error: z.enum(['InvalidTransition', 'StaleSession', 'NotFound', 'ValidationFailed', 'InternalError']).optional()
});

export const WorkflowSessionSchema = z.object({
    sessionId: z.string().min(1),
    currentState: StateSchema,
    patientRef: z.string().nullable(),
    identityConfirmed: z.boolean(),
    activeMedications: z.array(z.string()).default([]),
    collectedEntities: z.record(z.string()),
    confirmedSlots: z.array(z.string()),
    pendingCandidates: z.array(z.string()).nullable(),
    retryCounts: z.record(z.number().int().nonnegative()),
    confidenceHistory: z.array(z.number().min(0).max(1)),
    transcript: z.array(z.string()),
    turnSequence: z.number().int(),
    lastTurn: z.object({
        sequence: z.number().int(),
        response: TurnOutputSchema,
        auditEntries: z.array(AuditEntryDraftSchema),
        escalation: EscalationCaseSchema.optional()
    }).nullable(),
    escalationId: z.string().nullable(),
    orderId: z.string().nullable(),
    version: z.number().int().nonnegative(),
    createdAt: z.string(),
    updatedAt: z.string(),
    ttlDeadline: z.string()
});

export function encodeSession(session: WorkflowSession): string {
    return JSON.stringify(session);
}

export function decodeSession(raw: unknown): WorkflowSession {
    const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
    const result = WorkflowSessionSchema.safeParse(value);
    if (!result.success) {
        throw new InputValidationError(
            'StoredSession',
            result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        );
    }
    return result.data;
}
