import { z } from 'zod';
import { WORKFLOW_STATES } from '../workflow/states.js';
import { EVALUATOR_NAMES, VERDICT_REASON_CODES } from '../workflow/types.js';
import type { EscalationCase } from './types.js';

/**
 * Schema for stored escalation cases.
 */

const BREAKER_REASONS = [
    'LOW_CONFIDENCE',
    'IDENTITY_VERIFICATION_FAILED',
    'MAJOR_DRUG_INTERACTION',
    'ALLERGY_MATCH',
    'CONTROLLED_SUBSTANCE',
    'BACKEND_UNAVAILABLE',
    'MAX_RETRIES_EXCEEDED',
    'EVALUATOR_ESCALATION'
] as const;

const nullableString = z.string().nullable();

export const EscalationCaseSchema: z.ZodType<EscalationCase, z.ZodTypeDef, unknown> = z.object({
    escalationId: z.string(),
    sessionId: z.string(),
    idempotencyToken: z.string(),
    reasonCode: z.enum([...BREAKER_REASONS, 'PRIOR_AUTHORIZATION_REQUIRED'] as const),
    trip: z.object({
        reasonCode: z.enum(BREAKER_REASONS),
        rule: z.number().int(),
        evaluator: z.enum(EVALUATOR_NAMES).optional(),
        verdictReason: z.enum(VERDICT_REASON_CODES).optional()
    }).nullable(),
    contextPackage: z.object({
        patientSummary: z.object({ patientRef: nullableString, identityConfirmed: z.boolean() }),
        medicationList: z.array(z.object({
            drug: nullableString,
            dose: nullableString,
            qty: nullableString,
            frequency: nullableString
        })),
        conversationExcerpt: z.array(z.string()),
        verdictSummary: z.array(z.object({
            evaluator: z.enum(EVALUATOR_NAMES),
            status: z.enum(['PASS', 'FAIL', 'REQUIRES_ESCALATION', 'UNAVAILABLE']),
            reasonCode: z.enum(VERDICT_REASON_CODES).nullable()
        })),
        escalatedFrom: z.enum(WORKFLOW_STATES)
    }),
    targetRole: z.enum(['PHYSICIAN', 'PHYSICIAN_ASSISTANT']),
    status: z.enum(['PENDING', 'ACKNOWLEDGED', 'RESOLVED']),
    createdAt: z.string(),
    notifiedAt: nullableString,
    acknowledgedAt: nullableString,
    resolvedAt: nullableString,
    resolution: nullableString
});
