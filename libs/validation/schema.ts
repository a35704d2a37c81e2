import { z } from 'zod';
import { USER_INTENTS } from '../workflow/types.js';

/**
 * Central schema definitions for every inbound payload.
 */

// --- Turn ingress ---

/** NLU output may carry numbers (qty: 30); slots are stored as strings. */
const EntityValueSchema = z.union([z.string(), z.number().finite()]).transform(value => String(value));

export const TurnInputSchema = z.object({
    sessionId: z.string().min(1).max(128).regex(/^[A-Za-z0-9_.:-]+$/),
    rawUtterance: z.string().max(4000),
    intent: z.enum(USER_INTENTS),
    confidence: z.number().min(0).max(1).optional(),
    extractedEntities: z.record(z.string().min(1).max(64), EntityValueSchema).default({}),
    turnSequence: z.number().int().nonnegative()
}).strict();

export type TurnInputPayload = z.infer<typeof TurnInputSchema>;

// --- Reviewer actions ---

export const EscalationIdParamSchema = z.string().uuid();

export const ResolveEscalationSchema = z.object({
    resolution: z.string().min(1).max(2000)
}).strict();

export type ResolveEscalationPayload = z.infer<typeof ResolveEscalationSchema>;
