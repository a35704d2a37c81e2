import { z } from 'zod';
import { InputValidationError } from '../../errors/workflowErrors.js';

/**
 * Workflow configuration.
 *
 * Thresholds, timeouts and budgets are read from the environment once at
 * startup. Every value has a documented default; anything present but
 * malformed fails the load instead of falling back.
 */

const probability = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const WorkflowEnvSchema = z.object({
    CONFIDENCE_ESCALATE_BELOW: probability.default(0.70),
    CONFIDENCE_CLARIFY_BELOW: probability.default(0.85),
    DISAMBIGUATION_AUTO_CONFIRM_ABOVE: probability.default(0.95),
    DISAMBIGUATION_SELECTION_FLOOR: probability.default(0.75),
    MAX_CLARIFICATION_RETRIES: positiveInt.default(3),
    SESSION_TTL_MS: positiveInt.default(5 * 60 * 1000),
    EVALUATOR_TIMEOUT_MS: positiveInt.default(2000),
    BACKEND_TIMEOUT_MS: positiveInt.default(3000),
    CALL_BREAKER_FAILURE_THRESHOLD: positiveInt.default(5),
    CALL_BREAKER_RECOVERY_MS: positiveInt.default(30_000),
    REQUIRED_SLOTS: z.string().default('drug,qty')
}).superRefine((env, ctx) => {
    if (env.CONFIDENCE_ESCALATE_BELOW > env.CONFIDENCE_CLARIFY_BELOW) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['CONFIDENCE_ESCALATE_BELOW'],
            message: 'must not exceed CONFIDENCE_CLARIFY_BELOW'
        });
    }
    if (env.DISAMBIGUATION_SELECTION_FLOOR > env.DISAMBIGUATION_AUTO_CONFIRM_ABOVE) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['DISAMBIGUATION_SELECTION_FLOOR'],
            message: 'must not exceed DISAMBIGUATION_AUTO_CONFIRM_ABOVE'
        });
    }
});

export interface ConfidenceThresholds {
    /** Below this, a gated state escalates (LOW_CONFIDENCE). */
    readonly escalateBelow: number;
    /** Below this (and at or above escalateBelow), the turn is re-prompted. */
    readonly clarifyBelow: number;
}

export interface DisambiguationThresholds {
    readonly autoConfirmAbove: number;
    readonly selectionFloor: number;
}

/**
 * The subset of configuration the pure transition logic depends on.
 */
export interface EngineConfig {
    readonly confidence: ConfidenceThresholds;
    readonly maxClarificationRetries: number;
    readonly requiredSlots: readonly string[];
}

export interface WorkflowConfig extends EngineConfig {
    readonly disambiguation: DisambiguationThresholds;
    readonly sessionTtlMs: number;
    readonly evaluatorTimeoutMs: number;
    readonly backendTimeoutMs: number;
    readonly callBreaker: {
        readonly failureThreshold: number;
        readonly recoveryTimeoutMs: number;
    };
    readonly confidenceHistoryLimit: number;
    readonly transcriptLimit: number;
}

export function loadWorkflowConfig(env: NodeJS.ProcessEnv = process.env): WorkflowConfig {
    const result = WorkflowEnvSchema.safeParse(env);
    if (!result.success) {
        throw new InputValidationError(
            'WorkflowConfig',
            result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        );
    }

    const parsed = result.data;
    const requiredSlots = parsed.REQUIRED_SLOTS.split(',')
        .map(slot => slot.trim())
        .filter(slot => slot.length > 0);

    return Object.freeze({
        confidence: {
            escalateBelow: parsed.CONFIDENCE_ESCALATE_BELOW,
            clarifyBelow: parsed.CONFIDENCE_CLARIFY_BELOW
        },
        disambiguation: {
            autoConfirmAbove: parsed.DISAMBIGUATION_AUTO_CONFIRM_ABOVE,
            selectionFloor: parsed.DISAMBIGUATION_SELECTION_FLOOR
        },
        maxClarificationRetries: parsed.MAX_CLARIFICATION_RETRIES,
        requiredSlots,
        sessionTtlMs: parsed.SESSION_TTL_MS,
        evaluatorTimeoutMs: parsed.EVALUATOR_TIMEOUT_MS,
        backendTimeoutMs: parsed.BACKEND_TIMEOUT_MS,
        callBreaker: {
            failureThreshold: parsed.CALL_BREAKER_FAILURE_THRESHOLD,
            recoveryTimeoutMs: parsed.CALL_BREAKER_RECOVERY_MS
        },
        confidenceHistoryLimit: 10,
        transcriptLimit: 5
    });
}

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = loadWorkflowConfig({});
