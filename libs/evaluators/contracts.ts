/**
 * Safety Evaluator Contracts
 *
 * Every sub-task the workflow delegates (identity, disambiguation, clinical
 * checks, inventory) sits behind the same shape so the controller can fan out
 * without knowing what is on the other side.
 */

import type { EvaluatorName, EvaluatorVerdict } from '../workflow/types.js';

export interface EvaluationRequest {
    readonly sessionId: string;
    readonly turnSequence: number;
    /** `sessionId:turnSequence`; evaluators with side effects must dedupe on it. */
    readonly idempotencyKey: string;
    readonly patientRef: string | null;
    readonly entities: Readonly<Record<string, string>>;
}

export interface Evaluator {
    evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<EvaluatorVerdict>;
}

export type EvaluatorRegistry = Readonly<Record<EvaluatorName, Evaluator>>;
