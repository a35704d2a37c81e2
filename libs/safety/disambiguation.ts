/**
 * Drug disambiguation policy.
 *
 * Turns the ranked candidates from the drug index into a verdict:
 *   score > autoConfirmAbove           -> AUTO_CONFIRMED
 *   selectionFloor <= score <= above   -> NEEDS_SELECTION (top 3)
 *   below the floor, or no candidates  -> REQUIRES_ESCALATION (DRUG_NOT_RESOLVED)
 */

import type { DisambiguationThresholds } from '../bootstrap/config/workflow-config.js';
import type { EvaluationRequest, Evaluator } from '../evaluators/contracts.js';
import type { DisambiguationCandidate, EvaluatorVerdict } from '../workflow/types.js';

export const SELECTION_SIZE = 3;

export interface DisambiguationResolver {
    /** Candidates ordered by descending score. */
    resolve(drugText: string, signal: AbortSignal): Promise<readonly DisambiguationCandidate[]>;
}

export function classifyCandidates(
    candidates: readonly DisambiguationCandidate[],
    thresholds: DisambiguationThresholds
): EvaluatorVerdict {
    const ranked = [...candidates].sort((a, b) => b.score - a.score);
    const top = ranked[0];

    if (top === undefined || top.score < thresholds.selectionFloor) {
        return {
            status: 'REQUIRES_ESCALATION',
            reasonCode: 'DRUG_NOT_RESOLVED',
            detail: { kind: 'disambiguation', resolution: 'UNRESOLVED', topScore: top?.score ?? null }
        };
    }

    if (top.score > thresholds.autoConfirmAbove) {
        return {
            status: 'PASS',
            detail: { kind: 'disambiguation', resolution: 'AUTO_CONFIRMED', candidate: top.candidate, score: top.score }
        };
    }

    return {
        status: 'PASS',
        detail: {
            kind: 'disambiguation',
            resolution: 'NEEDS_SELECTION',
            candidates: ranked.slice(0, SELECTION_SIZE).map(c => c.candidate)
        }
    };
}

/**
 * Evaluator adapter over a resolver. The drug slot is always present by the
 * time disambiguation is requested; an empty value still resolves to no
 * candidates rather than failing.
 */
export class DisambiguationEvaluator implements Evaluator {
    constructor(
        private readonly resolver: DisambiguationResolver,
        private readonly thresholds: DisambiguationThresholds
    ) { }

    async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<EvaluatorVerdict> {
        const drug = request.entities['drug'] ?? '';
        const candidates = drug.length > 0 ? await this.resolver.resolve(drug, signal) : [];
        return classifyCandidates(candidates, this.thresholds);
    }
}
