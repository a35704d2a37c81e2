/**
 * Circuit Breaker Policy
 *
 * Ordered safety predicates evaluated before the nominal transition table.
 * A match forces ESCALATE_HANDOFF with the rule's reason code, whatever the
 * nominal mapping would have chosen.
 *
 * Rules only apply in guarded states (COLLECT_REQUEST, SAFETY_CHECK,
 * BACKEND_CHECK). Order matters: first match wins.
 */

import type { EngineConfig } from '../bootstrap/config/workflow-config.js';
import { planCollect } from '../workflow/collectPlanner.js';
import { isConfidenceGated, isGuarded } from '../workflow/states.js';
import {
    EVALUATOR_NAMES,
    type BreakerReasonCode,
    type BreakerTrip,
    type EvaluatorName,
    type EvaluatorVerdict,
    type Intent,
    type TransitionEvent,
    type VerdictReasonCode,
    type WorkflowSession
} from '../workflow/types.js';

interface BreakerContext {
    readonly session: WorkflowSession;
    readonly event: TransitionEvent;
    readonly config: EngineConfig;
}

const COLLECTING_INTENTS: ReadonlySet<Intent> = new Set<Intent>(['RequestRefill', 'Clarification']);

type RuleMatch = Omit<BreakerTrip, 'reasonCode' | 'rule'>;

interface BreakerRule {
    readonly reasonCode: BreakerReasonCode;
    readonly matches: (context: BreakerContext) => RuleMatch | null;
}

function verdictsInOrder(event: TransitionEvent): Array<[EvaluatorName, EvaluatorVerdict]> {
    const entries: Array<[EvaluatorName, EvaluatorVerdict]> = [];
    for (const name of EVALUATOR_NAMES) {
        const verdict = event.evaluatorVerdicts[name];
        if (verdict !== undefined) entries.push([name, verdict]);
    }
    return entries;
}

function isBlocking(verdict: EvaluatorVerdict): boolean {
    return verdict.status === 'FAIL' || verdict.status === 'REQUIRES_ESCALATION';
}

function firstVerdict(
    event: TransitionEvent,
    predicate: (verdict: EvaluatorVerdict) => boolean
): RuleMatch | null {
    const found = verdictsInOrder(event).find(([, verdict]) => predicate(verdict));
    if (!found) return null;
    const [evaluator, verdict] = found;
    return verdict.reasonCode === undefined
        ? { evaluator }
        : { evaluator, verdictReason: verdict.reasonCode };
}

const withReason = (reason: VerdictReasonCode) => (context: BreakerContext): RuleMatch | null =>
    firstVerdict(context.event, v => v.status !== 'PASS' && v.reasonCode === reason);

export const BREAKER_RULES: readonly BreakerRule[] = [
    {
        reasonCode: 'LOW_CONFIDENCE',
        matches: ({ session, event, config }) =>
            isConfidenceGated(session.currentState) && (event.confidence ?? 0) < config.confidence.escalateBelow
                ? {}
                : null
    },
    {
        reasonCode: 'IDENTITY_VERIFICATION_FAILED',
        matches: ({ event }) => {
            const identity = event.evaluatorVerdicts.identity;
            if (identity === undefined || !isBlocking(identity)) return null;
            return { evaluator: 'identity', verdictReason: identity.reasonCode };
        }
    },
    { reasonCode: 'MAJOR_DRUG_INTERACTION', matches: withReason('MAJOR_DRUG_INTERACTION') },
    { reasonCode: 'ALLERGY_MATCH', matches: withReason('ALLERGY_MATCH') },
    { reasonCode: 'CONTROLLED_SUBSTANCE', matches: withReason('CONTROLLED_SUBSTANCE') },
    {
        reasonCode: 'BACKEND_UNAVAILABLE',
        matches: ({ event }) => firstVerdict(event, v => v.status === 'UNAVAILABLE')
    },
    {
        // Only the collection step asks clarifying questions.
        reasonCode: 'MAX_RETRIES_EXCEEDED',
        matches: ({ session, event, config }) => {
            if (session.currentState !== 'COLLECT_REQUEST' || !COLLECTING_INTENTS.has(event.intent)) return null;
            const plan = planCollect(session, event, config);
            if (plan.kind !== 'CLARIFY') return null;
            const attempts = (session.retryCounts[plan.retryKey] ?? 0) + 1;
            return attempts > config.maxClarificationRetries ? {} : null;
        }
    },
    {
        reasonCode: 'EVALUATOR_ESCALATION',
        matches: ({ event }) => firstVerdict(event, isBlocking)
    }
];

/**
 * Returns the first breaker that fires for this step, or null.
 */
export function evaluateBreakers(
    session: WorkflowSession,
    event: TransitionEvent,
    config: EngineConfig
): BreakerTrip | null {
    if (!isGuarded(session.currentState)) return null;

    const context: BreakerContext = { session, event, config };
    for (const [index, rule] of BREAKER_RULES.entries()) {
        const match = rule.matches(context);
        if (match) {
            return Object.freeze({ reasonCode: rule.reasonCode, rule: index + 1, ...match });
        }
    }
    return null;
}
